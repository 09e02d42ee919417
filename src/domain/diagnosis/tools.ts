import { getErrorMessage } from "../../core/logging.js";
import { isSearchError } from "../../core/errors.js";
import {
  buildCatalogSnapshot,
  snapshotStats,
  type CatalogStore,
} from "../../data-sources/catalog-store.js";
import type { CsvCatalogLoader } from "../../data-sources/catalog-loader.js";
import type { DiagnosisSearchPipeline } from "./search-pipeline.js";
import type {
  CatalogStats,
  FilterLevel,
  FilterNode,
  QueryResult,
  QuerySpec,
  Term,
} from "./types.js";

const ATTRIBUTION = "ICD-O-3 diagnosis vocabulary and topography catalog (local CSV sources)";

export interface ToolResult<T> {
  success: boolean;
  data?: T;
  error?: string;
  attribution: string;
}

export interface SearchDiagnosesArgs {
  query?: string;
  macro_id?: string;
  group_id?: string;
  site_id?: string;
  threshold?: number;
}

export interface SearchDiagnosesData extends QueryResult {
  ids_csv: string;
}

export interface ListFilterOptionsArgs {
  level: string;
  parent_id?: string;
}

const FILTER_LEVELS: readonly FilterLevel[] = ["macro", "group", "site"];

function isFilterLevel(value: string): value is FilterLevel {
  return FILTER_LEVELS.some((level) => level === value);
}

/**
 * Engine errors become a failed result; anything else propagates.
 */
function fail<T>(err: unknown): ToolResult<T> {
  if (!isSearchError(err)) throw err;
  return {
    success: false,
    error: `${err.code}: ${err.message}`,
    attribution: ATTRIBUTION,
  };
}

/**
 * Search the vocabulary. Maps MCP tool args (snake_case) to a QuerySpec.
 */
export function searchDiagnoses(
  pipeline: DiagnosisSearchPipeline,
  args: SearchDiagnosesArgs,
): ToolResult<SearchDiagnosesData> {
  const spec: QuerySpec = {
    text: args.query,
    macroId: args.macro_id,
    groupId: args.group_id,
    siteId: args.site_id,
    threshold: args.threshold,
  };

  try {
    const result = pipeline.query(spec);
    return {
      success: true,
      data: { ...result, ids_csv: result.ids.join(",") },
      attribution: ATTRIBUTION,
    };
  } catch (err) {
    return fail(err);
  }
}

export function listFilterOptions(
  pipeline: DiagnosisSearchPipeline,
  args: ListFilterOptionsArgs,
): ToolResult<FilterNode[]> {
  if (!isFilterLevel(args.level)) {
    return {
      success: false,
      error: `Invalid level "${args.level}". Must be "macro", "group", or "site".`,
      attribution: ATTRIBUTION,
    };
  }

  try {
    return {
      success: true,
      data: pipeline.filterOptions(args.level, args.parent_id),
      attribution: ATTRIBUTION,
    };
  } catch (err) {
    return fail(err);
  }
}

export function getDiagnosis(
  pipeline: DiagnosisSearchPipeline,
  args: { id: string },
): ToolResult<Term> {
  const term = pipeline.getTerm(args.id);
  if (!term) {
    return {
      success: false,
      error: `No diagnosis with id "${args.id}"`,
      attribution: ATTRIBUTION,
    };
  }
  return { success: true, data: term, attribution: ATTRIBUTION };
}

export function catalogStatus(
  pipeline: DiagnosisSearchPipeline,
): ToolResult<CatalogStats> {
  return { success: true, data: pipeline.stats(), attribution: ATTRIBUTION };
}

/**
 * Re-read the CSV sources and publish a new snapshot. On failure the
 * previous snapshot stays published.
 */
export async function reloadCatalog(
  loader: CsvCatalogLoader,
  store: CatalogStore,
): Promise<ToolResult<CatalogStats>> {
  try {
    const snapshot = buildCatalogSnapshot(await loader.load());
    store.replace(snapshot);
    return {
      success: true,
      data: snapshotStats(snapshot),
      attribution: ATTRIBUTION,
    };
  } catch (err) {
    return {
      success: false,
      error: `Catalog reload failed: ${getErrorMessage(err)}`,
      attribution: ATTRIBUTION,
    };
  }
}
