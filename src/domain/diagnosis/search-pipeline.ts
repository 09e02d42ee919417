import { InvalidFilterSelectionError, InvalidQueryError } from "../../core/errors.js";
import type { SearchConfig } from "../../core/config.js";
import {
  snapshotStats,
  type CatalogSnapshot,
  type CatalogStore,
} from "../../data-sources/catalog-store.js";
import type { TopographyIndex } from "../../data-sources/topography-index.js";
import { FilterSelection } from "./filter-selection.js";
import { rankSharded, tokenSetScorer, type Scorer } from "./fuzzy-matcher.js";
import { normalize } from "./normalizer.js";
import type {
  CatalogStats,
  FilterLevel,
  FilterNode,
  MatchResult,
  QueryResult,
  QuerySpec,
  Term,
} from "./types.js";

/**
 * Clamp a threshold into [0, 100]. Non-finite input falls back.
 */
export function clampThreshold(threshold: number | undefined, fallback: number): number {
  if (threshold === undefined || !Number.isFinite(threshold)) return fallback;
  return Math.min(100, Math.max(0, threshold));
}

/**
 * Diagnosis search pipeline: topography filter → fuzzy ranking → display cap.
 *
 * Stateless per query. Each call reads the published catalog snapshot once,
 * so a reload that lands mid-query is only seen by later queries.
 */
export class DiagnosisSearchPipeline {
  private store: CatalogStore;
  private config: SearchConfig;
  private scorer: Scorer;

  constructor(store: CatalogStore, config: SearchConfig, scorer: Scorer = tokenSetScorer) {
    this.store = store;
    this.config = config;
    this.scorer = scorer;
  }

  query(spec: QuerySpec): QueryResult {
    const snapshot = this.store.current();
    const selection = this.resolveSelection(snapshot.index, spec);
    const nodeId = selection.mostSpecificNodeId();
    const text = normalize(spec.text ?? "");

    if (!text && nodeId === null) {
      throw new InvalidQueryError();
    }

    const candidates =
      nodeId === null ? snapshot.terms : this.candidatesUnder(snapshot, nodeId);
    const limit = this.config.displayLimit;

    // Filter-only: every candidate, vocabulary order, unscored
    if (!text) {
      const ids = candidates.map((t) => t.id);
      return {
        ids,
        count: ids.length,
        matches: [],
        truncated: ids.length > limit,
        threshold: null,
        filtersApplied: selection.selectedIds(),
      };
    }

    const threshold = clampThreshold(spec.threshold, this.config.defaultThreshold);
    const ranked = rankSharded(
      text,
      candidates,
      threshold,
      this.config.shardSize,
      this.scorer,
    );

    const matches: MatchResult[] = ranked.slice(0, limit).map((m) => ({
      termId: m.termId,
      code: m.code,
      name: m.name,
      score: m.score,
    }));

    return {
      ids: ranked.map((m) => m.termId),
      count: ranked.length,
      matches,
      truncated: ranked.length > limit,
      threshold,
      filtersApplied: selection.selectedIds(),
    };
  }

  /**
   * Options for one level of a cascading picker. Macro takes no parent;
   * group needs a macro id; site needs a group id.
   */
  filterOptions(level: FilterLevel, parentId?: string): FilterNode[] {
    const index = this.store.current().index;
    const empty = FilterSelection.empty(index);

    switch (level) {
      case "macro":
        if (parentId) {
          throw new InvalidFilterSelectionError("Macrogrouping options take no parent");
        }
        return empty.options("macro");
      case "group":
        return empty.selectMacro(parentId ?? "").options("group");
      case "site": {
        const group = parentId ? index.getNode(parentId) : undefined;
        if (!group || group.level !== "group" || group.parentId === null) {
          throw new InvalidFilterSelectionError(
            `Site options need a Group id, got "${parentId ?? ""}"`,
          );
        }
        return empty.selectMacro(group.parentId).selectGroup(group.id).options("site");
      }
    }
  }

  /** Start a cascading selection against the current catalog. */
  newSelection(): FilterSelection {
    return FilterSelection.empty(this.store.current().index);
  }

  getTerm(id: string): Term | null {
    return this.store.current().termsById.get(id) ?? null;
  }

  stats(): CatalogStats {
    return snapshotStats(this.store.current());
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  /** Replay the query's filters through the selection state machine. */
  private resolveSelection(index: TopographyIndex, spec: QuerySpec): FilterSelection {
    let selection = FilterSelection.empty(index);
    if (spec.macroId) selection = selection.selectMacro(spec.macroId);
    if (spec.groupId) selection = selection.selectGroup(spec.groupId);
    if (spec.siteId) selection = selection.selectSite(spec.siteId);
    return selection;
  }

  private candidatesUnder(snapshot: CatalogSnapshot, nodeId: string): Term[] {
    const ids = snapshot.index.descendantTermIds(nodeId);
    if (ids.size === 0) return [];
    return snapshot.terms.filter((t) => ids.has(t.id));
  }
}
