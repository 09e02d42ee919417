import type { SearchConfig } from "../src/core/config.js";
import {
  CatalogStore,
  buildCatalogSnapshot,
  type CatalogSnapshot,
} from "../src/data-sources/catalog-store.js";
import { DiagnosisSearchPipeline } from "../src/domain/diagnosis/search-pipeline.js";
import { normalize } from "../src/domain/diagnosis/normalizer.js";
import type { Scorer } from "../src/domain/diagnosis/fuzzy-matcher.js";
import type {
  Term,
  TopographyRow,
  VocabularyRow,
} from "../src/domain/diagnosis/types.js";

/**
 * Two macrogroupings, four groups, six sites.
 */
export const TOPOGRAPHY_ROWS: TopographyRow[] = [
  { macroName: "Soft tissue", groupName: "Trunk and extremities", siteName: "Upper limb", codes: "C49.1" },
  { macroName: "Soft tissue", groupName: "Trunk and extremities", siteName: "Lower limb", codes: "C49.2" },
  { macroName: "Soft tissue", groupName: "Retroperitoneum", siteName: "Retroperitoneum", codes: "C48.0" },
  { macroName: "CNS", groupName: "Brain", siteName: "Cerebrum", codes: "C71.0" },
  { macroName: "CNS", groupName: "Brain", siteName: "Cerebellum", codes: "C71.6" },
  { macroName: "CNS", groupName: "Spinal cord", siteName: "Spinal cord", codes: "C72.0" },
];

/**
 * Ids 1-4 sit under Soft tissue, 5-8 under CNS; 9 and 10 resolve to no site.
 */
export const VOCABULARY_ROWS: VocabularyRow[] = [
  { id: "1", name: "Well differentiated liposarcoma", code: "X1", topographyCode: "C49.1" },
  { id: "2", name: "Myxoid liposarcoma", code: "X2", topographyCode: "C49.2" },
  { id: "3", name: "Dedifferentiated liposarcoma", code: "X3", topographyCode: "C48.0" },
  { id: "4", name: "Leiomyosarcoma", code: "X4", topographyCode: "C48.0" },
  { id: "5", name: "Glioblastoma", code: "X5", topographyCode: "C71.0" },
  { id: "6", name: "Diffuse astrocytoma", code: "X6", topographyCode: "C71.0" },
  { id: "7", name: "Medulloblastoma", code: "X7", topographyCode: "C71.6" },
  { id: "8", name: "Ependymoma", code: "X8", topographyCode: "C72.0" },
  { id: "9", name: "Sarcoma NOS", code: "X9", topographyCode: "" },
  { id: "10", name: "Squamous cell carcinoma", code: "X10", topographyCode: "C02.1" },
];

export function makeSearchConfig(overrides?: Partial<SearchConfig>): SearchConfig {
  return {
    defaultThreshold: 80,
    displayLimit: 500,
    shardSize: 5000,
    ...overrides,
  };
}

export function makeSnapshot(
  vocabulary: VocabularyRow[] = VOCABULARY_ROWS,
  topography: TopographyRow[] = TOPOGRAPHY_ROWS,
): CatalogSnapshot {
  return buildCatalogSnapshot(
    {
      vocabulary,
      topography,
      skippedVocabularyRows: 0,
      skippedTopographyRows: 0,
    },
    new Date("2026-01-01T00:00:00.000Z"),
  );
}

export function makePipeline(
  config?: Partial<SearchConfig>,
  scorer?: Scorer,
): { store: CatalogStore; pipeline: DiagnosisSearchPipeline } {
  const store = new CatalogStore(makeSnapshot());
  return { store, pipeline: new DiagnosisSearchPipeline(store, makeSearchConfig(config), scorer) };
}

export function makeTerm(id: string, name: string, overrides?: Partial<Term>): Term {
  return {
    id,
    rawName: name,
    normalizedName: normalize(name),
    code: `CODE-${id}`,
    topographyCode: "",
    siteId: null,
    ...overrides,
  };
}

/** Scorer that gives every candidate the same score. */
export function constantScorer(value: number): Scorer {
  return { score: () => value };
}
