import { logInfo, logWarn } from "../core/logging.js";
import { ID_SEPARATOR, TopographyIndex } from "./topography-index.js";
import type {
  CatalogStats,
  LoadReport,
  Term,
  TopographyRow,
  VocabularyRow,
} from "../domain/diagnosis/types.js";

/**
 * Everything a query reads: the Term set, the hierarchy and the report of
 * the load that produced them. Frozen once built.
 */
export interface CatalogSnapshot {
  readonly terms: readonly Term[];
  readonly termsById: ReadonlyMap<string, Term>;
  readonly index: TopographyIndex;
  readonly report: LoadReport;
}

export interface CatalogInput {
  vocabulary: readonly VocabularyRow[];
  topography: readonly TopographyRow[];
  skippedVocabularyRows: number;
  skippedTopographyRows: number;
}

/**
 * Build a complete snapshot from validated rows. Nothing is published until
 * the whole build has finished.
 */
export function buildCatalogSnapshot(
  input: CatalogInput,
  now: Date = new Date(),
): CatalogSnapshot {
  const { index, terms, unresolvedTerms, rejectedRows } = TopographyIndex.build(
    input.topography,
    input.vocabulary,
  );
  if (rejectedRows > 0) {
    logWarn(`Skipped ${rejectedRows} topography rows with "${ID_SEPARATOR}" in a name`);
  }

  const termsById = new Map<string, Term>();
  for (const term of terms) termsById.set(term.id, term);

  return Object.freeze({
    terms: Object.freeze(terms),
    termsById,
    index,
    report: Object.freeze({
      vocabularyRows: terms.length,
      topographyRows: input.topography.length,
      skippedVocabularyRows: input.skippedVocabularyRows,
      skippedTopographyRows: input.skippedTopographyRows + rejectedRows,
      unresolvedTerms,
      loadedAt: now.toISOString(),
    }),
  });
}

export function snapshotStats(snapshot: CatalogSnapshot): CatalogStats {
  return {
    terms: snapshot.terms.length,
    macros: snapshot.index.size("macro"),
    groups: snapshot.index.size("group"),
    sites: snapshot.index.size("site"),
    report: snapshot.report,
  };
}

/**
 * Holds the published snapshot. Reload builds a new snapshot off to the side
 * and swaps the reference; readers holding the old one keep a consistent view.
 */
export class CatalogStore {
  private snapshot: CatalogSnapshot | null = null;

  constructor(initial?: CatalogSnapshot) {
    this.snapshot = initial ?? null;
  }

  isReady(): boolean {
    return this.snapshot !== null;
  }

  current(): CatalogSnapshot {
    if (!this.snapshot) {
      throw new Error("Diagnosis catalog not loaded. Call reload_catalog or check server logs.");
    }
    return this.snapshot;
  }

  replace(next: CatalogSnapshot): void {
    const previous = this.snapshot;
    this.snapshot = next;
    logInfo(
      `Catalog snapshot published: ${next.terms.length} terms` +
        (previous ? ` (replaced ${previous.terms.length})` : ""),
    );
  }
}
