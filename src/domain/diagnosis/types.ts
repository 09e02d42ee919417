// ============================================================================
// Diagnosis Catalog Types
// ============================================================================

/**
 * One vocabulary entry mapping a diagnosis name to its standardized code.
 * Immutable after load.
 */
export interface Term {
  id: string;
  rawName: string;
  normalizedName: string; // normalize(rawName), computed once at load
  code: string;
  topographyCode: string; // ICD-O-3 topography code as ingested ("" when absent)
  siteId: string | null; // Resolved Site node, null when unresolved
}

export type FilterLevel = "macro" | "group" | "site";

/**
 * Node of the Macrogrouping → Group → Site hierarchy.
 * Ids are deterministic paths: "CNS", "CNS::Brain", "CNS::Brain::Cerebrum".
 */
export interface FilterNode {
  id: string;
  level: FilterLevel;
  name: string;
  parentId: string | null; // null only for macro nodes
}

/**
 * Validated vocabulary row, as produced by ingestion.
 */
export interface VocabularyRow {
  id: string;
  name: string;
  code: string;
  topographyCode: string;
}

/**
 * Validated topography row: one Site with the ICD-O-3 codes it covers.
 */
export interface TopographyRow {
  macroName: string;
  groupName: string;
  siteName: string;
  codes: string; // e.g. "C49.1", "C34.1-34.9", "C53-C54-C55"
}

// ============================================================================
// Query Types
// ============================================================================

export interface MatchResult {
  termId: string;
  code: string;
  name: string;
  score: number; // integer 0-100
}

/**
 * All fields optional. Omitted filter fields are not applied; an omitted
 * threshold falls back to the configured default.
 */
export interface QuerySpec {
  text?: string;
  macroId?: string;
  groupId?: string;
  siteId?: string;
  threshold?: number;
}

export interface QueryResult {
  ids: string[]; // Every matching term id, in result order (never truncated)
  count: number; // ids.length
  matches: MatchResult[]; // Ranked rows, capped at the display limit; empty without text
  truncated: boolean; // count exceeds the display limit
  threshold: number | null; // Clamped threshold used, null for filter-only queries
  filtersApplied: string[]; // Active filter node ids, most general first
}

// ============================================================================
// Load Reporting
// ============================================================================

export interface LoadReport {
  vocabularyRows: number; // Rows accepted into the Term set
  topographyRows: number; // Rows accepted into the hierarchy
  skippedVocabularyRows: number;
  skippedTopographyRows: number;
  unresolvedTerms: number; // Terms left with siteId = null
  loadedAt: string; // ISO timestamp
}

export interface CatalogStats {
  terms: number;
  macros: number;
  groups: number;
  sites: number;
  report: LoadReport;
}
