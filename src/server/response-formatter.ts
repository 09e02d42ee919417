import type { SearchDiagnosesData } from "../domain/diagnosis/tools.js";
import type { MatchResult } from "../domain/diagnosis/types.js";

/**
 * Compact search output: the id list travels once, as ids_csv.
 */
export interface CompactSearchResult {
  count: number;
  truncated: boolean;
  threshold: number | null;
  filters_applied: string[];
  ids_csv: string;
  matches: MatchResult[];
}

export function compactSearchResult(data: SearchDiagnosesData): CompactSearchResult {
  return {
    count: data.count,
    truncated: data.truncated,
    threshold: data.threshold,
    filters_applied: data.filtersApplied,
    ids_csv: data.ids_csv,
    matches: data.matches,
  };
}
