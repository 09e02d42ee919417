export type SearchErrorCode = "INVALID_QUERY" | "INVALID_FILTER_SELECTION";

/**
 * Base class for request-level errors raised by the search engine.
 * These are caller mistakes: surfaced as-is, never retried.
 */
export class SearchError extends Error {
  readonly code: SearchErrorCode;

  constructor(code: SearchErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Neither query text nor a filter selection was supplied. */
export class InvalidQueryError extends SearchError {
  constructor(message = "A query needs search text, a topography filter, or both") {
    super("INVALID_QUERY", message);
  }
}

/** A filter node was selected without its ancestor, or does not fit the selection. */
export class InvalidFilterSelectionError extends SearchError {
  constructor(message: string) {
    super("INVALID_FILTER_SELECTION", message);
  }
}

export function isSearchError(error: unknown): error is SearchError {
  return error instanceof SearchError;
}
