import { describe, it, expect } from "vitest";
import {
  InvalidFilterSelectionError,
  InvalidQueryError,
  SearchError,
  isSearchError,
} from "../src/core/errors.js";

describe("search errors", () => {
  it("InvalidQueryError carries its code and a default message", () => {
    const err = new InvalidQueryError();
    expect(err).toBeInstanceOf(SearchError);
    expect(err).toBeInstanceOf(Error);
    expect(err.code).toBe("INVALID_QUERY");
    expect(err.name).toBe("InvalidQueryError");
    expect(err.message).toBe("A query needs search text, a topography filter, or both");
  });

  it("InvalidFilterSelectionError keeps the given message", () => {
    const err = new InvalidFilterSelectionError('Unknown macro "Bone"');
    expect(err.code).toBe("INVALID_FILTER_SELECTION");
    expect(err.name).toBe("InvalidFilterSelectionError");
    expect(err.message).toBe('Unknown macro "Bone"');
  });

  it("isSearchError tells engine errors from others", () => {
    expect(isSearchError(new InvalidQueryError())).toBe(true);
    expect(isSearchError(new Error("other"))).toBe(false);
    expect(isSearchError("string")).toBe(false);
  });
});
