import { describe, it, expect } from "vitest";
import { levenshtein, editSimilarity } from "../src/data-sources/edit-distance.js";

describe("levenshtein", () => {
  it("returns 0 for identical strings", () => {
    expect(levenshtein("sarcoma", "sarcoma")).toBe(0);
  });

  it("returns the other length when one side is empty", () => {
    expect(levenshtein("", "abc")).toBe(3);
    expect(levenshtein("abc", "")).toBe(3);
  });

  it('scores "kitten"/"sitting" = 3', () => {
    expect(levenshtein("kitten", "sitting")).toBe(3);
  });

  it('scores "flaw"/"lawn" = 2', () => {
    expect(levenshtein("flaw", "lawn")).toBe(2);
  });

  it("counts a single substitution typo as 1", () => {
    expect(levenshtein("differenciated", "differentiated")).toBe(1);
  });

  it("is symmetric", () => {
    expect(levenshtein("liposarcoma", "leiomyosarcoma")).toBe(
      levenshtein("leiomyosarcoma", "liposarcoma"),
    );
  });
});

describe("editSimilarity", () => {
  it("returns 1.0 for two empty strings", () => {
    expect(editSimilarity("", "")).toBe(1.0);
  });

  it("returns 0.0 against an empty string", () => {
    expect(editSimilarity("abc", "")).toBe(0.0);
  });

  it("divides distance by the longer length", () => {
    expect(editSimilarity("abcd", "abce")).toBe(0.75);
  });

  it("returns 0.0 for completely different strings of equal length", () => {
    expect(editSimilarity("abc", "xyz")).toBe(0.0);
  });
});
