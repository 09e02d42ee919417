import { describe, it, expect } from "vitest";
import { normalize, tokenize } from "../src/domain/diagnosis/normalizer.js";

describe("normalize", () => {
  it("lower-cases and turns hyphens into spaces", () => {
    expect(normalize("Well-Differentiated  Liposarcoma")).toBe(
      "well differentiated liposarcoma",
    );
  });

  it("treats underscores and commas as separators", () => {
    expect(normalize("liposarcoma,well_differentiated")).toBe(
      "liposarcoma well differentiated",
    );
  });

  it("strips punctuation and trims", () => {
    expect(normalize("  Sarcoma (NOS)!  ")).toBe("sarcoma nos");
  });

  it("splits slash-joined names", () => {
    expect(normalize("Ewing/PNET")).toBe("ewing pnet");
  });

  it("keeps digits and accented letters", () => {
    expect(normalize("Grade 2 M\u00e9ningiome")).toBe("grade 2 m\u00e9ningiome");
  });

  it("collapses tabs and newlines", () => {
    expect(normalize("myxoid\t\nliposarcoma")).toBe("myxoid liposarcoma");
  });

  it("returns empty string for punctuation-only input", () => {
    expect(normalize("-- !! --")).toBe("");
  });

  it("is idempotent", () => {
    const once = normalize("Well-differentiated, Liposarcoma");
    expect(normalize(once)).toBe(once);
  });
});

describe("tokenize", () => {
  it("splits on single spaces", () => {
    expect(tokenize("myxoid liposarcoma")).toEqual(["myxoid", "liposarcoma"]);
  });

  it("returns no tokens for an empty string", () => {
    expect(tokenize("")).toEqual([]);
  });
});
