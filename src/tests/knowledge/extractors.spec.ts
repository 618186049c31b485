import { describe, expect, it } from "vitest";
import { WordLengthExtractor } from "../../knowledge/extractors";

describe("WordLengthExtractor", () => {
  it("keeps whitespace tokens longer than three characters verbatim", () => {
    const extractor = new WordLengthExtractor();
    expect(extractor.extract("  the Data   Science of AI \n today ")).toEqual(["Data", "Science", "today"]);
  });

  it("accepts a different length threshold", () => {
    const extractor = new WordLengthExtractor({ minExclusiveLength: 5 });
    expect(extractor.extract("Learn Machine Learning fast")).toEqual(["Machine", "Learning"]);
  });

  it("returns nothing for blank text", () => {
    expect(new WordLengthExtractor().extract("   ")).toEqual([]);
  });
});
