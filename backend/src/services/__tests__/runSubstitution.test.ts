import { describe, expect, it } from "vitest";
import { TextContainer, TextRun } from "../documentModel.js";
import { countOccurrences, substitute, substituteAcrossRuns, substituteWithinRuns } from "../runSubstitution.js";

function container(...texts: string[]): TextContainer & { runs: TextRun[] } {
  return { runs: texts.map((text) => ({ text })) };
}

function texts(target: { runs: readonly TextRun[] }): string[] {
  return target.runs.map((run) => run.text);
}

describe("countOccurrences", () => {
  it("counts non-overlapping matches", () => {
    expect(countOccurrences("aaaa", "aa")).toBe(2);
    expect(countOccurrences("banana", "ana")).toBe(1);
  });

  it("returns 0 for an empty needle", () => {
    expect(countOccurrences("anything", "")).toBe(0);
  });
});

describe("substituteWithinRuns", () => {
  it("replaces inside each run and leaves boundaries alone", () => {
    const target = container("one cat", " and ", "another cat cat");
    expect(substituteWithinRuns(target, "cat", "dog")).toBe(3);
    expect(texts(target)).toEqual(["one dog", " and ", "another dog dog"]);
  });

  it("does not see matches that straddle runs", () => {
    const target = container("Te", "h");
    expect(substituteWithinRuns(target, "Teh", "The")).toBe(0);
    expect(texts(target)).toEqual(["Te", "h"]);
  });
});

describe("substituteAcrossRuns", () => {
  it("collapses the text into the first run", () => {
    const target = container("Teh ", "quick brown", " fox");
    expect(substituteAcrossRuns(target, "Teh quick", "The quick")).toBe(1);
    expect(texts(target)).toEqual(["The quick brown fox", "", ""]);
  });

  it("leaves the container alone when nothing matches", () => {
    const target = container("alpha", "beta");
    expect(substituteAcrossRuns(target, "gamma", "delta")).toBe(0);
    expect(texts(target)).toEqual(["alpha", "beta"]);
  });

  it("handles containers without runs", () => {
    expect(substituteAcrossRuns(container(), "x", "y")).toBe(0);
  });
});

describe("substitute", () => {
  it("uses the fast path when a run holds the match", () => {
    const target = container("Teh ", "quick brown", " fox");
    expect(substitute(target, "quick", "fast")).toBe(1);
    expect(texts(target)).toEqual(["Teh ", "fast brown", " fox"]);
  });

  it("fixes a word inside its own run without merging the others", () => {
    const target = container("Teh ", "quick brown", " fox");
    expect(substitute(target, "Teh", "The")).toBe(1);
    expect(texts(target)).toEqual(["The ", "quick brown", " fox"]);
  });

  it("falls back to the cross-run rewrite", () => {
    const target = container("Teh ", "quick brown", " fox");
    expect(substitute(target, "Teh quick", "The quick")).toBe(1);
    expect(texts(target)).toEqual(["The quick brown fox", "", ""]);
  });

  it("keeps cross-run matches for a later pass when the fast path replaced something", () => {
    const target = container("cat and c", "at");
    expect(substitute(target, "cat", "dog")).toBe(1);
    expect(texts(target)).toEqual(["dog and c", "at"]);
    expect(substitute(target, "cat", "dog")).toBe(1);
    expect(texts(target)).toEqual(["dog and dog", ""]);
  });

  it("returns 0 when the text is absent", () => {
    const target = container("nothing ", "here");
    expect(substitute(target, "missing", "found")).toBe(0);
    expect(texts(target)).toEqual(["nothing ", "here"]);
  });

  it("ignores an empty search", () => {
    const target = container("text");
    expect(substitute(target, "", "x")).toBe(0);
    expect(texts(target)).toEqual(["text"]);
  });

  it("counts replacements whose result still contains the search", () => {
    const target = container("a-b");
    expect(substitute(target, "a", "aa")).toBe(1);
    expect(texts(target)).toEqual(["aa-b"]);
  });
});
