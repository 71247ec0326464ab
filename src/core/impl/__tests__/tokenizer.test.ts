import { describe, expect, it } from "vitest";
import { SimpleTokenizer } from "../simpleTokenizer.js";

const terms = (text: string) => Array.from(new SimpleTokenizer().tokenize(text), (t) => t.term);

describe("SimpleTokenizer", () => {
  it("lowercases and splits on punctuation and whitespace", () => {
    expect(terms("Hi there!")).toEqual(["hi", "there"]);
    expect(terms("Re: Q3-report, v2.0")).toEqual(["re", "q3", "report", "v2", "0"]);
  });

  it("keeps repeated tokens in order", () => {
    expect(terms("hi Hi HI")).toEqual(["hi", "hi", "hi"]);
  });

  it("treats non-ASCII characters as separators", () => {
    expect(terms("café naïve")).toEqual(["caf", "na", "ve"]);
    expect(terms("İstanbul")).toEqual(["stanbul"]);
  });

  it("yields nothing for empty or separator-only text", () => {
    expect(terms("")).toEqual([]);
    expect(terms(" ;,.- ")).toEqual([]);
  });

  it("reports positions and offsets", () => {
    const toks = Array.from(new SimpleTokenizer().tokenize("  ab, cd"));
    expect(toks).toEqual([
      { term: "ab", position: 0, startOffset: 2, endOffset: 4 },
      { term: "cd", position: 1, startOffset: 6, endOffset: 8 },
    ]);
  });

  it("normalizes a query word without splitting it", () => {
    const t = new SimpleTokenizer();
    expect(t.normalize("HeLLo")).toBe("hello");
    expect(t.normalize("Hi there")).toBe("hi there");
    expect(t.normalize("ÉCOLE")).toBe("École");
  });
});
