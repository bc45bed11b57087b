import { describe, expect, it } from "vitest";
import { countCorpusTokens, rankCorpusCounts } from "../corpusCounts";

async function* lines(...values: string[]): AsyncGenerator<string> {
  for (const v of values) yield v;
}

describe("countCorpusTokens", () => {
  it("counts whitespace tokens across lines", async () => {
    const c = await countCorpusTokens(["a a", "b a", ""]);
    expect(c.toMap()).toEqual(new Map([["a", 3], ["b", 1]]));
    expect(c.total).toBe(4);
  });

  it("accepts async line sources", async () => {
    const c = await countCorpusTokens(lines("x y", "y"));
    expect(c.get("y")).toBe(2);
  });
});

describe("rankCorpusCounts", () => {
  const abCorpus = new Map([
    ["a", 2],
    ["b", 1],
  ]);

  it("ranks tokens only when no n-grams are requested", () => {
    expect(rankCorpusCounts(abCorpus, { tokenMin: 1 })).toEqual({
      tokens: [
        { text: "a", count: 2 },
        { text: "b", count: 1 },
      ],
      ngrams: null,
    });
  });

  it("always applies tokenMin in token-only mode", () => {
    expect(rankCorpusCounts(abCorpus, { tokenMin: 2, filterFirst: false }).tokens).toEqual([
      { text: "a", count: 2 },
    ]);
  });

  it("expands a bracketed single token", () => {
    const res = rankCorpusCounts(new Map([["ab", 1]]), {
      tokenMin: 1,
      ngramMin: 1,
      ngrams: { minN: 1, maxN: 2, bracket: true },
    });
    expect(res.tokens).toEqual([{ text: "ab", count: 1 }]);
    expect(res.ngrams?.map((r) => r.text)).toEqual(["<", "<a", ">", "a", "ab", "b", "b>"]);
    expect(res.ngrams?.every((r) => r.count === 1)).toBe(true);
  });

  it("lists and expands every token when not filtering first", () => {
    const res = rankCorpusCounts(abCorpus, {
      tokenMin: 2,
      ngrams: { minN: 1, maxN: 1 },
    });
    expect(res.tokens).toEqual([
      { text: "a", count: 2 },
      { text: "b", count: 1 },
    ]);
    expect(res.ngrams).toEqual([
      { text: "<", count: 3 },
      { text: ">", count: 3 },
      { text: "a", count: 2 },
      { text: "b", count: 1 },
    ]);
  });

  it("drops rare tokens from both lists when filtering first", () => {
    const res = rankCorpusCounts(abCorpus, {
      tokenMin: 2,
      filterFirst: true,
      ngrams: { minN: 1, maxN: 1 },
    });
    expect(res.tokens).toEqual([{ text: "a", count: 2 }]);
    expect(res.ngrams).toEqual([
      { text: "<", count: 2 },
      { text: ">", count: 2 },
      { text: "a", count: 2 },
    ]);
  });

  it("applies ngramMin to the n-gram list", () => {
    const res = rankCorpusCounts(abCorpus, {
      ngramMin: 3,
      ngrams: { minN: 1, maxN: 1 },
    });
    expect(res.ngrams).toEqual([
      { text: "<", count: 3 },
      { text: ">", count: 3 },
    ]);
  });
});
