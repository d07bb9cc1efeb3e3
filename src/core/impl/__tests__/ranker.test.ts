import { describe, expect, it } from "vitest";
import { createWord, formatRepeat, formatWord, type Word } from "../../types.js";
import { MemoryKnownWords, TypoRanker, findRepeats } from "../index.js";

function word(text: string, line: number, score = 0): Word {
  const w = createWord({ text, line, byteOffset: 1 }, "f");
  w.score = score;
  return w;
}

const locations = (ws: Word[]) => ws.map((w) => `${w.text}@${w.line}`);

describe("TypoRanker.dedup", () => {
  const ranker = new TypoRanker();

  it("keeps the first occurrence of each text, in code point order", () => {
    const words = [word("beta", 1), word("alpha", 2), word("beta", 3), word("Beta", 4), word("alpha", 5)];
    expect(locations(ranker.dedup(words, new MemoryKnownWords()))).toEqual(["Beta@4", "alpha@2", "beta@1"]);
  });

  it("drops known words by exact or lower-cased text", () => {
    const words = [word("The", 1), word("cat", 2), word("sat", 3)];
    expect(locations(ranker.dedup(words, new MemoryKnownWords(["the", "sat"])))).toEqual(["cat@2"]);
  });

  it("orders astral characters after the rest of the BMP", () => {
    const words = [word("𝒜x", 1), word("ﬀx", 2)];
    expect(locations(ranker.dedup(words, new MemoryKnownWords()))).toEqual(["ﬀx@2", "𝒜x@1"]);
  });
});

describe("TypoRanker.rank", () => {
  const ranker = new TypoRanker();
  const scored = () => [word("low", 1, 4), word("top", 2, 40), word("mid", 3, 12), word("high", 4, 30)];

  it("orders by score descending", () => {
    expect(locations(ranker.rank(scored(), { maxResults: 50, threshold: 0 }))).toEqual([
      "top@2",
      "high@4",
      "mid@3",
      "low@1",
    ]);
  });

  it("stops at the limit", () => {
    const out = ranker.rank(scored(), { maxResults: 2, threshold: 5 });
    expect(locations(out)).toEqual(["top@2", "high@4"]);
  });

  it("stops at the first score under the threshold", () => {
    const out = ranker.rank(scored(), { maxResults: 10, threshold: 13 });
    expect(locations(out)).toEqual(["top@2", "high@4"]);
    expect(ranker.rank(scored(), { maxResults: 10, threshold: 41 })).toEqual([]);
  });

  it("returns nothing for a zero limit", () => {
    expect(ranker.rank(scored(), { maxResults: 0, threshold: 0 })).toEqual([]);
  });
});

describe("findRepeats", () => {
  it("reports the second of two adjacent equal words", () => {
    const words = [word("the", 1), word("the", 1), word("dog", 1)];
    expect(findRepeats(words)).toEqual([words[1]]);
  });

  it("ignores case", () => {
    const words = [word("The", 1), word("the", 1), word("dog", 1)];
    expect(findRepeats(words)).toEqual([words[1]]);
  });

  it("needs the words to be adjacent", () => {
    expect(findRepeats([word("a", 1), word("b", 1), word("a", 1)])).toEqual([]);
  });

  it("reports each extra word of a run", () => {
    expect(findRepeats([word("go", 1), word("go", 2), word("GO", 3)]).map((w) => w.line)).toEqual([2, 3]);
  });
});

describe("formatWord", () => {
  it("omits the score while it is 0", () => {
    expect(formatWord(createWord({ text: "cat", line: 3, byteOffset: 7 }, "a.txt"))).toBe("a.txt:3:7 cat");
  });

  it("brackets a nonzero score", () => {
    expect(formatWord(word("cat", 2, 17))).toBe("f:2:1 [17] cat");
  });

  it("formats a repeat without its score", () => {
    expect(formatRepeat(word("cat", 2, 17))).toBe("f:2:1 cat repeats");
  });
});

describe("MemoryKnownWords", () => {
  it("reads whitespace-delimited words", () => {
    const known = MemoryKnownWords.fromText("The  quick\nbrown\tfox\n");
    expect(known.size).toBe(4);
    expect(known.has("quick")).toBe(true);
    expect(known.has("Quick")).toBe(true);
    expect(known.has("The")).toBe(true);
    expect(known.has("the")).toBe(false);
  });
});
