import { describe, expect, it } from "vitest";
import { BOUNDARY } from "../../types.js";
import { NgramFrequencyModel, digramsOf, trigramsOf } from "../index.js";
import { OddwordError } from "../../../errors.js";

const o = 0x6f;
const n = 0x6e;
const c = 0x63;
const e = 0x65;

describe("n-gram sequences", () => {
  it("wraps a word in boundary markers", () => {
    expect(digramsOf("once")).toEqual([
      [BOUNDARY, o],
      [o, n],
      [n, c],
      [c, e],
      [e, BOUNDARY],
    ]);
    expect(trigramsOf("once")).toEqual([
      [BOUNDARY, BOUNDARY, o],
      [BOUNDARY, o, n],
      [o, n, c],
      [n, c, e],
      [c, e, BOUNDARY],
    ]);
  });

  it("gives a one-letter word two of each", () => {
    expect(digramsOf("a")).toEqual([
      [BOUNDARY, 0x61],
      [0x61, BOUNDARY],
    ]);
    expect(trigramsOf("a")).toEqual([
      [BOUNDARY, BOUNDARY, 0x61],
      [BOUNDARY, 0x61, BOUNDARY],
    ]);
  });

  it("walks code points, not UTF-16 units", () => {
    expect(trigramsOf("😀")).toEqual([
      [BOUNDARY, BOUNDARY, 0x1f600],
      [BOUNDARY, 0x1f600, BOUNDARY],
    ]);
  });
});

describe("NgramFrequencyModel", () => {
  it("adds length + 1 digrams and trigrams per word", () => {
    const model = new NgramFrequencyModel();
    for (const w of ["once", "a", "naïve"]) model.add(w);
    expect(model.digramTotal).toBe(5 + 2 + 6);
    expect(model.trigramTotal).toBe(5 + 2 + 6);
  });

  it("counts repeated n-grams across words", () => {
    const model = new NgramFrequencyModel();
    model.add("once");
    model.add("one");
    expect(model.digramCount([BOUNDARY, o])).toBe(2);
    expect(model.digramCount([o, n])).toBe(2);
    expect(model.trigramCount([BOUNDARY, o, n])).toBe(2);
    expect(model.trigramCount([o, n, c])).toBe(1);
    expect(model.trigramCount([n, e, BOUNDARY])).toBe(1);
    expect(model.digramCount([e, o])).toBe(0);
  });

  it("keeps case distinct", () => {
    const model = new NgramFrequencyModel();
    model.add("The");
    model.add("the");
    expect(model.digramCount([0x68, 0x65])).toBe(2);
    expect(model.digramCount([BOUNDARY, 0x74])).toBe(1);
  });

  it("rejects words after freezing", () => {
    const model = new NgramFrequencyModel();
    model.add("once");
    const table = model.freeze();
    expect(model.frozen).toBe(true);
    expect(table.trigramTotal).toBe(5);
    expect(() => model.add("twice")).toThrow(OddwordError);
  });
});
