import type { FrequencyTable } from "../frequency.js";
import type { Scorer } from "../scorer.js";
import type { Trigram } from "../types.js";
import { trigramsOf } from "./ngramFrequencyModel.js";

/**
 * Peculiarity index after Morris & Cherry, "Computer detection of
 * typographical errors" (Bell Labs CSTR 18, 1974).
 *
 * Each count is reduced by one to take the word's own occurrence out of the
 * corpus statistics. For a trigram xyz:
 *
 *   i(xyz) = ½·(ln n(xy) + ln n(yz)) − ln n(xyz)
 *
 * A count that drops to zero or below carries no evidence and gives an index
 * of 0. The paper uses −10 for ln 0; squared, that swamps every other term.
 *
 * The word score is 10 / rms(indices), truncated. A word whose indices are
 * all 0 scores 0.
 */
export class TrigramScorer implements Scorer {
  trigramIndex(t: Trigram, table: FrequencyTable): number {
    const [x, y, z] = t;
    const nxy = table.digramCount([x, y]) - 1;
    const nyz = table.digramCount([y, z]) - 1;
    const nxyz = table.trigramCount(t) - 1;
    if (nxy <= 0 || nyz <= 0 || nxyz <= 0) return 0;
    return 0.5 * (Math.log(nxy) + Math.log(nyz)) - Math.log(nxyz);
  }

  score(text: string, table: FrequencyTable): number {
    const trigrams = trigramsOf(text);
    let sumOfSquares = 0;
    for (const t of trigrams) {
      const i = this.trigramIndex(t, table);
      sumOfSquares += i * i;
    }
    if (sumOfSquares === 0) return 0;
    return Math.trunc(10 / Math.sqrt(sumOfSquares / trigrams.length));
  }
}
