import type { KnownWords } from "../knownWords.js";
import type { RankOptions, Ranker } from "../ranker.js";
import { compareCodePoints, type Word } from "../types.js";

export class TypoRanker implements Ranker {
  /**
   * Sorts by text (stable, so the earliest location of a form wins) and keeps
   * one word per distinct text, dropping known words. Sorts `words` in place.
   */
  dedup(words: Word[], known: KnownWords): Word[] {
    words.sort((a, b) => compareCodePoints(a.text, b.text));

    const out: Word[] = [];
    let prev: string | undefined;
    for (const w of words) {
      if (w.text === prev) continue;
      if (known.has(w.text, w.lower)) continue;
      out.push(w);
      prev = w.text;
    }
    return out;
  }

  /** Sorts by score descending (in place) and cuts at `maxResults` or the first score under `threshold`. */
  rank(words: Word[], options: RankOptions): Word[] {
    words.sort((a, b) => b.score - a.score);

    const out: Word[] = [];
    for (const w of words) {
      if (out.length >= options.maxResults) break;
      if (w.score < options.threshold) break;
      out.push(w);
    }
    return out;
  }
}
