import type { KnownWords } from "./knownWords.js";
import type { Word } from "./types.js";

export interface RankOptions {
  /** Cap on returned words. */
  maxResults: number;
  /** Stop at the first word scoring below this. */
  threshold: number;
}

/**
 * Turns the scored corpus into the final list of flagged words.
 *
 * Two separate passes: dedup by text (dropping known words), then order by
 * score descending and cut by limit and threshold.
 */
export interface Ranker {
  dedup(words: Word[], known: KnownWords): Word[];
  rank(words: Word[], options: RankOptions): Word[];
}
