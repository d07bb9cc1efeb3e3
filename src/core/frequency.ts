import type { Digram, Trigram } from "./types.js";

/** Read-only view of the corpus digram and trigram counts. */
export interface FrequencyTable {
  digramCount(d: Digram): number;
  trigramCount(t: Trigram): number;
  /** Total digram occurrences recorded. */
  readonly digramTotal: number;
  /** Total trigram occurrences recorded. */
  readonly trigramTotal: number;
}

/**
 * Accumulates counts from every word of the corpus.
 *
 * `freeze()` ends accumulation; scoring must only ever see a frozen table.
 */
export interface FrequencyModel extends FrequencyTable {
  add(text: string): void;
  freeze(): FrequencyTable;
  readonly frozen: boolean;
}
