import type { FrequencyTable } from "./frequency.js";
import type { Trigram } from "./types.js";

/**
 * Assigns a peculiarity score to a word given frozen corpus statistics.
 * Higher means more typo-like; 0 means no signal.
 */
export interface Scorer {
  score(text: string, table: FrequencyTable): number;
  trigramIndex(t: Trigram, table: FrequencyTable): number;
}
