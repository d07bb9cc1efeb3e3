import type { Token } from "./types.js";

export interface TokenizeOptions {
  /** If true, strip `<...>` tags glued to either end of a token. */
  filterHtml?: boolean;
}

/**
 * Turns text into candidate words.
 *
 * Contract notes:
 * - splits on whitespace, trims leading/trailing punctuation
 * - drops tokens with no letter
 * - byte offsets point at the first retained byte within the original line;
 *   raw UTF-8 input is measured as given, invalid bytes included
 */
export interface Tokenizer {
  tokenize(text: string | Uint8Array, options?: TokenizeOptions): Iterable<Token>;
}
