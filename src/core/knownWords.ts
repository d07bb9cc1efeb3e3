/**
 * Stoplist of words that are never scored or reported.
 * Lookup tries the exact text first, then the lower-cased form.
 */
export interface KnownWords {
  has(text: string, lower?: string): boolean;
  readonly size: number;
}
