import type { Word } from "../types.js";

/** Returns the second word of every adjacent pair equal under lower-casing, in corpus order. */
export function findRepeats(words: Iterable<Word>): Word[] {
  const out: Word[] = [];
  let prev = "";
  for (const w of words) {
    if (w.lower === prev) out.push(w);
    prev = w.lower;
  }
  return out;
}
