import type { KnownWords } from "../knownWords.js";

/** Set-backed stoplist, filled from whitespace-delimited word lists. */
export class MemoryKnownWords implements KnownWords {
  private readonly words: Set<string>;

  constructor(words: Iterable<string> = []) {
    this.words = new Set(words);
  }

  static fromText(text: string): MemoryKnownWords {
    const known = new MemoryKnownWords();
    known.addText(text);
    return known;
  }

  /** Adds every whitespace-delimited word of `text`; returns how many were read. */
  addText(text: string): number {
    let n = 0;
    for (const w of text.split(/\p{White_Space}+/u)) {
      if (!w) continue;
      this.words.add(w);
      n++;
    }
    return n;
  }

  has(text: string, lower: string = text.toLowerCase()): boolean {
    return this.words.has(text) || this.words.has(lower);
  }

  get size(): number {
    return this.words.size;
  }
}
