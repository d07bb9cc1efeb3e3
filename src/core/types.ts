/** Shared core types used by module contracts. */

/** A Unicode code point, or {@link BOUNDARY}. */
export type CodePoint = number;

/**
 * Reserved marker for the start or end of a word in digrams and trigrams.
 * Code points are never negative, so it cannot collide with a real character.
 */
export const BOUNDARY: CodePoint = -1;

export type Digram = readonly [CodePoint, CodePoint];
export type Trigram = readonly [CodePoint, CodePoint, CodePoint];

/** A candidate word produced by a tokenizer, before it is bound to a file. */
export interface Token {
  text: string;
  /** 1-based line number. */
  line: number;
  /** 1-based UTF-8 byte offset of the first retained byte within its line. */
  byteOffset: number;
}

/** Where a word was found. */
export interface SourceLocation {
  file: string;
  line: number;
  byteOffset: number;
}

/**
 * One token of the corpus. `score` stays 0 until the scorer sets it; known
 * words are never scored.
 */
export interface Word extends SourceLocation {
  readonly text: string;
  /** Lower-cased text, computed once. */
  readonly lower: string;
  score: number;
}

/** A named chunk of input text, typically one file or standard input. */
export interface TextSource {
  name: string;
  /** Decoded text, or the raw UTF-8 bytes as read. */
  text: string | Uint8Array;
}

export interface TypoReport {
  /** Second word of each case-insensitively repeated pair, in corpus order. */
  repeats: Word[];
  /** Flagged words, highest score first. */
  typos: Word[];
  /** Distinct unknown words that went into ranking. */
  candidates: number;
}

export function createWord(token: Token, file: string): Word {
  return {
    text: token.text,
    lower: token.text.toLowerCase(),
    file,
    line: token.line,
    byteOffset: token.byteOffset,
    score: 0,
  };
}

export function formatLocation(loc: SourceLocation): string {
  return `${loc.file}:${loc.line}:${loc.byteOffset}`;
}

/** `file:line:byte [score] text`; the bracketed score is omitted while it is 0. */
export function formatWord(word: Word): string {
  const loc = formatLocation(word);
  return word.score === 0 ? `${loc} ${word.text}` : `${loc} [${word.score}] ${word.text}`;
}

/** `file:line:byte text repeats`, whatever the word scored. */
export function formatRepeat(word: Word): string {
  return `${formatLocation(word)} ${word.text} repeats`;
}

/** Orders strings by code point, which is the byte order of their UTF-8 encoding. */
export function compareCodePoints(a: string, b: string): number {
  if (a === b) return 0;
  const ia = a[Symbol.iterator]();
  const ib = b[Symbol.iterator]();
  while (true) {
    const ca = ia.next();
    const cb = ib.next();
    if (ca.done) return cb.done ? 0 : -1;
    if (cb.done) return 1;
    const da = ca.value.codePointAt(0) ?? 0;
    const db = cb.value.codePointAt(0) ?? 0;
    if (da !== db) return da - db;
  }
}
