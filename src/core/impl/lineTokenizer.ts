import type { Token } from "../types.js";
import type { TokenizeOptions, Tokenizer } from "../tokenizer.js";

const SPACE = /^\p{White_Space}$/u;
const PUNCT = /^\p{P}$/u;
const LETTER = /^\p{L}$/u;

const REPLACEMENT = 0xfffd;

/** Characters of a text with the number of UTF-8 bytes each one took in the input. */
export interface DecodedText {
  chars: string[];
  widths: number[];
}

function utf8Length(ch: string): number {
  const cp = ch.codePointAt(0) ?? 0;
  if (cp < 0x80) return 1;
  if (cp < 0x800) return 2;
  if (cp < 0x10000) return 3;
  return 4;
}

function sum(widths: readonly number[]): number {
  let n = 0;
  for (const w of widths) n += w;
  return n;
}

function decodeRune(bytes: Uint8Array, i: number): [number, number] {
  const b0 = bytes[i] ?? 0;
  if (b0 < 0x80) return [b0, 1];

  let n: number;
  let cp: number;
  let lo = 0x80;
  let hi = 0xbf;
  if (b0 >= 0xc2 && b0 <= 0xdf) {
    n = 2;
    cp = b0 & 0x1f;
  } else if (b0 >= 0xe0 && b0 <= 0xef) {
    n = 3;
    cp = b0 & 0x0f;
    if (b0 === 0xe0) lo = 0xa0;
    if (b0 === 0xed) hi = 0x9f;
  } else if (b0 >= 0xf0 && b0 <= 0xf4) {
    n = 4;
    cp = b0 & 0x07;
    if (b0 === 0xf0) lo = 0x90;
    if (b0 === 0xf4) hi = 0x8f;
  } else {
    return [REPLACEMENT, 1];
  }

  for (let k = 1; k < n; k++) {
    const c = bytes[i + k];
    if (c === undefined || c < lo || c > hi) return [REPLACEMENT, 1];
    cp = (cp << 6) | (c & 0x3f);
    lo = 0x80;
    hi = 0xbf;
  }
  return [cp, n];
}

/**
 * Decodes UTF-8 keeping each character's byte width. An invalid or
 * truncated sequence yields U+FFFD one byte at a time.
 */
export function decodeUtf8(bytes: Uint8Array): DecodedText {
  const chars: string[] = [];
  const widths: number[] = [];
  let i = 0;
  while (i < bytes.length) {
    const [cp, width] = decodeRune(bytes, i);
    chars.push(String.fromCodePoint(cp));
    widths.push(width);
    i += width;
  }
  return { chars, widths };
}

function fromString(text: string): DecodedText {
  const chars = Array.from(text);
  return { chars, widths: chars.map(utf8Length) };
}

/** Splits into lines the way a line scanner does: on "\n", dropping a trailing "\r". */
export function splitLines(text: DecodedText): DecodedText[] {
  const lines: DecodedText[] = [];
  let start = 0;
  const push = (end: number) => {
    const stop = end > start && text.chars[end - 1] === "\r" ? end - 1 : end;
    lines.push({ chars: text.chars.slice(start, stop), widths: text.widths.slice(start, stop) });
  };
  text.chars.forEach((ch, i) => {
    if (ch !== "\n") return;
    push(i);
    start = i + 1;
  });
  if (start < text.chars.length) push(text.chars.length);
  return lines;
}

/** Number of chars taken by the complete tags at the start of `chars`. */
export function leadingHtmlLength(chars: readonly string[]): number {
  let n = 0;
  while (chars[n] === "<") {
    const close = chars.indexOf(">", n);
    if (close < 0) break;
    n = close + 1;
  }
  return n;
}

/** Number of chars taken by the complete tags at the end of `chars`. */
export function trailingHtmlLength(chars: readonly string[]): number {
  let end = chars.length;
  while (end > 0 && chars[end - 1] === ">") {
    const open = chars.lastIndexOf("<", end - 1);
    if (open < 0) break;
    end = open;
  }
  return chars.length - end;
}

interface Span extends DecodedText {
  byteOffset: number;
}

function slice(span: Span, start: number, end: number): Span {
  return {
    chars: span.chars.slice(start, end),
    widths: span.widths.slice(start, end),
    byteOffset: span.byteOffset + sum(span.widths.slice(0, start)),
  };
}

function trimPunct(span: Span): Span {
  let start = 0;
  let end = span.chars.length;
  while (start < end && PUNCT.test(span.chars[start] ?? "")) start++;
  while (end > start && PUNCT.test(span.chars[end - 1] ?? "")) end--;
  return slice(span, start, end);
}

function stripHtml(span: Span): Span {
  const rest = slice(span, leadingHtmlLength(span.chars), span.chars.length);
  return slice(rest, 0, rest.chars.length - trailingHtmlLength(rest.chars));
}

function finish(raw: Span, filterHtml: boolean): Span | undefined {
  let span = trimPunct(raw);
  if (filterHtml) {
    span = stripHtml(span);
    if (span.chars.length === 0) return undefined;
    span = trimPunct(span);
  }
  return span.chars.some((ch) => LETTER.test(ch)) ? span : undefined;
}

/**
 * Whitespace tokenizer working line by line:
 * - trims Unicode punctuation from both ends
 * - optionally strips glued HTML tags, then trims punctuation again
 * - keeps only tokens that contain a letter
 * - yields 1-based line numbers and byte offsets into the raw input
 */
export class LineTokenizer implements Tokenizer {
  *tokenize(text: string | Uint8Array, options?: TokenizeOptions): Iterable<Token> {
    const filterHtml = options?.filterHtml ?? false;
    const lines = splitLines(typeof text === "string" ? fromString(text) : decodeUtf8(text));

    for (const [i, { chars, widths }] of lines.entries()) {
      const line = i + 1;
      let start = -1;
      let startByte = 0;
      let byte = 0;

      const emit = (end: number): Token | undefined => {
        const span: Span = {
          chars: chars.slice(start, end),
          widths: widths.slice(start, end),
          byteOffset: startByte + 1,
        };
        const word = finish(span, filterHtml);
        return word && { text: word.chars.join(""), line, byteOffset: word.byteOffset };
      };

      for (const [j, ch] of chars.entries()) {
        const space = SPACE.test(ch);
        if (start >= 0 && space) {
          const tok = emit(j);
          if (tok) yield tok;
          start = -1;
        } else if (start < 0 && !space) {
          start = j;
          startByte = byte;
        }
        byte += widths[j] ?? 1;
      }

      if (start >= 0) {
        const tok = emit(chars.length);
        if (tok) yield tok;
      }
    }
  }
}
