import type { FrequencyModel, FrequencyTable } from "../frequency.js";
import { BOUNDARY, type CodePoint, type Digram, type Trigram } from "../types.js";
import { OddwordError } from "../../errors.js";

function codePoints(text: string): CodePoint[] {
  const out: CodePoint[] = [];
  for (const ch of text) out.push(ch.codePointAt(0) ?? 0);
  return out;
}

/** `[start,c0] [c0,c1] ... [cn-1,end]`: length + 1 digrams. */
export function digramsOf(text: string): Digram[] {
  const seq = [BOUNDARY, ...codePoints(text), BOUNDARY];
  const out: Digram[] = [];
  for (let i = 0; i + 1 < seq.length; i++) {
    out.push([seq[i] ?? BOUNDARY, seq[i + 1] ?? BOUNDARY]);
  }
  return out;
}

/**
 * `[start,start,c0] [start,c0,c1] ... [cn-2,cn-1,end]`: length + 1 trigrams.
 * For "a" that is `[start,start,a] [start,a,end]`.
 */
export function trigramsOf(text: string): Trigram[] {
  const seq = [BOUNDARY, BOUNDARY, ...codePoints(text), BOUNDARY];
  const out: Trigram[] = [];
  for (let i = 0; i + 2 < seq.length; i++) {
    out.push([seq[i] ?? BOUNDARY, seq[i + 1] ?? BOUNDARY, seq[i + 2] ?? BOUNDARY]);
  }
  return out;
}

function key(cps: readonly CodePoint[]): string {
  return cps.join(",");
}

/**
 * In-memory digram/trigram counter. Built in one pass over the corpus using
 * each word's original text, then frozen before scoring.
 */
export class NgramFrequencyModel implements FrequencyModel {
  private readonly digrams = new Map<string, number>();
  private readonly trigrams = new Map<string, number>();
  private digramSum = 0;
  private trigramSum = 0;
  private isFrozen = false;

  add(text: string): void {
    if (this.isFrozen) {
      throw new OddwordError("frequency table is frozen", "INTERNAL", { operation: "frequency.add" });
    }
    for (const d of digramsOf(text)) {
      const k = key(d);
      this.digrams.set(k, (this.digrams.get(k) ?? 0) + 1);
      this.digramSum++;
    }
    for (const t of trigramsOf(text)) {
      const k = key(t);
      this.trigrams.set(k, (this.trigrams.get(k) ?? 0) + 1);
      this.trigramSum++;
    }
  }

  freeze(): FrequencyTable {
    this.isFrozen = true;
    return this;
  }

  get frozen(): boolean {
    return this.isFrozen;
  }

  digramCount(d: Digram): number {
    return this.digrams.get(key(d)) ?? 0;
  }

  trigramCount(t: Trigram): number {
    return this.trigrams.get(key(t)) ?? 0;
  }

  get digramTotal(): number {
    return this.digramSum;
  }

  get trigramTotal(): number {
    return this.trigramSum;
  }
}
