import type { Tokenizer } from "../tokenizer.js";
import type { KnownWords } from "../knownWords.js";
import type { FrequencyModel } from "../frequency.js";
import type { Scorer } from "../scorer.js";
import type { Ranker } from "../ranker.js";
import { createWord, type TextSource, type TypoReport, type Word } from "../types.js";
import { DEFAULT_OPTIONS, type TypoCheckOptions } from "../../config.js";
import { LineTokenizer } from "./lineTokenizer.js";
import { MemoryKnownWords } from "./memoryKnownWords.js";
import { NgramFrequencyModel } from "./ngramFrequencyModel.js";
import { TrigramScorer } from "./trigramScorer.js";
import { TypoRanker } from "./typoRanker.js";
import { findRepeats } from "./repeatDetector.js";

export interface CheckerDeps {
  tokenizer: Tokenizer;
  scorer: Scorer;
  ranker: Ranker;
  /** Called once per check; every check counts the corpus from scratch. */
  createModel: () => FrequencyModel;
}

/**
 * Batch typo check over a corpus. Phases run strictly in order:
 * tokenize every source, count n-grams over every word, score against the
 * frozen counts, then dedup and rank.
 */
export class TypoChecker {
  private readonly words: Word[] = [];

  constructor(private readonly deps: CheckerDeps) {}

  /** Tokenizes one source and appends its words; returns how many were added. */
  addSource(source: TextSource, options?: Partial<Pick<TypoCheckOptions, "filterHtml">>): number {
    const before = this.words.length;
    for (const tok of this.deps.tokenizer.tokenize(source.text, { filterHtml: options?.filterHtml })) {
      this.words.push(createWord(tok, source.name));
    }
    return this.words.length - before;
  }

  get wordCount(): number {
    return this.words.length;
  }

  check(known: KnownWords, options?: Partial<Omit<TypoCheckOptions, "filterHtml">>): TypoReport {
    const suppressRepeats = options?.suppressRepeats ?? DEFAULT_OPTIONS.suppressRepeats;
    const maxResults = options?.maxResults ?? DEFAULT_OPTIONS.maxResults;
    const threshold = options?.threshold ?? DEFAULT_OPTIONS.threshold;

    // the corpus order is kept for repeat detection and later checks
    const words = [...this.words];

    const repeats = suppressRepeats ? [] : findRepeats(words);

    const model = this.deps.createModel();
    for (const w of words) model.add(w.text);
    const table = model.freeze();

    for (const w of words) {
      w.score = known.has(w.text, w.lower) ? 0 : this.deps.scorer.score(w.text, table);
    }

    const unique = this.deps.ranker.dedup(words, known);
    const typos = this.deps.ranker.rank(unique, { maxResults, threshold });
    return { repeats, typos, candidates: unique.length };
  }
}

export function createTypoChecker(): TypoChecker {
  return new TypoChecker({
    tokenizer: new LineTokenizer(),
    scorer: new TrigramScorer(),
    ranker: new TypoRanker(),
    createModel: () => new NgramFrequencyModel(),
  });
}

/** One-shot check of in-memory sources with the default components. */
export function checkText(
  sources: TextSource[],
  known: KnownWords = new MemoryKnownWords(),
  options: Partial<TypoCheckOptions> = {},
): TypoReport {
  const checker = createTypoChecker();
  for (const s of sources) checker.addSource(s, { filterHtml: options.filterHtml });
  return checker.check(known, options);
}
