export * from "./types.js";
export type { Tokenizer, TokenizeOptions } from "./tokenizer.js";
export type { KnownWords } from "./knownWords.js";
export type { FrequencyModel, FrequencyTable } from "./frequency.js";
export type { Scorer } from "./scorer.js";
export type { Ranker, RankOptions } from "./ranker.js";
export * from "./impl/index.js";
