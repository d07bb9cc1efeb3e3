export {
  LineTokenizer,
  decodeUtf8,
  splitLines,
  leadingHtmlLength,
  trailingHtmlLength,
  type DecodedText,
} from "./lineTokenizer.js";
export { MemoryKnownWords } from "./memoryKnownWords.js";
export { NgramFrequencyModel, digramsOf, trigramsOf } from "./ngramFrequencyModel.js";
export { TrigramScorer } from "./trigramScorer.js";
export { TypoRanker } from "./typoRanker.js";
export { findRepeats } from "./repeatDetector.js";
export { TypoChecker, createTypoChecker, checkText, type CheckerDeps } from "./typoChecker.js";
