import { delimiter, join } from "node:path";
import { fileURLToPath } from "node:url";

export interface TypoCheckOptions {
  /** Cap on printed words. */
  maxResults: number;
  /** Minimum score to print; smaller means more words. */
  threshold: number;
  /** Don't report repeated words. */
  suppressRepeats: boolean;
  /** Strip HTML tags glued to words. */
  filterHtml: boolean;
}

export const DEFAULT_OPTIONS: Readonly<TypoCheckOptions> = Object.freeze({
  maxResults: 50,
  threshold: 10,
  suppressRepeats: false,
  filterHtml: false,
});

export const PROGRAM = "oddword";
export const STDIN_NAME = "<stdin>";

/** Known-word files looked up by base name when none are disabled. */
export const DEFAULT_KNOWN_WORD_FILES: readonly string[] = ["words"];

/** Bundled stoplist directory, `data/` at the package root. */
export const BUNDLED_DATA_DIR = fileURLToPath(new URL("../data/", import.meta.url));

const PLAN9_LIB_DIR = join("/", "usr", "local", "plan9", "lib");

/**
 * Directories searched for default known-word files, in order:
 * `ODDWORD_LIB` entries, the bundled data directory, then the plan9 lib.
 */
export function knownWordSearchDirs(env: NodeJS.ProcessEnv = process.env): string[] {
  const fromEnv = (env.ODDWORD_LIB ?? "").split(delimiter).filter((d) => d.length > 0);
  return [...fromEnv, BUNDLED_DATA_DIR, PLAN9_LIB_DIR];
}
