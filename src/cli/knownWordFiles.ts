import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { join } from "node:path";

import { MemoryKnownWords } from "../core/impl/memoryKnownWords.js";
import { DEFAULT_KNOWN_WORD_FILES } from "../config.js";
import { wrapError } from "../errors.js";
import type { Log } from "../logger.js";

export interface KnownWordSources {
  /** Files named on the command line, read as given. */
  explicit: readonly string[];
  /** Base names looked up in `searchDirs`; defaults to DEFAULT_KNOWN_WORD_FILES. */
  defaults?: readonly string[];
  searchDirs: readonly string[];
}

/** First `dir/base` that exists, in search order. */
export function findKnownWordFile(base: string, searchDirs: readonly string[]): string | undefined {
  for (const dir of searchDirs) {
    const path = join(dir, base);
    if (existsSync(path)) return path;
  }
  return undefined;
}

/**
 * Builds the stoplist. A file that can't be found or read is logged as a
 * warning and contributes nothing.
 */
export async function loadKnownWords(sources: KnownWordSources, log: Log): Promise<MemoryKnownWords> {
  const known = new MemoryKnownWords();
  const paths: string[] = [];

  for (const base of sources.defaults ?? DEFAULT_KNOWN_WORD_FILES) {
    const path = findKnownWordFile(base, sources.searchDirs);
    if (path === undefined) {
      log.warn("can't find known words file", { file: base });
      continue;
    }
    paths.push(path);
  }
  paths.push(...sources.explicit);

  for (const path of paths) {
    const fileLog = log.child({ file: path });
    try {
      const n = known.addText(await readFile(path, "utf8"));
      fileLog.debug("loaded known words", { words: n });
    } catch (err) {
      const wrapped = wrapError(err, "KNOWN_WORDS_UNREADABLE", { operation: "loadKnownWords", file: path });
      fileLog.warn("can't read known words file", undefined, wrapped);
    }
  }
  return known;
}
