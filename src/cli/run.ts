import { formatRepeat, formatWord } from "../core/types.js";
import { createTypoChecker } from "../core/impl/typoChecker.js";
import { knownWordSearchDirs } from "../config.js";
import { isOddwordError, wrapError } from "../errors.js";
import { logger as defaultLogger, type Logger } from "../logger.js";
import { USAGE, parseArgs } from "./args.js";
import { readSources, type InputStream } from "./input.js";
import { loadKnownWords } from "./knownWordFiles.js";

export interface Output {
  write(chunk: string): unknown;
}

export interface RunIO {
  stdin: InputStream;
  stdout: Output;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

/**
 * One batch run: load known words, read all input, report repeats, then
 * report the most peculiar words. Resolves to the process exit status.
 */
export async function run(argv: readonly string[], io: RunIO): Promise<number> {
  const log = io.logger ?? defaultLogger;

  try {
    const args = parseArgs(argv);
    if (args.help) {
      io.stdout.write(USAGE);
      return 0;
    }

    const known = await loadKnownWords(
      {
        explicit: args.knownFiles,
        defaults: args.useDefaultKnown ? undefined : [],
        searchDirs: knownWordSearchDirs(io.env),
      },
      log,
    );
    log.debug("known words ready", { size: known.size });

    const sources = await readSources(args.files, io.stdin);

    const checker = createTypoChecker();
    for (const source of sources) {
      const n = checker.addSource(source, { filterHtml: args.filterHtml });
      log.child({ file: source.name }).debug("tokenized", { words: n });
    }

    const report = checker.check(known, args);
    for (const w of report.repeats) io.stdout.write(`${formatRepeat(w)}\n`);
    for (const w of report.typos) io.stdout.write(`${formatWord(w)}\n`);
    log.debug("done", {
      words: checker.wordCount,
      candidates: report.candidates,
      repeats: report.repeats.length,
      typos: report.typos.length,
    });
    return 0;
  } catch (err) {
    const e = wrapError(err, "INTERNAL", { operation: "run" });
    log.error(e.message, e.context.file === undefined ? undefined : { file: e.context.file });
    if (isOddwordError(err) && err.code === "INVALID_ARGUMENT") console.error(USAGE);
    return e.exitCode;
  }
}
