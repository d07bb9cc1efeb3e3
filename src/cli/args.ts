import { DEFAULT_OPTIONS, PROGRAM, type TypoCheckOptions } from "../config.js";
import { OddwordError } from "../errors.js";
import { asBool, asInt, pushErr, type FieldError } from "./validation.js";

export interface CliArgs extends TypoCheckOptions {
  /** Input files; empty means standard input. */
  files: string[];
  /** Known-word files given with -k/--known. */
  knownFiles: string[];
  /** Look up the default known-word files. */
  useDefaultKnown: boolean;
  help: boolean;
}

type FlagSpec =
  | { kind: "int"; key: "maxResults" | "threshold"; min?: number }
  | { kind: "bool"; key: "suppressRepeats" | "filterHtml" | "help" }
  | { kind: "noDefaultKnown" }
  | { kind: "known" };

const FLAGS: Record<string, FlagSpec> = {
  n: { kind: "int", key: "maxResults", min: 0 },
  "max-results": { kind: "int", key: "maxResults", min: 0 },
  t: { kind: "int", key: "threshold" },
  threshold: { kind: "int", key: "threshold" },
  r: { kind: "bool", key: "suppressRepeats" },
  "suppress-repeats": { kind: "bool", key: "suppressRepeats" },
  html: { kind: "bool", key: "filterHtml" },
  "filter-html": { kind: "bool", key: "filterHtml" },
  h: { kind: "bool", key: "help" },
  help: { kind: "bool", key: "help" },
  k: { kind: "known" },
  known: { kind: "known" },
  "no-default-known": { kind: "noDefaultKnown" },
};

export const USAGE = `usage: ${PROGRAM} [flags] [file ...]

Reports words that look statistically out of place in the input, and
immediately repeated words. Reads standard input when no file is given.

  -n, --max-results N      maximum number of words to print (default ${DEFAULT_OPTIONS.maxResults})
  -t, --threshold N        cutoff threshold; smaller means more words (default ${DEFAULT_OPTIONS.threshold})
  -r, --suppress-repeats   don't show repeated words
  -html, --filter-html     filter HTML tags from input
  -k, --known FILE         add a known-words file (repeatable)
  --no-default-known       skip the default known-words files
  -h, --help               show this help
`;

/**
 * Parses flags the way the classic Unix tools do: one or two dashes, the
 * value either after "=" or as the next argument, and flag parsing stops at
 * the first non-flag argument or at "--".
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const out: CliArgs = {
    ...DEFAULT_OPTIONS,
    files: [],
    knownFiles: [],
    useDefaultKnown: true,
    help: false,
  };
  const errors: FieldError[] = [];

  let i = 0;
  for (; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    if (arg === "--") {
      i++;
      break;
    }
    if (arg === "-" || !arg.startsWith("-")) break;

    const body = arg.replace(/^--?/, "");
    const eq = body.indexOf("=");
    const name = eq < 0 ? body : body.slice(0, eq);
    const inline = eq < 0 ? undefined : body.slice(eq + 1);
    const flag = `-${name}`;

    const spec = Object.hasOwn(FLAGS, name) ? FLAGS[name] : undefined;
    if (!spec) {
      pushErr(errors, flag, "flag provided but not defined");
      continue;
    }

    if (spec.kind === "bool" || spec.kind === "noDefaultKnown") {
      const v = asBool(inline);
      if (v === undefined) {
        pushErr(errors, flag, `invalid boolean value ${JSON.stringify(inline)}`);
      } else if (spec.kind === "bool") {
        out[spec.key] = v;
      } else {
        out.useDefaultKnown = !v;
      }
      continue;
    }

    let value = inline;
    if (value === undefined) {
      value = argv[i + 1];
      if (value === undefined) {
        pushErr(errors, flag, "flag needs an argument");
        continue;
      }
      i++;
    }

    if (spec.kind === "known") {
      out.knownFiles.push(value);
      continue;
    }

    const n = asInt(value);
    if (n === undefined) {
      pushErr(errors, flag, `invalid integer value ${JSON.stringify(value)}`);
    } else if (spec.min !== undefined && n < spec.min) {
      pushErr(errors, flag, `must be at least ${spec.min}`);
    } else {
      out[spec.key] = n;
    }
  }
  out.files = argv.slice(i);

  const first = errors[0];
  if (first) {
    throw new OddwordError(
      errors.map((e) => `${e.flag}: ${e.message}`).join("; "),
      "INVALID_ARGUMENT",
      { operation: "parseArgs", flag: first.flag, errors },
    );
  }
  return out;
}
