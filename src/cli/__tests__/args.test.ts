import { describe, expect, it } from "vitest";
import { parseArgs } from "../args.js";
import { OddwordError } from "../../errors.js";

function parseError(argv: string[]): OddwordError {
  try {
    parseArgs(argv);
  } catch (err) {
    if (err instanceof OddwordError) return err;
    throw err;
  }
  throw new Error("expected parseArgs to fail");
}

describe("parseArgs", () => {
  it("uses the defaults", () => {
    expect(parseArgs([])).toEqual({
      maxResults: 50,
      threshold: 10,
      suppressRepeats: false,
      filterHtml: false,
      files: [],
      knownFiles: [],
      useDefaultKnown: true,
      help: false,
    });
  });

  it("reads the short flags", () => {
    const args = parseArgs(["-n", "5", "-t=3", "-r", "-html", "a.txt"]);
    expect(args).toMatchObject({ maxResults: 5, threshold: 3, suppressRepeats: true, filterHtml: true, files: ["a.txt"] });
  });

  it("reads the long flags", () => {
    const args = parseArgs(["--max-results=2", "--threshold", "5", "--suppress-repeats", "--filter-html", "a", "b"]);
    expect(args).toMatchObject({ maxResults: 2, threshold: 5, suppressRepeats: true, filterHtml: true, files: ["a", "b"] });
  });

  it("accepts negative thresholds", () => {
    expect(parseArgs(["-t", "-5"]).threshold).toBe(-5);
  });

  it("accepts explicit boolean values", () => {
    expect(parseArgs(["-r=false"]).suppressRepeats).toBe(false);
    expect(parseArgs(["--html=true"]).filterHtml).toBe(true);
    expect(parseArgs(["-r=T"]).suppressRepeats).toBe(true);
    expect(parseArgs(["-r=False"]).suppressRepeats).toBe(false);
    expect(parseArgs(["--no-default-known=f"]).useDefaultKnown).toBe(true);
  });

  it("collects known-word files", () => {
    const args = parseArgs(["-k", "a.words", "--known=b.words", "--no-default-known"]);
    expect(args.knownFiles).toEqual(["a.words", "b.words"]);
    expect(args.useDefaultKnown).toBe(false);
  });

  it("stops at the first non-flag argument", () => {
    expect(parseArgs(["a.txt", "-n", "3"])).toMatchObject({ maxResults: 50, files: ["a.txt", "-n", "3"] });
    expect(parseArgs(["-", "-r"])).toMatchObject({ suppressRepeats: false, files: ["-", "-r"] });
  });

  it("stops at --", () => {
    expect(parseArgs(["-r", "--", "-n"])).toMatchObject({ suppressRepeats: true, files: ["-n"] });
  });

  it("recognises help", () => {
    expect(parseArgs(["-h"]).help).toBe(true);
    expect(parseArgs(["--help"]).help).toBe(true);
  });

  it("rejects an unknown flag", () => {
    const err = parseError(["-bogus"]);
    expect(err.code).toBe("INVALID_ARGUMENT");
    expect(err.message).toBe("-bogus: flag provided but not defined");
    expect(err.exitCode).toBe(2);
  });

  it("rejects bad values", () => {
    expect(parseError(["-n", "many"]).message).toBe('-n: invalid integer value "many"');
    expect(parseError(["-n", "-1"]).message).toBe("-n: must be at least 0");
    expect(parseError(["-t"]).message).toBe("-t: flag needs an argument");
    expect(parseError(["-r=maybe"]).message).toBe('-r: invalid boolean value "maybe"');
    expect(parseError(["-r="]).message).toBe('-r: invalid boolean value ""');
    expect(parseError(["-r=yes"]).message).toBe('-r: invalid boolean value "yes"');
  });

  it("reports every bad flag at once", () => {
    const err = parseError(["-x", "-n", "1.5"]);
    expect(err.message).toBe('-x: flag provided but not defined; -n: invalid integer value "1.5"');
    expect(err.context.flag).toBe("-x");
  });
});
