import { describe, expect, it } from "vitest";
import { OddwordError, codeToTitle, isOddwordError, wrapError } from "../errors.js";

describe("OddwordError", () => {
  it("maps codes to exit statuses and titles", () => {
    expect(new OddwordError("x", "INVALID_ARGUMENT").exitCode).toBe(2);
    expect(new OddwordError("x", "INPUT_UNREADABLE").exitCode).toBe(2);
    expect(new OddwordError("x").exitCode).toBe(1);
    expect(new OddwordError("x", "INPUT_UNREADABLE").title).toBe("Input unreadable");
    expect(codeToTitle("INTERNAL")).toBe("Internal error");
  });

  it("fills in the operation", () => {
    expect(new OddwordError("x").context.operation).toBe("unknown");
    expect(new OddwordError("x", "INTERNAL", { operation: "run", file: "a" }).context).toEqual({
      operation: "run",
      file: "a",
    });
  });
});

describe("wrapError", () => {
  it("keeps an OddwordError as it is", () => {
    const err = new OddwordError("x", "INPUT_UNREADABLE");
    expect(wrapError(err)).toBe(err);
  });

  it("wraps an Error and keeps it as the cause", () => {
    const cause = new Error("boom");
    const err = wrapError(cause, "KNOWN_WORDS_UNREADABLE", { file: "w" });
    expect(isOddwordError(err)).toBe(true);
    expect(err.message).toBe("boom");
    expect(err.code).toBe("KNOWN_WORDS_UNREADABLE");
    expect(err.cause).toBe(cause);
    expect(err.context.file).toBe("w");
  });

  it("wraps anything else", () => {
    expect(wrapError("bad").message).toBe("bad");
    expect(wrapError(42).message).toBe("an unknown error occurred");
  });
});
