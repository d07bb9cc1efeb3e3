/**
 * Error type for every failure the CLI reports. The code picks the exit
 * status; context names the file or flag involved.
 */

export type ErrorCode =
  | "INVALID_ARGUMENT"
  | "INPUT_UNREADABLE"
  | "KNOWN_WORDS_UNREADABLE"
  | "INTERNAL";

export interface ErrorContext {
  operation: string;
  file?: string;
  flag?: string;
  [key: string]: unknown;
}

const EXIT_CODES: Record<ErrorCode, number> = {
  INVALID_ARGUMENT: 2,
  INPUT_UNREADABLE: 2,
  KNOWN_WORDS_UNREADABLE: 2,
  INTERNAL: 1,
};

export function codeToTitle(code: ErrorCode): string {
  switch (code) {
    case "INVALID_ARGUMENT":
      return "Invalid argument";
    case "INPUT_UNREADABLE":
      return "Input unreadable";
    case "KNOWN_WORDS_UNREADABLE":
      return "Known words unreadable";
    default:
      return "Internal error";
  }
}

export class OddwordError extends Error {
  public readonly code: ErrorCode;
  public readonly context: ErrorContext;

  constructor(
    message: string,
    code: ErrorCode = "INTERNAL",
    context: Partial<ErrorContext> = {},
    options?: { cause?: Error },
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = "OddwordError";
    this.code = code;
    this.context = { ...context, operation: context.operation ?? "unknown" };

    Error.captureStackTrace?.(this, this.constructor);
  }

  get title(): string {
    return codeToTitle(this.code);
  }

  get exitCode(): number {
    return EXIT_CODES[this.code];
  }
}

export function isOddwordError(error: unknown): error is OddwordError {
  return error instanceof OddwordError;
}

/** Wraps anything thrown into an OddwordError, keeping an existing one as is. */
export function wrapError(
  error: unknown,
  code: ErrorCode = "INTERNAL",
  context: Partial<ErrorContext> = {},
): OddwordError {
  if (isOddwordError(error)) return error;
  if (error instanceof Error) {
    return new OddwordError(error.message, code, context, { cause: error });
  }
  return new OddwordError(typeof error === "string" ? error : "an unknown error occurred", code, context);
}
