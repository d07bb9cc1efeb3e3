export interface FieldError {
  /** Flag as written on the command line, e.g. "-n". */
  flag: string;
  message: string;
}

const INT = /^[+-]?\d+$/;

export function asInt(v: string | undefined): number | undefined {
  if (v === undefined || !INT.test(v)) return undefined;
  const n = Number(v);
  return Number.isSafeInteger(n) ? n : undefined;
}

const TRUE_VALUES = new Set(["1", "t", "T", "true", "TRUE", "True"]);
const FALSE_VALUES = new Set(["0", "f", "F", "false", "FALSE", "False"]);

/** A bare flag (no "=value") is true; "-r=" with nothing after it is invalid. */
export function asBool(v: string | undefined): boolean | undefined {
  if (v === undefined || TRUE_VALUES.has(v)) return true;
  if (FALSE_VALUES.has(v)) return false;
  return undefined;
}

export function pushErr(errors: FieldError[], flag: string, message: string): void {
  errors.push({ flag, message });
}
