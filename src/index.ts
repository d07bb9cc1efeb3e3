export * from "./core/index.js";
export { DEFAULT_OPTIONS, type TypoCheckOptions } from "./config.js";
export { OddwordError, isOddwordError, wrapError, type ErrorCode, type ErrorContext } from "./errors.js";
export { Logger, logger, type LogLevel, type Log } from "./logger.js";
export { parseArgs, type CliArgs } from "./cli/args.js";
export { run, type RunIO, type Output } from "./cli/run.js";
