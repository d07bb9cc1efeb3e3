import { isOddwordError } from "./errors.js";
import { PROGRAM } from "./config.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    code?: string;
    title?: string;
    message: string;
  };
}

export interface LoggerConfig {
  prefix: string;
  minLevel: LogLevel;
  structuredOutput: boolean;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const DEFAULT_CONFIG: LoggerConfig = {
  prefix: `[${PROGRAM}]`,
  minLevel: "warn",
  structuredOutput: false,
};

export function isLogLevel(v: unknown): v is LogLevel {
  return typeof v === "string" && Object.hasOwn(LOG_LEVELS, v);
}

/**
 * Leveled diagnostics logger. Everything goes to stderr; stdout is reserved
 * for the report.
 */
export class Logger {
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.config.minLevel];
  }

  private formatMessage(level: LogLevel, message: string, context?: Record<string, unknown>, error?: unknown): string {
    const parts = [this.config.prefix, `[${level.toUpperCase()}]`, message];

    if (context && Object.keys(context).length > 0) {
      const contextStr = Object.entries(context)
        .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
        .join(" ");
      parts.push(`| ${contextStr}`);
    }
    if (error instanceof Error) parts.push(`(${error.message})`);

    return parts.join(" ");
  }

  private createEntry(level: LogLevel, message: string, context?: Record<string, unknown>, error?: unknown): LogEntry {
    const entry: LogEntry = { level, message, timestamp: new Date().toISOString() };
    if (context) entry.context = context;
    if (isOddwordError(error)) {
      entry.error = { name: error.name, code: error.code, title: error.title, message: error.message };
    } else if (error instanceof Error) {
      entry.error = { name: error.name, message: error.message };
    }
    return entry;
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>, error?: unknown): void {
    if (!this.shouldLog(level)) return;

    const line = this.config.structuredOutput
      ? JSON.stringify(this.createEntry(level, message, context, error))
      : this.formatMessage(level, message, context, error);
    console.error(line);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log("debug", message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log("info", message, context);
  }

  warn(message: string, context?: Record<string, unknown>, error?: unknown): void {
    this.log("warn", message, context, error);
  }

  error(message: string, context?: Record<string, unknown>, error?: unknown): void {
    this.log("error", message, context, error);
  }

  child(additionalContext: Record<string, unknown>): ContextualLogger {
    return new ContextualLogger(this, additionalContext);
  }

  configure(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
  }
}

/** Logger with fixed context, e.g. the file being read. */
export class ContextualLogger {
  constructor(
    private readonly parent: Logger,
    private readonly context: Record<string, unknown>,
  ) {}

  debug(message: string, additionalContext?: Record<string, unknown>): void {
    this.parent.debug(message, { ...this.context, ...additionalContext });
  }

  info(message: string, additionalContext?: Record<string, unknown>): void {
    this.parent.info(message, { ...this.context, ...additionalContext });
  }

  warn(message: string, additionalContext?: Record<string, unknown>, error?: unknown): void {
    this.parent.warn(message, { ...this.context, ...additionalContext }, error);
  }

  error(message: string, additionalContext?: Record<string, unknown>, error?: unknown): void {
    this.parent.error(message, { ...this.context, ...additionalContext }, error);
  }

  child(additionalContext: Record<string, unknown>): ContextualLogger {
    return new ContextualLogger(this.parent, { ...this.context, ...additionalContext });
  }
}

/** Anything that logs like a Logger, including child loggers. */
export type Log = Pick<Logger, "debug" | "info" | "warn" | "error" | "child">;

export const logger = new Logger();

/** Applies LOG_LEVEL and ODDWORD_STRUCTURED_LOGS. */
export function configureFromEnv(target: Logger, env: NodeJS.ProcessEnv = process.env): void {
  if (isLogLevel(env.LOG_LEVEL)) target.configure({ minLevel: env.LOG_LEVEL });
  if (env.ODDWORD_STRUCTURED_LOGS === "true") target.configure({ structuredOutput: true });
}
