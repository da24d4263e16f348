export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  level?: LogLevel;
  silent?: boolean;
  scope?: string;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger {
  private readonly level: LogLevel;
  private readonly silent: boolean;
  private readonly scope?: string;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level || "info";
    this.silent = options.silent || false;
    this.scope = options.scope;
  }

  // Shares level and silence with the parent; scopes nest as "a:b".
  child(scope: string): Logger {
    return new Logger({
      level: this.level,
      silent: this.silent,
      scope: this.scope ? `${this.scope}:${scope}` : scope,
    });
  }

  private shouldLog(level: LogLevel): boolean {
    return !this.silent && LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private formatMessage(level: LogLevel, message: string, meta?: Record<string, unknown>): string {
    const timestamp = new Date().toISOString();
    const scopeStr = this.scope ? `[${this.scope}] ` : "";
    const metaStr = meta ? ` ${JSON.stringify(meta)}` : "";
    return `[${timestamp}] ${level.toUpperCase()}: ${scopeStr}${message}${metaStr}`;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog("debug")) {
      console.debug(this.formatMessage("debug", message, meta));
    }
  }

  info(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog("info")) {
      console.info(this.formatMessage("info", message, meta));
    }
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog("warn")) {
      console.warn(this.formatMessage("warn", message, meta));
    }
  }

  error(message: string, error?: unknown): void {
    if (this.shouldLog("error")) {
      console.error(this.formatMessage("error", message, toErrorMeta(error)));
    }
  }

  success(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog("info")) {
      console.info(this.formatMessage("info", `✓ ${message}`, meta));
    }
  }

  alert(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog("warn")) {
      console.warn(this.formatMessage("warn", `⚠ ${message}`, meta));
    }
  }
}

const toErrorMeta = (error: unknown): Record<string, unknown> | undefined => {
  if (error === undefined) return undefined;
  if (error instanceof Error) {
    return { message: error.message, stack: error.stack };
  }
  if (typeof error === "object" && error !== null) {
    return { ...error };
  }
  return { message: String(error) };
};

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const getLogLevel = (): LogLevel => {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level === "debug" || level === "info" || level === "warn" || level === "error") {
    return level;
  }
  return "info";
};

export const logger = new Logger({
  level: getLogLevel(),
  silent: process.env.LOG_SILENT === "true",
});

export const createLogger = (options?: LoggerOptions): Logger => {
  return new Logger(options);
};
