/**
 * Structured logging utility
 *
 * Every line goes to stderr: stdout is reserved for NDJSON/JSON output
 * when records are written to it.
 */

export type LogLevel = "error" | "warn" | "info" | "debug";

const LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];

interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
}

// Shared by a logger and all of its children
interface LevelState {
  level: LogLevel;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LEVELS.some((level) => level === value);
}

function formatMeta(meta: unknown): string {
  if (meta === undefined || meta === null || meta === "") return "";
  if (meta instanceof Error) return ` ${meta.message}`;
  if (typeof meta === "string") return ` ${meta}`;
  try {
    return ` ${JSON.stringify(meta)}`;
  } catch {
    return ` ${String(meta)}`;
  }
}

export class Logger {
  private readonly state: LevelState;
  private readonly prefix: string;

  constructor(config: LoggerConfig = { level: "info" }, state?: LevelState) {
    this.state = state ?? { level: config.level };
    this.prefix = config.prefix || "Eventsmith";
  }

  /**
   * Logger whose lines carry `scope` after the prefix. Level changes on
   * either side apply to both.
   */
  child(scope: string): Logger {
    return new Logger(
      { level: this.state.level, prefix: `${this.prefix}:${scope}` },
      this.state,
    );
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) <= LEVELS.indexOf(this.state.level);
  }

  private write(level: LogLevel, message: string, meta: unknown): void {
    if (!this.shouldLog(level)) return;
    process.stderr.write(
      `[${this.prefix}] ${level.toUpperCase()}: ${message}${formatMeta(meta)}\n`,
    );
  }

  error(message: string, meta?: unknown): void {
    this.write("error", message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write("warn", message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.write("info", message, meta);
  }

  debug(message: string, meta?: unknown): void {
    this.write("debug", message, meta);
  }

  setLevel(level: LogLevel): void {
    this.state.level = level;
  }

  getLevel(): LogLevel {
    return this.state.level;
  }
}

// Default logger instance, seeded from LOG_LEVEL
export const logger = new Logger({
  level: isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : "info",
});

// Factory function for custom loggers
export function createLogger(config: LoggerConfig): Logger {
  return new Logger(config);
}
