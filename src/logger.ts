/**
 * Prefix logger over the console.
 *
 *   const log = createLogger("Workspace");
 *   log.info("Opened TempBar");   // [Workspace] Opened TempBar
 *
 * One threshold is shared by every logger and is set from the settings
 * document with `setLogLevel`. Output is silenced while Vitest runs.
 * The model layer never logs; only the application layer does.
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const isTest = typeof process !== "undefined" && process.env.VITEST === "true";

let threshold: LogLevel = "error";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

interface LoggerConfig {
  enabled: boolean;
  prefix: string;
  /** Overrides the shared threshold for this logger only. */
  level?: LogLevel;
}

export class Logger {
  private readonly config: LoggerConfig;

  constructor(config?: Partial<LoggerConfig>) {
    this.config = { enabled: !isTest, prefix: "", ...config };
  }

  private shouldLog(level: LogLevel): boolean {
    if (!this.config.enabled) return false;
    const current = this.config.level ?? threshold;
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(current);
  }

  private format(message: string): string {
    return this.config.prefix ? `[${this.config.prefix}] ${message}` : message;
  }

  private write(
    level: LogLevel,
    sink: (...args: unknown[]) => void,
    message: string,
    data: unknown
  ): void {
    if (!this.shouldLog(level)) return;
    if (data !== undefined) {
      sink(this.format(message), data);
    } else {
      sink(this.format(message));
    }
  }

  debug(message: string, data?: unknown): void {
    this.write("debug", console.debug, message, data);
  }

  info(message: string, data?: unknown): void {
    this.write("info", console.info, message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write("warn", console.warn, message, data);
  }

  error(message: string, data?: unknown): void {
    this.write("error", console.error, message, data);
  }
}

export function createLogger(prefix?: string): Logger {
  return new Logger({ prefix: prefix ?? "" });
}
