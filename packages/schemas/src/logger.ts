export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/** Console sink with a `[component]` prefix and a minimum level. */
export class ConsoleLogger implements Logger {
  private readonly prefix: string;
  private readonly threshold: number;

  constructor(component: string, level: LogLevel = "info") {
    // biome-ignore lint/suspicious/noControlCharactersInRegex: intentional sanitization of control chars
    const safe = component.replace(/[\x00-\x1f\x7f]/g, "_").slice(0, 64);
    this.prefix = `[${safe}]`;
    this.threshold = LOG_LEVELS.indexOf(level);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.enabled("debug")) console.debug(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.enabled("info")) console.log(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.enabled("warn")) console.warn(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  error(message: string, data?: Record<string, unknown>): void {
    if (this.enabled("error")) console.error(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= this.threshold;
  }
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/** Logger for a component, at the level named by TABRUNNER_LOG_LEVEL (default info). */
export function createLogger(component: string, env: NodeJS.ProcessEnv = process.env): Logger {
  const raw = env.TABRUNNER_LOG_LEVEL?.trim().toLowerCase() ?? "info";
  return new ConsoleLogger(component, isLogLevel(raw) ? raw : "info");
}
