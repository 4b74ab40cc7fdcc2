export type LogLevel = "debug" | "info" | "warn" | "error";

const DIM = "\x1b[2m";
const RED = "\x1b[31m";
const YELLOW = "\x1b[33m";
const CYAN = "\x1b[36m";
const RESET = "\x1b[0m";

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: DIM,
  info: CYAN,
  warn: YELLOW,
  error: RED,
};

export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  prefix?: string;
  /** Defaults to off under NODE_ENV=test */
  enabled?: boolean;
  /** Where formatted lines go. Defaults to the console method for the level. */
  sink?: LogSink;
  color?: boolean;
}

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case "debug":
      console.debug(line);
      break;
    case "info":
      console.info(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
};

export class Logger {
  private readonly prefix: string;
  private readonly enabled: boolean;
  private readonly sink: LogSink;
  private readonly color: boolean;

  constructor(options: LoggerOptions = {}) {
    this.prefix = options.prefix ?? "[phone-sweep]";
    this.enabled = options.enabled ?? process.env.NODE_ENV !== "test";
    this.sink = options.sink ?? consoleSink;
    this.color = options.color ?? (options.sink === undefined && process.stdout.isTTY === true);
  }

  private format(level: LogLevel, message: string): string {
    const timestamp = new Date().toISOString();
    const tag = level.toUpperCase();
    const shown = this.color ? `${LEVEL_COLORS[level]}${tag}${RESET}` : tag;
    return `${timestamp} ${this.prefix} [${shown}] ${message}`;
  }

  debug(message: string): void {
    if (this.enabled && process.env.LOG_LEVEL === "debug") {
      this.sink("debug", this.format("debug", message));
    }
  }

  info(message: string): void {
    if (this.enabled) this.sink("info", this.format("info", message));
  }

  warn(message: string): void {
    if (this.enabled) this.sink("warn", this.format("warn", message));
  }

  error(message: string, error?: unknown): void {
    if (!this.enabled) return;
    const detail = error instanceof Error ? `: ${error.message}` : "";
    this.sink("error", this.format("error", `${message}${detail}`));
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
