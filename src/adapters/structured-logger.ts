import type { Logger } from "../interfaces/logger.js";

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "debug",
  [LogLevel.INFO]: "info",
  [LogLevel.WARN]: "warn",
  [LogLevel.ERROR]: "error",
};

const RESERVED_KEYS = new Set(["time", "level", "msg", "component"]);

export interface StructuredLoggerOptions {
  writer?: (line: string) => void;
  level?: LogLevel;
  component?: string;
}

/** JSON-lines logger. Writes to stderr unless a writer is injected. */
export class StructuredLogger implements Logger {
  private writer: (line: string) => void;
  private level: LogLevel;
  private component: string | undefined;

  constructor(options: StructuredLoggerOptions = {}) {
    this.writer = options.writer ?? ((line) => process.stderr.write(`${line}\n`));
    this.level = options.level ?? LogLevel.INFO;
    this.component = options.component;
  }

  /** Logger sharing this writer and level, tagged with another component name. */
  child(component: string): StructuredLogger {
    return new StructuredLogger({ writer: this.writer, level: this.level, component });
  }

  debug(msg: string, ctx?: Record<string, unknown>): void {
    this.write(LogLevel.DEBUG, msg, ctx);
  }

  info(msg: string, ctx?: Record<string, unknown>): void {
    this.write(LogLevel.INFO, msg, ctx);
  }

  warn(msg: string, ctx?: Record<string, unknown>): void {
    this.write(LogLevel.WARN, msg, ctx);
  }

  error(msg: string, ctx?: Record<string, unknown>): void {
    this.write(LogLevel.ERROR, msg, ctx);
  }

  private write(level: LogLevel, msg: string, ctx?: Record<string, unknown>): void {
    if (level < this.level) return;

    const entry: Record<string, unknown> = {
      time: new Date().toISOString(),
      level: LEVEL_NAMES[level],
      msg,
    };
    if (this.component) entry.component = this.component;
    for (const [key, value] of Object.entries(ctx ?? {})) {
      if (!RESERVED_KEYS.has(key)) Object.assign(entry, expandField(key, value));
    }

    let line: string;
    try {
      line = JSON.stringify(entry);
    } catch {
      line = JSON.stringify({ time: entry.time, level: entry.level, msg, serializationError: true });
    }
    this.writer(line);
  }
}

/** Errors become message plus stack; bytes become hex. */
function expandField(key: string, value: unknown): Record<string, unknown> {
  if (value instanceof Error) return { [key]: value.message, [`${key}Stack`]: value.stack };
  if (value instanceof Uint8Array) return { [key]: Buffer.from(value).toString("hex") };
  return { [key]: value };
}
