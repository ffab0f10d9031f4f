import { WidgetApiError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

type LevelName = "debug" | "info" | "warn" | "error";

const LEVEL_NAMES: Record<LogLevel, LevelName> = {
  [LogLevel.DEBUG]: "debug",
  [LogLevel.INFO]: "info",
  [LogLevel.WARN]: "warn",
  [LogLevel.ERROR]: "error",
};

const ENVELOPE_FIELDS: ReadonlySet<string> = new Set(["time", "level", "msg", "component"]);

export interface StructuredLoggerOptions {
  /** Receives one JSON document per entry. Defaults to stderr. */
  writer?: (line: string) => void;
  level?: LogLevel;
  component?: string;
  /** Fields stamped on every entry, e.g. `{ widgetId }`. */
  bindings?: Record<string, unknown>;
}

/**
 * JSON-lines logger. Errors in the context are flattened to their message,
 * with the stable `code` of a WidgetApiError alongside, and circular values
 * are replaced rather than failing the entry.
 */
export class StructuredLogger implements Logger {
  private readonly writer: (line: string) => void;
  private readonly threshold: LogLevel;
  private readonly component: string | undefined;
  private readonly bindings: Record<string, unknown>;

  constructor(options: StructuredLoggerOptions = {}) {
    this.writer = options.writer ?? ((line) => process.stderr.write(`${line}\n`));
    this.threshold = options.level ?? LogLevel.INFO;
    this.component = options.component;
    this.bindings = options.bindings ?? {};
  }

  /** A logger on the same writer and level, with `bindings` merged over this one's. */
  child(bindings: Record<string, unknown>, component = this.component): StructuredLogger {
    return new StructuredLogger({
      writer: this.writer,
      level: this.threshold,
      component,
      bindings: { ...this.bindings, ...bindings },
    });
  }

  isEnabled(level: LogLevel): boolean {
    return level >= this.threshold;
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

  private write(level: LogLevel, msg: string, ctx: Record<string, unknown> = {}): void {
    if (!this.isEnabled(level)) return;

    const entry: Record<string, unknown> = {
      time: new Date().toISOString(),
      level: LEVEL_NAMES[level],
      msg,
      ...(this.component ? { component: this.component } : {}),
    };
    for (const [key, value] of Object.entries({ ...this.bindings, ...ctx })) {
      if (ENVELOPE_FIELDS.has(key)) continue;
      Object.assign(entry, flatten(key, value));
    }
    this.writer(JSON.stringify(entry, circularReplacer()));
  }
}

function flatten(key: string, value: unknown): Record<string, unknown> {
  if (!(value instanceof Error)) return { [key]: value };
  return {
    [key]: value.message,
    ...(value instanceof WidgetApiError ? { [`${key}Code`]: value.code } : {}),
    [`${key}Stack`]: value.stack,
  };
}

function circularReplacer(): (key: string, value: unknown) => unknown {
  const seen = new WeakSet<object>();
  return (_key, value) => {
    if (typeof value !== "object" || value === null) return value;
    if (seen.has(value)) return "[Circular]";
    seen.add(value);
    return value;
  };
}
