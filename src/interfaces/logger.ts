/**
 * Minimal structured logger interface.
 * StructuredLogger and NoopLogger implement this; core code only sees the interface.
 * @module
 */

/** Structured logger with optional debug level. */
export interface Logger {
  debug?(msg: string, ctx?: Record<string, unknown>): void;
  info(msg: string, ctx?: Record<string, unknown>): void;
  warn(msg: string, ctx?: Record<string, unknown>): void;
  error(msg: string, ctx?: Record<string, unknown>): void;
}
