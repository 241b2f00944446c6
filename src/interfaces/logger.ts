/**
 * Minimal structured logger interface.
 * StructuredLogger and NoopLogger implement it; the session layer programs to it.
 * @module
 */

/** Structured logger with optional debug level. */
export interface Logger {
  debug?(msg: string, ctx?: Record<string, unknown>): void;
  info(msg: string, ctx?: Record<string, unknown>): void;
  warn(msg: string, ctx?: Record<string, unknown>): void;
  error(msg: string, ctx?: Record<string, unknown>): void;
  /** Logger for a named sub-component, sharing this one's output. */
  child?(component: string): Logger;
}
