import type { Logger } from "../interfaces/logger.js";

/** Tag `logger` with a component name when it supports components. */
export function componentLogger(logger: Logger, component: string): Logger {
  return logger.child?.(component) ?? logger;
}
