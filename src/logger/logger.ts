/**
 * Engine logger
 *
 * Thin wrapper over consola so every module logs under a common tag.
 * Child loggers copy the level when created, so they are tracked here
 * and updated together.
 */

import { consola, type ConsolaInstance } from "consola";

export type LogLevelName = "silent" | "error" | "warn" | "info" | "debug";

export const LOG_LEVELS: Record<LogLevelName, number> = {
  silent: -999,
  error: 0,
  warn: 1,
  info: 3,
  debug: 4,
};

export const logger: ConsolaInstance = consola.withTag("registry");

const children = new Set<ConsolaInstance>();

export function setLogLevel(level: LogLevelName): void {
  logger.level = LOG_LEVELS[level];
  for (const child of children) {
    child.level = LOG_LEVELS[level];
  }
}

/**
 * Logger for a single module, e.g. createLogger("provider") → [registry:provider]
 */
export function createLogger(tag: string): ConsolaInstance {
  const child = logger.withTag(tag);
  children.add(child);
  return child;
}
