import { pino, type LevelWithSilent, type Logger } from "pino";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: {
    system: "worldcat-batch"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  }
});

export type { Logger };

// pino children copy the level at creation
const componentLoggers = new Set<Logger>();

/**
 * Returns a child logger tagged with the component name.
 */
export function getComponentLogger(component: string, bindings: Record<string, unknown> = {}): Logger {
  const child = logger.child({ component, ...bindings });
  componentLoggers.add(child);
  return child;
}

/**
 * Apply a level read after startup (e.g. from the .env file) to the root
 * logger and every component logger handed out so far.
 */
export function setLogLevel(level: LevelWithSilent): void {
  logger.level = level;
  for (const child of componentLoggers) {
    child.level = level;
  }
}
