import pino from "pino";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: {
    system: "remap-forge"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  }
});

export type Logger = typeof logger;

/**
 * Returns a child logger bound to one regeneration session.
 */
export function getSessionLogger(sessionId: string, parent: Logger = logger): Logger {
  return parent.child({ sessionId });
}
