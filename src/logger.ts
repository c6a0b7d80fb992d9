import { pino } from "pino";
import type { Logger } from "pino";
import { LOG_LEVEL, SERVICE_NAME } from "./env.js";

export type { Logger } from "pino";

/**
 * JSON logger on stdout. Silenced under Vitest or NODE_ENV=test; pipe through
 * pino-pretty for local reading.
 */
export function makeLogger(bindings?: Record<string, unknown>): Logger {
  const isTestTooling = process.env.VITEST === "true" || process.env.NODE_ENV === "test";

  return pino({
    level: LOG_LEVEL,
    enabled: !isTestTooling,
    base: { ...bindings, service: SERVICE_NAME },
    messageKey: "msg",
    timestamp: pino.stdTimeFunctions.isoTime
  });
}

export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
