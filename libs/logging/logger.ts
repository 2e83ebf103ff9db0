import pino from "pino";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Unknown levels fall back to info so a bad LOG_LEVEL cannot break module
 * load; bootstrap reports it through the config path.
 */
export function resolveLogLevel(value: string | undefined): LogLevel {
  return isLogLevel(value) ? value : "info";
}

export const logger = pino({
  level: resolveLogLevel(process.env.LOG_LEVEL),
  base: {
    system: process.env.SERVICE_NAME ?? "signed-policy-authz"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  }
});

/**
 * Returns a child logger scoped to one policy domain.
 */
export function getDomainLogger(domain: string) {
  return logger.child({ domain });
}
