import pino from "pino";
import type { IdentityScope } from "../context/identity.js";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

/**
 * Operational logs go to stderr. stdout is reserved for the service's
 * response stream.
 */
export const logDestination = pino.destination({ dest: 2, sync: true });

export const logger = pino({
  level: process.env.ICCP_LOG_LEVEL ?? "info",
  base: {
    system: "iccp"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  }
}, logDestination);

/**
 * Returns a child logger with identity scope and trace attached.
 */
export function getContextLogger(identity: IdentityScope, traceId: string) {
  return logger.child({
    traceId,
    userId: identity.userId,
    role: identity.role,
    sessionId: identity.sessionContext.sessionId
  });
}
