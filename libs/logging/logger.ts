import pino from "pino";
import type { UserContext } from "../context/identity.js";
import { roleName } from "../rbac/roles.js";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

export const logger = pino({
  level: process.env.RBAC_LOG_LEVEL ?? (process.env.NODE_ENV === "test" ? "silent" : "info"),
  base: {
    system: "org-rbac"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  }
});

/**
 * Returns a child logger with caller context attached.
 */
export function getContextLogger(context: UserContext) {
  return logger.child({
    userId: context.userId,
    role: roleName(context.role),
    teamId: context.teamId,
    departmentId: context.departmentId,
    sessionId: context.sessionId
  });
}
