/**
 * Authentication middleware.
 *
 * Resolves the X-Api-Key header against the configured key registry.
 * On success, sets `c.set("auth", authContext)`; the context's principal
 * becomes the caller of every protocol operation the request performs.
 * On failure, returns 401 or 403.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord, Permission } from "../types/auth.js";
import { hasPermission } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";
export const PRINCIPAL_HEADER = "X-Principal";

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Authentication required"),
        401,
      );
    }

    const record = config.apiKeys.get(apiKey);
    if (record === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Invalid API key"),
        401,
      );
    }

    c.set("auth", { type: "api-key", role: record.role, principal: record.principal });
    return next();
  };
}

/**
 * Development mode without keys: the caller names its principal in the
 * X-Principal header and holds every permission.
 */
export function anonymousAuthMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const principal = c.req.header(PRINCIPAL_HEADER) ?? "anonymous";
    c.set("auth", { type: "anonymous", role: "admin", principal });
    return next();
  };
}

// =============================================================================
// Permission Guard
// =============================================================================

/**
 * Must run AFTER an auth middleware. Returns 403 if the authenticated
 * role lacks the required permission.
 */
export function requirePermission(
  permission: Permission,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const auth = c.get("auth");
    if (!hasPermission(auth.role, permission)) {
      return c.json(
        createErrorEnvelope(
          "FORBIDDEN",
          `Role '${auth.role}' lacks '${permission}' permission`,
        ),
        403,
      );
    }
    return next();
  };
}
