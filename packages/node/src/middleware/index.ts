/**
 * Middleware barrel — re-exports all middleware.
 */

export { handleError, statusOf } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody, validateQuery } from "./validate.js";
export {
  authMiddleware,
  anonymousAuthMiddleware,
  requirePermission,
  API_KEY_HEADER,
  PRINCIPAL_HEADER,
} from "./auth.js";
export type { AuthConfig } from "./auth.js";
