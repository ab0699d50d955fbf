/**
 * Middleware barrel — re-exports all middleware.
 */

export { createErrorHandler, STATUS_MAP } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware, requestLogLevel } from "./logger.js";
export type { RequestLogEntry, RequestLogLevel } from "./logger.js";
export { readBody, readQuery } from "./validate.js";
export {
  authMiddleware,
  callerHeaderMiddleware,
  requireCaller,
  API_KEY_HEADER,
  CALLER_HEADER,
} from "./auth.js";
export type { AuthConfig } from "./auth.js";
