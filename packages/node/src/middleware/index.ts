/**
 * Middleware barrel: re-exports all middleware.
 */

export { createErrorHandler } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { realIpMiddleware, clientIpOf, nodePeerAddress } from "./real-ip.js";
export type { PeerAddress } from "./real-ip.js";
export { rateLimitMiddleware } from "./rate-limit.js";
export { sessionMiddleware } from "./session.js";
export {
  validateBody,
  validateQuery,
  validateParams,
  formatZodErrors,
} from "./validate.js";
