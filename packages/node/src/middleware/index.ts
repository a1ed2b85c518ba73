/**
 * Middleware barrel - re-exports all middleware.
 */

export { handleError } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { actorMiddleware, ACTOR_HEADER, ANONYMOUS_ACTOR } from "./actor.js";
export { parseBody, parseQuery } from "./validate.js";
