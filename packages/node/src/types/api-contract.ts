/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { Protocol } from "../services/protocol.js";

/**
 * Hono environment type for the spread vault API.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The protocol instance serving this app */
    protocol: Protocol;

    /** Caller identity from X-Actor-Id (set by actor middleware) */
    actor: string;
  };
}
