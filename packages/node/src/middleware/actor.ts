/**
 * Actor middleware.
 *
 * Reads the caller identity from the X-Actor-Id header. Reads are open;
 * every mutating request must name its actor. Vault custody and market
 * holder ids are never valid actors.
 */

import type { MiddlewareHandler } from "hono";
import { isReservedHolder } from "@spreadvault/treasury";
import type { AppEnv } from "../types/api-contract.js";
import { ApiError } from "../types/error.js";

export const ACTOR_HEADER = "X-Actor-Id";

export const ANONYMOUS_ACTOR = "anonymous";

const READ_METHODS = new Set(["GET", "HEAD", "OPTIONS"]);

export function actorMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const actor = c.req.header(ACTOR_HEADER)?.trim() ?? "";

    if (actor === "" && !READ_METHODS.has(c.req.method)) {
      throw new ApiError("UNAUTHORIZED", `Missing ${ACTOR_HEADER} header`);
    }
    if (isReservedHolder(actor)) {
      throw new ApiError("VALIDATION_ERROR", `${ACTOR_HEADER} "${actor}" uses a reserved holder prefix`);
    }

    c.set("actor", actor === "" ? ANONYMOUS_ACTOR : actor);
    await next();
  };
}
