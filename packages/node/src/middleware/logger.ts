/**
 * Structured request logging middleware.
 *
 * One pino line per request with method, path, status, duration and
 * request id. Server errors log at error, client errors at warn.
 */

import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  readonly actor: string | undefined;
}

export type RequestLogger = Pick<Logger, "info" | "warn" | "error">;

export function loggerMiddleware(logger: RequestLogger): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    const entry: RequestLogEntry = {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
      requestId: c.get("requestId"),
      actor: c.req.header("X-Actor-Id"),
    };
    const line = `${entry.method} ${entry.path} ${String(entry.status)}`;

    if (entry.status >= 500) {
      logger.error(entry, line);
    } else if (entry.status >= 400) {
      logger.warn(entry, line);
    } else {
      logger.info(entry, line);
    }
  };
}
