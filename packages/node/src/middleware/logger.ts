/**
 * Structured request logging middleware.
 *
 * One pino line per request with method, path, status, duration and
 * request id. Level follows the response status: 5xx error, 4xx warn,
 * everything else info.
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
}

export type RequestLogLevel = "info" | "warn" | "error";

export function levelForStatus(status: number): RequestLogLevel {
  if (status >= 500) return "error";
  if (status >= 400) return "warn";
  return "info";
}

export function loggerMiddleware(logger: Pick<Logger, RequestLogLevel>): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    const entry: RequestLogEntry = {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
      requestId: c.get("requestId"),
    };

    logger[levelForStatus(entry.status)](entry, `${entry.method} ${entry.path} ${entry.status}`);
  };
}
