/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability — tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "./types/api-contract.js";
import type { ChainService } from "./services/chain-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import { metricsMiddleware, MetricsCollector } from "./middleware/metrics.js";
import { createHealthRoutes } from "./routes/health.js";
import { createMetricsRoute } from "./routes/metrics.js";
import { createJsonRpcRoutes, JSON_RPC_PATH } from "./routes/jsonrpc.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly chain: ChainService;
  /** Request and RPC failure logging. Disabled when omitted. */
  readonly logger?: Logger;
  /** Enable metrics collection. Default: true */
  readonly enableMetrics?: boolean;
  /** Share a collector with the chain service. A fresh one otherwise. */
  readonly metricsCollector?: MetricsCollector;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly metricsCollector: MetricsCollector;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const { chain } = options;
  const metricsCollector = options.metricsCollector ?? new MetricsCollector();
  const enableMetrics = options.enableMetrics !== false;

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logger !== undefined) {
    app.use("*", loggerMiddleware(options.logger));
  }

  if (enableMetrics) {
    app.use("*", metricsMiddleware(metricsCollector));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(handleError);

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(chain));

  // ─── Metrics Route (Prometheus scraping) ────────────────────────
  if (enableMetrics) {
    app.route("/", createMetricsRoute(metricsCollector, chain));
  }

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("chain", chain);
    await next();
  });

  app.route(JSON_RPC_PATH, createJsonRpcRoutes(options.logger));

  return { app, metricsCollector };
}
