/**
 * Metrics route.
 *
 * GET /metrics — Prometheus text exposition format.
 *
 * Chain gauges are refreshed from the service on every scrape so a
 * scrape between blocks still sees the current mempool.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { MetricsCollector } from "../middleware/metrics.js";
import type { ChainService } from "../services/chain-service.js";

export const PROMETHEUS_CONTENT_TYPE = "text/plain; version=0.0.4; charset=utf-8";

export function createMetricsRoute(collector: MetricsCollector, chain?: ChainService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/metrics", (c) => {
    if (chain !== undefined) {
      collector.setGauge("scoregov_block_height", chain.lastBlock.height);
      collector.setGauge("scoregov_mempool_size", chain.mempoolSize);
    }
    return c.text(collector.render(), 200, { "Content-Type": PROMETHEUS_CONTENT_TYPE });
  });

  return routes;
}
