/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (chain service accepting work, last block)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { ChainService } from "../services/chain-service.js";
import { encodeHexInt } from "@scoregov/types";

export function createHealthRoutes(chain: ChainService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const block = chain.lastBlock;
    const body = {
      status: chain.isReady() ? "ready" : "not_ready",
      height: encodeHexInt(block.height),
      stateRoot: block.stateRoot,
      mempool: chain.mempoolSize,
      timestamp: new Date().toISOString(),
    };
    return chain.isReady() ? c.json(body, 200) : c.json(body, 503);
  });

  return routes;
}
