/**
 * @scoregov/node — Entry point.
 *
 * Loads config, executes the genesis block, starts the HTTP server and
 * the block producer, and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, toGovernanceConfig } from "./config.js";
import { createApp } from "./app.js";
import { MetricsCollector } from "./middleware/metrics.js";
import { ChainService } from "./services/chain-service.js";
import { BlockProducer } from "./services/block-producer.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const metricsCollector = new MetricsCollector();
  const chain = new ChainService({
    governance: toGovernanceConfig(config),
    retainedSnapshots: config.RETAINED_SNAPSHOTS,
    logger: logger.child({ component: "chain" }),
    metrics: metricsCollector,
  });

  if (!config.AUDIT_ENABLED) {
    logger.warn("Audit disabled, deployments activate without review");
  }

  const { app } = createApp({ chain, logger: logger.child({ component: "http" }), metricsCollector });
  const producer = new BlockProducer(chain, config.BLOCK_INTERVAL_MS, logger.child({ component: "producer" }));

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });
  producer.start();

  logger.info({ port: config.PORT, host: config.HOST }, "Governance node started");

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutdown signal received");
    producer.stop();
    if (chain.mempoolSize > 0) {
      chain.produceBlock();
    }
    chain.stop();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    logger.info("Shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
