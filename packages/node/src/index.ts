/**
 * @scoregov/node — Public API.
 *
 * The HTTP node: JSON-RPC over Hono, block production, configuration.
 * The runnable entry point lives in main.ts.
 */

export { ChainService } from "./services/chain-service.js";
export type { ChainServiceConfig } from "./services/chain-service.js";
export { BlockProducer } from "./services/block-producer.js";
export { loadConfig, toGovernanceConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./routes/index.js";
export * from "./middleware/index.js";
export * from "./types/index.js";
