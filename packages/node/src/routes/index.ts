/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createMetricsRoute, PROMETHEUS_CONTENT_TYPE } from "./metrics.js";
export { createJsonRpcRoutes, handleRequest, JSON_RPC_PATH, RPC_METHODS } from "./jsonrpc.js";
