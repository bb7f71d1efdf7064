/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps governance and state store errors to HTTP status codes. The
 * JSON-RPC route reports its own errors in-band; this handler covers
 * everything that escapes it.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { isGovernanceError } from "@scoregov/governance";
import type { GovernanceErrorCode } from "@scoregov/governance";
import { StateStoreError } from "@scoregov/state-store";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Record<GovernanceErrorCode, ContentfulStatusCode> = {
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  METHOD_NOT_FOUND: 404,
  INVALID_PARAMETER: 400,
  INVALID_STATE: 409,
  ALREADY_PENDING: 409,
};

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  if (isGovernanceError(err)) {
    return c.json(createErrorEnvelope(err.code, err.message), STATUS_MAP[err.code]);
  }

  if (err instanceof StateStoreError && err.code === "SNAPSHOT_UNAVAILABLE") {
    return c.json(createErrorEnvelope("NOT_FOUND", err.message), 404);
  }

  if (err instanceof HTTPException) {
    return c.json(createErrorEnvelope("VALIDATION_ERROR", err.message), err.status);
  }

  // Don't leak internal details
  return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
}
