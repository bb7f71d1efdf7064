/**
 * JSON-RPC 2.0 envelope types and the fixed error code table.
 *
 * Governance error kinds map to stable numeric codes that every client
 * can rely on. Anything unrecognized is INTERNAL_ERROR.
 */

import type { GovernanceErrorCode } from "@scoregov/governance";

// =============================================================================
// Error Codes
// =============================================================================

export const RPC_ERROR_CODES = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMETER: -32602,
  INTERNAL_ERROR: -32603,
  FORBIDDEN: -32110,
  NOT_FOUND: -32111,
  INVALID_STATE: -32112,
  ALREADY_PENDING: -32113,
} as const satisfies Record<GovernanceErrorCode | "PARSE_ERROR" | "INVALID_REQUEST" | "INTERNAL_ERROR", number>;

export type RpcErrorName = keyof typeof RPC_ERROR_CODES;

// =============================================================================
// Envelopes
// =============================================================================

export type RpcId = string | number | null;

export interface RpcError {
  readonly code: number;
  readonly message: string;
}

export interface RpcSuccessResponse {
  readonly jsonrpc: "2.0";
  readonly id: RpcId;
  readonly result: unknown;
}

export interface RpcErrorResponse {
  readonly jsonrpc: "2.0";
  readonly id: RpcId;
  readonly error: RpcError;
}

export type RpcResponse = RpcSuccessResponse | RpcErrorResponse;

export function rpcResult(id: RpcId, result: unknown): RpcSuccessResponse {
  return { jsonrpc: "2.0", id, result };
}

export function rpcError(id: RpcId, name: RpcErrorName, message: string): RpcErrorResponse {
  return { jsonrpc: "2.0", id, error: { code: RPC_ERROR_CODES[name], message } };
}
