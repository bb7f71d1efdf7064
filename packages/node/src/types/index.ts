/**
 * Type barrel — re-exports all public types from @scoregov/node.
 */

// DTOs
export {
  HexIntSchema,
  TxHashSchema,
  JsonRpcRequestSchema,
  CallParamsSchema,
  SendTransactionSchema,
  GetTransactionResultSchema,
  NoParamsSchema,
} from "./dto.js";
export type { JsonRpcRequestDto, CallParamsDto, GetTransactionResultDto } from "./dto.js";

// JSON-RPC
export { RPC_ERROR_CODES, rpcResult, rpcError } from "./jsonrpc.js";
export type {
  RpcErrorName,
  RpcId,
  RpcError,
  RpcSuccessResponse,
  RpcErrorResponse,
  RpcResponse,
} from "./jsonrpc.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv } from "./api-contract.js";
