/**
 * JSON-RPC 2.0 endpoint.
 *
 * POST /api/v3
 *
 * Methods:
 * - gov_call                  readonly governance call at a finalized height
 * - gov_sendTransaction       queue a call/deploy transaction, returns its hash
 * - gov_getTransactionResult  receipt of an included transaction
 * - gov_getLastBlock          last finalized block reference
 *
 * Errors are reported in-band with the fixed codes of RPC_ERROR_CODES.
 * Integers in results are lowercase hex text.
 */

import { Hono } from "hono";
import pino from "pino";
import type { Logger } from "pino";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import type { BlockRef, TransactionReceipt } from "@scoregov/types";
import { decodeHexInt, encodeHexInt } from "@scoregov/types";
import { GovernanceError, isGovernanceError } from "@scoregov/governance";
import type { AppEnv } from "../types/api-contract.js";
import type { ChainService } from "../services/chain-service.js";
import {
  CallParamsSchema,
  GetTransactionResultSchema,
  JsonRpcRequestSchema,
  NoParamsSchema,
  SendTransactionSchema,
} from "../types/dto.js";
import { RPC_ERROR_CODES, rpcError, rpcResult } from "../types/jsonrpc.js";
import type { RpcErrorName, RpcId, RpcResponse } from "../types/jsonrpc.js";

export const JSON_RPC_PATH = "/api/v3";

// =============================================================================
// Methods
// =============================================================================

type RpcMethod = (chain: ChainService, params: Record<string, unknown>) => unknown;

const METHODS: ReadonlyMap<string, RpcMethod> = new Map<string, RpcMethod>([
  [
    "gov_call",
    (chain, params) => {
      const p = parseParams("gov_call", CallParamsSchema, params);
      const height = p.height === undefined ? undefined : Number(decodeHexInt(p.height));
      return chain.call(p.method, p.params, height);
    },
  ],
  [
    "gov_sendTransaction",
    (chain, params) => chain.sendTransaction(parseParams("gov_sendTransaction", SendTransactionSchema, params)),
  ],
  [
    "gov_getTransactionResult",
    (chain, params) => {
      const p = parseParams("gov_getTransactionResult", GetTransactionResultSchema, params);
      return formatReceipt(chain.getTransactionResult(p.txHash));
    },
  ],
  [
    "gov_getLastBlock",
    (chain, params) => {
      parseParams("gov_getLastBlock", NoParamsSchema, params);
      return formatBlock(chain.lastBlock);
    },
  ],
]);

/** Names of all JSON-RPC methods. */
export const RPC_METHODS: readonly string[] = [...METHODS.keys()];

// =============================================================================
// Routes
// =============================================================================

export function createJsonRpcRoutes(logger: Logger = pino({ enabled: false })): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json(rpcError(null, "PARSE_ERROR", "Parse error"));
    }

    const chain = c.get("chain");
    if (Array.isArray(body)) {
      if (body.length === 0) {
        return c.json(rpcError(null, "INVALID_REQUEST", "Empty batch"));
      }
      return c.json(body.map((entry: unknown) => handleRequest(chain, entry, logger)));
    }
    return c.json(handleRequest(chain, body, logger));
  });

  return routes;
}

/**
 * Handle one JSON-RPC request object.
 */
export function handleRequest(chain: ChainService, raw: unknown, logger: Logger): RpcResponse {
  const parsed = JsonRpcRequestSchema.safeParse(raw);
  if (!parsed.success) {
    return rpcError(idOf(raw), "INVALID_REQUEST", "Invalid request");
  }

  const { id, method, params } = parsed.data;
  const handler = METHODS.get(method);
  if (handler === undefined) {
    return rpcError(id, "METHOD_NOT_FOUND", `Method not found: ${method}`);
  }

  try {
    return rpcResult(id, handler(chain, params ?? {}));
  } catch (err) {
    if (isGovernanceError(err)) {
      return rpcError(id, err.code, err.message);
    }
    logger.error({ err, method }, "Unhandled JSON-RPC error");
    return rpcError(id, "INTERNAL_ERROR", "Internal error");
  }
}

// =============================================================================
// Helpers
// =============================================================================

function parseParams<T>(method: string, schema: ZodType<T, ZodTypeDef, unknown>, params: unknown): T {
  const result = schema.safeParse(params);
  if (!result.success) {
    throw new GovernanceError("INVALID_PARAMETER", `Invalid params for ${method}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

function idOf(raw: unknown): RpcId {
  if (raw !== null && typeof raw === "object" && "id" in raw) {
    const id = raw.id;
    if (typeof id === "string" || typeof id === "number") {
      return id;
    }
  }
  return null;
}

function isRpcErrorName(code: string): code is RpcErrorName {
  return code in RPC_ERROR_CODES;
}

function formatBlock(block: BlockRef): Record<string, unknown> {
  return {
    height: encodeHexInt(block.height),
    stateRoot: block.stateRoot,
    previousRoot: block.previousRoot,
    txHashes: block.txHashes,
  };
}

function formatReceipt(receipt: TransactionReceipt): Record<string, unknown> {
  const base = {
    txHash: receipt.txHash,
    blockHeight: encodeHexInt(receipt.blockHeight),
    txIndex: encodeHexInt(receipt.txIndex),
  };
  if (receipt.status === 1) {
    return {
      ...base,
      status: "0x1",
      eventLogs: receipt.eventLogs,
      ...(receipt.result !== undefined ? { result: receipt.result } : {}),
    };
  }
  const { code, message } = receipt.failure;
  return {
    ...base,
    status: "0x0",
    failure: {
      code: isRpcErrorName(code) ? RPC_ERROR_CODES[code] : RPC_ERROR_CODES.INTERNAL_ERROR,
      message,
    },
  };
}
