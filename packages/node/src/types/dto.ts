/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * The JSON-RPC route validates envelopes and method params with these.
 */

import { z } from "zod";
import type { HexInt, Transaction, TxHash } from "@scoregov/types";
import { isHexInt, isTransaction, isTxHash } from "@scoregov/types";

// =============================================================================
// Shared Schemas
// =============================================================================

export const HexIntSchema = z.custom<HexInt>((v) => isHexInt(v), {
  message: "Expected a hex integer (0x, lowercase, no leading zeros)",
});

export const TxHashSchema = z.custom<TxHash>((v) => isTxHash(v), {
  message: "Expected a transaction hash (0x + 64 hex)",
});

// =============================================================================
// JSON-RPC Envelope
// =============================================================================

export const JsonRpcRequestSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: z.union([z.string(), z.number(), z.null()]),
  method: z.string().min(1),
  params: z.record(z.unknown()).optional(),
});

export type JsonRpcRequestDto = z.infer<typeof JsonRpcRequestSchema>;

// =============================================================================
// Method Params
// =============================================================================

export const CallParamsSchema = z
  .object({
    method: z.string().min(1),
    params: z.record(z.unknown()).optional(),
    height: HexIntSchema.optional(),
  })
  .strict();

export type CallParamsDto = z.infer<typeof CallParamsSchema>;

/**
 * Transaction envelope. Top-level fields are checked here, encodings by
 * the shared transaction guard.
 */
export const SendTransactionSchema = z
  .object({
    from: z.string(),
    to: z.string(),
    timestamp: z.string(),
    nonce: z.string().optional(),
    dataType: z.enum(["call", "deploy"]),
    data: z.record(z.unknown()),
  })
  .strict()
  .pipe(z.custom<Transaction>((v) => isTransaction(v), { message: "Invalid transaction encoding" }));

export const GetTransactionResultSchema = z.object({ txHash: TxHashSchema }).strict();

export type GetTransactionResultDto = z.infer<typeof GetTransactionResultSchema>;

export const NoParamsSchema = z.object({}).strict();
