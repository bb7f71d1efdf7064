/**
 * Chain Types
 *
 * Transaction envelope, receipts and block references shared by the
 * executor and the node.
 *
 * Rules:
 * - A transaction is identified by the hash of its canonical JSON
 * - Receipts are immutable results; a failure is a result, not an exception
 * - Block heights start at 0 (genesis)
 */

import type { Address, EoaAddress, HexInt, TxHash } from "./address.js";
import type { JsonObject, JsonValue } from "./json.js";

export type DataType = "call" | "deploy";

/**
 * Payload of a `call` transaction.
 */
export interface CallData {
  readonly method: string;
  readonly params?: JsonObject;
}

/**
 * Payload of a `deploy` transaction.
 */
export interface DeployData {
  readonly contentType: string;
  /** "0x"-prefixed hex of the packaged code */
  readonly content: string;
  readonly params?: Readonly<Record<string, string>>;
}

interface TransactionBase {
  readonly from: EoaAddress;
  readonly to: Address;
  /** Client-supplied timestamp (microseconds, hex); part of the hashed envelope */
  readonly timestamp: HexInt;
  readonly nonce?: HexInt;
}

export interface CallTransaction extends TransactionBase {
  readonly dataType: "call";
  readonly data: CallData;
}

export interface DeployTransaction extends TransactionBase {
  readonly dataType: "deploy";
  readonly data: DeployData;
}

export type Transaction = CallTransaction | DeployTransaction;

// =============================================================================
// Receipts
// =============================================================================

export interface EventLog {
  readonly scoreAddress: Address;
  readonly name: string;
  readonly data: readonly JsonValue[];
}

export interface TransactionFailure {
  readonly code: string;
  readonly message: string;
}

export interface SuccessReceipt {
  readonly txHash: TxHash;
  readonly blockHeight: number;
  readonly txIndex: number;
  readonly status: 1;
  readonly eventLogs: readonly EventLog[];
  readonly result?: JsonValue;
}

export interface FailureReceipt {
  readonly txHash: TxHash;
  readonly blockHeight: number;
  readonly txIndex: number;
  readonly status: 0;
  readonly failure: TransactionFailure;
}

export type TransactionReceipt = SuccessReceipt | FailureReceipt;

/**
 * Reference to a finalized block.
 */
export interface BlockRef {
  readonly height: number;
  readonly stateRoot: string;
  readonly previousRoot: string;
  readonly txHashes: readonly TxHash[];
}
