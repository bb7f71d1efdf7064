/**
 * @scoregov/types — Shared domain types for SCORE governance.
 *
 * These types are used across all packages:
 * - Address, hash and integer encodings
 * - Deployment records and their slots
 * - Transactions, receipts and block references
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Guards validate values at boundaries; they never coerce
 */

// Encodings
export type {
  EoaAddress,
  ContractAddress,
  Address,
  TxHash,
  HexInt,
} from "./address.js";
export {
  ADDRESS_BODY_LENGTH,
  HASH_BODY_LENGTH,
  ZERO_SCORE_ADDRESS,
  GOVERNANCE_SCORE_ADDRESS,
  ZERO_TX_HASH,
  isEoaAddress,
  isContractAddress,
  isAddress,
  isTxHash,
  isHexInt,
  encodeHexInt,
  decodeHexInt,
  toContractAddress,
} from "./address.js";

// JSON
export type { JsonPrimitive, JsonValue, JsonObject } from "./json.js";

// Deployment types
export type {
  CurrentStatus,
  NextStatus,
  DeploymentStatus,
  DeployType,
  ActiveSlot,
  InactiveSlot,
  CurrentSlot,
  PendingSlot,
  RejectedSlot,
  NextSlot,
  DeploymentRecord,
  DeployTxParams,
  SlotStatus,
  ScoreStatus,
} from "./deployment.js";

// Chain types
export type {
  DataType,
  CallData,
  DeployData,
  CallTransaction,
  DeployTransaction,
  Transaction,
  EventLog,
  TransactionFailure,
  SuccessReceipt,
  FailureReceipt,
  TransactionReceipt,
  BlockRef,
} from "./chain.js";

// Runtime type guards
export {
  isDeploymentStatus,
  isDeployType,
  isCurrentSlot,
  isNextSlot,
  isDeploymentRecord,
  isDeployTxParams,
  isTransaction,
} from "./guards.js";
