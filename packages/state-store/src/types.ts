/**
 * @scoregov/state-store — Core types.
 *
 * Defines the read/write interfaces over chain state and the errors the
 * store raises.
 *
 * Design principles:
 * - Values are JSON, stored in canonical form (RFC 8785)
 * - Writes are staged per transaction, then per block
 * - Only a committed block is visible to snapshots
 * - Snapshots are immutable and never observe in-progress blocks
 */

import type { JsonValue } from "@scoregov/types";

// =============================================================================
// Access Interfaces
// =============================================================================

/**
 * Read access to chain state.
 */
export interface KeyValueReader {
  /** Value at `key`, or undefined when absent */
  get(key: string): JsonValue | undefined;

  /** True if a value exists at `key` */
  has(key: string): boolean;
}

/**
 * Read/write access to chain state inside a transaction.
 */
export interface KeyValueWriter extends KeyValueReader {
  put(key: string, value: JsonValue): void;
  delete(key: string): void;
}

/**
 * Narrow a reader to a writer.
 */
export function isWriter(db: KeyValueReader): db is KeyValueWriter {
  return "put" in db && typeof db.put === "function" && "delete" in db;
}

// =============================================================================
// Commit Results
// =============================================================================

/**
 * Result of committing a block.
 */
export interface BlockCommitResult {
  /** Height of the committed block */
  readonly height: number;

  /** State root after this block */
  readonly stateRoot: string;

  /** State root before this block */
  readonly previousRoot: string;

  /** Number of keys written or deleted by the block */
  readonly writeCount: number;
}

/**
 * Options for a VersionedStateStore.
 */
export interface VersionedStateStoreOptions {
  /** How many finalized snapshots to keep for historical reads. Default: 64 */
  readonly retainedSnapshots?: number;
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Error codes for state store operations.
 */
export type StateStoreErrorCode =
  | "BLOCK_ALREADY_OPEN"
  | "INVALID_HEIGHT"
  | "SNAPSHOT_UNAVAILABLE"
  | "SCOPE_CLOSED"
  | "TRANSACTION_OPEN"
  | "READ_ONLY"
  | "CORRUPT_VALUE";

/**
 * Error thrown by state store operations.
 */
export class StateStoreError extends Error {
  constructor(
    public readonly code: StateStoreErrorCode,
    message: string,
    public readonly key?: string,
  ) {
    super(message);
    this.name = "StateStoreError";
  }
}
