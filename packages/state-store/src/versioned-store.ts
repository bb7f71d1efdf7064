/**
 * @scoregov/state-store — Versioned, transactional state store.
 *
 * Holds chain state as key → canonical JSON. Mutation happens in three
 * nested scopes:
 *
 *   VersionedStateStore  finalized state + retained snapshots
 *     └─ BlockScope      writes of the block being executed
 *          └─ TransactionScope  writes of one transaction
 *
 * A transaction's writes reach the block only on commit(); a block's
 * writes reach finalized state only on commit(). Rolling back a
 * transaction leaves the block untouched, so a failed transaction never
 * leaves partial writes behind.
 *
 * Properties:
 * - One open block at a time; heights are contiguous from 0
 * - One open transaction per block at a time (execution is sequential)
 * - Snapshots are immutable views of finalized heights
 */

import { canonicalize } from "json-canonicalize";
import type { JsonValue } from "@scoregov/types";
import type {
  BlockCommitResult,
  KeyValueReader,
  KeyValueWriter,
  VersionedStateStoreOptions,
} from "./types.js";
import { StateStoreError } from "./types.js";
import { computeStateRoot, GENESIS_ROOT } from "./state-root.js";

/** Staged writes: key → canonical JSON, or null for a deletion */
type WriteSet = Map<string, string | null>;

export const DEFAULT_RETAINED_SNAPSHOTS = 64;

function decode(raw: string): JsonValue {
  const value: JsonValue = JSON.parse(raw);
  return value;
}

// =============================================================================
// Snapshot
// =============================================================================

/**
 * Read-only view of state as of a finalized block.
 */
export class StateSnapshot implements KeyValueReader {
  constructor(
    readonly height: number,
    readonly stateRoot: string,
    private readonly _entries: ReadonlyMap<string, string>,
  ) {}

  get(key: string): JsonValue | undefined {
    const raw = this._entries.get(key);
    return raw === undefined ? undefined : decode(raw);
  }

  has(key: string): boolean {
    return this._entries.has(key);
  }

  /** Number of keys in this snapshot */
  get size(): number {
    return this._entries.size;
  }
}

// =============================================================================
// Transaction Scope
// =============================================================================

/**
 * Writes of a single transaction, layered over its block.
 */
export class TransactionScope implements KeyValueWriter {
  private readonly _writes: WriteSet = new Map();
  private _closed = false;

  constructor(
    private readonly _block: BlockScope,
    private readonly _onClose: (writes: WriteSet | undefined) => void,
  ) {}

  get(key: string): JsonValue | undefined {
    this._assertOpen();
    if (this._writes.has(key)) {
      const raw = this._writes.get(key);
      return raw === null || raw === undefined ? undefined : decode(raw);
    }
    return this._block.get(key);
  }

  has(key: string): boolean {
    this._assertOpen();
    if (this._writes.has(key)) {
      return this._writes.get(key) !== null;
    }
    return this._block.has(key);
  }

  put(key: string, value: JsonValue): void {
    this._assertOpen();
    this._writes.set(key, canonicalize(value));
  }

  delete(key: string): void {
    this._assertOpen();
    this._writes.set(key, null);
  }

  /** Number of keys this transaction has written or deleted */
  get writeCount(): number {
    return this._writes.size;
  }

  get closed(): boolean {
    return this._closed;
  }

  /** Merge this transaction's writes into the block. */
  commit(): void {
    this._assertOpen();
    this._closed = true;
    this._onClose(this._writes);
  }

  /** Discard this transaction's writes. */
  rollback(): void {
    this._assertOpen();
    this._closed = true;
    this._onClose(undefined);
  }

  private _assertOpen(): void {
    if (this._closed) {
      throw new StateStoreError("SCOPE_CLOSED", "Transaction scope is already closed");
    }
  }
}

// =============================================================================
// Block Scope
// =============================================================================

/**
 * Writes of the block being executed, layered over finalized state.
 */
export class BlockScope implements KeyValueReader {
  private readonly _writes: WriteSet = new Map();
  private _openTransaction: TransactionScope | undefined;
  private _closed = false;

  constructor(
    readonly height: number,
    private readonly _base: ReadonlyMap<string, string>,
    private readonly _onCommit: (writes: WriteSet) => BlockCommitResult,
    private readonly _onAbort: () => void,
  ) {}

  get(key: string): JsonValue | undefined {
    if (this._writes.has(key)) {
      const raw = this._writes.get(key);
      return raw === null || raw === undefined ? undefined : decode(raw);
    }
    const raw = this._base.get(key);
    return raw === undefined ? undefined : decode(raw);
  }

  has(key: string): boolean {
    if (this._writes.has(key)) {
      return this._writes.get(key) !== null;
    }
    return this._base.has(key);
  }

  /**
   * Open a transaction scope over this block.
   *
   * @throws StateStoreError TRANSACTION_OPEN if another transaction is open
   */
  beginTransaction(): TransactionScope {
    this._assertOpen();
    if (this._openTransaction !== undefined) {
      throw new StateStoreError(
        "TRANSACTION_OPEN",
        `Block ${this.height} already has an open transaction`,
      );
    }
    const scope = new TransactionScope(this, (writes) => {
      if (writes !== undefined) {
        for (const [key, raw] of writes) {
          this._writes.set(key, raw);
        }
      }
      this._openTransaction = undefined;
    });
    this._openTransaction = scope;
    return scope;
  }

  /**
   * Finalize this block.
   *
   * @throws StateStoreError TRANSACTION_OPEN if a transaction is still open
   */
  commit(): BlockCommitResult {
    this._assertOpen();
    if (this._openTransaction !== undefined) {
      throw new StateStoreError(
        "TRANSACTION_OPEN",
        `Cannot commit block ${this.height} with an open transaction`,
      );
    }
    this._closed = true;
    try {
      return this._onCommit(this._writes);
    } catch (err) {
      this._onAbort();
      throw err;
    }
  }

  /** Drop this block and all of its writes. */
  abort(): void {
    this._assertOpen();
    this._closed = true;
    this._openTransaction = undefined;
    this._onAbort();
  }

  get closed(): boolean {
    return this._closed;
  }

  private _assertOpen(): void {
    if (this._closed) {
      throw new StateStoreError("SCOPE_CLOSED", `Block ${this.height} is already closed`);
    }
  }
}

// =============================================================================
// Versioned Store
// =============================================================================

/**
 * In-memory versioned state store.
 *
 * Finalized state is copied on each block commit, so retained snapshots
 * stay valid while later blocks execute.
 */
export class VersionedStateStore {
  private _committed: ReadonlyMap<string, string> = new Map();
  private readonly _snapshots = new Map<number, StateSnapshot>();
  private readonly _retained: number;
  private _height = -1;
  private _stateRoot: string = GENESIS_ROOT;
  private _openBlock: BlockScope | undefined;

  constructor(options: VersionedStateStoreOptions = {}) {
    const retained = options.retainedSnapshots ?? DEFAULT_RETAINED_SNAPSHOTS;
    if (!Number.isInteger(retained) || retained < 1) {
      throw new RangeError(`retainedSnapshots must be a positive integer, got ${retained}`);
    }
    this._retained = retained;
  }

  /** Height of the last finalized block, or -1 before genesis */
  get height(): number {
    return this._height;
  }

  /** State root of the last finalized block */
  get stateRoot(): string {
    return this._stateRoot;
  }

  /** True while a block is being executed */
  get hasOpenBlock(): boolean {
    return this._openBlock !== undefined;
  }

  /**
   * Read-only view of a finalized height (default: latest).
   *
   * @throws StateStoreError SNAPSHOT_UNAVAILABLE for future, pruned or pre-genesis heights
   */
  snapshot(height: number = this._height): StateSnapshot {
    const snapshot = this._snapshots.get(height);
    if (snapshot === undefined) {
      throw new StateStoreError(
        "SNAPSHOT_UNAVAILABLE",
        `No snapshot for height ${height} (latest finalized: ${this._height})`,
      );
    }
    return snapshot;
  }

  /**
   * Open the next block.
   *
   * @throws StateStoreError BLOCK_ALREADY_OPEN / INVALID_HEIGHT
   */
  beginBlock(height: number): BlockScope {
    if (this._openBlock !== undefined) {
      throw new StateStoreError(
        "BLOCK_ALREADY_OPEN",
        `Block ${this._openBlock.height} is still open`,
      );
    }
    if (height !== this._height + 1) {
      throw new StateStoreError(
        "INVALID_HEIGHT",
        `Expected block height ${this._height + 1}, got ${height}`,
      );
    }

    const block = new BlockScope(
      height,
      this._committed,
      (writes) => this._finalize(height, writes),
      () => {
        this._openBlock = undefined;
      },
    );
    this._openBlock = block;
    return block;
  }

  private _finalize(height: number, writes: WriteSet): BlockCommitResult {
    const next = new Map(this._committed);
    for (const [key, raw] of writes) {
      if (raw === null) {
        next.delete(key);
      } else {
        next.set(key, raw);
      }
    }

    const previousRoot = this._stateRoot;
    const stateRoot = computeStateRoot(next, previousRoot);

    this._committed = next;
    this._height = height;
    this._stateRoot = stateRoot;
    this._openBlock = undefined;

    this._snapshots.set(height, new StateSnapshot(height, stateRoot, next));
    this._snapshots.delete(height - this._retained);

    return { height, stateRoot, previousRoot, writeCount: writes.size };
  }
}
