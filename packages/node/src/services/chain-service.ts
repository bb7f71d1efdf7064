/**
 * ChainService — Composition root for the node.
 *
 * Owns the versioned state store and the transaction executor. Route
 * handlers delegate to this service; they never touch the store directly.
 *
 * - Transactions are queued in arrival order and run when a block is produced
 * - Readonly calls run against finalized snapshots, never the open block
 * - Receipts are kept in memory by transaction hash, for as many blocks
 *   as the store keeps snapshots
 */

import pino from "pino";
import type { Logger } from "pino";
import type { BlockRef, JsonValue, Transaction, TransactionReceipt, TxHash } from "@scoregov/types";
import { DEFAULT_RETAINED_SNAPSHOTS, StateStoreError, VersionedStateStore } from "@scoregov/state-store";
import type { StateSnapshot } from "@scoregov/state-store";
import { GovernanceError, hashTransaction, TransactionExecutor } from "@scoregov/governance";
import type { ExecutedBlock, GovernanceConfig } from "@scoregov/governance";
import type { MetricsCollector } from "../middleware/metrics.js";

// =============================================================================
// Configuration
// =============================================================================

export interface ChainServiceConfig {
  readonly governance: GovernanceConfig;
  readonly retainedSnapshots?: number;
  readonly logger?: Logger;
  readonly metrics?: MetricsCollector;
}

interface QueuedTransaction {
  readonly txHash: TxHash;
  readonly tx: Transaction;
}

// =============================================================================
// Service
// =============================================================================

export class ChainService {
  private readonly _store: VersionedStateStore;
  private readonly _executor: TransactionExecutor;
  private readonly _logger: Logger;
  private readonly _metrics: MetricsCollector | undefined;
  private readonly _mempool: QueuedTransaction[] = [];
  private readonly _queued = new Set<TxHash>();
  private readonly _receipts = new Map<TxHash, TransactionReceipt>();
  private readonly _receiptsByHeight = new Map<number, readonly TxHash[]>();
  private readonly _retainedBlocks: number;
  private _lastBlock: BlockRef;
  private _ready = false;

  constructor(config: ChainServiceConfig) {
    this._retainedBlocks = config.retainedSnapshots ?? DEFAULT_RETAINED_SNAPSHOTS;
    this._store = new VersionedStateStore({ retainedSnapshots: this._retainedBlocks });
    this._executor = new TransactionExecutor(this._store, config.governance);
    this._logger = config.logger ?? pino({ enabled: false });
    this._metrics = config.metrics;

    this._lastBlock = this._record(this._executor.executeBlock(0, []));
    this._logger.info(
      { genesis: config.governance.genesisAddress, auditEnabled: config.governance.auditEnabled },
      "Genesis block committed",
    );
    this._ready = true;
  }

  // ─── Transactions ──────────────────────────────────────────────────

  /**
   * Queue a transaction for the next block.
   *
   * @throws GovernanceError INVALID_PARAMETER for a duplicate transaction
   */
  sendTransaction(tx: Transaction): TxHash {
    const txHash = hashTransaction(tx);
    if (this._queued.has(txHash) || this._receipts.has(txHash)) {
      throw new GovernanceError("INVALID_PARAMETER", `Duplicate transaction: ${txHash}`);
    }
    this._mempool.push({ txHash, tx });
    this._queued.add(txHash);
    this._metrics?.setGauge("scoregov_mempool_size", this._mempool.length);
    this._logger.debug({ txHash, dataType: tx.dataType }, "Transaction queued");
    return txHash;
  }

  /**
   * @throws GovernanceError NOT_FOUND until the transaction is in a block,
   *   and again once its block falls out of the retention window
   */
  getTransactionResult(txHash: TxHash): TransactionReceipt {
    const receipt = this._receipts.get(txHash);
    if (receipt !== undefined) {
      return receipt;
    }
    if (this._queued.has(txHash)) {
      throw new GovernanceError("NOT_FOUND", `Transaction is pending: ${txHash}`);
    }
    throw new GovernanceError("NOT_FOUND", `Transaction not found: ${txHash}`);
  }

  get mempoolSize(): number {
    return this._mempool.length;
  }

  // ─── Blocks ────────────────────────────────────────────────────────

  /**
   * Execute every queued transaction, in arrival order, as the next block.
   */
  produceBlock(): ExecutedBlock {
    const batch = this._mempool.splice(0, this._mempool.length);
    let executed: ExecutedBlock;
    try {
      executed = this._executor.executeBlock(this._store.height + 1, batch.map((q) => q.tx));
    } catch (err) {
      this._mempool.unshift(...batch);
      throw err;
    }
    for (const { txHash } of batch) {
      this._queued.delete(txHash);
    }
    this._lastBlock = this._record(executed);
    return executed;
  }

  get lastBlock(): BlockRef {
    return this._lastBlock;
  }

  // ─── Queries ───────────────────────────────────────────────────────

  /**
   * Run a readonly governance method at a finalized height (default: latest).
   *
   * @throws GovernanceError
   */
  call(method: string, params: unknown, height?: number): JsonValue {
    return this._executor.contract.query(this._snapshot(height), method, params);
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────

  isReady(): boolean {
    return this._ready;
  }

  stop(): void {
    this._ready = false;
    this._logger.info({ height: this._lastBlock.height, pending: this._mempool.length }, "Chain service stopped");
  }

  // ─── Internals ─────────────────────────────────────────────────────

  private _snapshot(height: number | undefined): StateSnapshot {
    try {
      return this._store.snapshot(height);
    } catch (err) {
      if (err instanceof StateStoreError && err.code === "SNAPSHOT_UNAVAILABLE") {
        throw new GovernanceError("NOT_FOUND", err.message);
      }
      throw err;
    }
  }

  private _pruneReceipts(height: number): void {
    const hashes = this._receiptsByHeight.get(height);
    if (hashes === undefined) {
      return;
    }
    for (const txHash of hashes) {
      this._receipts.delete(txHash);
    }
    this._receiptsByHeight.delete(height);
  }

  private _record(block: ExecutedBlock): BlockRef {
    let failed = 0;
    this._pruneReceipts(block.height - this._retainedBlocks);
    this._receiptsByHeight.set(
      block.height,
      block.receipts.map((receipt) => receipt.txHash),
    );
    for (const receipt of block.receipts) {
      this._receipts.set(receipt.txHash, receipt);
      if (receipt.status === 0) {
        failed++;
        this._logger.warn(
          { txHash: receipt.txHash, height: block.height, code: receipt.failure.code },
          receipt.failure.message,
        );
      }
    }

    this._metrics?.incrementCounter("scoregov_blocks_total");
    this._metrics?.incrementCounter("scoregov_transactions_total", { status: "success" }, block.receipts.length - failed);
    this._metrics?.incrementCounter("scoregov_transactions_total", { status: "failure" }, failed);
    this._metrics?.setGauge("scoregov_block_height", block.height);
    this._metrics?.setGauge("scoregov_mempool_size", this._mempool.length);
    this._logger.info(
      { height: block.height, txCount: block.receipts.length, failed, stateRoot: block.stateRoot },
      "Block committed",
    );

    return {
      height: block.height,
      stateRoot: block.stateRoot,
      previousRoot: block.previousRoot,
      txHashes: block.txHashes,
    };
  }
}
