/**
 * @scoregov/governance — Transaction executor.
 *
 * Applies blocks of transactions sequentially against a VersionedStateStore:
 *
 *   block  = beginBlock(height)
 *   for each tx:
 *     scope = block.beginTransaction()
 *     run tx → success: commit scope, keep events
 *            → failure: roll back scope, drop events
 *   block.commit() → state root
 *
 * A failing transaction produces a failure receipt and never aborts the
 * block. The genesis block (height 0) loads the built-in governance record
 * before its transactions run.
 *
 * Each successful transaction records `tx|<hash>` in state, so it can never
 * run twice. A failed transaction leaves no state behind, that key included,
 * and the same envelope may be included again in a later block. Turning
 * away resubmitted failures is left to the node's mempool, which checks
 * the receipts it still holds.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  EventLog,
  JsonValue,
  Transaction,
  TransactionFailure,
  TransactionReceipt,
  TxHash,
} from "@scoregov/types";
import { GOVERNANCE_SCORE_ADDRESS, isContractAddress } from "@scoregov/types";
import type { TransactionScope, VersionedStateStore } from "@scoregov/state-store";
import { isGovernanceError, GovernanceError } from "./errors.js";
import { GovernanceContract } from "./governance-contract.js";
import { resolveCallable } from "./score-resolver.js";
import type { ExecutionContext, GovernanceConfig, GovernanceEvent } from "./types.js";

export const INTERNAL_ERROR = "INTERNAL_ERROR";

const EXECUTED_TX_PREFIX = "tx|";

// =============================================================================
// Types
// =============================================================================

export interface ExecutedBlock {
  readonly height: number;
  readonly stateRoot: string;
  readonly previousRoot: string;
  readonly txHashes: readonly TxHash[];
  readonly receipts: readonly TransactionReceipt[];
}

// =============================================================================
// Hashing
// =============================================================================

/**
 * Transaction hash: SHA-256 of the canonical JSON envelope.
 */
export function hashTransaction(tx: Transaction): TxHash {
  return `0x${createHash("sha256").update(canonicalize(tx)).digest("hex")}`;
}

// =============================================================================
// Event logs
// =============================================================================

export function toEventLog(event: GovernanceEvent): EventLog {
  const scoreAddress = GOVERNANCE_SCORE_ADDRESS;
  switch (event.type) {
    case "Accepted":
      return { scoreAddress, name: "Accepted(txHash)", data: [event.txHash] };
    case "Rejected":
      return { scoreAddress, name: "Rejected(txHash,reason)", data: [event.txHash, event.reason] };
    case "AuditorAdded":
      return { scoreAddress, name: "AuditorAdded(address)", data: [event.address] };
    case "AuditorRemoved":
      return { scoreAddress, name: "AuditorRemoved(address)", data: [event.address] };
    case "AuditorSelfRevoked":
      return { scoreAddress, name: "AuditorSelfRevoked(address)", data: [event.address] };
    case "DeployRequested":
      return { scoreAddress, name: "DeployRequested(scoreAddress,txHash)", data: [event.scoreAddress, event.txHash] };
    case "Deployed":
      return { scoreAddress, name: "Deployed(scoreAddress,txHash)", data: [event.scoreAddress, event.txHash] };
  }
}

// =============================================================================
// Executor
// =============================================================================

export class TransactionExecutor {
  readonly contract: GovernanceContract;

  constructor(
    private readonly _store: VersionedStateStore,
    config: GovernanceConfig,
  ) {
    this.contract = new GovernanceContract(config);
  }

  get store(): VersionedStateStore {
    return this._store;
  }

  /**
   * Execute and finalize the next block.
   *
   * An error that escapes a transaction (store failure, commit failure)
   * aborts the whole block, so the same height can be executed again.
   *
   * @throws StateStoreError when `height` is not the next height
   */
  executeBlock(height: number, txs: readonly Transaction[]): ExecutedBlock {
    const block = this._store.beginBlock(height);
    try {
      if (height === 0) {
        const genesis = block.beginTransaction();
        this.contract.loadBuiltin(genesis);
        genesis.commit();
      }

      const receipts: TransactionReceipt[] = [];
      const txHashes: TxHash[] = [];
      txs.forEach((tx, txIndex) => {
        const txHash = hashTransaction(tx);
        txHashes.push(txHash);

        const scope = block.beginTransaction();
        const events: GovernanceEvent[] = [];
        const ctx: ExecutionContext = {
          from: tx.from,
          txHash,
          blockHeight: height,
          emit: (event) => {
            events.push(event);
          },
        };

        try {
          const result = this._apply(scope, ctx, tx);
          scope.commit();
          receipts.push({
            txHash,
            blockHeight: height,
            txIndex,
            status: 1,
            eventLogs: events.map(toEventLog),
            result,
          });
        } catch (error) {
          scope.rollback();
          receipts.push({ txHash, blockHeight: height, txIndex, status: 0, failure: toFailure(error) });
        }
      });

      const committed = block.commit();
      return {
        height: committed.height,
        stateRoot: committed.stateRoot,
        previousRoot: committed.previousRoot,
        txHashes,
        receipts,
      };
    } catch (err) {
      if (!block.closed) {
        block.abort();
      }
      throw err;
    }
  }

  private _apply(scope: TransactionScope, ctx: ExecutionContext, tx: Transaction): JsonValue {
    const executedKey = `${EXECUTED_TX_PREFIX}${ctx.txHash}`;
    if (scope.has(executedKey)) {
      throw new GovernanceError("INVALID_PARAMETER", `Transaction already executed: ${ctx.txHash}`);
    }
    scope.put(executedKey, ctx.blockHeight);

    if (tx.dataType === "deploy") {
      const request =
        tx.nonce === undefined
          ? { to: tx.to, timestamp: tx.timestamp, data: tx.data }
          : { to: tx.to, timestamp: tx.timestamp, nonce: tx.nonce, data: tx.data };
      return this.contract.deploy(scope, ctx, request);
    }

    if (tx.to === GOVERNANCE_SCORE_ADDRESS) {
      return this.contract.invoke(scope, ctx, tx.data.method, tx.data.params);
    }
    if (!isContractAddress(tx.to)) {
      throw new GovernanceError("INVALID_PARAMETER", `Call target is not a contract: ${tx.to}`);
    }
    // Code execution belongs to the VM; record where the call was routed.
    const callable = resolveCallable(scope, tx.to, ctx.blockHeight);
    return { scoreAddress: callable.address, deployTxHash: callable.deployTxHash };
  }
}

function toFailure(error: unknown): TransactionFailure {
  if (isGovernanceError(error)) {
    return { code: error.code, message: error.message };
  }
  return { code: INTERNAL_ERROR, message: "Internal error" };
}
