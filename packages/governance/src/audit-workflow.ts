/**
 * @scoregov/governance — Audit workflow.
 *
 * Per SCORE address:
 *
 *   NONE → PENDING → ACTIVE
 *                  → REJECTED → PENDING (fresh proposal)
 *   ACTIVE → PENDING (update in `next`; `current` unaffected)
 *
 * An accepted deployment becomes callable from the block after the one
 * that accepted it.
 */

import type { ContractAddress, TxHash } from "@scoregov/types";
import { GOVERNANCE_SCORE_ADDRESS } from "@scoregov/types";
import type { AuditorRegistry } from "./auditor-registry.js";
import type { DeployStorage } from "./deploy-storage.js";
import { GovernanceError } from "./errors.js";
import type { ExecutionContext } from "./types.js";

/**
 * True only for the built-in governance SCORE. Updates to it skip audit.
 */
export function isGovernanceSelfUpdate(scoreAddress: ContractAddress): boolean {
  return scoreAddress === GOVERNANCE_SCORE_ADDRESS;
}

/** First height at which code accepted in `blockHeight` may be called. */
export function activationHeight(blockHeight: number): number {
  return blockHeight + 1;
}

export class AuditWorkflow {
  constructor(
    private readonly _registry: AuditorRegistry,
    private readonly _storage: DeployStorage,
  ) {}

  /**
   * Approve a pending deployment. Returns the hash of this audit transaction.
   *
   * @throws GovernanceError FORBIDDEN / NOT_FOUND / INVALID_STATE
   */
  acceptScore(ctx: ExecutionContext, txHash: TxHash): TxHash {
    const scoreAddress = this._authorize(ctx, txHash, "acceptScore");
    this._storage.resolveAccept(scoreAddress, txHash, ctx.txHash, activationHeight(ctx.blockHeight));
    ctx.emit({ type: "Accepted", txHash });
    return ctx.txHash;
  }

  /**
   * Reject a pending deployment. The reason is only carried by the event.
   *
   * @throws GovernanceError FORBIDDEN / NOT_FOUND / INVALID_STATE / INVALID_PARAMETER
   */
  rejectScore(ctx: ExecutionContext, txHash: TxHash, reason: string): TxHash {
    const scoreAddress = this._authorize(ctx, txHash, "rejectScore");
    if (reason.trim().length === 0) {
      throw new GovernanceError("INVALID_PARAMETER", "Reject reason must not be empty");
    }
    this._storage.resolveReject(scoreAddress, txHash, ctx.txHash);
    ctx.emit({ type: "Rejected", txHash, reason });
    return ctx.txHash;
  }

  private _authorize(ctx: ExecutionContext, txHash: TxHash, method: string): ContractAddress {
    if (!this._registry.isAuthorized(ctx.from)) {
      throw new GovernanceError("FORBIDDEN", `${method} is restricted to auditors: ${ctx.from}`);
    }
    const params = this._storage.getTxParams(txHash);
    if (params === undefined) {
      throw new GovernanceError("NOT_FOUND", `Deploy tx not found: ${txHash}`);
    }
    return params.scoreAddress;
  }
}
