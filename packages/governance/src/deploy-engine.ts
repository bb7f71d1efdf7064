/**
 * @scoregov/governance — Deployment submission.
 *
 * Handles install/update requests carried by `deploy` transactions:
 * validates the request, records the deploy parameters and puts the
 * proposal in the SCORE's `next` slot. The proposal then waits for audit,
 * unless audit is off or the target is the governance SCORE itself.
 *
 * Install addresses are derived from the sender, timestamp and nonce, so
 * every node computes the same address.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { ContractAddress, DeployData, DeployType, EoaAddress, HexInt } from "@scoregov/types";
import { ADDRESS_BODY_LENGTH, isContractAddress, toContractAddress, ZERO_SCORE_ADDRESS } from "@scoregov/types";
import { activationHeight, isGovernanceSelfUpdate } from "./audit-workflow.js";
import type { DeployStorage } from "./deploy-storage.js";
import { GovernanceError } from "./errors.js";
import type { ExecutionContext, GovernanceConfig } from "./types.js";

export const ZIP_CONTENT_TYPE = "application/zip";

const CONTENT_PATTERN = /^0x(?:[0-9a-f]{2})+$/;

/**
 * A deploy request as it appears in the transaction envelope.
 */
export interface DeployRequest {
  readonly to: string;
  readonly timestamp: HexInt;
  readonly nonce?: HexInt;
  readonly data: DeployData;
}

/**
 * Address a new SCORE is installed at.
 */
export function deriveInstallAddress(from: EoaAddress, timestamp: HexInt, nonce?: HexInt): ContractAddress {
  const seed = nonce === undefined ? { from, timestamp } : { from, timestamp, nonce };
  const digest = createHash("sha256").update(canonicalize(seed)).digest("hex");
  return toContractAddress(digest.slice(-ADDRESS_BODY_LENGTH));
}

export class DeployEngine {
  constructor(
    private readonly _storage: DeployStorage,
    private readonly _config: GovernanceConfig,
  ) {}

  /**
   * Submit an install (to = zero SCORE address) or update.
   * Returns the target SCORE address.
   *
   * @throws GovernanceError INVALID_PARAMETER / NOT_FOUND / FORBIDDEN / ALREADY_PENDING
   */
  submit(ctx: ExecutionContext, request: DeployRequest): ContractAddress {
    const { data } = request;
    if (data.contentType !== ZIP_CONTENT_TYPE) {
      throw new GovernanceError("INVALID_PARAMETER", `Invalid contentType: ${data.contentType}`);
    }
    if (!CONTENT_PATTERN.test(data.content)) {
      throw new GovernanceError("INVALID_PARAMETER", "Content must be non-empty 0x-prefixed hex");
    }

    const { scoreAddress, deployType } = this._resolveTarget(ctx, request);

    this._storage.putTxParams({
      txHash: ctx.txHash,
      scoreAddress,
      deployType,
      owner: ctx.from,
      contentType: data.contentType,
      contentDigest: createHash("sha256").update(Buffer.from(data.content.slice(2), "hex")).digest("hex"),
      params: { ...data.params },
    });
    this._storage.proposeNext(scoreAddress, ctx.txHash, ctx.from);
    ctx.emit({ type: "DeployRequested", scoreAddress, txHash: ctx.txHash });

    if (!this._isAuditNeeded(scoreAddress)) {
      this._storage.activateWithoutAudit(scoreAddress, ctx.txHash, activationHeight(ctx.blockHeight));
      ctx.emit({ type: "Deployed", scoreAddress, txHash: ctx.txHash });
    }
    return scoreAddress;
  }

  private _resolveTarget(
    ctx: ExecutionContext,
    request: DeployRequest,
  ): { scoreAddress: ContractAddress; deployType: DeployType } {
    if (!isContractAddress(request.to)) {
      throw new GovernanceError("INVALID_PARAMETER", `Deploy target is not a contract address: ${request.to}`);
    }

    if (request.to === ZERO_SCORE_ADDRESS) {
      const scoreAddress = deriveInstallAddress(ctx.from, request.timestamp, request.nonce);
      if (this._storage.get(scoreAddress) !== undefined) {
        throw new GovernanceError("INVALID_PARAMETER", `SCORE already exists: ${scoreAddress}`);
      }
      return { scoreAddress, deployType: "install" };
    }

    const record = this._storage.get(request.to);
    if (record === undefined) {
      throw new GovernanceError("NOT_FOUND", `SCORE not found: ${request.to}`);
    }
    if (record.owner !== ctx.from) {
      throw new GovernanceError("FORBIDDEN", `Only the owner can update ${request.to}: ${ctx.from}`);
    }
    return { scoreAddress: request.to, deployType: "update" };
  }

  private _isAuditNeeded(scoreAddress: ContractAddress): boolean {
    return this._config.auditEnabled && !isGovernanceSelfUpdate(scoreAddress);
  }
}
