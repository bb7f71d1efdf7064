/**
 * @scoregov/governance — Deployment record store.
 *
 * Per-SCORE deployment records and per-transaction deploy parameters,
 * kept in chain state:
 *
 *   deploy|info|<scoreAddress>  → DeploymentRecord
 *   deploy|tx|<deployTxHash>    → DeployTxParams
 *
 * Rules:
 * - A pending `next` is never overwritten (ALREADY_PENDING)
 * - A rejected `next` is replaced by a fresh proposal
 * - Resolving requires `next` to be pending for the given deploy tx
 * - Deploy parameters are written once per tx hash
 */

import type {
  ContractAddress,
  CurrentSlot,
  DeploymentRecord,
  DeployTxParams,
  EoaAddress,
  JsonValue,
  NextSlot,
  TxHash,
} from "@scoregov/types";
import { isDeploymentRecord, isDeployTxParams, ZERO_TX_HASH } from "@scoregov/types";
import { DictContainer, StateStoreError } from "@scoregov/state-store";
import type { Codec, KeyValueReader } from "@scoregov/state-store";
import { GovernanceError } from "./errors.js";

// =============================================================================
// Codecs
// =============================================================================

function encodeCurrent(slot: CurrentSlot): JsonValue {
  const out: Record<string, JsonValue> = {
    status: slot.status,
    deployTxHash: slot.deployTxHash,
    activeFrom: slot.activeFrom,
  };
  if (slot.auditTxHash !== undefined) {
    out.auditTxHash = slot.auditTxHash;
  }
  return out;
}

function encodeNext(slot: NextSlot): JsonValue {
  const out: Record<string, JsonValue> = {
    status: slot.status,
    deployTxHash: slot.deployTxHash,
  };
  if (slot.status === "rejected") {
    out.auditTxHash = slot.auditTxHash;
  }
  return out;
}

const recordCodec: Codec<DeploymentRecord> = {
  encode: (record) => {
    const out: Record<string, JsonValue> = {
      scoreAddress: record.scoreAddress,
      owner: record.owner,
    };
    if (record.current !== undefined) {
      out.current = encodeCurrent(record.current);
    }
    if (record.next !== undefined) {
      out.next = encodeNext(record.next);
    }
    return out;
  },
  decode: (raw, key) => {
    if (!isDeploymentRecord(raw)) {
      throw new StateStoreError("CORRUPT_VALUE", `Stored value at "${key}" is not a deployment record`, key);
    }
    return raw;
  },
};

const txParamsCodec: Codec<DeployTxParams> = {
  encode: (params) => ({
    txHash: params.txHash,
    scoreAddress: params.scoreAddress,
    deployType: params.deployType,
    owner: params.owner,
    contentType: params.contentType,
    contentDigest: params.contentDigest,
    params: { ...params.params },
  }),
  decode: (raw, key) => {
    if (!isDeployTxParams(raw)) {
      throw new StateStoreError("CORRUPT_VALUE", `Stored value at "${key}" is not deploy tx params`, key);
    }
    return raw;
  },
};

// =============================================================================
// Store
// =============================================================================

export class DeployStorage {
  private readonly _records: DictContainer<DeploymentRecord>;
  private readonly _txParams: DictContainer<DeployTxParams>;

  constructor(db: KeyValueReader) {
    this._records = new DictContainer("deploy|info", db, recordCodec);
    this._txParams = new DictContainer("deploy|tx", db, txParamsCodec);
  }

  get(scoreAddress: ContractAddress): DeploymentRecord | undefined {
    return this._records.get(scoreAddress);
  }

  getTxParams(txHash: TxHash): DeployTxParams | undefined {
    return this._txParams.get(txHash);
  }

  /**
   * @throws GovernanceError INVALID_STATE when params for this tx hash exist
   */
  putTxParams(params: DeployTxParams): void {
    if (this._txParams.has(params.txHash)) {
      throw new GovernanceError("INVALID_STATE", `Deploy tx already recorded: ${params.txHash}`);
    }
    this._txParams.set(params.txHash, params);
  }

  /**
   * Record a new install/update proposal in the `next` slot.
   *
   * @throws GovernanceError ALREADY_PENDING when a pending proposal exists
   */
  proposeNext(scoreAddress: ContractAddress, deployTxHash: TxHash, owner: EoaAddress): void {
    const record = this._records.get(scoreAddress);
    const next: NextSlot = { status: "pending", deployTxHash };

    if (record === undefined) {
      this._records.set(scoreAddress, { scoreAddress, owner, next });
      return;
    }
    if (record.next?.status === "pending") {
      throw new GovernanceError(
        "ALREADY_PENDING",
        `SCORE ${scoreAddress} already has a pending deployment: ${record.next.deployTxHash}`,
      );
    }
    this._records.set(scoreAddress, { ...record, next });
  }

  /**
   * Promote the pending proposal to `current` with an audit stamp.
   *
   * @throws GovernanceError INVALID_STATE unless `next` is pending for `deployTxHash`
   */
  resolveAccept(
    scoreAddress: ContractAddress,
    deployTxHash: TxHash,
    auditTxHash: TxHash,
    activeFrom: number,
  ): void {
    const record = this._requirePending(scoreAddress, deployTxHash);
    this._records.set(scoreAddress, {
      scoreAddress,
      owner: record.owner,
      current: { status: "active", deployTxHash, auditTxHash, activeFrom },
    });
  }

  /**
   * Mark the pending proposal rejected. The slot is kept for queries.
   *
   * @throws GovernanceError INVALID_STATE unless `next` is pending for `deployTxHash`
   */
  resolveReject(scoreAddress: ContractAddress, deployTxHash: TxHash, auditTxHash: TxHash): void {
    const record = this._requirePending(scoreAddress, deployTxHash);
    this._records.set(scoreAddress, {
      ...record,
      next: { status: "rejected", deployTxHash, auditTxHash },
    });
  }

  /**
   * Promote the pending proposal to `current` without an audit stamp.
   *
   * @throws GovernanceError INVALID_STATE unless `next` is pending for `deployTxHash`
   */
  activateWithoutAudit(scoreAddress: ContractAddress, deployTxHash: TxHash, activeFrom: number): void {
    const record = this._requirePending(scoreAddress, deployTxHash);
    this._records.set(scoreAddress, {
      scoreAddress,
      owner: record.owner,
      current: { status: "active", deployTxHash, activeFrom },
    });
  }

  /**
   * Record built-in code loaded at genesis.
   */
  putBuiltin(scoreAddress: ContractAddress, owner: EoaAddress): void {
    this._records.set(scoreAddress, {
      scoreAddress,
      owner,
      current: { status: "active", deployTxHash: ZERO_TX_HASH, activeFrom: 0 },
    });
  }

  private _requirePending(scoreAddress: ContractAddress, deployTxHash: TxHash): DeploymentRecord {
    const record = this._records.get(scoreAddress);
    if (record === undefined) {
      throw new GovernanceError("NOT_FOUND", `SCORE not found: ${scoreAddress}`);
    }
    if (record.next === undefined || record.next.status !== "pending") {
      throw new GovernanceError("INVALID_STATE", `No pending deployment for ${scoreAddress}`);
    }
    if (record.next.deployTxHash !== deployTxHash) {
      throw new GovernanceError(
        "INVALID_STATE",
        `Deploy tx ${deployTxHash} is not the pending deployment of ${scoreAddress}`,
      );
    }
    return record;
  }
}
