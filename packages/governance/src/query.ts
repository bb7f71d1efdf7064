/**
 * @scoregov/governance — Read-only queries.
 */

import type { ContractAddress, CurrentSlot, EoaAddress, NextSlot, ScoreStatus, SlotStatus } from "@scoregov/types";
import type { KeyValueReader } from "@scoregov/state-store";
import type { AuditorRegistry } from "./auditor-registry.js";
import { DeployStorage } from "./deploy-storage.js";
import { GovernanceError } from "./errors.js";

function projectSlot(slot: CurrentSlot | NextSlot): SlotStatus {
  if (slot.status === "pending" || slot.auditTxHash === undefined) {
    return { status: slot.status, deployTxHash: slot.deployTxHash };
  }
  return { status: slot.status, deployTxHash: slot.deployTxHash, auditTxHash: slot.auditTxHash };
}

export class QueryFacade {
  private readonly _storage: DeployStorage;

  constructor(
    db: KeyValueReader,
    private readonly _registry: AuditorRegistry,
  ) {
    this._storage = new DeployStorage(db);
  }

  /**
   * @throws GovernanceError NOT_FOUND when no record exists
   */
  getScoreStatus(address: ContractAddress): ScoreStatus {
    const record = this._storage.get(address);
    if (record === undefined) {
      throw new GovernanceError("NOT_FOUND", `SCORE not found: ${address}`);
    }

    const current = record.current === undefined ? undefined : projectSlot(record.current);
    const next = record.next === undefined ? undefined : projectSlot(record.next);
    return {
      ...(current !== undefined ? { current } : {}),
      ...(next !== undefined ? { next } : {}),
    };
  }

  getAuditors(): EoaAddress[] {
    return this._registry.list();
  }
}
