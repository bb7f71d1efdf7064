/**
 * @scoregov/governance — Auditor registry.
 *
 * Ordered list of auditor addresses kept in chain state. Genesis is
 * always authorized and is never stored in the list.
 *
 * Rules:
 * - Only genesis adds or removes auditors
 * - Any auditor may remove itself (selfRevoke)
 * - Removal preserves the order of the remaining auditors
 */

import type { EoaAddress } from "@scoregov/types";
import { isEoaAddress } from "@scoregov/types";
import { ArrayContainer, guardedCodec } from "@scoregov/state-store";
import type { KeyValueReader } from "@scoregov/state-store";
import type { Caller } from "./caller.js";
import { classifyCaller, isAuthorizedCaller } from "./caller.js";
import { GovernanceError } from "./errors.js";
import type { ExecutionContext } from "./types.js";

const AUDITORS_KEY = "governance|auditors";

const eoaCodec = guardedCodec(isEoaAddress, "EOA address");

export class AuditorRegistry {
  private readonly _auditors: ArrayContainer<EoaAddress>;

  constructor(
    db: KeyValueReader,
    private readonly _genesisAddress: EoaAddress,
  ) {
    this._auditors = new ArrayContainer(AUDITORS_KEY, db, eoaCodec);
  }

  classify(address: EoaAddress): Caller {
    return classifyCaller(address, this._genesisAddress, (a) => this._auditors.includes(a));
  }

  isAuthorized(address: EoaAddress): boolean {
    return isAuthorizedCaller(this.classify(address));
  }

  /** Auditors in insertion order. */
  list(): EoaAddress[] {
    return this._auditors.toArray();
  }

  /**
   * @throws GovernanceError FORBIDDEN unless the caller is genesis
   * @throws GovernanceError INVALID_PARAMETER for a malformed, duplicate or genesis address
   */
  add(ctx: ExecutionContext, address: string): void {
    this._requireGenesis(ctx.from, "addAuditor");
    if (!isEoaAddress(address)) {
      throw new GovernanceError("INVALID_PARAMETER", `Invalid EOA address: ${address}`);
    }
    if (address === this._genesisAddress) {
      throw new GovernanceError("INVALID_PARAMETER", "Genesis is always an auditor");
    }
    if (this._auditors.includes(address)) {
      throw new GovernanceError("INVALID_PARAMETER", `Auditor already exists: ${address}`);
    }

    this._auditors.push(address);
    ctx.emit({ type: "AuditorAdded", address });
  }

  /**
   * @throws GovernanceError FORBIDDEN unless the caller is genesis
   * @throws GovernanceError NOT_FOUND when the address is not an auditor
   */
  remove(ctx: ExecutionContext, address: string): void {
    this._requireGenesis(ctx.from, "removeAuditor");
    const removed = this._removeMember(address);
    ctx.emit({ type: "AuditorRemoved", address: removed });
  }

  /**
   * Remove the calling auditor.
   *
   * @throws GovernanceError NOT_FOUND when the caller is not an auditor
   */
  selfRevoke(ctx: ExecutionContext): void {
    this._removeMember(ctx.from);
    ctx.emit({ type: "AuditorSelfRevoked", address: ctx.from });
  }

  private _removeMember(address: string): EoaAddress {
    const index = isEoaAddress(address) ? this._auditors.indexOf(address) : -1;
    if (index < 0) {
      throw new GovernanceError("NOT_FOUND", `Auditor not found: ${address}`);
    }
    return this._auditors.removeAt(index);
  }

  private _requireGenesis(address: EoaAddress, method: string): void {
    if (this.classify(address).kind !== "genesis") {
      throw new GovernanceError("FORBIDDEN", `${method} is restricted to genesis: ${address}`);
    }
  }
}
