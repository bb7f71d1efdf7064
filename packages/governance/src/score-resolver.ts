/**
 * @scoregov/governance — SCORE resolver.
 *
 * Decides whether the engine may route a call to a SCORE at a given
 * block height. The VM that runs the code is outside this package.
 */

import type { ContractAddress, TxHash } from "@scoregov/types";
import type { KeyValueReader } from "@scoregov/state-store";
import { DeployStorage } from "./deploy-storage.js";
import { GovernanceError } from "./errors.js";

export interface CallableScore {
  readonly address: ContractAddress;
  readonly deployTxHash: TxHash;
}

/**
 * @throws GovernanceError NOT_FOUND when the SCORE has no current code
 * @throws GovernanceError INVALID_STATE when the code is inactive or not yet active at `height`
 */
export function resolveCallable(
  db: KeyValueReader,
  address: ContractAddress,
  height: number,
): CallableScore {
  const current = new DeployStorage(db).get(address)?.current;
  if (current === undefined) {
    throw new GovernanceError("NOT_FOUND", `SCORE is not deployed: ${address}`);
  }
  if (current.status === "inactive") {
    throw new GovernanceError("INVALID_STATE", `SCORE is inactive: ${address}`);
  }
  if (height < current.activeFrom) {
    throw new GovernanceError(
      "INVALID_STATE",
      `SCORE ${address} is active from block ${current.activeFrom}, not ${height}`,
    );
  }
  return { address, deployTxHash: current.deployTxHash };
}
