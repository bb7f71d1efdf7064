/**
 * @scoregov/governance — Deterministic replay.
 *
 * Re-executes a block log on a fresh store. Two nodes replaying the same
 * log reach the same state roots.
 */

import type { Transaction } from "@scoregov/types";
import { VersionedStateStore } from "@scoregov/state-store";
import { TransactionExecutor } from "./executor.js";
import type { ExecutedBlock } from "./executor.js";
import type { GovernanceConfig } from "./types.js";

export interface ReplayResult {
  readonly blocks: readonly ExecutedBlock[];
  readonly stateRoots: readonly string[];
  readonly executor: TransactionExecutor;
}

/**
 * Replay `blocks` from genesis; `blocks[i]` runs at height i.
 */
export function replay(config: GovernanceConfig, blocks: readonly (readonly Transaction[])[]): ReplayResult {
  const executor = new TransactionExecutor(new VersionedStateStore(), config);
  const executed = blocks.map((txs, height) => executor.executeBlock(height, txs));
  return {
    blocks: executed,
    stateRoots: executed.map((block) => block.stateRoot),
    executor,
  };
}
