/**
 * @scoregov/state-store — State root hashing.
 *
 * Each committed block produces a state root that covers the whole state
 * and links to the previous block's root:
 *
 *   root[0] = sha256("genesis" + entries[0])
 *   root[n] = sha256(root[n-1] + entries[n])
 *
 * Entries are hashed in sorted key order, so two nodes holding the same
 * state compute the same root regardless of write order.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";

/**
 * The previous root of the first committed block.
 */
export const GENESIS_ROOT = "genesis";

/**
 * Compute the state root of `entries` (key → canonical JSON) chained to
 * `previousRoot`.
 */
export function computeStateRoot(
  entries: ReadonlyMap<string, string>,
  previousRoot: string,
): string {
  const hash = createHash("sha256").update(previousRoot);
  const keys = [...entries.keys()].sort();
  for (const key of keys) {
    hash.update(canonicalize([key, entries.get(key)]));
  }
  return hash.digest("hex");
}

/**
 * Result of verifying a sequence of block roots.
 */
export interface RootChainResult {
  readonly valid: boolean;
  /** Height of the first block whose previousRoot does not link, if any */
  readonly brokenAt?: number;
}

/**
 * Verify that each block's previousRoot equals the root of the block before it.
 *
 * @param blocks - Blocks in height order
 */
export function verifyRootChain(
  blocks: readonly { readonly height: number; readonly stateRoot: string; readonly previousRoot: string }[],
): RootChainResult {
  let expectedPrevious = GENESIS_ROOT;
  for (const block of blocks) {
    if (block.previousRoot !== expectedPrevious) {
      return { valid: false, brokenAt: block.height };
    }
    expectedPrevious = block.stateRoot;
  }
  return { valid: true };
}
