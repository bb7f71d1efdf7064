/**
 * Shared test fixtures for governance tests.
 */

import type { Address, EoaAddress, Transaction, TxHash } from "@scoregov/types";
import { VersionedStateStore } from "@scoregov/state-store";
import type { TransactionScope } from "@scoregov/state-store";
import type { ExecutionContext, GovernanceConfig, GovernanceEvent } from "../src/types.js";

export const GENESIS: EoaAddress = `hx${"a".repeat(40)}`;
export const ALICE: EoaAddress = `hx${"1".repeat(40)}`;
export const BOB: EoaAddress = `hx${"2".repeat(40)}`;
export const CAROL: EoaAddress = `hx${"3".repeat(40)}`;

export const CONFIG: GovernanceConfig = { genesisAddress: GENESIS, auditEnabled: true };

/** Deterministic tx hash for tests: 0x + n in 64 hex digits */
export function txHash(n: number): TxHash {
  return `0x${n.toString(16).padStart(64, "0")}`;
}

export interface TestContext extends ExecutionContext {
  readonly events: GovernanceEvent[];
}

export function makeContext(from: EoaAddress, hash: TxHash = txHash(1000), blockHeight = 1): TestContext {
  const events: GovernanceEvent[] = [];
  return {
    from,
    txHash: hash,
    blockHeight,
    events,
    emit: (event) => {
      events.push(event);
    },
  };
}

/** Open block 0 and a transaction scope on a fresh store. */
export function openScope(): { store: VersionedStateStore; scope: TransactionScope } {
  const store = new VersionedStateStore();
  const block = store.beginBlock(0);
  return { store, scope: block.beginTransaction() };
}

export const CONTENT = "0xcafe";

export function deployTx(from: EoaAddress, to: Address, timestamp: number, content = CONTENT): Transaction {
  return {
    from,
    to,
    timestamp: `0x${timestamp.toString(16)}`,
    dataType: "deploy",
    data: { contentType: "application/zip", content },
  };
}

export function callTx(
  from: EoaAddress,
  method: string,
  params: Record<string, string> | undefined,
  timestamp: number,
): Transaction {
  return {
    from,
    to: `cx${"0".repeat(39)}1`,
    timestamp: `0x${timestamp.toString(16)}`,
    dataType: "call",
    data: params === undefined ? { method } : { method, params },
  };
}
