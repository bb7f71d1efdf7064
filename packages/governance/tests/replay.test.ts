/**
 * Replay determinism tests.
 *
 * Random sequences of governance transactions, split into blocks, must
 * produce identical receipts and state roots on every replay.
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { EoaAddress, Transaction } from "@scoregov/types";
import { ZERO_SCORE_ADDRESS } from "@scoregov/types";
import { verifyRootChain } from "@scoregov/state-store";
import { replay } from "../src/replay.js";
import { hashTransaction } from "../src/executor.js";
import { ALICE, BOB, CAROL, CONFIG, GENESIS, callTx, deployTx } from "./fixtures.js";

const SENDERS: readonly EoaAddress[] = [GENESIS, ALICE, BOB, CAROL];

type Op =
  | { kind: "add" | "remove"; sender: number; target: number }
  | { kind: "selfRevoke"; sender: number }
  | { kind: "deploy"; sender: number }
  | { kind: "accept" | "reject"; sender: number; deploy: number };

const arbSender = fc.integer({ min: 0, max: SENDERS.length - 1 });

const arbOp: fc.Arbitrary<Op> = fc.oneof(
  fc.record({ kind: fc.constantFrom("add" as const, "remove" as const), sender: arbSender, target: arbSender }),
  fc.record({ kind: fc.constant("selfRevoke" as const), sender: arbSender }),
  fc.record({ kind: fc.constant("deploy" as const), sender: arbSender }),
  fc.record({
    kind: fc.constantFrom("accept" as const, "reject" as const),
    sender: arbSender,
    deploy: fc.nat({ max: 20 }),
  }),
);

function toBlocks(ops: readonly Op[], blockSize: number): Transaction[][] {
  const deploys: Transaction[] = [];
  const txs = ops.map((op, i): Transaction => {
    const from = SENDERS[op.sender]!;
    const timestamp = i + 1;
    switch (op.kind) {
      case "add":
        return callTx(from, "addAuditor", { address: SENDERS[op.target]! }, timestamp);
      case "remove":
        return callTx(from, "removeAuditor", { address: SENDERS[op.target]! }, timestamp);
      case "selfRevoke":
        return callTx(from, "selfRevoke", undefined, timestamp);
      case "deploy": {
        const tx = deployTx(from, ZERO_SCORE_ADDRESS, timestamp);
        deploys.push(tx);
        return tx;
      }
      case "accept":
      case "reject": {
        const target = deploys.length === 0 ? undefined : deploys[op.deploy % deploys.length];
        const txHash = target === undefined ? `0x${"f".repeat(64)}` : hashTransaction(target);
        return op.kind === "accept"
          ? callTx(from, "acceptScore", { txHash }, timestamp)
          : callTx(from, "rejectScore", { txHash, reason: "unsafe" }, timestamp);
      }
    }
  });

  const blocks: Transaction[][] = [[]];
  for (let i = 0; i < txs.length; i += blockSize) {
    blocks.push(txs.slice(i, i + blockSize));
  }
  return blocks;
}

describe("replay", () => {
  it("returns one state root per block", () => {
    const result = replay(CONFIG, [[], [callTx(GENESIS, "addAuditor", { address: ALICE }, 1)]]);
    expect(result.stateRoots.length).toBe(2);
    expect(result.executor.store.height).toBe(1);
  });

  it("replaying the same blocks yields identical roots and receipts", () => {
    fc.assert(
      fc.property(fc.array(arbOp, { maxLength: 40 }), fc.integer({ min: 1, max: 5 }), (ops, blockSize) => {
        const blocks = toBlocks(ops, blockSize);
        const first = replay(CONFIG, blocks);
        const second = replay(CONFIG, blocks);

        expect(second.stateRoots).toEqual(first.stateRoots);
        expect(second.blocks.map((b) => b.receipts)).toEqual(first.blocks.map((b) => b.receipts));
        expect(verifyRootChain(first.blocks)).toEqual({ valid: true });
      }),
      { numRuns: 40 },
    );
  });

  it("a different transaction order can yield a different state", () => {
    const add = callTx(GENESIS, "addAuditor", { address: ALICE }, 1);
    const remove = callTx(GENESIS, "removeAuditor", { address: ALICE }, 2);

    const forward = replay(CONFIG, [[], [add, remove]]);
    const backward = replay(CONFIG, [[], [remove, add]]);

    expect(forward.blocks[1]!.receipts.map((r) => r.status)).toEqual([1, 1]);
    expect(backward.blocks[1]!.receipts.map((r) => r.status)).toEqual([0, 1]);
    expect(forward.stateRoots[1]).not.toBe(backward.stateRoots[1]);
  });

  it("audit disabled activates installs on submission", () => {
    const install = deployTx(BOB, ZERO_SCORE_ADDRESS, 1);
    const result = replay({ ...CONFIG, auditEnabled: false }, [[], [install]]);

    expect(result.blocks[1]!.receipts[0]).toMatchObject({
      status: 1,
      eventLogs: [{ name: "DeployRequested(scoreAddress,txHash)" }, { name: "Deployed(scoreAddress,txHash)" }],
    });
  });
});
