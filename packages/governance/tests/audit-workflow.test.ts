/**
 * Tests for AuditWorkflow.
 *
 * Verifies:
 * - Accept / reject by auditors and genesis
 * - FORBIDDEN for other callers with the record unchanged
 * - Single resolution per proposal
 * - Activation at the following block
 */

import { describe, it, expect } from "vitest";
import type { ContractAddress } from "@scoregov/types";
import { GOVERNANCE_SCORE_ADDRESS, ZERO_SCORE_ADDRESS } from "@scoregov/types";
import { AuditorRegistry } from "../src/auditor-registry.js";
import { activationHeight, AuditWorkflow, isGovernanceSelfUpdate } from "../src/audit-workflow.js";
import { DeployStorage } from "../src/deploy-storage.js";
import { GovernanceError } from "../src/errors.js";
import { isAcceptedEvent, isRejectedEvent } from "../src/types.js";
import { ALICE, BOB, GENESIS, makeContext, openScope, txHash } from "./fixtures.js";

const SCORE: ContractAddress = `cx${"5".repeat(40)}`;
const DEPLOY_TX = txHash(1);

function setup(): { storage: DeployStorage; registry: AuditorRegistry; workflow: AuditWorkflow } {
  const { scope } = openScope();
  const storage = new DeployStorage(scope);
  const registry = new AuditorRegistry(scope, GENESIS);
  registry.add(makeContext(GENESIS), ALICE);
  storage.putTxParams({
    txHash: DEPLOY_TX,
    scoreAddress: SCORE,
    deployType: "install",
    owner: BOB,
    contentType: "application/zip",
    contentDigest: "0".repeat(64),
    params: {},
  });
  storage.proposeNext(SCORE, DEPLOY_TX, BOB);
  return { storage, registry, workflow: new AuditWorkflow(registry, storage) };
}

function codeOf(fn: () => void): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof GovernanceError) return err.code;
    throw err;
  }
  return undefined;
}

describe("AuditWorkflow", () => {
  describe("acceptScore", () => {
    it("auditor accepts a pending deployment", () => {
      const { storage, workflow } = setup();
      const ctx = makeContext(ALICE, txHash(50), 7);

      expect(workflow.acceptScore(ctx, DEPLOY_TX)).toBe(txHash(50));
      expect(storage.get(SCORE)).toEqual({
        scoreAddress: SCORE,
        owner: BOB,
        current: { status: "active", deployTxHash: DEPLOY_TX, auditTxHash: txHash(50), activeFrom: 8 },
      });
      expect(ctx.events).toEqual([{ type: "Accepted", txHash: DEPLOY_TX }]);
      expect(ctx.events.filter(isRejectedEvent)).toEqual([]);
    });

    it("genesis may accept", () => {
      const { storage, workflow } = setup();
      workflow.acceptScore(makeContext(GENESIS, txHash(50)), DEPLOY_TX);

      expect(storage.get(SCORE)?.current?.status).toBe("active");
    });

    it("non-auditor is FORBIDDEN and the record is unchanged", () => {
      const { storage, workflow } = setup();
      const before = storage.get(SCORE);
      const ctx = makeContext(BOB, txHash(50));

      expect(codeOf(() => workflow.acceptScore(ctx, DEPLOY_TX))).toBe("FORBIDDEN");
      expect(storage.get(SCORE)).toEqual(before);
      expect(ctx.events).toEqual([]);
    });

    it("unknown tx hash is NOT_FOUND", () => {
      const { workflow } = setup();
      expect(codeOf(() => workflow.acceptScore(makeContext(ALICE), txHash(77)))).toBe("NOT_FOUND");
    });

    it("second resolution is INVALID_STATE", () => {
      const { workflow } = setup();
      workflow.acceptScore(makeContext(ALICE, txHash(50)), DEPLOY_TX);

      expect(codeOf(() => workflow.acceptScore(makeContext(ALICE, txHash(51)), DEPLOY_TX))).toBe(
        "INVALID_STATE",
      );
      expect(codeOf(() => workflow.rejectScore(makeContext(ALICE, txHash(52)), DEPLOY_TX, "late"))).toBe(
        "INVALID_STATE",
      );
    });
  });

  describe("rejectScore", () => {
    it("auditor rejects a pending deployment", () => {
      const { storage, workflow } = setup();
      const ctx = makeContext(ALICE, txHash(60));

      expect(workflow.rejectScore(ctx, DEPLOY_TX, "bad code")).toBe(txHash(60));
      expect(storage.get(SCORE)?.next).toEqual({
        status: "rejected",
        deployTxHash: DEPLOY_TX,
        auditTxHash: txHash(60),
      });
      expect(ctx.events).toEqual([{ type: "Rejected", txHash: DEPLOY_TX, reason: "bad code" }]);
      expect(ctx.events.filter(isAcceptedEvent)).toEqual([]);
      expect(ctx.events.filter(isRejectedEvent).map((e) => e.reason)).toEqual(["bad code"]);
    });

    it("requires a non-empty reason", () => {
      const { storage, workflow } = setup();

      expect(codeOf(() => workflow.rejectScore(makeContext(ALICE), DEPLOY_TX, "  "))).toBe("INVALID_PARAMETER");
      expect(storage.get(SCORE)?.next?.status).toBe("pending");
    });

    it("non-auditor is FORBIDDEN", () => {
      const { storage, workflow } = setup();
      expect(codeOf(() => workflow.rejectScore(makeContext(BOB), DEPLOY_TX, "no"))).toBe("FORBIDDEN");
      expect(storage.get(SCORE)?.next?.status).toBe("pending");
    });

    it("accept after reject is INVALID_STATE", () => {
      const { workflow } = setup();
      workflow.rejectScore(makeContext(ALICE, txHash(60)), DEPLOY_TX, "bad code");

      expect(codeOf(() => workflow.acceptScore(makeContext(ALICE, txHash(61)), DEPLOY_TX))).toBe(
        "INVALID_STATE",
      );
    });
  });

  describe("helpers", () => {
    it("isGovernanceSelfUpdate matches only the governance address", () => {
      expect(isGovernanceSelfUpdate(GOVERNANCE_SCORE_ADDRESS)).toBe(true);
      expect(isGovernanceSelfUpdate(ZERO_SCORE_ADDRESS)).toBe(false);
      expect(isGovernanceSelfUpdate(`cx${"0".repeat(38)}11`)).toBe(false);
    });

    it("activation is the following block", () => {
      expect(activationHeight(0)).toBe(1);
      expect(activationHeight(41)).toBe(42);
    });
  });
});
