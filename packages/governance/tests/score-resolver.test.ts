/**
 * Tests for resolveCallable.
 */

import { describe, it, expect } from "vitest";
import type { ContractAddress } from "@scoregov/types";
import { DeployStorage } from "../src/deploy-storage.js";
import { GovernanceError } from "../src/errors.js";
import { resolveCallable } from "../src/score-resolver.js";
import { ALICE, openScope, txHash } from "./fixtures.js";

const SCORE: ContractAddress = `cx${"5".repeat(40)}`;

function codeOf(fn: () => void): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof GovernanceError) return err.code;
    throw err;
  }
  return undefined;
}

describe("resolveCallable", () => {
  it("resolves active code from its activation height", () => {
    const { scope } = openScope();
    const storage = new DeployStorage(scope);
    storage.proposeNext(SCORE, txHash(1), ALICE);
    storage.resolveAccept(SCORE, txHash(1), txHash(2), 5);

    expect(codeOf(() => resolveCallable(scope, SCORE, 4))).toBe("INVALID_STATE");
    expect(resolveCallable(scope, SCORE, 5)).toEqual({ address: SCORE, deployTxHash: txHash(1) });
  });

  it("keeps routing to current code while an update is pending", () => {
    const { scope } = openScope();
    const storage = new DeployStorage(scope);
    storage.proposeNext(SCORE, txHash(1), ALICE);
    storage.resolveAccept(SCORE, txHash(1), txHash(2), 1);
    storage.proposeNext(SCORE, txHash(3), ALICE);

    expect(resolveCallable(scope, SCORE, 2).deployTxHash).toBe(txHash(1));
  });

  it("inactive code is INVALID_STATE", () => {
    const { scope } = openScope();
    scope.put(`deploy|info|${SCORE}`, {
      scoreAddress: SCORE,
      owner: ALICE,
      current: { status: "inactive", deployTxHash: txHash(1), activeFrom: 0 },
    });

    expect(() => resolveCallable(scope, SCORE, 3)).toThrow(`SCORE is inactive: ${SCORE}`);
  });

  it("unknown SCORE is NOT_FOUND", () => {
    const { scope } = openScope();
    expect(codeOf(() => resolveCallable(scope, SCORE, 1))).toBe("NOT_FOUND");
  });
});
