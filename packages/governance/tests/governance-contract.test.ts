/**
 * Tests for GovernanceContract dispatch and parameter validation.
 */

import { describe, it, expect } from "vitest";
import { GOVERNANCE_SCORE_ADDRESS, ZERO_TX_HASH } from "@scoregov/types";
import { GovernanceContract, GOVERNANCE_METHODS } from "../src/governance-contract.js";
import { GovernanceError } from "../src/errors.js";
import { ALICE, BOB, CONFIG, GENESIS, makeContext, openScope, txHash } from "./fixtures.js";

function setup(): { contract: GovernanceContract; scope: ReturnType<typeof openScope>["scope"] } {
  const { scope } = openScope();
  const contract = new GovernanceContract(CONFIG);
  contract.loadBuiltin(scope);
  return { contract, scope };
}

function errorOf(fn: () => unknown): GovernanceError {
  try {
    fn();
  } catch (err) {
    if (err instanceof GovernanceError) return err;
    throw err;
  }
  throw new Error("expected a GovernanceError");
}

describe("GovernanceContract", () => {
  it("lists its methods", () => {
    expect(GOVERNANCE_METHODS).toEqual([
      "getScoreStatus",
      "getAuditors",
      "acceptScore",
      "rejectScore",
      "selfRevoke",
      "addAuditor",
      "removeAuditor",
    ]);
  });

  it("loads the built-in governance record owned by genesis", () => {
    const { contract, scope } = setup();
    expect(contract.query(scope, "getScoreStatus", { address: GOVERNANCE_SCORE_ADDRESS })).toEqual({
      current: { status: "active", deployTxHash: ZERO_TX_HASH },
    });
  });

  describe("invoke", () => {
    it("dispatches auditor management", () => {
      const { contract, scope } = setup();
      expect(contract.invoke(scope, makeContext(GENESIS), "addAuditor", { address: ALICE })).toBeNull();
      expect(contract.invoke(scope, makeContext(GENESIS), "addAuditor", { address: BOB })).toBeNull();
      expect(contract.invoke(scope, makeContext(GENESIS), "removeAuditor", { address: ALICE })).toBeNull();
      expect(contract.invoke(scope, makeContext(BOB), "selfRevoke", undefined)).toBeNull();

      expect(contract.query(scope, "getAuditors", {})).toEqual([]);
    });

    it("runs readonly methods inside a transaction", () => {
      const { contract, scope } = setup();
      contract.invoke(scope, makeContext(GENESIS), "addAuditor", { address: ALICE });
      expect(contract.invoke(scope, makeContext(BOB), "getAuditors", undefined)).toEqual([ALICE]);
    });

    it("unknown method is METHOD_NOT_FOUND", () => {
      const { contract, scope } = setup();
      const err = errorOf(() => contract.invoke(scope, makeContext(GENESIS), "transfer", {}));
      expect(err.code).toBe("METHOD_NOT_FOUND");
      expect(err.message).toBe("Method not found: transfer");
    });

    it("missing parameter is INVALID_PARAMETER", () => {
      const { contract, scope } = setup();
      const err = errorOf(() => contract.invoke(scope, makeContext(ALICE), "acceptScore", {}));
      expect(err.code).toBe("INVALID_PARAMETER");
      expect(err.message).toBe("Invalid params for acceptScore: txHash: Expected a transaction hash (0x + 64 hex)");
    });

    it("extra parameter is INVALID_PARAMETER", () => {
      const { contract, scope } = setup();
      const err = errorOf(() =>
        contract.invoke(scope, makeContext(GENESIS), "addAuditor", { address: ALICE, weight: "1" }),
      );
      expect(err.code).toBe("INVALID_PARAMETER");
      expect(contract.query(scope, "getAuditors", {})).toEqual([]);
    });

    it("wrongly encoded parameters are INVALID_PARAMETER", () => {
      const { contract, scope } = setup();
      const cases: [string, unknown][] = [
        ["addAuditor", { address: `cx${"1".repeat(40)}` }],
        ["acceptScore", { txHash: "0x1234" }],
        ["acceptScore", { txHash: `0x${"A".repeat(64)}` }],
        ["rejectScore", { txHash: txHash(1) }],
        ["selfRevoke", { address: ALICE }],
        ["addAuditor", [ALICE]],
      ];
      for (const [method, params] of cases) {
        expect(errorOf(() => contract.invoke(scope, makeContext(GENESIS), method, params)).code).toBe(
          "INVALID_PARAMETER",
        );
      }
    });

    it("authorization errors pass through", () => {
      const { contract, scope } = setup();
      expect(errorOf(() => contract.invoke(scope, makeContext(BOB), "addAuditor", { address: ALICE })).code).toBe(
        "FORBIDDEN",
      );
      expect(errorOf(() => contract.invoke(scope, makeContext(BOB), "acceptScore", { txHash: txHash(1) })).code).toBe(
        "FORBIDDEN",
      );
    });
  });

  describe("query", () => {
    it("mutating methods are not visible", () => {
      const { contract, scope } = setup();
      const err = errorOf(() => contract.query(scope, "addAuditor", { address: ALICE }));
      expect(err.code).toBe("METHOD_NOT_FOUND");
      expect(err.message).toBe("Readonly method not found: addAuditor");
    });

    it("unknown SCORE is NOT_FOUND", () => {
      const { contract, scope } = setup();
      expect(errorOf(() => contract.query(scope, "getScoreStatus", { address: `cx${"7".repeat(40)}` })).code).toBe(
        "NOT_FOUND",
      );
    });

    it("validates readonly parameters", () => {
      const { contract, scope } = setup();
      expect(errorOf(() => contract.query(scope, "getScoreStatus", { address: ALICE })).code).toBe(
        "INVALID_PARAMETER",
      );
    });
  });
});
