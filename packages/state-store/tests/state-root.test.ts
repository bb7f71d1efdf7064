/**
 * Tests for state root hashing and root chain verification.
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { computeStateRoot, verifyRootChain, GENESIS_ROOT } from "../src/state-root.js";
import { VersionedStateStore } from "../src/versioned-store.js";

describe("computeStateRoot", () => {
  it("is a 64-character hex digest", () => {
    expect(computeStateRoot(new Map([["a", '"1"']]), GENESIS_ROOT)).toMatch(/^[0-9a-f]{64}$/);
  });

  it("ignores insertion order", () => {
    const a = new Map([["x", "1"], ["y", "2"]]);
    const b = new Map([["y", "2"], ["x", "1"]]);
    expect(computeStateRoot(a, GENESIS_ROOT)).toBe(computeStateRoot(b, GENESIS_ROOT));
  });

  it("depends on the previous root", () => {
    const entries = new Map([["x", "1"]]);
    expect(computeStateRoot(entries, GENESIS_ROOT)).not.toBe(computeStateRoot(entries, "other"));
  });

  it("depends on values", () => {
    expect(computeStateRoot(new Map([["x", "1"]]), GENESIS_ROOT)).not.toBe(
      computeStateRoot(new Map([["x", "2"]]), GENESIS_ROOT),
    );
  });
});

describe("verifyRootChain", () => {
  it("accepts an empty chain", () => {
    expect(verifyRootChain([])).toEqual({ valid: true });
  });

  it("accepts roots produced by the store", () => {
    const store = new VersionedStateStore();
    const results = [0, 1, 2].map((height) => {
      const block = store.beginBlock(height);
      const tx = block.beginTransaction();
      tx.put(`k${height}`, height);
      tx.commit();
      return block.commit();
    });

    expect(verifyRootChain(results)).toEqual({ valid: true });
  });

  it("reports the first broken link", () => {
    const result = verifyRootChain([
      { height: 0, stateRoot: "r0", previousRoot: GENESIS_ROOT },
      { height: 1, stateRoot: "r1", previousRoot: "r0" },
      { height: 2, stateRoot: "r2", previousRoot: "tampered" },
    ]);
    expect(result).toEqual({ valid: false, brokenAt: 2 });
  });
});

describe("state root properties", () => {
  const arbWrites = fc.uniqueArray(
    fc.tuple(fc.stringMatching(/^[a-z]{1,6}$/), fc.integer()),
    { selector: ([key]) => key, minLength: 1, maxLength: 15 },
  );

  it("any permutation of the same writes yields the same root", () => {
    fc.assert(
      fc.property(arbWrites, fc.integer({ min: 0, max: 1000 }), (writes, seed) => {
        const rotated = writes.map((_, i) => writes[(i + seed) % writes.length]!);

        const rootOf = (entries: readonly (readonly [string, number])[]): string => {
          const store = new VersionedStateStore();
          const block = store.beginBlock(0);
          const tx = block.beginTransaction();
          for (const [key, value] of entries) {
            tx.put(key, value);
          }
          tx.commit();
          return block.commit().stateRoot;
        };

        expect(rootOf(rotated)).toBe(rootOf(writes));
      }),
      { numRuns: 50 },
    );
  });

  it("a rolled back transaction never changes the root", () => {
    fc.assert(
      fc.property(arbWrites, (writes) => {
        const clean = new VersionedStateStore();
        const cleanRoot = clean.beginBlock(0).commit().stateRoot;

        const dirty = new VersionedStateStore();
        const block = dirty.beginBlock(0);
        const tx = block.beginTransaction();
        for (const [key, value] of writes) {
          tx.put(key, value);
        }
        tx.rollback();

        expect(block.commit().stateRoot).toBe(cleanRoot);
      }),
      { numRuns: 30 },
    );
  });
});
