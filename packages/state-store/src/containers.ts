/**
 * @scoregov/state-store — Typed state containers.
 *
 * Structured views over the flat key space:
 * - VarContainer<T>:   a single value at `name`
 * - DictContainer<T>:  values at `name|key`
 * - ArrayContainer<T>: an ordered list at `name|size` + `name|<index>`
 *
 * Containers read through any KeyValueReader. Mutating methods require
 * a KeyValueWriter and throw READ_ONLY when handed a snapshot, so a
 * read-only call can never write.
 */

import { canonicalize } from "json-canonicalize";
import type { JsonValue } from "@scoregov/types";
import type { KeyValueReader, KeyValueWriter } from "./types.js";
import { isWriter, StateStoreError } from "./types.js";

// =============================================================================
// Codecs
// =============================================================================

/**
 * Converts between a domain value and its stored JSON form.
 */
export interface Codec<T> {
  encode(value: T): JsonValue;
  /** @throws StateStoreError CORRUPT_VALUE when `raw` is not a valid T */
  decode(raw: JsonValue, key: string): T;
}

/**
 * Codec for JSON-compatible values validated by a type guard on read.
 */
export function guardedCodec<T extends JsonValue>(
  guard: (value: unknown) => value is T,
  label: string,
): Codec<T> {
  return {
    encode: (value) => value,
    decode: (raw, key) => {
      if (!guard(raw)) {
        throw new StateStoreError("CORRUPT_VALUE", `Stored value at "${key}" is not a valid ${label}`, key);
      }
      return raw;
    },
  };
}

export const stringCodec: Codec<string> = guardedCodec(
  (value): value is string => typeof value === "string",
  "string",
);

export const integerCodec: Codec<number> = guardedCodec(
  (value): value is number => typeof value === "number" && Number.isSafeInteger(value),
  "integer",
);

function requireWriter(db: KeyValueReader, name: string): KeyValueWriter {
  if (!isWriter(db)) {
    throw new StateStoreError("READ_ONLY", `Container "${name}" is read-only in this context`);
  }
  return db;
}

// =============================================================================
// VarContainer
// =============================================================================

export class VarContainer<T> {
  constructor(
    private readonly _name: string,
    private readonly _db: KeyValueReader,
    private readonly _codec: Codec<T>,
  ) {}

  get(): T | undefined {
    const raw = this._db.get(this._name);
    return raw === undefined ? undefined : this._codec.decode(raw, this._name);
  }

  set(value: T): void {
    requireWriter(this._db, this._name).put(this._name, this._codec.encode(value));
  }

  remove(): void {
    requireWriter(this._db, this._name).delete(this._name);
  }
}

// =============================================================================
// DictContainer
// =============================================================================

export class DictContainer<T> {
  constructor(
    private readonly _name: string,
    private readonly _db: KeyValueReader,
    private readonly _codec: Codec<T>,
  ) {}

  get(key: string): T | undefined {
    const dbKey = this._key(key);
    const raw = this._db.get(dbKey);
    return raw === undefined ? undefined : this._codec.decode(raw, dbKey);
  }

  has(key: string): boolean {
    return this._db.has(this._key(key));
  }

  set(key: string, value: T): void {
    requireWriter(this._db, this._name).put(this._key(key), this._codec.encode(value));
  }

  remove(key: string): void {
    requireWriter(this._db, this._name).delete(this._key(key));
  }

  private _key(key: string): string {
    return `${this._name}|${key}`;
  }
}

// =============================================================================
// ArrayContainer
// =============================================================================

export class ArrayContainer<T> {
  private readonly _sizeKey: string;

  constructor(
    private readonly _name: string,
    private readonly _db: KeyValueReader,
    private readonly _codec: Codec<T>,
  ) {
    this._sizeKey = `${_name}|size`;
  }

  get length(): number {
    const raw = this._db.get(this._sizeKey);
    return raw === undefined ? 0 : integerCodec.decode(raw, this._sizeKey);
  }

  /**
   * Element at `index`.
   *
   * @throws RangeError when out of bounds
   */
  get(index: number): T {
    const length = this.length;
    if (!Number.isInteger(index) || index < 0 || index >= length) {
      throw new RangeError(`Index ${index} out of range for "${this._name}" (length ${length})`);
    }
    const key = this._indexKey(index);
    const raw = this._db.get(key);
    if (raw === undefined) {
      throw new StateStoreError("CORRUPT_VALUE", `Missing element at "${key}"`, key);
    }
    return this._codec.decode(raw, key);
  }

  toArray(): T[] {
    const out: T[] = [];
    const length = this.length;
    for (let i = 0; i < length; i++) {
      out.push(this.get(i));
    }
    return out;
  }

  /** Index of the first element equal to `value` (by encoded form), or -1 */
  indexOf(value: T): number {
    const target = canonicalize(this._codec.encode(value));
    const length = this.length;
    for (let i = 0; i < length; i++) {
      const raw = this._db.get(this._indexKey(i));
      if (raw !== undefined && canonicalize(raw) === target) {
        return i;
      }
    }
    return -1;
  }

  includes(value: T): boolean {
    return this.indexOf(value) >= 0;
  }

  push(value: T): void {
    const db = requireWriter(this._db, this._name);
    const length = this.length;
    db.put(this._indexKey(length), this._codec.encode(value));
    db.put(this._sizeKey, length + 1);
  }

  pop(): T | undefined {
    const length = this.length;
    if (length === 0) {
      return undefined;
    }
    const last = this.get(length - 1);
    const db = requireWriter(this._db, this._name);
    db.delete(this._indexKey(length - 1));
    db.put(this._sizeKey, length - 1);
    return last;
  }

  /**
   * Remove the element at `index`, shifting later elements down.
   * Order of the remaining elements is preserved.
   */
  removeAt(index: number): T {
    const removed = this.get(index);
    const db = requireWriter(this._db, this._name);
    const length = this.length;
    for (let i = index; i < length - 1; i++) {
      const raw = db.get(this._indexKey(i + 1));
      if (raw === undefined) {
        throw new StateStoreError("CORRUPT_VALUE", `Missing element at "${this._indexKey(i + 1)}"`);
      }
      db.put(this._indexKey(i), raw);
    }
    db.delete(this._indexKey(length - 1));
    db.put(this._sizeKey, length - 1);
    return removed;
  }

  private _indexKey(index: number): string {
    return `${this._name}|${index}`;
  }
}
