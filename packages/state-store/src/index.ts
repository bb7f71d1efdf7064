/**
 * @scoregov/state-store — Versioned transactional chain state.
 *
 * Provides:
 * - KeyValueReader / KeyValueWriter access interfaces
 * - VersionedStateStore with block and transaction scopes
 * - Immutable snapshots of finalized heights
 * - Chained state roots for replay verification
 * - Typed Var / Dict / Array containers over the key space
 *
 * @packageDocumentation
 */

// Core types
export type {
  KeyValueReader,
  KeyValueWriter,
  BlockCommitResult,
  VersionedStateStoreOptions,
  StateStoreErrorCode,
} from "./types.js";
export { StateStoreError, isWriter } from "./types.js";

// State roots
export { computeStateRoot, verifyRootChain, GENESIS_ROOT } from "./state-root.js";
export type { RootChainResult } from "./state-root.js";

// Store
export {
  VersionedStateStore,
  BlockScope,
  TransactionScope,
  StateSnapshot,
  DEFAULT_RETAINED_SNAPSHOTS,
} from "./versioned-store.js";

// Containers
export type { Codec } from "./containers.js";
export {
  VarContainer,
  DictContainer,
  ArrayContainer,
  guardedCodec,
  stringCodec,
  integerCodec,
} from "./containers.js";
