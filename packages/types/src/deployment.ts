/**
 * Deployment Types
 *
 * The per-SCORE deployment record. A record has two slots:
 * - current: the code the engine routes calls to (active or inactive)
 * - next:    a proposed install/update awaiting or after audit (pending or rejected)
 *
 * Each slot is its own tagged union, so a `current` slot can never be
 * pending and a `next` slot can never be active.
 */

import type { ContractAddress, EoaAddress, TxHash } from "./address.js";

// =============================================================================
// Status
// =============================================================================

export type CurrentStatus = "active" | "inactive";

export type NextStatus = "pending" | "rejected";

export type DeploymentStatus = CurrentStatus | NextStatus;

export type DeployType = "install" | "update";

// =============================================================================
// Slots
// =============================================================================

export interface ActiveSlot {
  readonly status: "active";
  readonly deployTxHash: TxHash;
  /** Absent when the code went live without an audit */
  readonly auditTxHash?: TxHash;
  /** First block height at which calls may be routed to this code */
  readonly activeFrom: number;
}

export interface InactiveSlot {
  readonly status: "inactive";
  readonly deployTxHash: TxHash;
  readonly auditTxHash?: TxHash;
  readonly activeFrom: number;
}

export type CurrentSlot = ActiveSlot | InactiveSlot;

export interface PendingSlot {
  readonly status: "pending";
  readonly deployTxHash: TxHash;
}

export interface RejectedSlot {
  readonly status: "rejected";
  readonly deployTxHash: TxHash;
  readonly auditTxHash: TxHash;
}

export type NextSlot = PendingSlot | RejectedSlot;

// =============================================================================
// Record
// =============================================================================

/**
 * Deployment record keyed by SCORE address.
 *
 * Invariant: at least one of `current` / `next` is present.
 */
export interface DeploymentRecord {
  readonly scoreAddress: ContractAddress;
  readonly owner: EoaAddress;
  readonly current?: CurrentSlot;
  readonly next?: NextSlot;
}

/**
 * Parameters of a deploy transaction, keyed by its hash.
 */
export interface DeployTxParams {
  readonly txHash: TxHash;
  readonly scoreAddress: ContractAddress;
  readonly deployType: DeployType;
  readonly owner: EoaAddress;
  readonly contentType: string;
  /** SHA-256 of the submitted content; the code itself belongs to the VM */
  readonly contentDigest: string;
  readonly params: Readonly<Record<string, string>>;
}

// =============================================================================
// Query projection
// =============================================================================

export interface SlotStatus {
  readonly status: DeploymentStatus;
  readonly deployTxHash: TxHash;
  readonly auditTxHash?: TxHash;
}

/**
 * Answer of `getScoreStatus`.
 */
export interface ScoreStatus {
  readonly current?: SlotStatus;
  readonly next?: SlotStatus;
}
