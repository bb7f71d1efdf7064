/**
 * @scoregov/governance — Core types.
 *
 * Execution context handed to the contract by the executor, the
 * governance events it emits, and the node-level configuration that
 * changes contract behavior.
 *
 * Design:
 * - All types are readonly
 * - Events are a discriminated union; the executor turns them into
 *   receipt event logs only when the transaction commits
 * - Nothing here reads the wall clock
 */

import type { ContractAddress, EoaAddress, TxHash } from "@scoregov/types";

// =============================================================================
// Configuration
// =============================================================================

export interface GovernanceConfig {
  /** The privileged bootstrap identity */
  readonly genesisAddress: EoaAddress;

  /** When false, deployments activate on submission without audit */
  readonly auditEnabled: boolean;
}

// =============================================================================
// Execution Context
// =============================================================================

/**
 * What the executor knows about the transaction being applied.
 */
export interface ExecutionContext {
  /** Authenticated sender */
  readonly from: EoaAddress;

  /** Hash of the transaction being applied */
  readonly txHash: TxHash;

  /** Height of the block being executed */
  readonly blockHeight: number;

  /** Collects events; discarded if the transaction fails */
  emit(event: GovernanceEvent): void;
}

// =============================================================================
// Events
// =============================================================================

export type GovernanceEvent =
  | AcceptedEvent
  | RejectedEvent
  | AuditorAddedEvent
  | AuditorRemovedEvent
  | AuditorSelfRevokedEvent
  | DeployRequestedEvent
  | DeployedEvent;

export interface AcceptedEvent {
  readonly type: "Accepted";
  readonly txHash: TxHash;
}

export interface RejectedEvent {
  readonly type: "Rejected";
  readonly txHash: TxHash;
  readonly reason: string;
}

export interface AuditorAddedEvent {
  readonly type: "AuditorAdded";
  readonly address: EoaAddress;
}

export interface AuditorRemovedEvent {
  readonly type: "AuditorRemoved";
  readonly address: EoaAddress;
}

export interface AuditorSelfRevokedEvent {
  readonly type: "AuditorSelfRevoked";
  readonly address: EoaAddress;
}

export interface DeployRequestedEvent {
  readonly type: "DeployRequested";
  readonly scoreAddress: ContractAddress;
  readonly txHash: TxHash;
}

export interface DeployedEvent {
  readonly type: "Deployed";
  readonly scoreAddress: ContractAddress;
  readonly txHash: TxHash;
}

// =============================================================================
// Type Guards
// =============================================================================

export function isAcceptedEvent(e: GovernanceEvent): e is AcceptedEvent {
  return e.type === "Accepted";
}

export function isRejectedEvent(e: GovernanceEvent): e is RejectedEvent {
  return e.type === "Rejected";
}

export function isDeployedEvent(e: GovernanceEvent): e is DeployedEvent {
  return e.type === "Deployed";
}
