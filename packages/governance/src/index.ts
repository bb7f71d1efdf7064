/**
 * @scoregov/governance — Built-in governance SCORE.
 *
 * Provides:
 * - AuditorRegistry: genesis-managed, ordered auditor list
 * - DeployStorage: per-SCORE current/next deployment records
 * - AuditWorkflow: acceptScore / rejectScore state machine
 * - DeployEngine: install/update submission path
 * - QueryFacade and ScoreResolver: readonly views
 * - GovernanceContract: method dispatch with zod parameter schemas
 * - TransactionExecutor and replay: sequential, deterministic execution
 *
 * @packageDocumentation
 */

// Types
export type {
  GovernanceConfig,
  ExecutionContext,
  GovernanceEvent,
  AcceptedEvent,
  RejectedEvent,
  AuditorAddedEvent,
  AuditorRemovedEvent,
  AuditorSelfRevokedEvent,
  DeployRequestedEvent,
  DeployedEvent,
} from "./types.js";
export { isAcceptedEvent, isRejectedEvent, isDeployedEvent } from "./types.js";

// Errors
export type { GovernanceErrorCode } from "./errors.js";
export { GovernanceError, isGovernanceError } from "./errors.js";

// Callers and auditors
export type { Caller } from "./caller.js";
export { classifyCaller, isAuthorizedCaller } from "./caller.js";
export { AuditorRegistry } from "./auditor-registry.js";

// Deployments
export { DeployStorage } from "./deploy-storage.js";
export { AuditWorkflow, isGovernanceSelfUpdate, activationHeight } from "./audit-workflow.js";
export type { DeployRequest } from "./deploy-engine.js";
export { DeployEngine, deriveInstallAddress, ZIP_CONTENT_TYPE } from "./deploy-engine.js";
export type { CallableScore } from "./score-resolver.js";
export { resolveCallable } from "./score-resolver.js";
export { QueryFacade } from "./query.js";

// Contract
export { GovernanceContract, GOVERNANCE_METHODS } from "./governance-contract.js";

// Execution
export type { ExecutedBlock } from "./executor.js";
export { TransactionExecutor, hashTransaction, toEventLog, INTERNAL_ERROR } from "./executor.js";
export type { ReplayResult } from "./replay.js";
export { replay } from "./replay.js";
