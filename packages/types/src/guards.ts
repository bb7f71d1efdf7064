/**
 * Runtime Type Guards
 *
 * Narrowing functions for deployment and chain types.
 * Used where values cross a boundary: decoding chain state,
 * JSON-RPC parameters, replay input.
 */

import { isContractAddress, isEoaAddress, isHexInt, isTxHash } from "./address.js";
import type {
  CurrentSlot,
  DeploymentRecord,
  DeployTxParams,
  NextSlot,
  DeploymentStatus,
  DeployType,
} from "./deployment.js";
import type { Transaction } from "./chain.js";

// =============================================================================
// Deployment guards
// =============================================================================

const DEPLOYMENT_STATUSES = new Set<string>(["pending", "active", "inactive", "rejected"]);
const DEPLOY_TYPES = new Set<string>(["install", "update"]);

export function isDeploymentStatus(value: unknown): value is DeploymentStatus {
  return typeof value === "string" && DEPLOYMENT_STATUSES.has(value);
}

export function isDeployType(value: unknown): value is DeployType {
  return typeof value === "string" && DEPLOY_TYPES.has(value);
}

export function isCurrentSlot(value: unknown): value is CurrentSlot {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    (v.status === "active" || v.status === "inactive") &&
    isTxHash(v.deployTxHash) &&
    (v.auditTxHash === undefined || isTxHash(v.auditTxHash)) &&
    typeof v.activeFrom === "number" &&
    Number.isInteger(v.activeFrom) &&
    v.activeFrom >= 0
  );
}

export function isNextSlot(value: unknown): value is NextSlot {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  if (!isTxHash(v.deployTxHash)) return false;
  if (v.status === "pending") {
    return v.auditTxHash === undefined;
  }
  return v.status === "rejected" && isTxHash(v.auditTxHash);
}

export function isDeploymentRecord(value: unknown): value is DeploymentRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  if (v.current === undefined && v.next === undefined) return false;
  return (
    isContractAddress(v.scoreAddress) &&
    isEoaAddress(v.owner) &&
    (v.current === undefined || isCurrentSlot(v.current)) &&
    (v.next === undefined || isNextSlot(v.next))
  );
}

export function isDeployTxParams(value: unknown): value is DeployTxParams {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isTxHash(v.txHash) &&
    isContractAddress(v.scoreAddress) &&
    isDeployType(v.deployType) &&
    isEoaAddress(v.owner) &&
    typeof v.contentType === "string" &&
    typeof v.contentDigest === "string" &&
    isStringRecord(v.params)
  );
}

// =============================================================================
// Transaction guards
// =============================================================================

export function isTransaction(value: unknown): value is Transaction {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  const envelopeOk =
    isEoaAddress(v.from) &&
    (isEoaAddress(v.to) || isContractAddress(v.to)) &&
    isHexInt(v.timestamp) &&
    (v.nonce === undefined || isHexInt(v.nonce));
  if (!envelopeOk || v.data === null || typeof v.data !== "object") return false;

  const data = v.data as Record<string, unknown>;
  if (v.dataType === "call") {
    return (
      typeof data.method === "string" &&
      data.method.length > 0 &&
      (data.params === undefined ||
        (data.params !== null && typeof data.params === "object" && !Array.isArray(data.params)))
    );
  }
  if (v.dataType === "deploy") {
    return (
      typeof data.contentType === "string" &&
      typeof data.content === "string" &&
      (data.params === undefined || isStringRecord(data.params))
    );
  }
  return false;
}

function isStringRecord(value: unknown): value is Record<string, string> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) return false;
  return Object.values(value).every((entry) => typeof entry === "string");
}
