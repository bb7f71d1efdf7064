/**
 * @scoregov/governance — Governance contract.
 *
 * Composition root and method dispatch for the built-in governance SCORE.
 * Each method has a zod schema for its named parameters; unknown, missing,
 * extra or wrongly encoded parameters are INVALID_PARAMETER, unknown
 * methods METHOD_NOT_FOUND.
 *
 * Mutating methods run against the caller's transaction scope; readonly
 * methods against any reader (normally a finalized snapshot). A mutating
 * method called through the readonly surface is METHOD_NOT_FOUND.
 */

import { z } from "zod";
import type { ZodError } from "zod";
import type { ContractAddress, EoaAddress, JsonValue, ScoreStatus, SlotStatus, TxHash } from "@scoregov/types";
import { GOVERNANCE_SCORE_ADDRESS, isContractAddress, isEoaAddress, isTxHash } from "@scoregov/types";
import type { KeyValueReader, KeyValueWriter } from "@scoregov/state-store";
import { AuditorRegistry } from "./auditor-registry.js";
import { AuditWorkflow } from "./audit-workflow.js";
import { DeployEngine } from "./deploy-engine.js";
import type { DeployRequest } from "./deploy-engine.js";
import { DeployStorage } from "./deploy-storage.js";
import { GovernanceError } from "./errors.js";
import { QueryFacade } from "./query.js";
import type { ExecutionContext, GovernanceConfig } from "./types.js";

// =============================================================================
// Parameter Schemas
// =============================================================================

const EoaAddressSchema = z.custom<EoaAddress>((v) => isEoaAddress(v), {
  message: "Expected an EOA address (hx + 40 hex)",
});

const ContractAddressSchema = z.custom<ContractAddress>((v) => isContractAddress(v), {
  message: "Expected a contract address (cx + 40 hex)",
});

const TxHashSchema = z.custom<TxHash>((v) => isTxHash(v), {
  message: "Expected a transaction hash (0x + 64 hex)",
});

export const GetScoreStatusParamsSchema = z.object({ address: ContractAddressSchema }).strict();
export const AcceptScoreParamsSchema = z.object({ txHash: TxHashSchema }).strict();
export const RejectScoreParamsSchema = z.object({ txHash: TxHashSchema, reason: z.string() }).strict();
export const AuditorParamsSchema = z.object({ address: EoaAddressSchema }).strict();
export const NoParamsSchema = z.object({}).strict();

// =============================================================================
// Method Tables
// =============================================================================

interface Components {
  readonly registry: AuditorRegistry;
  readonly storage: DeployStorage;
  readonly workflow: AuditWorkflow;
  readonly query: QueryFacade;
}

interface ReadonlyMethod {
  run(components: Components, params: unknown): JsonValue;
}

interface WriteMethod {
  run(components: Components, ctx: ExecutionContext, params: unknown): JsonValue;
}

function readonlyMethod<S extends z.ZodTypeAny>(
  name: string,
  schema: S,
  handler: (components: Components, params: z.infer<S>) => JsonValue,
): ReadonlyMethod {
  return { run: (components, params) => handler(components, parseParams(name, schema, params)) };
}

function writeMethod<S extends z.ZodTypeAny>(
  name: string,
  schema: S,
  handler: (components: Components, ctx: ExecutionContext, params: z.infer<S>) => JsonValue,
): WriteMethod {
  return { run: (components, ctx, params) => handler(components, ctx, parseParams(name, schema, params)) };
}

const READONLY_METHODS: ReadonlyMap<string, ReadonlyMethod> = new Map([
  [
    "getScoreStatus",
    readonlyMethod("getScoreStatus", GetScoreStatusParamsSchema, (c, p) =>
      scoreStatusToJson(c.query.getScoreStatus(p.address)),
    ),
  ],
  ["getAuditors", readonlyMethod("getAuditors", NoParamsSchema, (c) => c.query.getAuditors())],
]);

const WRITE_METHODS: ReadonlyMap<string, WriteMethod> = new Map([
  [
    "acceptScore",
    writeMethod("acceptScore", AcceptScoreParamsSchema, (c, ctx, p) => c.workflow.acceptScore(ctx, p.txHash)),
  ],
  [
    "rejectScore",
    writeMethod("rejectScore", RejectScoreParamsSchema, (c, ctx, p) =>
      c.workflow.rejectScore(ctx, p.txHash, p.reason),
    ),
  ],
  [
    "selfRevoke",
    writeMethod("selfRevoke", NoParamsSchema, (c, ctx) => {
      c.registry.selfRevoke(ctx);
      return null;
    }),
  ],
  [
    "addAuditor",
    writeMethod("addAuditor", AuditorParamsSchema, (c, ctx, p) => {
      c.registry.add(ctx, p.address);
      return null;
    }),
  ],
  [
    "removeAuditor",
    writeMethod("removeAuditor", AuditorParamsSchema, (c, ctx, p) => {
      c.registry.remove(ctx, p.address);
      return null;
    }),
  ],
]);

/** Names of all methods, readonly first. */
export const GOVERNANCE_METHODS: readonly string[] = [...READONLY_METHODS.keys(), ...WRITE_METHODS.keys()];

// =============================================================================
// Contract
// =============================================================================

export class GovernanceContract {
  readonly address: ContractAddress = GOVERNANCE_SCORE_ADDRESS;

  constructor(private readonly _config: GovernanceConfig) {}

  /**
   * Run any method inside a transaction.
   *
   * @throws GovernanceError
   */
  invoke(db: KeyValueWriter, ctx: ExecutionContext, method: string, params: unknown): JsonValue {
    const components = this._components(db);
    const readonly = READONLY_METHODS.get(method);
    if (readonly !== undefined) {
      return readonly.run(components, params);
    }
    const write = WRITE_METHODS.get(method);
    if (write === undefined) {
      throw new GovernanceError("METHOD_NOT_FOUND", `Method not found: ${method}`);
    }
    return write.run(components, ctx, params);
  }

  /**
   * Run a readonly method. Mutating methods are not visible here.
   *
   * @throws GovernanceError
   */
  query(db: KeyValueReader, method: string, params: unknown): JsonValue {
    const readonly = READONLY_METHODS.get(method);
    if (readonly === undefined) {
      throw new GovernanceError("METHOD_NOT_FOUND", `Readonly method not found: ${method}`);
    }
    return readonly.run(this._components(db), params);
  }

  /**
   * Handle a deploy transaction. Returns the target SCORE address.
   *
   * @throws GovernanceError
   */
  deploy(db: KeyValueWriter, ctx: ExecutionContext, request: DeployRequest): ContractAddress {
    return new DeployEngine(new DeployStorage(db), this._config).submit(ctx, request);
  }

  /**
   * Record the built-in governance code at genesis, owned by genesis.
   */
  loadBuiltin(db: KeyValueWriter): void {
    new DeployStorage(db).putBuiltin(this.address, this._config.genesisAddress);
  }

  private _components(db: KeyValueReader): Components {
    const registry = new AuditorRegistry(db, this._config.genesisAddress);
    const storage = new DeployStorage(db);
    return {
      registry,
      storage,
      workflow: new AuditWorkflow(registry, storage),
      query: new QueryFacade(db, registry),
    };
  }
}

// =============================================================================
// Helpers
// =============================================================================

function parseParams<S extends z.ZodTypeAny>(method: string, schema: S, params: unknown): z.infer<S> {
  const result = schema.safeParse(params ?? {});
  if (!result.success) {
    throw new GovernanceError("INVALID_PARAMETER", `Invalid params for ${method}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

function slotToJson(slot: SlotStatus): JsonValue {
  const out: Record<string, JsonValue> = { status: slot.status, deployTxHash: slot.deployTxHash };
  if (slot.auditTxHash !== undefined) {
    out.auditTxHash = slot.auditTxHash;
  }
  return out;
}

function scoreStatusToJson(status: ScoreStatus): JsonValue {
  const out: Record<string, JsonValue> = {};
  if (status.current !== undefined) {
    out.current = slotToJson(status.current);
  }
  if (status.next !== undefined) {
    out.next = slotToJson(status.next);
  }
  return out;
}
