/**
 * @scoregov/governance — Errors.
 *
 * Every governance operation either commits all of its writes or throws
 * a GovernanceError and commits none.
 */

/**
 * Error kinds raised by the governance contract.
 */
export type GovernanceErrorCode =
  | "FORBIDDEN"
  | "NOT_FOUND"
  | "INVALID_STATE"
  | "INVALID_PARAMETER"
  | "ALREADY_PENDING"
  | "METHOD_NOT_FOUND";

export class GovernanceError extends Error {
  constructor(
    public readonly code: GovernanceErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "GovernanceError";
  }
}

export function isGovernanceError(error: unknown): error is GovernanceError {
  return error instanceof GovernanceError;
}
