/**
 * Contract Error Types
 *
 * Specialized error classes for contract violations and for contracts that
 * cannot be declared as written. Violations carry the failing clause, the
 * qualified operation name, the call arguments and a shallow snapshot of
 * the instance taken when the clause failed.
 */

import type { ContractClause } from "../declarations/types.js";

export type ContractKind = "precondition" | "postcondition" | "invariant";

/**
 * Base class for everything the contract engine throws.
 */
export class ContractError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ContractError";
  }
}

/**
 * Call context attached to a violation.
 */
export interface ViolationDetails {
  /** Qualified operation name, e.g. `Solver.compute` */
  operation: string;
  clause: ContractClause;
  args: readonly unknown[];
  /** Own enumerable properties of the receiver when the clause failed */
  instance?: Readonly<Record<string, unknown>>;
  /** The value the operation returned (postconditions and invariants only) */
  result?: unknown;
}

/**
 * A clause evaluated to false at a call boundary.
 */
export abstract class ContractViolation extends ContractError {
  abstract readonly kind: ContractKind;
  readonly operation: string;
  readonly clause: ContractClause;
  readonly args: readonly unknown[];
  readonly instance?: Readonly<Record<string, unknown>>;
  readonly result?: unknown;

  constructor(message: string, details: ViolationDetails) {
    super(message);
    this.operation = details.operation;
    this.clause = details.clause;
    this.args = details.args;
    this.instance = details.instance;
    this.result = details.result;
  }

  /** Source text of the failed predicate */
  get predicate(): string {
    return this.clause.text;
  }
}

/**
 * Thrown when a precondition (requires) is violated: the caller broke the
 * declared protocol.
 */
export class PreconditionViolation extends ContractViolation {
  readonly kind = "precondition" as const;

  constructor(details: ViolationDetails) {
    super(
      `Precondition failed for ${details.operation}: ${details.clause.message ?? details.clause.text}`,
      details
    );
    this.name = "PreconditionViolation";
  }
}

/**
 * Thrown when a postcondition (ensures) is violated: the implementation did
 * not establish what it promised.
 */
export class PostconditionViolation extends ContractViolation {
  readonly kind = "postcondition" as const;

  constructor(details: ViolationDetails, message?: string) {
    super(
      message ??
        `Postcondition failed for ${details.operation}: ${details.clause.message ?? details.clause.text}`,
      details
    );
    this.name = "PostconditionViolation";
  }
}

/**
 * Thrown when a type invariant does not hold after a public operation.
 */
export class InvariantViolation extends ContractViolation {
  readonly kind = "invariant" as const;

  constructor(details: ViolationDetails) {
    super(
      `Invariant failed after ${details.operation}: ${details.clause.message ?? details.clause.text}`,
      details
    );
    this.name = "InvariantViolation";
  }
}

/**
 * Thrown when a predicate's source text is not a supported expression.
 */
export class PredicateSyntaxError extends ContractError {
  constructor(
    message: string,
    public readonly source: string
  ) {
    super(`${message} in predicate \`${source}\``);
    this.name = "PredicateSyntaxError";
  }
}

/**
 * Thrown at registration time when a clause or operation cannot be
 * declared as written.
 */
export class ContractDeclarationError extends ContractError {
  constructor(message: string) {
    super(message);
    this.name = "ContractDeclarationError";
  }
}

/**
 * Thrown by defineProtocol() for an inconsistent state model.
 */
export class ProtocolDefinitionError extends ContractError {
  constructor(message: string) {
    super(message);
    this.name = "ProtocolDefinitionError";
  }
}

/**
 * Thrown when configuration values are out of range.
 */
export class ContractConfigError extends ContractError {
  constructor(message: string) {
    super(message);
    this.name = "ContractConfigError";
  }
}
