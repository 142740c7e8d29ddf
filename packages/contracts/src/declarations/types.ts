import type { Expr } from "../predicate/ast.js";
import type { ProtocolState } from "../protocol/protocol.js";

export type ClauseKind = "requires" | "ensures" | "invariant";

/** `declared` clauses come from the user; `protocol` clauses from a transition. */
export type ClauseOrigin = "declared" | "protocol";

export type OperationKind = "method" | "getter" | "constructor" | "function";

export type Visibility = "public" | "private";

/** A predicate as source text or as an already-built tree. */
export type PredicateInput = string | Expr;

/**
 * Who a clause belongs to. Invariants name only a type; Requires and
 * Ensures name an operation (and its type, unless it is a free function).
 */
export interface ClauseOwner {
  readonly type?: string;
  readonly operation?: string;
}

export interface OperationRef {
  readonly type?: string;
  readonly operation: string;
}

export interface ContractClause {
  /** Stable identifier, e.g. `Solver.compute#ensures[0]` */
  readonly id: string;
  readonly kind: ClauseKind;
  readonly owner: ClauseOwner;
  readonly expr: Expr;
  /** Source text as declared (or as printed for built trees) */
  readonly text: string;
  readonly message?: string;
  readonly origin: ClauseOrigin;
}

export interface ParameterSpec {
  readonly name: string;
  /** Declared type name, used by the static verifier to resolve callees */
  readonly type?: string;
}

export interface OperationContract {
  readonly type?: string;
  readonly name: string;
  /** `Type.name`, or just `name` for free functions */
  readonly qualifiedName: string;
  readonly kind: OperationKind;
  readonly visibility: Visibility;
  readonly params: readonly ParameterSpec[];
  /** Declared return type name */
  readonly returns?: string;
  readonly requires: readonly ContractClause[];
  readonly ensures: readonly ContractClause[];
}

export interface TypeContract {
  readonly name: string;
  readonly invariants: readonly ContractClause[];
  readonly operations: ReadonlyMap<string, OperationContract>;
  readonly privateMembers: ReadonlySet<string>;
  readonly protocol?: ProtocolState;
}

/** Ordered clause lists governing one operation. */
export interface OperationClauses {
  readonly requires: readonly ContractClause[];
  readonly ensures: readonly ContractClause[];
  /** Invariants of the owning type (empty for free functions) */
  readonly invariants: readonly ContractClause[];
}

export interface OperationSpec {
  kind?: OperationKind;
  visibility?: Visibility;
  params?: ReadonlyArray<string | ParameterSpec>;
  returns?: string;
}

export interface TypeSpec {
  privateMembers?: Iterable<string>;
  protocol?: ProtocolState;
}

export function qualify(type: string | undefined, operation: string): string {
  return type ? `${type}.${operation}` : operation;
}
