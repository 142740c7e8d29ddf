/**
 * Program Graph IR
 *
 * The static verifier never looks at source syntax. A frontend lowers each
 * operation body into a control-flow graph of basic blocks; values are
 * predicate expressions over locals, `this` and member chains, so the
 * analyzer interprets conditions with the same evaluator that checks
 * clauses.
 *
 * Calls are always statements of their own. Nested calls are lifted into
 * temporaries by the frontend, which also resolves each callee to a
 * declared operation where it can.
 */

import type { Expr, MemberExpr, OperationRef, RefExpr, SourceLocation } from "@covenant/contracts";

// ============================================================================
// Statements
// ============================================================================

export type BlockId = number;

/** `x = value` or `o.p = value` */
export interface AssignStatement {
  readonly kind: "assign";
  readonly target: RefExpr | MemberExpr;
  readonly value: Expr;
  readonly location: SourceLocation;
}

/**
 * A call to a method, getter, constructor or free function. `callee` is
 * set when the frontend resolved it to a declared operation.
 */
export interface CallStatement {
  readonly kind: "call";
  /** Local that receives the result */
  readonly target?: string;
  readonly callee?: OperationRef;
  /** Callee as written, for logs */
  readonly name: string;
  readonly receiver?: Expr;
  /** Static type of the receiver, when known */
  readonly receiverType?: string;
  readonly args: readonly Expr[];
  /** Static type of the result, when known */
  readonly resultType?: string;
  readonly location: SourceLocation;
}

/** The target takes a value nothing is known about. */
export interface HavocStatement {
  readonly kind: "havoc";
  readonly target: RefExpr | MemberExpr;
  readonly location: SourceLocation;
}

/** Every path fact is lost (catch and finally entries). */
export interface ForgetStatement {
  readonly kind: "forget";
  readonly location: SourceLocation;
}

export type Statement = AssignStatement | CallStatement | HavocStatement | ForgetStatement;

// ============================================================================
// Terminators
// ============================================================================

export interface GotoTerminator {
  readonly kind: "goto";
  readonly target: BlockId;
  readonly location: SourceLocation;
}

/** Two-way split; without a condition both edges are taken with no new fact. */
export interface BranchTerminator {
  readonly kind: "branch";
  readonly condition?: Expr;
  readonly then: BlockId;
  readonly else: BlockId;
  readonly location: SourceLocation;
}

export interface ReturnTerminator {
  readonly kind: "return";
  readonly value?: Expr;
  readonly location: SourceLocation;
}

export interface ThrowTerminator {
  readonly kind: "throw";
  readonly location: SourceLocation;
}

export type Terminator = GotoTerminator | BranchTerminator | ReturnTerminator | ThrowTerminator;

// ============================================================================
// Graph
// ============================================================================

export interface BasicBlock {
  readonly id: BlockId;
  readonly statements: readonly Statement[];
  readonly terminator: Terminator;
}

export interface ParameterInfo {
  readonly name: string;
  readonly type?: string;
}

/** Control-flow graph of one operation body. */
export interface OperationBody {
  /** Qualified name, e.g. `Solver.compute` or `main` */
  readonly name: string;
  /** The operation this body implements (it may have no declared contract) */
  readonly operation: OperationRef;
  readonly params: readonly ParameterInfo[];
  /** Declared or inferred static types of locals */
  readonly locals: ReadonlyMap<string, string | undefined>;
  readonly entry: BlockId;
  readonly blocks: ReadonlyMap<BlockId, BasicBlock>;
  readonly location: SourceLocation;
}

export interface ProgramGraph {
  readonly file: string;
  readonly bodies: readonly OperationBody[];
}

/** Successor blocks of a terminator, in edge order. */
export function successors(terminator: Terminator): BlockId[] {
  switch (terminator.kind) {
    case "goto":
      return [terminator.target];
    case "branch":
      return [terminator.then, terminator.else];
    case "return":
    case "throw":
      return [];
  }
}
