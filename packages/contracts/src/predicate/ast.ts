/**
 * Predicate Expression Trees
 *
 * Every Requires, Ensures and Invariant clause is held as one of these
 * trees. The runtime verifier and the static verifier interpret the same
 * trees through the shared evaluator in `evaluate.ts`.
 *
 * A *term* is a value-denoting leaf chain: a reference (`this`, a
 * parameter, an analysis symbol), `Result()`, `old(expr)`, or a member
 * chain rooted at one of those (`this.state`, `Result().length`).
 */

// ============================================================================
// Types
// ============================================================================

export type Literal = string | number | boolean | null | undefined;

export type CompareOp = "===" | "!==" | "<" | "<=" | ">" | ">=";

export type ArithmeticOp = "+" | "-" | "*" | "/" | "%";

export type LogicalOp = "&&" | "||";

export interface LiteralExpr {
  readonly kind: "literal";
  readonly value: Literal;
}

export interface RefExpr {
  readonly kind: "ref";
  readonly name: string;
}

export interface MemberExpr {
  readonly kind: "member";
  readonly object: Expr;
  readonly property: string;
}

export interface ResultExpr {
  readonly kind: "result";
}

export interface OldExpr {
  readonly kind: "old";
  readonly operand: Expr;
}

export interface NotExpr {
  readonly kind: "not";
  readonly operand: Expr;
}

export interface NegateExpr {
  readonly kind: "negate";
  readonly operand: Expr;
}

export interface LogicalExpr {
  readonly kind: "logical";
  readonly op: LogicalOp;
  readonly left: Expr;
  readonly right: Expr;
}

export interface CompareExpr {
  readonly kind: "compare";
  readonly op: CompareOp;
  readonly left: Expr;
  readonly right: Expr;
}

export interface ArithmeticExpr {
  readonly kind: "arithmetic";
  readonly op: ArithmeticOp;
  readonly left: Expr;
  readonly right: Expr;
}

export type Expr =
  | LiteralExpr
  | RefExpr
  | MemberExpr
  | ResultExpr
  | OldExpr
  | NotExpr
  | NegateExpr
  | LogicalExpr
  | CompareExpr
  | ArithmeticExpr;

export type Term = RefExpr | MemberExpr | ResultExpr | OldExpr;

// ============================================================================
// Builders
// ============================================================================

export const lit = (value: Literal): LiteralExpr => ({ kind: "literal", value });

export const ref = (name: string): RefExpr => ({ kind: "ref", name });

export const member = (object: Expr, property: string): MemberExpr => ({
  kind: "member",
  object,
  property,
});

/** `this.a.b` from a dotted path. */
export function field(path: string): Expr {
  return path.split(".").reduce<Expr>((object, property) => member(object, property), ref("this"));
}

export const result = (): ResultExpr => ({ kind: "result" });

export const old = (operand: Expr): OldExpr => ({ kind: "old", operand });

export const not = (operand: Expr): NotExpr => ({ kind: "not", operand });

export const negate = (operand: Expr): NegateExpr => ({ kind: "negate", operand });

export const compare = (op: CompareOp, left: Expr, right: Expr): CompareExpr => ({
  kind: "compare",
  op,
  left,
  right,
});

export const eq = (left: Expr, right: Expr): CompareExpr => compare("===", left, right);

export const neq = (left: Expr, right: Expr): CompareExpr => compare("!==", left, right);

export const arithmetic = (op: ArithmeticOp, left: Expr, right: Expr): ArithmeticExpr => ({
  kind: "arithmetic",
  op,
  left,
  right,
});

/** Left-folded conjunction; `true` when empty. */
export function and(...operands: Expr[]): Expr {
  if (operands.length === 0) return lit(true);
  return operands.reduce((left, right) => ({ kind: "logical", op: "&&", left, right }));
}

/** Left-folded disjunction; `false` when empty. */
export function or(...operands: Expr[]): Expr {
  if (operands.length === 0) return lit(false);
  return operands.reduce((left, right) => ({ kind: "logical", op: "||", left, right }));
}

// ============================================================================
// Structure Helpers
// ============================================================================

export function isTerm(expr: Expr): expr is Term {
  switch (expr.kind) {
    case "ref":
    case "result":
    case "old":
      return true;
    case "member":
      return isTerm(expr.object);
    default:
      return false;
  }
}

/** The innermost node of a member chain. */
export function termRoot(term: Term): RefExpr | ResultExpr | OldExpr {
  let current: Expr = term;
  while (current.kind === "member") current = current.object;
  if (current.kind === "ref" || current.kind === "result" || current.kind === "old") {
    return current;
  }
  throw new Error(`Not a term: ${current.kind}`);
}

/** Flatten nested `&&` into its conjuncts. */
export function conjuncts(expr: Expr): Expr[] {
  if (expr.kind === "logical" && expr.op === "&&") {
    return [...conjuncts(expr.left), ...conjuncts(expr.right)];
  }
  return [expr];
}

/** Flatten nested `||` into its disjuncts. */
export function disjuncts(expr: Expr): Expr[] {
  if (expr.kind === "logical" && expr.op === "||") {
    return [...disjuncts(expr.left), ...disjuncts(expr.right)];
  }
  return [expr];
}

/** Visit every node of a tree, parents first. */
export function walk(expr: Expr, visit: (node: Expr) => void): void {
  visit(expr);
  switch (expr.kind) {
    case "member":
      walk(expr.object, visit);
      break;
    case "old":
    case "not":
    case "negate":
      walk(expr.operand, visit);
      break;
    case "logical":
    case "compare":
    case "arithmetic":
      walk(expr.left, visit);
      walk(expr.right, visit);
      break;
    default:
      break;
  }
}

/** Every maximal term in the tree (member chains are not split). */
export function collectTerms(expr: Expr): Term[] {
  const terms: Term[] = [];
  const visit = (node: Expr): void => {
    if (isTerm(node)) {
      terms.push(node);
      if (node.kind === "old") visit(node.operand);
      return;
    }
    switch (node.kind) {
      case "not":
      case "negate":
        visit(node.operand);
        break;
      case "logical":
      case "compare":
      case "arithmetic":
        visit(node.left);
        visit(node.right);
        break;
      default:
        break;
    }
  };
  visit(expr);
  return terms;
}

/** All `old(...)` nodes, outermost first. */
export function collectOld(expr: Expr): OldExpr[] {
  const found: OldExpr[] = [];
  walk(expr, (node) => {
    if (node.kind === "old") found.push(node);
  });
  return found;
}

export function containsResult(expr: Expr): boolean {
  let found = false;
  walk(expr, (node) => {
    if (node.kind === "result") found = true;
  });
  return found;
}

/** Logical negation pushed through `!`, `&&`, `||` and comparisons. */
export function negation(expr: Expr): Expr {
  switch (expr.kind) {
    case "not":
      return expr.operand;
    case "literal":
      return lit(!expr.value);
    case "logical":
      return expr.op === "&&"
        ? or(negation(expr.left), negation(expr.right))
        : and(negation(expr.left), negation(expr.right));
    case "compare":
      return compare(NEGATED_COMPARE[expr.op], expr.left, expr.right);
    default:
      return not(expr);
  }
}

const NEGATED_COMPARE: Record<CompareOp, CompareOp> = {
  "===": "!==",
  "!==": "===",
  "<": ">=",
  "<=": ">",
  ">": "<=",
  ">=": "<",
};

/** Comparison with its operands swapped (`a < b` becomes `b > a`). */
export const FLIPPED_COMPARE: Record<CompareOp, CompareOp> = {
  "===": "===",
  "!==": "!==",
  "<": ">",
  "<=": ">=",
  ">": "<",
  ">=": "<=",
};
