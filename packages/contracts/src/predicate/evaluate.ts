/**
 * Shared Predicate Evaluator
 *
 * One interpreter for contract predicates, used by both verifiers:
 *
 * - The runtime verifier passes a concrete valuation in which every term
 *   is a constant, so the verdict is always `"true"` or `"false"`.
 * - The static verifier passes its path facts, in which a term may only be
 *   known to belong to (or to avoid) a set of constants, so the verdict
 *   may be `"unknown"`.
 *
 * Logical connectives follow Kleene's three-valued logic.
 */

import type { Expr, Literal, LogicalExpr, Term } from "./ast.js";
import { collectTerms, isTerm } from "./ast.js";
import { printExpr } from "./print.js";

// ============================================================================
// Types
// ============================================================================

export type Truth = "true" | "false" | "unknown";

/**
 * What is known about the value of a term.
 */
export type AbstractValue =
  | { readonly kind: "const"; readonly value: unknown }
  | { readonly kind: "oneOf"; readonly values: readonly Literal[] }
  | { readonly kind: "excludes"; readonly values: readonly Literal[] }
  | { readonly kind: "unknown" };

export interface Valuation {
  /** Abstract value of a term */
  valueOf(term: Term): AbstractValue;
  /**
   * Known truth of an atomic sub-predicate, when the valuation has
   * recorded it as a fact. Consulted before structural evaluation.
   */
  truthOf?(expr: Expr): Truth | undefined;
}

export const UNKNOWN: AbstractValue = { kind: "unknown" };

/** Literals that are falsy in JavaScript. */
export const FALSY_LITERALS: readonly Literal[] = [false, 0, NaN, "", null, undefined];

const BOOLEANS: readonly Literal[] = [false, true];

/** Arithmetic on unknown operands still never yields null or undefined. */
const NOT_NULLISH: AbstractValue = { kind: "excludes", values: [null, undefined] };

// ============================================================================
// Evaluation
// ============================================================================

export function evaluate(expr: Expr, valuation: Valuation): Truth {
  if (expr.kind !== "logical" && expr.kind !== "literal" && valuation.truthOf) {
    const known = valuation.truthOf(expr);
    if (known !== undefined && known !== "unknown") return known;
  }

  switch (expr.kind) {
    case "literal":
      return expr.value ? "true" : "false";
    case "not":
      return flip(evaluate(expr.operand, valuation));
    case "logical": {
      const truth = evaluateConnective(expr, valuation);
      return truth === "unknown" ? enumerateCandidates(expr, valuation) : truth;
    }
    case "compare":
      return compareValues(
        expr.op,
        abstractValueOf(expr.left, valuation),
        abstractValueOf(expr.right, valuation)
      );
    default:
      return truthiness(abstractValueOf(expr, valuation));
  }
}

function evaluateConnective(expr: LogicalExpr, valuation: Valuation): Truth {
  const left = evaluate(expr.left, valuation);
  if (expr.op === "&&") {
    if (left === "false") return "false";
    const right = evaluate(expr.right, valuation);
    if (left === "true") return right;
    return right === "false" ? "false" : "unknown";
  }
  if (left === "true") return "true";
  const right = evaluate(expr.right, valuation);
  if (left === "false") return right;
  return right === "true" ? "true" : "unknown";
}

/** Largest candidate set a connective is evaluated over value by value. */
const MAX_ENUMERATED = 8;

/**
 * Re-evaluate a connective once per candidate of the first term known to
 * take one of a few values. `a === "x" || a === "y"` is true when `a` is
 * one of `"x"` and `"y"`, although neither disjunct is true on its own.
 */
function enumerateCandidates(expr: LogicalExpr, valuation: Valuation): Truth {
  for (const term of collectTerms(expr)) {
    const value = valuation.valueOf(term);
    if (value.kind !== "oneOf" || value.values.length > MAX_ENUMERATED) continue;

    const key = printExpr(term);
    let sawTrue = false;
    let sawFalse = false;
    for (const candidate of value.values) {
      const fixed: Valuation = {
        valueOf: (t) => (printExpr(t) === key ? { kind: "const", value: candidate } : valuation.valueOf(t)),
        truthOf: (e) => valuation.truthOf?.(e),
      };
      const truth = evaluate(expr, fixed);
      if (truth === "unknown") return "unknown";
      if (truth === "true") sawTrue = true;
      else sawFalse = true;
    }
    if (sawTrue && !sawFalse) return "true";
    if (sawFalse && !sawTrue) return "false";
    return "unknown";
  }
  return "unknown";
}

/** Abstract value of any expression (terms, literals, arithmetic, predicates). */
export function abstractValueOf(expr: Expr, valuation: Valuation): AbstractValue {
  if (isTerm(expr)) return valuation.valueOf(expr);

  switch (expr.kind) {
    case "literal":
      return { kind: "const", value: expr.value };
    case "negate": {
      const operand = abstractValueOf(expr.operand, valuation);
      if (operand.kind === "const" && typeof operand.value === "number") {
        return { kind: "const", value: -operand.value };
      }
      return operand.kind === "const" ? UNKNOWN : NOT_NULLISH;
    }
    case "arithmetic": {
      const left = abstractValueOf(expr.left, valuation);
      const right = abstractValueOf(expr.right, valuation);
      if (left.kind !== "const" || right.kind !== "const") return NOT_NULLISH;
      const value = applyArithmetic(expr.op, left.value, right.value);
      return value === undefined ? UNKNOWN : { kind: "const", value };
    }
    default: {
      const truth = evaluate(expr, valuation);
      if (truth === "unknown") return { kind: "oneOf", values: BOOLEANS };
      return { kind: "const", value: truth === "true" };
    }
  }
}

export function flip(truth: Truth): Truth {
  if (truth === "true") return "false";
  if (truth === "false") return "true";
  return "unknown";
}

/** Truth of a value used directly as a condition. */
export function truthiness(value: AbstractValue): Truth {
  switch (value.kind) {
    case "const":
      return value.value ? "true" : "false";
    case "oneOf":
      if (value.values.every((v) => Boolean(v))) return "true";
      if (value.values.every((v) => !v)) return "false";
      return "unknown";
    case "excludes":
      return FALSY_LITERALS.every((f) => includesLiteral(value.values, f)) ? "true" : "unknown";
    case "unknown":
      return "unknown";
  }
}

// ============================================================================
// Comparison
// ============================================================================

/**
 * Compare two abstract values. Finite candidate sets are compared
 * pairwise; an exclusion set can only refute an equality.
 */
export function compareValues(
  op: "===" | "!==" | "<" | "<=" | ">" | ">=",
  left: AbstractValue,
  right: AbstractValue
): Truth {
  if (op === "!==") return flip(compareValues("===", left, right));

  const leftCandidates = candidates(left);
  const rightCandidates = candidates(right);

  if (leftCandidates && rightCandidates) {
    let sawTrue = false;
    let sawFalse = false;
    for (const a of leftCandidates) {
      for (const b of rightCandidates) {
        if (applyCompare(op, a, b)) sawTrue = true;
        else sawFalse = true;
      }
    }
    if (sawTrue && !sawFalse) return "true";
    if (sawFalse && !sawTrue) return "false";
    return "unknown";
  }

  if (op === "===") {
    if (left.kind === "excludes" && rightCandidates) {
      return rightCandidates.every((c) => includesLiteral(left.values, c)) ? "false" : "unknown";
    }
    if (right.kind === "excludes" && leftCandidates) {
      return leftCandidates.every((c) => includesLiteral(right.values, c)) ? "false" : "unknown";
    }
  }

  return "unknown";
}

function candidates(value: AbstractValue): readonly unknown[] | undefined {
  if (value.kind === "const") return [value.value];
  if (value.kind === "oneOf") return value.values;
  return undefined;
}

/**
 * Concrete comparison. Relational operators are defined only between two
 * numbers or two strings; any other pairing compares as false.
 */
export function applyCompare(
  op: "===" | "!==" | "<" | "<=" | ">" | ">=",
  a: unknown,
  b: unknown
): boolean {
  if (op === "===") return a === b;
  if (op === "!==") return a !== b;
  if (typeof a === "number" && typeof b === "number") return relate(op, a, b);
  if (typeof a === "string" && typeof b === "string") return relate(op, a, b);
  return false;
}

function relate<T extends number | string>(op: "<" | "<=" | ">" | ">=", a: T, b: T): boolean {
  switch (op) {
    case "<":
      return a < b;
    case "<=":
      return a <= b;
    case ">":
      return a > b;
    case ">=":
      return a >= b;
  }
}

function applyArithmetic(op: "+" | "-" | "*" | "/" | "%", a: unknown, b: unknown): unknown {
  if (op === "+" && typeof a === "string" && typeof b === "string") return a + b;
  if (typeof a !== "number" || typeof b !== "number") return undefined;
  switch (op) {
    case "+":
      return a + b;
    case "-":
      return a - b;
    case "*":
      return a * b;
    case "/":
      return a / b;
    case "%":
      return a % b;
  }
}

/** Membership by `===`, except that NaN matches NaN. */
export function includesLiteral(values: readonly unknown[], value: unknown): boolean {
  return values.some((v) => v === value || (Number.isNaN(v) && Number.isNaN(value)));
}

/** True when a value is a literal the static verifier can track. */
export function isLiteral(value: unknown): value is Literal {
  return (
    value === null ||
    value === undefined ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  );
}
