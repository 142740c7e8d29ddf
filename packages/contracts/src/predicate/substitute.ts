/**
 * Clause instantiation: binding `this`, parameters, `Result()` and
 * `old(...)` in a declared predicate to the values at one call site.
 */

import type { Expr } from "./ast.js";
import { printExpr } from "./print.js";

export interface Binding {
  /** Replacement for `this` */
  self?: Expr;
  /** Replacements for parameter references, by name */
  params?: ReadonlyMap<string, Expr>;
  /** Replacement for `Result()` */
  result?: Expr;
  /**
   * Replacement for `old(operand)`; receives the operand as declared.
   * Returning undefined keeps `old(...)` with its operand instantiated.
   */
  old?: (operand: Expr) => Expr | undefined;
}

export function instantiate(expr: Expr, binding: Binding): Expr {
  switch (expr.kind) {
    case "literal":
      return expr;
    case "ref":
      if (expr.name === "this") return binding.self ?? expr;
      return binding.params?.get(expr.name) ?? expr;
    case "result":
      return binding.result ?? expr;
    case "old": {
      const replaced = binding.old?.(expr.operand);
      return replaced ?? { kind: "old", operand: instantiate(expr.operand, binding) };
    }
    case "member":
      return { kind: "member", object: instantiate(expr.object, binding), property: expr.property };
    case "not":
      return { kind: "not", operand: instantiate(expr.operand, binding) };
    case "negate":
      return { kind: "negate", operand: instantiate(expr.operand, binding) };
    case "logical":
      return {
        kind: "logical",
        op: expr.op,
        left: instantiate(expr.left, binding),
        right: instantiate(expr.right, binding),
      };
    case "compare":
      return {
        kind: "compare",
        op: expr.op,
        left: instantiate(expr.left, binding),
        right: instantiate(expr.right, binding),
      };
    case "arithmetic":
      return {
        kind: "arithmetic",
        op: expr.op,
        left: instantiate(expr.left, binding),
        right: instantiate(expr.right, binding),
      };
  }
}

/** Parameter binding map from positional arguments. */
export function bindParams(names: readonly string[], args: readonly Expr[]): Map<string, Expr> {
  const params = new Map<string, Expr>();
  names.forEach((name, index) => {
    const arg = args[index];
    if (arg) params.set(name, arg);
  });
  return params;
}

/** Stable key for an `old(...)` operand. */
export const oldKey = (operand: Expr): string => printExpr(operand);
