/**
 * Concrete valuation: every term is read from live values, so the shared
 * evaluator always reaches a definite verdict for well-typed predicates.
 */

import type { Expr, Term } from "./ast.js";
import { abstractValueOf, evaluate, type AbstractValue, type Valuation } from "./evaluate.js";
import { oldKey } from "./substitute.js";

export interface ConcreteContext {
  readonly self?: unknown;
  readonly params?: ReadonlyMap<string, unknown>;
  readonly result?: unknown;
  /** Entry snapshots keyed by `oldKey(operand)` */
  readonly old?: ReadonlyMap<string, unknown>;
}

export function readTerm(term: Term, context: ConcreteContext): unknown {
  switch (term.kind) {
    case "ref":
      return term.name === "this" ? context.self : context.params?.get(term.name);
    case "result":
      return context.result;
    case "old": {
      const key = oldKey(term.operand);
      if (context.old?.has(key)) return context.old.get(key);
      return concreteValue(term.operand, context);
    }
    case "member":
      return readProperty(concreteValue(term.object, context), term.property);
  }
}

/** Member access; `null` and `undefined` have no members and yield undefined. */
export function readProperty(object: unknown, property: string): unknown {
  if (object === null || object === undefined) return undefined;
  return Reflect.get(Object(object), property);
}

export function concreteValuation(context: ConcreteContext): Valuation {
  return {
    valueOf: (term): AbstractValue => ({ kind: "const", value: readTerm(term, context) }),
  };
}

/** Value of any expression under live values; undefined when it has none. */
export function concreteValue(expr: Expr, context: ConcreteContext): unknown {
  const value = abstractValueOf(expr, concreteValuation(context));
  return value.kind === "const" ? value.value : undefined;
}

/**
 * Whether a predicate holds. A predicate whose value cannot be determined
 * (arithmetic on non-numbers, for example) does not hold.
 */
export function holds(expr: Expr, context: ConcreteContext): boolean {
  return evaluate(expr, concreteValuation(context)) === "true";
}
