/**
 * Canonical printing of predicate trees.
 *
 * The printed form doubles as the identity of a fact in the static
 * verifier, so it must be deterministic: string literals are JSON-quoted
 * and parentheses appear only where precedence requires them.
 */

import type { Expr, Literal } from "./ast.js";

const PRECEDENCE: Record<string, number> = {
  "||": 1,
  "&&": 2,
  "===": 3,
  "!==": 3,
  "<": 4,
  "<=": 4,
  ">": 4,
  ">=": 4,
  "+": 5,
  "-": 5,
  "*": 6,
  "/": 6,
  "%": 6,
};

const UNARY = 7;
const ATOM = 8;

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

function precedenceOf(expr: Expr): number {
  switch (expr.kind) {
    case "logical":
    case "compare":
    case "arithmetic":
      return PRECEDENCE[expr.op];
    case "not":
    case "negate":
      return UNARY;
    default:
      return ATOM;
  }
}

export function printLiteral(value: Literal): string {
  if (value === undefined) return "undefined";
  if (typeof value === "string") return JSON.stringify(value);
  return String(value);
}

export function printExpr(expr: Expr): string {
  switch (expr.kind) {
    case "literal":
      return printLiteral(expr.value);
    case "ref":
      return expr.name;
    case "member":
      return IDENTIFIER.test(expr.property)
        ? `${wrap(expr.object, ATOM)}.${expr.property}`
        : `${wrap(expr.object, ATOM)}[${JSON.stringify(expr.property)}]`;
    case "result":
      return "Result()";
    case "old":
      return `old(${printExpr(expr.operand)})`;
    case "not":
      return `!${wrap(expr.operand, UNARY)}`;
    case "negate":
      return `-${wrap(expr.operand, UNARY)}`;
    case "logical":
    case "compare":
    case "arithmetic": {
      const own = PRECEDENCE[expr.op];
      // Operators are left-associative: the right operand needs parentheses
      // at equal precedence.
      return `${wrap(expr.left, own)} ${expr.op} ${wrap(expr.right, own + 1)}`;
    }
  }
}

function wrap(expr: Expr, minimum: number): string {
  const text = printExpr(expr);
  return precedenceOf(expr) < minimum ? `(${text})` : text;
}
