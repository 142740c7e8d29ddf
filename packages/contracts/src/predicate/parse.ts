/**
 * Predicate Parsing
 *
 * Contract predicates are written as TypeScript expression source:
 *
 * ```typescript
 * "this.state === \"Computed\""
 * "(Result() === true && this.state === \"Computed\") || Result() === false"
 * "this.balance === old(this.balance) + amount"
 * ```
 *
 * The source is parsed with the TypeScript compiler and converted into the
 * engine's own expression trees. Only side-effect-free constructs are
 * accepted; `Result()` and `old(expr)` are the only calls.
 */

import ts from "typescript";
import {
  type ArithmeticOp,
  type CompareOp,
  type Expr,
  and,
  arithmetic,
  compare,
  lit,
  member,
  negate,
  not,
  old,
  or,
  ref,
  result,
} from "./ast.js";
import { PredicateSyntaxError } from "../runtime/errors.js";

const COMPARE_TOKENS: Partial<Record<ts.SyntaxKind, CompareOp>> = {
  [ts.SyntaxKind.EqualsEqualsEqualsToken]: "===",
  [ts.SyntaxKind.ExclamationEqualsEqualsToken]: "!==",
  [ts.SyntaxKind.EqualsEqualsToken]: "===",
  [ts.SyntaxKind.ExclamationEqualsToken]: "!==",
  [ts.SyntaxKind.LessThanToken]: "<",
  [ts.SyntaxKind.LessThanEqualsToken]: "<=",
  [ts.SyntaxKind.GreaterThanToken]: ">",
  [ts.SyntaxKind.GreaterThanEqualsToken]: ">=",
};

const ARITHMETIC_TOKENS: Partial<Record<ts.SyntaxKind, ArithmeticOp>> = {
  [ts.SyntaxKind.PlusToken]: "+",
  [ts.SyntaxKind.MinusToken]: "-",
  [ts.SyntaxKind.AsteriskToken]: "*",
  [ts.SyntaxKind.SlashToken]: "/",
  [ts.SyntaxKind.PercentToken]: "%",
};

/**
 * Parse predicate source text into an expression tree.
 *
 * @throws PredicateSyntaxError when the text is not a single supported
 * expression.
 */
export function parsePredicate(source: string): Expr {
  const file = ts.createSourceFile(
    "predicate.ts",
    `(${source});`,
    ts.ScriptTarget.Latest,
    true,
    ts.ScriptKind.TS
  );

  if (file.statements.length !== 1 || !ts.isExpressionStatement(file.statements[0])) {
    throw new PredicateSyntaxError("Expected a single expression", source);
  }

  return convertExpression(file.statements[0].expression, source);
}

/**
 * Convert an already-parsed TypeScript expression (for example the
 * argument of a contract call in analysed source) into a predicate tree.
 */
export function convertExpression(node: ts.Expression, source: string): Expr {
  if (
    ts.isParenthesizedExpression(node) ||
    ts.isAsExpression(node) ||
    ts.isNonNullExpression(node) ||
    ts.isSatisfiesExpression(node) ||
    ts.isTypeAssertionExpression(node)
  ) {
    return convertExpression(node.expression, source);
  }

  if (ts.isIdentifier(node)) {
    if (node.text === "") throw new PredicateSyntaxError("Missing operand", source);
    if (node.text === "undefined") return lit(undefined);
    return ref(node.text);
  }

  switch (node.kind) {
    case ts.SyntaxKind.ThisKeyword:
      return ref("this");
    case ts.SyntaxKind.TrueKeyword:
      return lit(true);
    case ts.SyntaxKind.FalseKeyword:
      return lit(false);
    case ts.SyntaxKind.NullKeyword:
      return lit(null);
  }

  if (ts.isNumericLiteral(node)) return lit(Number(node.text));
  if (ts.isStringLiteral(node) || ts.isNoSubstitutionTemplateLiteral(node)) return lit(node.text);

  if (ts.isPropertyAccessExpression(node)) {
    return member(convertExpression(node.expression, source), node.name.text);
  }

  if (ts.isElementAccessExpression(node)) {
    const key = node.argumentExpression;
    if (ts.isStringLiteral(key) || ts.isNumericLiteral(key)) {
      return member(convertExpression(node.expression, source), key.text);
    }
    throw new PredicateSyntaxError("Computed member access is not supported", source);
  }

  if (ts.isCallExpression(node)) {
    return convertCall(node, source);
  }

  if (ts.isPrefixUnaryExpression(node)) {
    const operand = convertExpression(node.operand, source);
    switch (node.operator) {
      case ts.SyntaxKind.ExclamationToken:
        return not(operand);
      case ts.SyntaxKind.MinusToken:
        if (operand.kind === "literal" && typeof operand.value === "number") {
          return lit(-operand.value);
        }
        return negate(operand);
      case ts.SyntaxKind.PlusToken:
        return operand;
      default:
        throw new PredicateSyntaxError(
          `Unsupported operator ${ts.tokenToString(node.operator) ?? "?"}`,
          source
        );
    }
  }

  if (ts.isBinaryExpression(node)) {
    return convertBinary(node, source);
  }

  throw new PredicateSyntaxError(
    `Unsupported construct ${ts.SyntaxKind[node.kind]}`,
    source
  );
}

function convertCall(node: ts.CallExpression, source: string): Expr {
  if (ts.isIdentifier(node.expression)) {
    const callee = node.expression.text;
    if (callee === "Result") {
      if (node.arguments.length !== 0) {
        throw new PredicateSyntaxError("Result() takes no arguments", source);
      }
      return result();
    }
    if (callee === "old") {
      if (node.arguments.length !== 1) {
        throw new PredicateSyntaxError("old() expects exactly one argument", source);
      }
      return old(convertExpression(node.arguments[0], source));
    }
  }
  throw new PredicateSyntaxError(
    `Only Result() and old(expr) may be called, found ${node.expression.getText()}()`,
    source
  );
}

function convertBinary(node: ts.BinaryExpression, source: string): Expr {
  const kind = node.operatorToken.kind;
  const left = convertExpression(node.left, source);
  const right = convertExpression(node.right, source);

  if (kind === ts.SyntaxKind.AmpersandAmpersandToken) return and(left, right);
  if (kind === ts.SyntaxKind.BarBarToken) return or(left, right);

  const compareOp = COMPARE_TOKENS[kind];
  if (compareOp) {
    const loose =
      kind === ts.SyntaxKind.EqualsEqualsToken || kind === ts.SyntaxKind.ExclamationEqualsToken;
    if (loose) {
      const nullish = nullishComparison(left, right, compareOp);
      if (nullish) return nullish;
    }
    return compare(compareOp, left, right);
  }

  const arithmeticOp = ARITHMETIC_TOKENS[kind];
  if (arithmeticOp) return arithmetic(arithmeticOp, left, right);

  throw new PredicateSyntaxError(
    `Unsupported operator ${ts.tokenToString(kind) ?? ts.SyntaxKind[kind]}`,
    source
  );
}

/**
 * `x == null` tests for both `null` and `undefined`.
 */
function nullishComparison(left: Expr, right: Expr, op: CompareOp): Expr | undefined {
  const isNullish = (e: Expr) => e.kind === "literal" && (e.value === null || e.value === undefined);
  let subject: Expr;
  if (isNullish(right)) subject = left;
  else if (isNullish(left)) subject = right;
  else return undefined;

  return op === "==="
    ? or(compare("===", subject, lit(null)), compare("===", subject, lit(undefined)))
    : and(compare("!==", subject, lit(null)), compare("!==", subject, lit(undefined)));
}
