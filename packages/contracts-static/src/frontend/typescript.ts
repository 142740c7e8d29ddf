/**
 * TypeScript Frontend
 *
 * Lowers TypeScript source into the program graph the analyzer reads. The
 * file is parsed, not type-checked: static types come from annotations,
 * `new` expressions, declared return types and `as` assertions, which is
 * enough to resolve calls on contracted types.
 *
 * Lowering rules:
 * - class constructors (property initializers first), methods and get
 *   accessors become bodies, as do top-level functions
 * - every call is lifted into a `$n` temporary; reads of declared getters
 *   become calls
 * - `&&`, `||` and `!` in conditions become control flow, so each operand
 *   is a branch of its own; in value position `&&`, `||` and `??` branch too
 * - jumps out of a try statement run its `finally` block on the way out
 * - expressions the predicate language cannot express lower their nested
 *   calls and then yield a havoc'd temporary
 *
 * @example
 * ```typescript
 * const graph = buildProgramGraph(source, "src/app.ts", globalContracts);
 * graph.bodies.map((b) => b.name);
 * // => ["Solver.constructor", "Solver.compute", "main"]
 * ```
 */

import ts from "typescript";
import {
  type ArithmeticOp,
  type CompareOp,
  type ContractRegistry,
  type Expr,
  type OperationRef,
  type SourceLocation,
  and,
  arithmetic,
  compare,
  eq,
  globalContracts,
  isTerm,
  lit,
  member,
  negate,
  neq,
  not,
  or,
  ref,
} from "@covenant/contracts";
import { GraphBuilder } from "../cfg/builder.js";
import type { BlockId, CallStatement, OperationBody, ParameterInfo, ProgramGraph } from "../cfg/types.js";

const COMPARE_TOKENS = new Map<ts.SyntaxKind, CompareOp>([
  [ts.SyntaxKind.EqualsEqualsEqualsToken, "==="],
  [ts.SyntaxKind.ExclamationEqualsEqualsToken, "!=="],
  [ts.SyntaxKind.LessThanToken, "<"],
  [ts.SyntaxKind.LessThanEqualsToken, "<="],
  [ts.SyntaxKind.GreaterThanToken, ">"],
  [ts.SyntaxKind.GreaterThanEqualsToken, ">="],
]);

const ARITHMETIC_TOKENS = new Map<ts.SyntaxKind, ArithmeticOp>([
  [ts.SyntaxKind.PlusToken, "+"],
  [ts.SyntaxKind.MinusToken, "-"],
  [ts.SyntaxKind.AsteriskToken, "*"],
  [ts.SyntaxKind.SlashToken, "/"],
  [ts.SyntaxKind.PercentToken, "%"],
]);

const PRIMITIVE_TYPES = new Set(["number", "string", "boolean"]);

const COMPOUND_TOKENS = new Map<ts.SyntaxKind, ArithmeticOp>([
  [ts.SyntaxKind.PlusEqualsToken, "+"],
  [ts.SyntaxKind.MinusEqualsToken, "-"],
  [ts.SyntaxKind.AsteriskEqualsToken, "*"],
  [ts.SyntaxKind.SlashEqualsToken, "/"],
  [ts.SyntaxKind.PercentEqualsToken, "%"],
]);

// ============================================================================
// Main Entry Point
// ============================================================================

/**
 * Parse `source` and lower every class member and top-level function with
 * a body. Callees are resolved against `registry`.
 */
export function buildProgramGraph(
  source: string,
  fileName: string,
  registry: ContractRegistry = globalContracts
): ProgramGraph {
  const sourceFile = ts.createSourceFile(fileName, source, ts.ScriptTarget.ES2022, true, ts.ScriptKind.TS);
  return { file: fileName, bodies: new ProgramLowering(sourceFile, registry).lower() };
}

// ============================================================================
// Program
// ============================================================================

interface ClassInfo {
  readonly fields: Map<string, string | undefined>;
  readonly getters: Set<string>;
  readonly returns: Map<string, string | undefined>;
}

/** Declarations visible to every body of the file. */
class ProgramLowering {
  private readonly classes = new Map<string, ClassInfo>();
  private readonly functionReturns = new Map<string, string | undefined>();

  constructor(
    readonly sourceFile: ts.SourceFile,
    readonly registry: ContractRegistry
  ) {}

  lower(): OperationBody[] {
    for (const statement of this.sourceFile.statements) this.collect(statement);

    const bodies: OperationBody[] = [];
    for (const statement of this.sourceFile.statements) {
      if (ts.isClassDeclaration(statement) && statement.name) {
        bodies.push(...this.lowerClass(statement, statement.name.text));
      } else if (ts.isFunctionDeclaration(statement) && statement.name && statement.body) {
        const name = statement.name.text;
        bodies.push(
          new BodyLowering(this, undefined, statement.parameters).lower(
            name,
            { operation: name },
            statement.name,
            statement.body.statements,
            statement.body
          )
        );
      }
    }
    return bodies;
  }

  location(node: ts.Node): SourceLocation {
    const { line, character } = this.sourceFile.getLineAndCharacterOfPosition(node.getStart(this.sourceFile));
    return { file: this.sourceFile.fileName, line: line + 1, column: character + 1 };
  }

  endLocation(node: ts.Node): SourceLocation {
    const { line, character } = this.sourceFile.getLineAndCharacterOfPosition(Math.max(node.getEnd() - 1, 0));
    return { file: this.sourceFile.fileName, line: line + 1, column: character + 1 };
  }

  // --------------------------------------------------------------------------
  // Declarations
  // --------------------------------------------------------------------------

  private collect(statement: ts.Statement): void {
    if (ts.isFunctionDeclaration(statement) && statement.name) {
      this.functionReturns.set(statement.name.text, typeName(statement.type));
      return;
    }
    if (!ts.isClassDeclaration(statement) || !statement.name) return;

    const info: ClassInfo = { fields: new Map(), getters: new Set(), returns: new Map() };
    for (const node of statement.members) {
      const name = node.name && ts.isIdentifier(node.name) ? node.name.text : undefined;
      if (ts.isPropertyDeclaration(node) && name) {
        info.fields.set(name, typeName(node.type) ?? newTypeOf(node.initializer));
      } else if (ts.isGetAccessorDeclaration(node) && name) {
        info.getters.add(name);
        info.returns.set(name, typeName(node.type));
      } else if (ts.isMethodDeclaration(node) && name) {
        info.returns.set(name, typeName(node.type));
      } else if (ts.isConstructorDeclaration(node)) {
        for (const param of node.parameters) {
          if (isParameterProperty(param) && ts.isIdentifier(param.name)) {
            info.fields.set(param.name.text, typeName(param.type));
          }
        }
      }
    }
    this.classes.set(statement.name.text, info);
  }

  fieldType(type: string | undefined, name: string): string | undefined {
    if (!type) return undefined;
    const getter = this.registry.operation(type, name);
    if (getter?.kind === "getter") return getter.returns;
    const info = this.classes.get(type);
    return info?.fields.get(name) ?? info?.returns.get(name);
  }

  isGetter(type: string | undefined, name: string): boolean {
    if (!type) return false;
    return this.registry.operation(type, name)?.kind === "getter" || (this.classes.get(type)?.getters.has(name) ?? false);
  }

  returnType(type: string | undefined, name: string): string | undefined {
    const declared = this.registry.operation(type, name);
    if (declared?.returns) return declared.returns;
    return type ? this.classes.get(type)?.returns.get(name) : this.functionReturns.get(name);
  }

  // --------------------------------------------------------------------------
  // Classes
  // --------------------------------------------------------------------------

  private lowerClass(node: ts.ClassDeclaration, className: string): OperationBody[] {
    const bodies: OperationBody[] = [];
    const initializers = node.members.filter(
      (m): m is ts.PropertyDeclaration =>
        ts.isPropertyDeclaration(m) && m.initializer !== undefined && !isStatic(m)
    );
    const ctor = node.members.find(
      (m): m is ts.ConstructorDeclaration => ts.isConstructorDeclaration(m) && m.body !== undefined
    );

    if (ctor?.body || initializers.length > 0) {
      const lowering = new BodyLowering(this, className, ctor?.parameters ?? []);
      bodies.push(
        lowering.lowerConstructor(className, ctor ?? node, ctor?.parameters ?? [], initializers, ctor?.body ?? node)
      );
    }

    for (const m of node.members) {
      if (isStatic(m) || !m.name || !ts.isIdentifier(m.name)) continue;
      if ((ts.isMethodDeclaration(m) || ts.isGetAccessorDeclaration(m)) && m.body) {
        const name = m.name.text;
        bodies.push(
          new BodyLowering(this, className, m.parameters).lower(
            `${className}.${name}`,
            { type: className, operation: name },
            m.name,
            m.body.statements,
            m.body
          )
        );
      }
    }
    return bodies;
  }
}

// ============================================================================
// Bodies
// ============================================================================

interface JumpTarget {
  readonly kind: "loop" | "switch" | "block";
  readonly label?: string;
  readonly breakTarget: BlockId;
  /** Set for loops only */
  readonly continueTarget?: BlockId;
  /** `finally` blocks entered before this target */
  readonly finallyDepth: number;
}

class BodyLowering {
  private readonly builder = new GraphBuilder();
  private readonly locals = new Map<string, string | undefined>();
  private readonly params: ParameterInfo[] = [];
  private readonly jumps: JumpTarget[] = [];
  /** Enclosing `finally` blocks, innermost last */
  private finalizers: ts.Block[] = [];
  private pendingLabel: string | undefined;
  private temps = 0;

  constructor(
    private readonly program: ProgramLowering,
    private readonly ownerClass: string | undefined,
    parameters: readonly ts.ParameterDeclaration[]
  ) {
    for (const param of parameters) {
      if (ts.isIdentifier(param.name)) {
        const info = { name: param.name.text, type: typeName(param.type) };
        this.params.push(info);
        this.locals.set(info.name, info.type);
      } else {
        for (const name of bindingNames(param.name)) this.locals.set(name, undefined);
      }
    }
  }

  lower(
    name: string,
    operation: OperationRef,
    nameNode: ts.Node,
    statements: readonly ts.Statement[],
    end: ts.Node
  ): OperationBody {
    this.lowerStatements(statements);
    return this.finish(name, operation, nameNode, end);
  }

  lowerConstructor(
    className: string,
    at: ts.Node,
    parameters: readonly ts.ParameterDeclaration[],
    initializers: readonly ts.PropertyDeclaration[],
    body: ts.Node
  ): OperationBody {
    const self = ref("this");
    for (const param of parameters) {
      if (isParameterProperty(param) && ts.isIdentifier(param.name)) {
        const name = param.name.text;
        this.builder.emit({ kind: "assign", target: member(self, name), value: ref(name), location: this.at(param) });
      }
    }
    for (const property of initializers) {
      if (!property.initializer || !ts.isIdentifier(property.name)) continue;
      const value = this.lowerExpr(property.initializer);
      this.builder.emit({
        kind: "assign",
        target: member(self, property.name.text),
        value,
        location: this.at(property),
      });
    }
    if (ts.isBlock(body)) this.lowerStatements(body.statements);
    return this.finish(`${className}.constructor`, { type: className, operation: "constructor" }, at, body);
  }

  private finish(name: string, operation: OperationRef, nameNode: ts.Node, end: ts.Node): OperationBody {
    return {
      name,
      operation,
      params: this.params,
      locals: this.locals,
      entry: this.builder.entry,
      blocks: this.builder.finish(this.program.endLocation(end)),
      location: this.at(nameNode),
    };
  }

  private at(node: ts.Node): SourceLocation {
    return this.program.location(node);
  }

  private temp(type?: string): string {
    const name = `$${this.temps++}`;
    this.locals.set(name, type);
    return name;
  }

  private havocTemp(node: ts.Node): Expr {
    const name = this.temp();
    this.builder.emit({ kind: "havoc", target: ref(name), location: this.at(node) });
    return ref(name);
  }

  // --------------------------------------------------------------------------
  // Statements
  // --------------------------------------------------------------------------

  private lowerStatements(statements: readonly ts.Statement[]): void {
    for (const statement of statements) this.lowerStatement(statement);
  }

  private lowerStatement(node: ts.Statement): void {
    const label = this.pendingLabel;
    this.pendingLabel = undefined;

    if (ts.isBlock(node)) {
      this.lowerStatements(node.statements);
    } else if (ts.isVariableStatement(node)) {
      this.lowerDeclarations(node.declarationList);
    } else if (ts.isExpressionStatement(node)) {
      this.lowerExpr(node.expression);
    } else if (ts.isIfStatement(node)) {
      this.lowerIf(node);
    } else if (ts.isWhileStatement(node)) {
      this.lowerWhile(node, label);
    } else if (ts.isDoStatement(node)) {
      this.lowerDo(node, label);
    } else if (ts.isForStatement(node)) {
      this.lowerFor(node, label);
    } else if (ts.isForOfStatement(node) || ts.isForInStatement(node)) {
      this.lowerForEach(node, label);
    } else if (ts.isSwitchStatement(node)) {
      this.lowerSwitch(node, label);
    } else if (ts.isBreakStatement(node) || ts.isContinueStatement(node)) {
      const jump = this.findJump(node.label?.text, ts.isContinueStatement(node));
      if (jump) {
        this.runFinalizers(jump.depth);
        this.builder.goto(jump.target, this.at(node));
      }
    } else if (ts.isLabeledStatement(node)) {
      this.lowerLabeled(node);
    } else if (ts.isReturnStatement(node)) {
      let value = node.expression ? this.lowerExpr(node.expression) : undefined;
      if (value && this.finalizers.length > 0) {
        // `finally` may reassign what the returned expression reads
        const saved = this.temp();
        this.builder.emit({ kind: "assign", target: ref(saved), value, location: this.at(node) });
        value = ref(saved);
      }
      this.runFinalizers(0);
      this.builder.terminate({ kind: "return", value, location: this.at(node) });
    } else if (ts.isThrowStatement(node)) {
      this.lowerExpr(node.expression);
      this.builder.terminate({ kind: "throw", location: this.at(node) });
    } else if (ts.isTryStatement(node)) {
      this.lowerTry(node);
    }
    // Declarations of nested functions, classes and types run nothing here
  }

  private lowerDeclarations(list: ts.VariableDeclarationList): void {
    for (const declaration of list.declarations) {
      const init = declaration.initializer;
      if (ts.isIdentifier(declaration.name)) {
        const value = init ? this.lowerExpr(init) : lit(undefined);
        const name = declaration.name.text;
        this.locals.set(name, typeName(declaration.type) ?? (init ? this.typeOf(init) : undefined));
        this.builder.emit({ kind: "assign", target: ref(name), value, location: this.at(declaration) });
      } else {
        if (init) this.lowerExpr(init);
        for (const name of bindingNames(declaration.name)) {
          this.locals.set(name, undefined);
          this.builder.emit({ kind: "havoc", target: ref(name), location: this.at(declaration) });
        }
      }
    }
  }

  private lowerIf(node: ts.IfStatement): void {
    const thenBlock = this.builder.newBlock();
    const elseBlock = node.elseStatement ? this.builder.newBlock() : undefined;
    const after = this.builder.newBlock();

    this.lowerCondition(node.expression, thenBlock, elseBlock ?? after);
    this.builder.switchTo(thenBlock);
    this.lowerStatement(node.thenStatement);
    this.builder.goto(after, this.at(node));

    if (node.elseStatement && elseBlock !== undefined) {
      this.builder.switchTo(elseBlock);
      this.lowerStatement(node.elseStatement);
      this.builder.goto(after, this.at(node));
    }
    this.builder.switchTo(after);
  }

  private lowerWhile(node: ts.WhileStatement, label: string | undefined): void {
    const head = this.builder.newBlock();
    const body = this.builder.newBlock();
    const exit = this.builder.newBlock();

    this.builder.goto(head, this.at(node));
    this.builder.switchTo(head);
    this.lowerCondition(node.expression, body, exit);
    this.builder.switchTo(body);
    this.loop({ kind: "loop", label, breakTarget: exit, continueTarget: head }, node.statement);
    this.builder.goto(head, this.at(node));
    this.builder.switchTo(exit);
  }

  private lowerDo(node: ts.DoStatement, label: string | undefined): void {
    const body = this.builder.newBlock();
    const test = this.builder.newBlock();
    const exit = this.builder.newBlock();

    this.builder.goto(body, this.at(node));
    this.builder.switchTo(body);
    this.loop({ kind: "loop", label, breakTarget: exit, continueTarget: test }, node.statement);
    this.builder.goto(test, this.at(node));
    this.builder.switchTo(test);
    this.lowerCondition(node.expression, body, exit);
    this.builder.switchTo(exit);
  }

  private lowerFor(node: ts.ForStatement, label: string | undefined): void {
    const init = node.initializer;
    if (init) {
      if (ts.isVariableDeclarationList(init)) this.lowerDeclarations(init);
      else this.lowerExpr(init);
    }

    const head = this.builder.newBlock();
    const body = this.builder.newBlock();
    const update = this.builder.newBlock();
    const exit = this.builder.newBlock();

    this.builder.goto(head, this.at(node));
    this.builder.switchTo(head);
    if (node.condition) this.lowerCondition(node.condition, body, exit);
    else this.builder.goto(body, this.at(node));

    this.builder.switchTo(body);
    this.loop({ kind: "loop", label, breakTarget: exit, continueTarget: update }, node.statement);
    this.builder.goto(update, this.at(node));

    this.builder.switchTo(update);
    if (node.incrementor) this.lowerExpr(node.incrementor);
    this.builder.goto(head, this.at(node));
    this.builder.switchTo(exit);
  }

  /** `for…of` / `for…in`: any number of iterations, each binding an unknown value. */
  private lowerForEach(node: ts.ForOfStatement | ts.ForInStatement, label: string | undefined): void {
    this.lowerExpr(node.expression);

    const head = this.builder.newBlock();
    const body = this.builder.newBlock();
    const exit = this.builder.newBlock();

    this.builder.goto(head, this.at(node));
    this.builder.switchTo(head);
    this.builder.terminate({ kind: "branch", then: body, else: exit, location: this.at(node) });

    this.builder.switchTo(body);
    const init = node.initializer;
    if (ts.isVariableDeclarationList(init)) {
      for (const declaration of init.declarations) {
        for (const name of bindingNames(declaration.name)) {
          this.locals.set(name, ts.isIdentifier(declaration.name) ? typeName(declaration.type) : undefined);
          this.builder.emit({ kind: "havoc", target: ref(name), location: this.at(declaration) });
        }
      }
    } else if (ts.isIdentifier(init)) {
      this.builder.emit({ kind: "havoc", target: ref(init.text), location: this.at(init) });
    }
    this.loop({ kind: "loop", label, breakTarget: exit, continueTarget: head }, node.statement);
    this.builder.goto(head, this.at(node));
    this.builder.switchTo(exit);
  }

  private loop(target: Omit<JumpTarget, "finallyDepth">, body: ts.Statement): void {
    this.pushJump(target);
    this.lowerStatement(body);
    this.jumps.pop();
  }

  private lowerSwitch(node: ts.SwitchStatement, label: string | undefined): void {
    const discriminant = this.lowerExpr(node.expression);
    const clauses = node.caseBlock.clauses;
    const bodies = clauses.map(() => this.builder.newBlock());
    const exit = this.builder.newBlock();

    let fallback: BlockId = exit;
    for (const [index, clause] of clauses.entries()) {
      if (ts.isDefaultClause(clause)) {
        fallback = bodies[index];
        continue;
      }
      const value = this.lowerExpr(clause.expression);
      const next = this.builder.newBlock();
      this.builder.terminate({
        kind: "branch",
        condition: eq(discriminant, value),
        then: bodies[index],
        else: next,
        location: this.at(clause),
      });
      this.builder.switchTo(next);
    }
    this.builder.goto(fallback, this.at(node));

    this.pushJump({ kind: "switch", label, breakTarget: exit });
    for (const [index, clause] of clauses.entries()) {
      this.builder.switchTo(bodies[index]);
      this.lowerStatements(clause.statements);
      // Fall through to the next clause
      this.builder.goto(bodies[index + 1] ?? exit, this.at(clause));
    }
    this.jumps.pop();
    this.builder.switchTo(exit);
  }

  private lowerLabeled(node: ts.LabeledStatement): void {
    const inner = node.statement;
    if (ts.isIterationStatement(inner, false)) {
      this.pendingLabel = node.label.text;
      this.lowerStatement(inner);
      return;
    }
    const after = this.builder.newBlock();
    this.pushJump({ kind: "block", label: node.label.text, breakTarget: after });
    this.lowerStatement(inner);
    this.jumps.pop();
    this.builder.goto(after, this.at(node));
    this.builder.switchTo(after);
  }

  private pushJump(target: Omit<JumpTarget, "finallyDepth">): void {
    this.jumps.push({ ...target, finallyDepth: this.finalizers.length });
  }

  private findJump(
    label: string | undefined,
    isContinue: boolean
  ): { target: BlockId; depth: number } | undefined {
    for (let i = this.jumps.length - 1; i >= 0; i--) {
      const jump = this.jumps[i];
      if (label === undefined && ((isContinue && jump.kind !== "loop") || jump.kind === "block")) continue;
      if (label !== undefined && jump.label !== label) continue;
      const target = isContinue ? jump.continueTarget : jump.breakTarget;
      return target === undefined ? undefined : { target, depth: jump.finallyDepth };
    }
    return undefined;
  }

  /**
   * Inline the `finally` blocks a jump leaves, innermost first. Each runs
   * with only the blocks outside it still pending, so a jump inside one
   * does not re-enter it.
   */
  private runFinalizers(depth: number): void {
    const pending = this.finalizers;
    for (let i = pending.length - 1; i >= depth; i--) {
      this.finalizers = pending.slice(0, i);
      this.lowerStatements(pending[i].statements);
    }
    this.finalizers = pending;
  }

  /**
   * Exceptions may leave the try block anywhere, so the catch clause
   * starts with no facts and with every local the try block writes
   * havoc'd. The same holds for `finally`, which joins the normal and the
   * exceptional path. Jumps out of the statement run the `finally` block
   * on their own path before leaving.
   */
  private lowerTry(node: ts.TryStatement): void {
    const after = this.builder.newBlock();
    const finallyBlock = node.finallyBlock ? this.builder.newBlock() : undefined;
    const catchBlock = node.catchClause ? this.builder.newBlock() : undefined;
    const tryBlock = this.builder.newBlock();
    const done = finallyBlock ?? after;

    if (catchBlock !== undefined) {
      this.builder.terminate({ kind: "branch", then: tryBlock, else: catchBlock, location: this.at(node) });
    } else {
      this.builder.goto(tryBlock, this.at(node));
    }

    if (node.finallyBlock) this.finalizers.push(node.finallyBlock);
    this.builder.switchTo(tryBlock);
    this.lowerStatements(node.tryBlock.statements);
    this.builder.goto(done, this.at(node.tryBlock));

    if (node.catchClause && catchBlock !== undefined) {
      this.builder.switchTo(catchBlock);
      this.builder.emit({ kind: "forget", location: this.at(node.catchClause) });
      this.havocWritten(node.tryBlock, node.catchClause);
      const variable = node.catchClause.variableDeclaration;
      if (variable) {
        for (const name of bindingNames(variable.name)) {
          this.locals.set(name, undefined);
          this.builder.emit({ kind: "havoc", target: ref(name), location: this.at(variable) });
        }
      }
      this.lowerStatements(node.catchClause.block.statements);
      this.builder.goto(done, this.at(node.catchClause));
    }
    if (node.finallyBlock) this.finalizers.pop();

    if (node.finallyBlock && finallyBlock !== undefined) {
      this.builder.switchTo(finallyBlock);
      this.builder.emit({ kind: "forget", location: this.at(node.finallyBlock) });
      this.havocWritten(node.tryBlock, node.finallyBlock);
      if (node.catchClause) this.havocWritten(node.catchClause.block, node.finallyBlock);
      this.lowerStatements(node.finallyBlock.statements);
      this.builder.goto(after, this.at(node.finallyBlock));
    }

    this.builder.switchTo(after);
  }

  private havocWritten(scope: ts.Node, at: ts.Node): void {
    for (const name of writtenNames(scope)) {
      this.builder.emit({ kind: "havoc", target: ref(name), location: this.at(at) });
    }
  }

  // --------------------------------------------------------------------------
  // Conditions
  // --------------------------------------------------------------------------

  private lowerCondition(node: ts.Expression, whenTrue: BlockId, whenFalse: BlockId): void {
    const expr = skipParentheses(node);

    if (ts.isPrefixUnaryExpression(expr) && expr.operator === ts.SyntaxKind.ExclamationToken) {
      this.lowerCondition(expr.operand, whenFalse, whenTrue);
      return;
    }

    if (ts.isBinaryExpression(expr)) {
      const op = expr.operatorToken.kind;
      if (op === ts.SyntaxKind.AmpersandAmpersandToken || op === ts.SyntaxKind.BarBarToken) {
        const rest = this.builder.newBlock();
        if (op === ts.SyntaxKind.AmpersandAmpersandToken) this.lowerCondition(expr.left, rest, whenFalse);
        else this.lowerCondition(expr.left, whenTrue, rest);
        this.builder.switchTo(rest);
        this.lowerCondition(expr.right, whenTrue, whenFalse);
        return;
      }
    }

    const condition = this.lowerExpr(expr);
    this.builder.terminate({ kind: "branch", condition, then: whenTrue, else: whenFalse, location: this.at(node) });
  }

  // --------------------------------------------------------------------------
  // Expressions
  // --------------------------------------------------------------------------

  private lowerExpr(node: ts.Expression): Expr {
    if (
      ts.isParenthesizedExpression(node) ||
      ts.isAsExpression(node) ||
      ts.isNonNullExpression(node) ||
      ts.isSatisfiesExpression(node) ||
      ts.isTypeAssertionExpression(node)
    ) {
      return this.lowerExpr(node.expression);
    }

    if (ts.isIdentifier(node)) return node.text === "undefined" ? lit(undefined) : ref(node.text);
    if (ts.isNumericLiteral(node)) return lit(Number(node.text));
    if (ts.isStringLiteral(node) || ts.isNoSubstitutionTemplateLiteral(node)) return lit(node.text);

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

    if (ts.isPropertyAccessExpression(node)) {
      if (node.questionDotToken) {
        this.lowerExpr(node.expression);
        return this.havocTemp(node);
      }
      return this.lowerMember(node, node.expression, node.name.text);
    }

    if (ts.isElementAccessExpression(node)) {
      const key = node.argumentExpression;
      if (!node.questionDotToken && ts.isStringLiteral(key)) return this.lowerMember(node, node.expression, key.text);
      this.lowerExpr(node.expression);
      this.lowerExpr(key);
      return this.havocTemp(node);
    }

    if (ts.isCallExpression(node)) return this.lowerCall(node);
    if (ts.isNewExpression(node)) return this.lowerNew(node);
    if (ts.isPrefixUnaryExpression(node)) return this.lowerPrefix(node);

    if (ts.isPostfixUnaryExpression(node)) {
      const op = node.operator === ts.SyntaxKind.PlusPlusToken ? "+" : "-";
      return this.lowerIncrement(node, node.operand, op, false);
    }

    if (ts.isBinaryExpression(node)) return this.lowerBinary(node);
    if (ts.isConditionalExpression(node)) return this.lowerConditional(node);

    if (!ts.isFunctionLike(node) && !ts.isClassLike(node)) this.lowerNested(node);
    return this.havocTemp(node);
  }

  private lowerMember(node: ts.Expression, objectNode: ts.Expression, property: string): Expr {
    const object = this.lowerExpr(objectNode);
    const ownerType = this.typeOf(objectNode);
    if (this.program.isGetter(ownerType, property)) {
      return this.emitCall(node, {
        callee: this.resolveCallee(ownerType, property),
        name: ownerType ? `${ownerType}.${property}` : node.getText(this.program.sourceFile),
        receiver: object,
        receiverType: ownerType,
        args: [],
        resultType: this.program.fieldType(ownerType, property),
      });
    }
    return isTerm(object) ? member(object, property) : this.havocTemp(node);
  }

  private lowerCall(node: ts.CallExpression): Expr {
    const callee = skipParentheses(node.expression);

    if (ts.isPropertyAccessExpression(callee) && !callee.questionDotToken && !node.questionDotToken) {
      const receiver = this.lowerExpr(callee.expression);
      const receiverType = this.typeOf(callee.expression);
      const name = callee.name.text;
      const args = node.arguments.map((arg) => this.lowerExpr(arg));
      return this.emitCall(node, {
        callee: this.resolveCallee(receiverType, name),
        name: receiverType ? `${receiverType}.${name}` : callee.getText(this.program.sourceFile),
        receiver,
        receiverType,
        args,
        resultType: this.program.returnType(receiverType, name),
      });
    }

    if (ts.isIdentifier(callee)) {
      const name = callee.text;
      const args = node.arguments.map((arg) => this.lowerExpr(arg));
      return this.emitCall(node, {
        callee: this.resolveCallee(undefined, name),
        name,
        args,
        resultType: this.program.returnType(undefined, name),
      });
    }

    if (callee.kind !== ts.SyntaxKind.SuperKeyword) this.lowerExpr(callee);
    const args = node.arguments.map((arg) => this.lowerExpr(arg));
    return this.emitCall(node, { name: callee.getText(this.program.sourceFile), args });
  }

  private lowerNew(node: ts.NewExpression): Expr {
    const args = node.arguments?.map((arg) => this.lowerExpr(arg)) ?? [];
    const className = ts.isIdentifier(node.expression) ? node.expression.text : undefined;
    if (!className) {
      this.lowerExpr(node.expression);
      return this.emitCall(node, { name: "new", args });
    }
    const declared = this.program.registry.typeContract(className) !== undefined;
    return this.emitCall(node, {
      callee: declared ? { type: className, operation: "constructor" } : undefined,
      name: `new ${className}`,
      args,
      resultType: className,
    });
  }

  private resolveCallee(type: string | undefined, name: string): OperationRef | undefined {
    return this.program.registry.operation(type, name) ? { type, operation: name } : undefined;
  }

  private emitCall(node: ts.Node, call: Omit<CallStatement, "kind" | "target" | "location">): Expr {
    const target = this.temp(call.resultType);
    this.builder.emit({ kind: "call", target, ...call, location: this.at(node) });
    return ref(target);
  }

  private lowerPrefix(node: ts.PrefixUnaryExpression): Expr {
    switch (node.operator) {
      case ts.SyntaxKind.ExclamationToken:
        return not(this.lowerExpr(node.operand));
      case ts.SyntaxKind.MinusToken: {
        const operand = this.lowerExpr(node.operand);
        return operand.kind === "literal" && typeof operand.value === "number" ? lit(-operand.value) : negate(operand);
      }
      case ts.SyntaxKind.PlusToken:
        return this.lowerExpr(node.operand);
      case ts.SyntaxKind.PlusPlusToken:
        return this.lowerIncrement(node, node.operand, "+", true);
      case ts.SyntaxKind.MinusMinusToken:
        return this.lowerIncrement(node, node.operand, "-", true);
      default:
        this.lowerExpr(node.operand);
        return this.havocTemp(node);
    }
  }

  private lowerIncrement(node: ts.Expression, operand: ts.Expression, op: ArithmeticOp, prefix: boolean): Expr {
    const current = this.lowerExpr(operand);
    let previous = current;
    if (!prefix) {
      const saved = this.temp();
      this.builder.emit({ kind: "assign", target: ref(saved), value: current, location: this.at(node) });
      previous = ref(saved);
    }
    const updated = this.assignTo(operand, arithmetic(op, current, lit(1)), node);
    return prefix ? updated : previous;
  }

  private lowerBinary(node: ts.BinaryExpression): Expr {
    const op = node.operatorToken.kind;

    if (op === ts.SyntaxKind.EqualsToken) {
      return this.assignTo(node.left, this.lowerExpr(node.right), node);
    }

    const compound = COMPOUND_TOKENS.get(op);
    if (compound) {
      const current = this.lowerExpr(node.left);
      return this.assignTo(node.left, arithmetic(compound, current, this.lowerExpr(node.right)), node);
    }

    if (op >= ts.SyntaxKind.FirstAssignment && op <= ts.SyntaxKind.LastAssignment) {
      this.lowerExpr(node.right);
      return this.havocTarget(node.left, node);
    }

    if (
      op === ts.SyntaxKind.AmpersandAmpersandToken ||
      op === ts.SyntaxKind.BarBarToken ||
      op === ts.SyntaxKind.QuestionQuestionToken
    ) {
      return this.lowerLogical(node, op);
    }

    if (op === ts.SyntaxKind.CommaToken) {
      this.lowerExpr(node.left);
      return this.lowerExpr(node.right);
    }

    const left = this.lowerExpr(node.left);
    const right = this.lowerExpr(node.right);

    if (op === ts.SyntaxKind.EqualsEqualsToken || op === ts.SyntaxKind.ExclamationEqualsToken) {
      const positive = op === ts.SyntaxKind.EqualsEqualsToken;
      const other = isNullish(right) ? left : isNullish(left) ? right : undefined;
      if (other) {
        return positive
          ? or(eq(other, lit(null)), eq(other, lit(undefined)))
          : and(neq(other, lit(null)), neq(other, lit(undefined)));
      }
      if (this.strictlyComparable(node.left, left, node.right, right)) {
        return positive ? eq(left, right) : neq(left, right);
      }
      return this.havocTemp(node);
    }

    const compareOp = COMPARE_TOKENS.get(op);
    if (compareOp) return compare(compareOp, left, right);

    const arithmeticOp = ARITHMETIC_TOKENS.get(op);
    if (arithmeticOp) return arithmetic(arithmeticOp, left, right);

    return this.havocTemp(node);
  }

  /**
   * Short-circuit operators in value position. The result is one of the
   * operands, not a boolean, so it lands in a temporary and the right
   * operand runs on its own branch.
   */
  private lowerLogical(node: ts.BinaryExpression, op: ts.SyntaxKind): Expr {
    const left = this.lowerExpr(node.left);
    const value = this.temp();
    this.builder.emit({ kind: "assign", target: ref(value), value: left, location: this.at(node) });

    const rightBlock = this.builder.newBlock();
    const after = this.builder.newBlock();
    const location = this.at(node);
    if (op === ts.SyntaxKind.AmpersandAmpersandToken) {
      this.builder.terminate({ kind: "branch", condition: left, then: rightBlock, else: after, location });
    } else if (op === ts.SyntaxKind.BarBarToken) {
      this.builder.terminate({ kind: "branch", condition: left, then: after, else: rightBlock, location });
    } else {
      const nullish = or(eq(left, lit(null)), eq(left, lit(undefined)));
      this.builder.terminate({ kind: "branch", condition: nullish, then: rightBlock, else: after, location });
    }

    this.builder.switchTo(rightBlock);
    const right = this.lowerExpr(node.right);
    this.builder.emit({ kind: "assign", target: ref(value), value: right, location: this.at(node.right) });
    this.builder.goto(after, location);
    this.builder.switchTo(after);
    return ref(value);
  }

  private lowerConditional(node: ts.ConditionalExpression): Expr {
    const value = this.temp(this.typeOf(node));
    const whenTrue = this.builder.newBlock();
    const whenFalse = this.builder.newBlock();
    const after = this.builder.newBlock();

    this.lowerCondition(node.condition, whenTrue, whenFalse);
    for (const [block, branch] of [
      [whenTrue, node.whenTrue],
      [whenFalse, node.whenFalse],
    ] as const) {
      this.builder.switchTo(block);
      const result = this.lowerExpr(branch);
      this.builder.emit({ kind: "assign", target: ref(value), value: result, location: this.at(branch) });
      this.builder.goto(after, this.at(node));
    }
    this.builder.switchTo(after);
    return ref(value);
  }

  /** Lower nested expressions for their effects, skipping deferred code. */
  private lowerNested(node: ts.Node): void {
    ts.forEachChild(node, (child) => {
      if (ts.isFunctionLike(child) || ts.isClassLike(child)) return;
      if (ts.isExpression(child)) this.lowerExpr(child);
      else this.lowerNested(child);
    });
  }

  // --------------------------------------------------------------------------
  // Assignment targets
  // --------------------------------------------------------------------------

  private assignTo(targetNode: ts.Expression, value: Expr, node: ts.Node): Expr {
    const target = skipParentheses(targetNode);
    const location = this.at(node);

    if (ts.isIdentifier(target)) {
      this.builder.emit({ kind: "assign", target: ref(target.text), value, location });
      return ref(target.text);
    }

    const property = memberName(target);
    if (property && (ts.isPropertyAccessExpression(target) || ts.isElementAccessExpression(target))) {
      const object = this.lowerExpr(target.expression);
      if (isTerm(object)) {
        const written = member(object, property);
        this.builder.emit({ kind: "assign", target: written, value, location });
        return written;
      }
      return value;
    }

    if (ts.isElementAccessExpression(target)) {
      this.lowerExpr(target.expression);
      this.lowerExpr(target.argumentExpression);
      return value;
    }

    this.havocTarget(target, node);
    return value;
  }

  /** The target takes an unknown value; destructuring havocs every name it binds. */
  private havocTarget(targetNode: ts.Expression, node: ts.Node): Expr {
    const target = skipParentheses(targetNode);
    const location = this.at(node);

    if (ts.isIdentifier(target)) {
      this.builder.emit({ kind: "havoc", target: ref(target.text), location });
      return ref(target.text);
    }

    const property = memberName(target);
    if (property && (ts.isPropertyAccessExpression(target) || ts.isElementAccessExpression(target))) {
      const object = this.lowerExpr(target.expression);
      if (isTerm(object)) {
        const written = member(object, property);
        this.builder.emit({ kind: "havoc", target: written, location });
        return written;
      }
      return this.havocTemp(node);
    }

    for (const name of assignedNames(target)) {
      this.builder.emit({ kind: "havoc", target: ref(name), location });
    }
    return this.havocTemp(node);
  }

  // --------------------------------------------------------------------------
  // Static types
  // --------------------------------------------------------------------------

  /**
   * `==` agrees with `===` when one side is a literal and the other is known
   * to hold that literal's type (or null or undefined, which `==` keeps
   * apart from any other literal).
   */
  private strictlyComparable(leftNode: ts.Expression, left: Expr, rightNode: ts.Expression, right: Expr): boolean {
    const kind = (node: ts.Expression, expr: Expr): string | undefined =>
      expr.kind === "literal" ? typeof expr.value : this.typeOf(node);
    if (left.kind !== "literal" && right.kind !== "literal") return false;
    const leftKind = kind(leftNode, left);
    return leftKind !== undefined && PRIMITIVE_TYPES.has(leftKind) && leftKind === kind(rightNode, right);
  }

  private typeOf(node: ts.Expression): string | undefined {
    if (ts.isParenthesizedExpression(node) || ts.isNonNullExpression(node)) return this.typeOf(node.expression);
    if (ts.isAsExpression(node) || ts.isTypeAssertionExpression(node)) {
      return typeName(node.type) ?? this.typeOf(node.expression);
    }
    if (node.kind === ts.SyntaxKind.ThisKeyword) return this.ownerClass;
    if (ts.isIdentifier(node)) return this.locals.get(node.text);
    if (ts.isNewExpression(node)) return newTypeOf(node);

    if (ts.isCallExpression(node)) {
      const callee = skipParentheses(node.expression);
      if (ts.isPropertyAccessExpression(callee)) {
        return this.program.returnType(this.typeOf(callee.expression), callee.name.text);
      }
      if (ts.isIdentifier(callee)) return this.program.returnType(undefined, callee.text);
      return undefined;
    }

    if (ts.isPropertyAccessExpression(node)) {
      return this.program.fieldType(this.typeOf(node.expression), node.name.text);
    }
    if (ts.isConditionalExpression(node)) {
      const whenTrue = this.typeOf(node.whenTrue);
      return whenTrue === this.typeOf(node.whenFalse) ? whenTrue : undefined;
    }
    return undefined;
  }
}

// ============================================================================
// Syntax Helpers
// ============================================================================

function skipParentheses(node: ts.Expression): ts.Expression {
  return ts.isParenthesizedExpression(node) ? skipParentheses(node.expression) : node;
}

function isNullish(expr: Expr): boolean {
  return expr.kind === "literal" && (expr.value === null || expr.value === undefined);
}

function isStatic(node: ts.ClassElement): boolean {
  return ts.canHaveModifiers(node) && (ts.getModifiers(node) ?? []).some((m) => m.kind === ts.SyntaxKind.StaticKeyword);
}

function isParameterProperty(param: ts.ParameterDeclaration): boolean {
  return (ts.getModifiers(param) ?? []).some(
    (m) =>
      m.kind === ts.SyntaxKind.PublicKeyword ||
      m.kind === ts.SyntaxKind.PrivateKeyword ||
      m.kind === ts.SyntaxKind.ProtectedKeyword ||
      m.kind === ts.SyntaxKind.ReadonlyKeyword
  );
}

function memberName(node: ts.Expression): string | undefined {
  if (ts.isPropertyAccessExpression(node) && !node.questionDotToken) return node.name.text;
  if (ts.isElementAccessExpression(node) && ts.isStringLiteral(node.argumentExpression)) {
    return node.argumentExpression.text;
  }
  return undefined;
}

/**
 * The type name a declaration's annotation refers to. `T | null` and
 * `T | undefined` name `T`; primitive keywords name themselves.
 */
export function typeName(node: ts.TypeNode | undefined): string | undefined {
  if (!node) return undefined;
  if (ts.isParenthesizedTypeNode(node)) return typeName(node.type);
  if (ts.isTypeReferenceNode(node)) {
    return ts.isIdentifier(node.typeName) ? node.typeName.text : node.typeName.right.text;
  }
  if (ts.isUnionTypeNode(node)) {
    const named = node.types.filter(
      (t) =>
        t.kind !== ts.SyntaxKind.UndefinedKeyword &&
        !(ts.isLiteralTypeNode(t) && t.literal.kind === ts.SyntaxKind.NullKeyword)
    );
    return named.length === 1 ? typeName(named[0]) : undefined;
  }
  switch (node.kind) {
    case ts.SyntaxKind.NumberKeyword:
      return "number";
    case ts.SyntaxKind.StringKeyword:
      return "string";
    case ts.SyntaxKind.BooleanKeyword:
      return "boolean";
  }
  return undefined;
}

function newTypeOf(node: ts.Expression | undefined): string | undefined {
  return node && ts.isNewExpression(node) && ts.isIdentifier(node.expression) ? node.expression.text : undefined;
}

function bindingNames(name: ts.BindingName): string[] {
  if (ts.isIdentifier(name)) return [name.text];
  return name.elements.flatMap((element) =>
    ts.isOmittedExpression(element) ? [] : bindingNames(element.name)
  );
}

/** Names written by a destructuring assignment target. */
/** Locals a statement may write, in source order, skipping nested functions. */
function writtenNames(scope: ts.Node): string[] {
  const names = new Set<string>();
  const visit = (node: ts.Node): void => {
    if (ts.isFunctionLike(node) || ts.isClassLike(node)) return;
    if (ts.isVariableDeclaration(node)) {
      for (const name of bindingNames(node.name)) names.add(name);
    } else if (
      ts.isBinaryExpression(node) &&
      node.operatorToken.kind >= ts.SyntaxKind.FirstAssignment &&
      node.operatorToken.kind <= ts.SyntaxKind.LastAssignment
    ) {
      for (const name of assignedNames(skipParentheses(node.left))) names.add(name);
    } else if (
      (ts.isPrefixUnaryExpression(node) || ts.isPostfixUnaryExpression(node)) &&
      (node.operator === ts.SyntaxKind.PlusPlusToken || node.operator === ts.SyntaxKind.MinusMinusToken)
    ) {
      const operand = skipParentheses(node.operand);
      if (ts.isIdentifier(operand)) names.add(operand.text);
    } else if ((ts.isForOfStatement(node) || ts.isForInStatement(node)) && ts.isIdentifier(node.initializer)) {
      names.add(node.initializer.text);
    }
    ts.forEachChild(node, visit);
  };
  visit(scope);
  return [...names];
}

function assignedNames(node: ts.Expression): string[] {
  if (ts.isIdentifier(node)) return [node.text];
  if (ts.isArrayLiteralExpression(node)) {
    return node.elements.flatMap((e) => (ts.isSpreadElement(e) ? assignedNames(e.expression) : assignedNames(e)));
  }
  if (ts.isObjectLiteralExpression(node)) {
    return node.properties.flatMap((p) => {
      if (ts.isShorthandPropertyAssignment(p)) return [p.name.text];
      if (ts.isPropertyAssignment(p)) return assignedNames(p.initializer);
      if (ts.isSpreadAssignment(p)) return assignedNames(p.expression);
      return [];
    });
  }
  if (ts.isBinaryExpression(node) && node.operatorToken.kind === ts.SyntaxKind.EqualsToken) {
    return assignedNames(node.left);
  }
  return [];
}
