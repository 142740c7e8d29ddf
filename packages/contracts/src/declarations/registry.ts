/**
 * Contract Registry
 *
 * Holds every declared type, operation and clause. A registry is filled
 * during initialization and then frozen; both verifiers only read it.
 *
 * ```typescript
 * const registry = new ContractRegistry();
 * registry.declareType("Account", { privateMembers: ["audit"] });
 * registry.declareOperation("Account", "withdraw", { params: ["amount"] });
 * registry.registerClause({ type: "Account", operation: "withdraw" }, "requires", "amount > 0");
 * registry.registerClause({ type: "Account" }, "invariant", "this.balance >= 0");
 * registry.freeze();
 * ```
 */

import type { Expr } from "../predicate/ast.js";
import { parsePredicate } from "../predicate/parse.js";
import { printExpr } from "../predicate/print.js";
import { membershipClause, protocolClauses, type CompiledClause } from "../protocol/protocol.js";
import { ContractDeclarationError } from "../runtime/errors.js";
import {
  type ClauseKind,
  type ClauseOrigin,
  type ClauseOwner,
  type ContractClause,
  type OperationClauses,
  type OperationContract,
  type OperationKind,
  type OperationRef,
  type OperationSpec,
  type ParameterSpec,
  type PredicateInput,
  type TypeContract,
  type TypeSpec,
  type Visibility,
  qualify,
} from "./types.js";

// ============================================================================
// Internal Records
// ============================================================================

interface OperationRecord {
  type?: string;
  name: string;
  qualifiedName: string;
  kind: OperationKind;
  visibility: Visibility;
  params: ParameterSpec[];
  returns?: string;
  requires: ContractClause[];
  ensures: ContractClause[];
}

interface TypeRecord {
  name: string;
  invariants: ContractClause[];
  operations: Map<string, OperationRecord>;
  privateMembers: Set<string>;
  protocol?: TypeSpec["protocol"];
}

interface ValidationScope {
  kind: ClauseKind;
  type?: TypeRecord;
  operation?: OperationRecord;
  where: string;
}

const NO_INVARIANTS: readonly ContractClause[] = Object.freeze([]);

// ============================================================================
// Registry
// ============================================================================

export class ContractRegistry {
  private readonly typeRecords = new Map<string, TypeRecord>();
  private readonly functionRecords = new Map<string, OperationRecord>();
  private frozen = false;

  get isFrozen(): boolean {
    return this.frozen;
  }

  /**
   * Declare a type. A type with a protocol gets an invariant keeping its
   * state attribute inside the protocol's domain.
   */
  declareType(name: string, spec: TypeSpec = {}): TypeContract {
    this.assertMutable(`type ${name}`);
    if (this.typeRecords.has(name)) {
      throw new ContractDeclarationError(`Type ${name} is already declared`);
    }

    const record: TypeRecord = {
      name,
      invariants: [],
      operations: new Map(),
      privateMembers: new Set(spec.privateMembers ?? []),
      protocol: spec.protocol,
    };

    if (record.protocol && record.privateMembers.has(record.protocol.attribute)) {
      throw new ContractDeclarationError(
        `Protocol attribute "${record.protocol.attribute}" of ${name} must not be private`
      );
    }

    this.typeRecords.set(name, record);

    if (record.protocol) {
      this.addClause(
        { type: name },
        "invariant",
        membershipClause(record.protocol),
        `${record.protocol.attribute} must be one of the declared states`,
        "protocol"
      );
    }

    return record;
  }

  /**
   * Declare an operation of a type, or a free function when `type` is
   * undefined. An operation named "constructor" is a constructor; the
   * protocol of the owning type contributes its clauses first.
   */
  declareOperation(
    type: string | undefined,
    name: string,
    spec: OperationSpec = {}
  ): OperationContract {
    const qualifiedName = qualify(type, name);
    this.assertMutable(`operation ${qualifiedName}`);

    const owner = type === undefined ? undefined : this.requireType(type);
    const existing = owner ? owner.operations.has(name) : this.functionRecords.has(name);
    if (existing) {
      throw new ContractDeclarationError(`Operation ${qualifiedName} is already declared`);
    }

    const kind = spec.kind ?? defaultKind(type, name);
    if (type === undefined && kind !== "function") {
      throw new ContractDeclarationError(`Free function ${name} cannot be a ${kind}`);
    }
    if (type !== undefined && kind === "function") {
      throw new ContractDeclarationError(`${qualifiedName} belongs to a type; use kind "method"`);
    }
    if ((name === "constructor") !== (kind === "constructor")) {
      throw new ContractDeclarationError(
        `${qualifiedName}: only an operation named "constructor" is a constructor`
      );
    }

    const params = (spec.params ?? []).map((p) => (typeof p === "string" ? { name: p } : { ...p }));
    const names = new Set<string>();
    for (const param of params) {
      if (param.name === "this" || names.has(param.name)) {
        throw new ContractDeclarationError(`${qualifiedName}: invalid parameter "${param.name}"`);
      }
      names.add(param.name);
    }

    const record: OperationRecord = {
      type,
      name,
      qualifiedName,
      kind,
      visibility: spec.visibility ?? "public",
      params,
      returns: spec.returns,
      requires: [],
      ensures: [],
    };

    if (owner) owner.operations.set(name, record);
    else this.functionRecords.set(name, record);

    if (owner?.protocol) {
      const compiled = protocolClauses(owner.protocol, name);
      const ref = { type, operation: name };
      if (compiled.requires) this.addClause(ref, "requires", compiled.requires, undefined, "protocol");
      if (compiled.ensures) this.addClause(ref, "ensures", compiled.ensures, undefined, "protocol");
    }

    return record;
  }

  /**
   * Register a clause. Invariants are owned by a type alone; Requires and
   * Ensures by a declared operation.
   *
   * @throws ContractDeclarationError when the clause is not well-formed for
   * its owner, or the registry is frozen.
   */
  registerClause(
    owner: ClauseOwner,
    kind: ClauseKind,
    predicate: PredicateInput,
    message?: string
  ): ContractClause {
    this.assertMutable(`a clause of ${describeOwner(owner)}`);
    const compiled: CompiledClause =
      typeof predicate === "string"
        ? { expr: parsePredicate(predicate), text: predicate.trim() }
        : { expr: predicate, text: printExpr(predicate) };
    return this.addClause(owner, kind, compiled, message, "declared");
  }

  /**
   * Ordered clauses governing one operation: its Requires and Ensures plus
   * the owning type's Invariants.
   */
  clausesOf(ref: OperationRef): OperationClauses {
    const operation = this.requireOperation(ref);
    return {
      requires: operation.requires,
      ensures: operation.ensures,
      invariants: ref.type === undefined ? NO_INVARIANTS : this.requireType(ref.type).invariants,
    };
  }

  operation(type: string | undefined, name: string): OperationContract | undefined {
    if (type === undefined) return this.functionRecords.get(name);
    return this.typeRecords.get(type)?.operations.get(name);
  }

  typeContract(name: string): TypeContract | undefined {
    return this.typeRecords.get(name);
  }

  invariantsOf(type: string): readonly ContractClause[] {
    return this.typeRecords.get(type)?.invariants ?? NO_INVARIANTS;
  }

  types(): IterableIterator<TypeContract> {
    return this.typeRecords.values();
  }

  functions(): IterableIterator<OperationContract> {
    return this.functionRecords.values();
  }

  /**
   * Seal the registry. Every protocol transition must name an operation
   * declared on its type.
   */
  freeze(): void {
    if (this.frozen) return;
    for (const type of this.typeRecords.values()) {
      if (!type.protocol) continue;
      for (const operation of type.protocol.transitions.keys()) {
        if (!type.operations.has(operation)) {
          throw new ContractDeclarationError(
            `Protocol of ${type.name} has a transition for undeclared operation ${operation}`
          );
        }
      }
    }
    this.frozen = true;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private addClause(
    owner: ClauseOwner,
    kind: ClauseKind,
    compiled: CompiledClause,
    message: string | undefined,
    origin: ClauseOrigin
  ): ContractClause {
    if (kind === "invariant") {
      if (owner.type === undefined || owner.operation !== undefined) {
        throw new ContractDeclarationError(
          `Invariants belong to a type, not to ${describeOwner(owner)}`
        );
      }
      const type = this.requireType(owner.type);
      this.validate(compiled.expr, { kind, type, where: `invariant of ${type.name}` });

      const clause = makeClause(
        `${type.name}#invariant[${type.invariants.length}]`,
        kind,
        { type: type.name },
        compiled,
        message,
        origin
      );
      type.invariants.push(clause);
      return clause;
    }

    if (owner.operation === undefined) {
      throw new ContractDeclarationError(`${kind} clauses need an operation`);
    }
    const operation = this.requireOperation({ type: owner.type, operation: owner.operation });
    const type = owner.type === undefined ? undefined : this.requireType(owner.type);
    this.validate(compiled.expr, {
      kind,
      type,
      operation,
      where: `${kind} of ${operation.qualifiedName}`,
    });

    const list = kind === "requires" ? operation.requires : operation.ensures;
    const clause = makeClause(
      `${operation.qualifiedName}#${kind}[${list.length}]`,
      kind,
      { type: owner.type, operation: owner.operation },
      compiled,
      message,
      origin
    );
    list.push(clause);
    return clause;
  }

  private validate(expr: Expr, scope: ValidationScope): void {
    const fail = (reason: string): never => {
      throw new ContractDeclarationError(`Invalid ${scope.where}: ${reason}`);
    };

    const check = (node: Expr, insideOld: boolean): void => {
      switch (node.kind) {
        case "literal":
          return;
        case "result":
          if (scope.kind !== "ensures") fail("Result() is only available in ensures clauses");
          return;
        case "old":
          if (scope.kind !== "ensures") fail("old() is only available in ensures clauses");
          if (insideOld) fail("old() cannot be nested");
          check(node.operand, true);
          return;
        case "ref":
          checkRef(node.name);
          return;
        case "member":
          if (
            scope.kind === "requires" &&
            scope.operation?.visibility === "public" &&
            node.object.kind === "ref" &&
            node.object.name === "this" &&
            scope.type?.privateMembers.has(node.property)
          ) {
            fail(`public operations cannot require private member "${node.property}"`);
          }
          check(node.object, insideOld);
          return;
        case "not":
        case "negate":
          check(node.operand, insideOld);
          return;
        case "compare":
          checkStateLiteral(node.left, node.right);
          checkStateLiteral(node.right, node.left);
          check(node.left, insideOld);
          check(node.right, insideOld);
          return;
        case "logical":
        case "arithmetic":
          check(node.left, insideOld);
          check(node.right, insideOld);
          return;
      }
    };

    const checkRef = (name: string): void => {
      if (name === "this") {
        if (!scope.type) fail("free functions have no `this`");
        if (scope.kind === "requires" && scope.operation?.kind === "constructor") {
          fail("constructor requires can only reference arguments");
        }
        return;
      }
      if (scope.kind === "invariant") fail(`invariants can only reference \`this\`, found "${name}"`);
      if (!scope.operation?.params.some((p) => p.name === name)) {
        fail(`unknown identifier "${name}"`);
      }
    };

    const checkStateLiteral = (side: Expr, other: Expr): void => {
      const protocol = scope.type?.protocol;
      if (!protocol || other.kind !== "literal" || typeof other.value !== "string") return;
      const target = side.kind === "old" ? side.operand : side;
      if (
        target.kind === "member" &&
        target.property === protocol.attribute &&
        target.object.kind === "ref" &&
        target.object.name === "this" &&
        !protocol.states.includes(other.value)
      ) {
        fail(`"${other.value}" is not a state of ${scope.type?.name}`);
      }
    };

    check(expr, false);
  }

  private requireType(name: string): TypeRecord {
    const record = this.typeRecords.get(name);
    if (!record) throw new ContractDeclarationError(`Type ${name} is not declared`);
    return record;
  }

  private requireOperation(ref: OperationRef): OperationRecord {
    const record =
      ref.type === undefined
        ? this.functionRecords.get(ref.operation)
        : this.requireType(ref.type).operations.get(ref.operation);
    if (!record) {
      throw new ContractDeclarationError(
        `Operation ${qualify(ref.type, ref.operation)} is not declared`
      );
    }
    return record;
  }

  private assertMutable(what: string): void {
    if (this.frozen) {
      throw new ContractDeclarationError(`Cannot declare ${what}: the registry is frozen`);
    }
  }
}

function makeClause(
  id: string,
  kind: ClauseKind,
  owner: ClauseOwner,
  compiled: CompiledClause,
  message: string | undefined,
  origin: ClauseOrigin
): ContractClause {
  return Object.freeze({ id, kind, owner, expr: compiled.expr, text: compiled.text, message, origin });
}

function defaultKind(type: string | undefined, name: string): OperationKind {
  if (type === undefined) return "function";
  return name === "constructor" ? "constructor" : "method";
}

function describeOwner(owner: ClauseOwner): string {
  if (owner.operation !== undefined) return qualify(owner.type, owner.operation);
  return owner.type ?? "nothing";
}

/**
 * The process-wide default registry. Declare everything during startup,
 * then call `globalContracts.freeze()` before verification begins.
 */
export const globalContracts = new ContractRegistry();
