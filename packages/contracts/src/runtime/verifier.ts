/**
 * Runtime Verifier
 *
 * Checks declared clauses at operation boundaries:
 *
 * 1. Requires, in declared order, before the body runs. The first false
 *    clause raises PreconditionViolation and the body never runs.
 * 2. `old(...)` operands of the Ensures are snapshotted on entry.
 * 3. Ensures, in declared order, after a normal return, with `Result()`
 *    bound to the returned value.
 * 4. Type invariants once the outermost public operation on the instance
 *    completes.
 *
 * An error thrown by the body propagates unchanged; no Ensures or
 * Invariant is evaluated for that call.
 */

import { shouldEmitCheck } from "../config.js";
import type { ContractRegistry } from "../declarations/registry.js";
import { globalContracts } from "../declarations/registry.js";
import {
  type ContractClause,
  type OperationClauses,
  type OperationRef,
  type ParameterSpec,
  qualify,
} from "../declarations/types.js";
import { createLogger } from "../log.js";
import { collectOld } from "../predicate/ast.js";
import { type ConcreteContext, concreteValue, holds, readProperty } from "../predicate/concrete.js";
import { oldKey } from "../predicate/substitute.js";
import {
  ContractDeclarationError,
  type ContractViolation,
  InvariantViolation,
  PostconditionViolation,
  PreconditionViolation,
  type ViolationDetails,
} from "./errors.js";

const log = createLogger("runtime");

/**
 * Nesting of clause evaluations in progress. Contracted members reached
 * from inside a clause run unchecked.
 */
let evaluationDepth = 0;

// ============================================================================
// Verifier
// ============================================================================

export class RuntimeVerifier {
  /** Operations in progress per instance */
  private readonly active = new WeakMap<object, number>();
  /** Prototypes of the constructions in progress, innermost last */
  private readonly building: object[] = [];
  /** Instances whose construction completed */
  private readonly built = new WeakSet<object>();

  constructor(readonly registry: ContractRegistry = globalContracts) {}

  /**
   * Run `body` as the operation `ref` on `self` with `args`, checking its
   * clauses around it.
   */
  call<R>(ref: OperationRef, self: unknown, args: readonly unknown[], body: () => R): R {
    if (evaluationDepth > 0) return body();

    const operation = this.registry.operation(ref.type, ref.operation);
    if (!operation) {
      throw new ContractDeclarationError(
        `Operation ${qualify(ref.type, ref.operation)} is not declared`
      );
    }
    const clauses = this.registry.clausesOf(ref);
    const params = bindArguments(operation.params, args);
    const entry: ConcreteContext = { self, params };
    const details = (clause: ContractClause, result?: unknown): ViolationDetails => ({
      operation: operation.qualifiedName,
      clause,
      args,
      instance: snapshotInstance(self),
      result,
    });

    if (shouldEmitCheck("precondition")) {
      const failed = this.firstFailing(clauses.requires, entry);
      if (failed) this.raise(new PreconditionViolation(details(failed)));
    }

    const checkEnsures = shouldEmitCheck("postcondition");
    const old = checkEnsures ? this.snapshotOld(clauses.ensures, entry) : new Map<string, unknown>();

    const instance = isObject(self) ? self : undefined;
    this.enter(instance);
    let result: R;
    try {
      result = body();
    } finally {
      this.leave(instance);
    }

    if (checkEnsures) {
      const failed = this.firstFailing(clauses.ensures, { self, params, result, old });
      if (failed) {
        this.raise(
          new PostconditionViolation(
            details(failed, result),
            failed.origin === "protocol" ? this.outcomeMessage(ref, failed, self, result) : undefined
          )
        );
      }
    }

    if (
      operation.visibility === "public" &&
      instance !== undefined &&
      !this.active.has(instance) &&
      !this.isUnderConstruction(instance) &&
      shouldEmitCheck("invariant")
    ) {
      const failed = this.firstFailing(clauses.invariants, { self });
      if (failed) this.raise(new InvariantViolation(details(failed, result)));
    }

    return result;
  }

  /**
   * Construct an instance of `type` with `build`, checking the
   * constructor's clauses. Requires see only the arguments. A protocol
   * state left unset by the constructor is set to the initial state.
   *
   * `prototype` is the prototype the new instance gets. Operations the
   * constructor calls on that instance skip invariant checks; the finished
   * instance is checked once `build` returns.
   */
  construct<T extends object>(type: string, args: readonly unknown[], build: () => T, prototype?: object): T {
    if (evaluationDepth > 0) return build();

    const contract = this.registry.typeContract(type);
    if (!contract) throw new ContractDeclarationError(`Type ${type} is not declared`);

    const operation = contract.operations.get("constructor");
    const clauses: OperationClauses = operation
      ? this.registry.clausesOf({ type, operation: "constructor" })
      : { requires: [], ensures: [], invariants: contract.invariants };
    const params = bindArguments(operation?.params ?? [], args);
    const qualifiedName = qualify(type, "constructor");
    const details = (clause: ContractClause, instance?: object): ViolationDetails => ({
      operation: qualifiedName,
      clause,
      args,
      instance: snapshotInstance(instance),
      result: instance,
    });

    if (shouldEmitCheck("precondition")) {
      const failed = this.firstFailing(clauses.requires, { params });
      if (failed) this.raise(new PreconditionViolation(details(failed)));
    }

    if (prototype) this.building.push(prototype);
    let instance: T;
    try {
      instance = build();
    } finally {
      if (prototype) this.building.pop();
    }
    this.built.add(instance);

    const protocol = contract.protocol;
    if (protocol && readProperty(instance, protocol.attribute) === undefined) {
      Reflect.set(instance, protocol.attribute, protocol.initial);
    }

    if (shouldEmitCheck("postcondition")) {
      const failed = this.firstFailing(clauses.ensures, { self: instance, params, result: instance });
      if (failed) {
        const message =
          protocol && failed.origin === "protocol"
            ? `Construction of ${type} left ${protocol.attribute} ${JSON.stringify(
                readProperty(instance, protocol.attribute)
              )}; expected the initial state ${JSON.stringify(protocol.initial)}`
            : undefined;
        this.raise(new PostconditionViolation(details(failed, instance), message));
      }
    }

    if (shouldEmitCheck("invariant")) {
      const failed = this.firstFailing(clauses.invariants, { self: instance });
      if (failed) this.raise(new InvariantViolation(details(failed, instance)));
    }

    return instance;
  }

  /** Whether an operation is currently running on `instance`. */
  isActive(instance: object): boolean {
    return this.active.has(instance);
  }

  /** An instance whose constructor has not returned yet. */
  isUnderConstruction(instance: object): boolean {
    return !this.built.has(instance) && this.building.includes(Object.getPrototypeOf(instance));
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private firstFailing(
    clauses: readonly ContractClause[],
    context: ConcreteContext
  ): ContractClause | undefined {
    evaluationDepth++;
    try {
      return clauses.find((clause) => !holds(clause.expr, context));
    } finally {
      evaluationDepth--;
    }
  }

  private snapshotOld(
    ensures: readonly ContractClause[],
    context: ConcreteContext
  ): Map<string, unknown> {
    const snapshots = new Map<string, unknown>();
    evaluationDepth++;
    try {
      for (const clause of ensures) {
        for (const node of collectOld(clause.expr)) {
          const key = oldKey(node.operand);
          if (!snapshots.has(key)) {
            snapshots.set(key, freezeSnapshot(concreteValue(node.operand, context)));
          }
        }
      }
    } finally {
      evaluationDepth--;
    }
    return snapshots;
  }

  private outcomeMessage(
    ref: OperationRef,
    clause: ContractClause,
    self: unknown,
    result: unknown
  ): string | undefined {
    const protocol = ref.type === undefined ? undefined : this.registry.typeContract(ref.type)?.protocol;
    if (!protocol) return undefined;
    const state = readProperty(self, protocol.attribute);
    return (
      `Postcondition failed for ${qualify(ref.type, ref.operation)}: resulting ${protocol.attribute} ` +
      `${JSON.stringify(state)} with result ${describeValue(result)} matches no declared outcome of ` +
      `${clause.text}`
    );
  }

  private raise(violation: ContractViolation): never {
    log.debug(violation.message);
    throw violation;
  }

  private enter(instance: object | undefined): void {
    if (instance === undefined) return;
    this.active.set(instance, (this.active.get(instance) ?? 0) + 1);
  }

  private leave(instance: object | undefined): void {
    if (instance === undefined) return;
    const depth = (this.active.get(instance) ?? 1) - 1;
    if (depth === 0) this.active.delete(instance);
    else this.active.set(instance, depth);
  }
}

// ============================================================================
// Helpers
// ============================================================================

function isObject(value: unknown): value is object {
  return (typeof value === "object" && value !== null) || typeof value === "function";
}

function bindArguments(params: readonly ParameterSpec[], args: readonly unknown[]): Map<string, unknown> {
  const bound = new Map<string, unknown>();
  params.forEach((param, index) => bound.set(param.name, args[index]));
  return bound;
}

function snapshotInstance(self: unknown): Readonly<Record<string, unknown>> | undefined {
  if (!isObject(self)) return undefined;
  return Object.freeze(Object.fromEntries(Object.entries(self)));
}

function describeValue(value: unknown): string {
  if (value === undefined) return "undefined";
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean" || value === null) {
    return JSON.stringify(value);
  }
  return typeof value;
}

/**
 * Immutable copy of a value for `old(...)`. Objects are deep-cloned and
 * frozen; values that cannot be cloned (functions, objects holding
 * functions) are shallow-copied instead.
 */
export function freezeSnapshot(value: unknown): unknown {
  if (typeof value === "function" || typeof value !== "object" || value === null) return value;

  let copy: unknown;
  try {
    copy = structuredClone(value);
  } catch (error) {
    if (!(error instanceof Error) || error.name !== "DataCloneError") throw error;
    log.debug(`old() snapshot falls back to a shallow copy: ${error.message}`);
    copy = Array.isArray(value) ? [...value] : Object.fromEntries(Object.entries(value));
  }
  return deepFreeze(copy);
}

function deepFreeze(value: unknown): unknown {
  if (typeof value !== "object" || value === null || Object.isFrozen(value)) return value;
  Object.freeze(value);
  for (const key of Reflect.ownKeys(value)) deepFreeze(Reflect.get(value, key));
  return value;
}
