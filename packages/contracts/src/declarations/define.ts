/**
 * Declaring a whole type in one call.
 *
 * ```typescript
 * defineContract(globalContracts, "Solver", {
 *   protocol: solverProtocol,
 *   privateMembers: ["cache"],
 *   operations: {
 *     constructor: {},
 *     initialize: {},
 *     compute: { params: ["input"], ensures: ["Result() === false || this.cache !== null"] },
 *     answer: { kind: "getter", ensures: [{ predicate: "Result() !== null", message: "answer is set" }] },
 *   },
 * });
 * ```
 */

import type { ContractRegistry } from "./registry.js";
import type {
  ClauseKind,
  ClauseOwner,
  OperationContract,
  OperationSpec,
  PredicateInput,
  TypeContract,
  TypeSpec,
} from "./types.js";

/** A clause as a bare predicate, or with a message shown on failure. */
export type ClauseSpec = PredicateInput | { readonly predicate: PredicateInput; readonly message?: string };

export interface OperationDefinition extends OperationSpec {
  requires?: readonly ClauseSpec[];
  ensures?: readonly ClauseSpec[];
}

export interface ContractDefinition extends TypeSpec {
  invariants?: readonly ClauseSpec[];
  operations?: { readonly [name: string]: OperationDefinition };
}

export function defineContract(
  registry: ContractRegistry,
  type: string,
  definition: ContractDefinition
): TypeContract {
  const contract = registry.declareType(type, {
    privateMembers: definition.privateMembers,
    protocol: definition.protocol,
  });

  for (const clause of definition.invariants ?? []) {
    register(registry, { type }, "invariant", clause);
  }

  for (const [name, operation] of Object.entries(definition.operations ?? {})) {
    declareWithClauses(registry, type, name, operation);
  }

  return contract;
}

/** Declare a free function together with its clauses. */
export function defineFunction(
  registry: ContractRegistry,
  name: string,
  definition: OperationDefinition
): OperationContract {
  return declareWithClauses(registry, undefined, name, definition);
}

function declareWithClauses(
  registry: ContractRegistry,
  type: string | undefined,
  name: string,
  definition: OperationDefinition
): OperationContract {
  const { requires = [], ensures = [], ...spec } = definition;
  const operation = registry.declareOperation(type, name, spec);
  for (const clause of requires) register(registry, { type, operation: name }, "requires", clause);
  for (const clause of ensures) register(registry, { type, operation: name }, "ensures", clause);
  return operation;
}

function register(
  registry: ContractRegistry,
  owner: ClauseOwner,
  kind: ClauseKind,
  clause: ClauseSpec
): void {
  if (typeof clause === "object" && "predicate" in clause) {
    registry.registerClause(owner, kind, clause.predicate, clause.message);
  } else {
    registry.registerClause(owner, kind, clause);
  }
}
