/**
 * Explicit-State Protocols
 *
 * A protocol gives a type one enumerable state attribute and says, per
 * operation, which states the operation may be called in and which state
 * it leaves behind, possibly depending on what it returned:
 *
 * ```typescript
 * const solverProtocol = defineProtocol({
 *   states: ["NotReady", "Initialized", "Computed"],
 *   initial: "NotReady",
 *   transitions: {
 *     initialize: { from: ["NotReady"], to: "Initialized" },
 *     compute: {
 *       from: ["Initialized", "Computed"],
 *       outcomes: [
 *         { result: true, to: "Computed" },
 *         { result: false, to: "Initialized" },
 *       ],
 *     },
 *     answer: { from: ["Computed"] },
 *   },
 * });
 * ```
 *
 * Transitions compile into ordinary Requires/Ensures clauses (see
 * `protocolClauses`), so both verifiers enforce them like any other
 * contract.
 */

import {
  type Expr,
  type Literal,
  and,
  eq,
  field,
  lit,
  old,
  or,
  result,
} from "../predicate/ast.js";
import { printExpr, printLiteral } from "../predicate/print.js";
import { ProtocolDefinitionError } from "../runtime/errors.js";

// ============================================================================
// Types
// ============================================================================

/** One outcome of an operation whose resulting state depends on its result. */
export interface OutcomeBranch<S extends string = string> {
  readonly result: Literal;
  readonly to: S;
}

export interface TransitionSpec<S extends string = string> {
  /** States the operation may be called in; omitted means any state */
  readonly from?: readonly S[];
  /** Resulting state; omit both `to` and `outcomes` to leave the state unchanged */
  readonly to?: S;
  /** Resulting state keyed on `Result()` */
  readonly outcomes?: readonly OutcomeBranch<S>[];
}

export interface ProtocolSpec<S extends string> {
  /** Name of the state attribute on instances (default `"state"`) */
  readonly attribute?: string;
  readonly states: readonly S[];
  readonly initial: S;
  /** States in which having no enabled operation is expected */
  readonly terminal?: readonly S[];
  readonly transitions: { readonly [operation: string]: TransitionSpec<S> };
}

export type TransitionPost =
  | { readonly kind: "to"; readonly state: string }
  | { readonly kind: "unchanged" }
  | { readonly kind: "outcomes"; readonly branches: readonly OutcomeBranch[] };

export interface ProtocolTransition {
  readonly operation: string;
  /** Allowed source states; undefined means unconstrained */
  readonly from?: readonly string[];
  readonly post: TransitionPost;
}

export interface ProtocolState {
  readonly attribute: string;
  readonly states: readonly string[];
  readonly initial: string;
  readonly terminal: readonly string[];
  readonly transitions: ReadonlyMap<string, ProtocolTransition>;
}

/** A compiled protocol clause: the tree plus a readable source text. */
export interface CompiledClause {
  readonly expr: Expr;
  readonly text: string;
}

// ============================================================================
// Definition
// ============================================================================

/**
 * Validate a protocol specification and freeze it into a ProtocolState.
 *
 * @throws ProtocolDefinitionError for an empty or duplicated domain, an
 * initial state outside the domain, transitions naming unknown or repeated
 * source states, or outcome branches with repeated results.
 */
export function defineProtocol<S extends string>(spec: ProtocolSpec<S>): ProtocolState {
  const attribute = spec.attribute ?? "state";
  if (!/^[A-Za-z_$][\w$]*$/.test(attribute)) {
    throw new ProtocolDefinitionError(`Invalid state attribute name "${attribute}"`);
  }

  if (spec.states.length === 0) {
    throw new ProtocolDefinitionError("A protocol needs at least one state");
  }

  const domain = new Set<string>();
  for (const state of spec.states) {
    if (domain.has(state)) {
      throw new ProtocolDefinitionError(`State "${state}" is declared twice`);
    }
    domain.add(state);
  }

  const requireState = (state: string, where: string): void => {
    if (!domain.has(state)) {
      throw new ProtocolDefinitionError(`Unknown state "${state}" in ${where}`);
    }
  };

  requireState(spec.initial, "initial");
  for (const state of spec.terminal ?? []) requireState(state, "terminal");

  const transitions = new Map<string, ProtocolTransition>();
  for (const [operation, transition] of Object.entries(spec.transitions)) {
    if (operation === "constructor") {
      throw new ProtocolDefinitionError(
        "Construction always yields the initial state; declare no transition for it"
      );
    }
    const sources = new Set<string>();
    for (const state of transition.from ?? []) {
      requireState(state, `${operation}.from`);
      if (sources.has(state)) {
        throw new ProtocolDefinitionError(`State "${state}" appears twice in ${operation}.from`);
      }
      sources.add(state);
    }

    if (transition.to !== undefined && transition.outcomes !== undefined) {
      throw new ProtocolDefinitionError(`${operation} declares both "to" and "outcomes"`);
    }

    let post: TransitionPost;
    if (transition.to !== undefined) {
      requireState(transition.to, `${operation}.to`);
      post = { kind: "to", state: transition.to };
    } else if (transition.outcomes !== undefined) {
      if (transition.outcomes.length === 0) {
        throw new ProtocolDefinitionError(`${operation} declares no outcomes`);
      }
      const seen: Literal[] = [];
      for (const branch of transition.outcomes) {
        requireState(branch.to, `${operation}.outcomes`);
        if (seen.includes(branch.result)) {
          throw new ProtocolDefinitionError(
            `${operation} declares result ${printLiteral(branch.result)} twice`
          );
        }
        seen.push(branch.result);
      }
      post = { kind: "outcomes", branches: [...transition.outcomes] };
    } else {
      post = { kind: "unchanged" };
    }

    transitions.set(operation, {
      operation,
      from: transition.from ? [...transition.from] : undefined,
      post,
    });
  }

  return Object.freeze({
    attribute,
    states: Object.freeze([...spec.states]),
    initial: spec.initial,
    terminal: Object.freeze([...(spec.terminal ?? [])]),
    transitions,
  });
}

// ============================================================================
// Clause Compilation
// ============================================================================

const stateOf = (protocol: ProtocolState): Expr => field(protocol.attribute);

/** `this.state === a || this.state === b || …` */
export function membershipClause(protocol: ProtocolState, states = protocol.states): CompiledClause {
  const expr = or(...states.map((s) => eq(stateOf(protocol), lit(s))));
  return { expr, text: printExpr(expr) };
}

/**
 * Requires and Ensures for one operation, compiled from its transition.
 * Constructors always get `this.<attribute> === <initial>`.
 */
export function protocolClauses(
  protocol: ProtocolState,
  operation: string
): { requires?: CompiledClause; ensures?: CompiledClause } {
  if (operation === "constructor") {
    const expr = eq(stateOf(protocol), lit(protocol.initial));
    return { ensures: { expr, text: printExpr(expr) } };
  }

  const transition = protocol.transitions.get(operation);
  if (!transition) return {};

  const sources = transition.from ? [...new Set(transition.from)] : undefined;
  const requires =
    sources && sources.length < protocol.states.length
      ? membershipClause(protocol, sources)
      : sources && sources.length === 0
        ? { expr: lit(false), text: "false" }
        : undefined;

  return { requires, ensures: postClause(protocol, transition.post) };
}

function postClause(protocol: ProtocolState, post: TransitionPost): CompiledClause {
  const state = stateOf(protocol);
  switch (post.kind) {
    case "to": {
      const expr = eq(state, lit(post.state));
      return { expr, text: printExpr(expr) };
    }
    case "unchanged": {
      const expr = eq(state, old(state));
      return { expr, text: printExpr(expr) };
    }
    case "outcomes": {
      const branches = post.branches.map((b) => and(eq(result(), lit(b.result)), eq(state, lit(b.to))));
      const text =
        branches.length === 1
          ? printExpr(branches[0])
          : branches.map((b) => `(${printExpr(b)})`).join(" || ");
      return { expr: or(...branches), text };
    }
  }
}

// ============================================================================
// Structural Verification
// ============================================================================

export interface ProtocolReport {
  readonly valid: boolean;
  /** States no sequence of operations can reach from the initial state */
  readonly unreachableStates: readonly string[];
  /** Non-terminal states in which no operation is enabled */
  readonly deadEndStates: readonly string[];
  /** Operations whose allowed source set is empty */
  readonly unusableOperations: readonly string[];
}

/** Check a protocol for unreachable states, dead ends and unusable operations. */
export function verifyProtocol(protocol: ProtocolState): ProtocolReport {
  const successors = (state: string): string[] => {
    const next: string[] = [];
    for (const transition of protocol.transitions.values()) {
      if (transition.from && !transition.from.includes(state)) continue;
      switch (transition.post.kind) {
        case "to":
          next.push(transition.post.state);
          break;
        case "unchanged":
          next.push(state);
          break;
        case "outcomes":
          for (const branch of transition.post.branches) next.push(branch.to);
          break;
      }
    }
    return next;
  };

  const visited = new Set<string>([protocol.initial]);
  const queue = [protocol.initial];
  while (queue.length > 0) {
    const state = queue.shift();
    if (state === undefined) break;
    for (const next of successors(state)) {
      if (!visited.has(next)) {
        visited.add(next);
        queue.push(next);
      }
    }
  }

  const enabled = (state: string): boolean =>
    [...protocol.transitions.values()].some((t) => !t.from || t.from.includes(state));

  const unreachableStates = protocol.states.filter((s) => !visited.has(s));
  const deadEndStates = protocol.states.filter(
    (s) => !protocol.terminal.includes(s) && !enabled(s)
  );
  const unusableOperations = [...protocol.transitions.values()]
    .filter((t) => t.from !== undefined && t.from.length === 0)
    .map((t) => t.operation);

  return {
    valid:
      unreachableStates.length === 0 &&
      deadEndStates.length === 0 &&
      unusableOperations.length === 0,
    unreachableStates,
    deadEndStates,
    unusableOperations,
  };
}
