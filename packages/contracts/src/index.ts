/**
 * @covenant/contracts: Design by Contract with explicit state protocols
 *
 * Operations and types declare Requires, Ensures and Invariant clauses as
 * TypeScript expression source. The runtime verifier checks them at every
 * call boundary; `@covenant/contracts-static` proves them ahead of time.
 *
 * @example
 * ```typescript
 * import { defineContract, defineProtocol, globalContracts, instrument } from "@covenant/contracts";
 *
 * defineContract(globalContracts, "Solver", {
 *   protocol: defineProtocol({
 *     states: ["NotReady", "Initialized", "Computed"],
 *     initial: "NotReady",
 *     transitions: {
 *       initialize: { from: ["NotReady"], to: "Initialized" },
 *       compute: {
 *         from: ["Initialized", "Computed"],
 *         outcomes: [
 *           { result: true, to: "Computed" },
 *           { result: false, to: "Initialized" },
 *         ],
 *       },
 *       answer: { from: ["Computed"] },
 *     },
 *   }),
 *   operations: {
 *     constructor: {},
 *     initialize: {},
 *     compute: { params: ["input"] },
 *     answer: { kind: "getter", ensures: ["Result() !== null"] },
 *   },
 * });
 * globalContracts.freeze();
 *
 * const CheckedSolver = instrument(Solver);
 * ```
 *
 * Runtime checks follow the configuration (see `config.ts`):
 * - `mode: "full"`: All checks (default)
 * - `mode: "assertions"`: Only invariants
 * - `mode: "none"`: No checks
 */

// ============================================================================
// Predicates
// ============================================================================

export * from "./predicate/ast.js";
export { printExpr, printLiteral } from "./predicate/print.js";
export { parsePredicate, convertExpression } from "./predicate/parse.js";
export * from "./predicate/evaluate.js";
export * from "./predicate/substitute.js";
export * from "./predicate/concrete.js";

// ============================================================================
// Declarations
// ============================================================================

export * from "./declarations/types.js";
export { ContractRegistry, globalContracts } from "./declarations/registry.js";
export {
  defineContract,
  defineFunction,
  type ClauseSpec,
  type ContractDefinition,
  type OperationDefinition,
} from "./declarations/define.js";

// ============================================================================
// Protocols
// ============================================================================

export * from "./protocol/protocol.js";

// ============================================================================
// Runtime
// ============================================================================

export * from "./runtime/errors.js";
export { RuntimeVerifier, freezeSnapshot } from "./runtime/verifier.js";
export { instrument, type InstrumentOptions } from "./runtime/instrument.js";

// ============================================================================
// Diagnostics
// ============================================================================

export * from "./diagnostics/catalog.js";
export * from "./diagnostics/reporter.js";

// ============================================================================
// Configuration & Logging
// ============================================================================

export {
  getContractConfig,
  setContractConfig,
  resetContractConfig,
  loadContractConfig,
  shouldEmitCheck,
  type ContractConfig,
  type ContractConfigInput,
  type ContractMode,
  type Severity,
  type StaticAnalysisConfig,
} from "./config.js";
export { createLogger, type Logger } from "./log.js";
