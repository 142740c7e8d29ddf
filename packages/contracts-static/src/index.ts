/**
 * @covenant/contracts-static: ahead-of-time contract verification
 *
 * Proves the Requires, Ensures and Invariants declared with
 * `@covenant/contracts` along every path of a program, without running it.
 * Each operation body is analyzed on its own against its callees'
 * declarations; bodies are never inlined.
 *
 * The checker is sound but incomplete: a clause it cannot prove becomes an
 * `UnprovenObligation` diagnostic (a warning by default), never an error it
 * claims to have found.
 *
 * @example
 * ```typescript
 * import { globalContracts, formatDiagnostics } from "@covenant/contracts";
 * import { verifySource } from "@covenant/contracts-static";
 *
 * const { diagnostics, proven } = verifySource(source, "src/main.ts", globalContracts);
 * console.log(formatDiagnostics(diagnostics));
 * ```
 */

// ============================================================================
// Entry Points
// ============================================================================

export { analyzeProgram, verifySource, type AnalysisOptions, type AnalysisResult } from "./analysis/program.js";
export { OperationAnalyzer, type OperationAnalysis, type ProvenObligation } from "./analysis/analyzer.js";

// ============================================================================
// Program Graph
// ============================================================================

export * from "./cfg/types.js";
export { GraphBuilder } from "./cfg/builder.js";
export { buildProgramGraph, typeName } from "./frontend/typescript.js";

// ============================================================================
// Facts & Proofs
// ============================================================================

export { FactSet } from "./facts/fact-set.js";
export { tryProve, strongerMethod, type ProofMethod, type ProofResult } from "./prover/prove.js";
