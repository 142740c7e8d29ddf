import {
  type ContractDiagnostic,
  type ContractRegistry,
  type StaticAnalysisConfig,
  createLogger,
  diagnosticsFromProtocol,
  getContractConfig,
  globalContracts,
  sortDiagnostics,
  verifyProtocol,
} from "@covenant/contracts";
import type { ProgramGraph } from "../cfg/types.js";
import { buildProgramGraph } from "../frontend/typescript.js";
import { type OperationAnalysis, type ProvenObligation, OperationAnalyzer } from "./analyzer.js";

export interface AnalysisOptions {
  /** Overrides for the `static` section of the contract configuration */
  config?: Partial<StaticAnalysisConfig>;
  /** Report structural problems of every declared protocol (default true) */
  protocolChecks?: boolean;
}

export interface AnalysisResult {
  /** Sorted by file, line, column, operation and clause */
  readonly diagnostics: ContractDiagnostic[];
  readonly proven: ProvenObligation[];
  readonly operations: OperationAnalysis[];
}

const log = createLogger("static");

/**
 * Analyze every body of a program graph. Bodies are independent: each gets
 * its own budget and nothing learned in one carries over to another.
 */
export function analyzeProgram(
  graph: ProgramGraph,
  registry: ContractRegistry = globalContracts,
  options: AnalysisOptions = {}
): AnalysisResult {
  const config: StaticAnalysisConfig = { ...getContractConfig().static, ...options.config };

  const operations = graph.bodies.map((body) => new OperationAnalyzer(body, registry, config, log).run());
  const diagnostics = operations.flatMap((analysis) => analysis.diagnostics);

  if (options.protocolChecks ?? true) {
    for (const type of registry.types()) {
      if (type.protocol) diagnostics.push(...diagnosticsFromProtocol(type.name, verifyProtocol(type.protocol)));
    }
  }

  const proven = operations.flatMap((analysis) => analysis.proven);
  log.debug(`${graph.file}: ${proven.length} obligations proven, ${diagnostics.length} diagnostics`);

  return { diagnostics: sortDiagnostics(diagnostics), proven, operations };
}

/** Lower TypeScript source and analyze it. */
export function verifySource(
  source: string,
  fileName: string,
  registry: ContractRegistry = globalContracts,
  options: AnalysisOptions = {}
): AnalysisResult {
  return analyzeProgram(buildProgramGraph(source, fileName, registry), registry, options);
}
