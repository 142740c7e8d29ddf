/**
 * Diagnostic Reporter
 *
 * Turns runtime violations, unproven static obligations and protocol
 * problems into uniform records, orders them deterministically and renders
 * them as text or JSON:
 *
 * ```
 * src/app.ts:12:10 - warning COV9101: Cannot prove precondition of Solver.answer: this.state === "Computed"
 * ```
 */

import type { Severity } from "../config.js";
import type { ContractClause } from "../declarations/types.js";
import type { ProtocolReport } from "../protocol/protocol.js";
import type { ContractViolation } from "../runtime/errors.js";
import {
  COV9001,
  COV9002,
  COV9003,
  COV9201,
  COV9202,
  COV9203,
  type DiagnosticDescriptor,
  formatCode,
  interpolate,
} from "./catalog.js";

// ============================================================================
// Types
// ============================================================================

export type DiagnosticKind =
  | "PreconditionViolation"
  | "PostconditionViolation"
  | "InvariantViolation"
  | "UnprovenObligation"
  | "ProtocolIssue";

/** 1-based position in a source file. */
export interface SourceLocation {
  readonly file: string;
  readonly line: number;
  readonly column: number;
}

export interface ClauseReference {
  readonly id: string;
  readonly text: string;
}

export interface ContractDiagnostic {
  readonly severity: Severity;
  /** Catalog code, e.g. `COV9101` */
  readonly code: string;
  readonly kind: DiagnosticKind;
  readonly location?: SourceLocation;
  /** Operation whose clause is at stake (the callee, for preconditions) */
  readonly operation: string;
  /** Operation in which the problem was found */
  readonly context: string;
  readonly clause?: ClauseReference;
  readonly message: string;
}

export interface DiagnosticInit {
  kind: DiagnosticKind;
  operation: string;
  context?: string;
  location?: SourceLocation;
  clause?: ContractClause | ClauseReference;
  /** Values for the descriptor's placeholders besides operation/context/clause */
  args?: Readonly<Record<string, string>>;
  severity?: Severity;
}

export interface DiagnosticSummary {
  readonly errors: number;
  readonly warnings: number;
  readonly infos: number;
  readonly total: number;
}

// ============================================================================
// Construction
// ============================================================================

export function createDiagnostic(
  descriptor: DiagnosticDescriptor,
  init: DiagnosticInit
): ContractDiagnostic {
  const context = init.context ?? init.operation;
  const clause = init.clause ? { id: init.clause.id, text: init.clause.text } : undefined;
  const message = interpolate(descriptor.messageTemplate, {
    operation: init.operation,
    context,
    clause: clause?.text ?? "",
    ...init.args,
  });

  return {
    severity: init.severity ?? descriptor.severity,
    code: formatCode(descriptor),
    kind: init.kind,
    location: init.location,
    operation: init.operation,
    context,
    clause,
    message,
  };
}

const VIOLATION_DESCRIPTORS = {
  precondition: { descriptor: COV9001, kind: "PreconditionViolation" },
  postcondition: { descriptor: COV9002, kind: "PostconditionViolation" },
  invariant: { descriptor: COV9003, kind: "InvariantViolation" },
} as const;

/**
 * Record for a runtime violation. Violations are terminal for the call
 * path that raised them, so they are always errors.
 */
export function diagnosticFromViolation(
  violation: ContractViolation,
  location?: SourceLocation
): ContractDiagnostic {
  const { descriptor, kind } = VIOLATION_DESCRIPTORS[violation.kind];
  return createDiagnostic(descriptor, {
    kind,
    operation: violation.operation,
    location,
    clause: violation.clause,
    args: { type: violation.clause.owner.type ?? violation.operation },
  });
}

/** Records for the problems found by verifyProtocol(). */
export function diagnosticsFromProtocol(type: string, report: ProtocolReport): ContractDiagnostic[] {
  const base = { kind: "ProtocolIssue" as const, operation: type };
  return [
    ...report.unreachableStates.map((state) =>
      createDiagnostic(COV9201, { ...base, args: { type, state: JSON.stringify(state) } })
    ),
    ...report.deadEndStates.map((state) =>
      createDiagnostic(COV9202, { ...base, args: { type, state: JSON.stringify(state) } })
    ),
    ...report.unusableOperations.map((operation) =>
      createDiagnostic(COV9203, { ...base, operation: `${type}.${operation}`, context: type })
    ),
  ];
}

// ============================================================================
// Ordering
// ============================================================================

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Order by file, line, column, operation, clause id and message.
 * Diagnostics without a location come first.
 */
export function compareDiagnostics(a: ContractDiagnostic, b: ContractDiagnostic): number {
  return (
    compareStrings(a.location?.file ?? "", b.location?.file ?? "") ||
    (a.location?.line ?? 0) - (b.location?.line ?? 0) ||
    (a.location?.column ?? 0) - (b.location?.column ?? 0) ||
    compareStrings(a.operation, b.operation) ||
    compareStrings(a.clause?.id ?? "", b.clause?.id ?? "") ||
    compareStrings(a.message, b.message)
  );
}

export function sortDiagnostics(diagnostics: readonly ContractDiagnostic[]): ContractDiagnostic[] {
  return [...diagnostics].sort(compareDiagnostics);
}

// ============================================================================
// Rendering
// ============================================================================

/** `file:line:col - severity CODE: message` */
export function formatDiagnostic(diagnostic: ContractDiagnostic): string {
  const where = diagnostic.location
    ? `${diagnostic.location.file}:${diagnostic.location.line}:${diagnostic.location.column}`
    : diagnostic.context;
  return `${where} - ${diagnostic.severity} ${diagnostic.code}: ${diagnostic.message}`;
}

export function summarize(diagnostics: readonly ContractDiagnostic[]): DiagnosticSummary {
  const count = (severity: Severity): number =>
    diagnostics.filter((d) => d.severity === severity).length;
  return {
    errors: count("error"),
    warnings: count("warning"),
    infos: count("info"),
    total: diagnostics.length,
  };
}

/**
 * Render diagnostics in order, followed by a summary line such as
 * `1 error, 2 warnings`. Empty input renders as an empty string.
 */
export function formatDiagnostics(diagnostics: readonly ContractDiagnostic[]): string {
  if (diagnostics.length === 0) return "";

  const lines = sortDiagnostics(diagnostics).map(formatDiagnostic);
  const summary = summarize(diagnostics);
  const parts: string[] = [];
  if (summary.errors > 0) parts.push(`${summary.errors} error${summary.errors > 1 ? "s" : ""}`);
  if (summary.warnings > 0) parts.push(`${summary.warnings} warning${summary.warnings > 1 ? "s" : ""}`);
  if (summary.infos > 0) parts.push(`${summary.infos} info${summary.infos > 1 ? "s" : ""}`);
  lines.push(parts.join(", "));

  return lines.join("\n");
}

export function diagnosticsToJSON(diagnostics: readonly ContractDiagnostic[]): string {
  return JSON.stringify(sortDiagnostics(diagnostics), null, 2);
}

// ============================================================================
// Reporter
// ============================================================================

/**
 * Collects diagnostics from any source and hands them out in order.
 */
export class DiagnosticReporter {
  private readonly collected: ContractDiagnostic[] = [];

  report(diagnostic: ContractDiagnostic): this {
    this.collected.push(diagnostic);
    return this;
  }

  reportAll(diagnostics: Iterable<ContractDiagnostic>): this {
    for (const diagnostic of diagnostics) this.collected.push(diagnostic);
    return this;
  }

  reportViolation(violation: ContractViolation, location?: SourceLocation): this {
    return this.report(diagnosticFromViolation(violation, location));
  }

  get diagnostics(): ContractDiagnostic[] {
    return sortDiagnostics(this.collected);
  }

  get hasErrors(): boolean {
    return this.collected.some((d) => d.severity === "error");
  }

  summary(): DiagnosticSummary {
    return summarize(this.collected);
  }

  format(): string {
    return formatDiagnostics(this.collected);
  }

  renderJSON(): string {
    return diagnosticsToJSON(this.collected);
  }
}
