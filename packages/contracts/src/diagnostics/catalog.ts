/**
 * Diagnostic Catalog
 *
 * Every diagnostic the engine produces has a numbered entry here:
 *
 * - 9001-9099: runtime violations
 * - 9100-9199: obligations the static verifier could not prove
 * - 9200-9299: structural problems in protocol definitions
 */

import type { Severity } from "../config.js";

export enum DiagnosticCategory {
  Runtime = "runtime",
  Static = "static",
  Protocol = "protocol",
}

export interface DiagnosticDescriptor {
  /** Unique code in range 9001-9999, printed as COV<code> */
  readonly code: number;

  /** Default severity (can be overridden per report) */
  readonly severity: Severity;

  readonly category: DiagnosticCategory;

  /** Message template with {placeholders} for interpolation */
  readonly messageTemplate: string;

  /** Long-form explanation for docs */
  readonly explanation: string;
}

// ============================================================================
// Runtime Violations (9001-9099)
// ============================================================================

export const COV9001: DiagnosticDescriptor = {
  code: 9001,
  severity: "error",
  category: DiagnosticCategory.Runtime,
  messageTemplate: "Precondition of {operation} violated: {clause}",
  explanation: `The caller invoked an operation in a situation its Requires clause forbids.
The operation body did not run. Fix the calling code, for example by checking
the object's state (or the operation's result) before making this call.`,
};

export const COV9002: DiagnosticDescriptor = {
  code: 9002,
  severity: "error",
  category: DiagnosticCategory.Runtime,
  messageTemplate: "Postcondition of {operation} violated: {clause}",
  explanation: `The operation returned normally without establishing its Ensures clause.
This is a bug in the operation's implementation, not in the caller. For
protocol clauses it means the resulting state matches no declared outcome.`,
};

export const COV9003: DiagnosticDescriptor = {
  code: 9003,
  severity: "error",
  category: DiagnosticCategory.Runtime,
  messageTemplate: "Invariant of {type} violated after {operation}: {clause}",
  explanation: `Type invariants must hold whenever no public operation is running on the
instance. The named operation completed and left the instance inconsistent.`,
};

// ============================================================================
// Unproven Obligations (9100-9199)
// ============================================================================

export const COV9101: DiagnosticDescriptor = {
  code: 9101,
  severity: "warning",
  category: DiagnosticCategory.Static,
  messageTemplate: "Cannot prove precondition of {operation}: {clause}",
  explanation: `The facts known at this call site do not imply the callee's Requires clause.
Either the call really can happen in a forbidden state, or the facts that
rule it out are not visible to the checker. Guard the call with a test of
the state or of an earlier result, or strengthen the Ensures clauses and
invariants the call site relies on.`,
};

export const COV9102: DiagnosticDescriptor = {
  code: 9102,
  severity: "warning",
  category: DiagnosticCategory.Static,
  messageTemplate: "Cannot prove postcondition of {operation}: {clause}",
  explanation: `On some path to this return point the known facts do not imply the
operation's Ensures clause. Callers rely on that clause without looking at
the body, so an unproven postcondition weakens every call site.`,
};

export const COV9103: DiagnosticDescriptor = {
  code: 9103,
  severity: "warning",
  category: DiagnosticCategory.Static,
  messageTemplate: "Cannot prove invariant of {type} at the end of {operation}: {clause}",
  explanation: `Public operations and constructors must leave their instance satisfying the
type's invariants. The facts at this return point do not establish it.`,
};

export const COV9104: DiagnosticDescriptor = {
  code: 9104,
  severity: "warning",
  category: DiagnosticCategory.Static,
  messageTemplate: "Analysis of {context} exceeded its budget; not proven: {clause}",
  explanation: `The analysis of this operation visited more blocks than static.maxSteps
allows, so none of its obligations count as proven. Simplify the control
flow, or raise the budget in the configuration.`,
};

// ============================================================================
// Protocol Structure (9200-9299)
// ============================================================================

export const COV9201: DiagnosticDescriptor = {
  code: 9201,
  severity: "warning",
  category: DiagnosticCategory.Protocol,
  messageTemplate: "State {state} of {type} is unreachable from the initial state",
  explanation: `No sequence of declared transitions leads from the initial state to this
state. Either a transition is missing or the state can be removed.`,
};

export const COV9202: DiagnosticDescriptor = {
  code: 9202,
  severity: "warning",
  category: DiagnosticCategory.Protocol,
  messageTemplate: "State {state} of {type} enables no operation and is not terminal",
  explanation: `An instance that reaches this state can no longer be used. Mark the state
terminal if that is intended.`,
};

export const COV9203: DiagnosticDescriptor = {
  code: 9203,
  severity: "warning",
  category: DiagnosticCategory.Protocol,
  messageTemplate: "Operation {operation} can never be called: it allows no source state",
  explanation: `The transition lists an empty set of source states, so its Requires clause
is unsatisfiable.`,
};

// ============================================================================
// Catalog Registry
// ============================================================================

export const DIAGNOSTIC_CATALOG: ReadonlyMap<number, DiagnosticDescriptor> = new Map(
  [COV9001, COV9002, COV9003, COV9101, COV9102, COV9103, COV9104, COV9201, COV9202, COV9203].map(
    (d) => [d.code, d]
  )
);

export function getDiagnosticDescriptor(code: number): DiagnosticDescriptor | undefined {
  return DIAGNOSTIC_CATALOG.get(code);
}

export function formatCode(descriptor: DiagnosticDescriptor): string {
  return `COV${descriptor.code}`;
}

/**
 * Fill `{placeholders}` in a template. Unknown placeholders are left as
 * written.
 */
export function interpolate(template: string, args: Readonly<Record<string, string>>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => args[key] ?? match);
}
