import { describe, it, expect } from "vitest";
import {
  COV9101,
  COV9102,
  ContractRegistry,
  DiagnosticCategory,
  DiagnosticReporter,
  PreconditionViolation,
  createDiagnostic,
  defineProtocol,
  diagnosticFromViolation,
  diagnosticsFromProtocol,
  diagnosticsToJSON,
  formatDiagnostic,
  formatDiagnostics,
  getDiagnosticDescriptor,
  interpolate,
  sortDiagnostics,
  verifyProtocol,
} from "../index.js";

function withdrawViolation(): PreconditionViolation {
  const registry = new ContractRegistry();
  registry.declareType("Account");
  registry.declareOperation("Account", "withdraw", { params: ["amount"] });
  const clause = registry.registerClause({ type: "Account", operation: "withdraw" }, "requires", "amount > 0");
  return new PreconditionViolation({ operation: "Account.withdraw", clause, args: [-1] });
}

const answerRequires = { id: "Solver.answer#requires[0]", text: 'this.state === "Computed"' };

function unproven(file: string, line: number, column = 1) {
  return createDiagnostic(COV9101, {
    kind: "UnprovenObligation",
    operation: "Solver.answer",
    context: "main",
    location: { file, line, column },
    clause: answerRequires,
  });
}

// ---------------------------------------------------------------------------
// Catalog
// ---------------------------------------------------------------------------

describe("catalog", () => {
  it("looks descriptors up by code", () => {
    expect(getDiagnosticDescriptor(9102)).toBe(COV9102);
    expect(getDiagnosticDescriptor(9102)?.category).toBe(DiagnosticCategory.Static);
    expect(getDiagnosticDescriptor(1234)).toBeUndefined();
  });

  it("interpolates known placeholders only", () => {
    expect(interpolate("{a} and {b}", { a: "x" })).toBe("x and {b}");
  });
});

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

describe("createDiagnostic", () => {
  it("fills the template from the clause and operation", () => {
    const diagnostic = unproven("src/app.ts", 12, 10);
    expect(diagnostic.code).toBe("COV9101");
    expect(diagnostic.severity).toBe("warning");
    expect(diagnostic.message).toBe('Cannot prove precondition of Solver.answer: this.state === "Computed"');
    expect(diagnostic.context).toBe("main");
  });

  it("takes a severity override", () => {
    const diagnostic = createDiagnostic(COV9101, {
      kind: "UnprovenObligation",
      operation: "Solver.answer",
      clause: answerRequires,
      severity: "error",
    });
    expect(diagnostic.severity).toBe("error");
    expect(diagnostic.context).toBe("Solver.answer");
  });
});

describe("diagnosticFromViolation", () => {
  it("reports a runtime violation as an error", () => {
    const diagnostic = diagnosticFromViolation(withdrawViolation());
    expect(diagnostic).toEqual({
      severity: "error",
      code: "COV9001",
      kind: "PreconditionViolation",
      location: undefined,
      operation: "Account.withdraw",
      context: "Account.withdraw",
      clause: { id: "Account.withdraw#requires[0]", text: "amount > 0" },
      message: "Precondition of Account.withdraw violated: amount > 0",
    });
  });
});

describe("diagnosticsFromProtocol", () => {
  it("reports every structural problem", () => {
    const protocol = defineProtocol({
      states: ["A", "B", "C"],
      initial: "A",
      terminal: ["B"],
      transitions: { go: { from: ["A"], to: "B" }, stop: { from: [] } },
    });
    const lines = sortDiagnostics(diagnosticsFromProtocol("Machine", verifyProtocol(protocol))).map(
      formatDiagnostic
    );
    expect(lines).toEqual([
      'Machine - warning COV9202: State "C" of Machine enables no operation and is not terminal',
      'Machine - warning COV9201: State "C" of Machine is unreachable from the initial state',
      "Machine - warning COV9203: Operation Machine.stop can never be called: it allows no source state",
    ]);
  });
});

// ---------------------------------------------------------------------------
// Ordering & rendering
// ---------------------------------------------------------------------------

describe("sortDiagnostics", () => {
  it("orders by file, line and column", () => {
    const sorted = sortDiagnostics([
      unproven("b.ts", 1),
      unproven("a.ts", 9, 4),
      unproven("a.ts", 9, 2),
      unproven("a.ts", 3),
    ]);
    expect(sorted.map((d) => `${d.location?.file}:${d.location?.line}:${d.location?.column}`)).toEqual([
      "a.ts:3:1",
      "a.ts:9:2",
      "a.ts:9:4",
      "b.ts:1:1",
    ]);
  });
});

describe("formatDiagnostics", () => {
  it("renders sorted lines and a summary", () => {
    const text = formatDiagnostics([
      unproven("src/app.ts", 20),
      diagnosticFromViolation(withdrawViolation()),
      unproven("src/app.ts", 12, 10),
    ]);
    expect(text.split("\n")).toEqual([
      "Account.withdraw - error COV9001: Precondition of Account.withdraw violated: amount > 0",
      'src/app.ts:12:10 - warning COV9101: Cannot prove precondition of Solver.answer: this.state === "Computed"',
      'src/app.ts:20:1 - warning COV9101: Cannot prove precondition of Solver.answer: this.state === "Computed"',
      "1 error, 2 warnings",
    ]);
  });

  it("renders nothing for no diagnostics", () => {
    expect(formatDiagnostics([])).toBe("");
  });
});

describe("DiagnosticReporter", () => {
  it("collects diagnostics and summarizes them", () => {
    const reporter = new DiagnosticReporter();
    reporter.report(unproven("src/app.ts", 4));
    expect(reporter.hasErrors).toBe(false);

    reporter.reportViolation(withdrawViolation(), { file: "src/bank.ts", line: 7, column: 3 });
    expect(reporter.hasErrors).toBe(true);
    expect(reporter.summary()).toEqual({ errors: 1, warnings: 1, infos: 0, total: 2 });
    expect(reporter.diagnostics.map((d) => d.code)).toEqual(["COV9101", "COV9001"]);
  });

  it("renders JSON in order", () => {
    const reporter = new DiagnosticReporter().reportAll([unproven("b.ts", 1), unproven("a.ts", 1)]);
    const json = reporter.renderJSON();
    expect(json.indexOf('"a.ts"')).toBeLessThan(json.indexOf('"b.ts"'));
    expect(reporter.renderJSON()).toBe(diagnosticsToJSON(reporter.diagnostics));
  });
});
