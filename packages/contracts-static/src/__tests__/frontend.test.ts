import { describe, it, expect } from "vitest";
import { ContractRegistry, defineContract, printExpr } from "@covenant/contracts";
import { type BasicBlock, type OperationBody, type Statement, buildProgramGraph } from "../index.js";

const source = (...lines: string[]): string => lines.join("\n");

function onlyBody(text: string, registry = new ContractRegistry()): OperationBody {
  const graph = buildProgramGraph(text, "input.ts", registry);
  expect(graph.bodies).toHaveLength(1);
  return graph.bodies[0];
}

function block(body: OperationBody, id: number): BasicBlock {
  const found = body.blocks.get(id);
  if (!found) throw new Error(`no block ${id}`);
  return found;
}

function describeStatement(statement: Statement): string {
  switch (statement.kind) {
    case "assign":
      return `${printExpr(statement.target)} = ${printExpr(statement.value)}`;
    case "call":
      return `${statement.target ?? ""} := ${statement.name}(${statement.args.map(printExpr).join(", ")})`;
    case "havoc":
      return `havoc ${printExpr(statement.target)}`;
    case "forget":
      return "forget";
  }
}

const statementsOf = (body: OperationBody, id: number): string[] =>
  block(body, id).statements.map(describeStatement);

function branchOf(body: OperationBody, id: number): [string | undefined, number, number] {
  const terminator = block(body, id).terminator;
  if (terminator.kind !== "branch") throw new Error(`block ${id} ends in ${terminator.kind}`);
  return [terminator.condition && printExpr(terminator.condition), terminator.then, terminator.else];
}

describe("buildProgramGraph", () => {
  it("turns && in a condition into one branch per operand", () => {
    const body = onlyBody(
      source(
        "function f(a: number) {",
        "  let b = a + 1;",
        "  if (a > 0 && b > 2) {",
        "    b = 0;",
        "  }",
        "  return b;",
        "}"
      )
    );

    expect(body.name).toBe("f");
    expect(body.params).toEqual([{ name: "a", type: "number" }]);
    expect(body.blocks.size).toBe(4);
    expect(statementsOf(body, 0)).toEqual(["b = a + 1"]);

    expect(branchOf(body, 0)).toEqual(["a > 0", 3, 2]);
    expect(branchOf(body, 3)).toEqual(["b > 2", 1, 2]);

    expect(statementsOf(body, 1)).toEqual(["b = 0"]);
    expect(block(body, 1).terminator).toMatchObject({ kind: "goto", target: 2 });
    const last = block(body, 2).terminator;
    expect(last.kind === "return" && last.value && printExpr(last.value)).toBe("b");
  });

  it("lifts nested calls and lowers declared getters into calls", () => {
    const registry = new ContractRegistry();
    defineContract(registry, "Solver", {
      operations: { compute: { params: ["input"] }, answer: { kind: "getter" } },
    });
    const body = onlyBody(source("function g(s: Solver) {", "  return s.compute(s.answer);", "}"), registry);

    expect(statementsOf(body, 0)).toEqual(["$0 := Solver.answer()", "$1 := Solver.compute($0)"]);
    const [, compute] = block(body, 0).statements;
    expect(compute).toMatchObject({
      kind: "call",
      callee: { type: "Solver", operation: "compute" },
      receiverType: "Solver",
      location: { file: "input.ts", line: 2, column: 10 },
    });
  });

  it("starts catch clauses with no facts", () => {
    const body = onlyBody(
      source("function h() {", "  try {", "    work();", "  } catch (e) {", "    recover(e);", "  }", "}")
    );

    expect(branchOf(body, 0)).toEqual([undefined, 3, 2]);
    expect(statementsOf(body, 3)).toEqual(["$0 := work()"]);
    expect(statementsOf(body, 2)).toEqual(["forget", "havoc e", "$1 := recover(e)"]);
    expect(block(body, 1).terminator.kind).toBe("return");
  });

  it("forgets locals the try block writes before entering catch", () => {
    const body = onlyBody(
      source(
        "function g() {",
        "  let n = 0;",
        "  try {",
        "    n = 1;",
        "    work();",
        "  } catch (e) {",
        "    n++;",
        "  }",
        "}"
      )
    );

    expect(branchOf(body, 0)).toEqual([undefined, 3, 2]);
    expect(statementsOf(body, 3)).toEqual(["n = 1", "$0 := work()"]);
    expect(statementsOf(body, 2)).toEqual(["forget", "havoc n", "havoc e", "$1 = n", "n = n + 1"]);
  });

  it("runs the finally block before returning from the try block", () => {
    const body = onlyBody(
      source(
        "function f() {",
        "  let x = 1;",
        "  try {",
        "    return x;",
        "  } finally {",
        "    x = 2;",
        "    done();",
        "  }",
        "}"
      )
    );

    expect(statementsOf(body, 3)).toEqual(["$0 = x", "x = 2", "$1 := done()"]);
    const exit = block(body, 3).terminator;
    expect(exit.kind === "return" && exit.value && printExpr(exit.value)).toBe("$0");
    expect(statementsOf(body, 2)).toEqual(["forget", "x = 2", "$2 := done()"]);
  });

  it("keeps the operand a short-circuit operator yields", () => {
    const body = onlyBody(source("function pick(a: number | null) {", "  return a || 0;", "}"));

    expect(statementsOf(body, 0)).toEqual(["$0 = a"]);
    expect(branchOf(body, 0)).toEqual(["a", 2, 1]);
    expect(statementsOf(body, 1)).toEqual(["$0 = 0"]);
    const exit = block(body, 2).terminator;
    expect(exit.kind === "return" && exit.value && printExpr(exit.value)).toBe("$0");
  });

  it("treats loose equality as strict only between values of one primitive type", () => {
    const body = onlyBody(
      source("function same(a: number, b: string) {", "  if (a == 3) return;", "  if (a == b) return;", "}")
    );

    expect(branchOf(body, 0)).toEqual(["a === 3", 1, 2]);
    expect(statementsOf(body, 2)).toEqual(["havoc $0"]);
    expect(branchOf(body, 2)).toEqual(["$0", 3, 4]);
  });

  it("expands loose comparisons with null", () => {
    const body = onlyBody(source("function k(x: string | null) {", "  if (x == null) return;", "}"));
    expect(branchOf(body, 0)).toEqual(["x === null || x === undefined", 1, 2]);
    expect(body.params).toEqual([{ name: "x", type: "string" }]);
  });

  it("runs property initializers at the start of the constructor", () => {
    const graph = buildProgramGraph(
      source(
        "class Counter {",
        "  count = 0;",
        "  constructor(private readonly step: number) {",
        "    this.count += step;",
        "  }",
        "  static create() {",
        "    return new Counter(1);",
        "  }",
        "}"
      ),
      "counter.ts",
      new ContractRegistry()
    );

    expect(graph.bodies.map((b) => b.name)).toEqual(["Counter.constructor"]);
    expect(statementsOf(graph.bodies[0], 0)).toEqual([
      "this.step = step",
      "this.count = 0",
      "this.count = this.count + step",
    ]);
  });

  it("keeps labeled breaks pointed at the outer loop", () => {
    const body = onlyBody(
      source(
        "function m(n: number) {",
        "  outer: while (n > 0) {",
        "    for (;;) {",
        "      break outer;",
        "    }",
        "  }",
        "}"
      )
    );
    // while: head 1, body 2, exit 3; for: head 4, body 5, update 6, exit 7
    expect(block(body, 5).terminator).toMatchObject({ kind: "goto", target: 3 });
  });
});
