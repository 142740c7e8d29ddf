import { describe, it, expect } from "vitest";
import { parsePredicate } from "@covenant/contracts";
import { FactSet, strongerMethod, tryProve } from "../index.js";

function factsOf(...predicates: string[]): FactSet {
  const facts = FactSet.empty();
  for (const predicate of predicates) facts.assume(parsePredicate(predicate));
  return facts;
}

const prove = (goal: string, facts: FactSet, depth = 2) => tryProve(parsePredicate(goal), facts, depth);

const outcome = '(r === true && s === "Computed") || (r === false && s === "Initialized")';

describe("tryProve", () => {
  it("matches a recorded fact syntactically", () => {
    expect(prove("a < b", factsOf("a < b"))).toEqual({ proven: true, method: "syntactic" });
  });

  it("decides a goal from known values", () => {
    expect(prove("x > 1", factsOf("x === 3"))).toEqual({ proven: true, method: "propagation" });
    expect(prove("x > 1", factsOf("x === 0"))).toEqual({ proven: false });
  });

  it("uses an earlier postcondition once the result is known", () => {
    expect(prove('s === "Computed"', factsOf(outcome, "r"))).toEqual({ proven: true, method: "propagation" });
  });

  it("splits a disjunctive fact when no single value decides the goal", () => {
    const facts = factsOf(outcome);
    expect(prove('s === "Computed" || s === "Initialized"', facts)).toEqual({
      proven: true,
      method: "case-split",
    });
    expect(prove('s === "Computed"', facts)).toEqual({ proven: false });
  });

  it("does not split beyond the configured depth", () => {
    expect(prove('s === "Computed" || s === "Initialized"', factsOf(outcome), 0)).toEqual({ proven: false });
  });

  it("reports the strongest method any conjunct needed", () => {
    expect(prove("a < b && x > 1", factsOf("a < b", "x === 3"))).toEqual({ proven: true, method: "propagation" });
  });

  it("proves anything on an infeasible path", () => {
    expect(prove("y === 5", factsOf("x === 1", "x === 2"))).toEqual({ proven: true, method: "propagation" });
  });
});

describe("strongerMethod", () => {
  it("orders syntactic, propagation and case-split", () => {
    expect(strongerMethod("syntactic", "case-split")).toBe("case-split");
    expect(strongerMethod("propagation", "syntactic")).toBe("propagation");
  });
});
