import { describe, it, expect } from "vitest";
import { member, parsePredicate, ref } from "@covenant/contracts";
import { FactSet } from "../index.js";
import { describeValue, joinValues, meetValues } from "../facts/fact-set.js";

const p = parsePredicate;

function factsOf(...predicates: string[]): FactSet {
  const facts = FactSet.empty();
  for (const predicate of predicates) facts.assume(p(predicate));
  return facts;
}

// ---------------------------------------------------------------------------
// Lattice
// ---------------------------------------------------------------------------

describe("abstract values", () => {
  it("meets candidate sets and exclusions", () => {
    expect(meetValues({ kind: "oneOf", values: [1, 2, 3] }, { kind: "excludes", values: [2] })).toEqual({
      kind: "oneOf",
      values: [1, 3],
    });
    expect(meetValues({ kind: "const", value: 1 }, { kind: "const", value: 2 })).toBeUndefined();
    expect(meetValues({ kind: "unknown" }, { kind: "const", value: "a" })).toEqual({ kind: "const", value: "a" });
  });

  it("joins differing constants into a membership set", () => {
    expect(joinValues({ kind: "const", value: "a" }, { kind: "const", value: "b" })).toEqual({
      kind: "oneOf",
      values: ["a", "b"],
    });
    expect(
      joinValues({ kind: "excludes", values: [null, undefined] }, { kind: "excludes", values: [null] })
    ).toEqual({ kind: "excludes", values: [null] });
    expect(joinValues({ kind: "const", value: 1 }, { kind: "unknown" })).toEqual({ kind: "unknown" });
  });

  it("describes values in sorted order", () => {
    expect(describeValue({ kind: "excludes", values: [undefined, null] })).toBe("not {null, undefined}");
    expect(describeValue({ kind: "oneOf", values: ["b", "a"] })).toBe('one of {"a", "b"}');
  });
});

// ---------------------------------------------------------------------------
// Assumptions
// ---------------------------------------------------------------------------

describe("FactSet.assume", () => {
  it("narrows a term tested against several constants", () => {
    const facts = factsOf('s === "A" || s === "B"');
    expect(facts.valueOf(ref("s"))).toEqual({ kind: "oneOf", values: ["A", "B"] });
    expect(facts.lines()).toEqual(['s: one of {"A", "B"}']);
  });

  it("propagates a refuted disjunct into the remaining one", () => {
    const facts = factsOf("x === 1 || y === 2", "x !== 1");
    expect(facts.valueOf(ref("y"))).toEqual({ kind: "const", value: 2 });
  });

  it("keeps relations between terms in both directions", () => {
    const facts = factsOf("a < b");
    expect(facts.truthOf(p("b > a"))).toBe("true");
    expect(facts.truthOf(p("a >= b"))).toBe("false");
  });

  it("marks contradictions infeasible", () => {
    const facts = FactSet.empty();
    expect(facts.assume(p("x === 1"))).toBe(true);
    expect(facts.assume(p("x === 2"))).toBe(false);
    expect(facts.feasible).toBe(false);
    expect(facts.lines()).toEqual(["<infeasible>"]);
  });

  it("treats a tested term as truthy", () => {
    const facts = factsOf("done");
    expect(facts.valueOf(ref("done"))).toEqual({ kind: "excludes", values: [false, 0, NaN, "", null, undefined] });
  });
});

// ---------------------------------------------------------------------------
// Forgetting & merging
// ---------------------------------------------------------------------------

describe("FactSet.kill", () => {
  it("drops facts about matching members only", () => {
    const facts = factsOf("o.p === 1", "o.q < n");
    facts.kill((term) => term.kind === "member" && term.property === "p");
    expect(facts.valueOf(member(ref("o"), "p"))).toEqual({ kind: "unknown" });
    expect(facts.lines()).toEqual(["n > o.q", "o.q < n"]);
  });

  it("drops member chains built on a symbol", () => {
    const facts = factsOf("a.b.c === 1");
    facts.killSymbol("a");
    expect(facts.lines()).toEqual([]);
  });
});

describe("FactSet.alias", () => {
  it("copies facts to the new symbol", () => {
    const facts = factsOf("x === 1", "x < y");
    facts.alias("x", "z");
    expect(facts.valueOf(ref("z"))).toEqual({ kind: "const", value: 1 });
    expect(facts.truthOf(p("z < y"))).toBe("true");
  });
});

describe("FactSet.join", () => {
  it("keeps what holds on both paths", () => {
    const joined = FactSet.join(factsOf("x === 1", "x < y", "w === 0"), factsOf("x === 2", "x < y"));
    expect(joined.lines()).toEqual(["x < y", "x: one of {1, 2}", "y > x"]);
  });

  it("ignores an infeasible side", () => {
    const dead = factsOf("x === 1", "x === 2");
    expect(FactSet.join(dead, factsOf("y === 3")).lines()).toEqual(["y: 3"]);
  });
});
