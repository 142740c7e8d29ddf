import { describe, it, expect } from "vitest";
import {
  type AbstractValue,
  type Expr,
  type Term,
  type Truth,
  type Valuation,
  UNKNOWN,
  FALSY_LITERALS,
  PredicateSyntaxError,
  abstractValueOf,
  and,
  applyCompare,
  disjuncts,
  eq,
  evaluate,
  field,
  holds,
  instantiate,
  lit,
  member,
  negation,
  old,
  parsePredicate,
  printExpr,
  ref,
  result,
} from "../index.js";

const valuation = (values: Record<string, AbstractValue>): Valuation => ({
  valueOf: (term) => values[printExpr(term)] ?? UNKNOWN,
});

const roundTrip = (source: string): string => printExpr(parsePredicate(source));

// ---------------------------------------------------------------------------
// Parsing & printing
// ---------------------------------------------------------------------------

describe("parsePredicate", () => {
  it("parses a state comparison", () => {
    expect(parsePredicate('this.state === "Computed"')).toEqual(
      eq(field("state"), lit("Computed"))
    );
  });

  it("prints disjunctive outcomes without redundant parentheses", () => {
    expect(
      roundTrip(
        '(Result() === true && this.state === "Computed") || (Result() === false && this.state === "Initialized")'
      )
    ).toBe(
      'Result() === true && this.state === "Computed" || Result() === false && this.state === "Initialized"'
    );
  });

  it("keeps parentheses that change meaning", () => {
    expect(roundTrip("a - (b - c)")).toBe("a - (b - c)");
    expect(roundTrip("(a - b) - c")).toBe("a - b - c");
    expect(roundTrip("(a || b) && c")).toBe("(a || b) && c");
    expect(roundTrip("!(a && b)")).toBe("!(a && b)");
  });

  it("expands loose null comparisons", () => {
    expect(roundTrip("x == null")).toBe("x === null || x === undefined");
    expect(roundTrip("x != null")).toBe("x !== null && x !== undefined");
    expect(roundTrip("x == 3")).toBe("x === 3");
  });

  it("reads Result(), old() and element access", () => {
    expect(parsePredicate("Result()")).toEqual(result());
    expect(parsePredicate("old(this.count)")).toEqual(old(field("count")));
    expect(roundTrip('this["state"] !== "Done"')).toBe('this.state !== "Done"');
  });

  it("keeps brackets around keys that are not identifiers", () => {
    expect(roundTrip('this["a.b"] === 1')).toBe('this["a.b"] === 1');
    expect(roundTrip("this[0] > 0")).toBe('this["0"] > 0');
    expect(printExpr(member(field("a"), "b"))).not.toBe(printExpr(member(ref("this"), "a.b")));
  });

  it("folds negative numeric literals and keeps unary minus otherwise", () => {
    expect(parsePredicate("-5")).toEqual(lit(-5));
    expect(roundTrip("-x < 0")).toBe("-x < 0");
  });

  it("sees through type assertions", () => {
    expect(roundTrip("(this.cache as number) > 0")).toBe("this.cache > 0");
    expect(roundTrip("this.cache! > 0")).toBe("this.cache > 0");
  });

  it("rejects calls other than Result() and old()", () => {
    expect(() => parsePredicate("this.compute()")).toThrow(PredicateSyntaxError);
    expect(() => parsePredicate("old(a, b)")).toThrow(PredicateSyntaxError);
    expect(() => parsePredicate("Result(1)")).toThrow(PredicateSyntaxError);
  });

  it("rejects assignments and computed member access", () => {
    expect(() => parsePredicate("x = 1")).toThrow(PredicateSyntaxError);
    expect(() => parsePredicate("this.items[i]")).toThrow(PredicateSyntaxError);
  });

  it("names the predicate in the error", () => {
    expect(() => parsePredicate("f(x)")).toThrow(/in predicate `f\(x\)`/);
  });
});

// ---------------------------------------------------------------------------
// Structure helpers
// ---------------------------------------------------------------------------

describe("negation", () => {
  it("pushes negation through connectives and comparisons", () => {
    expect(printExpr(negation(parsePredicate("a < b && !c")))).toBe("a >= b || c");
    expect(printExpr(negation(parsePredicate("x === 1 || y")))).toBe("x !== 1 && !y");
  });
});

describe("instantiate", () => {
  it("binds this, parameters and Result()", () => {
    const clause = parsePredicate("this.limit >= amount && Result() === amount");
    const bound = instantiate(clause, {
      self: ref("acct"),
      params: new Map([["amount", lit(5)]]),
      result: ref("r#1"),
    });
    expect(printExpr(bound)).toBe("acct.limit >= 5 && r#1 === 5");
  });

  it("replaces old() operands through the callback", () => {
    const clause = parsePredicate("this.count === old(this.count) + 1");
    const bound = instantiate(clause, {
      self: ref("c"),
      old: (operand) => (printExpr(operand) === "this.count" ? ref("c.count@entry") : undefined),
    });
    expect(printExpr(bound)).toBe("c.count === c.count@entry + 1");
  });
});

// ---------------------------------------------------------------------------
// Three-valued evaluation
// ---------------------------------------------------------------------------

describe("evaluate", () => {
  it("decides membership against a finite set of states", () => {
    const facts = valuation({
      "this.state": { kind: "oneOf", values: ["Initialized", "Computed"] },
    });
    expect(evaluate(parsePredicate('this.state === "Computed"'), facts)).toBe("unknown");
    expect(evaluate(parsePredicate('this.state !== "NotReady"'), facts)).toBe("true");
    expect(
      evaluate(parsePredicate('this.state === "Initialized" || this.state === "Computed"'), facts)
    ).toBe("true");
  });

  it("refutes equality with an excluded constant", () => {
    const facts = valuation({ x: { kind: "excludes", values: [null] } });
    expect(evaluate(parsePredicate("x !== null"), facts)).toBe("true");
    expect(evaluate(parsePredicate("x === 3"), facts)).toBe("unknown");
  });

  it("follows Kleene logic", () => {
    const facts = valuation({ p: { kind: "const", value: false }, q: { kind: "const", value: true } });
    expect(evaluate(parsePredicate("p && unknownThing"), facts)).toBe("false");
    expect(evaluate(parsePredicate("q || unknownThing"), facts)).toBe("true");
    expect(evaluate(parsePredicate("unknownThing && q"), facts)).toBe("unknown");
    expect(evaluate(parsePredicate("!unknownThing"), facts)).toBe("unknown");
  });

  it("treats a term excluding every falsy literal as truthy", () => {
    const facts = valuation({ flag: { kind: "excludes", values: FALSY_LITERALS } });
    expect(evaluate(parsePredicate("flag"), facts)).toBe("true");
  });

  it("keeps NaN possible until it is excluded", () => {
    const facts = valuation({ n: { kind: "excludes", values: [false, 0, "", null, undefined] } });
    expect(evaluate(parsePredicate("n"), facts)).toBe("unknown");
  });

  it("computes arithmetic on constants", () => {
    const facts = valuation({ a: { kind: "const", value: 4 } });
    expect(abstractValueOf(parsePredicate("a * 2 + 1"), facts)).toEqual({ kind: "const", value: 9 });
    expect(evaluate(parsePredicate("a % 2 === 0"), facts)).toBe("true");
  });

  it("consults recorded truths before structure", () => {
    const facts: Valuation = {
      valueOf: () => UNKNOWN,
      truthOf: (expr) => (printExpr(expr) === "a < b" ? "true" : undefined),
    };
    expect(evaluate(parsePredicate("a < b && a < b"), facts)).toBe("true");
    expect(evaluate(parsePredicate("a >= b"), facts)).toBe("unknown");
  });
});

describe("candidate enumeration", () => {
  class RecordedFacts implements Valuation {
    private readonly recorded = new Set(["a < b"]);

    valueOf(term: Term): AbstractValue {
      return printExpr(term) === "s" ? { kind: "oneOf", values: ["A", "B"] } : UNKNOWN;
    }

    truthOf(expr: Expr): Truth | undefined {
      return this.recorded.has(printExpr(expr)) ? "true" : undefined;
    }
  }

  it("decides a disjunction over every candidate of a term", () => {
    expect(evaluate(parsePredicate('s === "A" || s === "B"'), new RecordedFacts())).toBe("true");
    expect(evaluate(parsePredicate('s === "A" && a < b'), new RecordedFacts())).toBe("unknown");
    expect(evaluate(parsePredicate('(s === "A" || s === "B") && a < b'), new RecordedFacts())).toBe("true");
  });
});

describe("applyCompare", () => {
  it("relates only numbers with numbers and strings with strings", () => {
    expect(applyCompare("<", 1, 2)).toBe(true);
    expect(applyCompare("<", "a", "b")).toBe(true);
    expect(applyCompare("<", "a", 1)).toBe(false);
    expect(applyCompare(">=", null, 0)).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Concrete evaluation
// ---------------------------------------------------------------------------

describe("holds", () => {
  it("evaluates against live values", () => {
    const self = { count: 2, name: "x" };
    expect(holds(parsePredicate("this.count > 0 && this.name !== null"), { self })).toBe(true);
    expect(holds(parsePredicate("this.count > 2"), { self })).toBe(false);
  });

  it("reads members of null and undefined as undefined", () => {
    const self = { inner: null };
    expect(holds(parsePredicate("this.inner.value === undefined"), { self })).toBe(true);
    expect(holds(parsePredicate("this.missing.deep.value == null"), { self })).toBe(true);
  });

  it("reads members of primitives", () => {
    expect(holds(parsePredicate('name.length === 3'), { params: new Map([["name", "abc"]]) })).toBe(true);
  });

  it("binds Result() and old() snapshots", () => {
    const clause = parsePredicate("this.count === old(this.count) + 1 && Result() === true");
    const context = { self: { count: 3 }, result: true, old: new Map([["this.count", 2]]) };
    expect(holds(clause, context)).toBe(true);
  });

  it("is idempotent", () => {
    const clause = parsePredicate("this.count >= 0");
    const context = { self: { count: 1 } };
    expect(holds(clause, context)).toBe(holds(clause, context));
  });

  it("does not hold when arithmetic has no defined value", () => {
    expect(holds(parsePredicate("this.a - 1 === 0"), { self: { a: "1" } })).toBe(false);
  });

  it("satisfies exactly one outcome branch for a concrete result", () => {
    const outcomes = and(eq(result(), lit(true)), eq(field("state"), lit("Computed")));
    const other = and(eq(result(), lit(false)), eq(field("state"), lit("Initialized")));
    const clause = parsePredicate(`(${printExpr(outcomes)}) || (${printExpr(other)})`);
    const context = { self: { state: "Computed" }, result: true };
    expect(disjuncts(clause).filter((d) => holds(d, context))).toHaveLength(1);
  });
});
