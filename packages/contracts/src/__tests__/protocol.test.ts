import { describe, it, expect } from "vitest";
import {
  ProtocolDefinitionError,
  type ProtocolState,
  defineProtocol,
  membershipClause,
  protocolClauses,
  verifyProtocol,
} from "../index.js";

const solverProtocol = defineProtocol({
  states: ["NotReady", "Initialized", "Computed"],
  initial: "NotReady",
  transitions: {
    initialize: { from: ["NotReady"], to: "Initialized" },
    compute: {
      from: ["Initialized", "Computed"],
      outcomes: [
        { result: true, to: "Computed" },
        { result: false, to: "Initialized" },
      ],
    },
    answer: { from: ["Computed"] },
  },
});

// ---------------------------------------------------------------------------
// Definition
// ---------------------------------------------------------------------------

describe("defineProtocol", () => {
  it("defaults the attribute to state", () => {
    expect(solverProtocol.attribute).toBe("state");
    expect(solverProtocol.initial).toBe("NotReady");
    expect([...solverProtocol.transitions.keys()]).toEqual(["initialize", "compute", "answer"]);
  });

  it("rejects an empty domain", () => {
    expect(() => defineProtocol({ states: [], initial: "A", transitions: {} })).toThrow(
      ProtocolDefinitionError
    );
  });

  it("rejects duplicated states", () => {
    expect(() => defineProtocol({ states: ["A", "A"], initial: "A", transitions: {} })).toThrow(
      'State "A" is declared twice'
    );
  });

  it("rejects an initial state outside the domain", () => {
    expect(() => defineProtocol({ states: ["A"], initial: "B", transitions: {} })).toThrow(
      'Unknown state "B" in initial'
    );
  });

  it("rejects transitions to unknown states", () => {
    expect(() =>
      defineProtocol({ states: ["A"], initial: "A", transitions: { go: { to: "Z" } } })
    ).toThrow('Unknown state "Z" in go.to');
  });

  it("rejects a transition with both a target and outcomes", () => {
    expect(() =>
      defineProtocol({
        states: ["A", "B"],
        initial: "A",
        transitions: { go: { to: "B", outcomes: [{ result: true, to: "B" }] } },
      })
    ).toThrow('go declares both "to" and "outcomes"');
  });

  it("rejects repeated outcome results", () => {
    expect(() =>
      defineProtocol({
        states: ["A", "B"],
        initial: "A",
        transitions: {
          go: {
            outcomes: [
              { result: true, to: "A" },
              { result: true, to: "B" },
            ],
          },
        },
      })
    ).toThrow("go declares result true twice");
  });

  it("rejects repeated source states", () => {
    expect(() =>
      defineProtocol({ states: ["A", "B"], initial: "A", transitions: { go: { from: ["A", "A"] } } })
    ).toThrow('State "A" appears twice in go.from');
  });

  it("rejects a constructor transition", () => {
    expect(() =>
      defineProtocol({ states: ["A"], initial: "A", transitions: { constructor: { to: "A" } } })
    ).toThrow(ProtocolDefinitionError);
  });
});

// ---------------------------------------------------------------------------
// Clause compilation
// ---------------------------------------------------------------------------

describe("protocolClauses", () => {
  it("counts distinct source states when deciding whether to require one", () => {
    const base = defineProtocol({ states: ["A", "B"], initial: "A", transitions: {} });
    const repeated: ProtocolState = {
      ...base,
      transitions: new Map([["go", { operation: "go", from: ["A", "A"], post: { kind: "unchanged" } }]]),
    };
    expect(protocolClauses(repeated, "go").requires?.text).toBe('this.state === "A"');
  });

  it("compiles a single-target transition", () => {
    const { requires, ensures } = protocolClauses(solverProtocol, "initialize");
    expect(requires?.text).toBe('this.state === "NotReady"');
    expect(ensures?.text).toBe('this.state === "Initialized"');
  });

  it("compiles outcome branches keyed on Result()", () => {
    const { requires, ensures } = protocolClauses(solverProtocol, "compute");
    expect(requires?.text).toBe('this.state === "Initialized" || this.state === "Computed"');
    expect(ensures?.text).toBe(
      '(Result() === true && this.state === "Computed") || (Result() === false && this.state === "Initialized")'
    );
  });

  it("keeps the state for transitions without a target", () => {
    const { requires, ensures } = protocolClauses(solverProtocol, "answer");
    expect(requires?.text).toBe('this.state === "Computed"');
    expect(ensures?.text).toBe("this.state === old(this.state)");
  });

  it("gives constructors the initial state", () => {
    const clauses = protocolClauses(solverProtocol, "constructor");
    expect(clauses.requires).toBeUndefined();
    expect(clauses.ensures?.text).toBe('this.state === "NotReady"');
  });

  it("adds no requires when every state is allowed", () => {
    const protocol = defineProtocol({
      states: ["A", "B"],
      initial: "A",
      transitions: { toggle: { from: ["A", "B"], to: "B" } },
    });
    expect(protocolClauses(protocol, "toggle").requires).toBeUndefined();
  });

  it("compiles an empty source set to false", () => {
    const protocol = defineProtocol({
      states: ["A"],
      initial: "A",
      transitions: { never: { from: [] } },
    });
    expect(protocolClauses(protocol, "never").requires?.text).toBe("false");
  });

  it("returns nothing for operations outside the protocol", () => {
    expect(protocolClauses(solverProtocol, "reset")).toEqual({});
  });

  it("uses a custom attribute name", () => {
    const protocol = defineProtocol({
      attribute: "phase",
      states: ["Open", "Closed"],
      initial: "Open",
      transitions: { close: { from: ["Open"], to: "Closed" } },
    });
    expect(membershipClause(protocol).text).toBe('this.phase === "Open" || this.phase === "Closed"');
  });
});

// ---------------------------------------------------------------------------
// Structural verification
// ---------------------------------------------------------------------------

describe("verifyProtocol", () => {
  it("accepts a protocol where every state is reachable and live", () => {
    expect(verifyProtocol(solverProtocol)).toEqual({
      valid: true,
      unreachableStates: [],
      deadEndStates: [],
      unusableOperations: [],
    });
  });

  it("reports unreachable states, dead ends and unusable operations", () => {
    const protocol = defineProtocol({
      states: ["A", "B", "C"],
      initial: "A",
      terminal: ["B"],
      transitions: {
        go: { from: ["A"], to: "B" },
        stop: { from: [] },
      },
    });
    expect(verifyProtocol(protocol)).toEqual({
      valid: false,
      unreachableStates: ["C"],
      deadEndStates: ["C"],
      unusableOperations: ["stop"],
    });
  });
});
