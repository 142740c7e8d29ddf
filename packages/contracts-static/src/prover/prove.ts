/**
 * Obligation Prover
 *
 * Discharges one instantiated clause against the facts of one path. Proof
 * layers run in order and the first that succeeds wins:
 *
 * 1. **Syntactic**: the clause was recorded verbatim as a fact
 * 2. **Propagation**: the shared evaluator decides it from known values
 * 3. **Case split**: an open disjunctive fact is split into its feasible
 *    disjuncts and the clause holds under each one
 *
 * Conjunctive goals are proven conjunct by conjunct; the reported method
 * is the strongest any conjunct needed.
 */

import { type Expr, conjuncts, evaluate } from "@covenant/contracts";
import type { FactSet } from "../facts/fact-set.js";

// ============================================================================
// Types
// ============================================================================

export type ProofMethod = "syntactic" | "propagation" | "case-split";

export interface ProofResult {
  /** Whether the goal holds on every feasible refinement of the facts */
  proven: boolean;
  /** Which layer succeeded */
  method?: ProofMethod;
}

const STRENGTH: Record<ProofMethod, number> = {
  syntactic: 0,
  propagation: 1,
  "case-split": 2,
};

/** The method that needed more reasoning. */
export function strongerMethod(a: ProofMethod, b: ProofMethod): ProofMethod {
  return STRENGTH[a] >= STRENGTH[b] ? a : b;
}

// ============================================================================
// Main Entry Point
// ============================================================================

/**
 * Try to prove `goal` from `facts`, splitting at most `maxCaseSplitDepth`
 * nested disjunctions.
 *
 * @example
 * ```typescript
 * const facts = FactSet.empty();
 * facts.assume(parsePredicate('(r === true && s.state === "Computed") || (r === false && s.state === "Initialized")'));
 * facts.assume(parsePredicate("r"));
 * tryProve(parsePredicate('s.state === "Computed"'), facts, 2);
 * // => { proven: true, method: "propagation" }
 * ```
 */
export function tryProve(goal: Expr, facts: FactSet, maxCaseSplitDepth: number): ProofResult {
  if (!facts.feasible) return { proven: true, method: "propagation" };

  let method: ProofMethod = "syntactic";
  for (const part of conjuncts(goal)) {
    const result = proveAtom(part, facts, maxCaseSplitDepth);
    if (!result.proven || !result.method) return { proven: false };
    method = strongerMethod(method, result.method);
  }
  return { proven: true, method };
}

function proveAtom(goal: Expr, facts: FactSet, depth: number): ProofResult {
  if (facts.records(goal)) return { proven: true, method: "syntactic" };

  const truth = evaluate(goal, facts);
  if (truth === "true") return { proven: true, method: "propagation" };
  if (truth === "false" || depth <= 0) return { proven: false };

  return caseSplit(goal, facts, depth);
}

function caseSplit(goal: Expr, facts: FactSet, depth: number): ProofResult {
  for (const { key, live } of facts.openDisjunctions()) {
    let holdsInEveryCase = true;
    for (const disjunct of live) {
      const branch = facts.without(key);
      if (!branch.assume(disjunct)) continue;
      if (!proveAtom(goal, branch, depth - 1).proven) {
        holdsInEveryCase = false;
        break;
      }
    }
    if (holdsInEveryCase) return { proven: true, method: "case-split" };
  }
  return { proven: false };
}
