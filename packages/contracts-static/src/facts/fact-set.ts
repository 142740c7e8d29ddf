/**
 * Path Facts
 *
 * What the analyzer knows on one control-flow path:
 *
 * - values: a term equals a constant, is one of a few constants, or avoids
 *   some constants (`x !== null`)
 * - relations: atomic predicates recorded as true (`a < b`, `r === s`)
 * - disjunctions: `a || b || …` with the disjuncts still feasible
 *
 * A FactSet is a Valuation, so clauses are decided against it with the
 * shared evaluator. Assuming a fact that contradicts the others marks the
 * set infeasible; such paths are pruned.
 */

import {
  type AbstractValue,
  type CompareExpr,
  type Expr,
  type Literal,
  type Term,
  type Truth,
  type Valuation,
  FALSY_LITERALS,
  FLIPPED_COMPARE,
  UNKNOWN,
  abstractValueOf,
  collectTerms,
  compare,
  conjuncts,
  disjuncts,
  evaluate,
  includesLiteral,
  instantiate,
  isLiteral,
  isTerm,
  negation,
  or,
  printExpr,
  printLiteral,
  ref,
  termRoot,
} from "@covenant/contracts";

// ============================================================================
// Abstract Value Lattice
// ============================================================================

function candidatesOf(value: AbstractValue): readonly Literal[] | undefined {
  if (value.kind === "const") return isLiteral(value.value) ? [value.value] : undefined;
  if (value.kind === "oneOf") return value.values;
  return undefined;
}

function fromCandidates(values: readonly Literal[]): AbstractValue {
  return values.length === 1 ? { kind: "const", value: values[0] } : { kind: "oneOf", values };
}

function union(a: readonly Literal[], b: readonly Literal[]): Literal[] {
  return [...a, ...b.filter((v) => !includesLiteral(a, v))];
}

/** Greatest lower bound; undefined when no value satisfies both. */
export function meetValues(a: AbstractValue, b: AbstractValue): AbstractValue | undefined {
  if (a.kind === "unknown") return b;
  if (b.kind === "unknown") return a;

  const left = candidatesOf(a);
  const right = candidatesOf(b);
  if (left && right) {
    const common = left.filter((v) => includesLiteral(right, v));
    return common.length === 0 ? undefined : fromCandidates(common);
  }
  if (left && b.kind === "excludes") {
    const kept = left.filter((v) => !includesLiteral(b.values, v));
    return kept.length === 0 ? undefined : fromCandidates(kept);
  }
  if (right && a.kind === "excludes") return meetValues(b, a);
  if (a.kind === "excludes" && b.kind === "excludes") {
    return { kind: "excludes", values: union(a.values, b.values) };
  }
  return a;
}

/** Least upper bound, used where paths merge. */
export function joinValues(a: AbstractValue, b: AbstractValue): AbstractValue {
  const left = candidatesOf(a);
  const right = candidatesOf(b);
  if (left && right) return fromCandidates(union(left, right));

  if (a.kind === "excludes" && b.kind === "excludes") {
    const common = a.values.filter((v) => includesLiteral(b.values, v));
    return common.length === 0 ? UNKNOWN : { kind: "excludes", values: common };
  }
  if (left && b.kind === "excludes") {
    const kept = b.values.filter((v) => !includesLiteral(left, v));
    return kept.length === 0 ? UNKNOWN : { kind: "excludes", values: kept };
  }
  if (right && a.kind === "excludes") return joinValues(b, a);
  return UNKNOWN;
}

function sortedLiterals(values: readonly Literal[]): string {
  return values.map(printLiteral).sort().join(", ");
}

export function describeValue(value: AbstractValue): string {
  switch (value.kind) {
    case "const":
      return isLiteral(value.value) ? printLiteral(value.value) : "?";
    case "oneOf":
      return `one of {${sortedLiterals(value.values)}}`;
    case "excludes":
      return `not {${sortedLiterals(value.values)}}`;
    case "unknown":
      return "?";
  }
}

// ============================================================================
// Term Matching
// ============================================================================

/** The term and every shorter member chain it is built on. */
function prefixes(term: Term): Term[] {
  const chain: Term[] = [term];
  let current: Expr = term;
  while (current.kind === "member" && isTerm(current.object)) {
    current = current.object;
    chain.push(current);
  }
  return chain;
}

function mentions(expr: Expr, test: (term: Term) => boolean): boolean {
  return collectTerms(expr).some((term) => prefixes(term).some(test));
}

function rootName(term: Term): string | undefined {
  const root = termRoot(term);
  return root.kind === "ref" ? root.name : undefined;
}

// ============================================================================
// FactSet
// ============================================================================

interface ValueEntry {
  readonly term: Term;
  readonly value: AbstractValue;
}

interface Disjunction {
  /** Disjuncts as assumed; the printed disjunction is the key */
  readonly parts: readonly Expr[];
  /** Disjuncts not yet refuted on this path */
  readonly live: readonly Expr[];
}

export class FactSet implements Valuation {
  private readonly values = new Map<string, ValueEntry>();
  private readonly relations = new Map<string, Expr>();
  private readonly disjunctions = new Map<string, Disjunction>();
  private infeasible = false;

  static empty(): FactSet {
    return new FactSet();
  }

  get feasible(): boolean {
    return !this.infeasible;
  }

  clone(): FactSet {
    const copy = new FactSet();
    for (const [key, entry] of this.values) copy.values.set(key, entry);
    for (const [key, expr] of this.relations) copy.relations.set(key, expr);
    for (const [key, disjunction] of this.disjunctions) copy.disjunctions.set(key, disjunction);
    copy.infeasible = this.infeasible;
    return copy;
  }

  // --------------------------------------------------------------------------
  // Valuation
  // --------------------------------------------------------------------------

  valueOf(term: Term): AbstractValue {
    return this.values.get(printExpr(term))?.value ?? UNKNOWN;
  }

  truthOf(expr: Expr): Truth | undefined {
    if (this.relations.has(printExpr(expr))) return "true";
    if (this.relations.has(printExpr(negation(expr)))) return "false";
    return undefined;
  }

  // --------------------------------------------------------------------------
  // Queries
  // --------------------------------------------------------------------------

  /** True when the predicate was recorded verbatim as a relation or disjunction. */
  records(expr: Expr): boolean {
    const key = printExpr(expr);
    if (this.relations.has(key)) return true;
    for (const [original, disjunction] of this.disjunctions) {
      if (original === key || printExpr(or(...disjunction.live)) === key) return true;
    }
    return false;
  }

  /**
   * Disjunctions that can still go more than one way, in the order they
   * were assumed.
   */
  openDisjunctions(): Array<{ key: string; live: readonly Expr[] }> {
    const open: Array<{ key: string; live: readonly Expr[] }> = [];
    for (const [key, disjunction] of this.disjunctions) {
      if (disjunction.live.length < 2) continue;
      if (disjunction.live.some((part) => evaluate(part, this) === "true")) continue;
      open.push({ key, live: disjunction.live });
    }
    return open;
  }

  /** Copy without one disjunction, for case splitting. */
  without(key: string): FactSet {
    const copy = this.clone();
    copy.disjunctions.delete(key);
    return copy;
  }

  // --------------------------------------------------------------------------
  // Assumptions
  // --------------------------------------------------------------------------

  /**
   * Add a fact. Returns false (and marks the set infeasible) when the fact
   * contradicts what is already known.
   */
  assume(expr: Expr): boolean {
    this.add(expr);
    this.propagate();
    return !this.infeasible;
  }

  /** Overwrite what is known about a term, e.g. after an assignment. */
  assign(term: Term, value: AbstractValue): void {
    const key = printExpr(term);
    if (value.kind === "unknown") this.values.delete(key);
    else this.values.set(key, { term, value });
  }

  private add(expr: Expr): void {
    if (this.infeasible) return;
    const truth = evaluate(expr, this);
    if (truth === "false") {
      this.infeasible = true;
      return;
    }
    if (truth === "true") return;

    switch (expr.kind) {
      case "logical":
        if (expr.op === "&&") {
          for (const part of conjuncts(expr)) this.add(part);
        } else {
          this.addDisjunction(disjuncts(expr));
        }
        return;
      case "not": {
        if (isTerm(expr.operand)) {
          this.narrow(expr.operand, { kind: "oneOf", values: FALSY_LITERALS });
          return;
        }
        const pushed = negation(expr.operand);
        if (pushed.kind === "not") this.record(pushed);
        else this.add(pushed);
        return;
      }
      case "compare":
        this.addComparison(expr);
        return;
      default:
        if (isTerm(expr)) this.narrow(expr, { kind: "excludes", values: FALSY_LITERALS });
        else this.record(expr);
    }
  }

  private addComparison(expr: CompareExpr): void {
    const { op, left, right } = expr;
    if (op === "===") {
      const leftCandidates = candidatesOf(abstractValueOf(left, this));
      const rightCandidates = candidatesOf(abstractValueOf(right, this));
      if (isTerm(left) && rightCandidates) this.narrow(left, fromCandidates(rightCandidates));
      if (isTerm(right) && leftCandidates) this.narrow(right, fromCandidates(leftCandidates));
    } else if (op === "!==") {
      const leftValue = abstractValueOf(left, this);
      const rightValue = abstractValueOf(right, this);
      if (isTerm(left) && rightValue.kind === "const" && isLiteral(rightValue.value)) {
        this.narrow(left, { kind: "excludes", values: [rightValue.value] });
      }
      if (isTerm(right) && leftValue.kind === "const" && isLiteral(leftValue.value)) {
        this.narrow(right, { kind: "excludes", values: [leftValue.value] });
      }
    }
    // Values capture equalities with a constant; everything else is kept as a relation
    const relational = op !== "===" && op !== "!==";
    if (relational || (left.kind !== "literal" && right.kind !== "literal")) this.record(expr);
  }

  private addDisjunction(parts: readonly Expr[]): void {
    const live = parts.filter((part) => evaluate(part, this) !== "false");
    if (live.length === 0) {
      this.infeasible = true;
      return;
    }
    if (live.length === 1) {
      this.add(live[0]);
      return;
    }

    const membership = sameTermMembership(live);
    if (membership) {
      this.narrow(membership.term, fromCandidates(membership.values));
      return;
    }

    this.disjunctions.set(printExpr(or(...parts)), { parts, live });
  }

  private record(expr: Expr): void {
    this.relations.set(printExpr(expr), expr);
    if (expr.kind === "compare") {
      const flipped = compare(FLIPPED_COMPARE[expr.op], expr.right, expr.left);
      this.relations.set(printExpr(flipped), flipped);
    }
  }

  private narrow(term: Term, constraint: AbstractValue): void {
    const key = printExpr(term);
    const current = this.valueOf(term);
    const met = meetValues(current, constraint);
    if (!met) {
      this.infeasible = true;
      return;
    }
    if (describeValue(met) === describeValue(current)) return;
    this.values.set(key, { term, value: met });

    // Terms recorded equal to this one learn the same
    for (const relation of [...this.relations.values()]) {
      if (relation.kind !== "compare" || relation.op !== "===") continue;
      if (printExpr(relation.left) !== key || !isTerm(relation.right)) continue;
      this.narrow(relation.right, met);
    }
  }

  /** Refine open disjunctions until nothing changes. */
  private propagate(): void {
    let changed = true;
    while (changed && !this.infeasible) {
      changed = false;
      for (const [key, disjunction] of this.disjunctions) {
        const live = disjunction.live.filter((part) => evaluate(part, this) !== "false");
        if (live.length === disjunction.live.length) continue;
        changed = true;
        this.disjunctions.set(key, { parts: disjunction.parts, live });
        if (live.length === 0) {
          this.infeasible = true;
          return;
        }
        if (live.length === 1) this.add(live[0]);
      }
    }
  }

  // --------------------------------------------------------------------------
  // Forgetting
  // --------------------------------------------------------------------------

  /** Drop every fact that mentions a term (or a chain built on one) matching `test`. */
  kill(test: (term: Term) => boolean): void {
    for (const [key, entry] of this.values) {
      if (prefixes(entry.term).some(test)) this.values.delete(key);
    }
    for (const [key, expr] of this.relations) {
      if (mentions(expr, test)) this.relations.delete(key);
    }
    for (const [key, disjunction] of this.disjunctions) {
      if (disjunction.parts.some((part) => mentions(part, test))) this.disjunctions.delete(key);
    }
  }

  /** Drop every fact about a symbol and the members reached through it. */
  killSymbol(name: string): void {
    this.kill((term) => term.kind === "ref" && term.name === name);
  }

  /** Add a copy of every fact about symbol `from` that talks about `to` instead. */
  alias(from: string, to: string): void {
    const binding = { params: new Map([[from, ref(to)]]) };
    const rooted = (expr: Expr): boolean => collectTerms(expr).some((term) => rootName(term) === from);

    for (const entry of [...this.values.values()]) {
      if (rootName(entry.term) !== from) continue;
      const renamed = instantiate(entry.term, binding);
      if (isTerm(renamed)) this.values.set(printExpr(renamed), { term: renamed, value: entry.value });
    }
    for (const expr of [...this.relations.values()]) {
      if (!rooted(expr)) continue;
      const renamed = instantiate(expr, binding);
      this.relations.set(printExpr(renamed), renamed);
    }
    for (const disjunction of [...this.disjunctions.values()]) {
      if (!disjunction.parts.some(rooted)) continue;
      const parts = disjunction.parts.map((part) => instantiate(part, binding));
      const live = disjunction.live.map((part) => instantiate(part, binding));
      this.disjunctions.set(printExpr(or(...parts)), { parts, live });
    }
  }

  // --------------------------------------------------------------------------
  // Merging
  // --------------------------------------------------------------------------

  /**
   * Facts true on both paths: equal constants stay, differing constants
   * become a membership set, exclusions intersect, relations and
   * disjunctions survive only when both paths carry them.
   */
  static join(a: FactSet, b: FactSet): FactSet {
    if (!a.feasible) return b.clone();
    if (!b.feasible) return a.clone();

    const joined = new FactSet();
    for (const [key, entry] of a.values) {
      const other = b.values.get(key);
      if (!other) continue;
      const value = joinValues(entry.value, other.value);
      if (value.kind !== "unknown") joined.values.set(key, { term: entry.term, value });
    }
    for (const [key, expr] of a.relations) {
      if (b.relations.has(key)) joined.relations.set(key, expr);
    }
    for (const [key, disjunction] of a.disjunctions) {
      const other = b.disjunctions.get(key);
      if (!other) continue;
      const liveKeys = new Set([...disjunction.live, ...other.live].map((part) => printExpr(part)));
      const live = disjunction.parts.filter((part) => liveKeys.has(printExpr(part)));
      joined.disjunctions.set(key, { parts: disjunction.parts, live });
    }
    return joined;
  }

  /** Canonical text of the set; equal signatures mean equal facts. */
  signature(): string {
    return this.lines().join("\n");
  }

  /** One sorted line per fact, for logs and tests. */
  lines(): string[] {
    if (this.infeasible) return ["<infeasible>"];
    const lines = [
      ...[...this.values].map(([key, entry]) => `${key}: ${describeValue(entry.value)}`),
      ...[...this.relations.keys()],
      ...[...this.disjunctions.values()].map((d) => printExpr(or(...d.live))),
    ];
    return lines.sort();
  }
}

/** `t === a || t === b || …` over one term, as that term and its candidates. */
function sameTermMembership(parts: readonly Expr[]): { term: Term; values: Literal[] } | undefined {
  let term: Term | undefined;
  const values: Literal[] = [];
  for (const part of parts) {
    if (part.kind !== "compare" || part.op !== "===") return undefined;
    const [side, constant] =
      part.right.kind === "literal" ? [part.left, part.right] : [part.right, part.left];
    if (constant.kind !== "literal" || !isTerm(side)) return undefined;
    if (term && printExpr(term) !== printExpr(side)) return undefined;
    term = side;
    values.push(constant.value);
  }
  return term ? { term, values } : undefined;
}
