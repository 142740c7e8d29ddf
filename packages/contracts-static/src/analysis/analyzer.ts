/**
 * Operation Analyzer
 *
 * Forward symbolic execution over the control-flow graph of one operation
 * body. Each block gets an entry state made of:
 *
 * - an environment binding locals to immutable symbols (or to expressions
 *   over them), so straight-line assignments propagate facts
 * - a FactSet with what is known on every path reaching the block
 *
 * Call sites turn the callee's Requires into obligations and then apply
 * its declared effect: facts the callee may change are forgotten, its
 * Ensures and its type's invariants are assumed. Bodies are never inlined.
 * Return points check the operation's own Ensures and, for public
 * operations and constructors, its type's invariants.
 *
 * Loops run to a fixpoint. A block whose entry state changes more than
 * `maxBlockVisits` times is widened to no facts at all; after `maxSteps`
 * block visits the operation is given up and none of its obligations
 * count as proven.
 */

import {
  type ClauseKind,
  type ClauseReference,
  type ContractClause,
  type ContractDiagnostic,
  type ContractRegistry,
  type Expr,
  type Logger,
  type OperationContract,
  type ProtocolState,
  type SourceLocation,
  type StaticAnalysisConfig,
  type Term,
  COV9101,
  COV9102,
  COV9103,
  COV9104,
  abstractValueOf,
  bindParams,
  collectOld,
  collectTerms,
  createDiagnostic,
  eq,
  evaluate,
  instantiate,
  isTerm,
  lit,
  member,
  membershipClause,
  negation,
  oldKey,
  printExpr,
  protocolClauses,
  ref,
  termRoot,
} from "@covenant/contracts";
import type {
  BasicBlock,
  BlockId,
  CallStatement,
  OperationBody,
  ReturnTerminator,
  Statement,
} from "../cfg/types.js";
import { FactSet } from "../facts/fact-set.js";
import { type ProofMethod, strongerMethod, tryProve } from "../prover/prove.js";

// ============================================================================
// Types
// ============================================================================

/** An obligation the analyzer discharged, with the layer that did it. */
export interface ProvenObligation {
  readonly kind: ClauseKind;
  /** Operation whose clause was proven (the callee, for Requires) */
  readonly operation: string;
  /** Body in which the obligation arose */
  readonly context: string;
  readonly clause: ClauseReference;
  readonly location: SourceLocation;
  readonly method: ProofMethod;
}

export interface OperationAnalysis {
  readonly operation: string;
  readonly diagnostics: ContractDiagnostic[];
  readonly proven: ProvenObligation[];
  /** Block visits spent */
  readonly steps: number;
  readonly budgetExceeded: boolean;
  /** Blocks whose entry facts were widened away */
  readonly widened: BlockId[];
}

interface PathState {
  readonly env: Map<string, Expr>;
  facts: FactSet;
}

interface Edge {
  readonly target: BlockId;
  readonly state: PathState;
}

interface Site {
  readonly kind: ClauseKind;
  readonly clause: ContractClause;
  readonly operation: string;
  readonly location: SourceLocation;
  proven: boolean;
  method?: ProofMethod;
}

// ============================================================================
// Helpers
// ============================================================================

function cloneState(state: PathState): PathState {
  return { env: new Map(state.env), facts: state.facts.clone() };
}

function signature(state: PathState): string {
  const bindings = [...state.env]
    .map(([name, value]) => `${name}=${printExpr(value)}`)
    .sort()
    .join(";");
  return `${bindings}\n${state.facts.signature()}`;
}

function symbolsOf(expr: Expr): string[] {
  return collectTerms(expr).flatMap((term) => {
    const root = termRoot(term);
    return root.kind === "ref" ? [root.name] : [];
  });
}

/** Only locals and symbols: the value cannot change behind the analysis' back. */
function isImmutable(expr: Expr): boolean {
  return collectTerms(expr).every((term) => term.kind === "ref");
}

// ============================================================================
// Analyzer
// ============================================================================

export class OperationAnalyzer {
  private readonly contract: OperationContract | undefined;
  private readonly ownerType: string | undefined;
  private readonly isConstructor: boolean;
  private readonly symbolTypes = new Map<string, string | undefined>();
  private readonly snapshots = new Set<string>();
  private readonly entrySnapshots = new Map<string, Expr>();
  private readonly entryStates = new Map<BlockId, PathState>();
  private readonly visits = new Map<BlockId, number>();
  private readonly widened = new Set<BlockId>();
  private readonly sites = new Map<string, Site>();
  private steps = 0;

  constructor(
    private readonly body: OperationBody,
    private readonly registry: ContractRegistry,
    private readonly config: StaticAnalysisConfig,
    private readonly log: Logger
  ) {
    this.contract = registry.operation(body.operation.type, body.operation.operation);
    this.ownerType = body.operation.type;
    this.isConstructor = body.operation.operation === "constructor";
  }

  run(): OperationAnalysis {
    const worklist: BlockId[] = [this.body.entry];
    const queued = new Set<BlockId>(worklist);
    this.entryStates.set(this.body.entry, this.entryState());
    this.visits.set(this.body.entry, 1);

    let budgetExceeded = false;
    while (worklist.length > 0) {
      const id = worklist.shift();
      if (id === undefined) break;
      queued.delete(id);

      if (++this.steps > this.config.maxSteps) {
        budgetExceeded = true;
        this.log.warn(
          `Analysis of ${this.body.name} exceeded ${this.config.maxSteps} steps; its obligations are reported unproven`
        );
        break;
      }

      const block = this.body.blocks.get(id);
      const entry = this.entryStates.get(id);
      if (!block || !entry) continue;

      for (const edge of this.runBlock(block, cloneState(entry))) {
        if (this.propagate(edge) && !queued.has(edge.target)) {
          queued.add(edge.target);
          worklist.push(edge.target);
        }
      }
    }

    return budgetExceeded ? this.budgetReport() : this.report();
  }

  // --------------------------------------------------------------------------
  // Entry
  // --------------------------------------------------------------------------

  private entryState(): PathState {
    const env = new Map<string, Expr>();
    const facts = FactSet.empty();

    if (this.ownerType) this.symbolTypes.set("this", this.ownerType);
    for (const param of this.body.params) {
      env.set(param.name, ref(param.name));
      this.symbolTypes.set(param.name, param.type);
    }

    // State-domain membership of every typed root
    if (this.ownerType && !this.isConstructor) this.assumeMembership(facts, ref("this"), this.ownerType);
    const protocol = this.constructedProtocol();
    if (protocol) facts.assign(member(ref("this"), protocol.attribute), { kind: "const", value: undefined });
    for (const param of this.body.params) {
      if (param.type) this.assumeMembership(facts, ref(param.name), param.type);
    }

    if (this.contract) {
      for (const clause of this.contract.requires) facts.assume(clause.expr);
      if (this.ownerType && !this.isConstructor && this.contract.visibility === "public") {
        for (const clause of this.registry.invariantsOf(this.ownerType)) facts.assume(clause.expr);
      }
      for (const clause of this.contract.ensures) {
        for (const node of collectOld(clause.expr)) {
          const key = oldKey(node.operand);
          if (this.entrySnapshots.has(key)) continue;
          this.entrySnapshots.set(key, this.snapshot(facts, node.operand, `${key}@entry`));
        }
      }
    }

    return { env, facts };
  }

  private constructedProtocol(): ProtocolState | undefined {
    return this.isConstructor && this.ownerType ? this.registry.typeContract(this.ownerType)?.protocol : undefined;
  }

  private assumeMembership(facts: FactSet, self: Expr, type: string): void {
    const protocol = this.registry.typeContract(type)?.protocol;
    if (protocol) facts.assume(instantiate(membershipClause(protocol).expr, { self }));
  }

  /** Bind an immutable symbol to the current value of `operand`. */
  private snapshot(facts: FactSet, operand: Expr, name: string): Expr {
    const symbol = ref(name);
    const value = abstractValueOf(operand, facts);
    facts.killSymbol(name);
    facts.assign(symbol, value);
    if (isTerm(operand)) facts.assume(eq(symbol, operand));
    this.snapshots.add(name);
    return symbol;
  }

  // --------------------------------------------------------------------------
  // Worklist
  // --------------------------------------------------------------------------

  /** Merge an incoming state into a block's entry state; true when it changed. */
  private propagate(edge: Edge): boolean {
    const existing = this.entryStates.get(edge.target);
    let next = existing ? this.join(edge.target, existing, edge.state) : edge.state;
    if (existing && signature(next) === signature(existing)) return false;

    const count = (this.visits.get(edge.target) ?? 0) + 1;
    this.visits.set(edge.target, count);
    if (existing && count > this.config.maxBlockVisits) {
      next = { env: next.env, facts: FactSet.empty() };
      if (!this.widened.has(edge.target)) {
        this.widened.add(edge.target);
        this.log.debug(`Widened block ${edge.target} of ${this.body.name} after ${count} visits`);
      }
      if (signature(next) === signature(existing)) return false;
    }

    this.entryStates.set(edge.target, next);
    return true;
  }

  /**
   * Join two states at a block. Locals bound differently on the two paths
   * are rebound to a merge symbol, and each path's facts about its own
   * binding are carried over to that symbol before the facts are joined.
   */
  private join(block: BlockId, a: PathState, b: PathState): PathState {
    const left = a.facts.clone();
    const right = b.facts.clone();
    const env = new Map<string, Expr>();

    const common = [...a.env.keys()].filter((name) => b.env.has(name)).sort();
    const merged = new Set(
      common.filter((name) => printExpr(this.binding(a, name)) !== printExpr(this.binding(b, name)))
    );
    const mergeSymbols = new Set([...merged].map((name) => `${name}@${block}`));

    // Locals that read a symbol about to be rebound go first
    const dependents = common.filter(
      (name) =>
        !merged.has(name) &&
        [a, b].some((s) => symbolsOf(this.binding(s, name)).some((symbol) => mergeSymbols.has(symbol)))
    );

    for (const name of [...dependents, ...merged]) {
      const symbol = `${name}@${block}`;
      const type = this.body.locals.get(name) ?? this.typeOf(this.binding(a, name));
      this.bindMerge(left, this.binding(a, name), symbol);
      this.bindMerge(right, this.binding(b, name), symbol);
      this.symbolTypes.set(symbol, type);
      env.set(name, ref(symbol));
    }
    for (const name of common) {
      if (!env.has(name)) env.set(name, this.binding(a, name));
    }

    return { env, facts: FactSet.join(left, right) };
  }

  private binding(state: PathState, name: string): Expr {
    return state.env.get(name) ?? ref(name);
  }

  private bindMerge(facts: FactSet, binding: Expr, symbol: string): void {
    if (binding.kind === "ref" && binding.name === symbol) return;
    const value = abstractValueOf(binding, facts);
    facts.killSymbol(symbol);
    if (binding.kind === "ref") facts.alias(binding.name, symbol);
    facts.assign(ref(symbol), value);
  }

  // --------------------------------------------------------------------------
  // Blocks
  // --------------------------------------------------------------------------

  private runBlock(block: BasicBlock, state: PathState): Edge[] {
    for (const [index, statement] of block.statements.entries()) {
      this.execute(statement, `${block.id}.${index}`, state);
      if (!state.facts.feasible) return [];
    }

    const terminator = block.terminator;
    switch (terminator.kind) {
      case "goto":
        return [{ target: terminator.target, state }];
      case "branch": {
        if (!terminator.condition) {
          return [
            { target: terminator.then, state: cloneState(state) },
            { target: terminator.else, state },
          ];
        }
        const condition = this.resolve(terminator.condition, state);
        const truth = evaluate(condition, state.facts);
        const edges: Edge[] = [];
        if (truth !== "false") {
          const taken = cloneState(state);
          if (taken.facts.assume(condition)) edges.push({ target: terminator.then, state: taken });
        }
        if (truth !== "true") {
          const taken = cloneState(state);
          if (taken.facts.assume(negation(condition))) edges.push({ target: terminator.else, state: taken });
        }
        return edges;
      }
      case "return":
        this.checkReturn(terminator, `${block.id}.return`, state);
        return [];
      case "throw":
        return [];
    }
  }

  private execute(statement: Statement, site: string, state: PathState): void {
    switch (statement.kind) {
      case "assign": {
        const value = this.resolve(statement.value, state);
        if (statement.target.kind === "ref") this.assignLocal(statement.target.name, value, site, state);
        else this.assignField(this.resolve(statement.target, state), value, state);
        return;
      }
      case "havoc":
        if (statement.target.kind === "ref") {
          const symbol = `${statement.target.name}#${site}`;
          state.facts.killSymbol(symbol);
          this.symbolTypes.set(symbol, this.body.locals.get(statement.target.name));
          state.env.set(statement.target.name, ref(symbol));
        } else {
          const target = this.resolve(statement.target, state);
          if (target.kind === "member") this.killField(state.facts, target.object, target.property);
        }
        return;
      case "forget":
        state.facts = FactSet.empty();
        return;
      case "call":
        this.call(statement, site, state);
        return;
    }
  }

  private resolve(expr: Expr, state: PathState): Expr {
    return instantiate(expr, { params: state.env });
  }

  private assignLocal(name: string, value: Expr, site: string, state: PathState): void {
    const declared = this.body.locals.get(name);
    if (isImmutable(value)) {
      if (value.kind === "ref" && declared && this.symbolTypes.get(value.name) === undefined) {
        this.symbolTypes.set(value.name, declared);
      }
      state.env.set(name, value);
      return;
    }

    const symbol = `${name}#${site}`;
    const abstract = abstractValueOf(value, state.facts);
    state.facts.killSymbol(symbol);
    state.facts.assign(ref(symbol), abstract);
    state.facts.assume(eq(ref(symbol), value));
    this.symbolTypes.set(symbol, declared ?? this.typeOf(value));
    state.env.set(name, ref(symbol));
  }

  private assignField(target: Expr, value: Expr, state: PathState): void {
    if (target.kind !== "member" || !isTerm(target)) return;
    const abstract = abstractValueOf(value, state.facts);
    this.killField(state.facts, target.object, target.property);
    state.facts.assign(target, abstract);
    if (value.kind !== "literal" && isImmutable(value)) state.facts.assume(eq(target, value));
  }

  /** Forget `<object>.<property>` and the same property of anything that may alias it. */
  private killField(facts: FactSet, object: Expr, property: string): void {
    const written = printExpr(object);
    const type = this.typeOf(object);
    facts.kill((term) => {
      if (term.kind !== "member" || term.property !== property) return false;
      if (printExpr(term.object) === written) return true;
      if (this.isSnapshot(term)) return false;
      const other = this.typeOf(term.object);
      return other === undefined || type === undefined || other === type;
    });
  }

  private typeOf(expr: Expr): string | undefined {
    return expr.kind === "ref" ? this.symbolTypes.get(expr.name) : undefined;
  }

  private isSnapshot(term: Term): boolean {
    const root = termRoot(term);
    return root.kind === "ref" && this.snapshots.has(root.name);
  }

  // --------------------------------------------------------------------------
  // Calls
  // --------------------------------------------------------------------------

  private call(statement: CallStatement, site: string, state: PathState): void {
    const callee = statement.callee
      ? this.registry.operation(statement.callee.type, statement.callee.operation)
      : undefined;
    const constructing = statement.callee?.operation === "constructor";
    const calleeType = statement.callee?.type;
    const receiver = statement.receiver ? this.resolve(statement.receiver, state) : undefined;
    const args = statement.args.map((arg) => this.resolve(arg, state));

    const resultName = `${statement.target ?? "$"}#${site}`;
    const resultSymbol = ref(resultName);
    state.facts.killSymbol(resultName);
    this.symbolTypes.set(
      resultName,
      callee?.returns ?? (constructing ? calleeType : undefined) ?? statement.resultType
    );

    const self = constructing ? resultSymbol : receiver;
    const params = bindParams(callee?.params.map((p) => p.name) ?? [], args);
    const snapshots = new Map<string, Expr>();

    if (callee) {
      const requires = callee.requires.map((clause) => ({
        clause,
        goal: instantiate(clause.expr, { self, params }),
      }));
      for (const { clause, goal } of requires) {
        this.check(`${site}:${clause.id}`, "requires", clause, callee.qualifiedName, goal, state.facts, statement.location);
      }

      for (const clause of callee.ensures) {
        for (const node of collectOld(clause.expr)) {
          const key = oldKey(node.operand);
          if (snapshots.has(key)) continue;
          const operand = instantiate(node.operand, { self, params });
          snapshots.set(key, this.snapshot(state.facts, operand, `${key}@${site}`));
        }
      }

      for (const { goal } of requires) state.facts.assume(goal);
    }

    this.forgetCallEffects(state.facts, receiver, args, constructing, calleeType ?? statement.receiverType);

    if (callee) {
      for (const clause of callee.ensures) {
        state.facts.assume(
          instantiate(clause.expr, {
            self,
            params,
            result: resultSymbol,
            old: (operand) => snapshots.get(oldKey(operand)),
          })
        );
      }
    } else if (constructing && calleeType) {
      // Declared type without a declared constructor: still starts in its initial state
      const protocol = this.registry.typeContract(calleeType)?.protocol;
      const ensures = protocol ? protocolClauses(protocol, "constructor").ensures : undefined;
      if (ensures) state.facts.assume(instantiate(ensures.expr, { self: resultSymbol }));
    }

    if (self && calleeType && (constructing || callee?.visibility === "public")) {
      for (const clause of this.registry.invariantsOf(calleeType)) {
        state.facts.assume(instantiate(clause.expr, { self }));
      }
    } else if (self && calleeType) {
      this.assumeMembership(state.facts, self, calleeType);
    }

    const resultType = this.symbolTypes.get(resultName);
    if (!constructing && resultType && this.registry.typeContract(resultType)) {
      for (const clause of this.registry.invariantsOf(resultType)) {
        state.facts.assume(instantiate(clause.expr, { self: resultSymbol }));
      }
    }

    if (statement.target) state.env.set(statement.target, resultSymbol);
  }

  /**
   * Forget what a call may change: fields of its receiver and arguments,
   * and fields of every root of the callee's type or of unknown type.
   * Constructors cannot reach existing instances of their own type.
   */
  private forgetCallEffects(
    facts: FactSet,
    receiver: Expr | undefined,
    args: readonly Expr[],
    constructing: boolean,
    calleeType: string | undefined
  ): void {
    const touched = new Set(
      [receiver, ...args].flatMap((expr) => (expr && isTerm(expr) ? [printExpr(expr)] : []))
    );
    facts.kill((term) => {
      if (term.kind !== "member") return false;
      if (touched.has(printExpr(term.object))) return true;
      if (this.isSnapshot(term)) return false;
      const root = termRoot(term);
      const rootType = root.kind === "ref" ? this.symbolTypes.get(root.name) : undefined;
      if (rootType === undefined) return true;
      return !constructing && rootType === calleeType;
    });
  }

  // --------------------------------------------------------------------------
  // Obligations
  // --------------------------------------------------------------------------

  private checkReturn(terminator: ReturnTerminator, site: string, state: PathState): void {
    if (!this.contract) return;

    // The engine puts a fresh instance in its initial state when the constructor left it undefined
    const protocol = this.constructedProtocol();
    if (protocol) {
      const attribute = member(ref("this"), protocol.attribute);
      const value = state.facts.valueOf(attribute);
      if (value.kind === "const" && value.value === undefined) {
        state.facts.assign(attribute, { kind: "const", value: protocol.initial });
      } else if (value.kind === "oneOf" && value.values.includes(undefined)) {
        const values = [...new Set(value.values.map((v) => (v === undefined ? protocol.initial : v)))];
        state.facts.assign(attribute, values.length === 1 ? { kind: "const", value: values[0] } : { kind: "oneOf", values });
      }
    }

    const result = this.isConstructor
      ? ref("this")
      : terminator.value
        ? this.resolve(terminator.value, state)
        : lit(undefined);

    for (const clause of this.contract.ensures) {
      const goal = instantiate(clause.expr, {
        result,
        old: (operand) => this.entrySnapshots.get(oldKey(operand)),
      });
      this.check(`${site}:${clause.id}`, "ensures", clause, this.body.name, goal, state.facts, terminator.location);
    }

    if (this.invariantsApply()) {
      for (const clause of this.registry.invariantsOf(this.ownerType ?? "")) {
        this.check(`${site}:${clause.id}`, "invariant", clause, this.body.name, clause.expr, state.facts, terminator.location);
      }
    }
  }

  private invariantsApply(): boolean {
    return (
      this.config.checkInvariants &&
      this.ownerType !== undefined &&
      this.contract !== undefined &&
      (this.isConstructor || this.contract.visibility === "public")
    );
  }

  /**
   * Record one proof attempt. A site visited on several paths (or several
   * times in a loop) is proven only if every attempt succeeded.
   */
  private check(
    key: string,
    kind: ClauseKind,
    clause: ContractClause,
    operation: string,
    goal: Expr,
    facts: FactSet,
    location: SourceLocation
  ): void {
    const result = tryProve(goal, facts, this.config.maxCaseSplitDepth);
    const site = this.sites.get(key);
    if (!site) {
      this.sites.set(key, { kind, clause, operation, location, proven: result.proven, method: result.method });
      return;
    }
    if (!result.proven || !result.method) {
      site.proven = false;
      site.method = undefined;
    } else if (site.proven && site.method) {
      site.method = strongerMethod(site.method, result.method);
    }
  }

  // --------------------------------------------------------------------------
  // Reports
  // --------------------------------------------------------------------------

  private report(): OperationAnalysis {
    const diagnostics: ContractDiagnostic[] = [];
    const proven: ProvenObligation[] = [];

    for (const site of this.sites.values()) {
      const clause = { id: site.clause.id, text: site.clause.text };
      if (site.proven && site.method) {
        proven.push({
          kind: site.kind,
          operation: site.operation,
          context: this.body.name,
          clause,
          location: site.location,
          method: site.method,
        });
      } else {
        diagnostics.push(this.unproven(site));
      }
    }

    this.log.debug(`${this.body.name}: ${proven.length} proven, ${diagnostics.length} unproven`);
    return this.result(diagnostics, proven, false);
  }

  private unproven(site: Site): ContractDiagnostic {
    const init = {
      kind: "UnprovenObligation" as const,
      operation: site.operation,
      context: this.body.name,
      location: site.location,
      clause: site.clause,
      severity: this.config.unprovenSeverity,
    };
    switch (site.kind) {
      case "requires":
        return createDiagnostic(COV9101, init);
      case "ensures":
        return createDiagnostic(COV9102, init);
      case "invariant":
        return createDiagnostic(COV9103, { ...init, args: { type: this.ownerType ?? site.operation } });
    }
  }

  /** Every obligation of the body, unproven, without analyzing anything. */
  private budgetReport(): OperationAnalysis {
    const diagnostics: ContractDiagnostic[] = [];
    const budget = (operation: string, clause: ContractClause, location: SourceLocation): void => {
      diagnostics.push(
        createDiagnostic(COV9104, {
          kind: "UnprovenObligation",
          operation,
          context: this.body.name,
          location,
          clause,
          severity: this.config.unprovenSeverity,
        })
      );
    };

    const blocks = [...this.body.blocks.values()].sort((x, y) => x.id - y.id);
    for (const block of blocks) {
      for (const statement of block.statements) {
        if (statement.kind !== "call" || !statement.callee) continue;
        const callee = this.registry.operation(statement.callee.type, statement.callee.operation);
        for (const clause of callee?.requires ?? []) budget(callee?.qualifiedName ?? statement.name, clause, statement.location);
      }
      const terminator = block.terminator;
      if (terminator.kind !== "return" || !this.contract) continue;
      for (const clause of this.contract.ensures) budget(this.body.name, clause, terminator.location);
      if (this.invariantsApply()) {
        for (const clause of this.registry.invariantsOf(this.ownerType ?? "")) {
          budget(this.body.name, clause, terminator.location);
        }
      }
    }

    return this.result(diagnostics, [], true);
  }

  private result(diagnostics: ContractDiagnostic[], proven: ProvenObligation[], budgetExceeded: boolean): OperationAnalysis {
    return {
      operation: this.body.name,
      diagnostics,
      proven,
      steps: this.steps,
      budgetExceeded,
      widened: [...this.widened].sort((x, y) => x - y),
    };
  }
}
