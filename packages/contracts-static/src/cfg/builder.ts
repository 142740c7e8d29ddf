import type { SourceLocation } from "@covenant/contracts";
import type { BasicBlock, BlockId, Statement, Terminator } from "./types.js";

interface PendingBlock {
  readonly statements: Statement[];
  terminator?: Terminator;
}

/**
 * Incremental construction of one body's blocks.
 *
 * Statements go to the current block. Once a block is terminated, further
 * statements open a fresh block nothing jumps to, so code after `return`
 * or `break` is kept but never reached. Blocks left open fall through to an
 * implicit `return`.
 */
export class GraphBuilder {
  private readonly pending = new Map<BlockId, PendingBlock>();
  private nextId = 0;
  private currentId: BlockId;
  readonly entry: BlockId;

  constructor() {
    this.entry = this.newBlock();
    this.currentId = this.entry;
  }

  get current(): BlockId {
    return this.currentId;
  }

  get terminated(): boolean {
    return this.block(this.currentId).terminator !== undefined;
  }

  newBlock(): BlockId {
    const id = this.nextId++;
    this.pending.set(id, { statements: [] });
    return id;
  }

  switchTo(id: BlockId): void {
    this.currentId = id;
  }

  emit(statement: Statement): void {
    if (this.terminated) this.currentId = this.newBlock();
    this.block(this.currentId).statements.push(statement);
  }

  terminate(terminator: Terminator): void {
    if (this.terminated) this.currentId = this.newBlock();
    this.block(this.currentId).terminator = terminator;
  }

  /** Jump unless control already left the current block. */
  goto(target: BlockId, location: SourceLocation): void {
    if (!this.terminated) this.terminate({ kind: "goto", target, location });
  }

  finish(location: SourceLocation): ReadonlyMap<BlockId, BasicBlock> {
    const blocks = new Map<BlockId, BasicBlock>();
    for (const [id, block] of this.pending) {
      blocks.set(id, {
        id,
        statements: block.statements,
        terminator: block.terminator ?? { kind: "return", location },
      });
    }
    return blocks;
  }

  private block(id: BlockId): PendingBlock {
    const block = this.pending.get(id);
    if (!block) throw new Error(`Unknown block ${id}`);
    return block;
  }
}
