// src/undoManager.ts

import { HistoryResult, fail } from './history/errors.js';
import { HistoryTree } from './history/historyTree.js';
import { invertOperation } from './history/invert.js';
import { Operation, OperationContext } from './history/operation.js';
import { OperationId } from './history/operationId.js';
import { createLogger, Logger } from './logger.js';
import { HistoryTreeOptions } from './types.js';

/** The drawing side of an editor session: knows how to carry out an operation. */
export interface OperationApplier {
  /** Applies `op` to the drawing. Throws if it can't. */
  apply(op: Operation): void;
}

/**
 * Ties a history tree to the drawing it records. The tree only moves its
 * cursor; the manager also applies the matching inverses and replays to the
 * drawing, in the right order, before the cursor moves. If the applier throws
 * on a single undo or redo, the error propagates and the tree is left where it
 * was. If it throws partway through a jump, the tree is moved to the node the
 * drawing had reached before the error is rethrown, so the two stay in step.
 */
export class UndoManager {
  public readonly tree: HistoryTree;
  private readonly context: OperationContext;
  private readonly log: Logger;

  constructor(private readonly applier: OperationApplier, options: HistoryTreeOptions = {}) {
    this.tree = new HistoryTree(options);
    this.context = { ids: options.ids, clock: options.clock };
    const debug = options.debug ?? false;
    this.log = createLogger('UndoManager', () => debug);
  }

  /** Records an edit the caller already applied to the drawing. */
  record(op: Operation): HistoryResult {
    return this.tree.addOperation(op);
  }

  /** Applies `op` to the drawing, then records it. */
  perform(op: Operation): HistoryResult {
    this.applier.apply(op);
    return this.tree.addOperation(op);
  }

  hasUndo(): boolean {
    return this.tree.canUndo();
  }

  hasRedo(): boolean {
    return this.tree.canRedo();
  }

  /**
   * Reverses the current operation on the drawing and steps the tree back.
   * Returns the undone operation, or null when there's nothing to undo or the
   * operation has no expressible inverse.
   */
  undo(): Operation | null {
    const currentId = this.tree.currentId;
    if (currentId === null || !this.tree.canUndo()) return null;
    const op = this.tree.findOperation(currentId);
    if (!op) return null;

    const inverse = invertOperation(op, this.context);
    if (!inverse) {
      this.log('undo: no inverse for', op.toString());
      return null;
    }
    this.applier.apply(inverse);
    return this.tree.undo();
  }

  /** Re-applies the last undone operation and steps the tree forward. */
  redo(): Operation | null {
    const nextId = this.tree.redoStack().at(-1);
    if (nextId === undefined) return null;
    const op = this.tree.findOperation(nextId);
    if (!op) return null;

    this.applier.apply(op);
    return this.tree.redo();
  }

  /**
   * Moves the drawing and the tree to any recorded operation: reverses
   * everything back to the common ancestor, then replays down to `id`.
   */
  goto(id: OperationId): HistoryResult {
    const path = this.tree.pathBetween(this.tree.currentId, id);
    if (!path) return fail('NotFound', `Operation ${id} not found`);

    const inverses: Operation[] = [];
    for (const op of path.undo) {
      const inverse = invertOperation(op, this.context);
      if (!inverse) return fail('NotInvertible', `Operation ${op.id} (${op.description}) can't be reversed`);
      inverses.push(inverse);
    }

    this.log('goto', { target: id, undo: inverses.length, redo: path.redo.length });
    let undone = 0;
    let replayed: Operation | null = null;
    try {
      for (const inverse of inverses) {
        this.applier.apply(inverse);
        undone++;
      }
      for (const op of path.redo) {
        this.applier.apply(op);
        replayed = op;
      }
    } catch (error) {
      this.followDrawing(undone, replayed);
      throw error;
    }
    return this.tree.gotoOperation(id);
  }

  // Moves the tree to the node the drawing reached before a jump was cut short
  private followDrawing(undone: number, replayed: Operation | null): void {
    this.log('goto: applier failed, tree follows the drawing', { undone, replayed: replayed?.id ?? null });
    for (let i = 0; i < undone; i++) this.tree.undo();
    if (replayed) this.tree.gotoOperation(replayed.id);
  }

  switchBranch(name: string): HistoryResult {
    const target = this.tree.branches().get(name);
    if (target === undefined) return fail('UnknownBranch', `Branch '${name}' not found`);
    return this.goto(target);
  }

  createBranch(name: string, fromOperation: OperationId | null = this.tree.currentId): HistoryResult {
    if (fromOperation === null) return fail('NotFound', 'There is no current operation to branch from');
    return this.tree.createBranch(name, fromOperation);
  }

  /** Operations currently applied to the drawing, oldest first. */
  applied(): Operation[] {
    return this.tree.currentOperations();
  }
}
