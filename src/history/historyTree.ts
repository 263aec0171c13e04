// src/history/historyTree.ts

import EventEmitter from '../EventEmitter.js';
import { createLogger, Logger } from '../logger.js';
import { HistoryTreeOptions } from '../types.js';
import { HistoryCorruptionError, HistoryResult, fail, ok } from './errors.js';
import { HistoryNode, HistoryNodeView, viewOf } from './historyNode.js';
import { canMergeOperations, mergeOperations } from './merge.js';
import { Clock, Operation, systemClock } from './operation.js';
import { OperationId, OperationIdGenerator, defaultIdGenerator } from './operationId.js';

export const DEFAULT_MAX_OPERATIONS = 1000;

export interface HistoryStats {
  /** Operations recorded over the tree's lifetime, merged ones included. */
  totalOperations: number;
  /** Nodes currently in the tree. Compression is triggered on this one. */
  nodeCount: number;
  currentDepth: number;
  branchCount: number;
  /** Nodes removed by compression so far. */
  compressionSavings: number;
  /** Ids compression has folded away and still resolves. Two per fold, never pruned. */
  retiredIds: number;
  lastOperationTime: Date | null;
}

export type HistoryChangeKind = 'add' | 'undo' | 'redo' | 'goto' | 'branch' | 'compress';

export interface HistoryChange {
  kind: HistoryChangeKind;
  currentId: OperationId | null;
}

export type HistoryEvents = {
  'history:change': [HistoryChange];
};

/** What has to be un-applied, then applied, to move the drawing between two nodes. */
export interface HistoryPath {
  /** Most recent first. */
  undo: Operation[];
  /** Oldest first. */
  redo: Operation[];
}

export interface HistorySnapshotNode {
  operation: Operation;
  parent: OperationId | null;
  children: ReadonlyArray<OperationId>;
}

/** Everything needed to rebuild a tree. Undo stack and depths are derived on restore. */
export interface HistorySnapshot {
  /** Parents before children; top-level nodes in timeline order. */
  nodes: ReadonlyArray<HistorySnapshotNode>;
  rootId: OperationId | null;
  currentId: OperationId | null;
  redoStack: ReadonlyArray<OperationId>;
  branches: ReadonlyArray<readonly [string, OperationId]>;
  /** Ids absorbed by compression, and the id that absorbed each. */
  retired: ReadonlyArray<readonly [OperationId, OperationId]>;
  totalOperations: number;
  compressionSavings: number;
}

export interface RestoreResult extends HistoryResult {
  tree?: HistoryTree;
}

/**
 * The branching edit history of one drawing.
 *
 * Nodes live in a single map keyed by operation id and link to each other by
 * id. Editing after an undo adds a sibling under the current node, so nothing
 * recorded is ever dropped except by compression. The undo stack mirrors the
 * path from the top-level node to the current one; the redo stack holds what
 * undo walked back over and is discarded by any new edit or jump.
 *
 * Undoing the very first operation leaves the tree with no current node. An
 * edit made from there starts a new top-level timeline next to the first one;
 * `rootId` keeps pointing at the first.
 */
export class HistoryTree extends EventEmitter<HistoryEvents> {
  private nodes = new Map<OperationId, HistoryNode>();
  private roots: OperationId[] = [];
  private _rootId: OperationId | null = null;
  private _currentId: OperationId | null = null;
  private undoIds: OperationId[] = [];
  private redoIds: OperationId[] = [];
  private branchMap = new Map<string, OperationId>();
  // Kept for the tree's lifetime: re-adding a retired id must still fail, and
  // dependencies held outside the tree must still resolve.
  private retired = new Map<OperationId, OperationId>();
  private _stats: HistoryStats = {
    totalOperations: 0,
    nodeCount: 0,
    currentDepth: 0,
    branchCount: 0,
    compressionSavings: 0,
    retiredIds: 0,
    lastOperationTime: null,
  };

  public readonly maxOperations: number;
  private readonly ids: OperationIdGenerator;
  private readonly clock: Clock;
  private readonly checkInvariants: boolean;
  private readonly log: Logger;

  constructor(options: HistoryTreeOptions = {}) {
    super();
    const maxOperations = options.maxOperations ?? DEFAULT_MAX_OPERATIONS;
    if (!Number.isInteger(maxOperations) || maxOperations < 1) {
      throw new Error(`HistoryTree: maxOperations must be a positive integer, got ${maxOperations}`);
    }
    this.maxOperations = maxOperations;
    this.ids = options.ids ?? defaultIdGenerator;
    this.clock = options.clock ?? systemClock;
    this.checkInvariants = options.checkInvariants ?? false;
    const debug = options.debug ?? false;
    this.log = createLogger('HistoryTree', () => debug);
  }

  get currentId(): OperationId | null {
    return this._currentId;
  }

  get rootId(): OperationId | null {
    return this._rootId;
  }

  get size(): number {
    return this.nodes.size;
  }

  get isEmpty(): boolean {
    return this.nodes.size === 0;
  }

  // --- Recording ---

  /**
   * Records `op` as a child of the current node and makes it current.
   * Compresses first when the tree is at its size limit. Clears redo.
   */
  addOperation(op: Operation): HistoryResult {
    if (this.nodes.has(op.id) || this.retired.has(op.id)) {
      return fail('DuplicateOperation', `Operation ${op.id} is already recorded`);
    }

    if (this.nodes.size >= this.maxOperations) {
      this.log('addOperation: node limit reached, compressing', { size: this.nodes.size, max: this.maxOperations });
      const compressed = this.compressHistory();
      if (compressed.failed) return compressed;
    }

    const parentId = this._currentId;
    const parent = parentId === null ? null : this.requireNode(parentId);
    const node = new HistoryNode(op, parentId, parent ? parent.depth + 1 : 0);

    this.nodes.set(op.id, node);
    if (parent) {
      parent.children.push(op.id);
    } else {
      this.roots.push(op.id);
      if (this._rootId === null) this._rootId = op.id;
    }

    this.setCurrent(op.id);
    this.undoIds.push(op.id);
    this.redoIds = [];

    this._stats.totalOperations++;
    this._stats.lastOperationTime = op.timestamp;

    this.afterMutation('add', { id: op.id, parent: parentId, depth: node.depth });
    return ok;
  }

  // --- Linear navigation ---

  canUndo(): boolean {
    if (this._currentId === null) return false;
    const top = this.undoIds.at(-1);
    return top !== undefined && this.requireNode(top).operation.undoable;
  }

  canRedo(): boolean {
    return this.redoIds.length > 0;
  }

  /**
   * Steps back to the current node's parent and returns the operation the
   * caller has to reverse. Null, with nothing changed, when there is nothing
   * to undo or the operation is marked as not undoable.
   */
  undo(): Operation | null {
    if (this._currentId === null) return null;
    const top = this.undoIds.at(-1);
    if (top === undefined) return null;
    const node = this.requireNode(top);
    if (!node.operation.undoable) {
      this.log('undo: blocked by a non-undoable operation', { id: top });
      return null;
    }

    this.undoIds.pop();
    this.redoIds.push(top);
    this.setCurrent(node.parent);
    this.afterMutation('undo', { undone: top });
    return node.operation;
  }

  /** Re-enters the node the last undo left and returns the operation to re-apply. */
  redo(): Operation | null {
    const top = this.redoIds.at(-1);
    if (top === undefined) return null;
    const node = this.requireNode(top);

    this.redoIds.pop();
    this.undoIds.push(top);
    this.setCurrent(top);
    this.afterMutation('redo', { redone: top });
    return node.operation;
  }

  // --- Jumps ---

  /** Makes any recorded node current. The redo stack is discarded. */
  gotoOperation(id: OperationId): HistoryResult {
    if (!this.nodes.has(id)) {
      return fail('NotFound', `Operation ${id} not found`);
    }
    this.undoIds = this.pathTo(id);
    this.redoIds = [];
    this.setCurrent(id);
    this.afterMutation('goto', { target: id });
    return ok;
  }

  createBranch(name: string, fromOperation: OperationId): HistoryResult {
    if (!this.nodes.has(fromOperation)) {
      return fail('NotFound', `Operation ${fromOperation} not found`);
    }
    if (this.branchMap.has(name)) {
      return fail('DuplicateBranch', `Branch '${name}' already exists`);
    }
    this.branchMap.set(name, fromOperation);
    this._stats.branchCount = this.branchMap.size;
    this.afterMutation('branch', { created: name, target: fromOperation });
    return ok;
  }

  switchBranch(name: string): HistoryResult {
    const target = this.branchMap.get(name);
    if (target === undefined) {
      return fail('UnknownBranch', `Branch '${name}' not found`);
    }
    return this.gotoOperation(target);
  }

  /** Forgets a branch name. The nodes it pointed at stay where they are. */
  deleteBranch(name: string): HistoryResult {
    if (!this.branchMap.delete(name)) {
      return fail('UnknownBranch', `Branch '${name}' not found`);
    }
    this._stats.branchCount = this.branchMap.size;
    this.afterMutation('branch', { deleted: name });
    return ok;
  }

  branches(): ReadonlyMap<string, OperationId> {
    return new Map(this.branchMap);
  }

  // --- Derived views ---

  /**
   * For every node: the operations it explicitly depends on, then its tree
   * parent. Dependencies on ids that compression folded away point at the
   * operation that absorbed them.
   */
  dependencyGraph(): Map<OperationId, OperationId[]> {
    const graph = new Map<OperationId, OperationId[]>();
    for (const [id, node] of this.nodes) {
      const deps: OperationId[] = [];
      for (const dep of node.operation.dependencies) {
        const resolved = this.resolveId(dep);
        if (resolved !== id && !deps.includes(resolved)) deps.push(resolved);
      }
      if (node.parent !== null && !deps.includes(node.parent)) deps.push(node.parent);
      graph.set(id, deps);
    }
    return graph;
  }

  /** Follows ids retired by compression to the operation that absorbed them. */
  resolveId(id: OperationId): OperationId {
    let resolved = id;
    let hops = 0;
    let next = this.retired.get(resolved);
    while (next !== undefined) {
      resolved = next;
      next = this.retired.get(resolved);
      if (++hops > this.retired.size) {
        throw new HistoryCorruptionError(`Retired id chain from ${id} loops`);
      }
    }
    return resolved;
  }

  /** Operations from the top-level node down to the current one. */
  currentOperations(): Operation[] {
    if (this._currentId === null) return [];
    return this.pathTo(this._currentId).map(id => this.requireNode(id).operation);
  }

  findOperation(id: OperationId): Operation | null {
    return this.nodes.get(id)?.operation ?? null;
  }

  findNode(id: OperationId): HistoryNodeView | null {
    const node = this.nodes.get(id);
    return node ? viewOf(node) : null;
  }

  /** Ids from the top-level node down to `id`. Empty when `id` isn't in the tree. */
  pathTo(id: OperationId): OperationId[] {
    const path: OperationId[] = [];
    let cursor: OperationId | null = id;
    while (cursor !== null) {
      const node = this.nodes.get(cursor);
      if (!node) {
        if (cursor === id) return [];
        throw new HistoryCorruptionError(`Node ${path[path.length - 1]} has missing parent ${cursor}`);
      }
      path.push(cursor);
      if (path.length > this.nodes.size) {
        throw new HistoryCorruptionError(`Parent links above ${id} form a cycle`);
      }
      cursor = node.parent;
    }
    return path.reverse();
  }

  /**
   * Operations to reverse (most recent first) and then apply (oldest first) to
   * take a drawing from node `from` to node `to`. Null stands for the empty
   * drawing before any operation. Returns null when either node is unknown.
   */
  pathBetween(from: OperationId | null, to: OperationId | null): HistoryPath | null {
    if ((from !== null && !this.nodes.has(from)) || (to !== null && !this.nodes.has(to))) return null;
    const fromPath = from === null ? [] : this.pathTo(from);
    const toPath = to === null ? [] : this.pathTo(to);
    let shared = 0;
    while (shared < fromPath.length && shared < toPath.length && fromPath[shared] === toPath[shared]) {
      shared++;
    }
    return {
      undo: fromPath.slice(shared).reverse().map(id => this.requireNode(id).operation),
      redo: toPath.slice(shared).map(id => this.requireNode(id).operation),
    };
  }

  undoStack(): OperationId[] {
    return [...this.undoIds];
  }

  /** Top of the stack (next to redo) last. */
  redoStack(): OperationId[] {
    return [...this.redoIds];
  }

  stats(): HistoryStats {
    const last = this._stats.lastOperationTime;
    return { ...this._stats, lastOperationTime: last ? new Date(last.getTime()) : null };
  }

  /**
   * The whole tree, one node per line, indented two spaces per level.
   * Nodes on the path to the current node are marked with `*`.
   */
  treeString(): string {
    const activePath = new Set(this._currentId === null ? [] : this.pathTo(this._currentId));
    let result = '';
    const stack = [...this.roots].reverse();
    while (stack.length > 0) {
      const id = stack.pop();
      if (id === undefined) break;
      const node = this.requireNode(id);
      const marker = activePath.has(id) ? '* ' : '  ';
      result += `${'  '.repeat(node.depth)}${marker}${id}: ${node.operation.description}\n`;
      for (let i = node.children.length - 1; i >= 0; i--) {
        stack.push(node.children[i]);
      }
    }
    return result;
  }

  // --- Compression ---

  /**
   * Folds mergeable parent/child pairs into one node, walking the tree top
   * down so runs of moves collapse into a single move. A pair is only folded
   * when the parent has no other child and neither node is current or the
   * target of a branch. The surviving node takes the merged operation's id.
   */
  compressHistory(): HistoryResult {
    let removed = 0;
    const queue = [...this.roots];
    while (queue.length > 0) {
      const id = queue.shift();
      if (id === undefined) break;
      let node = this.requireNode(id);
      while (node.children.length === 1) {
        const child = this.requireNode(node.children[0]);
        if (!this.canFold(node, child)) break;
        const merged = mergeOperations(node.operation, child.operation, { ids: this.ids, clock: this.clock });
        if (!merged) break;
        this.log('compressHistory: merging', { parent: node.id, child: child.id, merged: merged.id });
        node = this.fold(node, child, merged);
        removed++;
      }
      queue.push(...node.children);
    }

    if (removed > 0) {
      this.undoIds = this._currentId === null ? [] : this.pathTo(this._currentId);
      this._stats.compressionSavings += removed;
      this._stats.retiredIds = this.retired.size;
      if (this._currentId !== null) {
        this._stats.currentDepth = this.requireNode(this._currentId).depth;
      }
      this.afterMutation('compress', { removed });
    }
    return ok;
  }

  private canFold(parent: HistoryNode, child: HistoryNode): boolean {
    if (parent.id === this._currentId || child.id === this._currentId) return false;
    for (const target of this.branchMap.values()) {
      if (target === parent.id || target === child.id) return false;
    }
    return canMergeOperations(parent.operation, child.operation);
  }

  private fold(parent: HistoryNode, child: HistoryNode, merged: Operation): HistoryNode {
    const oldId = parent.id;
    const newId = merged.id;

    this.nodes.delete(oldId);
    this.nodes.delete(child.id);
    parent.operation = merged;
    parent.children = child.children;
    this.nodes.set(newId, parent);

    if (parent.parent === null) {
      this.roots = this.roots.map(id => (id === oldId ? newId : id));
      if (this._rootId === oldId) this._rootId = newId;
    } else {
      const grandparent = this.requireNode(parent.parent);
      grandparent.children = grandparent.children.map(id => (id === oldId ? newId : id));
    }

    for (const id of parent.children) {
      this.requireNode(id).parent = newId;
    }
    this.shiftDepths(parent.children, -1);

    this.redoIds = this.redoIds
      .filter(id => id !== child.id)
      .map(id => (id === oldId ? newId : id));

    this.retired.set(oldId, newId);
    this.retired.set(child.id, newId);
    return parent;
  }

  private shiftDepths(start: ReadonlyArray<OperationId>, delta: number): void {
    const stack = [...start];
    while (stack.length > 0) {
      const id = stack.pop();
      if (id === undefined) break;
      const node = this.requireNode(id);
      node.depth += delta;
      stack.push(...node.children);
    }
  }

  // --- Consistency ---

  /**
   * Checks every structural invariant and throws HistoryCorruptionError on the
   * first one that doesn't hold.
   */
  assertConsistent(): void {
    const corrupt = (message: string): never => {
      throw new HistoryCorruptionError(message);
    };

    if (this.nodes.size === 0) {
      if (this._rootId !== null || this._currentId !== null || this.roots.length > 0) {
        corrupt('Empty tree still has a root or current node');
      }
    } else if (this._rootId !== this.roots[0]) {
      corrupt(`Root ${this._rootId} is not the first top-level node ${this.roots[0]}`);
    }

    for (const [id, node] of this.nodes) {
      if (node.id !== id) corrupt(`Node stored under ${id} holds operation ${node.id}`);
      if (node.parent === null) {
        if (!this.roots.includes(id)) corrupt(`Node ${id} has no parent but isn't top-level`);
        if (node.depth !== 0) corrupt(`Top-level node ${id} has depth ${node.depth}`);
      } else {
        const parent = this.nodes.get(node.parent);
        if (!parent) corrupt(`Node ${id} has missing parent ${node.parent}`);
        else {
          if (!parent.children.includes(id)) corrupt(`Parent ${node.parent} doesn't list child ${id}`);
          if (node.depth !== parent.depth + 1) corrupt(`Node ${id} has depth ${node.depth}, expected ${parent.depth + 1}`);
        }
      }
      for (const childId of node.children) {
        if (this.nodes.get(childId)?.parent !== id) corrupt(`Child ${childId} of ${id} doesn't point back`);
      }
      if (node.isActive !== (id === this._currentId)) corrupt(`Node ${id} has the wrong active flag`);
    }

    let reachable = 0;
    const stack = [...this.roots];
    while (stack.length > 0) {
      const id = stack.pop();
      if (id === undefined) break;
      const node = this.nodes.get(id);
      if (!node) corrupt(`Top-level or child id ${id} has no node`);
      else {
        reachable++;
        if (reachable > this.nodes.size) corrupt('Tree links form a cycle');
        stack.push(...node.children);
      }
    }
    if (reachable !== this.nodes.size) corrupt(`${this.nodes.size - reachable} nodes are unreachable`);

    if (this._currentId !== null && !this.nodes.has(this._currentId)) {
      corrupt(`Current node ${this._currentId} not found`);
    }
    const expectedUndo = this._currentId === null ? [] : this.pathTo(this._currentId);
    if (expectedUndo.length !== this.undoIds.length || expectedUndo.some((id, i) => this.undoIds[i] !== id)) {
      corrupt('Undo stack is out of sync with the current path');
    }
    for (const id of this.redoIds) {
      if (!this.nodes.has(id)) corrupt(`Redo stack holds missing node ${id}`);
    }
    for (const [name, target] of this.branchMap) {
      if (!this.nodes.has(target)) corrupt(`Branch '${name}' points at missing node ${target}`);
    }
  }

  // --- Snapshots ---

  /** Captures the tree for serialization, parents before children. */
  toSnapshot(): HistorySnapshot {
    const nodes: HistorySnapshotNode[] = [];
    const stack = [...this.roots].reverse();
    while (stack.length > 0) {
      const id = stack.pop();
      if (id === undefined) break;
      const node = this.requireNode(id);
      nodes.push({ operation: node.operation, parent: node.parent, children: [...node.children] });
      for (let i = node.children.length - 1; i >= 0; i--) {
        stack.push(node.children[i]);
      }
    }
    return {
      nodes,
      rootId: this._rootId,
      currentId: this._currentId,
      redoStack: [...this.redoIds],
      branches: [...this.branchMap],
      retired: [...this.retired],
      totalOperations: this._stats.totalOperations,
      compressionSavings: this._stats.compressionSavings,
    };
  }

  /**
   * Rebuilds a tree from a snapshot, checking its structure on the way. The id
   * generator is moved past every id in the snapshot so none gets reused.
   */
  static fromSnapshot(snapshot: HistorySnapshot, options: HistoryTreeOptions = {}): RestoreResult {
    const invalid = (message: string): RestoreResult => fail('InvalidSnapshot', message);
    const tree = new HistoryTree(options);

    for (const entry of snapshot.nodes) {
      const id = entry.operation.id;
      if (tree.nodes.has(id)) return invalid(`Operation ${id} appears twice`);
      const node = new HistoryNode(entry.operation, entry.parent, 0);
      node.children = [...entry.children];
      tree.nodes.set(id, node);
      if (entry.parent === null) tree.roots.push(id);
    }

    for (const [id, node] of tree.nodes) {
      if (node.parent !== null) {
        const parent = tree.nodes.get(node.parent);
        if (!parent) return invalid(`Operation ${id} has missing parent ${node.parent}`);
        if (parent.children.filter(c => c === id).length !== 1) {
          return invalid(`Parent ${node.parent} must list ${id} exactly once`);
        }
      }
      for (const childId of node.children) {
        if (tree.nodes.get(childId)?.parent !== id) return invalid(`Child ${childId} of ${id} doesn't point back`);
      }
    }

    // Depths, and a check that everything hangs off a top-level node
    let reached = 0;
    const stack = [...tree.roots];
    while (stack.length > 0) {
      const id = stack.pop();
      if (id === undefined) break;
      const node = tree.requireNode(id);
      reached++;
      if (reached > tree.nodes.size) return invalid('Parent links form a cycle');
      for (const childId of node.children) {
        tree.requireNode(childId).depth = node.depth + 1;
        stack.push(childId);
      }
    }
    if (reached !== tree.nodes.size) return invalid('Some operations are not reachable from a top-level node');

    const firstRoot = tree.roots[0] ?? null;
    if (snapshot.rootId !== firstRoot) {
      return invalid(`Root ${snapshot.rootId} must be the first top-level operation (${firstRoot})`);
    }
    tree._rootId = firstRoot;

    if (snapshot.currentId !== null && !tree.nodes.has(snapshot.currentId)) {
      return invalid(`Current operation ${snapshot.currentId} not found`);
    }

    // Redo entries, read from the top, have to walk down from the current node
    let expectedParent = snapshot.currentId;
    for (let i = snapshot.redoStack.length - 1; i >= 0; i--) {
      const node = tree.nodes.get(snapshot.redoStack[i]);
      if (!node || node.parent !== expectedParent) {
        return invalid(`Redo entry ${snapshot.redoStack[i]} doesn't continue from ${expectedParent}`);
      }
      expectedParent = node.id;
    }
    tree.redoIds = [...snapshot.redoStack];

    for (const [name, target] of snapshot.branches) {
      if (!tree.nodes.has(target)) return invalid(`Branch '${name}' points at missing operation ${target}`);
      if (tree.branchMap.has(name)) return invalid(`Branch '${name}' appears twice`);
      tree.branchMap.set(name, target);
    }

    let highestId = 0;
    for (const id of tree.nodes.keys()) highestId = Math.max(highestId, id);
    for (const [oldId, newId] of snapshot.retired) {
      if (tree.nodes.has(oldId)) return invalid(`Retired operation ${oldId} is still in the tree`);
      tree.retired.set(oldId, newId);
      highestId = Math.max(highestId, oldId, newId);
    }
    tree.ids.advancePast(highestId);

    tree._currentId = null;
    tree.setCurrent(snapshot.currentId);
    tree.undoIds = snapshot.currentId === null ? [] : tree.pathTo(snapshot.currentId);

    let lastTime: Date | null = null;
    for (const node of tree.nodes.values()) {
      if (!lastTime || node.operation.timestamp.getTime() > lastTime.getTime()) lastTime = node.operation.timestamp;
    }
    tree._stats = {
      totalOperations: snapshot.totalOperations,
      nodeCount: tree.nodes.size,
      currentDepth: tree._stats.currentDepth,
      branchCount: tree.branchMap.size,
      compressionSavings: snapshot.compressionSavings,
      retiredIds: tree.retired.size,
      lastOperationTime: lastTime,
    };

    if (tree.checkInvariants) tree.assertConsistent();
    return { tree };
  }

  // --- Internals ---

  private requireNode(id: OperationId): HistoryNode {
    const node = this.nodes.get(id);
    if (!node) throw new HistoryCorruptionError(`Node ${id} is referenced but not stored`);
    return node;
  }

  private setCurrent(id: OperationId | null): void {
    if (this._currentId !== null) {
      const previous = this.nodes.get(this._currentId);
      if (previous) previous.isActive = false;
    }
    this._currentId = id;
    if (id === null) {
      this._stats.currentDepth = 0;
      return;
    }
    const node = this.requireNode(id);
    node.isActive = true;
    this._stats.currentDepth = node.depth;
  }

  private afterMutation(kind: HistoryChangeKind, details: Record<string, unknown>): void {
    this._stats.nodeCount = this.nodes.size;
    this.log(kind, { ...details, current: this._currentId, size: this.nodes.size });
    if (this.checkInvariants) this.assertConsistent();
    this.emit('history:change', { kind, currentId: this._currentId });
  }
}
