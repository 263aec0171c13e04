// src/history/historyNode.ts

import { Operation } from './operation.js';
import { OperationId } from './operationId.js';

/**
 * An operation placed in the history tree. Links are ids into the tree's node
 * map, never references to other nodes.
 */
export class HistoryNode {
  /** More than one child makes this node a branch point. */
  public children: OperationId[] = [];
  public isActive = false;

  constructor(
    public operation: Operation,
    /** Null for a top-level node. */
    public parent: OperationId | null,
    public depth: number,
  ) {}

  get id(): OperationId {
    return this.operation.id;
  }

  get isBranchPoint(): boolean {
    return this.children.length > 1;
  }
}

/** Read-only view of a node handed out by the tree. */
export interface HistoryNodeView {
  readonly id: OperationId;
  readonly operation: Operation;
  readonly parent: OperationId | null;
  readonly children: ReadonlyArray<OperationId>;
  readonly depth: number;
  readonly isActive: boolean;
}

export function viewOf(node: HistoryNode): HistoryNodeView {
  return {
    id: node.id,
    operation: node.operation,
    parent: node.parent,
    children: [...node.children],
    depth: node.depth,
    isActive: node.isActive,
  };
}
