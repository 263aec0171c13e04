// src/history/transaction.ts

import { Operation, OperationContext } from './operation.js';
import { groupOperation } from './operations.js';

/**
 * Collects the operations of one compound edit (a trim that deletes one
 * entity and creates two, a paste of several entities, ...) so they can be
 * recorded as a single undo step.
 */
export class HistoryTransaction {
  private readonly members: Operation[] = [];

  constructor(private readonly context: OperationContext = {}) {}

  add(op: Operation): this {
    this.members.push(op);
    return this;
  }

  get operations(): ReadonlyArray<Operation> {
    return this.members;
  }

  get isEmpty(): boolean {
    return this.members.length === 0;
  }

  /**
   * Wraps everything collected so far in a group operation and empties the
   * transaction. Null when nothing was collected.
   */
  commit(name: string, description: string = name): Operation | null {
    if (this.members.length === 0) return null;
    const group = groupOperation(name, this.members, description, this.context);
    this.members.length = 0;
    return group;
  }

  rollback(): void {
    this.members.length = 0;
  }
}
