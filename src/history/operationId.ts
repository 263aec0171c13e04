// src/history/operationId.ts

/**
 * Identifies one recorded operation. Ids are positive integers handed out in
 * increasing order and are never reused; serialized as the integer itself.
 */
export type OperationId = number;

/** Sentinel meaning "no operation". Never inserted into a history tree. */
export const NULL_OPERATION_ID: OperationId = 0;

export function isNullOperationId(id: OperationId): boolean {
  return id === NULL_OPERATION_ID;
}

/**
 * Hands out operation ids. One generator is shared by the process
 * (`defaultIdGenerator`); tests and imported histories inject or reset their own.
 */
export class OperationIdGenerator {
  private nextId: OperationId;

  constructor(start: OperationId = 1) {
    if (!Number.isInteger(start) || start <= NULL_OPERATION_ID) {
      throw new Error(`OperationIdGenerator: start must be a positive integer, got ${start}`);
    }
    this.nextId = start;
  }

  next(): OperationId {
    return this.nextId++;
  }

  /** The id the next call to `next()` will return. */
  peek(): OperationId {
    return this.nextId;
  }

  reset(start: OperationId = 1): void {
    if (!Number.isInteger(start) || start <= NULL_OPERATION_ID) {
      throw new Error(`OperationIdGenerator: start must be a positive integer, got ${start}`);
    }
    this.nextId = start;
  }

  /**
   * Makes sure `id` will never be handed out, e.g. after loading a history
   * recorded by another process.
   */
  advancePast(id: OperationId): void {
    if (id >= this.nextId) {
      this.nextId = id + 1;
    }
  }
}

export const defaultIdGenerator = new OperationIdGenerator();
