// src/types.ts
import { Clock } from './history/operation.js';
import { OperationIdGenerator } from './history/operationId.js';

export interface HistoryTreeOptions {
  /** Node count at which the next add compresses the tree first. Default 1000. */
  maxOperations?: number;
  /** Source of ids for operations the tree builds itself (merges). */
  ids?: OperationIdGenerator;
  clock?: Clock;
  /** Log every mutation through the history debug logger. */
  debug?: boolean;
  /** Run assertConsistent() after every mutation. Meant for development and tests. */
  checkInvariants?: boolean;
}

