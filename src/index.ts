// src/index.ts

export { default as EventEmitter } from './EventEmitter.js';
export { createLogger } from './logger.js';
export type { Logger } from './logger.js';
export type { HistoryTreeOptions } from './types.js';
export { UndoManager } from './undoManager.js';
export type { OperationApplier } from './undoManager.js';

export * from './history/entities.js';
export * from './history/errors.js';
export * from './history/historyNode.js';
export * from './history/historyTree.js';
export * from './history/invert.js';
export * from './history/merge.js';
export * from './history/operation.js';
export * from './history/operationId.js';
export * from './history/operations.js';
export * from './history/serialization.js';
export * from './history/transaction.js';
