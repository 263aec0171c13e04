// src/history/serialization.ts

// JSON form of a history tree. Ids are plain integers, timestamps ISO-8601 in
// UTC, custom payloads base64. Reading validates shape and tree structure and
// reports problems as an InvalidSnapshot failure instead of throwing.

import { HistoryTreeOptions } from '../types.js';
import { isFiniteNumber, isNumberArray, isObject } from '../utils.js';
import { Constraint, Entity, Geometry, Point2, Vector2 } from './entities.js';
import { HistoryError } from './errors.js';
import { HistorySnapshotNode, HistoryTree, RestoreResult } from './historyTree.js';
import {
  CustomType, GroupOperationType, OPERATION_KINDS, Operation, OperationKind, OperationType,
} from './operation.js';
import { OperationId } from './operationId.js';

export const SERIALIZATION_VERSION = 1;

export type SerializedOperationType =
  | Exclude<OperationType, GroupOperationType | CustomType>
  | { kind: 'groupOperation'; name: string; operations: SerializedOperation[] }
  | { kind: 'custom'; name: string; data: string };

export interface SerializedOperation {
  id: number;
  type: SerializedOperationType;
  timestamp: string;
  description: string;
  undoable: boolean;
  dependencies: number[];
  affectedEntities: number[];
}

export interface SerializedNode {
  operation: SerializedOperation;
  parent: number | null;
  children: number[];
}

export interface SerializedHistory {
  version: number;
  nodes: SerializedNode[];
  rootId: number | null;
  currentId: number | null;
  redoStack: number[];
  branches: Record<string, number>;
  retired: Array<[number, number]>;
  stats: {
    totalOperations: number;
    compressionSavings: number;
  };
}

// --- Writing ---

export function serializeOperation(op: Operation): SerializedOperation {
  return {
    id: op.id,
    type: serializeType(op.type),
    timestamp: op.timestamp.toISOString(),
    description: op.description,
    undoable: op.undoable,
    dependencies: [...op.dependencies],
    affectedEntities: [...op.affectedEntities],
  };
}

function serializeType(type: OperationType): SerializedOperationType {
  switch (type.kind) {
    case 'groupOperation':
      return { kind: 'groupOperation', name: type.name, operations: type.operations.map(serializeOperation) };
    case 'custom':
      return { kind: 'custom', name: type.name, data: Buffer.from(type.data).toString('base64') };
    default:
      return type;
  }
}

export function serializeHistory(tree: HistoryTree): SerializedHistory {
  const snapshot = tree.toSnapshot();
  // Own data properties, so a branch named like a prototype key survives
  const branches: Record<string, number> = Object.fromEntries(snapshot.branches);
  return {
    version: SERIALIZATION_VERSION,
    nodes: snapshot.nodes.map(node => ({
      operation: serializeOperation(node.operation),
      parent: node.parent,
      children: [...node.children],
    })),
    rootId: snapshot.rootId,
    currentId: snapshot.currentId,
    redoStack: [...snapshot.redoStack],
    branches,
    retired: snapshot.retired.map(([from, to]): [number, number] => [from, to]),
    stats: {
      totalOperations: snapshot.totalOperations,
      compressionSavings: snapshot.compressionSavings,
    },
  };
}

// --- Reading ---

function invalid(path: string, message: string): HistoryError {
  return new HistoryError('InvalidSnapshot', `${path}: ${message}`);
}

function expectNumber(value: unknown, path: string): number {
  if (!isFiniteNumber(value)) throw invalid(path, 'expected a number');
  return value;
}

function expectId(value: unknown, path: string): OperationId {
  if (!isFiniteNumber(value) || !Number.isInteger(value) || value <= 0) {
    throw invalid(path, 'expected a positive integer id');
  }
  return value;
}

function expectOptionalId(value: unknown, path: string): OperationId | null {
  return value === null ? null : expectId(value, path);
}

function expectString(value: unknown, path: string): string {
  if (typeof value !== 'string') throw invalid(path, 'expected a string');
  return value;
}

function expectNumbers(value: unknown, path: string): number[] {
  if (!isNumberArray(value)) throw invalid(path, 'expected an array of numbers');
  return value;
}

function expectIds(value: unknown, path: string): OperationId[] {
  if (!Array.isArray(value)) throw invalid(path, 'expected an array of ids');
  return value.map((item, i) => expectId(item, `${path}[${i}]`));
}

function expectObject(value: unknown, path: string): Record<string, unknown> {
  if (!isObject(value)) throw invalid(path, 'expected an object');
  return value;
}

function expectVector(value: unknown, path: string): Vector2 & Point2 {
  const v = expectObject(value, path);
  return { x: expectNumber(v.x, `${path}.x`), y: expectNumber(v.y, `${path}.y`) };
}

function isGeometry(value: unknown): value is Geometry {
  return isObject(value) && typeof value.type === 'string';
}

function expectGeometry(value: unknown, path: string): Geometry {
  if (!isGeometry(value)) throw invalid(path, 'expected a geometry with a type');
  return value;
}

function isEntity(value: unknown): value is Entity {
  return isObject(value) && isFiniteNumber(value.id) && isGeometry(value.geometry);
}

function expectEntity(value: unknown, path: string): Entity {
  if (!isEntity(value)) throw invalid(path, 'expected an entity with an id and geometry');
  return value;
}

function expectEntities(value: unknown, path: string): Entity[] {
  if (!Array.isArray(value)) throw invalid(path, 'expected an array of entities');
  return value.map((item, i) => expectEntity(item, `${path}[${i}]`));
}

function isConstraint(value: unknown): value is Constraint {
  return isObject(value) && isFiniteNumber(value.id) && typeof value.type === 'string';
}

function expectConstraint(value: unknown, path: string): Constraint {
  if (!isConstraint(value)) throw invalid(path, 'expected a constraint with an id and type');
  return value;
}

function isOperationKind(value: unknown): value is OperationKind {
  return typeof value === 'string' && OPERATION_KINDS.some(kind => kind === value);
}

function parseType(value: unknown, path: string): OperationType {
  const t = expectObject(value, path);
  const kind = t.kind;
  if (!isOperationKind(kind)) throw invalid(`${path}.kind`, `unknown operation kind ${JSON.stringify(kind)}`);

  switch (kind) {
    case 'createEntity':
      return { kind, entity: expectEntity(t.entity, `${path}.entity`) };
    case 'deleteEntity':
      return {
        kind,
        entityId: expectNumber(t.entityId, `${path}.entityId`),
        previousEntity: t.previousEntity === null ? null : expectEntity(t.previousEntity, `${path}.previousEntity`),
      };
    case 'modifyEntity':
      return {
        kind,
        entityId: expectNumber(t.entityId, `${path}.entityId`),
        previousGeometry: expectGeometry(t.previousGeometry, `${path}.previousGeometry`),
        newGeometry: expectGeometry(t.newGeometry, `${path}.newGeometry`),
      };
    case 'moveEntities': {
      if (!Array.isArray(t.previousPositions)) throw invalid(`${path}.previousPositions`, 'expected an array');
      return {
        kind,
        entityIds: expectNumbers(t.entityIds, `${path}.entityIds`),
        offset: expectVector(t.offset, `${path}.offset`),
        previousPositions: t.previousPositions.map((p, i) => expectVector(p, `${path}.previousPositions[${i}]`)),
      };
    }
    case 'rotateEntities':
      return {
        kind,
        entityIds: expectNumbers(t.entityIds, `${path}.entityIds`),
        center: expectVector(t.center, `${path}.center`),
        angle: expectNumber(t.angle, `${path}.angle`),
        previousAngles: expectNumbers(t.previousAngles, `${path}.previousAngles`),
      };
    case 'scaleEntities':
      return {
        kind,
        entityIds: expectNumbers(t.entityIds, `${path}.entityIds`),
        center: expectVector(t.center, `${path}.center`),
        scale: expectNumber(t.scale, `${path}.scale`),
        previousScales: expectNumbers(t.previousScales, `${path}.previousScales`),
      };
    case 'booleanOperation': {
      const op = t.op;
      if (op !== 'union' && op !== 'intersection' && op !== 'difference') {
        throw invalid(`${path}.op`, 'expected union, intersection or difference');
      }
      return {
        kind,
        op,
        entity1: expectNumber(t.entity1, `${path}.entity1`),
        entity2: expectNumber(t.entity2, `${path}.entity2`),
        resultEntities: expectEntities(t.resultEntities, `${path}.resultEntities`),
        previousEntities: expectEntities(t.previousEntities, `${path}.previousEntities`),
      };
    }
    case 'addConstraint':
      return { kind, constraint: expectConstraint(t.constraint, `${path}.constraint`) };
    case 'removeConstraint':
      return {
        kind,
        constraintId: expectNumber(t.constraintId, `${path}.constraintId`),
        previousConstraint: t.previousConstraint === null
          ? null
          : expectConstraint(t.previousConstraint, `${path}.previousConstraint`),
      };
    case 'modifyVariable':
      return {
        kind,
        variableId: expectString(t.variableId, `${path}.variableId`),
        previousValue: expectNumber(t.previousValue, `${path}.previousValue`),
        newValue: expectNumber(t.newValue, `${path}.newValue`),
      };
    case 'groupOperation': {
      if (!Array.isArray(t.operations)) throw invalid(`${path}.operations`, 'expected an array');
      return {
        kind,
        name: expectString(t.name, `${path}.name`),
        operations: t.operations.map((member, i) => parseOperation(member, `${path}.operations[${i}]`)),
      };
    }
    case 'custom':
      return {
        kind,
        name: expectString(t.name, `${path}.name`),
        data: new Uint8Array(Buffer.from(expectString(t.data, `${path}.data`), 'base64')),
      };
  }
}

function parseOperation(value: unknown, path: string): Operation {
  const o = expectObject(value, path);
  const timestamp = new Date(expectString(o.timestamp, `${path}.timestamp`));
  if (Number.isNaN(timestamp.getTime())) throw invalid(`${path}.timestamp`, 'expected an ISO-8601 instant');
  if (typeof o.undoable !== 'boolean') throw invalid(`${path}.undoable`, 'expected a boolean');
  return new Operation(
    expectId(o.id, `${path}.id`),
    parseType(o.type, `${path}.type`),
    timestamp,
    expectString(o.description, `${path}.description`),
    o.undoable,
    expectIds(o.dependencies, `${path}.dependencies`),
    expectNumbers(o.affectedEntities, `${path}.affectedEntities`),
  );
}

/** Reads one operation written by serializeOperation. */
export function deserializeOperation(value: unknown): { operation?: Operation; failed?: HistoryError } {
  try {
    return { operation: parseOperation(value, 'operation') };
  } catch (error) {
    if (error instanceof HistoryError) return { failed: error };
    throw error;
  }
}

function parseHistory(value: unknown, options: HistoryTreeOptions): RestoreResult {
  const h = expectObject(value, 'history');
  if (h.version !== SERIALIZATION_VERSION) {
    throw invalid('history.version', `unsupported version ${JSON.stringify(h.version)}`);
  }
  if (!Array.isArray(h.nodes)) throw invalid('history.nodes', 'expected an array');

  const nodes: HistorySnapshotNode[] = h.nodes.map((item, i) => {
    const n = expectObject(item, `history.nodes[${i}]`);
    return {
      operation: parseOperation(n.operation, `history.nodes[${i}].operation`),
      parent: expectOptionalId(n.parent, `history.nodes[${i}].parent`),
      children: expectIds(n.children, `history.nodes[${i}].children`),
    };
  });

  const branchRecord = expectObject(h.branches, 'history.branches');
  const branches = Object.entries(branchRecord).map(
    ([name, target]): [string, OperationId] => [name, expectId(target, `history.branches.${name}`)],
  );

  if (!Array.isArray(h.retired)) throw invalid('history.retired', 'expected an array');
  const retired = h.retired.map((pair, i): [OperationId, OperationId] => {
    if (!Array.isArray(pair) || pair.length !== 2) throw invalid(`history.retired[${i}]`, 'expected an id pair');
    return [expectId(pair[0], `history.retired[${i}][0]`), expectId(pair[1], `history.retired[${i}][1]`)];
  });

  const stats = expectObject(h.stats, 'history.stats');

  return HistoryTree.fromSnapshot({
    nodes,
    rootId: expectOptionalId(h.rootId, 'history.rootId'),
    currentId: expectOptionalId(h.currentId, 'history.currentId'),
    redoStack: expectIds(h.redoStack, 'history.redoStack'),
    branches,
    retired,
    totalOperations: expectNumber(stats.totalOperations, 'history.stats.totalOperations'),
    compressionSavings: expectNumber(stats.compressionSavings, 'history.stats.compressionSavings'),
  }, options);
}

/**
 * Rebuilds a tree from the output of serializeHistory (already JSON-parsed).
 * The id generator in `options` is advanced past every id the history holds.
 */
export function deserializeHistory(value: unknown, options: HistoryTreeOptions = {}): RestoreResult {
  try {
    return parseHistory(value, options);
  } catch (error) {
    if (error instanceof HistoryError) return { failed: error };
    throw error;
  }
}
