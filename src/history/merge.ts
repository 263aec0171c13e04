// src/history/merge.ts

import { addVectors, sameEntityIdSet } from './entities.js';
import { Operation, OperationContext, OperationType } from './operation.js';

/**
 * Whether `later` (recorded right after `earlier`) can be folded into it.
 * Only two shapes qualify: moves of the same entity set, and changes to the
 * same variable. Everything else, mixed kinds included, stays as recorded.
 */
export function canMergeOperations(earlier: Operation, later: Operation): boolean {
  if (earlier.undoable !== later.undoable) return false;
  const a = earlier.type;
  const b = later.type;
  if (a.kind === 'moveEntities' && b.kind === 'moveEntities') {
    return sameEntityIdSet(a.entityIds, b.entityIds);
  }
  if (a.kind === 'modifyVariable' && b.kind === 'modifyVariable') {
    return a.variableId === b.variableId;
  }
  return false;
}

function mergedType(a: OperationType, b: OperationType): OperationType | null {
  if (a.kind === 'moveEntities' && b.kind === 'moveEntities') {
    if (!sameEntityIdSet(a.entityIds, b.entityIds)) return null;
    return {
      kind: 'moveEntities',
      entityIds: a.entityIds,
      offset: addVectors(a.offset, b.offset),
      // Positions before the first move are the ones an undo has to restore
      previousPositions: a.previousPositions,
    };
  }
  if (a.kind === 'modifyVariable' && b.kind === 'modifyVariable') {
    if (a.variableId !== b.variableId) return null;
    return {
      kind: 'modifyVariable',
      variableId: a.variableId,
      previousValue: a.previousValue,
      newValue: b.newValue,
    };
  }
  return null;
}

/**
 * Builds the single operation equivalent to applying `earlier` then `later`.
 * The result has a new id and carries the later description. Returns null
 * when the pair can't be merged.
 */
export function mergeOperations(earlier: Operation, later: Operation, context?: OperationContext): Operation | null {
  if (!canMergeOperations(earlier, later)) return null;
  const type = mergedType(earlier.type, later.type);
  if (!type) return null;

  const pair = new Set([earlier.id, later.id]);
  const dependencies = [...new Set([...earlier.dependencies, ...later.dependencies])].filter(id => !pair.has(id));
  const affected = [...new Set([...earlier.affectedEntities, ...later.affectedEntities])];

  return Operation.create(type, later.description, context)
    .withDependencies(dependencies)
    .withAffectedEntities(affected)
    .withUndo(earlier.undoable);
}
