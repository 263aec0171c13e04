// src/history/operations.ts

// One constructor per kind of edit. Nothing here checks that referenced
// entities exist; that's up to the caller.

import {
  BooleanOp, Constraint, ConstraintId, Entity, EntityId, Geometry, Point2, VariableId, Vector2,
} from './entities.js';
import { Operation, OperationContext, OperationType } from './operation.js';

export function createOperation(type: OperationType, description: string, context?: OperationContext): Operation {
  return Operation.create(type, description, context);
}

export function createEntity(entity: Entity, description: string, context?: OperationContext): Operation {
  return Operation.create({ kind: 'createEntity', entity }, description, context)
    .withAffectedEntities([entity.id]);
}

export function deleteEntity(
  entityId: EntityId,
  previousEntity: Entity | null,
  description: string,
  context?: OperationContext,
): Operation {
  return Operation.create({ kind: 'deleteEntity', entityId, previousEntity }, description, context)
    .withAffectedEntities([entityId]);
}

export function modifyEntity(
  entityId: EntityId,
  previousGeometry: Geometry,
  newGeometry: Geometry,
  description: string,
  context?: OperationContext,
): Operation {
  return Operation.create({ kind: 'modifyEntity', entityId, previousGeometry, newGeometry }, description, context)
    .withAffectedEntities([entityId]);
}

export function moveEntities(
  entityIds: ReadonlyArray<EntityId>,
  offset: Vector2,
  previousPositions: ReadonlyArray<Point2>,
  description: string,
  context?: OperationContext,
): Operation {
  return Operation.create(
    { kind: 'moveEntities', entityIds: [...entityIds], offset, previousPositions: [...previousPositions] },
    description,
    context,
  ).withAffectedEntities(entityIds);
}

export function rotateEntities(
  entityIds: ReadonlyArray<EntityId>,
  center: Point2,
  angle: number,
  previousAngles: ReadonlyArray<number>,
  description: string,
  context?: OperationContext,
): Operation {
  return Operation.create(
    { kind: 'rotateEntities', entityIds: [...entityIds], center, angle, previousAngles: [...previousAngles] },
    description,
    context,
  ).withAffectedEntities(entityIds);
}

export function scaleEntities(
  entityIds: ReadonlyArray<EntityId>,
  center: Point2,
  scale: number,
  previousScales: ReadonlyArray<number>,
  description: string,
  context?: OperationContext,
): Operation {
  return Operation.create(
    { kind: 'scaleEntities', entityIds: [...entityIds], center, scale, previousScales: [...previousScales] },
    description,
    context,
  ).withAffectedEntities(entityIds);
}

export function booleanOperation(
  op: BooleanOp,
  entity1: EntityId,
  entity2: EntityId,
  resultEntities: ReadonlyArray<Entity>,
  previousEntities: ReadonlyArray<Entity>,
  description: string,
  context?: OperationContext,
): Operation {
  const affected = [entity1, entity2, ...resultEntities.map(e => e.id)];
  return Operation.create(
    {
      kind: 'booleanOperation',
      op,
      entity1,
      entity2,
      resultEntities: [...resultEntities],
      previousEntities: [...previousEntities],
    },
    description,
    context,
  ).withAffectedEntities([...new Set(affected)]);
}

export function addConstraint(constraint: Constraint, description: string, context?: OperationContext): Operation {
  return Operation.create({ kind: 'addConstraint', constraint }, description, context);
}

export function removeConstraint(
  constraintId: ConstraintId,
  previousConstraint: Constraint | null,
  description: string,
  context?: OperationContext,
): Operation {
  return Operation.create({ kind: 'removeConstraint', constraintId, previousConstraint }, description, context);
}

export function modifyVariable(
  variableId: VariableId,
  previousValue: number,
  newValue: number,
  description: string,
  context?: OperationContext,
): Operation {
  return Operation.create({ kind: 'modifyVariable', variableId, previousValue, newValue }, description, context);
}

/**
 * Records `operations` as one undo step. The group depends on whatever its
 * members depend on and affects whatever they affect.
 */
export function groupOperation(
  name: string,
  operations: ReadonlyArray<Operation>,
  description: string,
  context?: OperationContext,
): Operation {
  const memberIds = new Set(operations.map(op => op.id));
  const dependencies = new Set(operations.flatMap(op => op.dependencies));
  const affected = new Set(operations.flatMap(op => op.affectedEntities));
  return Operation.create({ kind: 'groupOperation', name, operations: [...operations] }, description, context)
    .withDependencies([...dependencies].filter(id => !memberIds.has(id)))
    .withAffectedEntities([...affected])
    .withUndo(operations.every(op => op.undoable));
}

export function customOperation(
  name: string,
  data: Uint8Array,
  description: string,
  context?: OperationContext,
): Operation {
  return Operation.create({ kind: 'custom', name, data }, description, context);
}
