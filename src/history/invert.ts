// src/history/invert.ts

import { negateVector, translatePoint } from './entities.js';
import { Operation, OperationContext, OperationType } from './operation.js';

function invertType(op: Operation, context?: OperationContext): OperationType | null {
  const type = op.type;
  switch (type.kind) {
    case 'createEntity':
      return { kind: 'deleteEntity', entityId: type.entity.id, previousEntity: type.entity };
    case 'deleteEntity':
      return type.previousEntity ? { kind: 'createEntity', entity: type.previousEntity } : null;
    case 'modifyEntity':
      return {
        kind: 'modifyEntity',
        entityId: type.entityId,
        previousGeometry: type.newGeometry,
        newGeometry: type.previousGeometry,
      };
    case 'moveEntities':
      return {
        kind: 'moveEntities',
        entityIds: type.entityIds,
        offset: negateVector(type.offset),
        previousPositions: type.previousPositions.map(p => translatePoint(p, type.offset)),
      };
    case 'rotateEntities':
      return {
        kind: 'rotateEntities',
        entityIds: type.entityIds,
        center: type.center,
        angle: 0 - type.angle,
        previousAngles: type.previousAngles.map(a => a + type.angle),
      };
    case 'scaleEntities':
      if (type.scale === 0 || !Number.isFinite(type.scale)) return null;
      return {
        kind: 'scaleEntities',
        entityIds: type.entityIds,
        center: type.center,
        scale: 1 / type.scale,
        previousScales: type.previousScales.map(s => s * type.scale),
      };
    case 'booleanOperation': {
      // Take the results out, put the operands back
      const removals = type.resultEntities.map(entity => Operation.create(
        { kind: 'deleteEntity', entityId: entity.id, previousEntity: entity },
        `Remove ${type.op} result ${entity.id}`,
        context,
      ));
      const restores = type.previousEntities.map(entity => Operation.create(
        { kind: 'createEntity', entity },
        `Restore ${type.op} operand ${entity.id}`,
        context,
      ));
      return { kind: 'groupOperation', name: `undo ${type.op}`, operations: [...removals, ...restores] };
    }
    case 'addConstraint':
      return { kind: 'removeConstraint', constraintId: type.constraint.id, previousConstraint: type.constraint };
    case 'removeConstraint':
      return type.previousConstraint ? { kind: 'addConstraint', constraint: type.previousConstraint } : null;
    case 'modifyVariable':
      return {
        kind: 'modifyVariable',
        variableId: type.variableId,
        previousValue: type.newValue,
        newValue: type.previousValue,
      };
    case 'groupOperation': {
      const inverted: Operation[] = [];
      for (let i = type.operations.length - 1; i >= 0; i--) {
        const member = invertOperation(type.operations[i], context);
        if (!member) return null;
        inverted.push(member);
      }
      return { kind: 'groupOperation', name: type.name, operations: inverted };
    }
    case 'custom':
      // Opaque payload, only its producer knows how to reverse it
      return null;
  }
}

/**
 * Returns the operation that reverses `op` when applied to the drawing right
 * after it, or null when that can't be expressed (not undoable, a custom
 * payload, a delete recorded without the entity it removed, a zero scale).
 * The inverse has a fresh id and depends on `op`.
 */
export function invertOperation(op: Operation, context?: OperationContext): Operation | null {
  if (!op.undoable) return null;
  const type = invertType(op, context);
  if (!type) return null;
  return Operation.create(type, `Undo ${op.description}`, context)
    .withDependencies([op.id])
    .withAffectedEntities(op.affectedEntities);
}
