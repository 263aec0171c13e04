// src/history/operation.ts

import {
  BooleanOp, Constraint, ConstraintId, Entity, EntityId, Geometry, Point2, VariableId, Vector2,
} from './entities.js';
import { NULL_OPERATION_ID, OperationId, OperationIdGenerator, defaultIdGenerator } from './operationId.js';

// --- Operation types ---
// Each variant keeps what is needed to undo it without recomputing anything
// against the live drawing.

export interface CreateEntityType {
  readonly kind: 'createEntity';
  readonly entity: Entity;
}

export interface DeleteEntityType {
  readonly kind: 'deleteEntity';
  readonly entityId: EntityId;
  readonly previousEntity: Entity | null;
}

export interface ModifyEntityType {
  readonly kind: 'modifyEntity';
  readonly entityId: EntityId;
  readonly previousGeometry: Geometry;
  readonly newGeometry: Geometry;
}

export interface MoveEntitiesType {
  readonly kind: 'moveEntities';
  readonly entityIds: ReadonlyArray<EntityId>;
  readonly offset: Vector2;
  readonly previousPositions: ReadonlyArray<Point2>;
}

export interface RotateEntitiesType {
  readonly kind: 'rotateEntities';
  readonly entityIds: ReadonlyArray<EntityId>;
  readonly center: Point2;
  /** Radians, counter-clockwise. */
  readonly angle: number;
  readonly previousAngles: ReadonlyArray<number>;
}

export interface ScaleEntitiesType {
  readonly kind: 'scaleEntities';
  readonly entityIds: ReadonlyArray<EntityId>;
  readonly center: Point2;
  readonly scale: number;
  readonly previousScales: ReadonlyArray<number>;
}

export interface BooleanOperationType {
  readonly kind: 'booleanOperation';
  readonly op: BooleanOp;
  readonly entity1: EntityId;
  readonly entity2: EntityId;
  readonly resultEntities: ReadonlyArray<Entity>;
  readonly previousEntities: ReadonlyArray<Entity>;
}

export interface AddConstraintType {
  readonly kind: 'addConstraint';
  readonly constraint: Constraint;
}

export interface RemoveConstraintType {
  readonly kind: 'removeConstraint';
  readonly constraintId: ConstraintId;
  readonly previousConstraint: Constraint | null;
}

export interface ModifyVariableType {
  readonly kind: 'modifyVariable';
  readonly variableId: VariableId;
  readonly previousValue: number;
  readonly newValue: number;
}

/** Several operations recorded as a single undo step. */
export interface GroupOperationType {
  readonly kind: 'groupOperation';
  readonly name: string;
  readonly operations: ReadonlyArray<Operation>;
}

export interface CustomType {
  readonly kind: 'custom';
  readonly name: string;
  readonly data: Uint8Array;
}

export type OperationType =
  | CreateEntityType
  | DeleteEntityType
  | ModifyEntityType
  | MoveEntitiesType
  | RotateEntitiesType
  | ScaleEntitiesType
  | BooleanOperationType
  | AddConstraintType
  | RemoveConstraintType
  | ModifyVariableType
  | GroupOperationType
  | CustomType;

export type OperationKind = OperationType['kind'];

export const OPERATION_KINDS: ReadonlyArray<OperationKind> = [
  'createEntity', 'deleteEntity', 'modifyEntity', 'moveEntities', 'rotateEntities', 'scaleEntities',
  'booleanOperation', 'addConstraint', 'removeConstraint', 'modifyVariable', 'groupOperation', 'custom',
];

export type Clock = () => Date;

/** Where new operations get their id and timestamp from. */
export interface OperationContext {
  ids?: OperationIdGenerator;
  clock?: Clock;
}

export const systemClock: Clock = () => new Date();

/**
 * One user edit. Immutable: the `with*` builders return a copy that keeps the
 * same id, and are meant for configuring an operation before it is recorded.
 * Anything that changes what an operation does (merging, inverting) produces a
 * new operation with a fresh id.
 */
export class Operation {
  constructor(
    public readonly id: OperationId,
    public readonly type: OperationType,
    public readonly timestamp: Date,
    public readonly description: string,
    public readonly undoable: boolean = true,
    public readonly dependencies: ReadonlyArray<OperationId> = [],
    public readonly affectedEntities: ReadonlyArray<EntityId> = [],
  ) {
    if (id === NULL_OPERATION_ID) throw new Error("Operation: the null id can't identify an operation");
  }

  static create(type: OperationType, description: string, context: OperationContext = {}): Operation {
    const ids = context.ids ?? defaultIdGenerator;
    const clock = context.clock ?? systemClock;
    return new Operation(ids.next(), type, clock(), description);
  }

  get kind(): OperationKind {
    return this.type.kind;
  }

  withDependencies(dependencies: ReadonlyArray<OperationId>): Operation {
    return new Operation(this.id, this.type, this.timestamp, this.description, this.undoable, [...dependencies], this.affectedEntities);
  }

  withAffectedEntities(entities: ReadonlyArray<EntityId>): Operation {
    return new Operation(this.id, this.type, this.timestamp, this.description, this.undoable, this.dependencies, [...entities]);
  }

  withUndo(undoable: boolean): Operation {
    return new Operation(this.id, this.type, this.timestamp, this.description, undoable, this.dependencies, this.affectedEntities);
  }

  toString(): string {
    return `${this.id}: ${this.description}`;
  }
}
