// src/history/entities.ts

// Payloads carried by operations. They come from the drawing model and are
// stored and handed back untouched; the history engine only ever compares ids
// and does the vector arithmetic needed to merge or invert a transform.

export type EntityId = number;
export type ConstraintId = number;
export type VariableId = string;

export interface Vector2 {
  readonly x: number;
  readonly y: number;
}

export interface Point2 {
  readonly x: number;
  readonly y: number;
}

/** Geometry snapshot (line, arc, polyline, ...). Opaque to the history engine. */
export interface Geometry {
  readonly type: string;
  readonly [field: string]: unknown;
}

export interface Entity {
  readonly id: EntityId;
  readonly geometry: Geometry;
  readonly [field: string]: unknown;
}

export interface Constraint {
  readonly id: ConstraintId;
  readonly type: string;
  readonly [field: string]: unknown;
}

export type BooleanOp = 'union' | 'intersection' | 'difference';

// --- Factory Functions ---

export function vec2(x: number, y: number): Vector2 {
  return { x, y };
}

export function point2(x: number, y: number): Point2 {
  return { x, y };
}

export function addVectors(a: Vector2, b: Vector2): Vector2 {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function negateVector(v: Vector2): Vector2 {
  // 0 - 0 keeps zeros positive
  return { x: 0 - v.x, y: 0 - v.y };
}

export function translatePoint(p: Point2, offset: Vector2): Point2 {
  return { x: p.x + offset.x, y: p.y + offset.y };
}

/** True when both lists name the same entities, ignoring order and repeats. */
export function sameEntityIdSet(a: ReadonlyArray<EntityId>, b: ReadonlyArray<EntityId>): boolean {
  const left = new Set(a);
  const right = new Set(b);
  if (left.size !== right.size) return false;
  for (const id of left) {
    if (!right.has(id)) return false;
  }
  return true;
}
