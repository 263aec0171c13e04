// src/history/errors.ts

export type HistoryErrorKind =
  | 'NotFound'
  | 'DuplicateBranch'
  | 'UnknownBranch'
  | 'DuplicateOperation'
  | 'NotInvertible'
  | 'InvalidSnapshot';

/** A request the history tree refused. The tree is unchanged when one is returned. */
export class HistoryError extends Error {
  constructor(public readonly kind: HistoryErrorKind, message: string) {
    super(message);
    this.name = 'HistoryError';
  }
}

/** Outcome of a fallible history call. `failed` is set when the call was rejected. */
export interface HistoryResult {
  failed?: HistoryError;
}

export const ok: HistoryResult = Object.freeze({});

export function fail(kind: HistoryErrorKind, message: string): HistoryResult {
  return { failed: new HistoryError(kind, message) };
}

/** Thrown when the tree's own bookkeeping is broken. Always a bug in this package. */
export class HistoryCorruptionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HistoryCorruptionError';
  }
}
