// src/utils.ts

export function isObject(test: unknown): test is Record<string, unknown> {
  return typeof test === 'object' && !Array.isArray(test) && test !== null;
}

export function isFiniteNumber(test: unknown): test is number {
  return typeof test === 'number' && Number.isFinite(test);
}

export function isNumberArray(test: unknown): test is number[] {
  return Array.isArray(test) && test.every(isFiniteNumber);
}
