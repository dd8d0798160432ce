/**
 * Mathematical utility functions
 */

export function clamp(value: number, min_val: number, max_val: number): number {
  return Math.max(min_val, Math.min(max_val, value));
}

export function sum(values: number[]): number {
  return values.reduce((acc, val) => acc + val, 0);
}

export function product(values: number[]): number {
  return values.reduce((acc, val) => acc * val, 1);
}

export function max(values: number[]): number {
  return values.reduce((acc, val) => Math.max(acc, val), 0);
}

export function isPositiveFinite(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0;
}
