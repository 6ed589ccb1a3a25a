// Immutable 2D points/vectors. Components are assumed finite; NaN and
// Infinity propagate unchecked.

import type { PointLike } from '../core-geometry/core-geometry';

export interface Vec2 {
  readonly x: number;
  readonly y: number;
}

export const VEC2_EPSILON = 1e-10;

export const ORIGIN: Vec2 = vec2(0, 0);

export function vec2(x: number, y: number): Vec2 {
  return Object.freeze({ x, y });
}

export function toVec2(point: PointLike): Vec2 {
  return vec2(point.x, point.y);
}

export function isVec2(value: unknown): value is Vec2 {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return 'x' in value && 'y' in value && typeof value.x === 'number' && typeof value.y === 'number';
}

export function vecAdd(a: Vec2, b: Vec2): Vec2 {
  return vec2(a.x + b.x, a.y + b.y);
}

export function vecSub(a: Vec2, b: Vec2): Vec2 {
  return vec2(a.x - b.x, a.y - b.y);
}

export function vecScale(v: Vec2, factor: number): Vec2 {
  return vec2(v.x * factor, v.y * factor);
}

export function vecLength(v: Vec2): number {
  return Math.sqrt(v.x * v.x + v.y * v.y);
}

/** Unit vector along `v`; the zero vector has no direction and yields NaN components. */
export function vecNormalize(v: Vec2): Vec2 {
  const length = vecLength(v);
  return vec2(v.x / length, v.y / length);
}

export function vecEquals(a: Vec2, b: Vec2, epsilon = VEC2_EPSILON): boolean {
  return Math.abs(a.x - b.x) <= epsilon && Math.abs(a.y - b.y) <= epsilon;
}
