// Lightweight 2D affine matrix helpers shared by the studio packages.

import { SingularTransformError } from '../errors/geometry-errors';

export interface Matrix2D {
  a: number;
  b: number;
  c: number;
  d: number;
  tx: number;
  ty: number;
}

export interface PointLike {
  x: number;
  y: number;
}

export interface Bounds {
  min: PointLike;
  max: PointLike;
}

export const IDENTITY_MATRIX: Matrix2D = Object.freeze({
  a: 1,
  b: 0,
  c: 0,
  d: 1,
  tx: 0,
  ty: 0,
});

export function createMatrix(params?: Partial<Matrix2D>): Matrix2D {
  return {
    ...IDENTITY_MATRIX,
    ...params,
  };
}

export function matrixMultiply(m1: Matrix2D, m2: Matrix2D): Matrix2D {
  return {
    a: m1.a * m2.a + m1.c * m2.b,
    b: m1.b * m2.a + m1.d * m2.b,
    c: m1.a * m2.c + m1.c * m2.d,
    d: m1.b * m2.c + m1.d * m2.d,
    tx: m1.a * m2.tx + m1.c * m2.ty + m1.tx,
    ty: m1.b * m2.tx + m1.d * m2.ty + m1.ty,
  };
}

export function matrixDeterminant({ a, b, c, d }: Matrix2D): number {
  return a * d - b * c;
}

export function matrixInvert(m: Matrix2D): Matrix2D {
  const det = matrixDeterminant(m);
  if (Math.abs(det) < Number.EPSILON) {
    throw new SingularTransformError(det);
  }

  const invDet = 1 / det;
  return {
    a: m.d * invDet,
    b: -m.b * invDet,
    c: -m.c * invDet,
    d: m.a * invDet,
    tx: (m.c * m.ty - m.d * m.tx) * invDet,
    ty: (m.b * m.tx - m.a * m.ty) * invDet,
  };
}

export function matrixApplyToPoint(m: Matrix2D, point: PointLike): PointLike {
  return {
    x: m.a * point.x + m.c * point.y + m.tx,
    y: m.b * point.x + m.d * point.y + m.ty,
  };
}

/** Counter-clockwise rotation (y up) by `angle` radians around the origin. */
export function matrixRotation(angle: number): Matrix2D {
  const cos = Math.cos(angle);
  const sin = Math.sin(angle);
  return { a: cos, b: sin, c: -sin, d: cos, tx: 0, ty: 0 };
}

export function matrixTranslate(tx: number, ty: number): Matrix2D {
  return { a: 1, b: 0, c: 0, d: 1, tx, ty };
}

export function matrixScale(sx: number, sy: number = sx): Matrix2D {
  return { a: sx, b: 0, c: 0, d: sy, tx: 0, ty: 0 };
}

export function matrixEquals(m1: Matrix2D, m2: Matrix2D, epsilon = 1e-6): boolean {
  return (
    Math.abs(m1.a - m2.a) < epsilon &&
    Math.abs(m1.b - m2.b) < epsilon &&
    Math.abs(m1.c - m2.c) < epsilon &&
    Math.abs(m1.d - m2.d) < epsilon &&
    Math.abs(m1.tx - m2.tx) < epsilon &&
    Math.abs(m1.ty - m2.ty) < epsilon
  );
}

export function isIdentityMatrix(m: Matrix2D, epsilon = 1e-6): boolean {
  return matrixEquals(m, IDENTITY_MATRIX, epsilon);
}

export function composeTransforms(transforms: Matrix2D[]): Matrix2D {
  return transforms.reduce(matrixMultiply, IDENTITY_MATRIX);
}

export function boundsOfPoints(points: readonly PointLike[]): Bounds {
  if (points.length === 0) {
    throw new RangeError('Cannot compute bounds of an empty point list.');
  }
  const xs = points.map((point) => point.x);
  const ys = points.map((point) => point.y);
  return {
    min: { x: Math.min(...xs), y: Math.min(...ys) },
    max: { x: Math.max(...xs), y: Math.max(...ys) },
  };
}

export function boundsContain(bounds: Bounds, point: PointLike): boolean {
  return (
    bounds.min.x <= point.x &&
    point.x <= bounds.max.x &&
    bounds.min.y <= point.y &&
    point.y <= bounds.max.y
  );
}
