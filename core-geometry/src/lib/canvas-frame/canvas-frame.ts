import {
  boundsContain,
  boundsOfPoints,
  composeTransforms,
  matrixApplyToPoint,
  matrixInvert,
  matrixRotation,
  matrixTranslate,
} from '../core-geometry/core-geometry';
import type { Bounds, Matrix2D } from '../core-geometry/core-geometry';
import { DegenerateGeometryError } from '../errors/geometry-errors';
import { toVec2, vec2, vecAdd, vecLength, vecScale, vecSub } from '../vec2/vec2';
import type { Vec2 } from '../vec2/vec2';

/**
 * Rotation angle of a `width` x `height` rectangle whose `start` corner sits at
 * `start` and whose opposite corner sits at `end`. The diagonal of an unrotated
 * rectangle already points at `atan2(height, width)`, so that share is removed.
 */
export function rotationFromOppositeCorners(start: Vec2, end: Vec2, size: Vec2): number {
  return Math.atan2(end.y - start.y, end.x - start.x) - Math.atan2(size.y, size.x);
}

/**
 * Maps between a rectangle's local frame (origin at `start`, axes along its
 * edges) and the global device frame.
 *
 * Two opposite corners do not pin down a rectangle on their own, and the
 * declared size may disagree with their distance. The size wins: `end` is moved
 * along the supplied direction until it sits one diagonal away from `start`.
 * The caller's corner stays available as `specifiedEnd`.
 */
export class CanvasFrame {
  readonly size: Vec2;
  readonly start: Vec2;
  readonly end: Vec2;
  readonly specifiedEnd: Vec2;
  readonly angle: number;
  readonly translation: Vec2;
  /** Local → global: rotation by `angle`, then translation to `start`. */
  readonly localToGlobalMatrix: Matrix2D;
  private readonly bounds: Bounds;
  private inverse?: Matrix2D;

  constructor(size: Vec2, start: Vec2, end: Vec2) {
    const vecToEnd = vecSub(end, start);
    const distance = vecLength(vecToEnd);
    if (distance === 0) {
      throw new DegenerateGeometryError(
        `Canvas corners coincide at (${start.x}, ${start.y}); cannot derive a rotation.`,
      );
    }

    const diagonal = Math.sqrt(size.x * size.x + size.y * size.y);

    this.size = size;
    this.start = start;
    this.specifiedEnd = end;
    this.end = vecAdd(start, vecScale(vecToEnd, diagonal / distance));
    this.angle = rotationFromOppositeCorners(start, this.end, size);
    this.translation = start;
    this.localToGlobalMatrix = composeTransforms([
      matrixTranslate(start.x, start.y),
      matrixRotation(this.angle),
    ]);
    this.bounds = boundsOfPoints([this.start, this.end]);
  }

  localToGlobal(point: Vec2): Vec2 {
    return toVec2(matrixApplyToPoint(this.localToGlobalMatrix, point));
  }

  /** Throws `SingularTransformError` when the rotation cannot be inverted. */
  globalToLocal(point: Vec2): Vec2 {
    this.inverse ??= matrixInvert(this.localToGlobalMatrix);
    return toVec2(matrixApplyToPoint(this.inverse, point));
  }

  /**
   * Bounding-box test against `start` and the derived `end` in global space.
   * A rotated canvas reports points outside its rectangle but inside that box.
   */
  containsGlobal(point: Vec2): boolean {
    return boundsContain(this.bounds, point);
  }

  boundingBox(): Bounds {
    return {
      min: { ...this.bounds.min },
      max: { ...this.bounds.max },
    };
  }

  corners(): Vec2[] {
    return [
      vec2(0, 0),
      vec2(this.size.x, 0),
      vec2(this.size.x, this.size.y),
      vec2(0, this.size.y),
    ].map((corner) => this.localToGlobal(corner));
  }
}
