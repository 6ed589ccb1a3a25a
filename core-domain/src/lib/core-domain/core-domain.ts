// Domain model shared between the plotter devices, drawable objects and debug rendering.
// Entities stay minimal so the other packages can build upon them.

import type { Bounds, Vec2 } from '@plotstudio/core-geometry';

export type ObjectName = string;

export type VerbName = string;

export type PenState = 'up' | 'down';

/** One straight move of the pen head, tagged with the pen state held during the move. */
export interface PathSegment {
  readonly from: Vec2;
  readonly to: Vec2;
  readonly penState: PenState;
}

export type BoundingBox = Bounds;

export interface DebugPolygonShape {
  kind: 'polygon';
  points: Vec2[];
  stroke: string;
  fill?: string;
  dash?: number[];
  opacity?: number;
}

export interface DebugCircleShape {
  kind: 'circle';
  center: Vec2;
  radius: number;
  stroke: string;
  fill?: string;
  opacity?: number;
}

export type DebugShape = DebugPolygonShape | DebugCircleShape;

export const DEFAULT_STUDIO_BOUNDS: BoundingBox = Object.freeze({
  min: Object.freeze({ x: 0, y: 0 }),
  max: Object.freeze({ x: 6, y: 4 }),
});

export function createPathSegment(from: Vec2, to: Vec2, penState: PenState): PathSegment {
  return Object.freeze({ from, to, penState });
}

export function isPenDown(segment: PathSegment): boolean {
  return segment.penState === 'down';
}
