import { isPenDown } from '@plotstudio/core-domain';
import type { BoundingBox, DebugShape, PathSegment } from '@plotstudio/core-domain';
import {
  composeTransforms,
  matrixApplyToPoint,
  matrixScale,
  matrixTranslate,
} from '@plotstudio/core-geometry';
import type { Matrix2D, PointLike, Vec2 } from '@plotstudio/core-geometry';
import type { Studio } from '@plotstudio/studio';

const PEN_DOWN_STROKE = '#000000';
const PEN_UP_STROKE = '#ff0000';
const PEN_UP_DASH = [4, 4];
const PEN_UP_OPACITY = 0.5;

export interface DebugPathLine {
  from: Vec2;
  to: Vec2;
  stroke: string;
  dash?: number[];
  opacity?: number;
}

export interface StudioDebugScene {
  bounds: BoundingBox;
  shapes: DebugShape[];
  pathLines: DebugPathLine[];
}

export interface DebugViewport {
  width: number;
  height: number;
}

export interface DebugRenderOptions {
  width?: number;
  height?: number;
  padding?: number;
  background?: string;
  lineWidth?: number;
}

/** The subset of a canvas 2D context the painter draws with. */
export interface DebugRenderContext {
  strokeStyle: string;
  fillStyle: string;
  lineWidth: number;
  globalAlpha: number;
  save(): void;
  restore(): void;
  beginPath(): void;
  moveTo(x: number, y: number): void;
  lineTo(x: number, y: number): void;
  closePath(): void;
  arc(x: number, y: number, radius: number, startAngle: number, endAngle: number): void;
  stroke(): void;
  fill(): void;
  fillRect(x: number, y: number, width: number, height: number): void;
  setLineDash(segments: number[]): void;
}

export function toDebugPathLine(segment: PathSegment): DebugPathLine {
  if (isPenDown(segment)) {
    return { from: segment.from, to: segment.to, stroke: PEN_DOWN_STROKE };
  }
  return {
    from: segment.from,
    to: segment.to,
    stroke: PEN_UP_STROKE,
    dash: [...PEN_UP_DASH],
    opacity: PEN_UP_OPACITY,
  };
}

export function buildStudioDebugScene(studio: Studio): StudioDebugScene {
  const shapes = Array.from(studio.getObjects().values()).flatMap((object) => object.debugShapes());
  return {
    bounds: studio.bounds,
    shapes,
    pathLines: studio.device.getPath().map(toDebugPathLine),
  };
}

export function fitBoundsToViewport(
  bounds: BoundingBox,
  viewport: DebugViewport,
  padding = 0,
): Matrix2D {
  const inset = Math.max(0, padding);
  const available = {
    width: Math.max(1, viewport.width - inset * 2),
    height: Math.max(1, viewport.height - inset * 2),
  };
  const width = bounds.max.x - bounds.min.x;
  const height = bounds.max.y - bounds.min.y;
  const scale = width > 0 && height > 0 ? Math.min(available.width / width, available.height / height) : 1;

  const offset = matrixTranslate(
    inset + (available.width - width * scale) / 2,
    inset + (available.height - height * scale) / 2,
  );
  return composeTransforms([offset, matrixScale(scale), matrixTranslate(-bounds.min.x, -bounds.min.y)]);
}

/**
 * Paints objects and the recorded path in screen space. Pen-down moves are
 * solid, pen-up travel is dashed. Returns the bed-to-screen transform used.
 */
export function paintStudioDebugScene(
  ctx: DebugRenderContext,
  scene: StudioDebugScene,
  options: DebugRenderOptions = {},
): Matrix2D {
  const {
    width = 600,
    height = 400,
    padding = 16,
    background = '#ffffff',
    lineWidth = 1,
  } = options;

  const transform = fitBoundsToViewport(scene.bounds, { width, height }, padding);
  const toScreen = (point: PointLike) => matrixApplyToPoint(transform, point);

  ctx.save();
  ctx.fillStyle = background;
  ctx.fillRect(0, 0, width, height);
  ctx.lineWidth = lineWidth;

  scene.shapes.forEach((shape) => {
    ctx.save();
    ctx.globalAlpha = shape.opacity ?? 1;
    ctx.strokeStyle = shape.stroke;
    ctx.setLineDash(shape.kind === 'polygon' ? shape.dash ?? [] : []);
    ctx.beginPath();
    if (shape.kind === 'polygon') {
      tracePolyline(ctx, shape.points.map(toScreen));
      ctx.closePath();
    } else {
      const center = toScreen(shape.center);
      ctx.arc(center.x, center.y, shape.radius * transform.a, 0, Math.PI * 2);
    }
    if (shape.fill !== undefined) {
      ctx.fillStyle = shape.fill;
      ctx.fill();
    }
    ctx.stroke();
    ctx.restore();
  });

  scene.pathLines.forEach((line) => {
    ctx.save();
    ctx.globalAlpha = line.opacity ?? 1;
    ctx.strokeStyle = line.stroke;
    ctx.setLineDash(line.dash ?? []);
    ctx.beginPath();
    tracePolyline(ctx, [toScreen(line.from), toScreen(line.to)]);
    ctx.stroke();
    ctx.restore();
  });

  ctx.restore();
  return transform;
}

function tracePolyline(ctx: DebugRenderContext, points: PointLike[]): void {
  points.forEach((point, index) => {
    if (index === 0) {
      ctx.moveTo(point.x, point.y);
    } else {
      ctx.lineTo(point.x, point.y);
    }
  });
}
