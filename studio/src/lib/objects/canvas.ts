import type { BoundingBox, DebugShape } from '@plotstudio/core-domain';
import type { PlotterDevice } from '@plotstudio/core-engine';
import { boundsOfPoints, CanvasFrame, vec2 } from '@plotstudio/core-geometry';
import type { Vec2 } from '@plotstudio/core-geometry';
import { expectPointArgs } from './drawable-object';
import type { DrawableObject, VerbTable } from './drawable-object';

const OUTLINE_STROKE = '#0000ff';
const BBOX_STROKE = '#ff0000';
const BBOX_DASH = [6, 4];

/**
 * A sheet of paper somewhere on the plotter bed, possibly rotated.
 *
 * Size and two opposite corners are both needed because the canvas can sit at
 * any angle: the corners fix its position and direction, the size fixes the
 * rectangle. Drawing verbs take points in canvas-local coordinates.
 */
export class Canvas implements DrawableObject {
  readonly kind = 'canvas';
  readonly frame: CanvasFrame;

  constructor(size: Vec2, start: Vec2, end: Vec2) {
    this.frame = new CanvasFrame(size, start, end);
  }

  drawLine(device: PlotterDevice, localStart: Vec2, localEnd: Vec2): void {
    const globalStart = this.frame.localToGlobal(localStart);
    const globalEnd = this.frame.localToGlobal(localEnd);

    device.moveTo(globalStart);
    device.lineTo(globalEnd);
  }

  verbs(): VerbTable {
    return {
      draw_line: (device) => (...args) => {
        const [localStart, localEnd] = expectPointArgs('draw_line', args, 2);
        this.drawLine(device, localStart, localEnd);
      },
    };
  }

  contains(point: Vec2): boolean {
    return this.frame.containsGlobal(point);
  }

  boundingBox(): BoundingBox {
    return this.frame.boundingBox();
  }

  debugShapes(): DebugShape[] {
    const corners = this.frame.corners();
    const { min, max } = boundsOfPoints(corners);
    return [
      { kind: 'polygon', points: corners, stroke: OUTLINE_STROKE },
      {
        kind: 'polygon',
        points: [vec2(max.x, min.y), vec2(min.x, min.y), vec2(min.x, max.y), vec2(max.x, max.y)],
        stroke: BBOX_STROKE,
        dash: [...BBOX_DASH],
      },
    ];
  }
}
