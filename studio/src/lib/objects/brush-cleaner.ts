import type { BoundingBox, DebugShape } from '@plotstudio/core-domain';
import type { PlotterDevice } from '@plotstudio/core-engine';
import { vec2, vecAdd, vecScale } from '@plotstudio/core-geometry';
import type { Vec2 } from '@plotstudio/core-geometry';
import { expectPointArgs } from './drawable-object';
import type { DrawableObject, VerbTable } from './drawable-object';

export const CLEAN_STROKES = 10;
export const CLEAN_RADIUS_FACTOR = 0.3;

const CLEANER_FILL = '#1f77b4';
const CLEANER_STROKE = '#ff0000';

/** A water container (with a paper towel beside it) for rinsing the brush. */
export class BrushCleaner implements DrawableObject {
  readonly kind = 'brush-cleaner';

  constructor(readonly pos: Vec2, readonly radius: number) {}

  /**
   * Dips the brush and swirls it around the centre. The angle advances by a
   * fifth of a turn per stroke, so the ten strokes visit five points twice.
   * The head is left above the cleaner with the pen up.
   */
  clean(device: PlotterDevice): void {
    device.penUp();
    device.moveTo(this.pos);
    device.penDown();

    for (let i = 0; i < CLEAN_STROKES; i += 1) {
      const angle = (i / 5) * 2 * Math.PI;
      device.moveTo(
        vecAdd(this.pos, vecScale(vec2(Math.cos(angle), Math.sin(angle)), this.radius * CLEAN_RADIUS_FACTOR)),
      );
    }

    device.penUp();
  }

  verbs(): VerbTable {
    return {
      clean: (device) => (...args) => {
        expectPointArgs('clean', args, 0);
        this.clean(device);
      },
    };
  }

  /** The cleaner is never a drawing target. */
  contains(_point: Vec2): boolean {
    return false;
  }

  boundingBox(): BoundingBox {
    return {
      min: { x: this.pos.x - this.radius, y: this.pos.y - this.radius },
      max: { x: this.pos.x + this.radius, y: this.pos.y + this.radius },
    };
  }

  debugShapes(): DebugShape[] {
    return [
      {
        kind: 'circle',
        center: this.pos,
        radius: this.radius,
        stroke: CLEANER_STROKE,
        fill: CLEANER_FILL,
      },
    ];
  }
}
