// Alignment calibration between tool changes: the first pen draws a reference
// mark, the second pen is jogged onto it, and the difference becomes the
// device's alignment offset.

import { InvalidAlignmentOffsetError } from '@plotstudio/core-domain';
import { vec2, vecAdd, vecSub } from '@plotstudio/core-geometry';
import type { Vec2 } from '@plotstudio/core-geometry';
import type { PlotterDevice } from '../core-engine/core-engine';

export type ReferenceMarkMode = 'dot' | 'circle';

export interface ReferenceMarkOptions {
  mode?: ReferenceMarkMode;
  radius?: number;
}

export const DEFAULT_REFERENCE_RADIUS = 0.05;

const CIRCLE_STEP_DEGREES = 10;

export function computeAlignmentOffset(reference: Vec2, current: Vec2): Vec2 {
  return vecSub(current, reference);
}

/** One CSV row, `x,y`, six decimals. */
export function formatAlignmentOffset(offset: Vec2): string {
  return `${offset.x.toFixed(6)},${offset.y.toFixed(6)}`;
}

export function parseAlignmentOffset(text: string): Vec2 {
  const fields = text.trim().split(',').map((field) => field.trim());
  if (fields.length !== 2 || fields.some((field) => field === '')) {
    throw new InvalidAlignmentOffsetError(text);
  }
  const [x, y] = fields.map(Number);
  if (!Number.isFinite(x) || !Number.isFinite(y)) {
    throw new InvalidAlignmentOffsetError(text);
  }
  return vec2(x, y);
}

/**
 * Marks `pos` so a later pen can be aligned against it. A dot is a single
 * pen touch at `pos`; a circle is traced in 10° steps around `pos`.
 */
export function drawReferenceMark(
  device: PlotterDevice,
  pos: Vec2,
  options: ReferenceMarkOptions = {},
): void {
  const { mode = 'dot', radius = DEFAULT_REFERENCE_RADIUS } = options;

  if (mode === 'dot') {
    device.penUp();
    device.moveTo(pos);
    device.penDown();
    device.penUp();
    return;
  }

  device.penUp();
  device.moveTo(vecAdd(pos, vec2(radius, 0)));
  device.penDown();
  for (let degrees = CIRCLE_STEP_DEGREES; degrees <= 360; degrees += CIRCLE_STEP_DEGREES) {
    const angle = (degrees * Math.PI) / 180;
    device.moveTo(vecAdd(pos, vec2(radius * Math.cos(angle), radius * Math.sin(angle))));
  }
  device.penUp();
}
