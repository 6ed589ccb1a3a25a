import { InvalidVerbArgumentsError } from '@plotstudio/core-domain';
import type { BoundingBox, DebugShape, VerbName } from '@plotstudio/core-domain';
import type { PlotterDevice } from '@plotstudio/core-engine';
import { isVec2 } from '@plotstudio/core-geometry';
import type { Vec2 } from '@plotstudio/core-geometry';

export type DrawableObjectKind = 'canvas' | 'brush-cleaner';

/** A verb bound to a device, ready to run. Arguments come from dynamic dispatch and are checked at run time. */
export type VerbRoutine = (...args: readonly unknown[]) => void;

export type VerbFactory = (device: PlotterDevice) => VerbRoutine;

export type VerbTable = Readonly<Record<VerbName, VerbFactory>>;

/**
 * Something placed in the studio that the plotter can act on. Objects never
 * hold on to a device; each verb factory receives it when the routine is bound.
 */
export interface DrawableObject {
  readonly kind: DrawableObjectKind;
  verbs(): VerbTable;
  /** Whether `point` (global coordinates) targets this object. */
  contains(point: Vec2): boolean;
  boundingBox(): BoundingBox;
  debugShapes(): DebugShape[];
}

export function expectPointArgs(verb: VerbName, args: readonly unknown[], count: number): Vec2[] {
  if (args.length !== count) {
    throw new InvalidVerbArgumentsError(
      verb,
      `expected ${count} point argument(s), received ${args.length}`,
    );
  }
  return args.map((arg, index) => {
    if (!isVec2(arg)) {
      throw new InvalidVerbArgumentsError(verb, `argument ${index + 1} is not a point`);
    }
    return arg;
  });
}
