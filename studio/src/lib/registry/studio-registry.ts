import {
  DEFAULT_STUDIO_BOUNDS,
  DuplicateObjectError,
  UnknownObjectOrVerbError,
} from '@plotstudio/core-domain';
import type { BoundingBox, ObjectName, VerbName } from '@plotstudio/core-domain';
import type { PlotterDevice } from '@plotstudio/core-engine';
import type { Vec2 } from '@plotstudio/core-geometry';
import type { DrawableObject, VerbRoutine } from '../objects/drawable-object';

export interface StudioOptions {
  /** Drawable area of the plotter bed, used for debug rendering. */
  bounds?: BoundingBox;
}

const AUTO_NAME_PREFIX = 'ptobj';
const TOKEN_SEPARATOR = '_';

/**
 * Named drawable objects plus the device their verbs run against.
 *
 * Verbs can be resolved explicitly (`resolve('canvas', 'draw_line')`) or from
 * a combined token (`dispatch('canvas_draw_line')`). Token dispatch picks the
 * longest registered name followed by `_`, so object names may themselves
 * contain underscores. Objects are never removed.
 */
export class Studio {
  private readonly objects = new Map<ObjectName, DrawableObject>();
  readonly bounds: BoundingBox;

  constructor(readonly device: PlotterDevice, options: StudioOptions = {}) {
    this.bounds = options.bounds ?? DEFAULT_STUDIO_BOUNDS;
  }

  addObject(object: DrawableObject, name?: ObjectName): ObjectName {
    const objectName = name ?? this.nextAutoName();
    if (this.objects.has(objectName)) {
      throw new DuplicateObjectError(objectName);
    }
    this.warnOnShadowedTokens(objectName);
    this.objects.set(objectName, object);
    return objectName;
  }

  getObjects(): ReadonlyMap<ObjectName, DrawableObject> {
    return new Map(this.objects);
  }

  getObject(name: ObjectName): DrawableObject {
    const object = this.objects.get(name);
    if (!object) {
      throw new UnknownObjectOrVerbError(name, name);
    }
    return object;
  }

  resolve(objectName: ObjectName, verbName: VerbName): VerbRoutine {
    const request = `${objectName}.${verbName}`;
    const object = this.objects.get(objectName);
    if (!object) {
      throw new UnknownObjectOrVerbError(request, objectName);
    }
    return this.bindVerb(request, objectName, object, verbName);
  }

  dispatch(token: string): VerbRoutine {
    const match = this.matchObject(token);
    if (!match) {
      throw new UnknownObjectOrVerbError(token);
    }
    const [objectName, object] = match;
    const verbName = token.slice(objectName.length + TOKEN_SEPARATOR.length);
    return this.bindVerb(token, objectName, object, verbName);
  }

  run(token: string, ...args: readonly unknown[]): void {
    this.dispatch(token)(...args);
  }

  /** Names of the objects whose `contains` accepts `point`, in registration order. */
  findObjectsAt(point: Vec2): ObjectName[] {
    return Array.from(this.objects)
      .filter(([, object]) => object.contains(point))
      .map(([name]) => name);
  }

  private bindVerb(
    request: string,
    objectName: ObjectName,
    object: DrawableObject,
    verbName: VerbName,
  ): VerbRoutine {
    const verbs = object.verbs();
    if (!Object.hasOwn(verbs, verbName)) {
      throw new UnknownObjectOrVerbError(request, objectName, verbName);
    }
    return verbs[verbName](this.device);
  }

  private matchObject(token: string): [ObjectName, DrawableObject] | undefined {
    let match: [ObjectName, DrawableObject] | undefined;
    for (const [name, object] of this.objects) {
      const prefix = name + TOKEN_SEPARATOR;
      if (!token.startsWith(prefix) || token.length === prefix.length) {
        continue;
      }
      if (match === undefined || name.length > match[0].length) {
        match = [name, object];
      }
    }
    return match;
  }

  private nextAutoName(): ObjectName {
    let index = this.objects.size;
    while (this.objects.has(`${AUTO_NAME_PREFIX}${index}`)) {
      index += 1;
    }
    return `${AUTO_NAME_PREFIX}${index}`;
  }

  private warnOnShadowedTokens(objectName: ObjectName): void {
    for (const existing of this.objects.keys()) {
      const [shorter, longer] =
        existing.length < objectName.length ? [existing, objectName] : [objectName, existing];
      if (longer.startsWith(shorter + TOKEN_SEPARATOR)) {
        console.warn(
          `Studio: tokens starting with '${longer}${TOKEN_SEPARATOR}' dispatch to '${longer}', not to verbs of '${shorter}'.`,
        );
      }
    }
  }
}
