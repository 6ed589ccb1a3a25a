import type { ObjectName, VerbName } from '../core-domain/core-domain';

export class UnknownObjectOrVerbError extends Error {
  override readonly name = 'UnknownObjectOrVerbError';

  constructor(
    readonly request: string,
    readonly objectName?: ObjectName,
    readonly verbName?: VerbName,
  ) {
    super(
      objectName === undefined
        ? `No registered object or verb matches '${request}'.`
        : verbName === undefined
          ? `Unknown object '${objectName}'.`
          : `Object '${objectName}' has no verb '${verbName}'.`,
    );
  }
}

export class DuplicateObjectError extends Error {
  override readonly name = 'DuplicateObjectError';

  constructor(readonly objectName: ObjectName) {
    super(`An object named '${objectName}' is already registered.`);
  }
}

export class InvalidVerbArgumentsError extends Error {
  override readonly name = 'InvalidVerbArgumentsError';

  constructor(readonly verbName: VerbName, detail: string) {
    super(`Invalid arguments for verb '${verbName}': ${detail}`);
  }
}

export class InvalidAlignmentOffsetError extends Error {
  override readonly name = 'InvalidAlignmentOffsetError';

  constructor(readonly input: string) {
    super(`Cannot read an alignment offset from '${input}'; expected 'x,y'.`);
  }
}

/** A plotter driver call failed. Raised by device adapters; never retried. */
export class DeviceIoError extends Error {
  override readonly name = 'DeviceIoError';

  constructor(readonly operation: string, message: string, options?: ErrorOptions) {
    super(`Plotter ${operation} failed: ${message}`, options);
  }
}
