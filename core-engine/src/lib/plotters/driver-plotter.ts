import { DeviceIoError } from '@plotstudio/core-domain';
import type { PathSegment, PenState } from '@plotstudio/core-domain';
import { ORIGIN, vec2, vecAdd } from '@plotstudio/core-geometry';
import type { Vec2 } from '@plotstudio/core-geometry';
import type { Observable } from 'rxjs';
import { PenPath } from '../core-engine/core-engine';
import type { PlotterDevice } from '../core-engine/core-engine';

/**
 * The vendor library's interactive-mode surface. Calls block until the
 * hardware has acted on them; failures are thrown.
 */
export interface PlotterDriver {
  configure?(options: Readonly<Record<string, unknown>>): void;
  connect(): boolean;
  disconnect(): void;
  penUp(): void;
  penDown(): void;
  goto(x: number, y: number): void;
  currentPos(): readonly [number, number];
  currentPen(): PenState;
}

export interface DriverPlotterOptions {
  /** Passed to `PlotterDriver.configure` before connecting. */
  driverOptions?: Readonly<Record<string, unknown>>;
  initialPosition?: Vec2;
  alignmentOffset?: Vec2;
}

function callDriver<T>(operation: string, call: () => T): T {
  try {
    return call();
  } catch (error) {
    if (error instanceof DeviceIoError) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new DeviceIoError(operation, message, { cause: error });
  }
}

/**
 * Plotter backed by real hardware. Every move is sent to the driver first and
 * only recorded once the driver accepted it. Driver failures surface as
 * `DeviceIoError` and are never retried, since a repeated move would add a
 * second segment.
 */
export class DriverPlotter implements PlotterDevice {
  private readonly path: PenPath;
  private alignmentOffset: Vec2;
  private connected = true;

  static connect(driver: PlotterDriver, options: DriverPlotterOptions = {}): DriverPlotter {
    const { driverOptions } = options;
    if (driverOptions) {
      callDriver('configure', () => driver.configure?.(driverOptions));
    }
    if (!callDriver('connect', () => driver.connect())) {
      throw new DeviceIoError('connect', 'could not connect to the plotter');
    }
    return new DriverPlotter(driver, options);
  }

  private constructor(private readonly driver: PlotterDriver, options: DriverPlotterOptions) {
    this.path = new PenPath(options.initialPosition ?? ORIGIN);
    this.alignmentOffset = options.alignmentOffset ?? ORIGIN;
  }

  get segments$(): Observable<PathSegment> {
    return this.path.segments$;
  }

  isConnected(): boolean {
    return this.connected;
  }

  penUp(): void {
    this.withDriver('penUp', (driver) => driver.penUp());
    this.path.penUp();
  }

  penDown(): void {
    this.withDriver('penDown', (driver) => driver.penDown());
    this.path.penDown();
  }

  setPenState(state: PenState): void {
    if (state === 'up') {
      this.penUp();
    } else {
      this.penDown();
    }
  }

  moveTo(pos: Vec2): void {
    const adjusted = vecAdd(pos, this.alignmentOffset);
    this.withDriver('goto', (driver) => driver.goto(adjusted.x, adjusted.y));
    this.path.moveTo(adjusted);
  }

  lineTo(pos: Vec2): void {
    this.penDown();
    this.moveTo(pos);
  }

  /** Position as reported by the hardware. */
  getPos(): Vec2 {
    const [x, y] = this.withDriver('currentPos', (driver) => driver.currentPos());
    return vec2(x, y);
  }

  /** Pen state as reported by the hardware. */
  getPenState(): PenState {
    return this.withDriver('currentPen', (driver) => driver.currentPen());
  }

  getPath(): readonly PathSegment[] {
    return this.path.getPath();
  }

  setAlignmentOffsets(offset: Vec2): void {
    this.alignmentOffset = offset;
  }

  resetAlignmentOffsets(): void {
    this.setAlignmentOffsets(ORIGIN);
  }

  getAlignmentOffset(): Vec2 {
    return this.alignmentOffset;
  }

  close(): void {
    if (!this.connected) {
      return;
    }
    this.connected = false;
    this.path.complete();
    callDriver('disconnect', () => this.driver.disconnect());
  }

  private withDriver<T>(operation: string, call: (driver: PlotterDriver) => T): T {
    if (!this.connected) {
      throw new DeviceIoError(operation, 'the plotter connection is closed');
    }
    return callDriver(operation, () => call(this.driver));
  }
}
