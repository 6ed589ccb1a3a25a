import type { PathSegment, PenState } from '@plotstudio/core-domain';
import { ORIGIN, vecAdd } from '@plotstudio/core-geometry';
import type { Vec2 } from '@plotstudio/core-geometry';
import type { Observable } from 'rxjs';
import { PenPath } from '../core-engine/core-engine';
import type { PlotterDevice } from '../core-engine/core-engine';

export interface MockPlotterOptions {
  initialPosition?: Vec2;
  alignmentOffset?: Vec2;
}

/** In-memory plotter used for previews and tests. Nothing leaves the process. */
export class MockPlotter implements PlotterDevice {
  private readonly path: PenPath;
  private alignmentOffset: Vec2;

  constructor(options: MockPlotterOptions = {}) {
    this.path = new PenPath(options.initialPosition ?? ORIGIN);
    this.alignmentOffset = options.alignmentOffset ?? ORIGIN;
  }

  get segments$(): Observable<PathSegment> {
    return this.path.segments$;
  }

  penUp(): void {
    this.path.penUp();
  }

  penDown(): void {
    this.path.penDown();
  }

  setPenState(state: PenState): void {
    this.path.setPenState(state);
  }

  moveTo(pos: Vec2): void {
    this.path.moveTo(vecAdd(pos, this.alignmentOffset));
  }

  lineTo(pos: Vec2): void {
    this.penDown();
    this.moveTo(pos);
  }

  getPos(): Vec2 {
    return this.path.getPos();
  }

  getPenState(): PenState {
    return this.path.getPenState();
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
}
