import { createPathSegment } from '@plotstudio/core-domain';
import type { PathSegment, PenState } from '@plotstudio/core-domain';
import { ORIGIN } from '@plotstudio/core-geometry';
import type { Vec2 } from '@plotstudio/core-geometry';
import { Observable, Subject } from 'rxjs';

/**
 * What every plotter (real hardware or in-memory) offers to drawable objects.
 *
 * Positions handed to `moveTo`/`lineTo` are global device coordinates. The
 * device adds its alignment offset before recording or forwarding a move, so
 * `getPos()` after a move reports the offset-corrected position.
 *
 * A device belongs to one session at a time and is not safe for concurrent use.
 */
export interface PlotterDevice {
  readonly segments$: Observable<PathSegment>;
  penUp(): void;
  penDown(): void;
  setPenState(state: PenState): void;
  moveTo(pos: Vec2): void;
  lineTo(pos: Vec2): void;
  getPos(): Vec2;
  getPenState(): PenState;
  getPath(): readonly PathSegment[];
  setAlignmentOffsets(offset: Vec2): void;
  resetAlignmentOffsets(): void;
  getAlignmentOffset(): Vec2;
}

/**
 * Pen state plus the append-only log of every move since construction.
 * `moveTo` is the only operation that grows the log.
 */
export class PenPath {
  private readonly segments: PathSegment[] = [];
  private readonly segmentSubject = new Subject<PathSegment>();
  private pos: Vec2;
  private penState: PenState = 'up';

  readonly segments$: Observable<PathSegment> = this.segmentSubject.asObservable();

  constructor(initialPosition: Vec2 = ORIGIN) {
    this.pos = initialPosition;
  }

  penUp(): void {
    this.penState = 'up';
  }

  penDown(): void {
    this.penState = 'down';
  }

  setPenState(state: PenState): void {
    this.penState = state;
  }

  moveTo(pos: Vec2): PathSegment {
    const segment = createPathSegment(this.pos, pos, this.penState);
    this.segments.push(segment);
    this.pos = pos;
    this.segmentSubject.next(segment);
    return segment;
  }

  lineTo(pos: Vec2): PathSegment {
    this.penDown();
    return this.moveTo(pos);
  }

  getPos(): Vec2 {
    return this.pos;
  }

  getPenState(): PenState {
    return this.penState;
  }

  getPath(): readonly PathSegment[] {
    return [...this.segments];
  }

  /** Completes `segments$`; the log itself stays readable. */
  complete(): void {
    this.segmentSubject.complete();
  }
}
