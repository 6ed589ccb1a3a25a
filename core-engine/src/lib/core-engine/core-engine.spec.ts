import type { PathSegment } from '@plotstudio/core-domain';
import { vec2 } from '@plotstudio/core-geometry';
import { PenPath } from './core-engine';

describe('PenPath', () => {
  it('starts with the pen up at the initial position and an empty log', () => {
    const path = new PenPath(vec2(1, 2));

    expect(path.getPenState()).toBe('up');
    expect(path.getPos()).toEqual({ x: 1, y: 2 });
    expect(path.getPath()).toEqual([]);
  });

  it('records each move with the pen state held during it', () => {
    const path = new PenPath();

    path.moveTo(vec2(1, 0));
    path.lineTo(vec2(1, 1));
    path.penUp();
    path.moveTo(vec2(0, 1));

    expect(path.getPath()).toEqual([
      { from: { x: 0, y: 0 }, to: { x: 1, y: 0 }, penState: 'up' },
      { from: { x: 1, y: 0 }, to: { x: 1, y: 1 }, penState: 'down' },
      { from: { x: 1, y: 1 }, to: { x: 0, y: 1 }, penState: 'up' },
    ]);
  });

  it('keeps consecutive segments connected', () => {
    const path = new PenPath(vec2(0.5, 0.5));
    const targets = [vec2(2, 3), vec2(-1, 4), vec2(-1, 4), vec2(7.25, 0), vec2(0, 0)];

    targets.forEach((target, index) => {
      if (index % 2 === 0) {
        path.lineTo(target);
      } else {
        path.moveTo(target);
      }
    });

    const segments = path.getPath();
    expect(segments).toHaveLength(targets.length);
    expect(segments[0].from).toEqual({ x: 0.5, y: 0.5 });
    for (let i = 1; i < segments.length; i += 1) {
      expect(segments[i].from).toBe(segments[i - 1].to);
    }
  });

  it('does not change the pen state on moveTo', () => {
    const path = new PenPath();

    path.penDown();
    path.moveTo(vec2(3, 3));
    expect(path.getPenState()).toBe('down');

    path.setPenState('up');
    path.moveTo(vec2(4, 4));
    expect(path.getPenState()).toBe('up');
    expect(path.getPath().map((segment) => segment.penState)).toEqual(['down', 'up']);
  });

  it('hands out copies of the log', () => {
    const path = new PenPath();
    path.moveTo(vec2(1, 1));

    const snapshot = path.getPath();
    path.moveTo(vec2(2, 2));

    expect(snapshot).toHaveLength(1);
    expect(path.getPath()).toHaveLength(2);
    expect(Object.isFrozen(snapshot[0])).toBe(true);
  });

  it('publishes appended segments until completed', () => {
    const path = new PenPath();
    const received: PathSegment[] = [];
    let completed = false;
    path.segments$.subscribe({
      next: (segment) => received.push(segment),
      complete: () => {
        completed = true;
      },
    });

    path.lineTo(vec2(1, 0));
    path.complete();
    path.moveTo(vec2(2, 0));

    expect(received).toEqual([{ from: { x: 0, y: 0 }, to: { x: 1, y: 0 }, penState: 'down' }]);
    expect(completed).toBe(true);
    expect(path.getPath()).toHaveLength(2);
  });
});
