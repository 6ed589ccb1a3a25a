import { InvalidVerbArgumentsError } from '@plotstudio/core-domain';
import { MockPlotter } from '@plotstudio/core-engine';
import { vec2, vecEquals } from '@plotstudio/core-geometry';
import { BrushCleaner } from './brush-cleaner';

describe('BrushCleaner', () => {
  it('dips and swirls the brush around the centre', () => {
    const cleaner = new BrushCleaner(vec2(2, 1), 1);
    const plotter = new MockPlotter();

    cleaner.clean(plotter);

    const path = plotter.getPath();
    expect(path).toHaveLength(11);
    expect(path[0]).toEqual({ from: { x: 0, y: 0 }, to: { x: 2, y: 1 }, penState: 'up' });
    expect(path.slice(1).every((segment) => segment.penState === 'down')).toBe(true);
    expect(vecEquals(path[1].to, vec2(2.3, 1))).toBe(true);
    expect(vecEquals(path[2].to, vec2(2 + 0.3 * Math.cos(0.4 * Math.PI), 1 + 0.3 * Math.sin(0.4 * Math.PI)))).toBe(
      true,
    );
    expect(plotter.getPenState()).toBe('up');
  });

  it('visits five angles twice each', () => {
    const cleaner = new BrushCleaner(vec2(0, 0), 2);
    const plotter = new MockPlotter();

    cleaner.clean(plotter);

    const strokes = plotter.getPath().slice(1).map((segment) => segment.to);
    for (let i = 0; i < 5; i += 1) {
      expect(vecEquals(strokes[i], strokes[i + 5])).toBe(true);
      expect(Math.hypot(strokes[i].x, strokes[i].y)).toBeCloseTo(0.6, 12);
    }
    expect(vecEquals(strokes[0], strokes[1])).toBe(false);
  });

  it('leaves the head over the cleaner instead of returning', () => {
    const cleaner = new BrushCleaner(vec2(1, 1), 1);
    const plotter = new MockPlotter();
    plotter.moveTo(vec2(5, 5));
    plotter.penDown();

    cleaner.verbs()['clean'](plotter)();

    const pos = plotter.getPos();
    expect(Math.hypot(pos.x - 1, pos.y - 1)).toBeCloseTo(0.3, 12);
    expect(plotter.getPath()[1]).toEqual({ from: { x: 5, y: 5 }, to: { x: 1, y: 1 }, penState: 'up' });
    expect(plotter.getPenState()).toBe('up');
  });

  it('refuses arguments to clean', () => {
    const cleaner = new BrushCleaner(vec2(1, 1), 1);
    const routine = cleaner.verbs()['clean'](new MockPlotter());

    expect(() => routine(vec2(0, 0))).toThrow(InvalidVerbArgumentsError);
  });

  it('is never a drawing target', () => {
    const cleaner = new BrushCleaner(vec2(1, 1), 0.5);

    expect(cleaner.contains(vec2(1, 1))).toBe(false);
    expect(cleaner.boundingBox()).toEqual({ min: { x: 0.5, y: 0.5 }, max: { x: 1.5, y: 1.5 } });
  });

  it('renders as a filled circle', () => {
    const cleaner = new BrushCleaner(vec2(1, 1), 0.5);

    expect(cleaner.debugShapes()).toEqual([
      { kind: 'circle', center: { x: 1, y: 1 }, radius: 0.5, stroke: '#ff0000', fill: '#1f77b4' },
    ]);
  });
});
