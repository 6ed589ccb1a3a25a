import { vec2, vecEquals } from '@plotstudio/core-geometry';
import { MockPlotter } from './mock-plotter';

describe('MockPlotter', () => {
  it('starts without an alignment offset', () => {
    const plotter = new MockPlotter();
    expect(plotter.getAlignmentOffset()).toEqual({ x: 0, y: 0 });
  });

  it('applies alignment offsets to recorded moves and the reported position', () => {
    const plotter = new MockPlotter();
    const offset = vec2(0.05, 0.02);

    plotter.setAlignmentOffsets(offset);
    expect(plotter.getAlignmentOffset()).toBe(offset);

    plotter.moveTo(vec2(1, 1));

    const [segment] = plotter.getPath();
    expect(vecEquals(segment.to, vec2(1.05, 1.02))).toBe(true);
    expect(vecEquals(plotter.getPos(), vec2(1.05, 1.02))).toBe(true);

    plotter.resetAlignmentOffsets();
    expect(plotter.getAlignmentOffset()).toEqual({ x: 0, y: 0 });

    plotter.moveTo(vec2(2, 2));
    expect(plotter.getPath()[1].to).toEqual({ x: 2, y: 2 });
    expect(plotter.getPos()).toEqual({ x: 2, y: 2 });
  });

  it('starts the next segment where the offset-corrected one ended', () => {
    const plotter = new MockPlotter({ alignmentOffset: vec2(1, 0) });

    plotter.moveTo(vec2(0, 0));
    plotter.lineTo(vec2(0, 1));

    const path = plotter.getPath();
    expect(path[1]).toEqual({ from: { x: 1, y: 0 }, to: { x: 1, y: 1 }, penState: 'down' });
  });

  it('honours a configured initial position', () => {
    const plotter = new MockPlotter({ initialPosition: vec2(3, 2) });

    plotter.moveTo(vec2(4, 2));

    expect(plotter.getPath()[0].from).toEqual({ x: 3, y: 2 });
  });

  it('leaves the pen state to pen commands', () => {
    const plotter = new MockPlotter();

    plotter.lineTo(vec2(1, 0));
    expect(plotter.getPenState()).toBe('down');
    plotter.penUp();
    plotter.penUp();
    expect(plotter.getPenState()).toBe('up');
    plotter.setPenState('down');
    expect(plotter.getPenState()).toBe('down');
    expect(plotter.getPath()).toHaveLength(1);
  });
});
