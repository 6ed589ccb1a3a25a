export * from './lib/core-geometry/core-geometry';
export * from './lib/vec2/vec2';
export * from './lib/canvas-frame/canvas-frame';
export * from './lib/errors/geometry-errors';
