export * from './lib/core-engine/core-engine';
export * from './lib/plotters/mock-plotter';
export * from './lib/plotters/driver-plotter';
export * from './lib/alignment/alignment';
