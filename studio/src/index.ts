export * from './lib/objects/drawable-object';
export * from './lib/objects/canvas';
export * from './lib/objects/brush-cleaner';
export * from './lib/registry/studio-registry';
