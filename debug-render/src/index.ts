export * from './lib/studio-debug-render/studio-debug-render';
