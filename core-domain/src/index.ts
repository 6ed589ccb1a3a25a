export * from './lib/core-domain/core-domain';
export * from './lib/errors/domain-errors';
