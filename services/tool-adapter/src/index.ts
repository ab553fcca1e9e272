export * from './types';
export * from './errors';
export * from './config';
export * from './schema/resolver';
export * from './validation';
export * from './adapters';
