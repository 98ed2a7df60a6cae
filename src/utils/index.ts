export * from './logger.ts';
export * from './type-guards.ts';
