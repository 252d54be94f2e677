export const name = '@embedcache/shared';

export * from './types/events';
export * from './logger';
export * from './redaction';
export * from './errors';
export * from './config/schema';
