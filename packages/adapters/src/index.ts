export const name = '@embedcache/adapters';

export * from './embed';
