export * from './cache.types';
export * from './ttl.cache';
export * from './cached-function';
