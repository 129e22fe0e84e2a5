export * from './types/events';
export * from './types/indexing';
export * from './logger';
export * from './redaction';
export * from './errors';
export * from './lru-cache';
export * from './config/schema';
