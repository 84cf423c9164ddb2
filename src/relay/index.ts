export * from './types';
export * from './in-memory-relay';
