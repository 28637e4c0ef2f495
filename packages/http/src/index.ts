export * from './client.js';
export * from './types.js';
export * from './core/http-utils.js';
export type * from './core/types.js';
