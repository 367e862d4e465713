export * from './db/index.js';
export * from './redis/index.js';
export * from './geo/index.js';
export * from './config/index.js';
export * from './queue/index.js';
export { createDefaultRegistry } from './registry.js';
