export * from './config.js';
export * from './event-store.js';
export * from './kv.js';
export * from './level.js';
export * from './memory.js';
export * from './paths.js';
export * from './state-store.js';
