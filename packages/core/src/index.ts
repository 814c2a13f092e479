export * from './crypto/index.js';
export * from './protocol/index.js';
export * from './storage/index.js';
export * from './utils/index.js';
