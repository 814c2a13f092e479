export * from './hash.js';
export * from './jcs.js';
