export * from './bytes.js';
export * from './keyed-mutex.js';
