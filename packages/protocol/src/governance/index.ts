export * from './checkpoints.js';
export * from './clock.js';
export * from './codec.js';
export * from './config.js';
export * from './delegation.js';
export * from './engine.js';
export * from './errors.js';
export * from './events.js';
export * from './execution.js';
export * from './ledger.js';
export * from './power.js';
export * from './proposals.js';
export * from './replay.js';
export * from './state.js';
export * from './targets.js';
export * from './types.js';
export * from './weighting.js';
