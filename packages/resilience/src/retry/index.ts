export * from './backoff.js';
export * from './policy.js';
export * from './retry-engine.js';
export * from './types.js';
