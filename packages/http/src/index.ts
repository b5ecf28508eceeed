export * from './client.js';
export * from './from-env.js';
export * from './types.js';
export * from './instrumentation.js';
export * from './sse/frame-parser.js';

// Export pure functional core functions
export * from './core/http-utils.js';
export * from './core/types.js';
