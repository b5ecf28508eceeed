export * from './errors/index.js';
export * from './errors/response.js';
export * from './sanitize.js';
