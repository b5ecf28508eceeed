export * from './credentials.js';
export * from './lock.js';
