export { envSchema, getEnv, parseEnv, resetEnv, type CloudcallEnv } from './config.js';
