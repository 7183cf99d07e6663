export * from './errors.js';
export { logger } from './logger.js';
