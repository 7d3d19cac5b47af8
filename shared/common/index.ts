export { Logger } from './logger.js';
export * from './layout-constants.js';
