export { Logger, silentLogger } from './logger.js';
export type { LoggerOptions } from './logger.js';
