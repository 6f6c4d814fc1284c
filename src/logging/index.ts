export { ConsoleLogger, getLogger, silentLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
