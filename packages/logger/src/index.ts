export { createLogger, formatArgs, isDebugEnabled, logger, setDebugNamespace } from './logger.js';
export type { Logger } from './logger.js';
