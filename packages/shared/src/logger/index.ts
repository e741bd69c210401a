export type { Logger, LogLevel } from './types';
export type { ConsoleLoggerOptions } from './consoleLogger';
export { LOG_LEVEL_ORDER } from './types';
export { ConsoleLogger } from './consoleLogger';
