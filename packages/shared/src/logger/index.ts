export { ConsoleLogger, SilentLogger, type ConsoleLoggerOptions, type LogLevel } from './consoleLogger';
export type { Logger } from './types';
