import { ConsoleLogger, SilentLogger } from './consoleLogger';
import { JsonlLogger } from './jsonlLogger';
import { MemoryLogger } from './memoryLogger';
export type { Logger, LogLevel, MaybePromise } from './types';
export type { ConsoleLoggerOptions } from './consoleLogger';
export type { LoggedMessage } from './memoryLogger';

export const logger = new ConsoleLogger();
export { ConsoleLogger, JsonlLogger, MemoryLogger, SilentLogger };
