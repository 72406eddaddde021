import { ConsoleLogger } from './consoleLogger';
import { JsonlLogger } from './jsonlLogger';
export type { Logger, LogLevel, MaybePromise } from './types';

export const logger = new ConsoleLogger();
export { ConsoleLogger, JsonlLogger };
