import { ConsoleLogger } from './consoleLogger';
export type { Logger, MaybePromise } from './types';
export type { ConsoleLoggerOptions } from './consoleLogger';

export const logger = new ConsoleLogger();
export { ConsoleLogger };
