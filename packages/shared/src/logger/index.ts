export { ConsoleLogger, SilentLogger } from './consoleLogger';
export type { Logger, MaybePromise } from './types';
