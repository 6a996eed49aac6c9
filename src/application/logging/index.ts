export { consoleLogger, noopLogger } from './ILogger';
export type { ILogger } from './ILogger';
