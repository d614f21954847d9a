export type { ILogger } from './ILogger';
export { consoleLogger } from './ILogger';
