export { LOG_LEVELS } from './ILogProvider.js';
export type { ILogProvider, LogEvent, LogLevel, RequestLogEvent } from './ILogProvider.js';
export { ConsoleLogProvider } from './ConsoleLogProvider.js';
export type { ISolutionProducer, ProductionConstraints } from './ISolutionProducer.js';
