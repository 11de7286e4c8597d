export { ResolverEventLogger, getSharedResolverEventLogger } from './resolver-event-logger.js';
export type { ResolverEventLoggerDeps, ResolverEventLoggerStats } from './resolver-event-logger.js';
export * from './domain/index.js';
export * from './application/index.js';
export * from './infrastructure/log-file/index.js';
