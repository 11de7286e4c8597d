export { BoundedQueue, NO_DATA } from './event-queue.js';
export type { PollResult } from './event-queue.js';
export { runConsumerLoop } from './consumer-loop.js';
export type { RecordSink, ConsumerLoopDeps, ConsumerRunSummary } from './consumer-loop.js';
export {
  formatRecord,
  formatEvent,
  prettyPrint,
  prettyPrintAny,
  prettyPrintRenderable,
  prettyPrintRequest,
  prettyPrintScriptModel,
  compactStringFor,
  stackTraceOf,
  stringForException,
  stringForExceptions,
  stringOf,
  prependIndent,
  indentationStringFor,
} from './formatter.js';
export type { Indentation } from './formatter.js';
export { formatTimestamp, formatZoneOffset, formatFileTimestamp } from './timestamps.js';
export {
  resolverLoggerOptionsSchema,
  parseResolverLoggerOptions,
  DEFAULT_CAPACITY,
  DEFAULT_OFFER_TIMEOUT_MS,
  DEFAULT_POLL_TIMEOUT_MS,
} from './options.js';
export type { ResolverLoggerOptions, ResolverLoggerOptionsInput } from './options.js';
