export type {
  EventField,
  RenderableEvent,
  ModelRequest,
  ScriptModel,
  SubmittedModelRequest,
  ReceivedModelResponse,
  ResolutionFailure,
  KnownResolverEvent,
  ResolverEvent,
  TimestampedEvent,
} from './event.js';
export {
  submittedModelRequest,
  receivedModelResponse,
  resolutionFailure,
  isKnownResolverEvent,
} from './event.js';
