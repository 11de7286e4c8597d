/**
 * Core domain types for resolver events.
 *
 * Events are produced by the script model resolver and handed to the
 * event logger. They carry no I/O and no framework dependencies.
 */

/** A named value rendered as one `name = value` line of a record. */
export type EventField = readonly [name: string, value: unknown];

/**
 * Capability implemented by events the formatter does not know about.
 *
 * `kind` becomes the constructor-style name at the start of the record.
 * `fields()` lists what to print; when an event omits it, every own
 * enumerable property except `kind` is printed instead.
 */
export interface RenderableEvent {
  readonly kind: string;
  fields?(): readonly EventField[];
}

/** Descriptor of a script model request sent to the build tool. */
export interface ModelRequest {
  readonly projectDir: string;
  readonly scriptFile?: string | undefined;
  readonly toolInstallation?: string | undefined;
  readonly userHome?: string | undefined;
  readonly javaHome?: string | undefined;
  readonly options: readonly string[];
  readonly jvmOptions: readonly string[];
  readonly environment?: Readonly<Record<string, string>> | undefined;
  readonly correlationId: string;
}

/** Script model returned by the build tool for one script. */
export interface ScriptModel {
  readonly classPath: readonly string[];
  readonly sourcePath: readonly string[];
  readonly implicitImports: readonly string[];
  readonly exceptions: readonly unknown[];
}

export interface SubmittedModelRequest {
  readonly kind: 'SubmittedModelRequest';
  readonly scriptFile: string | undefined;
  readonly request: ModelRequest;
}

export interface ReceivedModelResponse {
  readonly kind: 'ReceivedModelResponse';
  readonly scriptFile: string | undefined;
  readonly response: ScriptModel;
}

export interface ResolutionFailure {
  readonly kind: 'ResolutionFailure';
  readonly scriptFile: string | undefined;
  readonly failure: unknown;
}

/** Variants the formatter renders with a dedicated layout. */
export type KnownResolverEvent =
  | SubmittedModelRequest
  | ReceivedModelResponse
  | ResolutionFailure;

export type ResolverEvent = KnownResolverEvent | RenderableEvent;

/** Event paired with the instant it was submitted. */
export interface TimestampedEvent {
  readonly timestamp: Date;
  readonly event: ResolverEvent;
}

export function submittedModelRequest(
  scriptFile: string | undefined,
  request: ModelRequest,
): SubmittedModelRequest {
  return Object.freeze({ kind: 'SubmittedModelRequest', scriptFile, request });
}

export function receivedModelResponse(
  scriptFile: string | undefined,
  response: ScriptModel,
): ReceivedModelResponse {
  return Object.freeze({ kind: 'ReceivedModelResponse', scriptFile, response });
}

export function resolutionFailure(
  scriptFile: string | undefined,
  failure: unknown,
): ResolutionFailure {
  return Object.freeze({ kind: 'ResolutionFailure', scriptFile, failure });
}

const KNOWN_KINDS: ReadonlySet<string> = new Set([
  'SubmittedModelRequest',
  'ReceivedModelResponse',
  'ResolutionFailure',
]);

/**
 * Narrows to one of the dedicated variants.
 * A custom event reusing a built-in `kind` without the matching payload
 * field stays on the generic path.
 */
export function isKnownResolverEvent(event: ResolverEvent): event is KnownResolverEvent {
  if (!KNOWN_KINDS.has(event.kind)) return false;
  switch (event.kind) {
    case 'SubmittedModelRequest':
      return 'request' in event;
    case 'ReceivedModelResponse':
      return 'response' in event;
    default:
      return 'failure' in event;
  }
}
