import type {
  EventField,
  ModelRequest,
  RenderableEvent,
  ResolverEvent,
  ScriptModel,
  TimestampedEvent,
} from '../domain/index.js';
import { isKnownResolverEvent } from '../domain/index.js';
import { formatTimestamp } from './timestamps.js';

/**
 * Indentation is a two-level scheme: unset or 1 means one tab,
 * anything else means two.
 */
export type Indentation = number | undefined;

export function indentationStringFor(indentation: Indentation): string {
  return indentation === undefined || indentation === 1 ? '\t' : '\t\t';
}

/**
 * Prefixes every line of `text` with `indent`.
 * Blank lines shorter than the indent are replaced by the indent itself.
 */
export function prependIndent(text: string, indent: string): string {
  return text
    .split('\n')
    .map((line) => {
      if (line.trim() === '') {
        return line.length < indent.length ? indent : line;
      }
      return indent + line;
    })
    .join('\n');
}

/**
 * Default value-to-string conversion used for field values.
 *
 * Lists render as `[a, b]` and records/maps as `{k=v}`; values that
 * override `toString()` use it. Self-references render as `[Circular]`.
 */
export function stringOf(value: unknown, seen: Set<object> = new Set()): string {
  if (value === null || value === undefined) return 'null';
  if (typeof value === 'string') return value;
  if (typeof value === 'function') return `function ${value.name || '<anonymous>'}`;
  if (typeof value !== 'object') return String(value);

  if (seen.has(value)) return '[Circular]';
  seen.add(value);
  try {
    if (value instanceof Date) return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
    if (value instanceof Error) return `${value.name}: ${value.message}`;
    if (Array.isArray(value) || value instanceof Set) {
      return `[${Array.from(value, (item: unknown) => stringOf(item, seen)).join(', ')}]`;
    }
    if (value instanceof Map) {
      const entries = Array.from(value, ([k, v]: [unknown, unknown]) => `${stringOf(k, seen)}=${stringOf(v, seen)}`);
      return `{${entries.join(', ')}}`;
    }
    if (typeof value.toString === 'function' && value.toString !== Object.prototype.toString) {
      return String(value);
    }
    const entries = Object.entries(value).map(([k, v]) => `${k}=${stringOf(v, seen)}`);
    return `{${entries.join(', ')}}`;
  } finally {
    seen.delete(value);
  }
}

function traceOf(value: unknown): string {
  if (value instanceof Error) return value.stack ?? `${value.name}: ${value.message}`;
  return stringOf(value);
}

/**
 * Full trace text of a failure: the host's stack text for `Error`s,
 * followed by one `Caused by:` section per error in the `cause` chain.
 */
export function stackTraceOf(failure: unknown): string {
  const sections = [traceOf(failure)];
  const visited = new Set<unknown>([failure]);
  let current = failure instanceof Error ? failure.cause : undefined;

  while (current !== undefined && current !== null) {
    if (visited.has(current)) {
      sections.push('Caused by: [circular cause]');
      break;
    }
    visited.add(current);
    sections.push(`Caused by: ${traceOf(current)}`);
    current = current instanceof Error ? current.cause : undefined;
  }

  return sections.join('\n');
}

/** Stack trace of `failure`, every line prefixed with the indent for `indentation`. */
export function stringForException(failure: unknown, indentation: Indentation): string {
  return prependIndent(stackTraceOf(failure), indentationStringFor(indentation));
}

/** `NO ERROR`, or a bracketed block with each trace one tab deeper than the field. */
export function stringForExceptions(exceptions: readonly unknown[], indentation: Indentation): string {
  if (exceptions.length === 0) return 'NO ERROR';
  const indent = `${indentationStringFor(indentation)}\t`;
  const traces = exceptions.map((exception) => prependIndent(stackTraceOf(exception), indent));
  return `[\n${traces.join(',\n')}]`;
}

/**
 * Renders a list of path-like entries, factoring out the leading segments
 * every entry shares: `[/home/u/libs/{a.jar, b.jar}]`.
 */
export function compactStringFor(entries: readonly string[], separator = '/'): string {
  if (entries.length < 2) return `[${entries.join(', ')}]`;

  const split = entries.map((entry) => entry.split(separator));
  const first = split[0] ?? [];
  let shared = 0;
  // Never consume the last segment of any entry.
  const limit = split.reduce((min, segments) => Math.min(min, segments.length - 1), Infinity);
  while (shared < limit && split.every((segments) => segments[shared] === first[shared])) {
    shared++;
  }

  const prefix = first.slice(0, shared);
  if (prefix.every((segment) => segment === '')) return `[${entries.join(', ')}]`;

  const rests = split.map((segments) => segments.slice(shared).join(separator));
  return `[${prefix.join(separator)}${separator}{${rests.join(', ')}}]`;
}

function prettyPrintProperties(properties: readonly EventField[], indentation: Indentation): string {
  const indent = indentationStringFor(indentation);
  return `\n${indent}${properties.map(([name, value]) => `${name} = ${stringOf(value)}`).join(`,\n${indent}`)}`;
}

/** `Name(\n<indent>a = 1,\n<indent>b = 2)` */
export function prettyPrint(
  name: string,
  properties: readonly EventField[],
  indentation?: Indentation,
): string {
  return `${name}(${prettyPrintProperties(properties, indentation)})`;
}

function ownFields(value: object, skip: string | undefined): EventField[] {
  return Object.entries(value)
    .filter(([key, field]) => key !== skip && typeof field !== 'function');
}

/** Generic printer: every own enumerable field, stringified. */
export function prettyPrintAny(name: string, value: object, indentation?: Indentation): string {
  return prettyPrint(name, ownFields(value, undefined), indentation);
}

/** Renders an event the formatter has no dedicated layout for. */
export function prettyPrintRenderable(event: RenderableEvent): string {
  const fields = typeof event.fields === 'function' ? event.fields() : ownFields(event, 'kind');
  return prettyPrint(event.kind, fields);
}

export function prettyPrintRequest(request: ModelRequest, indentation?: Indentation): string {
  return prettyPrintAny('ModelRequest', request, indentation);
}

export function prettyPrintScriptModel(model: ScriptModel, indentation?: Indentation): string {
  return prettyPrint(
    'ScriptModel',
    [
      ['classPath', compactStringFor(model.classPath)],
      ['sourcePath', compactStringFor(model.sourcePath)],
      ['implicitImports', compactStringFor(model.implicitImports, '.')],
      ['exceptions', stringForExceptions(model.exceptions, indentation)],
    ],
    indentation,
  );
}

/** Record body for one event, without the timestamp. */
export function formatEvent(event: ResolverEvent): string {
  if (!isKnownResolverEvent(event)) return prettyPrintRenderable(event);

  switch (event.kind) {
    case 'SubmittedModelRequest':
      return prettyPrint(event.kind, [
        ['scriptFile', event.scriptFile],
        ['request', prettyPrintRequest(event.request, 2)],
      ]);
    case 'ReceivedModelResponse':
      return prettyPrint(event.kind, [
        ['scriptFile', event.scriptFile],
        ['response', prettyPrintScriptModel(event.response, 2)],
      ]);
    case 'ResolutionFailure':
      return prettyPrint(event.kind, [
        ['scriptFile', event.scriptFile],
        ['failure', stringForException(event.failure, 2)],
      ]);
  }
}

/** `<timestamp> - <body>\n\n` */
export function formatRecord({ timestamp, event }: TimestampedEvent): string {
  return `${formatTimestamp(timestamp)} - ${formatEvent(event)}\n\n`;
}
