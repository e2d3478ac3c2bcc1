import { JobState, JobStateSchema } from '../entities/JobState.js';
import { StatusSnapshot } from '../entities/StatusSnapshot.js';
import { MalformedStatusError } from '../errors.js';
import {
  decodeMessages,
  isRecord,
  safeBool,
  safeFloat,
  safeFraction,
  safeInt,
  safeString,
} from './coerce.js';

/**
 * The status endpoint answers in one of three shapes:
 * - envelope: { entry: [{ name, content: {...} }] }
 * - wrapped:  { content: {...} }
 * - flat:     the status fields at top level
 */
export type StatusResponseShape =
  | { kind: 'envelope'; content: Record<string, unknown>; name?: string }
  | { kind: 'wrapped'; content: Record<string, unknown> }
  | { kind: 'flat'; content: Record<string, unknown> };

function describeValue(value: unknown): string {
  if (value === undefined) return 'undefined';
  if (Array.isArray(value)) return 'array';
  if (value === null) return 'null';
  return typeof value;
}

function fromEnvelope(entry: unknown): StatusResponseShape {
  if (!Array.isArray(entry) || entry.length === 0) {
    throw new MalformedStatusError('Invalid job status response: no entry returned', undefined);
  }
  const first: unknown = entry[0];
  if (!isRecord(first)) {
    throw new MalformedStatusError(
      `Invalid job status response: entry is ${describeValue(first)}, expected object`,
      undefined
    );
  }
  return {
    kind: 'envelope',
    content: isRecord(first.content) ? first.content : first,
    name: safeString(first.name),
  };
}

export function classifyStatusResponse(raw: unknown): StatusResponseShape {
  if (!isRecord(raw)) {
    throw new MalformedStatusError(
      `Invalid job status response: got ${describeValue(raw)}, expected object`,
      undefined
    );
  }
  if ('entry' in raw) {
    return fromEnvelope(raw.entry);
  }
  if (isRecord(raw.content)) {
    return { kind: 'wrapped', content: raw.content };
  }
  return { kind: 'flat', content: raw };
}

/**
 * The dispatch state drives control flow, so it is never defaulted
 */
export function decodeDispatchState(content: Record<string, unknown>): JobState {
  const raw = content.dispatchState;
  if (raw === undefined || raw === null || raw === '') {
    throw new MalformedStatusError('Missing dispatchState in job status response', raw);
  }
  const parsed = JobStateSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedStatusError(`Invalid dispatchState: ${JSON.stringify(raw)}`, raw);
  }
  return parsed.data;
}

function decodeShape(shape: StatusResponseShape, fallbackIdentifier: string): StatusSnapshot {
  const { content } = shape;
  const state = decodeDispatchState(content);
  const name = shape.kind === 'envelope' ? shape.name : undefined;

  return new StatusSnapshot({
    identifier: safeString(content.sid) ?? name ?? fallbackIdentifier,
    state,
    progressFraction: safeFraction(content.doneProgress),
    eventCount: safeInt(content.eventCount),
    resultCount: safeInt(content.resultCount),
    scanCount: safeInt(content.scanCount),
    runDurationSeconds: safeFloat(content.runDuration),
    ttlSeconds: safeInt(content.ttl),
    isDone: safeBool(content.isDone),
    isFailed: safeBool(content.isFailed),
    isPaused: safeBool(content.isPaused),
    messages: decodeMessages(content.messages),
  });
}

/**
 * Turn a raw status response into a StatusSnapshot.
 *
 * @param fallbackIdentifier - used when the payload echoes no sid or entry name
 * @throws MalformedStatusError when the shape or dispatch state is unusable
 */
export function decodeStatus(raw: unknown, fallbackIdentifier = ''): StatusSnapshot {
  return decodeShape(classifyStatusResponse(raw), fallbackIdentifier);
}
