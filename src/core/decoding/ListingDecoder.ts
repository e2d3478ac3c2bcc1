import { JobSummary } from '../entities/JobSummary.js';
import { MalformedStatusError } from '../errors.js';
import { isRecord, safeBool, safeFloat, safeFraction, safeInt, safeString } from './coerce.js';
import { decodeDispatchState } from './StatusDecoder.js';

/**
 * Listing entries name the job differently from the status endpoint:
 * - named:       { name: sid, content: {...} }
 * - content-sid: { content: { sid, ... } }
 * - flat:        { sid, dispatchState, ... }
 */
export type ListingEntryShape =
  | { kind: 'named'; identifier: string; content: Record<string, unknown> }
  | { kind: 'content-sid'; identifier: string; content: Record<string, unknown> }
  | { kind: 'flat'; identifier: string; content: Record<string, unknown> };

export interface DecodedListing {
  summaries: JobSummary[];
  total: number | null;
}

export function classifyListingEntry(entry: unknown): ListingEntryShape {
  if (!isRecord(entry)) {
    throw new MalformedStatusError('Job listing entry is not an object', undefined);
  }
  const name = safeString(entry.name);
  if (name && isRecord(entry.content)) {
    return { kind: 'named', identifier: name, content: entry.content };
  }
  if (isRecord(entry.content)) {
    const sid = safeString(entry.content.sid);
    if (sid) {
      return { kind: 'content-sid', identifier: sid, content: entry.content };
    }
  }
  const sid = safeString(entry.sid);
  if (sid) {
    return { kind: 'flat', identifier: sid, content: entry };
  }
  throw new MalformedStatusError('Job listing entry carries no job identifier', undefined);
}

export function toJobSummary(shape: ListingEntryShape): JobSummary {
  const { content } = shape;
  return {
    identifier: shape.identifier,
    state: decodeDispatchState(content),
    progressFraction: safeFraction(content.doneProgress),
    eventCount: safeInt(content.eventCount),
    resultCount: safeInt(content.resultCount),
    runDurationSeconds: safeFloat(content.runDuration),
    isPaused: safeBool(content.isPaused),
  };
}

/**
 * Decode a listing response: { entry: [...], paging?: { total } } or a bare array
 */
export function decodeJobListing(raw: unknown): DecodedListing {
  let entries: unknown[];
  let total: number | null = null;

  if (Array.isArray(raw)) {
    entries = raw;
  } else if (isRecord(raw) && Array.isArray(raw.entry)) {
    entries = raw.entry;
    if (isRecord(raw.paging) && raw.paging.total !== undefined) {
      total = safeInt(raw.paging.total);
    }
  } else {
    throw new MalformedStatusError('Invalid job listing response: no entry list', undefined);
  }

  return {
    summaries: entries.map((entry) => toJobSummary(classifyListingEntry(entry))),
    total,
  };
}
