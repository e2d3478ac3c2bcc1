import { ValidationError } from '../core/errors.js';

export const JOBS_PATH = '/search/v2/jobs';

/**
 * Percent-encode a job identifier for use as a single path segment
 */
export function encodeJobId(identifier: string): string {
  return encodeURIComponent(identifier);
}

export function requireJobId(identifier: string): string {
  if (typeof identifier !== 'string' || identifier.trim().length === 0) {
    throw new ValidationError('Job identifier is required', { field: 'identifier' });
  }
  return identifier;
}

export function jobPath(identifier: string): string {
  return `${JOBS_PATH}/${encodeJobId(requireJobId(identifier))}`;
}

export function jobControlPath(identifier: string): string {
  return `${jobPath(identifier)}/control`;
}

export function jobSummaryPath(identifier: string): string {
  return `${jobPath(identifier)}/summary`;
}
