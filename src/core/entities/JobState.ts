import { z } from 'zod';

/**
 * Dispatch states reported by the search service, in wire spelling
 */
export const JOB_STATES = [
  'QUEUED',
  'PARSING',
  'RUNNING',
  'FINALIZING',
  'DONE',
  'FAILED',
  'PAUSED',
] as const;

export type JobState = (typeof JOB_STATES)[number];

export const JobStateSchema = z.enum(JOB_STATES);

const ACTIVE_STATES: ReadonlySet<JobState> = new Set<JobState>([
  'QUEUED',
  'PARSING',
  'RUNNING',
  'FINALIZING',
]);

const TERMINAL_STATES: ReadonlySet<JobState> = new Set<JobState>(['DONE', 'FAILED']);

/**
 * Still consuming server resources with no outcome yet
 */
export function isActiveState(state: JobState): boolean {
  return ACTIVE_STATES.has(state);
}

/**
 * No further transitions without intervention. PAUSED is not terminal.
 */
export function isTerminalState(state: JobState): boolean {
  return TERMINAL_STATES.has(state);
}

export function isSuccessState(state: JobState): boolean {
  return state === 'DONE';
}

export function isJobState(value: unknown): value is JobState {
  return JobStateSchema.safeParse(value).success;
}
