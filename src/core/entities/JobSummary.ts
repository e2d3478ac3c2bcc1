import { JobState } from './JobState.js';

/**
 * Lightweight listing row for a job
 */
export interface JobSummary {
  identifier: string;
  state: JobState;
  progressFraction: number;
  eventCount: number;
  resultCount: number;
  runDurationSeconds: number;
  isPaused: boolean;
}

export interface JobListingPage {
  summaries: JobSummary[];
  offset: number;
  count: number;
  total: number | null; // null when the response carries no paging block
}
