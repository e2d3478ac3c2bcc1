import { JobState } from '../../core/entities/JobState.js';

export interface StoredMessage {
  type: string;
  text: string;
}

/**
 * Mutable server-side record of a job held by the in-memory service
 */
export interface StoredJob {
  sid: string;
  search: string;
  dispatchState: JobState;
  doneProgress: number;
  eventCount: number;
  resultCount: number;
  scanCount: number;
  runDuration: number;
  isDone: boolean;
  isFailed: boolean;
  isPaused: boolean;
  ttl: number;
  messages: StoredMessage[];
  expectedResultCount: number;
  createdAt: number;
  touchedAt: number;
}

export interface CreateJobOptions {
  sid?: string;
  dispatchState?: JobState;
  doneProgress?: number;
  expectedResultCount?: number;
  ttl?: number;
}

export const DEFAULT_JOB_TTL_SECONDS = 600;

/**
 * Identifier → job map. Each transport gets its own store instance so tests
 * running side by side never see each other's jobs.
 */
export class InMemoryJobStore {
  private jobs: Map<string, StoredJob> = new Map();
  private sequence = 0;

  constructor(private now: () => number = () => Date.now()) {}

  create(search: string, options: CreateJobOptions = {}): StoredJob {
    const createdAt = this.now();
    this.sequence++;
    const dispatchState = options.dispatchState ?? 'QUEUED';
    const job: StoredJob = {
      sid: options.sid ?? `${Math.floor(createdAt / 1000)}.${this.sequence}`,
      search,
      dispatchState,
      doneProgress: options.doneProgress ?? 0,
      eventCount: 0,
      resultCount: 0,
      scanCount: 0,
      runDuration: 0,
      isDone: dispatchState === 'DONE',
      isFailed: dispatchState === 'FAILED',
      isPaused: dispatchState === 'PAUSED',
      ttl: options.ttl ?? DEFAULT_JOB_TTL_SECONDS,
      messages: [],
      expectedResultCount: options.expectedResultCount ?? 100,
      createdAt,
      touchedAt: createdAt,
    };
    this.jobs.set(job.sid, job);
    return job;
  }

  get(sid: string): StoredJob | null {
    return this.jobs.get(sid) ?? null;
  }

  has(sid: string): boolean {
    return this.jobs.has(sid);
  }

  /**
   * Apply a partial update; returns the updated job, or null when unknown
   */
  update(sid: string, patch: Partial<Omit<StoredJob, 'sid'>>): StoredJob | null {
    const job = this.jobs.get(sid);
    if (!job) return null;
    Object.assign(job, patch);
    return job;
  }

  /**
   * Mark a job as DONE with its final counters
   */
  complete(sid: string, resultCount?: number): StoredJob | null {
    const job = this.jobs.get(sid);
    if (!job) return null;
    return this.update(sid, {
      dispatchState: 'DONE',
      doneProgress: 1,
      isDone: true,
      isPaused: false,
      resultCount: resultCount ?? job.expectedResultCount,
    });
  }

  fail(sid: string, messages: StoredMessage[]): StoredJob | null {
    return this.update(sid, {
      dispatchState: 'FAILED',
      isFailed: true,
      isDone: true,
      isPaused: false,
      messages,
    });
  }

  touch(sid: string): StoredJob | null {
    return this.update(sid, { touchedAt: this.now() });
  }

  delete(sid: string): boolean {
    return this.jobs.delete(sid);
  }

  list(): StoredJob[] {
    return Array.from(this.jobs.values());
  }

  clear(): void {
    this.jobs.clear();
  }

  get size(): number {
    return this.jobs.size;
  }
}
