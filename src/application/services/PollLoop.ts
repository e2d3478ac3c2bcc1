import { setTimeout as delay } from 'timers/promises';
import { StatusSnapshot } from '../../core/entities/StatusSnapshot.js';
import {
  JobFailedError,
  PollAbortedError,
  PollTimeoutError,
  ValidationError,
  errorMessage,
} from '../../core/errors.js';

/**
 * Monotonic time source in milliseconds
 */
export interface Clock {
  now(): number;
}

export const monotonicClock: Clock = {
  now: () => performance.now(),
};

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export const timerSleep: Sleeper = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export type ProgressCallback = (snapshot: StatusSnapshot) => void | Promise<void>;

export interface PollOptions {
  timeoutSeconds: number;
  pollIntervalSeconds?: number;
  onProgress?: ProgressCallback;
  /**
   * Ends the wait as `aborted`. Takes effect before a fetch, during the sleep
   * and while a fetch is in flight; the transport receives the signal too so
   * it stops retrying.
   */
  signal?: AbortSignal;
}

export type StatusFetcher = (identifier: string, signal?: AbortSignal) => Promise<StatusSnapshot>;

export interface PollLoopDependencies {
  clock?: Clock;
  sleep?: Sleeper;
  log?: (message: string) => void;
}

export const DEFAULT_POLL_INTERVAL_SECONDS = 1;

/**
 * How a wait ended. `failed`, `timed-out` and `aborted` become errors in the
 * throwing API; `done` and `paused` return their snapshot.
 */
export type PollOutcome =
  | { kind: 'done'; snapshot: StatusSnapshot }
  | { kind: 'failed'; snapshot: StatusSnapshot }
  | { kind: 'paused'; snapshot: StatusSnapshot }
  | { kind: 'timed-out'; snapshot: StatusSnapshot; elapsedSeconds: number; timeoutSeconds: number }
  | { kind: 'aborted'; snapshot: StatusSnapshot | null; elapsedSeconds: number };

/**
 * Fixed-interval completion poll for a single job.
 *
 * Fetches are strictly sequential; the timeout is checked once per iteration
 * against a monotonic clock captured at entry.
 */
export class PollLoop {
  private clock: Clock;
  private sleep: Sleeper;
  private log: (message: string) => void;

  constructor(
    private fetchStatus: StatusFetcher,
    dependencies: PollLoopDependencies = {}
  ) {
    this.clock = dependencies.clock ?? monotonicClock;
    this.sleep = dependencies.sleep ?? timerSleep;
    this.log = dependencies.log ?? ((message) => console.error(message));
  }

  async run(identifier: string, options: PollOptions): Promise<PollOutcome> {
    const { timeoutSeconds, onProgress, signal } = options;
    const pollIntervalSeconds = options.pollIntervalSeconds ?? DEFAULT_POLL_INTERVAL_SECONDS;
    validatePollOptions(timeoutSeconds, pollIntervalSeconds);

    const startedAt = this.clock.now();
    const elapsedSeconds = () => (this.clock.now() - startedAt) / 1000;
    let latest: StatusSnapshot | null = null;

    for (;;) {
      if (signal?.aborted) {
        return { kind: 'aborted', snapshot: latest, elapsedSeconds: elapsedSeconds() };
      }

      const snapshot = await this.fetchUnlessAborted(identifier, signal);
      if (snapshot === null) {
        return { kind: 'aborted', snapshot: latest, elapsedSeconds: elapsedSeconds() };
      }
      latest = snapshot;
      this.notify(onProgress, snapshot);

      if (snapshot.state === 'FAILED' || snapshot.isFailed) {
        return { kind: 'failed', snapshot };
      }
      if (snapshot.isDone || snapshot.isTerminal) {
        return { kind: 'done', snapshot };
      }
      if (snapshot.isPaused || snapshot.state === 'PAUSED') {
        return { kind: 'paused', snapshot };
      }

      const elapsed = elapsedSeconds();
      if (elapsed >= timeoutSeconds) {
        return { kind: 'timed-out', snapshot, elapsedSeconds: elapsed, timeoutSeconds };
      }

      const waitMs = Math.min(pollIntervalSeconds, timeoutSeconds - elapsed) * 1000;
      if (waitMs > 0) {
        try {
          await this.sleep(waitMs, signal);
        } catch (error) {
          if (signal?.aborted) {
            return { kind: 'aborted', snapshot: latest, elapsedSeconds: elapsedSeconds() };
          }
          throw error;
        }
      }
    }
  }

  /**
   * Resolves null as soon as the signal fires, without waiting for the request
   */
  private async fetchUnlessAborted(identifier: string, signal?: AbortSignal): Promise<StatusSnapshot | null> {
    if (!signal) {
      return this.fetchStatus(identifier);
    }
    let onAbort: (() => void) | undefined;
    const aborted = new Promise<null>((resolve) => {
      onAbort = () => resolve(null);
      signal.addEventListener('abort', onAbort, { once: true });
    });
    try {
      return await Promise.race([this.fetchStatus(identifier, signal), aborted]);
    } catch (error) {
      if (signal.aborted) {
        return null;
      }
      throw error;
    } finally {
      if (onAbort) {
        signal.removeEventListener('abort', onAbort);
      }
    }
  }

  /**
   * Observer errors are logged and dropped so they cannot change the outcome
   */
  private notify(onProgress: ProgressCallback | undefined, snapshot: StatusSnapshot): void {
    if (!onProgress) return;
    const report = (error: unknown) =>
      this.log(`[PollLoop] ✗ Progress callback failed for job ${snapshot.identifier}: ${errorMessage(error)}`);
    try {
      const pending = onProgress(snapshot);
      if (pending instanceof Promise) {
        pending.catch(report);
      }
    } catch (error) {
      report(error);
    }
  }
}

function validatePollOptions(timeoutSeconds: number, pollIntervalSeconds: number): void {
  if (!Number.isFinite(timeoutSeconds) || timeoutSeconds <= 0) {
    throw new ValidationError(`timeout must be greater than 0 seconds, got ${timeoutSeconds}`, {
      field: 'timeoutSeconds',
    });
  }
  if (!Number.isFinite(pollIntervalSeconds) || pollIntervalSeconds < 0) {
    throw new ValidationError(`poll interval must be 0 or more seconds, got ${pollIntervalSeconds}`, {
      field: 'pollIntervalSeconds',
    });
  }
}

/**
 * Convert a PollOutcome into the throwing form
 */
export function unwrapOutcome(identifier: string, outcome: PollOutcome): StatusSnapshot {
  switch (outcome.kind) {
    case 'done':
    case 'paused':
      return outcome.snapshot;
    case 'failed':
      throw new JobFailedError(identifier, outcome.snapshot.state, outcome.snapshot.messages);
    case 'timed-out':
      throw new PollTimeoutError(identifier, outcome.elapsedSeconds, outcome.timeoutSeconds);
    case 'aborted':
      throw new PollAbortedError(identifier, outcome.elapsedSeconds);
  }
}
