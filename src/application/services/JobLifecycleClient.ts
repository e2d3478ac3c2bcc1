import { JobSummary } from '../../core/entities/JobSummary.js';
import { StatusSnapshot } from '../../core/entities/StatusSnapshot.js';
import { decodeStatus } from '../../core/decoding/StatusDecoder.js';
import { isRecord } from '../../core/decoding/coerce.js';
import { NotFoundError, ValidationError } from '../../core/errors.js';
import { ISearchTransport } from '../../core/interfaces/ISearchTransport.js';
import { jobControlPath, jobPath, jobSummaryPath, requireJobId } from '../../utils/jobPaths.js';
import { ListingPager, PageRequest, DEFAULT_PAGE_SIZE } from './ListingPager.js';
import { Clock, PollLoop, PollOptions, PollOutcome, Sleeper, unwrapOutcome } from './PollLoop.js';

export type ControlAction = 'cancel' | 'pause' | 'unpause' | 'finalize' | 'setttl' | 'touch';

export interface JobLifecycleClientOptions {
  requestTimeoutMs?: number;
  defaultPollIntervalSeconds?: number;
  clock?: Clock;
  sleep?: Sleeper;
  log?: (message: string) => void;
}

/**
 * Status, wait and control operations for remote search jobs.
 *
 * Control calls are fire-and-confirm: they report whether the request was
 * accepted and never poll afterwards. Use fetchStatus or pollUntilTerminal to
 * observe the resulting state.
 */
export class JobLifecycleClient {
  private pollLoop: PollLoop;
  private pager: ListingPager;
  private log: (message: string) => void;
  private requestTimeoutMs?: number;
  private defaultPollIntervalSeconds?: number;

  constructor(
    private transport: ISearchTransport,
    options: JobLifecycleClientOptions = {}
  ) {
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.defaultPollIntervalSeconds = options.defaultPollIntervalSeconds;
    this.log = options.log ?? ((message) => console.error(message));
    this.pollLoop = new PollLoop((identifier, signal) => this.fetchStatus(identifier, signal), {
      clock: options.clock,
      sleep: options.sleep,
      log: this.log,
    });
    this.pager = new ListingPager(transport, this.requestTimeoutMs);
  }

  /**
   * Single status read. Transport errors propagate unchanged.
   */
  async fetchStatus(identifier: string, signal?: AbortSignal): Promise<StatusSnapshot> {
    const raw = await this.transport.get(jobPath(identifier), undefined, this.requestTimeoutMs, signal);
    return decodeStatus(raw, identifier);
  }

  /**
   * Poll until the job is done, failed or paused.
   *
   * @throws JobFailedError when the job reports failure (first such poll)
   * @throws PollTimeoutError when still active after `timeoutSeconds`
   * @throws PollAbortedError when `signal` fires first
   */
  async pollUntilTerminal(identifier: string, options: PollOptions): Promise<StatusSnapshot> {
    const outcome = await this.waitForOutcome(identifier, options);
    return unwrapOutcome(identifier, outcome);
  }

  /**
   * Same wait as pollUntilTerminal, reported as a tagged outcome instead of thrown
   */
  async waitForOutcome(identifier: string, options: PollOptions): Promise<PollOutcome> {
    requireJobId(identifier);
    return this.pollLoop.run(identifier, {
      ...options,
      pollIntervalSeconds: options.pollIntervalSeconds ?? this.defaultPollIntervalSeconds,
    });
  }

  /**
   * Request cancellation. A job that is already gone counts as cancelled.
   */
  async cancel(identifier: string): Promise<boolean> {
    try {
      return await this.control(identifier, 'cancel');
    } catch (error) {
      if (error instanceof NotFoundError) {
        this.log(`[JobLifecycle] Job ${identifier} already gone, treating cancel as done`);
        return true;
      }
      throw error;
    }
  }

  async pause(identifier: string): Promise<boolean> {
    return this.control(identifier, 'pause');
  }

  async resume(identifier: string): Promise<boolean> {
    return this.control(identifier, 'unpause');
  }

  /**
   * Stop computing further results and keep the partial ones
   */
  async finalize(identifier: string): Promise<boolean> {
    return this.control(identifier, 'finalize');
  }

  /**
   * Set the inactivity TTL. The server may clamp the value; re-poll to see what it kept.
   */
  async setExpiry(identifier: string, ttlSeconds: number): Promise<boolean> {
    if (!Number.isInteger(ttlSeconds) || ttlSeconds < 0) {
      throw new ValidationError(`ttl must be a non-negative integer number of seconds, got ${ttlSeconds}`, {
        field: 'ttlSeconds',
      });
    }
    return this.control(identifier, 'setttl', { ttl: ttlSeconds });
  }

  /**
   * Reset the inactivity countdown without changing the TTL
   */
  async touch(identifier: string): Promise<boolean> {
    return this.control(identifier, 'touch');
  }

  async delete(identifier: string): Promise<boolean> {
    await this.transport.delete(jobPath(identifier), this.requestTimeoutMs);
    return true;
  }

  async listJobs(request: PageRequest = {}): Promise<JobSummary[]> {
    const page = await this.pager.fetchPage(request);
    return page.summaries;
  }

  async listActive(count: number = DEFAULT_PAGE_SIZE, offset: number = 0): Promise<JobSummary[]> {
    return this.pager.listActive({ count, offset });
  }

  /**
   * Field summary of a job's events, returned as the service sends it
   */
  async getSummary(identifier: string): Promise<Record<string, unknown>> {
    const raw = await this.transport.get(jobSummaryPath(identifier), undefined, this.requestTimeoutMs);
    return isRecord(raw) ? raw : {};
  }

  private async control(
    identifier: string,
    action: ControlAction,
    extra: Record<string, number> = {}
  ): Promise<boolean> {
    await this.transport.post(jobControlPath(identifier), { action, ...extra }, this.requestTimeoutMs);
    return true;
  }
}
