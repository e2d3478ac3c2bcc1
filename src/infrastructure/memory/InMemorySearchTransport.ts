import { isActiveState, isTerminalState } from '../../core/entities/JobState.js';
import { TransportError, transportErrorForStatus } from '../../core/errors.js';
import { FormFields, ISearchTransport, QueryParams } from '../../core/interfaces/ISearchTransport.js';
import { JOBS_PATH } from '../../utils/jobPaths.js';
import { InMemoryJobStore, StoredJob } from './InMemoryJobStore.js';

export interface RecordedCall {
  method: 'GET' | 'POST' | 'DELETE';
  path: string;
  params?: QueryParams;
  data?: FormFields;
}

export interface InMemorySearchTransportOptions {
  /**
   * Progress added to an active job on each status read; 0 freezes jobs
   * until a test moves them through the store
   */
  progressStep?: number;
  /**
   * Seconds of run time added on each status read of an active job
   */
  runDurationStep?: number;
}

const ITEM_PATTERN = new RegExp(`^${JOBS_PATH}/([^/]+)(?:/(control|summary))?$`);

/**
 * In-process stand-in for the search service, serving the same paths and
 * response envelopes as the real REST API
 */
export class InMemorySearchTransport implements ISearchTransport {
  readonly calls: RecordedCall[] = [];
  private progressStep: number;
  private runDurationStep: number;

  constructor(
    readonly store: InMemoryJobStore = new InMemoryJobStore(),
    options: InMemorySearchTransportOptions = {}
  ) {
    this.progressStep = options.progressStep ?? 0;
    this.runDurationStep = options.runDurationStep ?? 0.5;
  }

  async get(path: string, params?: QueryParams): Promise<unknown> {
    this.calls.push({ method: 'GET', path, params });

    if (path === JOBS_PATH) {
      return this.listJobs(params);
    }

    const { sid, resource } = this.route(path);
    const job = this.requireJob(sid);

    if (resource === 'summary') {
      return {
        fields: {},
        event_count: job.eventCount,
        earliest_time: new Date(job.createdAt).toISOString(),
      };
    }
    if (resource === undefined) {
      this.advance(job);
      return { entry: [this.toEntry(job)] };
    }
    throw transportErrorForStatus(405, `GET not allowed on ${path}`, 'get');
  }

  async post(path: string, data: FormFields = {}): Promise<unknown> {
    this.calls.push({ method: 'POST', path, data });

    const { sid, resource } = this.route(path);
    if (resource !== 'control') {
      throw transportErrorForStatus(405, `POST not allowed on ${path}`, 'post');
    }
    const job = this.requireJob(sid);
    this.applyControl(job, data);
    return {};
  }

  async delete(path: string): Promise<unknown> {
    this.calls.push({ method: 'DELETE', path });

    const { sid, resource } = this.route(path);
    if (resource !== undefined) {
      throw transportErrorForStatus(405, `DELETE not allowed on ${path}`, 'delete');
    }
    this.requireJob(sid);
    this.store.delete(sid);
    return {};
  }

  private route(path: string): { sid: string; resource?: 'control' | 'summary' } {
    const match = ITEM_PATTERN.exec(path);
    if (!match) {
      throw transportErrorForStatus(404, `Unknown endpoint: ${path}`, 'route');
    }
    const resource = match[2] === 'control' || match[2] === 'summary' ? match[2] : undefined;
    return { sid: decodeURIComponent(match[1]), resource };
  }

  private requireJob(sid: string): StoredJob {
    const job = this.store.get(sid);
    if (!job) {
      throw transportErrorForStatus(404, `Unknown sid: ${sid}`, 'lookup');
    }
    return job;
  }

  private applyControl(job: StoredJob, data: FormFields): void {
    const action = data.action;
    switch (action) {
      case 'cancel':
        // The service drops cancelled jobs; later reads return 404
        this.store.delete(job.sid);
        return;
      case 'pause':
        if (isActiveState(job.dispatchState)) {
          this.store.update(job.sid, { dispatchState: 'PAUSED', isPaused: true });
        }
        return;
      case 'unpause':
        if (job.isPaused) {
          this.store.update(job.sid, { dispatchState: 'RUNNING', isPaused: false });
        }
        return;
      case 'finalize':
        if (isActiveState(job.dispatchState) || job.isPaused) {
          this.store.update(job.sid, { dispatchState: 'FINALIZING', isPaused: false });
        }
        return;
      case 'setttl': {
        const ttl = Number(data.ttl);
        if (!Number.isInteger(ttl) || ttl < 0) {
          throw new TransportError(`Invalid ttl: ${String(data.ttl)}`, { statusCode: 400, operation: 'setttl' });
        }
        this.store.update(job.sid, { ttl });
        this.store.touch(job.sid);
        return;
      }
      case 'touch':
        this.store.touch(job.sid);
        return;
      default:
        throw new TransportError(`Unknown control action: ${String(action)}`, {
          statusCode: 400,
          operation: 'control',
        });
    }
  }

  /**
   * Move an active job forward the way a running search would between reads
   */
  private advance(job: StoredJob): void {
    if (job.isPaused || isTerminalState(job.dispatchState)) {
      return;
    }
    if (job.dispatchState === 'FINALIZING') {
      this.store.complete(job.sid, Math.round(job.doneProgress * job.expectedResultCount));
      return;
    }
    if (this.progressStep <= 0) {
      return;
    }

    const doneProgress = Math.min(1, job.doneProgress + this.progressStep);
    if (doneProgress >= 1) {
      this.store.complete(job.sid);
      this.store.update(job.sid, { runDuration: job.runDuration + this.runDurationStep });
      return;
    }
    this.store.update(job.sid, {
      dispatchState: 'RUNNING',
      doneProgress,
      eventCount: Math.round(doneProgress * job.expectedResultCount * 10),
      scanCount: Math.round(doneProgress * job.expectedResultCount * 100),
      resultCount: Math.round(doneProgress * job.expectedResultCount),
      runDuration: job.runDuration + this.runDurationStep,
    });
  }

  private listJobs(params: QueryParams = {}): unknown {
    const all = this.store.list();
    const count = Number(params.count ?? 50);
    const offset = Number(params.offset ?? 0);
    const page = count === 0 ? all.slice(offset) : all.slice(offset, offset + count);
    return {
      entry: page.map((job) => this.toEntry(job)),
      paging: { total: all.length, perPage: count, offset },
    };
  }

  private toEntry(job: StoredJob) {
    return {
      name: job.sid,
      content: {
        sid: job.sid,
        dispatchState: job.dispatchState,
        doneProgress: job.doneProgress,
        eventCount: job.eventCount,
        resultCount: job.resultCount,
        scanCount: job.scanCount,
        runDuration: job.runDuration,
        isDone: job.isDone,
        isFailed: job.isFailed,
        isPaused: job.isPaused,
        ttl: job.ttl,
        messages: job.messages.map((m) => ({ ...m })),
      },
    };
  }
}
