import { JobLifecycleClient } from '../src/application/services/JobLifecycleClient.js';
import { StatusSnapshot } from '../src/core/entities/StatusSnapshot.js';
import {
  JobFailedError,
  NotFoundError,
  PollTimeoutError,
  ServerError,
  ValidationError,
} from '../src/core/errors.js';
import { ISearchTransport } from '../src/core/interfaces/ISearchTransport.js';
import { InMemoryJobStore } from '../src/infrastructure/memory/InMemoryJobStore.js';
import { InMemorySearchTransport } from '../src/infrastructure/memory/InMemorySearchTransport.js';

describe('JobLifecycleClient', () => {
  let now: number;
  let store: InMemoryJobStore;
  let transport: InMemorySearchTransport;
  let client: JobLifecycleClient;
  let log: jest.Mock<void, [string]>;
  let sleep: jest.Mock<Promise<void>, [number, AbortSignal?]>;

  const build = (progressStep: number, defaultPollIntervalSeconds?: number) => {
    transport = new InMemorySearchTransport(store, { progressStep });
    client = new JobLifecycleClient(transport, {
      clock: { now: () => now },
      sleep,
      log,
      defaultPollIntervalSeconds,
    });
  };

  beforeEach(() => {
    now = 0;
    store = new InMemoryJobStore(() => 1700000000000);
    log = jest.fn();
    sleep = jest.fn(async (ms: number, _signal?: AbortSignal) => {
      now += ms;
    });
    build(0);
  });

  describe('fetchStatus', () => {
    test('should read and decode a single status', async () => {
      store.create('index=main', { sid: 'job-1', ttl: 300 });

      const snapshot = await client.fetchStatus('job-1');

      expect(snapshot).toBeInstanceOf(StatusSnapshot);
      expect(snapshot).toMatchObject({ identifier: 'job-1', state: 'QUEUED', ttlSeconds: 300 });
      expect(transport.calls).toEqual([{ method: 'GET', path: '/search/v2/jobs/job-1', params: undefined }]);
    });

    test('should percent-encode identifiers as one path segment', async () => {
      store.create('index=main', { sid: 'scheduler__admin search/1' });

      const snapshot = await client.fetchStatus('scheduler__admin search/1');

      expect(transport.calls[0].path).toBe('/search/v2/jobs/scheduler__admin%20search%2F1');
      expect(snapshot.identifier).toBe('scheduler__admin search/1');
    });

    test('should reject an empty identifier without a request', async () => {
      await expect(client.fetchStatus('  ')).rejects.toThrow(new ValidationError('Job identifier is required'));
      expect(transport.calls).toHaveLength(0);
    });

    test('should surface unknown jobs as NotFoundError', async () => {
      await expect(client.fetchStatus('ghost')).rejects.toBeInstanceOf(NotFoundError);
    });

    test('should propagate transport failures unchanged', async () => {
      const failure = new ServerError('Service down', { statusCode: 503 });
      const failing: ISearchTransport = {
        get: jest.fn().mockRejectedValue(failure),
        post: jest.fn(),
        delete: jest.fn(),
      };

      await expect(new JobLifecycleClient(failing, { log }).fetchStatus('job-1')).rejects.toBe(failure);
    });

    test('should hand the abort signal to the transport', async () => {
      const get = jest.fn().mockResolvedValue({ dispatchState: 'DONE' });
      const recording: ISearchTransport = { get, post: jest.fn(), delete: jest.fn() };
      const controller = new AbortController();

      await new JobLifecycleClient(recording, { log }).fetchStatus('job-1', controller.signal);

      expect(get).toHaveBeenCalledWith('/search/v2/jobs/job-1', undefined, undefined, controller.signal);
    });
  });

  describe('pollUntilTerminal', () => {
    test('should follow a job to DONE', async () => {
      build(0.5, 2);
      store.create('index=main', { sid: 'job-1', expectedResultCount: 40 });
      const states: string[] = [];

      const snapshot = await client.pollUntilTerminal('job-1', {
        timeoutSeconds: 30,
        onProgress: (progress) => {
          states.push(progress.state);
        },
      });

      expect(snapshot).toMatchObject({ state: 'DONE', progressFraction: 1, resultCount: 40, runDurationSeconds: 1 });
      expect(states).toEqual(['RUNNING', 'DONE']);
      expect(sleep).toHaveBeenCalledTimes(1);
      expect(sleep.mock.calls[0][0]).toBe(2000);
    });

    test('should throw JobFailedError with the diagnostic messages', async () => {
      store.create('index=main | bogus', { sid: 'job-1' });
      store.fail('job-1', [{ type: 'error', text: 'Unknown search command bogus' }]);

      const error = await client.pollUntilTerminal('job-1', { timeoutSeconds: 10 }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(JobFailedError);
      expect(error).toMatchObject({
        message: 'Search job job-1 failed (FAILED): Unknown search command bogus',
        dispatchState: 'FAILED',
        messages: [{ severity: 'ERROR', text: 'Unknown search command bogus' }],
      });
      expect(transport.calls).toHaveLength(1);
    });

    test('should throw PollTimeoutError while the job is still running', async () => {
      store.create('index=main', { sid: 'job-1' });

      const error = await client
        .pollUntilTerminal('job-1', { timeoutSeconds: 3, pollIntervalSeconds: 1 })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PollTimeoutError);
      expect(error).toMatchObject({
        message: 'Search job job-1 did not complete within 3s (waited 3.0s)',
        elapsedSeconds: 3,
        timeoutSeconds: 3,
      });
      expect(transport.calls).toHaveLength(4);
    });

    test('should return a paused job', async () => {
      store.create('index=main', { sid: 'job-1', dispatchState: 'RUNNING' });
      await client.pause('job-1');

      const snapshot = await client.pollUntilTerminal('job-1', { timeoutSeconds: 10 });

      expect(snapshot.state).toBe('PAUSED');
      expect(snapshot.isPaused).toBe(true);
    });

    test('should report the outcome without throwing', async () => {
      store.create('index=main', { sid: 'job-1' });

      const outcome = await client.waitForOutcome('job-1', { timeoutSeconds: 1, pollIntervalSeconds: 1 });

      expect(outcome.kind).toBe('timed-out');
    });

    test('should validate the identifier before polling', async () => {
      await expect(client.pollUntilTerminal('', { timeoutSeconds: 10 })).rejects.toBeInstanceOf(ValidationError);
      expect(transport.calls).toHaveLength(0);
    });
  });

  describe('Control operations', () => {
    beforeEach(() => {
      store.create('index=main', { sid: 'job-1', dispatchState: 'RUNNING', doneProgress: 0.4, expectedResultCount: 50 });
    });

    test.each([
      ['pause', 'pause'],
      ['resume', 'unpause'],
      ['finalize', 'finalize'],
      ['touch', 'touch'],
    ] as const)('%s should post action=%s to the control endpoint', async (operation, action) => {
      const accepted = await client[operation]('job-1');

      expect(accepted).toBe(true);
      expect(transport.calls).toEqual([
        { method: 'POST', path: '/search/v2/jobs/job-1/control', data: { action } },
      ]);
    });

    test('should post the ttl with setttl', async () => {
      await expect(client.setExpiry('job-1', 120)).resolves.toBe(true);

      expect(transport.calls[0]).toEqual({
        method: 'POST',
        path: '/search/v2/jobs/job-1/control',
        data: { action: 'setttl', ttl: 120 },
      });
      expect((await client.fetchStatus('job-1')).ttlSeconds).toBe(120);
    });

    test('should reject an invalid ttl without a request', async () => {
      await expect(client.setExpiry('job-1', -1)).rejects.toBeInstanceOf(ValidationError);
      await expect(client.setExpiry('job-1', 1.5)).rejects.toThrow(
        'ttl must be a non-negative integer number of seconds, got 1.5'
      );
      expect(transport.calls).toHaveLength(0);
    });

    test('should pause and resume a running job', async () => {
      await client.pause('job-1');
      expect((await client.fetchStatus('job-1')).state).toBe('PAUSED');

      await client.resume('job-1');
      expect((await client.fetchStatus('job-1')).state).toBe('RUNNING');
    });

    test('should keep partial results when finalizing', async () => {
      await client.finalize('job-1');

      const snapshot = await client.fetchStatus('job-1');

      expect(snapshot).toMatchObject({ state: 'DONE', isDone: true, resultCount: 20 });
    });

    test('should cancel a job', async () => {
      await expect(client.cancel('job-1')).resolves.toBe(true);
      expect(store.has('job-1')).toBe(false);
    });

    test('should treat cancelling a job that is already gone as success', async () => {
      await expect(client.cancel('ghost')).resolves.toBe(true);
      expect(log).toHaveBeenCalledWith('[JobLifecycle] Job ghost already gone, treating cancel as done');
    });

    test('should not hide other failures on cancel', async () => {
      const failure = new ServerError('Internal error');
      const failing: ISearchTransport = {
        get: jest.fn(),
        post: jest.fn().mockRejectedValue(failure),
        delete: jest.fn(),
      };

      await expect(new JobLifecycleClient(failing, { log }).cancel('job-1')).rejects.toBe(failure);
    });

    test('should surface unknown jobs for other actions', async () => {
      await expect(client.pause('ghost')).rejects.toBeInstanceOf(NotFoundError);
    });

    test('should delete a job', async () => {
      await expect(client.delete('job-1')).resolves.toBe(true);

      expect(transport.calls).toEqual([{ method: 'DELETE', path: '/search/v2/jobs/job-1' }]);
      await expect(client.fetchStatus('job-1')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('Listing and summary', () => {
    beforeEach(() => {
      store.create('a', { sid: 'job-1' });
      store.create('b', { sid: 'job-2', dispatchState: 'DONE' });
    });

    test('should list jobs', async () => {
      const jobs = await client.listJobs({ count: 10 });

      expect(jobs.map((job) => [job.identifier, job.state])).toEqual([
        ['job-1', 'QUEUED'],
        ['job-2', 'DONE'],
      ]);
    });

    test('should list active jobs', async () => {
      const jobs = await client.listActive();

      expect(jobs.map((job) => job.identifier)).toEqual(['job-1']);
      expect(transport.calls[0].params).toEqual({ count: 50, offset: 0 });
    });

    test('should return the job summary', async () => {
      const summary = await client.getSummary('job-2');

      expect(summary).toEqual({
        fields: {},
        event_count: 0,
        earliest_time: new Date(1700000000000).toISOString(),
      });
      expect(transport.calls[0].path).toBe('/search/v2/jobs/job-2/summary');
    });
  });
});
