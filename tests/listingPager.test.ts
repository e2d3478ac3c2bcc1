import { ListingPager } from '../src/application/services/ListingPager.js';
import { decodeJobListing } from '../src/core/decoding/ListingDecoder.js';
import { MalformedStatusError, ValidationError } from '../src/core/errors.js';
import { InMemoryJobStore } from '../src/infrastructure/memory/InMemoryJobStore.js';
import { InMemorySearchTransport } from '../src/infrastructure/memory/InMemorySearchTransport.js';

describe('decodeJobListing', () => {
  test('should decode named entries with paging', () => {
    const listing = decodeJobListing({
      entry: [
        { name: 'job-a', content: { dispatchState: 'RUNNING', doneProgress: 0.4, resultCount: '12', isPaused: false } },
        { content: { sid: 'job-b', dispatchState: 'DONE', runDuration: 3.5 } },
      ],
      paging: { total: 12 },
    });

    expect(listing.total).toBe(12);
    expect(listing.summaries).toEqual([
      {
        identifier: 'job-a',
        state: 'RUNNING',
        progressFraction: 0.4,
        eventCount: 0,
        resultCount: 12,
        runDurationSeconds: 0,
        isPaused: false,
      },
      {
        identifier: 'job-b',
        state: 'DONE',
        progressFraction: 0,
        eventCount: 0,
        resultCount: 0,
        runDurationSeconds: 3.5,
        isPaused: false,
      },
    ]);
  });

  test('should accept a bare array of flat entries', () => {
    const listing = decodeJobListing([{ sid: 'flat-1', dispatchState: 'PAUSED', isPaused: 1 }]);

    expect(listing.total).toBeNull();
    expect(listing.summaries[0]).toMatchObject({ identifier: 'flat-1', state: 'PAUSED', isPaused: true });
  });

  test('should reject entries without an identifier', () => {
    expect(() => decodeJobListing({ entry: [{ content: { dispatchState: 'DONE' } }] })).toThrow(
      'Job listing entry carries no job identifier'
    );
  });

  test('should reject a response without an entry list', () => {
    expect(() => decodeJobListing({ jobs: [] })).toThrow(MalformedStatusError);
    expect(() => decodeJobListing({ jobs: [] })).toThrow('Invalid job listing response: no entry list');
  });
});

describe('ListingPager', () => {
  let store: InMemoryJobStore;
  let transport: InMemorySearchTransport;
  let pager: ListingPager;

  const seed = (count: number) => {
    for (let i = 1; i <= count; i++) {
      store.create(`search index=main ${i}`, { sid: `job-${i}` });
    }
  };

  beforeEach(() => {
    store = new InMemoryJobStore();
    transport = new InMemorySearchTransport(store);
    pager = new ListingPager(transport);
  });

  describe('fetchPage', () => {
    test('should request the default page', async () => {
      seed(5);

      const page = await pager.fetchPage();

      expect(transport.calls).toEqual([
        { method: 'GET', path: '/search/v2/jobs', params: { count: 50, offset: 0 } },
      ]);
      expect(page.summaries.map((s) => s.identifier)).toEqual(['job-1', 'job-2', 'job-3', 'job-4', 'job-5']);
      expect(page).toMatchObject({ offset: 0, count: 50, total: 5 });
    });

    test('should pass count and offset through', async () => {
      seed(5);

      const page = await pager.fetchPage({ count: 2, offset: 3 });

      expect(page.summaries.map((s) => s.identifier)).toEqual(['job-4', 'job-5']);
    });

    test('should validate the request before calling the service', async () => {
      await expect(pager.fetchPage({ count: -1 })).rejects.toBeInstanceOf(ValidationError);
      await expect(pager.fetchPage({ offset: 1.5 })).rejects.toThrow('offset must be a non-negative integer, got 1.5');
      expect(transport.calls).toHaveLength(0);
    });
  });

  describe('listActive', () => {
    test('should keep only jobs still doing work', async () => {
      store.create('a', { sid: 'queued' });
      store.create('b', { sid: 'done', dispatchState: 'DONE' });
      store.create('c', { sid: 'paused', dispatchState: 'PAUSED' });
      store.create('d', { sid: 'running', dispatchState: 'RUNNING' });

      const active = await pager.listActive();

      expect(active.map((s) => s.identifier)).toEqual(['queued', 'running']);
    });
  });

  describe('iterate', () => {
    test('should stop on a short page', async () => {
      seed(5);

      const jobs = await pager.collect({ pageSize: 2 });

      expect(jobs).toHaveLength(5);
      expect(transport.calls.map((call) => call.params)).toEqual([
        { count: 2, offset: 0 },
        { count: 2, offset: 2 },
        { count: 2, offset: 4 },
      ]);
    });

    test('should stop once the reported total is reached', async () => {
      seed(4);

      const jobs = await pager.collect({ pageSize: 2 });

      expect(jobs.map((s) => s.identifier)).toEqual(['job-1', 'job-2', 'job-3', 'job-4']);
      expect(transport.calls).toHaveLength(2);
    });

    test('should honour the limit', async () => {
      seed(5);

      const jobs = await pager.collect({ pageSize: 2, limit: 3 });

      expect(jobs.map((s) => s.identifier)).toEqual(['job-1', 'job-2', 'job-3']);
      expect(transport.calls).toHaveLength(2);
    });

    test('should start from the given offset', async () => {
      seed(5);

      const jobs = await pager.collect({ pageSize: 10, offset: 3 });

      expect(jobs.map((s) => s.identifier)).toEqual(['job-4', 'job-5']);
    });

    test('should reject a zero page size', async () => {
      await expect(pager.collect({ pageSize: 0 })).rejects.toThrow('pageSize must be greater than 0');
    });
  });
});
