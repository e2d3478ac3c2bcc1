import { isActiveState } from '../../core/entities/JobState.js';
import { JobListingPage, JobSummary } from '../../core/entities/JobSummary.js';
import { decodeJobListing } from '../../core/decoding/ListingDecoder.js';
import { ValidationError } from '../../core/errors.js';
import { ISearchTransport } from '../../core/interfaces/ISearchTransport.js';
import { JOBS_PATH } from '../../utils/jobPaths.js';

export const DEFAULT_PAGE_SIZE = 50;

export interface PageRequest {
  count?: number;
  offset?: number;
}

export interface IterateOptions {
  pageSize?: number;
  offset?: number;
  limit?: number; // stop after this many jobs
}

function requireNonNegativeInt(value: number, field: string): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(`${field} must be a non-negative integer, got ${value}`, { field });
  }
  return value;
}

/**
 * Pages through the job listing endpoint
 */
export class ListingPager {
  constructor(
    private transport: ISearchTransport,
    private requestTimeoutMs?: number
  ) {}

  async fetchPage(request: PageRequest = {}): Promise<JobListingPage> {
    const count = requireNonNegativeInt(request.count ?? DEFAULT_PAGE_SIZE, 'count');
    const offset = requireNonNegativeInt(request.offset ?? 0, 'offset');

    const raw = await this.transport.get(JOBS_PATH, { count, offset }, this.requestTimeoutMs);
    const { summaries, total } = decodeJobListing(raw);
    return { summaries, offset, count, total };
  }

  async listActive(request: PageRequest = {}): Promise<JobSummary[]> {
    const page = await this.fetchPage(request);
    return page.summaries.filter((summary) => isActiveState(summary.state));
  }

  /**
   * Walk every page until a short page, the reported total, or `limit`
   */
  async *iterate(options: IterateOptions = {}): AsyncGenerator<JobSummary> {
    const pageSize = requireNonNegativeInt(options.pageSize ?? DEFAULT_PAGE_SIZE, 'pageSize');
    if (pageSize === 0) {
      throw new ValidationError('pageSize must be greater than 0', { field: 'pageSize' });
    }
    const limit = options.limit;
    let offset = requireNonNegativeInt(options.offset ?? 0, 'offset');
    let yielded = 0;

    for (;;) {
      const page = await this.fetchPage({ count: pageSize, offset });
      for (const summary of page.summaries) {
        if (limit !== undefined && yielded >= limit) return;
        yield summary;
        yielded++;
      }

      offset += page.summaries.length;
      if (page.summaries.length < pageSize) return;
      if (page.total !== null && offset >= page.total) return;
      if (limit !== undefined && yielded >= limit) return;
    }
  }

  async collect(options: IterateOptions = {}): Promise<JobSummary[]> {
    const jobs: JobSummary[] = [];
    for await (const summary of this.iterate(options)) {
      jobs.push(summary);
    }
    return jobs;
  }
}
