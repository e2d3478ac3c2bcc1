import fetch, { RequestInit, Response } from 'node-fetch';
import { NetworkError, RequestAbortedError, TransportError, transportErrorForStatus } from '../../core/errors.js';
import { FormFields, ISearchTransport, QueryParams } from '../../core/interfaces/ISearchTransport.js';
import { isRecord } from '../../core/decoding/coerce.js';
import { JOBS_PATH } from '../../utils/jobPaths.js';
import { withRetry, CircuitBreaker, DEFAULT_RETRY_CONFIG, RetryConfig, RetryLog, isRetryableError } from '../../utils/retry.js';

export interface SearchApiCredentials {
  token?: string;
  username?: string;
  password?: string;
}

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface SearchApiClientOptions {
  circuitBreaker?: CircuitBreaker;
  retryConfig?: RetryConfig;
  defaultTimeoutMs?: number;
  fetchImpl?: FetchLike;
  onRetryLog?: (log: RetryLog) => void;
}

export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

type Method = 'GET' | 'POST' | 'DELETE';

/**
 * Pull the first readable message out of an error body: { messages: [{ type, text }] }
 */
export function extractErrorMessage(body: unknown): string | undefined {
  if (!isRecord(body) || !Array.isArray(body.messages)) {
    return undefined;
  }
  for (const message of body.messages) {
    if (isRecord(message) && typeof message.text === 'string' && message.text.length > 0) {
      return message.text;
    }
  }
  return undefined;
}

function toFormBody(data: FormFields): URLSearchParams {
  const body = new URLSearchParams();
  for (const [key, value] of Object.entries(data)) {
    if (value !== undefined) {
      body.append(key, String(value));
    }
  }
  return body;
}

/**
 * Search service REST client.
 *
 * Every request asks for JSON output, runs through exponential-backoff retry
 * for retryable failures (network, 429, 5xx) and sits behind a circuit
 * breaker that ignores client errors such as 404.
 */
export class SearchApiClient implements ISearchTransport {
  private baseUrl: string;
  private circuitBreaker: CircuitBreaker;
  private retryConfig: RetryConfig;
  private defaultTimeoutMs: number;
  private fetchImpl: FetchLike;
  private onRetryLog?: (log: RetryLog) => void;

  constructor(
    baseUrl: string,
    private credentials: SearchApiCredentials,
    options: SearchApiClientOptions = {}
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.circuitBreaker = options.circuitBreaker || new CircuitBreaker(5, 60000, isRetryableError);
    this.retryConfig = options.retryConfig || DEFAULT_RETRY_CONFIG;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl || fetch;
    this.onRetryLog = options.onRetryLog;
  }

  async get(path: string, params: QueryParams = {}, timeoutMs?: number, signal?: AbortSignal): Promise<unknown> {
    return this.request('GET', path, { params, timeoutMs, signal });
  }

  async post(path: string, data: FormFields = {}, timeoutMs?: number): Promise<unknown> {
    return this.request('POST', path, { data, timeoutMs });
  }

  async delete(path: string, timeoutMs?: number): Promise<unknown> {
    return this.request('DELETE', path, { timeoutMs });
  }

  /**
   * True when the job listing endpoint answers
   */
  async healthCheck(): Promise<boolean> {
    try {
      await this.get(JOBS_PATH, { count: 1 });
      return true;
    } catch (error) {
      return false;
    }
  }

  getCircuitBreakerState() {
    return this.circuitBreaker.getState();
  }

  getCircuitBreakerStats() {
    return this.circuitBreaker.getStats();
  }

  buildUrl(path: string, params: QueryParams = {}): string {
    const url = new URL(`${this.baseUrl}${path.startsWith('/') ? path : `/${path}`}`);
    url.searchParams.set('output_mode', 'json');
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }

  private authHeaders(): Record<string, string> {
    if (this.credentials.token) {
      return { Authorization: `Bearer ${this.credentials.token}` };
    }
    if (this.credentials.username && this.credentials.password !== undefined) {
      const encoded = Buffer.from(`${this.credentials.username}:${this.credentials.password}`).toString('base64');
      return { Authorization: `Basic ${encoded}` };
    }
    return {};
  }

  private async request(
    method: Method,
    path: string,
    options: { params?: QueryParams; data?: FormFields; timeoutMs?: number; signal?: AbortSignal }
  ): Promise<unknown> {
    const url = this.buildUrl(path, options.params);
    const timeout = options.timeoutMs ?? this.defaultTimeoutMs;
    const operation = `${method} ${path}`;
    const { signal } = options;
    const ensureNotAborted = () => {
      if (signal?.aborted) {
        throw new RequestAbortedError(`Request aborted for ${operation}`, { operation });
      }
    };

    ensureNotAborted();
    return this.circuitBreaker.execute(async () => {
      return withRetry(
        async () => {
          // Checked per attempt: an abort during backoff stops the next try
          ensureNotAborted();
          let res: Response;
          try {
            res = await this.fetchImpl(url, {
              method,
              headers: {
                Accept: 'application/json',
                ...this.authHeaders(),
              },
              body: options.data ? toFormBody(options.data) : undefined,
              timeout,
            });
          } catch (error) {
            throw new NetworkError(
              `Request failed for ${operation}: ${error instanceof Error ? error.message : String(error)}`,
              { operation, cause: error }
            );
          }

          const body = await this.parseBody(res, operation);
          if (!res.ok) {
            const message = extractErrorMessage(body) || `HTTP ${res.status} ${res.statusText}`.trim();
            throw transportErrorForStatus(res.status, message, operation);
          }
          return body;
        },
        { ...this.retryConfig, timeoutMs: Math.max(this.retryConfig.timeoutMs, timeout) },
        this.onRetryLog,
        (error) => !signal?.aborted && isRetryableError(error)
      );
    });
  }

  private async parseBody(res: Response, operation: string): Promise<unknown> {
    const text = await res.text();
    if (text.trim().length === 0) {
      return {};
    }
    try {
      return JSON.parse(text);
    } catch (error) {
      if (!res.ok) {
        // Error pages are often HTML; the status code carries the meaning
        return {};
      }
      throw new TransportError(`Invalid JSON in response to ${operation}`, {
        statusCode: res.status,
        operation,
        cause: error,
      });
    }
  }
}
