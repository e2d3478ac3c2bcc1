/**
 * Retry and Circuit Breaker patterns for calls to the search service
 */

import { CircuitOpenError, NetworkError, TransportError } from '../core/errors.js';

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  timeoutMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 500,
  maxDelayMs: 8000,
  multiplier: 2,
  timeoutMs: 30000,
};

export interface RetryLog {
  timestamp: Date;
  attempt: number;
  delay: number;
  success: boolean;
  error?: string;
  nextRetryInMs?: number;
}

/**
 * Executes a function with exponential backoff retry logic.
 *
 * Errors rejected by `shouldRetry` are rethrown immediately; once attempts run
 * out the last error is rethrown as-is so callers still see its class.
 * @param onLog - Optional callback for retry logging
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  onLog?: (log: RetryLog) => void,
  shouldRetry: (error: unknown) => boolean = isRetryableError
): Promise<T> {
  let lastError: unknown = null;
  let lastDelay = config.initialDelayMs;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    try {
      const result = await withTimeout(fn(), config.timeoutMs);

      if (onLog) {
        onLog({
          timestamp: new Date(),
          attempt,
          delay: 0,
          success: true,
        });
      }

      return result;
    } catch (error) {
      lastError = error;
      const willRetry = attempt < config.maxAttempts && shouldRetry(error);

      if (onLog) {
        onLog({
          timestamp: new Date(),
          attempt,
          delay: lastDelay,
          success: false,
          error: error instanceof Error ? error.message : String(error),
          nextRetryInMs: willRetry ? lastDelay : undefined,
        });
      }

      if (!willRetry) {
        break;
      }

      await sleep(lastDelay);

      // Exponential backoff
      lastDelay = Math.min(lastDelay * config.multiplier, config.maxDelayMs);
    }
  }

  throw lastError;
}

/**
 * Race a promise against a timer; the timer is always cleared. Losing the race
 * rejects with a retryable NetworkError.
 */
async function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new NetworkError(`Timeout after ${timeoutMs}ms`)), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timer);
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Circuit Breaker Pattern
 * Stops sending requests while the service keeps failing
 */
export class CircuitBreaker {
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime: number | null = null;
  private state: 'closed' | 'open' | 'half-open' = 'closed';
  private logs: Array<{ timestamp: Date; state: string; reason: string }> = [];

  /**
   * @param countsAsFailure - errors for which this returns false (a 404, a bad
   *   request) pass through without moving the breaker
   */
  constructor(
    private failureThreshold: number = 5,
    private resetTimeout: number = 60000,
    private countsAsFailure: (error: unknown) => boolean = () => true
  ) {}

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === 'open') {
      const now = Date.now();
      if (this.lastFailureTime && now - this.lastFailureTime > this.resetTimeout) {
        this.state = 'half-open';
        this.logStateChange('half-open', 'Reset timeout reached');
        this.successCount = 0;
      } else {
        throw new CircuitOpenError(
          `Circuit breaker is OPEN. Search service is temporarily unavailable. Try again in ${this.resetTimeout - (now - (this.lastFailureTime || now))}ms`
        );
      }
    }

    try {
      const result = await fn();

      if (this.state === 'half-open') {
        this.successCount++;
        if (this.successCount >= 2) {
          // Two successes in half-open close the circuit
          this.state = 'closed';
          this.failureCount = 0;
          this.logStateChange('closed', 'Recovered from temporary failure');
        }
      } else if (this.state === 'closed') {
        this.failureCount = Math.max(0, this.failureCount - 1);
      }

      return result;
    } catch (error) {
      if (this.countsAsFailure(error)) {
        this.onFailure();
      }
      throw error;
    }
  }

  private onFailure() {
    this.failureCount++;
    this.lastFailureTime = Date.now();

    if (this.state === 'half-open') {
      this.state = 'open';
      this.logStateChange('open', 'Failed while in half-open state');
    } else if (this.failureCount >= this.failureThreshold) {
      this.state = 'open';
      this.logStateChange('open', `Failure threshold (${this.failureThreshold}) reached`);
    }
  }

  private logStateChange(newState: string, reason: string) {
    this.logs.push({
      timestamp: new Date(),
      state: newState,
      reason,
    });

    // Keep last 100 logs
    if (this.logs.length > 100) {
      this.logs = this.logs.slice(-100);
    }
  }

  getState(): 'closed' | 'open' | 'half-open' {
    return this.state;
  }

  getStats() {
    return {
      state: this.state,
      failureCount: this.failureCount,
      successCount: this.successCount,
      lastFailureTime: this.lastFailureTime ? new Date(this.lastFailureTime) : null,
      logs: this.logs,
    };
  }

  /**
   * Reset circuit breaker manually
   */
  reset() {
    this.state = 'closed';
    this.failureCount = 0;
    this.successCount = 0;
    this.lastFailureTime = null;
    this.logStateChange('closed', 'Manual reset');
  }
}

/**
 * Check if an error is worth retrying
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof TransportError) {
    return error.retryable;
  }

  const errorMessage = error instanceof Error ? error.message.toLowerCase() : '';

  const retryablePatterns = [
    'timeout',
    'econnrefused',
    'econnreset',
    'service unavailable',
    'temporarily unavailable',
    'connection refused',
    'getaddrinfo enotfound',
    'socket hang up',
  ];

  return retryablePatterns.some((pattern) => errorMessage.includes(pattern));
}
