import { DiagnosticMessage } from './entities/StatusSnapshot.js';

/**
 * Base class for every error raised by the job lifecycle layer
 */
export class SearchJobError extends Error {
  readonly details: Record<string, unknown>;

  constructor(message: string, details: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SearchJobError';
    this.details = details;
  }
}

/**
 * A precondition failed before any request was made
 */
export class ValidationError extends SearchJobError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, details);
    this.name = 'ValidationError';
  }
}

export interface TransportErrorOptions {
  statusCode?: number;
  operation?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Network, auth or HTTP failure reported by the transport
 */
export class TransportError extends SearchJobError {
  readonly statusCode?: number;
  readonly operation?: string;

  constructor(message: string, options: TransportErrorOptions = {}) {
    super(message, options.details ?? {}, { cause: options.cause });
    this.name = 'TransportError';
    this.statusCode = options.statusCode;
    this.operation = options.operation;
  }

  /**
   * Whether a retry could reasonably succeed
   */
  get retryable(): boolean {
    return false;
  }
}

export class AuthenticationError extends TransportError {
  constructor(message: string, options: TransportErrorOptions = {}) {
    super(message, { statusCode: 401, ...options });
    this.name = 'AuthenticationError';
  }
}

export class AuthorizationError extends TransportError {
  constructor(message: string, options: TransportErrorOptions = {}) {
    super(message, { statusCode: 403, ...options });
    this.name = 'AuthorizationError';
  }
}

export class NotFoundError extends TransportError {
  constructor(message: string, options: TransportErrorOptions = {}) {
    super(message, { statusCode: 404, ...options });
    this.name = 'NotFoundError';
  }
}

export class RateLimitError extends TransportError {
  constructor(message: string, options: TransportErrorOptions = {}) {
    super(message, { statusCode: 429, ...options });
    this.name = 'RateLimitError';
  }

  override get retryable(): boolean {
    return true;
  }
}

export class ServerError extends TransportError {
  constructor(message: string, options: TransportErrorOptions = {}) {
    super(message, { statusCode: 500, ...options });
    this.name = 'ServerError';
  }

  override get retryable(): boolean {
    return true;
  }
}

/**
 * No response at all (connection refused, DNS, socket timeout)
 */
export class NetworkError extends TransportError {
  constructor(message: string, options: TransportErrorOptions = {}) {
    super(message, options);
    this.name = 'NetworkError';
  }

  override get retryable(): boolean {
    return true;
  }
}

/**
 * The caller's AbortSignal fired before the request could complete
 */
export class RequestAbortedError extends TransportError {
  constructor(message: string, options: TransportErrorOptions = {}) {
    super(message, options);
    this.name = 'RequestAbortedError';
  }
}

export class CircuitOpenError extends TransportError {
  constructor(message: string, options: TransportErrorOptions = {}) {
    super(message, options);
    this.name = 'CircuitOpenError';
  }
}

/**
 * Map an HTTP status code onto the matching transport error class
 */
export function transportErrorForStatus(
  statusCode: number,
  message: string,
  operation?: string
): TransportError {
  const options = { statusCode, operation };
  switch (statusCode) {
    case 401:
      return new AuthenticationError(message, options);
    case 403:
      return new AuthorizationError(message, options);
    case 404:
      return new NotFoundError(message, options);
    case 429:
      return new RateLimitError(message, options);
    default:
      if (statusCode >= 500) {
        return new ServerError(message, options);
      }
      return new TransportError(message, options);
  }
}

/**
 * The response was reachable but its dispatch state cannot be trusted
 */
export class MalformedStatusError extends SearchJobError {
  readonly rawState: unknown;

  constructor(message: string, rawState: unknown, details: Record<string, unknown> = {}) {
    super(message, { ...details, rawState });
    this.name = 'MalformedStatusError';
    this.rawState = rawState;
  }
}

/**
 * The remote job finished with a failure outcome
 */
export class JobFailedError extends SearchJobError {
  readonly identifier: string;
  readonly dispatchState: string;
  readonly messages: ReadonlyArray<DiagnosticMessage>;

  constructor(identifier: string, dispatchState: string, messages: ReadonlyArray<DiagnosticMessage>) {
    const firstText = messages.length > 0 ? `: ${messages[0].text}` : '';
    super(`Search job ${identifier} failed (${dispatchState})${firstText}`, {
      identifier,
      dispatchState,
      messages: messages.map((m) => ({ ...m })),
    });
    this.name = 'JobFailedError';
    this.identifier = identifier;
    this.dispatchState = dispatchState;
    this.messages = messages.map((m) => ({ ...m }));
  }
}

/**
 * Gave up waiting while the job was still active. The job may still finish later.
 */
export class PollTimeoutError extends SearchJobError {
  readonly identifier: string;
  readonly elapsedSeconds: number;
  readonly timeoutSeconds: number;

  constructor(identifier: string, elapsedSeconds: number, timeoutSeconds: number) {
    super(
      `Search job ${identifier} did not complete within ${timeoutSeconds}s (waited ${elapsedSeconds.toFixed(1)}s)`,
      { identifier, elapsedSeconds, timeoutSeconds }
    );
    this.name = 'PollTimeoutError';
    this.identifier = identifier;
    this.elapsedSeconds = elapsedSeconds;
    this.timeoutSeconds = timeoutSeconds;
  }
}

/**
 * The caller aborted the wait through its AbortSignal
 */
export class PollAbortedError extends SearchJobError {
  readonly identifier: string;
  readonly elapsedSeconds: number;

  constructor(identifier: string, elapsedSeconds: number) {
    super(`Wait for search job ${identifier} was aborted after ${elapsedSeconds.toFixed(1)}s`, {
      identifier,
      elapsedSeconds,
    });
    this.name = 'PollAbortedError';
    this.identifier = identifier;
    this.elapsedSeconds = elapsedSeconds;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
