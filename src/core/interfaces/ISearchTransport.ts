export type QueryParams = Record<string, string | number | boolean | undefined>;

export type FormFields = Record<string, string | number | boolean | undefined>;

/**
 * Authenticated request/response access to the search service.
 *
 * Implementations return the parsed response body and throw a TransportError
 * (or subclass) for network, auth and HTTP failures. Retrying transient
 * failures is the transport's job, not the caller's.
 */
export interface ISearchTransport {
  /**
   * @param signal - once aborted, no further attempts are made and the call
   *   rejects with RequestAbortedError
   */
  get(path: string, params?: QueryParams, timeoutMs?: number, signal?: AbortSignal): Promise<unknown>;

  post(path: string, data?: FormFields, timeoutMs?: number): Promise<unknown>;

  delete(path: string, timeoutMs?: number): Promise<unknown>;
}
