/**
 * Shared request types.
 *
 * The core only ever talks to remote services through a `MakeRequestFn`.
 * How that function authenticates is decided by whoever constructs it.
 */

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * HTTP fetch function signature for dependency injection (testability).
 * Defaults to globalThis.fetch in production.
 */
export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export type RequestOptions = {
  /** Query string parameters appended to the URL */
  params?: Record<string, string>;
  /** JSON-serializable request body */
  body?: unknown;
};

/**
 * Authenticated request capability handed to every remote client.
 */
export type MakeRequestFn = (
  method: HttpMethod,
  url: string,
  options?: RequestOptions,
) => Promise<Response>;

/**
 * A request that has been fully described but not sent yet.
 * Lets the retrying executor re-send the same request on transient failures.
 */
export type PreparedRequest = {
  method: HttpMethod;
  url: string;
  options?: RequestOptions;
  /** Human-readable description used in logs and error messages */
  description: string;
};

export type CreateRequestFnOptions = {
  /** Headers sent with every request (credentials live here) */
  headers: Record<string, string>;
  fetchFn?: FetchFn;
};
