import type { CreateRequestFnOptions, MakeRequestFn, RequestOptions } from './http.types';

/**
 * Appends query parameters to a URL, keeping any that are already present.
 */
export function buildUrl(url: string, params?: Record<string, string>): string {
  if (!params || Object.keys(params).length === 0) {
    return url;
  }
  const target = new URL(url);
  for (const [key, value] of Object.entries(params)) {
    target.searchParams.set(key, value);
  }
  return target.toString();
}

/**
 * Builds a `MakeRequestFn` over fetch that sends the given headers on every
 * call and JSON-encodes request bodies.
 *
 * @example
 * const request = createRequestFn({
 *   headers: { 'X-API-TOKEN': 'test-token', Accept: 'application/json' },
 * });
 * const response = await request('GET', 'https://ca1.qualtrics.com/API/v3/whoami');
 */
export function createRequestFn(options: CreateRequestFnOptions): MakeRequestFn {
  const fetchFn = options.fetchFn ?? globalThis.fetch.bind(globalThis);

  return async (method, url, requestOptions?: RequestOptions) => {
    const headers: Record<string, string> = { ...options.headers };
    const init: RequestInit = { method, headers };

    if (requestOptions?.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      init.body = JSON.stringify(requestOptions.body);
    }

    return fetchFn(buildUrl(url, requestOptions?.params), init);
  };
}

/**
 * Reads a JSON body without throwing; returns null for empty or malformed
 * payloads so callers can report a schema problem with context.
 */
export async function readJson(response: Response): Promise<unknown> {
  try {
    const text = await response.text();
    if (!text) {
      return null;
    }
    return JSON.parse(text) as unknown;
  } catch {
    return null;
  }
}
