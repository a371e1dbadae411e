import type { MakeRequestFn } from '../http';
import { readJson } from '../http';
import { createLogger } from '../logger';
import { RemoteListingError } from '../errors';
import { SchemaValidationCache, QualtricsPageEnvelopeSchema } from '../schemas';
import type { QualtricsPageEnvelope } from '../schemas';
import type { CollectPagesOptions, Page, PageExtractor } from './paginated_collector.types';

const DEFAULT_MAX_PAGES = 10_000;

/**
 * Default extractor for `{ result: { elements, nextPage } }` envelopes.
 */
export const extractQualtricsPage: PageExtractor = (body) => {
  const validate = SchemaValidationCache.getValidatorFromSchema<QualtricsPageEnvelope>(QualtricsPageEnvelopeSchema);
  if (!validate(body)) {
    return null;
  }
  return { elements: body.result.elements, nextPage: body.result.nextPage ?? null };
};

/**
 * Follows next-page pointers from `initialUrl` until the service stops
 * returning one and concatenates every page's elements in page order.
 *
 * Any failing page aborts the whole collection with `RemoteListingError`;
 * partial results are never returned.
 */
export async function collectPages(
  request: MakeRequestFn,
  initialUrl: string,
  options: CollectPagesOptions = {},
): Promise<unknown[]> {
  const extract = options.extract ?? extractQualtricsPage;
  const maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
  const logger = options.logger ?? createLogger('[Pagination] ');

  const collected: unknown[] = [];
  let url: string | null = initialUrl;
  let pageCount = 0;

  while (url) {
    if (pageCount >= maxPages) {
      throw new RemoteListingError(
        `Listing exceeded ${maxPages} pages without reaching the end`,
        url,
      );
    }

    const page = await fetchPage(request, url, extract, pageCount === 0 ? options.params : undefined);
    pageCount++;
    collected.push(...page.elements);
    logger.debug(`Fetched page ${pageCount} (${page.elements.length} element(s)) from ${url}`);

    url = page.nextPage ? page.nextPage : null;
  }

  return collected;
}

async function fetchPage(
  request: MakeRequestFn,
  url: string,
  extract: PageExtractor,
  params?: Record<string, string>,
): Promise<Page> {
  let response: Response;
  try {
    response = await request('GET', url, params ? { params } : undefined);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new RemoteListingError(`Network error while listing: ${message}`, url);
  }

  if (!response.ok) {
    throw new RemoteListingError(`Listing request failed with status ${response.status}`, url, response.status);
  }

  const page = extract(await readJson(response));
  if (!page) {
    throw new RemoteListingError('Listing response did not match the expected page envelope', url, response.status);
  }
  return page;
}
