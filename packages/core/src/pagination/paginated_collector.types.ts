import type { Logger } from '../logger';

/**
 * One page of a listing, already unwrapped from its envelope.
 */
export type Page = {
  elements: unknown[];
  /** URL of the next page; null or undefined ends the traversal */
  nextPage?: string | null;
};

/**
 * Turns a page body into a `Page`, or returns null when the body does not
 * have the expected envelope.
 */
export type PageExtractor = (body: unknown) => Page | null;

export type CollectPagesOptions = {
  /** Envelope extractor. Default: Qualtrics `{ result: { elements, nextPage } }` */
  extract?: PageExtractor;
  /** Query parameters sent with the initial request only */
  params?: Record<string, string>;
  /** Safety valve against services that keep returning the same cursor */
  maxPages?: number;
  logger?: Logger;
};
