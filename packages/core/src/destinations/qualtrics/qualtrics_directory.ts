import type { MakeRequestFn } from '../../http';
import type { Logger } from '../../logger';
import { createLogger } from '../../logger';
import { collectPages } from '../../pagination';
import type { RequestExecutor } from '../../request_executor';
import { InvalidDestinationError } from '../../errors';
import {
  DirectoryElementSchema,
  MailingListElementSchema,
  SchemaValidationCache,
} from '../../schemas';
import type { DirectoryElement, MailingListElement } from '../../schemas';
import { MailingListDestination } from './mailing_list_destination';

export type QualtricsDirectoryDependencies = {
  request: MakeRequestFn;
  executor: RequestExecutor;
  baseUrl: string;
  directoryId: string;
  logger?: Logger;
};

/**
 * Builds the v3 API root for a data center, e.g. `ca1` ->
 * `https://ca1.qualtrics.com/API/v3`.
 */
export function qualtricsBaseUrl(dataCenter: string): string {
  return `https://${dataCenter}.qualtrics.com/API/v3`;
}

/**
 * One XM directory (contact pool) and its mailing lists.
 */
export class QualtricsDirectory {
  private readonly request: MakeRequestFn;
  private readonly executor: RequestExecutor;
  private readonly baseUrl: string;
  private readonly logger: Logger;
  readonly directoryId: string;

  constructor(deps: QualtricsDirectoryDependencies) {
    this.request = deps.request;
    this.executor = deps.executor;
    this.baseUrl = deps.baseUrl;
    this.directoryId = deps.directoryId;
    this.logger = deps.logger ?? createLogger('[QualtricsDirectory] ');
  }

  /**
   * Ids of every directory visible to the token, in service order.
   */
  static async listDirectoryIds(request: MakeRequestFn, baseUrl: string): Promise<string[]> {
    const elements = await collectPages(request, `${baseUrl}/directories`);
    const validate = SchemaValidationCache.getValidatorFromSchema<DirectoryElement>(DirectoryElementSchema);
    return elements
      .filter((element): element is DirectoryElement => validate(element))
      .map((element) => element.directoryId);
  }

  /**
   * Uses `directoryId` when given, otherwise the first directory the token
   * can see.
   */
  static async open(
    deps: Omit<QualtricsDirectoryDependencies, 'directoryId'> & { directoryId?: string },
  ): Promise<QualtricsDirectory> {
    if (deps.directoryId) {
      return new QualtricsDirectory({ ...deps, directoryId: deps.directoryId });
    }

    const ids = await QualtricsDirectory.listDirectoryIds(deps.request, deps.baseUrl);
    const [first] = ids;
    if (first === undefined) {
      throw new InvalidDestinationError('no XM directory is visible to this token', 'qualtrics');
    }
    deps.logger?.info(`No directory configured; using ${first} (available: ${ids.join(', ')})`);
    return new QualtricsDirectory({ ...deps, directoryId: first });
  }

  async listMailingLists(): Promise<MailingListElement[]> {
    const elements = await collectPages(
      this.request,
      `${this.baseUrl}/directories/${encodeURIComponent(this.directoryId)}/mailinglists`,
      { params: { includeCount: 'true', pageSize: '100' }, logger: this.logger },
    );
    const validate = SchemaValidationCache.getValidatorFromSchema<MailingListElement>(MailingListElementSchema);
    return elements.filter((element): element is MailingListElement => validate(element));
  }

  async listNames(): Promise<string[]> {
    return (await this.listMailingLists()).map((list) => list.name);
  }

  /**
   * Finds a mailing list by exact name. The first match wins when names
   * repeat.
   */
  async resolve(listName: string): Promise<MailingListDestination> {
    const lists = await this.listMailingLists();
    const match = lists.find((list) => list.name === listName);
    if (!match) {
      throw new InvalidDestinationError(
        `mailing list "${listName}" not found in directory ${this.directoryId}`,
        'qualtrics',
        listName,
      );
    }

    return new MailingListDestination({
      request: this.request,
      executor: this.executor,
      baseUrl: this.baseUrl,
      directoryId: this.directoryId,
      mailingListId: match.mailingListId,
      name: match.name,
      logger: this.logger,
    });
  }
}
