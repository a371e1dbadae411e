import type { MakeRequestFn } from '../../http';
import { readJson } from '../../http';
import type { Logger } from '../../logger';
import { createLogger } from '../../logger';
import type { RequestExecutor } from '../../request_executor';
import { InvalidDestinationError, RemoteListingError } from '../../errors';
import { SchemaValidationCache, WorkgroupSearchResponseSchema } from '../../schemas';
import type { WorkgroupSearchResponse } from '../../schemas';
import { WorkgroupDestination } from './workgroup_destination';

export type WorkgroupServiceDependencies = {
  request: MakeRequestFn;
  executor: RequestExecutor;
  baseUrl: string;
  logger?: Logger;
};

export class WorkgroupService {
  private readonly request: MakeRequestFn;
  private readonly executor: RequestExecutor;
  private readonly baseUrl: string;
  private readonly logger: Logger;

  constructor(deps: WorkgroupServiceDependencies) {
    this.request = deps.request;
    this.executor = deps.executor;
    this.baseUrl = deps.baseUrl;
    this.logger = deps.logger ?? createLogger('[WorkgroupService] ');
  }

  /**
   * Names of the workgroups under `stem`, without the `stem:` prefix.
   */
  async listWorkgroupNames(stem: string): Promise<string[]> {
    const url = `${this.baseUrl}/search/${encodeURIComponent(stem)}*`;
    let response: Response;
    try {
      response = await this.request('GET', url);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new RemoteListingError(`Network error while listing: ${message}`, url);
    }
    if (!response.ok) {
      throw new RemoteListingError(`Workgroup search failed with status ${response.status}`, url, response.status);
    }

    const body = await readJson(response);
    const validate = SchemaValidationCache.getValidatorFromSchema<WorkgroupSearchResponse>(WorkgroupSearchResponseSchema);
    if (!validate(body)) {
      throw new RemoteListingError('Workgroup search returned an unexpected body', url, response.status);
    }

    const prefix = `${stem}:`;
    const names = body.results.map(({ name }) => (name.startsWith(prefix) ? name.slice(prefix.length) : name));
    this.logger.debug(`Found ${names.length} workgroup(s) under ${stem}`);
    return names;
  }

  /**
   * Returns a destination for `stem:name` after checking that the search
   * under `stem` lists it.
   */
  async resolve(stem: string, name: string): Promise<WorkgroupDestination> {
    const names = await this.listWorkgroupNames(stem);
    if (!names.includes(name)) {
      throw new InvalidDestinationError(`workgroup "${stem}:${name}" not found`, 'workgroup', name);
    }
    return this.workgroup(stem, name);
  }

  /**
   * Returns a destination without checking that the workgroup exists.
   */
  workgroup(stem: string, name: string): WorkgroupDestination {
    return new WorkgroupDestination({
      request: this.request,
      executor: this.executor,
      baseUrl: this.baseUrl,
      stem,
      name,
      logger: this.logger,
    });
  }
}
