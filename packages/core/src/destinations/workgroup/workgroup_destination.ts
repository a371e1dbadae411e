import type { MakeRequestFn } from '../../http';
import type { Logger } from '../../logger';
import { createLogger } from '../../logger';
import { collectPages } from '../../pagination';
import type { PageExtractor } from '../../pagination';
import type { MutationOutcome, RequestExecutor } from '../../request_executor';
import { SchemaValidationCache, WorkgroupDocumentSchema } from '../../schemas';
import type { WorkgroupDocument } from '../../schemas';
import { BaseDestination, isRecord } from '../base_destination';
import type { AccessGroupDestination, MemberRecord } from '../destination.types';

export type WorkgroupDestinationDependencies = {
  request: MakeRequestFn;
  executor: RequestExecutor;
  /** e.g. https://workgroupsvc.example.edu/workgroups/2.0 */
  baseUrl: string;
  stem: string;
  name: string;
  logger?: Logger;
};

/**
 * The workgroup document is a single page: its `members` array, no cursor.
 */
export const extractWorkgroupMembers: PageExtractor = (body) => {
  const validate = SchemaValidationCache.getValidatorFromSchema<WorkgroupDocument>(WorkgroupDocumentSchema);
  if (!validate(body)) {
    return null;
  }
  return { elements: body.members, nextPage: null };
};

export class WorkgroupDestination extends BaseDestination implements AccessGroupDestination {
  readonly kind = 'access_group' as const;
  readonly keyField = 'id' as const;
  readonly service = 'workgroup';
  readonly name: string;
  readonly stem: string;

  private readonly request: MakeRequestFn;
  private readonly executor: RequestExecutor;
  private readonly workgroupUrl: string;

  constructor(deps: WorkgroupDestinationDependencies) {
    super(deps.logger ?? createLogger('[Workgroup] '));
    this.request = deps.request;
    this.executor = deps.executor;
    this.stem = deps.stem;
    this.name = deps.name;
    this.workgroupUrl = `${deps.baseUrl}/${encodeURIComponent(deps.stem)}:${encodeURIComponent(deps.name)}`;
  }

  override describe(): string {
    return `${this.service}:${this.stem}:${this.name}`;
  }

  async addMember(identifier: string): Promise<MutationOutcome> {
    return this.executor.execute(
      {
        method: 'PUT',
        url: `${this.workgroupUrl}/members/${encodeURIComponent(identifier)}`,
        options: { params: { type: 'USER' } },
        description: `add ${identifier} to ${this.describe()}`,
      },
      'add',
    );
  }

  async removeMember(record: MemberRecord): Promise<MutationOutcome> {
    return this.executor.execute(
      {
        method: 'DELETE',
        url: `${this.workgroupUrl}/members/${encodeURIComponent(record.recordKey)}`,
        options: { params: { type: 'USER' } },
        description: `remove ${record.recordKey} from ${this.describe()}`,
      },
      'remove',
    );
  }

  protected fetchElements(): Promise<unknown[]> {
    return collectPages(this.request, this.workgroupUrl, {
      extract: extractWorkgroupMembers,
      logger: this.logger,
    });
  }

  protected toRecord(element: unknown): MemberRecord | null {
    if (!isRecord(element)) {
      return null;
    }
    const id = element['id'];
    if (typeof id !== 'string' || id === '') {
      return null;
    }
    return { identifier: id, recordKey: id, attributes: element };
  }
}
