import type { MakeRequestFn } from '../../http';
import type { Logger } from '../../logger';
import { createLogger } from '../../logger';
import { collectPages } from '../../pagination';
import type { MutationOutcome, RequestExecutor } from '../../request_executor';
import { ContactElementSchema, SchemaValidationCache } from '../../schemas';
import type { ContactElement } from '../../schemas';
import { BaseDestination } from '../base_destination';
import type { ContactsDestination, MemberRecord } from '../destination.types';

export type MailingListDestinationDependencies = {
  request: MakeRequestFn;
  executor: RequestExecutor;
  /** e.g. https://ca1.qualtrics.com/API/v3 */
  baseUrl: string;
  directoryId: string;
  mailingListId: string;
  name: string;
  logger?: Logger;
};

/**
 * An XM Directory mailing list. Contacts are keyed by `extRef` and deleted
 * by `contactId`.
 */
export class MailingListDestination extends BaseDestination implements ContactsDestination {
  readonly kind = 'contacts' as const;
  readonly keyField = 'extRef' as const;
  readonly service = 'qualtrics';
  readonly name: string;
  readonly mailingListId: string;

  private readonly request: MakeRequestFn;
  private readonly executor: RequestExecutor;
  private readonly contactsUrl: string;

  constructor(deps: MailingListDestinationDependencies) {
    super(deps.logger ?? createLogger('[MailingList] '));
    this.request = deps.request;
    this.executor = deps.executor;
    this.name = deps.name;
    this.mailingListId = deps.mailingListId;
    this.contactsUrl =
      `${deps.baseUrl}/directories/${encodeURIComponent(deps.directoryId)}` +
      `/mailinglists/${encodeURIComponent(deps.mailingListId)}/contacts`;
  }

  async addMember(identifier: string): Promise<MutationOutcome> {
    return this.executor.execute(
      {
        method: 'POST',
        url: this.contactsUrl,
        options: { body: { extRef: identifier } },
        description: `add ${identifier} to ${this.describe()}`,
      },
      'add',
    );
  }

  async removeMember(record: MemberRecord): Promise<MutationOutcome> {
    return this.executor.execute(
      {
        method: 'DELETE',
        url: `${this.contactsUrl}/${encodeURIComponent(record.recordKey)}`,
        description: `remove contact ${record.recordKey} (${record.identifier ?? 'no extRef'}) from ${this.describe()}`,
      },
      'remove',
    );
  }

  protected fetchElements(): Promise<unknown[]> {
    return collectPages(this.request, this.contactsUrl, { logger: this.logger });
  }

  protected toRecord(element: unknown): MemberRecord | null {
    const validate = SchemaValidationCache.getValidatorFromSchema<ContactElement>(ContactElementSchema);
    if (!validate(element)) {
      return null;
    }
    return {
      identifier: typeof element.extRef === 'string' ? element.extRef : null,
      recordKey: element.contactId,
      attributes: { ...element },
    };
  }
}
