import type { Logger } from '../../logger';
import { createLogger } from '../../logger';
import type { MutationOutcome } from '../../request_executor';
import { BaseDestination, isRecord } from '../base_destination';
import type {
  AccessGroupDestination,
  ContactsDestination,
  MemberRecord,
} from '../destination.types';

export type MemoryMutation = {
  op: 'add' | 'remove';
  key: string;
};

export type MemoryDestinationOptions = {
  name?: string;
  logger?: Logger;
};

/**
 * In-process destination for tests and dry runs. Keeps raw elements the way
 * the remote service would return them and records every mutation.
 */
abstract class MemoryDestination extends BaseDestination {
  readonly service = 'memory';
  readonly name: string;

  /** Mutations in the order they were applied */
  readonly mutations: MemoryMutation[] = [];
  refreshCount = 0;

  protected elements: Array<Record<string, unknown>> = [];
  private pendingFailure: { op: MemoryMutation['op']; error: Error } | null = null;

  protected constructor(options: MemoryDestinationOptions, prefix: string) {
    super(options.logger ?? createLogger(prefix));
    this.name = options.name ?? 'memory';
  }

  /** Identifiers currently stored, in order, duplicates included */
  identifiers(): string[] {
    return this.elements.flatMap((element) => {
      const value = element[this.keyField];
      return typeof value === 'string' ? [value] : [];
    });
  }

  /** Makes the next mutation of `op` throw `error` instead of applying */
  failNext(op: MemoryMutation['op'], error: Error): void {
    this.pendingFailure = { op, error };
  }

  override async refresh() {
    this.refreshCount++;
    return super.refresh();
  }

  async removeMember(record: MemberRecord): Promise<MutationOutcome> {
    this.throwIfFailing('remove');
    const index = this.elements.findIndex((element) => this.keyOf(element) === record.recordKey);
    if (index === -1) {
      return 'not_found';
    }
    this.elements.splice(index, 1);
    this.mutations.push({ op: 'remove', key: record.recordKey });
    return 'applied';
  }

  protected throwIfFailing(op: MemoryMutation['op']): void {
    if (this.pendingFailure?.op === op) {
      const { error } = this.pendingFailure;
      this.pendingFailure = null;
      throw error;
    }
  }

  protected async fetchElements(): Promise<unknown[]> {
    return this.elements.map((element) => ({ ...element }));
  }

  protected abstract keyOf(element: Record<string, unknown>): string | undefined;

  protected toRecord(element: unknown): MemberRecord | null {
    if (!isRecord(element)) {
      return null;
    }
    const recordKey = this.keyOf(element);
    if (recordKey === undefined) {
      return null;
    }
    const identifier = element[this.keyField];
    return {
      identifier: typeof identifier === 'string' ? identifier : null,
      recordKey,
      attributes: element,
    };
  }
}

/**
 * Behaves like a mailing list: adding an identifier always creates a new
 * contact, so repeated adds produce duplicates.
 */
export class MemoryContactsDestination extends MemoryDestination implements ContactsDestination {
  readonly kind = 'contacts' as const;
  readonly keyField = 'extRef' as const;
  private nextContact = 1;

  constructor(extRefs: Array<string | null> = [], options: MemoryDestinationOptions = {}) {
    super(options, '[MemoryContacts] ');
    for (const extRef of extRefs) {
      this.elements.push({ contactId: this.newContactId(), extRef });
    }
  }

  async addMember(identifier: string): Promise<MutationOutcome> {
    this.throwIfFailing('add');
    const contactId = this.newContactId();
    this.elements.push({ contactId, extRef: identifier });
    this.mutations.push({ op: 'add', key: identifier });
    return 'applied';
  }

  protected keyOf(element: Record<string, unknown>): string | undefined {
    const contactId = element['contactId'];
    return typeof contactId === 'string' ? contactId : undefined;
  }

  private newContactId(): string {
    return `CID_${this.nextContact++}`;
  }
}

/**
 * Behaves like a workgroup: members are unique by id.
 */
export class MemoryAccessGroupDestination extends MemoryDestination implements AccessGroupDestination {
  readonly kind = 'access_group' as const;
  readonly keyField = 'id' as const;

  constructor(ids: string[] = [], options: MemoryDestinationOptions = {}) {
    super(options, '[MemoryAccessGroup] ');
    this.elements = ids.map((id) => ({ id, type: 'USER' }));
  }

  async addMember(identifier: string): Promise<MutationOutcome> {
    this.throwIfFailing('add');
    if (this.elements.some((element) => element['id'] === identifier)) {
      return 'already_present';
    }
    this.elements.push({ id: identifier, type: 'USER' });
    this.mutations.push({ op: 'add', key: identifier });
    return 'applied';
  }

  protected keyOf(element: Record<string, unknown>): string | undefined {
    const id = element['id'];
    return typeof id === 'string' ? id : undefined;
  }
}
