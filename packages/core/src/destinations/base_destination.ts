import type { Logger } from '../logger';
import { CollectionNotLoadedError } from '../errors';
import type { MutationOutcome } from '../request_executor';
import type { DestinationKind, MemberRecord, MembershipCollection } from './destination.types';

/**
 * Owns the cached collection so implementations only describe how to fetch
 * records and how to mutate one member.
 */
export abstract class BaseDestination {
  abstract readonly kind: DestinationKind;
  abstract readonly keyField: string;
  abstract readonly service: string;
  abstract readonly name: string;

  private collection: MembershipCollection | null = null;

  protected constructor(protected readonly logger: Logger) {}

  describe(): string {
    return `${this.service}:${this.name}`;
  }

  async refresh(): Promise<MembershipCollection> {
    const elements = await this.fetchElements();
    const records: MemberRecord[] = [];

    for (const element of elements) {
      const record = this.toRecord(element);
      if (record) {
        records.push(record);
      } else {
        this.logger.warn(`Skipping unrecognised element in ${this.describe()}`);
      }
    }

    this.collection = {
      kind: this.kind,
      keyField: this.keyField,
      source: this.describe(),
      records,
      keyFieldPresent: records.some((record) => this.keyField in record.attributes),
      fetchedAt: new Date(),
    };
    this.logger.debug(`Fetched ${records.length} record(s) from ${this.describe()}`);
    return this.collection;
  }

  current(): MembershipCollection {
    if (!this.collection) {
      throw new CollectionNotLoadedError(this.describe());
    }
    return this.collection;
  }

  abstract addMember(identifier: string): Promise<MutationOutcome>;

  abstract removeMember(record: MemberRecord): Promise<MutationOutcome>;

  protected abstract fetchElements(): Promise<unknown[]>;

  /** Returns null for elements that cannot be deleted later (no record key) */
  protected abstract toRecord(element: unknown): MemberRecord | null;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
