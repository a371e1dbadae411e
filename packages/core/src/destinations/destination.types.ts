import type { MutationOutcome } from '../request_executor';

export type DestinationKind = 'contacts' | 'access_group';

/**
 * One remote membership entry.
 */
export type MemberRecord = {
  /** Value of the destination's keying field; null when the element lacks it */
  identifier: string | null;
  /** Key used to delete this entry (contactId for contacts, member id for workgroups) */
  recordKey: string;
  /** Raw remote element */
  attributes: Record<string, unknown>;
};

/**
 * Snapshot of a destination's membership, in the order the service returned it.
 */
export type MembershipCollection = {
  kind: DestinationKind;
  keyField: string;
  /** `service:name` of the destination that fetched it */
  source: string;
  records: MemberRecord[];
  /** False when no record carries the keying field (empty list or other schema) */
  keyFieldPresent: boolean;
  fetchedAt: Date;
};

interface DestinationBase {
  readonly service: string;
  readonly name: string;

  /** `service:name`, used in logs and reports */
  describe(): string;

  /** Re-fetches the membership and replaces the cached collection */
  refresh(): Promise<MembershipCollection>;

  /** Cached collection from the last refresh; throws if there was none */
  current(): MembershipCollection;

  addMember(identifier: string): Promise<MutationOutcome>;

  removeMember(record: MemberRecord): Promise<MutationOutcome>;
}

/**
 * A mailing list of contacts keyed by external reference.
 */
export interface ContactsDestination extends DestinationBase {
  readonly kind: 'contacts';
  readonly keyField: 'extRef';
}

/**
 * A workgroup whose members are keyed by their id.
 */
export interface AccessGroupDestination extends DestinationBase {
  readonly kind: 'access_group';
  readonly keyField: 'id';
}

export type Destination = ContactsDestination | AccessGroupDestination;

export type DestinationService = 'qualtrics' | 'workgroup';

/**
 * Names a destination without holding it. Resolved by `DestinationResolver`.
 */
export type DestinationAddress = {
  service: string;
  listName: string;
  /** Workgroup stem; defaults to the configured one */
  stem?: string;
};

export type DestinationRef = Destination | DestinationAddress;
