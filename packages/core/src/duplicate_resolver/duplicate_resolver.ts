import type { Logger } from '../logger';
import { createLogger } from '../logger';
import type { Destination, MemberRecord, MembershipCollection } from '../destinations';

/**
 * Every record whose identifier already appeared earlier in the collection.
 * The first occurrence is kept; records without an identifier never count.
 */
export function findDuplicateRecords(collection: MembershipCollection): MemberRecord[] {
  const seen = new Set<string>();
  const duplicates: MemberRecord[] = [];

  for (const record of collection.records) {
    if (record.identifier === null) {
      continue;
    }
    if (seen.has(record.identifier)) {
      duplicates.push(record);
    } else {
      seen.add(record.identifier);
    }
  }
  return duplicates;
}

export type DuplicateResolution = {
  destination: string;
  /** Records that were successfully deleted */
  removed: MemberRecord[];
};

export class DuplicateResolver {
  private readonly logger: Logger;

  constructor(deps: { logger?: Logger } = {}) {
    this.logger = deps.logger ?? createLogger('[DuplicateResolver] ');
  }

  /**
   * Refreshes the destination, deletes every later duplicate and refreshes
   * again when something was deleted. A collection fetched by the caller
   * right before stands in for the first refresh.
   */
  async resolve(destination: Destination, fresh?: MembershipCollection): Promise<DuplicateResolution> {
    const collection = fresh ?? await destination.refresh();
    const duplicates = findDuplicateRecords(collection);

    if (duplicates.length === 0) {
      this.logger.info(`No duplicates found in ${destination.describe()}`);
      return { destination: destination.describe(), removed: [] };
    }

    this.logger.info(`Removing ${duplicates.length} duplicate record(s) from ${destination.describe()}`);
    const removed: MemberRecord[] = [];
    for (const record of duplicates) {
      const outcome = await destination.removeMember(record);
      if (outcome === 'applied') {
        removed.push(record);
      }
    }

    await destination.refresh();
    return { destination: destination.describe(), removed };
  }
}
