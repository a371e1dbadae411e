import type { Logger } from '../logger';
import { createLogger } from '../logger';
import { InvalidSourceError } from '../errors';
import type { MemberRecord, MembershipCollection } from '../destinations';

/**
 * Anything that can act as a membership source.
 */
export type MembershipSource = readonly string[] | ReadonlySet<string> | MembershipCollection;

export function isMembershipCollection(value: unknown): value is MembershipCollection {
  if (typeof value !== 'object' || value === null || Array.isArray(value) || value instanceof Set) {
    return false;
  }
  return ('kind' in value && (value.kind === 'contacts' || value.kind === 'access_group')) &&
    ('records' in value && Array.isArray(value.records)) &&
    ('keyFieldPresent' in value && typeof value.keyFieldPresent === 'boolean');
}

function toIdentifierSet(values: Iterable<unknown>): Set<string> {
  const identifiers = new Set<string>();
  let index = 0;
  for (const value of values) {
    if (typeof value !== 'string') {
      throw new InvalidSourceError(`entry ${index} is ${value === null ? 'null' : typeof value}, expected a string`);
    }
    identifiers.add(value);
    index++;
  }
  return identifiers;
}

/**
 * Normalizes a source into a set of identifiers. Identifiers are compared
 * exactly; nothing is trimmed or case-folded.
 */
export function adaptSource(input: unknown, logger: Logger = createLogger('[SourceAdapter] ')): ReadonlySet<string> {
  if (Array.isArray(input) || input instanceof Set) {
    return toIdentifierSet(input);
  }

  if (!isMembershipCollection(input)) {
    throw new InvalidSourceError('expected a list of identifiers or a membership collection');
  }

  if (!input.keyFieldPresent) {
    if (input.records.length > 0) {
      logger.warn(`${input.source} has no "${input.keyField}" field on any record; treating it as empty`);
    }
    return new Set();
  }

  const identifiers = new Set<string>();
  input.records.forEach((record: MemberRecord) => {
    if (record.identifier === null) {
      logger.debug(`Skipping record ${record.recordKey} of ${input.source}: no ${input.keyField}`);
      return;
    }
    identifiers.add(record.identifier);
  });
  return identifiers;
}
