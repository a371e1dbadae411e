import type { Logger } from '../logger';
import { createLogger } from '../logger';
import { InvalidDestinationError } from '../errors';
import type { QualtricsDirectory } from './qualtrics';
import type { WorkgroupService } from './workgroup';
import { isRecord } from './base_destination';
import type {
  Destination,
  DestinationService,
  DestinationAddress,
} from './destination.types';

const SERVICES: readonly DestinationService[] = ['qualtrics', 'workgroup'];

export type DestinationResolverDependencies = {
  /** Opens the XM directory on first use */
  openDirectory?: () => Promise<QualtricsDirectory>;
  workgroups?: WorkgroupService;
  /** Stem used when a workgroup reference names none */
  defaultStem?: string;
  logger?: Logger;
};

export function isDestination(value: unknown): value is Destination {
  if (!isRecord(value)) {
    return false;
  }
  const shapeMatches =
    (value['kind'] === 'contacts' && value['keyField'] === 'extRef') ||
    (value['kind'] === 'access_group' && value['keyField'] === 'id');
  return shapeMatches &&
    typeof value['refresh'] === 'function' &&
    typeof value['current'] === 'function' &&
    typeof value['addMember'] === 'function' &&
    typeof value['removeMember'] === 'function';
}

export function isDestinationAddress(value: unknown): value is DestinationAddress {
  return isRecord(value) &&
    typeof value['service'] === 'string' &&
    typeof value['listName'] === 'string' &&
    (value['stem'] === undefined || typeof value['stem'] === 'string');
}

function isDestinationService(value: string): value is DestinationService {
  return SERVICES.some((service) => service === value);
}

/**
 * Turns destination references into live destinations. Unknown services and
 * objects that are not destinations are rejected before any remote call.
 */
export class DestinationResolver {
  private readonly openDirectory: (() => Promise<QualtricsDirectory>) | undefined;
  private readonly workgroups: WorkgroupService | undefined;
  private readonly defaultStem: string | undefined;
  private readonly logger: Logger;
  private directory: Promise<QualtricsDirectory> | null = null;

  constructor(deps: DestinationResolverDependencies = {}) {
    this.openDirectory = deps.openDirectory;
    this.workgroups = deps.workgroups;
    this.defaultStem = deps.defaultStem;
    this.logger = deps.logger ?? createLogger('[DestinationResolver] ');
  }

  async resolve(ref: unknown): Promise<Destination> {
    if (isDestination(ref)) {
      return ref;
    }
    if (!isDestinationAddress(ref)) {
      throw new InvalidDestinationError('expected a destination or a { service, listName } reference');
    }

    const { service, listName } = ref;
    if (!isDestinationService(service)) {
      throw new InvalidDestinationError(
        `unknown service "${service}" (expected one of: ${SERVICES.join(', ')})`,
        service,
        listName,
      );
    }

    this.logger.debug(`Resolving ${service}:${listName}`);
    switch (service) {
      case 'qualtrics':
        return this.resolveMailingList(listName);
      case 'workgroup':
        return this.resolveWorkgroup(listName, ref.stem ?? this.defaultStem);
    }
  }

  private async resolveMailingList(listName: string): Promise<Destination> {
    if (!this.openDirectory) {
      throw new InvalidDestinationError('the qualtrics service is not configured', 'qualtrics', listName);
    }
    if (!this.directory) {
      this.directory = this.openDirectory().catch((error: unknown) => {
        this.directory = null;
        throw error;
      });
    }
    const directory = await this.directory;
    return directory.resolve(listName);
  }

  private async resolveWorkgroup(listName: string, stem: string | undefined): Promise<Destination> {
    if (!this.workgroups) {
      throw new InvalidDestinationError('the workgroup service is not configured', 'workgroup', listName);
    }
    if (!stem) {
      throw new InvalidDestinationError(`no stem given for workgroup "${listName}"`, 'workgroup', listName);
    }
    return this.workgroups.resolve(stem, listName);
  }
}
