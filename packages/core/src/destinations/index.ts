export { BaseDestination } from './base_destination';
export { DestinationResolver, isDestination, isDestinationAddress } from './destination_resolver';
export type { DestinationResolverDependencies } from './destination_resolver';
export * from './qualtrics';
export * from './workgroup';
export * from './memory';
export type {
  AccessGroupDestination,
  ContactsDestination,
  Destination,
  DestinationKind,
  DestinationRef,
  DestinationService,
  DestinationAddress,
  MemberRecord,
  MembershipCollection,
} from './destination.types';
