export { adaptSource, isMembershipCollection } from './source_adapter';
export type { MembershipSource } from './source_adapter';
