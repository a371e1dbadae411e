export { ProfileClient, isProfileCommunity } from './profile_client';
export { PROFILE_COMMUNITIES } from './profile_client.types';
export type { Profile, ProfileClientDependencies, ProfileCommunity } from './profile_client.types';
