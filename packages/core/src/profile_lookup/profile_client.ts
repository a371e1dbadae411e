import type { MakeRequestFn } from '../http';
import { readJson } from '../http';
import type { Logger } from '../logger';
import { createLogger } from '../logger';
import { InvalidCommunityError, RemoteAPIError } from '../errors';
import {
  OrgResponseSchema,
  ProfileSearchResponseSchema,
  SchemaValidationCache,
} from '../schemas';
import type { OrgResponse, ProfileSearchResponse } from '../schemas';
import { PROFILE_COMMUNITIES } from './profile_client.types';
import type { Profile, ProfileClientDependencies, ProfileCommunity } from './profile_client.types';

export function isProfileCommunity(value: string): value is ProfileCommunity {
  return PROFILE_COMMUNITIES.some((community) => community === value);
}

/**
 * Read-only client for the institutional profile API.
 */
export class ProfileClient {
  private readonly request: MakeRequestFn;
  private readonly baseUrl: string;
  private readonly logger: Logger;

  constructor(deps: ProfileClientDependencies) {
    this.request = deps.request;
    this.baseUrl = deps.baseUrl;
    this.logger = deps.logger ?? createLogger('[ProfileClient] ');
  }

  /**
   * Looks up the profile of `uid`. Returns null when no profile matches.
   */
  async getProfileByUid(uid: string, community?: string): Promise<Profile | null> {
    if (community !== undefined && !isProfileCommunity(community)) {
      throw new InvalidCommunityError(community, PROFILE_COMMUNITIES);
    }

    const params: Record<string, string> = { uids: uid };
    if (community) {
      params['community'] = community;
    }

    const response = await this.request('GET', `${this.baseUrl}/profiles/v1`, { params });
    if (!response.ok) {
      throw new RemoteAPIError(`profile lookup for ${uid}`, response.status);
    }

    const body = await readJson(response);
    const validate = SchemaValidationCache.getValidatorFromSchema<ProfileSearchResponse>(ProfileSearchResponseSchema);
    if (!validate(body)) {
      throw new RemoteAPIError(`profile lookup for ${uid} returned an unexpected body`, response.status);
    }

    const [profile] = body.values ?? [];
    if (!profile) {
      this.logger.debug(`No profile found for ${uid}`);
      return null;
    }
    return profile;
  }

  /**
   * Resolves an organization code (e.g. `AABB`) to its alias, or null when
   * the code is unknown.
   */
  async getOrgAlias(orgCode: string): Promise<string | null> {
    const response = await this.request('GET', `${this.baseUrl}/cap/v1/orgs/${encodeURIComponent(orgCode)}`);
    if (response.status === 404) {
      return null;
    }
    if (!response.ok) {
      throw new RemoteAPIError(`organization lookup for ${orgCode}`, response.status);
    }

    const body = await readJson(response);
    const validate = SchemaValidationCache.getValidatorFromSchema<OrgResponse>(OrgResponseSchema);
    if (!validate(body) || body.alias === undefined) {
      return null;
    }
    return body.alias;
  }
}
