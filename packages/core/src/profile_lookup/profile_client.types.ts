import type { Logger } from '../logger';
import type { MakeRequestFn } from '../http';

export const PROFILE_COMMUNITIES = [
  'public',
  'stanford',
  'hidden',
  'stanford_full',
  'stanford_full_hidden',
] as const;

/**
 * Visibility level a profile is read at.
 */
export type ProfileCommunity = typeof PROFILE_COMMUNITIES[number];

export type Profile = Record<string, unknown>;

export type ProfileClientDependencies = {
  request: MakeRequestFn;
  /** e.g. https://cap.example.edu/cap-api/api */
  baseUrl: string;
  logger?: Logger;
};
