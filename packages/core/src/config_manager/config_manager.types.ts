import type { LogLevel } from '../logger';

/**
 * Qualtrics API access. Requests carry `X-API-TOKEN`.
 */
export interface QualtricsConfig {
  /** Data center id, e.g. `ca1` */
  dataCenter: string;
  apiToken: string;
  /** XM directory (contact pool); the first visible one when absent */
  directoryId?: string;
}

/**
 * Workgroup service access. Requests carry a bearer token.
 */
export interface WorkgroupConfig {
  baseUrl: string;
  token: string;
  /** Stem used when a command names none */
  stem?: string;
}

export interface ProfileConfig {
  baseUrl: string;
  token: string;
}

export interface RetryPolicy {
  /** Total attempts per mutation */
  maxAttempts: number;
}

export interface ExportPolicy {
  /** Status checks before giving up; unbounded when absent */
  maxPollAttempts?: number;
  maxIntervalSeconds?: number;
}

/**
 * Shape of the settings file
 */
export interface ListbridgeConfig {
  qualtrics?: QualtricsConfig;
  workgroup?: WorkgroupConfig;
  profiles?: ProfileConfig;
  sync?: Partial<RetryPolicy>;
  export?: ExportPolicy;
  logLevel?: LogLevel;
}
