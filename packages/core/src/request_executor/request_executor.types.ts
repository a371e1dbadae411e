import type { Logger } from '../logger';
import type { MakeRequestFn } from '../http';

/**
 * What a mutation is trying to do. Determines which non-success statuses
 * are benign.
 */
export type MutationIntent = 'add' | 'remove' | 'update';

export type MutationOutcome = 'applied' | 'already_present' | 'not_found';

export type SleepFn = (ms: number) => Promise<void>;

export type RequestExecutorDependencies = {
  request: MakeRequestFn;
  /** Total attempts per request before giving up. Default: 10 */
  maxAttempts?: number;
  /** Injected for tests. Default: setTimeout-based sleep */
  sleep?: SleepFn;
  logger?: Logger;
};
