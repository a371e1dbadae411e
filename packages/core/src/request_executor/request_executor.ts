import type { PreparedRequest } from '../http';
import type { Logger } from '../logger';
import { createLogger } from '../logger';
import { PermissionError, RemoteAPIError, RetriesExhaustedError } from '../errors';
import type {
  MutationIntent,
  MutationOutcome,
  RequestExecutorDependencies,
  SleepFn,
} from './request_executor.types';

export const DEFAULT_MAX_ATTEMPTS = 10;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Backoff before the retry that follows failed attempt `attempt` (1-based).
 */
export function backoffDelayMs(attempt: number): number {
  return Math.pow(2, attempt) * 1000;
}

function isTransientStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

/**
 * Sends mutations and classifies their responses.
 *
 * Transient failures (5xx, 429, network errors) are retried with exponential
 * backoff. 409 on add and 404 on remove are benign outcomes. 401/403 raise
 * PermissionError; any other status raises RemoteAPIError.
 */
export class RequestExecutor {
  private readonly request: RequestExecutorDependencies['request'];
  private readonly maxAttempts: number;
  private readonly sleepFn: SleepFn;
  private readonly logger: Logger;

  constructor(deps: RequestExecutorDependencies) {
    this.request = deps.request;
    this.maxAttempts = Math.max(1, deps.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.sleepFn = deps.sleep ?? sleep;
    this.logger = deps.logger ?? createLogger('[RequestExecutor] ');
  }

  async execute(prepared: PreparedRequest, intent: MutationIntent): Promise<MutationOutcome> {
    let lastStatus: number | undefined;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      let response: Response | null = null;
      try {
        response = await this.request(prepared.method, prepared.url, prepared.options);
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(`${prepared.description}: network error on attempt ${attempt}: ${message}`);
      }

      if (response) {
        const status = response.status;
        lastStatus = status;

        if (response.ok) {
          return 'applied';
        }
        if (status === 409 && intent === 'add') {
          this.logger.info(`${prepared.description}: already present`);
          return 'already_present';
        }
        if (status === 404 && intent === 'remove') {
          this.logger.info(`${prepared.description}: not found`);
          return 'not_found';
        }
        if (status === 401 || status === 403) {
          throw new PermissionError(prepared.description, status);
        }
        if (!isTransientStatus(status)) {
          throw new RemoteAPIError(prepared.description, status);
        }
        this.logger.warn(`${prepared.description}: status ${status} on attempt ${attempt}`);
      }

      if (attempt < this.maxAttempts) {
        const delay = backoffDelayMs(attempt);
        this.logger.debug(`${prepared.description}: retrying in ${delay / 1000}s`);
        await this.sleepFn(delay);
      }
    }

    throw new RetriesExhaustedError(prepared.description, this.maxAttempts, lastStatus);
  }
}
