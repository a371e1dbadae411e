export { RequestExecutor, DEFAULT_MAX_ATTEMPTS, backoffDelayMs, sleep } from './request_executor';
export type {
  MutationIntent,
  MutationOutcome,
  RequestExecutorDependencies,
  SleepFn,
} from './request_executor.types';
