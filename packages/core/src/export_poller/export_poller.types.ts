import type { Logger } from '../logger';
import type { MakeRequestFn } from '../http';
import type { SleepFn } from '../request_executor';

export type ExportStatus = 'in_progress' | 'complete' | 'failed';

/**
 * State of one remote export job. Created by the trigger call and only
 * changed by polling.
 */
export type ExportJob = {
  progressId: string;
  status: ExportStatus;
  percentComplete: number;
  fileId?: string;
};

/**
 * Decoded contents of the first delimited-text entry of the export archive.
 */
export type ExportFile = {
  fileName: string;
  columns: string[];
  rows: Array<Record<string, string>>;
};

export type ExportPollerDependencies = {
  request: MakeRequestFn;
  /** Status checks allowed before ExportTimeoutError. Default: unbounded */
  maxPollAttempts?: number;
  /** Upper bound for a single wait between status checks */
  maxIntervalSeconds?: number;
  sleep?: SleepFn;
  logger?: Logger;
};
