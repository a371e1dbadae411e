import type { Logger } from '../logger';
import type { MakeRequestFn } from '../http';
import type { RequestExecutor } from '../request_executor';
import type { ExportPoller } from '../export_poller';

export type Question = Record<string, unknown>;

export type SurveyClientDependencies = {
  request: MakeRequestFn;
  /** Sends question updates and version publishing */
  executor: RequestExecutor;
  /** Runs response exports */
  poller: ExportPoller;
  /** e.g. https://ca1.qualtrics.com/API/v3 */
  baseUrl: string;
  surveyId: string;
  logger?: Logger;
};

export type ExportFormat = 'csv' | 'tsv';
