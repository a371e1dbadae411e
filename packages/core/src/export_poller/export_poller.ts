import { unzipSync } from 'fflate';
import { parse } from 'csv-parse/sync';
import type { MakeRequestFn } from '../http';
import { readJson } from '../http';
import type { Logger } from '../logger';
import { createLogger } from '../logger';
import type { SleepFn } from '../request_executor';
import { backoffDelayMs, sleep } from '../request_executor';
import {
  ExportDownloadError,
  ExportFailedError,
  ExportPollError,
  ExportTimeoutError,
  ExportTriggerError,
  RemoteAPIError,
} from '../errors';
import {
  ExportProgressEnvelopeSchema,
  ExportTriggerEnvelopeSchema,
  SchemaValidationCache,
} from '../schemas';
import type { ExportProgressEnvelope, ExportTriggerEnvelope } from '../schemas';
import type {
  ExportFile,
  ExportJob,
  ExportPollerDependencies,
  ExportStatus,
} from './export_poller.types';

const DEFAULT_TRIGGER_BODY = { format: 'csv' };

function toExportStatus(remote: string): ExportStatus {
  switch (remote) {
    case 'complete':
      return 'complete';
    case 'failed':
      return 'failed';
    default:
      return 'in_progress';
  }
}

function joinUrl(base: string, ...segments: string[]): string {
  return [base.replace(/\/+$/, ''), ...segments.map(encodeURIComponent)].join('/');
}

/**
 * Drives an asynchronous export job to completion.
 *
 * Triggered -> Polling -> Complete | Failed. Polls back off exponentially;
 * only `maxPollAttempts` bounds the loop.
 */
export class ExportPoller {
  private readonly request: MakeRequestFn;
  private readonly maxPollAttempts: number | undefined;
  private readonly maxIntervalMs: number | undefined;
  private readonly sleepFn: SleepFn;
  private readonly logger: Logger;

  constructor(deps: ExportPollerDependencies) {
    this.request = deps.request;
    this.maxPollAttempts = deps.maxPollAttempts;
    this.maxIntervalMs = deps.maxIntervalSeconds !== undefined ? deps.maxIntervalSeconds * 1000 : undefined;
    this.sleepFn = deps.sleep ?? sleep;
    this.logger = deps.logger ?? createLogger('[ExportPoller] ');
  }

  /**
   * Starts the export. `baseUrl` is the export collection endpoint, e.g.
   * `.../surveys/{surveyId}/export-responses`.
   */
  async trigger(baseUrl: string, body: Record<string, unknown> = DEFAULT_TRIGGER_BODY): Promise<ExportJob> {
    let response: Response;
    try {
      response = await this.request('POST', baseUrl, { body });
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ExportTriggerError(`network error: ${message}`);
    }

    if (!response.ok) {
      throw new ExportTriggerError(`status ${response.status}`, response.status);
    }

    const payload = await readJson(response);
    const validate = SchemaValidationCache.getValidatorFromSchema<ExportTriggerEnvelope>(ExportTriggerEnvelopeSchema);
    if (!validate(payload)) {
      throw new ExportTriggerError('response carried no progressId', response.status);
    }

    this.logger.info(`Export started (${payload.result.progressId})`);
    return { progressId: payload.result.progressId, status: 'in_progress', percentComplete: 0 };
  }

  /**
   * Polls until the job fails or a file id is available. A file id ends
   * polling whatever the reported status.
   */
  async waitForFile(baseUrl: string, job: ExportJob): Promise<ExportJob & { fileId: string }> {
    if (this.maxPollAttempts === undefined) {
      this.logger.warn(`Polling export ${job.progressId} without an attempt limit`);
    }

    let current = job;
    for (let attempt = 1; ; attempt++) {
      current = await this.checkProgress(baseUrl, current);
      this.logger.info(`Export is ${Math.trunc(current.percentComplete)}% complete`);

      if (current.status === 'failed') {
        throw new ExportFailedError(current.progressId);
      }
      if (current.fileId) {
        return { ...current, status: 'complete', fileId: current.fileId };
      }
      if (current.status === 'complete') {
        throw new ExportDownloadError(`export ${current.progressId} completed without a file id`);
      }
      if (this.maxPollAttempts !== undefined && attempt >= this.maxPollAttempts) {
        throw new ExportTimeoutError(current.progressId, attempt);
      }

      const delay = this.maxIntervalMs !== undefined
        ? Math.min(backoffDelayMs(attempt), this.maxIntervalMs)
        : backoffDelayMs(attempt);
      this.logger.debug(`Checking again in ${delay / 1000} seconds`);
      await this.sleepFn(delay);
    }
  }

  /**
   * Downloads the archive for `fileId` and parses its first delimited-text
   * entry.
   */
  async download(baseUrl: string, fileId: string): Promise<ExportFile> {
    const url = joinUrl(baseUrl, fileId, 'file');
    let response: Response;
    try {
      response = await this.request('GET', url);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ExportDownloadError(`network error: ${message}`);
    }
    if (!response.ok) {
      throw new ExportDownloadError(`status ${response.status}`, response.status);
    }

    const archive = new Uint8Array(await response.arrayBuffer());
    if (archive.byteLength === 0) {
      throw new ExportDownloadError('archive is empty');
    }

    let entries: Record<string, Uint8Array>;
    try {
      entries = unzipSync(archive);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ExportDownloadError(`archive could not be decoded: ${message}`);
    }

    const names = Object.keys(entries).filter((name) => !name.endsWith('/'));
    const fileName = names.find((name) => /\.(csv|tsv)$/i.test(name)) ?? names[0];
    const content = fileName !== undefined ? entries[fileName] : undefined;
    if (fileName === undefined || content === undefined) {
      throw new ExportDownloadError('archive contains no files');
    }

    return { fileName, ...parseDelimited(new TextDecoder().decode(content), fileName) };
  }

  /**
   * Trigger, wait and download in one call.
   */
  async run(baseUrl: string, body?: Record<string, unknown>): Promise<ExportFile> {
    const job = await this.trigger(baseUrl, body);
    const complete = await this.waitForFile(baseUrl, job);
    return this.download(baseUrl, complete.fileId);
  }

  private async checkProgress(baseUrl: string, job: ExportJob): Promise<ExportJob> {
    let response: Response;
    try {
      response = await this.request('GET', joinUrl(baseUrl, job.progressId));
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ExportPollError(job.progressId, `network error: ${message}`);
    }
    if (!response.ok) {
      throw new RemoteAPIError(`export progress ${job.progressId}`, response.status);
    }

    const payload = await readJson(response);
    const validate = SchemaValidationCache.getValidatorFromSchema<ExportProgressEnvelope>(ExportProgressEnvelopeSchema);
    if (!validate(payload)) {
      throw new RemoteAPIError(`export progress ${job.progressId} returned an unexpected body`, response.status);
    }

    const { status, percentComplete, fileId } = payload.result;
    return {
      progressId: job.progressId,
      status: toExportStatus(status),
      percentComplete,
      ...(fileId ? { fileId } : {}),
    };
  }
}

function parseDelimited(text: string, fileName: string): Pick<ExportFile, 'columns' | 'rows'> {
  let parsed: unknown;
  try {
    parsed = parse(text, {
      bom: true,
      delimiter: fileName.toLowerCase().endsWith('.tsv') ? '\t' : ',',
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ExportDownloadError(`${fileName} could not be parsed: ${message}`);
  }

  const table: string[][] = Array.isArray(parsed)
    ? parsed.map((row: unknown) => (Array.isArray(row) ? row.map((cell: unknown) => String(cell)) : []))
    : [];
  const [columns = [], ...records] = table;

  const rows = records.map((record) => {
    const row: Record<string, string> = {};
    columns.forEach((column, index) => {
      row[column] = record[index] ?? '';
    });
    return row;
  });

  return { columns, rows };
}
