import { strToU8, zipSync } from 'fflate';
import { ExportPoller } from './export_poller';
import type { MakeRequestFn } from '../http';
import type { SleepFn } from '../request_executor';
import {
  ExportDownloadError,
  ExportFailedError,
  ExportPollError,
  ExportTimeoutError,
  ExportTriggerError,
} from '../errors';
import { createBinaryResponse, createMockResponse } from '../test_support/mock_response';

const BASE = 'https://ca1.qualtrics.com/API/v3/surveys/SV_abcdefghijklmno/export-responses';

function progress(status: string, percentComplete: number, fileId?: string) {
  return createMockResponse(200, { result: { status, percentComplete, ...(fileId ? { fileId } : {}) } });
}

function zipOf(files: Record<string, string>): Uint8Array {
  const entries: Record<string, Uint8Array> = {};
  for (const [name, text] of Object.entries(files)) {
    entries[name] = strToU8(text);
  }
  return zipSync(entries);
}

describe('ExportPoller', () => {
  let request: jest.MockedFunction<MakeRequestFn>;
  let sleep: jest.MockedFunction<SleepFn>;

  beforeEach(() => {
    request = jest.fn();
    sleep = jest.fn().mockResolvedValue(undefined);
  });

  describe('trigger', () => {
    it('[EARS-1] should POST the export request and return an in-progress job', async () => {
      request.mockResolvedValueOnce(createMockResponse(200, { result: { progressId: 'ES_1' } }));
      const poller = new ExportPoller({ request, sleep });

      const job = await poller.trigger(BASE);

      expect(job).toEqual({ progressId: 'ES_1', status: 'in_progress', percentComplete: 0 });
      expect(request).toHaveBeenCalledWith('POST', BASE, { body: { format: 'csv' } });
    });

    it('[EARS-2] should fail when the response carries no progress id', async () => {
      request.mockResolvedValueOnce(createMockResponse(200, { meta: { httpStatus: '200 - OK' } }));
      const poller = new ExportPoller({ request, sleep });

      await expect(poller.trigger(BASE)).rejects.toBeInstanceOf(ExportTriggerError);
    });

    it('[EARS-3] should fail with the status code on a non-success response', async () => {
      request.mockResolvedValueOnce(createMockResponse(400, {}));
      const poller = new ExportPoller({ request, sleep });

      await expect(poller.trigger(BASE)).rejects.toMatchObject({
        code: 'EXPORT_TRIGGER_FAILED',
        statusCode: 400,
      });
    });
  });

  describe('waitForFile', () => {
    const job = { progressId: 'ES_1', status: 'in_progress' as const, percentComplete: 0 };

    it('[EARS-4] should poll with exponential backoff until complete', async () => {
      request
        .mockResolvedValueOnce(progress('inProgress', 10))
        .mockResolvedValueOnce(progress('inProgress', 55.5))
        .mockResolvedValueOnce(progress('complete', 100, 'F_1'));
      const poller = new ExportPoller({ request, sleep });

      const done = await poller.waitForFile(BASE, job);

      expect(done).toEqual({ progressId: 'ES_1', status: 'complete', percentComplete: 100, fileId: 'F_1' });
      expect(request).toHaveBeenCalledWith('GET', `${BASE}/ES_1`);
      expect(sleep.mock.calls).toEqual([[2000], [4000]]);
    });

    it('[EARS-5] should cap a single wait at maxIntervalSeconds', async () => {
      request
        .mockResolvedValueOnce(progress('inProgress', 10))
        .mockResolvedValueOnce(progress('inProgress', 20))
        .mockResolvedValueOnce(progress('complete', 100, 'F_1'));
      const poller = new ExportPoller({ request, sleep, maxIntervalSeconds: 3 });

      await poller.waitForFile(BASE, job);

      expect(sleep.mock.calls).toEqual([[2000], [3000]]);
    });

    it('[EARS-6] should raise ExportFailedError when the job fails', async () => {
      request.mockResolvedValueOnce(progress('failed', 30));
      const poller = new ExportPoller({ request, sleep });

      await expect(poller.waitForFile(BASE, job)).rejects.toBeInstanceOf(ExportFailedError);
      expect(sleep).not.toHaveBeenCalled();
    });

    it('[EARS-7] should raise ExportTimeoutError after maxPollAttempts checks', async () => {
      request.mockResolvedValue(progress('inProgress', 5));
      const poller = new ExportPoller({ request, sleep, maxPollAttempts: 3 });

      const error = await poller.waitForFile(BASE, job).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ExportTimeoutError);
      expect(error).toMatchObject({ progressId: 'ES_1', attempts: 3 });
      expect(request).toHaveBeenCalledTimes(3);
      expect(sleep).toHaveBeenCalledTimes(2);
    });

    it('[EARS-8] should warn when polling is unbounded', async () => {
      const logger = { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
      request.mockResolvedValueOnce(progress('complete', 100, 'F_1'));
      const poller = new ExportPoller({ request, sleep, logger });

      await poller.waitForFile(BASE, job);

      expect(logger.warn).toHaveBeenCalledWith('Polling export ES_1 without an attempt limit');
      expect(logger.info).toHaveBeenCalledWith('Export is 100% complete');
    });

    it('[EARS-14] should stop polling once a file id is reported', async () => {
      request.mockResolvedValueOnce(progress('inProgress', 99, 'F_1'));
      const poller = new ExportPoller({ request, sleep, maxPollAttempts: 5 });

      const done = await poller.waitForFile(BASE, job);

      expect(done).toEqual({ progressId: 'ES_1', status: 'complete', percentComplete: 99, fileId: 'F_1' });
      expect(request).toHaveBeenCalledTimes(1);
      expect(sleep).not.toHaveBeenCalled();
    });

    it('[EARS-15] should wrap a network failure during a status check', async () => {
      request
        .mockResolvedValueOnce(progress('inProgress', 10))
        .mockRejectedValueOnce(new TypeError('fetch failed'));
      const poller = new ExportPoller({ request, sleep, maxPollAttempts: 5 });

      const error = await poller.waitForFile(BASE, job).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ExportPollError);
      expect(error).toMatchObject({
        code: 'EXPORT_POLL_FAILED',
        progressId: 'ES_1',
        message: 'Export ES_1 status could not be read: network error: fetch failed',
      });
      expect(request).toHaveBeenCalledTimes(2);
    });
  });

  describe('download', () => {
    it('[EARS-9] should decode the first delimited-text entry of the archive', async () => {
      request.mockResolvedValueOnce(createBinaryResponse(200, zipOf({
        'Survey.csv': 'ResponseId,Q1\nR_1,yes\nR_2,"no, thanks"\n',
      })));
      const poller = new ExportPoller({ request, sleep });

      const file = await poller.download(BASE, 'F_1');

      expect(request).toHaveBeenCalledWith('GET', `${BASE}/F_1/file`);
      expect(file).toEqual({
        fileName: 'Survey.csv',
        columns: ['ResponseId', 'Q1'],
        rows: [
          { ResponseId: 'R_1', Q1: 'yes' },
          { ResponseId: 'R_2', Q1: 'no, thanks' },
        ],
      });
    });

    it('[EARS-10] should reject an empty archive', async () => {
      request.mockResolvedValueOnce(createBinaryResponse(200, new Uint8Array(0)));
      const poller = new ExportPoller({ request, sleep });

      await expect(poller.download(BASE, 'F_1')).rejects.toThrow('Export file could not be downloaded: archive is empty');
    });

    it('[EARS-11] should reject bytes that are not a zip archive', async () => {
      request.mockResolvedValueOnce(createBinaryResponse(200, strToU8('this is not a zip archive at all')));
      const poller = new ExportPoller({ request, sleep });

      await expect(poller.download(BASE, 'F_1')).rejects.toBeInstanceOf(ExportDownloadError);
    });

    it('[EARS-12] should reject a non-success download', async () => {
      request.mockResolvedValueOnce(createMockResponse(404, {}));
      const poller = new ExportPoller({ request, sleep });

      await expect(poller.download(BASE, 'F_1')).rejects.toMatchObject({ statusCode: 404 });
    });
  });

  describe('run', () => {
    it('[EARS-13] should trigger, poll and download in sequence', async () => {
      request
        .mockResolvedValueOnce(createMockResponse(200, { result: { progressId: 'ES_9' } }))
        .mockResolvedValueOnce(progress('inProgress', 40))
        .mockResolvedValueOnce(progress('complete', 100, 'F_9'))
        .mockResolvedValueOnce(createBinaryResponse(200, zipOf({ 'Survey.csv': 'ResponseId\nR_1\n' })));
      const poller = new ExportPoller({ request, sleep, maxPollAttempts: 5 });

      const file = await poller.run(BASE);

      expect(file.rows).toEqual([{ ResponseId: 'R_1' }]);
      expect(request.mock.calls.map(([method, url]) => `${method} ${url}`)).toEqual([
        `POST ${BASE}`,
        `GET ${BASE}/ES_9`,
        `GET ${BASE}/ES_9`,
        `GET ${BASE}/F_9/file`,
      ]);
      expect(sleep).toHaveBeenCalledTimes(1);
    });
  });
});
