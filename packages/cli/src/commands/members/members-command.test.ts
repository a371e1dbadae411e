// Mock DependencyInjectionService before importing
jest.mock('../../services/dependency-injection', () => ({
  DependencyInjectionService: {
    getInstance: jest.fn()
  }
}));

jest.mock('fs', () => ({
  promises: {
    readFile: jest.fn(),
    writeFile: jest.fn(),
    mkdir: jest.fn(),
  },
}));

import { promises as fs } from 'fs';
import { Errors } from '@listbridge/core';
import type { Sync } from '@listbridge/core';
import { MembersCommand, describeReport, parseDestinationRef, readIdentifiers } from './members-command';
import { DependencyInjectionService } from '../../services/dependency-injection';

const mockedFs = jest.mocked(fs);

// Mock console methods to capture output
const mockConsoleLog = jest.spyOn(console, 'log').mockImplementation();
const mockConsoleError = jest.spyOn(console, 'error').mockImplementation();
const mockProcessExit = jest.spyOn(process, 'exit').mockImplementation();

function jsonOutput(): unknown {
  const call = mockConsoleLog.mock.calls.find((args) => typeof args[0] === 'string' && args[0].includes('"success"'));
  if (!call) {
    throw new Error('no JSON output was printed');
  }
  return JSON.parse(String(call[0]));
}

function report(overrides: Partial<Sync.OperationReport> = {}): Sync.OperationReport {
  return {
    operation: 'copy',
    destination: 'qualtrics:Spring',
    added: ['uid2'],
    removed: [],
    skipped: [{ identifier: 'uid1', reason: 'already_present' }],
    duplicatesRemoved: 0,
    ...overrides,
  };
}

describe('MembersCommand', () => {
  let membersCommand: MembersCommand;
  let mockSyncModule: {
    copy: jest.Mock;
    remove: jest.Mock;
    sync: jest.Mock;
    transfer: jest.Mock;
    dedupe: jest.Mock;
  };
  let mockDependencyService: {
    configure: jest.Mock;
    getSyncModule: jest.Mock;
    getQualtricsDirectory: jest.Mock;
    getWorkgroupService: jest.Mock;
    getConfigManager: jest.Mock;
  };

  beforeEach(() => {
    jest.clearAllMocks();

    mockSyncModule = {
      copy: jest.fn(),
      remove: jest.fn(),
      sync: jest.fn(),
      transfer: jest.fn(),
      dedupe: jest.fn(),
    };

    mockDependencyService = {
      configure: jest.fn(),
      getSyncModule: jest.fn().mockResolvedValue(mockSyncModule),
      getQualtricsDirectory: jest.fn(),
      getWorkgroupService: jest.fn(),
      getConfigManager: jest.fn(),
    };

    (DependencyInjectionService.getInstance as jest.MockedFunction<typeof DependencyInjectionService.getInstance>)
      .mockReturnValue(mockDependencyService as never);

    membersCommand = new MembersCommand();
  });

  describe('parseDestinationRef', () => {
    it('[EARS-1] should split a mailing list reference at the first colon', () => {
      expect(parseDestinationRef('qualtrics:Spring Newsletter'))
        .toEqual({ service: 'qualtrics', listName: 'Spring Newsletter' });
      expect(parseDestinationRef('qualtrics:Fall: Alumni'))
        .toEqual({ service: 'qualtrics', listName: 'Fall: Alumni' });
    });

    it('[EARS-2] should read an optional stem from workgroup references', () => {
      expect(parseDestinationRef('workgroup:dept:staff'))
        .toEqual({ service: 'workgroup', stem: 'dept', listName: 'staff' });
      expect(parseDestinationRef('workgroup:staff'))
        .toEqual({ service: 'workgroup', listName: 'staff' });
    });

    it('[EARS-3] should reject unknown services and references without a name', () => {
      expect(() => parseDestinationRef('mailchimp:Spring'))
        .toThrow('Invalid destination: unknown service "mailchimp" (expected one of: qualtrics, workgroup)');
      expect(() => parseDestinationRef('qualtrics'))
        .toThrow('Invalid destination: "qualtrics" is not of the form <service>:<list name>');
      expect(() => parseDestinationRef('qualtrics:')).toThrow(Errors.InvalidDestinationError);
    });
  });

  describe('readIdentifiers', () => {
    it('[EARS-4] should append file identifiers after the arguments, skipping blanks and comments', async () => {
      mockedFs.readFile.mockResolvedValue('uid2\n\n# alumni\n uid3 \r\n');

      const identifiers = await readIdentifiers(['uid1'], '/tmp/roster.txt');

      expect(identifiers).toEqual(['uid1', 'uid2', 'uid3']);
      expect(mockedFs.readFile).toHaveBeenCalledWith('/tmp/roster.txt', 'utf-8');
    });

    it('[EARS-20] should keep command-line identifiers exactly as given', async () => {
      mockedFs.readFile.mockResolvedValue(' uid3 \n');

      const identifiers = await readIdentifiers([' uid1', 'uid2 '], '/tmp/roster.txt');

      expect(identifiers).toEqual([' uid1', 'uid2 ', 'uid3']);
    });

    it('[EARS-5] should not touch the filesystem without a file', async () => {
      expect(await readIdentifiers(['uid1'])).toEqual(['uid1']);
      expect(mockedFs.readFile).not.toHaveBeenCalled();
    });
  });

  describe('describeReport', () => {
    it('[EARS-6] should summarize a report and list identifiers when verbose', () => {
      expect(describeReport(report())).toEqual([
        'qualtrics:Spring: 1 added, 0 removed, 1 skipped, 0 duplicates removed',
      ]);
      expect(describeReport(report({ removed: ['uid9'] }), true)).toEqual([
        'qualtrics:Spring: 1 added, 1 removed, 1 skipped, 0 duplicates removed',
        '  + uid2',
        '  - uid9',
        '  = uid1 (already_present)',
      ]);
    });
  });

  describe('copy', () => {
    it('[EARS-7] WHEN copy is executed with identifiers THE SYSTEM SHALL copy them and print JSON', async () => {
      mockSyncModule.copy.mockResolvedValue(report());

      await membersCommand.executeCopy('qualtrics:Spring', ['uid1', 'uid2'], { json: true, config: '/etc/listbridge.yaml' });

      expect(mockDependencyService.configure).toHaveBeenCalledWith({
        configPath: '/etc/listbridge.yaml',
        verbose: false,
        quiet: false,
      });
      expect(mockSyncModule.copy).toHaveBeenCalledWith(['uid1', 'uid2'], { service: 'qualtrics', listName: 'Spring' });
      expect(jsonOutput()).toEqual({ success: true, data: report() });
      expect(mockProcessExit).not.toHaveBeenCalled();
    });

    it('[EARS-8] WHEN copy is executed with --from THE SYSTEM SHALL use that destination as the source', async () => {
      mockSyncModule.copy.mockResolvedValue(report());

      await membersCommand.executeCopy('qualtrics:Spring', [], { from: 'workgroup:dept:staff', quiet: true });

      expect(mockSyncModule.copy).toHaveBeenCalledWith(
        { service: 'workgroup', stem: 'dept', listName: 'staff' },
        { service: 'qualtrics', listName: 'Spring' },
      );
      expect(mockConsoleLog).not.toHaveBeenCalled();
    });

    it('[EARS-9] WHEN --from is combined with identifiers THE SYSTEM SHALL fail before syncing', async () => {
      await membersCommand.executeCopy('qualtrics:Spring', ['uid1'], { from: 'workgroup:staff' });

      expect(mockSyncModule.copy).not.toHaveBeenCalled();
      expect(mockConsoleError).toHaveBeenCalledWith(
        '❌ Failed to copy members: Invalid membership source: --from cannot be combined with identifiers or --file',
      );
      expect(mockProcessExit).toHaveBeenCalledWith(1);
    });

    it('[EARS-10] WHEN no identifiers are given THE SYSTEM SHALL fail', async () => {
      await membersCommand.executeCopy('qualtrics:Spring', [], {});

      expect(mockSyncModule.copy).not.toHaveBeenCalled();
      expect(mockProcessExit).toHaveBeenCalledWith(1);
    });
  });

  describe('sync and remove', () => {
    it('[EARS-11] WHEN sync succeeds THE SYSTEM SHALL print the summary in text mode', async () => {
      mockSyncModule.sync.mockResolvedValue(report({ operation: 'sync', removed: ['uid9'] }));

      await membersCommand.executeSync('qualtrics:Spring', ['uid1', 'uid2'], {});

      expect(mockSyncModule.sync).toHaveBeenCalledWith(['uid1', 'uid2'], { service: 'qualtrics', listName: 'Spring' });
      expect(mockConsoleLog.mock.calls).toEqual([
        ['✅ Synchronized qualtrics:Spring'],
        ['qualtrics:Spring: 1 added, 1 removed, 1 skipped, 0 duplicates removed'],
      ]);
    });

    it('[EARS-12] WHEN a remote call is refused THE SYSTEM SHALL report the error code in JSON', async () => {
      mockSyncModule.remove.mockRejectedValue(
        new Errors.PermissionError('DELETE workgroup:dept:staff member uid1', 403),
      );

      await membersCommand.executeRemove('workgroup:dept:staff', ['uid1'], { json: true });

      expect(jsonOutput()).toEqual({
        success: false,
        error: 'Failed to remove members: Permission denied (403): DELETE workgroup:dept:staff member uid1',
        code: 'PERMISSION_DENIED',
        exitCode: 1,
      });
      expect(mockProcessExit).toHaveBeenCalledWith(1);
    });

    it('[EARS-13] WHEN identifiers come from a file THE SYSTEM SHALL pass them to remove', async () => {
      mockedFs.readFile.mockResolvedValue('uid1\nuid2\n');
      mockSyncModule.remove.mockResolvedValue(report({ operation: 'remove', added: [], removed: ['uid1', 'uid2'], skipped: [] }));

      await membersCommand.executeRemove('workgroup:staff', [], { file: '/tmp/leavers.txt', quiet: true });

      expect(mockSyncModule.remove).toHaveBeenCalledWith(['uid1', 'uid2'], { service: 'workgroup', listName: 'staff' });
      expect(mockProcessExit).not.toHaveBeenCalled();
    });
  });

  describe('transfer and dedupe', () => {
    it('[EARS-14] WHEN transfer is executed THE SYSTEM SHALL pass parsed sources and destinations', async () => {
      const copy = report({ destination: 'workgroup:dept:new' });
      const removal = report({ operation: 'remove', destination: 'workgroup:dept:old', added: [], removed: ['uid1'], skipped: [] });
      mockSyncModule.transfer.mockResolvedValue({ copies: [copy], removals: [removal] });

      await membersCommand.executeTransfer(['uid1'], { from: ['workgroup:dept:old'], to: ['workgroup:dept:new'] });

      expect(mockSyncModule.transfer).toHaveBeenCalledWith(
        ['uid1'],
        [{ service: 'workgroup', stem: 'dept', listName: 'old' }],
        [{ service: 'workgroup', stem: 'dept', listName: 'new' }],
      );
      expect(mockConsoleLog.mock.calls).toEqual([
        ['✅ Transferred 1 identifiers'],
        ['workgroup:dept:new: 1 added, 0 removed, 1 skipped, 0 duplicates removed'],
        ['workgroup:dept:old: 0 added, 1 removed, 0 skipped, 0 duplicates removed'],
      ]);
    });

    it('[EARS-15] WHEN transfer has no identifiers THE SYSTEM SHALL fail', async () => {
      await membersCommand.executeTransfer([], { from: ['workgroup:old'], to: ['workgroup:new'] });

      expect(mockSyncModule.transfer).not.toHaveBeenCalled();
      expect(mockConsoleError).toHaveBeenCalledWith(
        '❌ Failed to transfer members: Invalid membership source: no identifiers given; pass them as arguments or with --file',
      );
    });

    it('[EARS-16] WHEN dedupe is executed THE SYSTEM SHALL report the removed duplicates', async () => {
      mockSyncModule.dedupe.mockResolvedValue(report({ operation: 'dedupe', added: [], skipped: [], duplicatesRemoved: 2 }));

      await membersCommand.executeDedupe('qualtrics:Spring', {});

      expect(mockSyncModule.dedupe).toHaveBeenCalledWith({ service: 'qualtrics', listName: 'Spring' });
      expect(mockConsoleLog.mock.calls).toEqual([
        ['✅ Checked qualtrics:Spring for duplicates'],
        ['qualtrics:Spring: 0 added, 0 removed, 0 skipped, 2 duplicates removed'],
      ]);
    });
  });

  describe('lists', () => {
    it('[EARS-17] WHEN lists is executed for qualtrics THE SYSTEM SHALL print the mailing list names', async () => {
      mockDependencyService.getQualtricsDirectory.mockResolvedValue({
        listNames: jest.fn().mockResolvedValue(['Spring', 'Fall']),
      });

      await membersCommand.executeLists('qualtrics', {});

      expect(mockConsoleLog.mock.calls).toEqual([['✅ 2 qualtrics lists'], ['Spring'], ['Fall']]);
    });

    it('[EARS-18] WHEN lists is executed for workgroups without --stem THE SYSTEM SHALL use the configured stem', async () => {
      const listWorkgroupNames = jest.fn().mockResolvedValue(['staff']);
      mockDependencyService.getConfigManager.mockReturnValue({
        getWorkgroupConfig: jest.fn().mockResolvedValue({ baseUrl: 'https://workgroups.test', token: 'test-token', stem: 'dept' }),
      });
      mockDependencyService.getWorkgroupService.mockResolvedValue({ listWorkgroupNames });

      await membersCommand.executeLists('workgroup', { json: true });

      expect(listWorkgroupNames).toHaveBeenCalledWith('dept');
      expect(jsonOutput()).toEqual({ success: true, data: ['staff'] });
    });

    it('[EARS-19] WHEN lists names an unknown service THE SYSTEM SHALL fail', async () => {
      await membersCommand.executeLists('mailchimp', {});

      expect(mockConsoleError).toHaveBeenCalledWith(
        '❌ Failed to list destinations: Invalid destination: unknown service "mailchimp" (expected one of: qualtrics, workgroup)',
      );
      expect(mockProcessExit).toHaveBeenCalledWith(1);
    });
  });
});
