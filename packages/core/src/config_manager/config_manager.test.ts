import { ConfigManager } from './config_manager';
import { MemoryConfigStore } from '../config_store';
import { InvalidConfigError } from '../errors';
import type { ListbridgeConfig } from './config_manager.types';

describe('ConfigManager', () => {
  const fullConfig: ListbridgeConfig = {
    qualtrics: { dataCenter: 'ca1', apiToken: 'test-token', directoryId: 'POOL_1' },
    workgroup: { baseUrl: 'https://workgroups.example.test/workgroups/2.0', token: 'test-token', stem: 'research' },
    profiles: { baseUrl: 'https://profiles.example.test/cap-api/api', token: 'test-token' },
    sync: { maxAttempts: 4 },
    export: { maxPollAttempts: 12, maxIntervalSeconds: 60 },
    logLevel: 'debug',
  };

  describe('loadConfig', () => {
    it('[EARS-1] should return a valid document unchanged', async () => {
      const manager = new ConfigManager(new MemoryConfigStore(fullConfig));

      await expect(manager.loadConfig()).resolves.toEqual(fullConfig);
    });

    it('[EARS-2] should treat a missing document as empty', async () => {
      const manager = new ConfigManager(new MemoryConfigStore(null));

      await expect(manager.loadConfig()).resolves.toEqual({});
      await expect(manager.getQualtricsConfig()).resolves.toBeNull();
    });

    it('[EARS-3] should reject an invalid document with every violation', async () => {
      const manager = new ConfigManager(new MemoryConfigStore({
        qualtrics: { dataCenter: 'ca1' },
        sync: { maxAttempts: 0 },
      }));

      const error = await manager.loadConfig().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InvalidConfigError);
      expect(error).toMatchObject({
        source: 'memory',
        violations: [
          "/qualtrics: must have required property 'apiToken'",
          '/sync/maxAttempts: must be >= 1',
        ],
      });
    });

    it('[EARS-4] should reject unknown top-level keys', async () => {
      const manager = new ConfigManager(new MemoryConfigStore({ qualtrix: {} }));

      await expect(manager.loadConfig()).rejects.toThrow(
        'Invalid configuration in memory: /: must NOT have additional properties',
      );
    });

    it('[EARS-5] should read the store once', async () => {
      const store = new MemoryConfigStore(fullConfig);
      const loadSpy = jest.spyOn(store, 'loadConfig');
      const manager = new ConfigManager(store);

      await manager.getQualtricsConfig();
      await manager.getRetryPolicy();

      expect(loadSpy).toHaveBeenCalledTimes(1);
    });
  });

  describe('typed accessors', () => {
    it('[EARS-6] should expose each section', async () => {
      const manager = new ConfigManager(new MemoryConfigStore(fullConfig));

      await expect(manager.getWorkgroupConfig()).resolves.toEqual(fullConfig.workgroup);
      await expect(manager.getProfileConfig()).resolves.toEqual(fullConfig.profiles);
      await expect(manager.getRetryPolicy()).resolves.toEqual({ maxAttempts: 4 });
      await expect(manager.getExportPolicy()).resolves.toEqual({ maxPollAttempts: 12, maxIntervalSeconds: 60 });
      await expect(manager.getLogLevel()).resolves.toBe('debug');
    });

    it('[EARS-7] should fall back to defaults', async () => {
      const manager = new ConfigManager(new MemoryConfigStore({}));

      await expect(manager.getRetryPolicy()).resolves.toEqual({ maxAttempts: 10 });
      await expect(manager.getExportPolicy()).resolves.toEqual({});
      await expect(manager.getLogLevel()).resolves.toBe('info');
    });
  });

  describe('saveConfig', () => {
    it('[EARS-8] should validate before persisting', async () => {
      const store = new MemoryConfigStore();
      const manager = new ConfigManager(store);

      await manager.saveConfig({ sync: { maxAttempts: 2 } });

      expect(store.getConfig()).toEqual({ sync: { maxAttempts: 2 } });
      await expect(manager.getRetryPolicy()).resolves.toEqual({ maxAttempts: 2 });
    });
  });
});
