/**
 * ConfigManager - Settings Manager
 *
 * Validates the settings document from a ConfigStore and provides typed
 * access with defaults.
 */

import type { ConfigStore } from '../config_store';
import type { LogLevel } from '../logger';
import { InvalidConfigError } from '../errors';
import { SchemaValidationCache, formatSchemaErrors } from '../schemas';
import { DEFAULT_MAX_ATTEMPTS } from '../request_executor';
import { ListbridgeConfigSchema } from './config_schema';
import type {
  ExportPolicy,
  ListbridgeConfig,
  ProfileConfig,
  QualtricsConfig,
  RetryPolicy,
  WorkgroupConfig,
} from './config_manager.types';

/**
 * Configuration Manager Class
 *
 * The document is loaded and validated once; later calls reuse it.
 *
 * @example
 * ```typescript
 * const configManager = new ConfigManager(new FsConfigStore(path));
 * const { maxAttempts } = await configManager.getRetryPolicy();
 *
 * // Test usage
 * const configManager = new ConfigManager(new MemoryConfigStore({ sync: { maxAttempts: 3 } }));
 * ```
 */
export class ConfigManager {
  private readonly configStore: ConfigStore;
  private cached: Promise<ListbridgeConfig> | null = null;

  constructor(configStore: ConfigStore) {
    this.configStore = configStore;
  }

  /**
   * Load and validate the settings. A missing document is an empty one.
   */
  async loadConfig(): Promise<ListbridgeConfig> {
    if (!this.cached) {
      this.cached = this.readAndValidate();
    }
    return this.cached;
  }

  async getQualtricsConfig(): Promise<QualtricsConfig | null> {
    const config = await this.loadConfig();
    return config.qualtrics ?? null;
  }

  async getWorkgroupConfig(): Promise<WorkgroupConfig | null> {
    const config = await this.loadConfig();
    return config.workgroup ?? null;
  }

  async getProfileConfig(): Promise<ProfileConfig | null> {
    const config = await this.loadConfig();
    return config.profiles ?? null;
  }

  async getRetryPolicy(): Promise<RetryPolicy> {
    const config = await this.loadConfig();
    return { maxAttempts: config.sync?.maxAttempts ?? DEFAULT_MAX_ATTEMPTS };
  }

  async getExportPolicy(): Promise<ExportPolicy> {
    const config = await this.loadConfig();
    return { ...config.export };
  }

  async getLogLevel(): Promise<LogLevel> {
    const config = await this.loadConfig();
    return config.logLevel ?? 'info';
  }

  /**
   * Validate and persist a new settings document
   */
  async saveConfig(config: ListbridgeConfig): Promise<void> {
    const validated = this.validate(config);
    await this.configStore.saveConfig(validated);
    this.cached = Promise.resolve(validated);
  }

  private async readAndValidate(): Promise<ListbridgeConfig> {
    try {
      const raw = await this.configStore.loadConfig();
      return this.validate(raw ?? {});
    } catch (error: unknown) {
      this.cached = null;
      throw error;
    }
  }

  private validate(raw: unknown): ListbridgeConfig {
    const validator = SchemaValidationCache.getValidatorFromSchema<ListbridgeConfig>(ListbridgeConfigSchema);
    if (!validator(raw)) {
      throw new InvalidConfigError(this.configStore.describe(), formatSchemaErrors(validator.errors));
    }
    return raw;
  }
}
