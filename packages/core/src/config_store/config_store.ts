/**
 * ConfigStore Interface
 *
 * Abstraction for settings persistence. Stores return the raw document;
 * ConfigManager validates and types it.
 */

import type { ListbridgeConfig } from '../config_manager';

/**
 * Implementations:
 * - FsConfigStore: YAML file on disk
 * - MemoryConfigStore: In-memory for tests
 *
 * @example
 * ```typescript
 * const store = new FsConfigStore(FsConfigStore.resolvePath({ explicit: options.config }));
 * const manager = new ConfigManager(store);
 * const qualtrics = await manager.getQualtricsConfig();
 * ```
 */
export interface ConfigStore {
  /**
   * Load the raw configuration document
   *
   * @returns The parsed document, or null when there is none
   */
  loadConfig(): Promise<unknown>;

  /**
   * Persist a configuration document
   */
  saveConfig(config: ListbridgeConfig): Promise<void>;

  /**
   * Where the document lives, for error messages
   */
  describe(): string;
}
