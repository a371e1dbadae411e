/**
 * MemoryConfigStore - In-memory implementation of ConfigStore
 */

import type { ConfigStore } from '../config_store';
import type { ListbridgeConfig } from '../../config_manager';

/**
 * In-memory ConfigStore for tests. Accepts any document so validation
 * failures can be exercised.
 *
 * @example
 * ```typescript
 * const store = new MemoryConfigStore({ qualtrics: { dataCenter: 'ca1', apiToken: 'test-token' } });
 * const manager = new ConfigManager(store);
 * ```
 */
export class MemoryConfigStore implements ConfigStore {
  private config: unknown;

  constructor(initial: unknown = null) {
    this.config = initial;
  }

  async loadConfig(): Promise<unknown> {
    return this.config;
  }

  async saveConfig(config: ListbridgeConfig): Promise<void> {
    this.config = config;
  }

  describe(): string {
    return 'memory';
  }

  // ==================== Test Helper Methods ====================

  setConfig(config: unknown): void {
    this.config = config;
  }

  getConfig(): unknown {
    return this.config;
  }

  clear(): void {
    this.config = null;
  }
}
