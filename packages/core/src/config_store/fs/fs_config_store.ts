/**
 * FsConfigStore - Filesystem implementation of ConfigStore
 *
 * Reads and writes a YAML settings file.
 */

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as yaml from 'js-yaml';
import type { ConfigStore } from '../config_store';
import type { ListbridgeConfig } from '../../config_manager';
import { InvalidConfigError } from '../../errors';

export type ConfigPathOptions = {
  /** Path given on the command line */
  explicit?: string;
  env?: NodeJS.ProcessEnv;
  home?: string;
};

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * YAML-file ConfigStore.
 *
 * A missing file loads as null; a file that is not valid YAML raises
 * InvalidConfigError.
 *
 * @example
 * ```typescript
 * const store = new FsConfigStore('/home/me/.config/listbridge/config.yaml');
 * const raw = await store.loadConfig();
 * ```
 */
export class FsConfigStore implements ConfigStore {
  constructor(private readonly configPath: string) {}

  /**
   * Resolution order: explicit path, `$LISTBRIDGE_CONFIG`,
   * `~/.config/listbridge/config.yaml`.
   */
  static resolvePath(options: ConfigPathOptions = {}): string {
    const env = options.env ?? process.env;
    if (options.explicit) {
      return path.resolve(options.explicit);
    }
    const fromEnv = env['LISTBRIDGE_CONFIG'];
    if (fromEnv) {
      return path.resolve(fromEnv);
    }
    return path.join(options.home ?? os.homedir(), '.config', 'listbridge', 'config.yaml');
  }

  describe(): string {
    return this.configPath;
  }

  async loadConfig(): Promise<unknown> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error: unknown) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }

    try {
      return yaml.load(content) ?? null;
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new InvalidConfigError(this.configPath, [message]);
    }
  }

  async saveConfig(config: ListbridgeConfig): Promise<void> {
    await fs.mkdir(path.dirname(this.configPath), { recursive: true });
    await fs.writeFile(this.configPath, yaml.dump(config), { encoding: 'utf-8', mode: 0o600 });
  }
}
