import { EventEmitter } from 'events';
import path from 'path';
import { watch } from 'chokidar';
import { loadConfigFile } from '../config/config-loader.js';
import type { Config } from '../config/schema.js';
import { errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import type { RuleSet } from './types.js';

const log = createLogger('rule-loader');

export interface RuleLoaderOptions {
  /** Reload when the file changes on disk. Defaults to true. */
  watch?: boolean;
}

/**
 * Owns the current config snapshot. A reload builds a whole new snapshot and
 * swaps the reference; snapshots already handed out are never modified.
 */
export class RuleLoader extends EventEmitter {
  readonly configPath: string;
  private config: Config | null = null;
  private watcher: ReturnType<typeof watch> | null = null;

  constructor(configPath: string) {
    super();
    this.configPath = path.resolve(configPath);
  }

  /** Loads the file once (throwing on failure) and starts watching it. */
  start(options: RuleLoaderOptions = {}): Config {
    const config = this.reload();

    if (options.watch !== false) {
      this.watcher = watch(this.configPath, {
        ignoreInitial: true,
        awaitWriteFinish: { stabilityThreshold: 300, pollInterval: 100 },
      });
      this.watcher.on('add', () => this.handleFileChange());
      this.watcher.on('change', () => this.handleFileChange());
    }

    return config;
  }

  async stop() {
    await this.watcher?.close();
    this.watcher = null;
  }

  getConfig(): Config {
    if (!this.config) {
      throw new Error('RuleLoader.start() has not been called');
    }
    return this.config;
  }

  getRules(): RuleSet {
    return this.getConfig().rules;
  }

  /** Re-reads the file. On failure the previous snapshot stays in place and the error is rethrown. */
  reload(): Config {
    const config = loadConfigFile(this.configPath);
    this.config = config;
    this.emit('change', config);
    return config;
  }

  private handleFileChange() {
    try {
      const config = this.reload();
      log.info(`Reloaded ${config.rules.length} rule(s) from ${this.configPath}`);
    } catch (err) {
      log.error(`Keeping previous rules: ${errorMessage(err)}`);
      this.emit('reload-error', err);
    }
  }
}
