/**
 * Atomic JSON file persistence.
 *
 * Each save writes a sibling temp file and renames it over the target, so
 * readers see either the previous document or the new one. Saves queue
 * behind each other in call order. Coalescing of rapid saves belongs to the
 * caller (see DebouncedTask).
 *
 *   const store = new PersistentStore<ChannelFile>('./config/channels.json');
 *   await store.save(file);
 *   const raw = await store.load();
 */

import { randomUUID } from 'node:crypto';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { logger } from './logger.js';
import { formatError } from './errors.js';

const log = logger.persistence;

export interface PersistentStoreConfig {
  /** Indent the written JSON (default: true) */
  prettyPrint: boolean;
  /** Spaces per indent level when pretty printing (default: 2) */
  indent: number;
  /** Shown in log lines to tell stores apart */
  label: string;
}

export const DEFAULT_PERSISTENT_STORE_CONFIG: PersistentStoreConfig = {
  prettyPrint: true,
  indent: 2,
  label: 'store',
};

export interface PersistentStoreStats {
  actualWrites: number;
  failedWrites: number;
  lastWriteTime: number | null;
  lastError: string | null;
}

export class PersistentStore<T> {
  private readonly filePath: string;
  private readonly config: PersistentStoreConfig;
  private readonly stats: PersistentStoreStats = {
    actualWrites: 0,
    failedWrites: 0,
    lastWriteTime: null,
    lastError: null,
  };
  private tail: Promise<void> = Promise.resolve();

  constructor(filePath: string, config: Partial<PersistentStoreConfig> = {}) {
    this.filePath = path.resolve(filePath);
    this.config = { ...DEFAULT_PERSISTENT_STORE_CONFIG, ...config };
  }

  getFilePath(): string {
    return this.filePath;
  }

  getStats(): PersistentStoreStats {
    return { ...this.stats };
  }

  /**
   * Queue an atomic write of `data`. The returned promise settles with this
   * write; a failure does not block later writes.
   */
  save(data: T): Promise<void> {
    const result = this.tail.then(() => this.replaceFile(this.serialize(data)));
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  /**
   * Parsed file contents, or null when the file does not exist yet.
   * Malformed JSON rejects with the parser's SyntaxError.
   */
  async load(): Promise<unknown> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return null;
      }
      throw error;
    }
    return JSON.parse(text);
  }

  private serialize(data: T): string {
    return this.config.prettyPrint ? JSON.stringify(data, null, this.config.indent) : JSON.stringify(data);
  }

  private async replaceFile(content: string): Promise<void> {
    const dir = path.dirname(this.filePath);
    const tempPath = path.join(dir, `.${path.basename(this.filePath)}.${randomUUID()}.tmp`);

    try {
      await fs.mkdir(dir, { recursive: true });
      await fs.writeFile(tempPath, content, 'utf-8');
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      this.stats.failedWrites++;
      this.stats.lastError = formatError(error);
      log.error(`Could not write ${this.config.label}`, { path: this.filePath, error });
      await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        log.warn('Could not remove temp file', { tempPath, error: formatError(cleanupError) });
      });
      throw error;
    }

    this.stats.actualWrites++;
    this.stats.lastWriteTime = Date.now();
    this.stats.lastError = null;
    log.debug(`Wrote ${this.config.label}`, { path: this.filePath, bytes: Buffer.byteLength(content) });
  }
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
