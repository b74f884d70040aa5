/**
 * Channel Registry
 *
 * The shared collection of monitored channels.
 *
 * - Structural mutations (add/remove/clear) run one at a time under a mutex
 *   and replace the snapshot instead of editing it, so a dispatcher iterating
 *   `all()` never sees a half-applied change.
 * - Every structural mutation and every `requestPersist()` schedules one
 *   debounced `saveAll` of the snapshot current at write time.
 * - A failed write is logged and reported; the in-memory channels stay
 *   authoritative and the next debounced write tries again.
 */

import type { PersistenceGateway } from '../types/collaborators.js';
import { DebouncedTask } from '../utils/debounced-task.js';
import { DuplicateChannelError, PersistenceFailureError, formatError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { Semaphore } from '../utils/semaphore.js';
import type { ChannelState } from './channel-state.js';

const log = logger.registry;

export interface ChannelRegistryOptions {
  gateway: PersistenceGateway;
  /** @default 2000 */
  persistDebounceMs?: number;
  onPersistenceError?: (error: PersistenceFailureError) => void;
}

export interface RegistryStats {
  channels: number;
  persistRequests: number;
  writes: number;
  failedWrites: number;
  lastError: string | null;
}

export class ChannelRegistry {
  private snapshot: readonly ChannelState[] = Object.freeze([]);
  private readonly mutex = new Semaphore(1);
  private readonly persistTask: DebouncedTask;
  private readonly gateway: PersistenceGateway;
  private readonly onPersistenceError?: (error: PersistenceFailureError) => void;
  private writes = 0;
  private failedWrites = 0;
  private lastError: string | null = null;

  constructor(options: ChannelRegistryOptions) {
    this.gateway = options.gateway;
    this.onPersistenceError = options.onPersistenceError;
    this.persistTask = new DebouncedTask(() => this.persist(), {
      delayMs: options.persistDebounceMs ?? 2000,
      onError: (error) => this.reportFailure(error),
    });
  }

  /**
   * Immutable view of the registered channels.
   */
  all(): readonly ChannelState[] {
    return this.snapshot;
  }

  get size(): number {
    return this.snapshot.length;
  }

  findById(id: string): ChannelState | undefined {
    return this.snapshot.find((channel) => channel.id === id);
  }

  has(id: string): boolean {
    return this.snapshot.some((channel) => channel.id === id);
  }

  async add(channel: ChannelState): Promise<void> {
    await this.mutex.runExclusive(() => {
      if (this.has(channel.id)) {
        throw new DuplicateChannelError(channel.id);
      }
      this.snapshot = Object.freeze([...this.snapshot, channel]);
    });
    log.debug('Channel added', { channelId: channel.id, url: channel.url });
    this.requestPersist();
  }

  /**
   * Add several channels in one mutation. Duplicates of already registered
   * ids, or within the batch, are skipped and returned.
   */
  async addMany(channels: readonly ChannelState[]): Promise<ChannelState[]> {
    const skipped: ChannelState[] = [];
    await this.mutex.runExclusive(() => {
      const seen = new Set(this.snapshot.map((channel) => channel.id));
      const accepted: ChannelState[] = [];
      for (const channel of channels) {
        if (seen.has(channel.id)) {
          skipped.push(channel);
          continue;
        }
        seen.add(channel.id);
        accepted.push(channel);
      }
      this.snapshot = Object.freeze([...this.snapshot, ...accepted]);
    });
    if (skipped.length > 0) {
      log.warn('Skipped duplicate channels', { ids: skipped.map((channel) => channel.id) });
    }
    this.requestPersist();
    return skipped;
  }

  /**
   * @returns false if the channel was not registered
   */
  async remove(channel: ChannelState): Promise<boolean> {
    const removed = await this.mutex.runExclusive(() => {
      const next = this.snapshot.filter((existing) => existing.id !== channel.id);
      if (next.length === this.snapshot.length) {
        return false;
      }
      this.snapshot = Object.freeze(next);
      return true;
    });

    if (removed) {
      log.debug('Channel removed', { channelId: channel.id });
      this.requestPersist();
    }
    return removed;
  }

  /**
   * Remove every channel and return the ones that were registered.
   */
  async clear(): Promise<readonly ChannelState[]> {
    const removed = await this.mutex.runExclusive(() => {
      const previous = this.snapshot;
      this.snapshot = Object.freeze([]);
      return previous;
    });
    log.info('Registry cleared', { removed: removed.length });
    this.requestPersist();
    return removed;
  }

  /**
   * Schedule a debounced write of the current snapshot.
   */
  requestPersist(): void {
    this.persistTask.trigger();
  }

  /**
   * Write any pending change now and wait for writes in progress.
   */
  async flush(): Promise<void> {
    await this.persistTask.flush();
  }

  /**
   * Drop a pending write without running it.
   */
  cancelPendingPersist(): void {
    this.persistTask.cancel();
  }

  getStats(): RegistryStats {
    return {
      channels: this.snapshot.length,
      persistRequests: this.persistTask.getStats().requests,
      writes: this.writes,
      failedWrites: this.failedWrites,
      lastError: this.lastError,
    };
  }

  private async persist(): Promise<void> {
    const records = this.snapshot.map((channel) => channel.toRecord());
    await this.gateway.saveAll(records);
    this.writes++;
    this.lastError = null;
    log.debug('Channels persisted', { count: records.length });
  }

  private reportFailure(cause: unknown): void {
    this.failedWrites++;
    this.lastError = formatError(cause);
    const error = new PersistenceFailureError(`Failed to persist channels: ${this.lastError}`, cause);
    log.error('Persistence failed; in-memory state kept', { error: cause });

    if (!this.onPersistenceError) {
      return;
    }
    try {
      this.onPersistenceError(error);
    } catch (callbackError) {
      log.error('Persistence error callback threw', { error: callbackError });
    }
  }
}
