/**
 * JSON-file persistence gateway for channel records.
 *
 * File layout: `{ "version": 1, "channels": [ChannelRecord, ...] }`. A bare
 * array of records is also accepted on load. Records that fail validation
 * are skipped with a warning so one bad entry does not lose the rest.
 */

import { z } from 'zod';
import { channelRecordSchema, type ChannelRecord } from '../types/channel.js';
import type { PersistenceGateway } from '../types/collaborators.js';
import { logger } from '../utils/logger.js';
import { PersistentStore, type PersistentStoreStats } from '../utils/persistent-store.js';
import { describeIssues } from './channel-state.js';

const log = logger.persistence;

export const CHANNEL_FILE_VERSION = 1;

interface ChannelFile {
  version: number;
  channels: ChannelRecord[];
}

const channelFileSchema = z.union([
  z.object({
    version: z.number().int(),
    channels: z.array(z.unknown()),
  }),
  z.array(z.unknown()),
]);

export class JsonChannelGateway implements PersistenceGateway {
  private readonly store: PersistentStore<ChannelFile>;

  constructor(filePath: string) {
    this.store = new PersistentStore<ChannelFile>(filePath, { label: 'channel file' });
  }

  get filePath(): string {
    return this.store.getFilePath();
  }

  async saveAll(records: ChannelRecord[]): Promise<void> {
    await this.store.save({ version: CHANNEL_FILE_VERSION, channels: records });
  }

  async loadAll(): Promise<ChannelRecord[]> {
    const raw = await this.store.load();
    if (raw === null) {
      log.info('No channel file yet', { path: this.filePath });
      return [];
    }

    const file = channelFileSchema.safeParse(raw);
    if (!file.success) {
      throw new Error(`Unrecognised channel file ${this.filePath}: ${describeIssues(file.error).join('; ')}`);
    }

    const entries = Array.isArray(file.data) ? file.data : file.data.channels;
    const records: ChannelRecord[] = [];

    entries.forEach((entry, index) => {
      const parsed = channelRecordSchema.safeParse(entry);
      if (parsed.success) {
        records.push(parsed.data);
      } else {
        log.warn('Skipping invalid channel record', {
          index,
          issues: describeIssues(parsed.error),
        });
      }
    });

    log.info('Channels loaded', { path: this.filePath, loaded: records.length, skipped: entries.length - records.length });
    return records;
  }

  getStats(): PersistentStoreStats {
    return this.store.getStats();
  }
}
