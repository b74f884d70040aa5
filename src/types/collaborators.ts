/**
 * Collaborator contracts
 *
 * The scheduler decides when to probe and when to record; resolving stream
 * URLs, capturing media, delivering notifications and storing records happen
 * behind these interfaces.
 */

import type { ChannelState } from '../core/channel-state.js';
import type { ChannelRecord } from './channel.js';

/**
 * Result of resolving a channel URL. Offline is an ordinary result.
 */
export interface StreamInfo {
  isLive: boolean;
  anchorName: string;
  title: string;
  /** Set when the resolver could only partly answer */
  error?: string;
}

export interface PlatformInfo {
  /** Display name of the platform */
  platform: string;
  /** Stable key used to bound concurrent probes */
  platformKey: string;
}

export interface StreamResolver {
  /**
   * Must be safe to call concurrently up to the per-platform permit count.
   */
  resolve(url: string, platformHint: string): Promise<StreamInfo>;

  /**
   * Recognise the platform of a URL. Returning null falls back to the host name.
   */
  detectPlatform?(url: string): PlatformInfo | null;
}

/**
 * A running capture owned by the scheduler until `done` settles.
 */
export interface RecordingHandle {
  /** True once a stop has been requested or the recorder decided to stop */
  readonly shouldStop: boolean;
  /** Ask the recorder to stop; resolves when it acknowledged the request */
  requestStop(): Promise<void>;
  /** Settles when capture has ended, for whatever reason */
  readonly done: Promise<void>;
}

export interface StreamRecorder {
  start(channel: ChannelState, stream: StreamInfo): Promise<RecordingHandle>;
}

/**
 * Writes must be atomic and idempotent on replay.
 */
export interface PersistenceGateway {
  saveAll(records: ChannelRecord[]): Promise<void>;
  loadAll(): Promise<ChannelRecord[]>;
}

export interface Notifier {
  notify(title: string, message: string): Promise<void> | void;
}

export interface MessagePusher {
  pushMessage(title: string, body: string): Promise<void> | void;
}

export interface DiskSpaceGuard {
  freeSpaceBelow(thresholdGb: number, path: string): Promise<boolean>;
}
