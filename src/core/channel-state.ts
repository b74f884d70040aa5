/**
 * Channel State
 *
 * The mutable record for one monitored channel: identity, configuration,
 * live/recording flags, session timers and the learned liveness statistics
 * that drive adaptive polling.
 *
 * Learned statistics:
 * - `priorityScore`: exponential moving average of observed liveness. Reacts
 *   quickly to live observations (alphaActive) and slowly to offline ones
 *   (alphaOffline), with extra geometric decay after 30 days without a live
 *   observation.
 * - `historicalIntervals`: per weekday, the last five hours of day the
 *   channel was seen live.
 * - `consistencyScore`: how full those five-slot days are.
 * - `liveCheckCount` / `liveFoundCount`: bounded legacy counters, diagnostic
 *   only. Scheduling reads the EMA.
 */

import { randomUUID } from 'node:crypto';
import type { z } from 'zod';
import {
  channelConfigSchema,
  channelPatchSchema,
  type ChannelConfig,
  type ChannelConfigInput,
  type ChannelPatch,
  type ChannelRecord,
  type ChannelStatus,
  type HistoricalIntervals,
  MAX_HOURS_PER_DAY,
} from '../types/channel.js';
import { ChannelPatchError, InvalidChannelConfigError } from '../utils/errors.js';

/** Days without a live observation before recency decay starts */
export const DECAY_GRACE_DAYS = 30;

/** Extra decay days are capped here */
export const DECAY_MAX_DAYS = 60;

export const DECAY_FACTOR_PER_DAY = 0.99;

/** Legacy counters are halved once the check count exceeds this */
export const LEGACY_COUNTER_LIMIT = 100;

const DAY_MS = 24 * 60 * 60 * 1000;

export interface EmaOptions {
  /** @default 0.1 */
  alphaActive?: number;
  /** @default 0.01 */
  alphaOffline?: number;
}

export class ChannelState {
  readonly id: string;
  readonly url: string;
  platform: string | null;
  platformKey: string | null;

  config: Omit<ChannelConfig, 'url'>;

  // Runtime flags
  isLive = false;
  isRecording = false;
  isChecking = false;
  manuallyStopped = false;
  stoppingInProgress = false;
  forceStop = false;
  notifiedLiveStart = false;
  notifiedLiveEnd = false;
  status: ChannelStatus = 'monitoring';
  liveTitle: string | null = null;

  // Timers (epoch ms)
  detectionTime: number | null = null;
  startTime: number | null = null;
  cumulativeDurationMs = 0;
  lastDurationMs: number;

  // Learned statistics
  private score: number;
  historicalIntervals: HistoricalIntervals;
  lastSeenLiveAt: number | null;
  consistencyScore: number;
  liveCheckCount: number;
  liveFoundCount: number;
  readonly addedAt: number | null;
  lastActiveAt: number | null;

  /** Polling interval chosen by the last dispatch cycle */
  loopIntervalSeconds: number | null = null;

  private constructor(record: ChannelRecord) {
    const { id, url, platform, platformKey, priorityScore, historicalIntervals, lastSeenLiveAt,
      consistencyScore, liveCheckCount, liveFoundCount, addedAt, lastActiveAt, lastDurationMs,
      ...config } = record;

    this.id = id;
    this.url = url;
    this.platform = platform;
    this.platformKey = platformKey;
    this.config = config;
    this.historicalIntervals = cloneIntervals(historicalIntervals);
    this.lastSeenLiveAt = lastSeenLiveAt;
    this.consistencyScore = consistencyScore;
    this.liveCheckCount = liveCheckCount;
    this.liveFoundCount = liveFoundCount;
    this.addedAt = addedAt;
    this.lastActiveAt = lastActiveAt;
    this.lastDurationMs = lastDurationMs;
    this.score = clampUnit(priorityScore ?? (liveCheckCount > 0 ? liveFoundCount / liveCheckCount : 0));
  }

  /**
   * Register a new channel from user-supplied configuration.
   */
  static create(input: ChannelConfigInput, options: { id?: string; now?: number } = {}): ChannelState {
    const parsed = channelConfigSchema.safeParse(input);
    if (!parsed.success) {
      throw new InvalidChannelConfigError(describeIssues(parsed.error));
    }

    return new ChannelState({
      ...parsed.data,
      id: options.id ?? randomUUID(),
      platform: null,
      platformKey: null,
      historicalIntervals: {},
      lastSeenLiveAt: null,
      consistencyScore: 0,
      liveCheckCount: 0,
      liveFoundCount: 0,
      addedAt: options.now ?? Date.now(),
      lastActiveAt: null,
      lastDurationMs: 0,
    });
  }

  /**
   * Restore a channel from its persisted record. A missing priority score is
   * derived from the legacy counters.
   */
  static fromRecord(record: ChannelRecord): ChannelState {
    return new ChannelState(record);
  }

  toRecord(): ChannelRecord {
    return {
      ...this.config,
      scheduledWeekdays: this.config.scheduledWeekdays ? [...this.config.scheduledWeekdays] : undefined,
      id: this.id,
      url: this.url,
      platform: this.platform,
      platformKey: this.platformKey,
      priorityScore: this.score,
      historicalIntervals: cloneIntervals(this.historicalIntervals),
      lastSeenLiveAt: this.lastSeenLiveAt,
      consistencyScore: this.consistencyScore,
      liveCheckCount: this.liveCheckCount,
      liveFoundCount: this.liveFoundCount,
      addedAt: this.addedAt,
      lastActiveAt: this.lastActiveAt,
      lastDurationMs: this.lastDurationMs,
    };
  }

  get priorityScore(): number {
    return this.score;
  }

  get title(): string {
    return `${this.config.streamerName} - ${this.config.quality}`;
  }

  get hasHistory(): boolean {
    return Object.values(this.historicalIntervals).some((hours) => hours.length > 0);
  }

  /**
   * Apply a configuration patch. Unknown keys and invalid values reject the
   * whole patch.
   *
   * @returns the keys that were applied
   */
  applyPatch(patch: unknown): Array<keyof ChannelPatch> {
    const parsed = channelPatchSchema.safeParse(patch);
    if (!parsed.success) {
      throw new ChannelPatchError(this.id, describeIssues(parsed.error));
    }

    const applied: ChannelPatch = parsed.data;
    this.config = { ...this.config, ...applied };
    return patchKeys(applied);
  }

  /**
   * Mark the channel as having a probe in flight.
   *
   * @returns false if a probe was already in flight
   */
  tryClaim(): boolean {
    if (this.isChecking) {
      return false;
    }
    this.isChecking = true;
    return true;
  }

  release(): void {
    this.isChecking = false;
  }

  /**
   * Fold one liveness observation into the learned statistics.
   */
  incrementLiveCounts(isLive: boolean, options: EmaOptions = {}, now: Date = new Date()): void {
    const alphaActive = options.alphaActive ?? 0.1;
    const alphaOffline = options.alphaOffline ?? 0.01;

    if (isLive) {
      this.recordLiveSlot(now);
      this.lastSeenLiveAt = now.getTime();
    }

    this.consistencyScore = computeConsistency(this.historicalIntervals);

    const alpha = isLive ? alphaActive : alphaOffline;
    const observed = isLive ? 1 : 0;
    this.score = this.score * (1 - alpha) + observed * alpha;

    if (this.lastSeenLiveAt !== null) {
      const daysInactive = Math.floor((now.getTime() - this.lastSeenLiveAt) / DAY_MS);
      if (daysInactive > DECAY_GRACE_DAYS) {
        const decayDays = Math.min(daysInactive - DECAY_GRACE_DAYS, DECAY_MAX_DAYS);
        this.score *= DECAY_FACTOR_PER_DAY ** decayDays;
      }
    }

    this.liveCheckCount++;
    if (isLive) {
      this.liveFoundCount++;
    }
    if (this.liveCheckCount > LEGACY_COUNTER_LIMIT) {
      this.liveCheckCount = Math.floor(this.liveCheckCount / 2);
      this.liveFoundCount = Math.floor(this.liveFoundCount / 2);
    }
  }

  /**
   * Recorded time: the running session plus earlier segments while recording,
   * otherwise the length of the last session.
   */
  recordedDurationMs(now: number = Date.now()): number {
    if (this.isRecording && this.startTime !== null) {
      return this.cumulativeDurationMs + (now - this.startTime);
    }
    return this.lastDurationMs;
  }

  private recordLiveSlot(now: Date): void {
    const day = String(now.getDay());
    const hour = now.getHours();
    const hours = this.historicalIntervals[day] ?? [];

    if (!hours.includes(hour)) {
      hours.push(hour);
      if (hours.length > MAX_HOURS_PER_DAY) {
        hours.shift();
      }
    }
    this.historicalIntervals[day] = hours;
  }
}

function computeConsistency(intervals: HistoricalIntervals): number {
  const days = Object.values(intervals);
  if (days.length === 0) {
    return 0;
  }
  const totalSlots = days.reduce((sum, hours) => sum + hours.length, 0);
  return totalSlots / (days.length * MAX_HOURS_PER_DAY);
}

function cloneIntervals(intervals: HistoricalIntervals): HistoricalIntervals {
  const copy: HistoricalIntervals = {};
  for (const [day, hours] of Object.entries(intervals)) {
    copy[day] = [...hours];
  }
  return copy;
}

function clampUnit(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function patchKeys(patch: ChannelPatch): Array<keyof ChannelPatch> {
  const keys: Array<keyof ChannelPatch> = [];
  for (const key of channelPatchSchema.keyof().options) {
    if (key in patch) {
      keys.push(key);
    }
  }
  return keys;
}

export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
