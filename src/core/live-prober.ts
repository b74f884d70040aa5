/**
 * Live Prober
 *
 * One liveness check for one channel:
 *
 *   guards -> schedule window -> platform permit + jitter -> resolve
 *          -> learn (EMA/history) -> live / offline transitions
 *
 * Outbound calls are bounded per platform by a counting semaphore so a burst
 * of due channels cannot trip a platform's rate limiter. Resolver failures
 * become a `check-error` status; nothing thrown here reaches a worker.
 * `isChecking` is always released and an update published, whatever branch
 * was taken.
 */

import type { StreamInfo, StreamResolver, PlatformInfo } from '../types/collaborators.js';
import type { MonitorConfig } from '../utils/config-schemas.js';
import { ResolutionError, formatError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { repeatUntil, sleep as defaultSleep } from '../utils/retry.js';
import { KeyedSemaphore } from '../utils/semaphore.js';
import type { ChannelRegistry } from './channel-registry.js';
import type { ChannelState } from './channel-state.js';
import type { LiveNotifications } from './live-notifications.js';
import type { RecordingSessions } from './recording-sessions.js';
import { isWithinSchedule } from './schedule-window.js';

const log = logger.prober;

export type SkipReason = 'recording' | 'concurrency-conflict' | 'monitoring-disabled' | 'removed';

export type LiveAction = 'recording' | 'recording-failed' | 'notify-only' | 'space-exhausted';

export type ProbeOutcome =
  | { kind: 'skipped'; reason: SkipReason }
  | { kind: 'busy' }
  | { kind: 'out-of-schedule' }
  | { kind: 'error'; error: ResolutionError }
  | { kind: 'live'; transition: boolean; action: LiveAction }
  | { kind: 'offline'; wasLive: boolean };

export type ProberConfig = Pick<
  MonitorConfig,
  | 'loopTimeSeconds'
  | 'notifyLoopTimeSeconds'
  | 'platformMaxConcurrentRequests'
  | 'emaAlphaActive'
  | 'emaAlphaOffline'
  | 'probeJitterMinMs'
  | 'probeJitterMaxMs'
  | 'retryAttempts'
  | 'retryDelaySeconds'
  | 'placeholderStreamerName'
>;

export interface LiveProberOptions {
  registry: ChannelRegistry;
  resolver: StreamResolver;
  sessions: RecordingSessions;
  notifications: LiveNotifications;
  /** Whether new recording sessions may start */
  recordingEnabled: () => boolean;
  config: ProberConfig;
  onUpdate?: (channel: ChannelState) => void;
  random?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => Date;
}

/**
 * Platform of a URL from its host name, without a leading `www.`.
 */
export function hostPlatform(url: string): PlatformInfo {
  try {
    const host = new URL(url).hostname.replace(/^www\./, '');
    return { platform: host, platformKey: host };
  } catch {
    return { platform: 'unknown', platformKey: 'unknown' };
  }
}

export class LiveProber {
  private readonly semaphores: KeyedSemaphore;
  private readonly registry: ChannelRegistry;
  private readonly resolver: StreamResolver;
  private readonly sessions: RecordingSessions;
  private readonly notifications: LiveNotifications;
  private readonly recordingEnabled: () => boolean;
  private readonly config: ProberConfig;
  private readonly onUpdate: (channel: ChannelState) => void;
  private readonly random: () => number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly now: () => Date;
  private readonly shutdown = new AbortController();

  constructor(options: LiveProberOptions) {
    this.registry = options.registry;
    this.resolver = options.resolver;
    this.sessions = options.sessions;
    this.notifications = options.notifications;
    this.recordingEnabled = options.recordingEnabled;
    this.config = options.config;
    this.onUpdate = options.onUpdate ?? (() => {});
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
    this.semaphores = new KeyedSemaphore(options.config.platformMaxConcurrentRequests);
  }

  /**
   * Probe a channel the caller has already claimed (`isChecking` set).
   */
  async probe(channel: ChannelState): Promise<ProbeOutcome> {
    try {
      return await this.check(channel);
    } catch (error) {
      const failure = new ResolutionError(`Live check failed: ${formatError(error)}`, channel.url, error);
      return this.fail(channel, failure);
    } finally {
      channel.release();
      this.onUpdate(channel);
    }
  }

  /**
   * Claim the channel and probe it, unless a probe is already in flight.
   */
  async probeIfIdle(channel: ChannelState): Promise<ProbeOutcome> {
    if (!channel.tryClaim()) {
      return { kind: 'busy' };
    }
    return this.probe(channel);
  }

  /**
   * Re-check a channel whose stream may have dropped briefly. Stops early once
   * it is recording again, monitoring is turned off or the channel is removed.
   *
   * @returns the number of checks made
   */
  checkWithRetry(
    channel: ChannelState,
    retries: number = this.config.retryAttempts,
    delayMs: number = this.config.retryDelaySeconds * 1000
  ): Promise<number> {
    const signal = this.shutdown.signal;
    return repeatUntil(
      async () => {
        await this.probeIfIdle(channel);
      },
      {
        attempts: retries,
        delayMs,
        shouldStop: () =>
          channel.isRecording ||
          !channel.config.monitorEnabled ||
          !this.registry.has(channel.id) ||
          signal.aborted,
        sleep: (ms) => this.sleep(ms, signal),
        onAttempt: (attempt) => {
          log.info('Extra live check', { channelId: channel.id, url: channel.url, attempt, retries });
        },
      }
    );
  }

  /**
   * End pending retry loops. Probes already running finish normally.
   */
  close(): void {
    this.shutdown.abort();
  }

  /**
   * Per-platform permit usage.
   */
  getPlatformStatus(): ReturnType<KeyedSemaphore['getStatus']> {
    return this.semaphores.getStatus();
  }

  private async check(channel: ChannelState): Promise<ProbeOutcome> {
    channel.manuallyStopped = false;

    if (channel.isRecording) {
      log.debug('Skip check: recording in progress', { channelId: channel.id });
      return { kind: 'skipped', reason: 'recording' };
    }

    const handle = this.sessions.activeHandle(channel.id);
    if (handle && !handle.shouldStop) {
      log.debug('Skip check: recorder still active', { channelId: channel.id });
      return { kind: 'skipped', reason: 'concurrency-conflict' };
    }

    if (!channel.config.monitorEnabled) {
      channel.status = 'stopped-monitoring';
      return { kind: 'skipped', reason: 'monitoring-disabled' };
    }

    if (!this.registry.has(channel.id)) {
      return { kind: 'skipped', reason: 'removed' };
    }

    const now = this.now();
    channel.detectionTime = now.getTime();
    channel.status = 'checking';
    this.onUpdate(channel);

    if (channel.config.scheduledRecording && !isWithinSchedule(channel.config, now)) {
      channel.status = 'out-of-schedule';
      channel.isLive = false;
      log.info('Outside scheduled window; probe skipped', { channelId: channel.id, url: channel.url });
      return { kind: 'out-of-schedule' };
    }

    const platformKey = this.platformKeyFor(channel);

    let stream: StreamInfo;
    try {
      stream = await this.semaphores.runExclusive(platformKey, async () => {
        await this.sleep(this.jitterMs());
        return this.resolver.resolve(channel.url, platformKey);
      });
    } catch (error) {
      return this.fail(channel, new ResolutionError(`Resolver failed: ${formatError(error)}`, channel.url, error));
    }

    // Removed or switched off while the resolver was busy: drop the result.
    if (!this.registry.has(channel.id)) {
      return { kind: 'skipped', reason: 'removed' };
    }
    if (!channel.config.monitorEnabled) {
      channel.status = 'stopped-monitoring';
      return { kind: 'skipped', reason: 'monitoring-disabled' };
    }

    if (stream.error || !stream.anchorName) {
      const reason = stream.error ?? 'missing anchor name';
      return this.fail(channel, new ResolutionError(`Incomplete stream data: ${reason}`, channel.url));
    }

    return stream.isLive
      ? this.onLive(channel, stream, this.now())
      : this.onOffline(channel, stream, this.now());
  }

  private async onLive(channel: ChannelState, stream: StreamInfo, now: Date): Promise<ProbeOutcome> {
    channel.incrementLiveCounts(true, this.alphas(), now);
    channel.lastActiveAt = now.getTime();
    channel.liveTitle = stream.title;
    this.adoptAnchorName(channel, stream);

    const transition = !channel.isLive;
    if (transition) {
      channel.isLive = true;
      channel.notifiedLiveStart = false;
      channel.notifiedLiveEnd = false;
      this.notifications.notifyLiveStart(channel);
      log.info('Channel went live', { channelId: channel.id, title: channel.title });
    }
    this.notifications.pushLiveStart(channel, now);

    if (channel.config.onlyNotifyNoRecord) {
      channel.loopIntervalSeconds = channel.notifiedLiveStart
        ? this.config.notifyLoopTimeSeconds
        : this.config.loopTimeSeconds;
      channel.cumulativeDurationMs = 0;
      channel.lastDurationMs = 0;
      channel.status = 'live-broadcasting';
      return { kind: 'live', transition, action: 'notify-only' };
    }

    if (!this.recordingEnabled()) {
      channel.status = 'space-exhausted';
      log.warn('Live but recording is disabled for lack of space', { channelId: channel.id });
      return { kind: 'live', transition, action: 'space-exhausted' };
    }

    channel.loopIntervalSeconds = this.config.loopTimeSeconds;
    const started = await this.sessions.start(channel, stream);
    return { kind: 'live', transition, action: started ? 'recording' : 'recording-failed' };
  }

  private onOffline(channel: ChannelState, stream: StreamInfo, now: Date): ProbeOutcome {
    channel.incrementLiveCounts(false, this.alphas(), now);

    const wasLive = channel.isLive;
    if (wasLive) {
      channel.isLive = false;
      this.notifications.pushLiveEnd(channel, now);
      log.info('Channel went offline', { channelId: channel.id, title: channel.title });
    }

    channel.status = 'monitoring';
    this.adoptAnchorName(channel, stream);
    return { kind: 'offline', wasLive };
  }

  private fail(channel: ChannelState, error: ResolutionError): ProbeOutcome {
    channel.status = 'check-error';
    log.warn('Live check failed', { channelId: channel.id, url: channel.url, error: error.message });
    return { kind: 'error', error };
  }

  /**
   * Replace a placeholder or empty streamer name with the resolved one.
   */
  private adoptAnchorName(channel: ChannelState, stream: StreamInfo): void {
    const current = channel.config.streamerName.trim();
    if (stream.anchorName && (current === '' || current === this.config.placeholderStreamerName)) {
      channel.config.streamerName = stream.anchorName;
    }
  }

  private platformKeyFor(channel: ChannelState): string {
    if (channel.platformKey) {
      return channel.platformKey;
    }

    const info = this.resolver.detectPlatform?.(channel.url) ?? hostPlatform(channel.url);
    channel.platform = info.platform;
    channel.platformKey = info.platformKey;
    this.registry.requestPersist();
    return info.platformKey;
  }

  private jitterMs(): number {
    const { probeJitterMinMs: min, probeJitterMaxMs: max } = this.config;
    return min + this.random() * (max - min);
  }

  private alphas(): { alphaActive: number; alphaOffline: number } {
    return { alphaActive: this.config.emaAlphaActive, alphaOffline: this.config.emaAlphaOffline };
  }
}
