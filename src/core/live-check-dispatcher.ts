/**
 * Live Check Dispatcher
 *
 * One cycle scores every monitored channel, decides which are due and routes
 * them to a priority lane:
 *
 * 1. Recording channels feed a live observation into the EMA and are skipped.
 * 2. Others get a polling interval from the predictor.
 * 3. A channel is due if it was never checked or its interval has elapsed.
 * 4. Due and idle: claimed (`isChecking`) and queued on the lane for its
 *    interval (<= 60s fast, <= 180s medium, else slow).
 * 5. Due but already claimed: counted as busy, never queued twice.
 *
 * Channels are visited by descending priority score with a random tiebreak so
 * equal scores take turns. One debounced persistence write follows the pass.
 *
 * The heartbeat runs a cycle every `heartbeatSeconds`, refreshing the
 * disk-space gate first. Cycles never overlap.
 */

import { LANES, type Lane } from '../types/channel.js';
import type { MonitorConfig } from '../utils/config-schemas.js';
import { logger } from '../utils/logger.js';
import type { ChannelRegistry } from './channel-registry.js';
import type { ChannelState } from './channel-state.js';
import { laneFor, likelihood, pollingInterval } from './live-likelihood-predictor.js';
import type { LaneSink } from './priority-lane-workers.js';

const log = logger.dispatcher;

export interface DispatchSummary {
  dispatched: Record<Lane, number>;
  busy: Record<Lane, number>;
  /** Monitored channels not yet due */
  waiting: number;
  /** Monitored channels currently recording */
  recording: number;
}

export type DispatcherConfig = Pick<
  MonitorConfig,
  'loopTimeSeconds' | 'heartbeatSeconds' | 'checkLiveOnStartup' | 'emaAlphaActive' | 'emaAlphaOffline'
>;

export interface LiveCheckDispatcherOptions {
  registry: ChannelRegistry;
  sink: LaneSink;
  config: DispatcherConfig;
  /** Runs before every heartbeat cycle, e.g. a free-space refresh */
  beforeCycle?: () => Promise<unknown>;
  onCycle?: (summary: DispatchSummary) => void;
  onUpdate?: (channel: ChannelState) => void;
  random?: () => number;
  now?: () => Date;
}

function emptyLaneCounts(): Record<Lane, number> {
  return { fast: 0, medium: 0, slow: 0 };
}

export class LiveCheckDispatcher {
  private readonly registry: ChannelRegistry;
  private readonly sink: LaneSink;
  private readonly config: DispatcherConfig;
  private readonly beforeCycle?: () => Promise<unknown>;
  private readonly onCycle?: (summary: DispatchSummary) => void;
  private readonly onUpdate: (channel: ChannelState) => void;
  private readonly random: () => number;
  private readonly now: () => Date;

  private timer: ReturnType<typeof setTimeout> | null = null;
  private inFlight: Promise<void> | null = null;
  private active = false;
  /** Bumped by every start(); ticks from an earlier run neither dispatch nor reschedule */
  private generation = 0;
  private cycles = 0;

  constructor(options: LiveCheckDispatcherOptions) {
    this.registry = options.registry;
    this.sink = options.sink;
    this.config = options.config;
    this.beforeCycle = options.beforeCycle;
    this.onCycle = options.onCycle;
    this.onUpdate = options.onUpdate ?? (() => {});
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
  }

  get isRunning(): boolean {
    return this.active;
  }

  get cycleCount(): number {
    return this.cycles;
  }

  /**
   * Run one dispatch pass over the registry.
   */
  runCycle(now: Date = this.now()): DispatchSummary {
    const summary: DispatchSummary = {
      dispatched: emptyLaneCounts(),
      busy: emptyLaneCounts(),
      waiting: 0,
      recording: 0,
    };
    const baseInterval = this.config.loopTimeSeconds;

    for (const channel of this.orderByPriority(this.registry.all())) {
      if (!channel.config.monitorEnabled) {
        continue;
      }

      if (channel.isRecording) {
        channel.incrementLiveCounts(true, {
          alphaActive: this.config.emaAlphaActive,
          alphaOffline: this.config.emaAlphaOffline,
        }, now);
        summary.recording++;
        this.onUpdate(channel);
        continue;
      }

      const interval = this.intervalFor(channel, baseInterval, now);
      channel.loopIntervalSeconds = interval;

      if (!this.isDue(channel, interval, now)) {
        summary.waiting++;
        continue;
      }

      const lane = laneFor(interval);
      if (!channel.tryClaim()) {
        summary.busy[lane]++;
        continue;
      }

      try {
        this.sink.enqueue(lane, channel);
      } catch (error) {
        channel.release();
        log.error('Could not queue channel', { channelId: channel.id, lane, error });
        continue;
      }
      summary.dispatched[lane]++;
      log.debug('Dispatched', {
        channelId: channel.id,
        lane,
        intervalSeconds: interval,
        likelihood: Number(likelihood(channel, now).toFixed(2)),
      });
    }

    this.cycles++;
    this.logSummary(summary);
    this.registry.requestPersist();
    this.onCycle?.(summary);
    return summary;
  }

  /**
   * Start the heartbeat. With `checkLiveOnStartup` the first cycle runs
   * immediately.
   */
  start(): void {
    if (this.active) {
      return;
    }
    this.active = true;
    const generation = ++this.generation;
    log.info('Heartbeat started', { heartbeatSeconds: this.config.heartbeatSeconds });

    if (this.config.checkLiveOnStartup) {
      this.inFlight = this.tick(generation);
    } else {
      this.schedule(generation);
    }
  }

  /**
   * Cancel the heartbeat and wait for a cycle in progress.
   */
  async stop(): Promise<void> {
    this.active = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
    log.info('Heartbeat stopped', { cycles: this.cycles });
  }

  private schedule(generation: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.tick(generation);
    }, this.config.heartbeatSeconds * 1000);
  }

  private isCurrent(generation: number): boolean {
    return this.active && generation === this.generation;
  }

  private async tick(generation: number): Promise<void> {
    try {
      if (this.beforeCycle) {
        await this.beforeCycle();
      }
      if (this.isCurrent(generation)) {
        this.runCycle();
      }
    } catch (error) {
      log.error('Dispatch cycle failed', { error });
    } finally {
      if (generation === this.generation) {
        this.inFlight = null;
      }
      if (this.isCurrent(generation)) {
        this.schedule(generation);
      }
    }
  }

  /**
   * Live notify-only channels keep the interval the prober chose for them;
   * everything else follows the predictor.
   */
  private intervalFor(channel: ChannelState, baseInterval: number, now: Date): number {
    if (channel.isLive && channel.config.onlyNotifyNoRecord && channel.loopIntervalSeconds !== null) {
      return channel.loopIntervalSeconds;
    }
    return pollingInterval(channel, baseInterval, now);
  }

  private isDue(channel: ChannelState, intervalSeconds: number, now: Date): boolean {
    if (channel.detectionTime === null) {
      return true;
    }
    return (now.getTime() - channel.detectionTime) / 1000 >= intervalSeconds;
  }

  private orderByPriority(channels: readonly ChannelState[]): ChannelState[] {
    return channels
      .map((channel) => ({ channel, tiebreak: this.random() }))
      .sort((a, b) => b.channel.priorityScore - a.channel.priorityScore || b.tiebreak - a.tiebreak)
      .map(({ channel }) => channel);
  }

  private logSummary(summary: DispatchSummary): void {
    const dispatched = LANES.reduce((sum, lane) => sum + summary.dispatched[lane], 0);
    const busy = LANES.reduce((sum, lane) => sum + summary.busy[lane], 0);
    if (dispatched + busy === 0) {
      return;
    }
    log.info(
      `Cycle: dispatched ${summary.dispatched.fast}F+${summary.dispatched.medium}M+${summary.dispatched.slow}S | ` +
        `busy ${summary.busy.fast}F+${summary.busy.medium}M+${summary.busy.slow}S | ${summary.waiting} waiting`,
      { recording: summary.recording }
    );
  }
}
