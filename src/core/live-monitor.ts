/**
 * Live Monitor
 *
 * Wires the registry, dispatcher, lane workers, prober and recording
 * sessions together and exposes the operations a host application needs:
 * channel management, monitoring on/off, immediate checks and events.
 *
 * Events:
 * - `update` (channel): a channel's state changed
 * - `delete` (ids): channels were removed
 * - `cycle` (summary): a dispatch cycle completed
 * - `persistence-failure` (error): a debounced save failed
 *
 * @example
 * ```typescript
 * const monitor = await createLiveMonitor({ resolver, recorder });
 * monitor.on('update', (channel) => render(channel));
 * await monitor.addChannel({ url: 'https://live.example.com/room/1' });
 * await monitor.start();
 * ```
 */

import { EventEmitter } from 'node:events';
import type { ChannelConfigInput, ChannelRecord } from '../types/channel.js';
import type {
  DiskSpaceGuard,
  MessagePusher,
  Notifier,
  PersistenceGateway,
  StreamRecorder,
  StreamResolver,
} from '../types/collaborators.js';
import { getMergedAppConfig } from '../utils/config-loader.js';
import type { AppConfig } from '../utils/config-schemas.js';
import { StatfsDiskSpaceGuard } from '../utils/disk-space.js';
import { ChannelNotFoundError, type PersistenceFailureError } from '../utils/errors.js';
import { configureLogger, logger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import { JsonChannelGateway } from './channel-persistence.js';
import { ChannelRegistry } from './channel-registry.js';
import { ChannelState } from './channel-state.js';
import { DiskSpaceGate } from './disk-space-gate.js';
import { LiveCheckDispatcher, type DispatchSummary } from './live-check-dispatcher.js';
import { LiveNotifications } from './live-notifications.js';
import { LiveProber, type ProbeOutcome } from './live-prober.js';
import { PriorityLaneWorkers } from './priority-lane-workers.js';
import { RecordingSessions } from './recording-sessions.js';

const log = logger.monitor;

export type LiveMonitorEvents = {
  update: [channel: ChannelState];
  delete: [ids: string[]];
  cycle: [summary: DispatchSummary];
  'persistence-failure': [error: PersistenceFailureError];
};

export interface LiveMonitorOptions {
  config: AppConfig;
  resolver: StreamResolver;
  recorder: StreamRecorder;
  gateway: PersistenceGateway;
  diskSpaceGuard?: DiskSpaceGuard;
  notifier?: Notifier;
  pusher?: MessagePusher;
  random?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => Date;
}

export class LiveMonitor extends EventEmitter<LiveMonitorEvents> {
  readonly registry: ChannelRegistry;
  private readonly diskGate: DiskSpaceGate;
  private readonly sessions: RecordingSessions;
  private readonly prober: LiveProber;
  private readonly workers: PriorityLaneWorkers;
  private readonly dispatcher: LiveCheckDispatcher;
  private readonly now: () => Date;
  private started = false;

  constructor(options: LiveMonitorOptions) {
    super();
    const { monitor, storage, notifications } = options.config;
    const publish = (channel: ChannelState) => this.publish(channel);
    this.now = options.now ?? (() => new Date());

    this.registry = new ChannelRegistry({
      gateway: options.gateway,
      persistDebounceMs: storage.persistDebounceMs,
      onPersistenceError: (error) => this.emitSafely('persistence-failure', () => this.emit('persistence-failure', error)),
    });

    this.diskGate = new DiskSpaceGate({
      guard: options.diskSpaceGuard ?? new StatfsDiskSpaceGuard(),
      recordingDir: storage.recordingDir,
      thresholdGb: storage.recordingSpaceThresholdGb,
    });

    this.sessions = new RecordingSessions({
      recorder: options.recorder,
      registry: this.registry,
      onUpdate: publish,
      now: () => this.now().getTime(),
    });

    this.prober = new LiveProber({
      registry: this.registry,
      resolver: options.resolver,
      sessions: this.sessions,
      notifications: new LiveNotifications({
        config: notifications,
        notifier: options.notifier,
        pusher: options.pusher,
      }),
      recordingEnabled: () => this.diskGate.recordingEnabled,
      config: monitor,
      onUpdate: publish,
      random: options.random,
      sleep: options.sleep,
      now: this.now,
    });

    this.sessions.setSelfEndedHandler(async (channel) => {
      await this.prober.checkWithRetry(channel);
    });

    this.workers = new PriorityLaneWorkers({ prober: this.prober });

    this.dispatcher = new LiveCheckDispatcher({
      registry: this.registry,
      sink: this.workers,
      config: monitor,
      beforeCycle: () => this.diskGate.refresh(),
      onCycle: (summary) => this.emitSafely('cycle', () => this.emit('cycle', summary)),
      onUpdate: publish,
      random: options.random,
      now: this.now,
    });
  }

  get isRunning(): boolean {
    return this.started;
  }

  /** False while free space is below the recording threshold */
  get recordingEnabled(): boolean {
    return this.diskGate.recordingEnabled;
  }

  /**
   * Register persisted channels. Invalid or duplicate ids are skipped.
   */
  async load(records: readonly ChannelRecord[]): Promise<number> {
    const channels = records.map((record) => ChannelState.fromRecord(record));
    const skipped = await this.registry.addMany(channels);
    return channels.length - skipped.length;
  }

  async start(): Promise<void> {
    if (this.started) {
      return;
    }
    this.started = true;
    await this.diskGate.refresh();
    this.workers.start();
    this.dispatcher.start();
    log.info('Live monitor started', { channels: this.registry.size });
  }

  /**
   * Stop scheduling, end running sessions and write pending changes.
   */
  async stop(): Promise<void> {
    if (!this.started) {
      await this.registry.flush();
      return;
    }
    this.started = false;

    await this.dispatcher.stop();
    this.prober.close();
    await this.workers.stop();
    await this.sessions.stopAll(false);
    await this.registry.flush();
    log.info('Live monitor stopped');
  }

  channels(): readonly ChannelState[] {
    return this.registry.all();
  }

  getChannel(id: string): ChannelState | undefined {
    return this.registry.findById(id);
  }

  async addChannel(config: ChannelConfigInput): Promise<ChannelState> {
    const channel = ChannelState.create(config, { now: this.now().getTime() });
    await this.registry.add(channel);
    log.info('Channel added', { channelId: channel.id, url: channel.url });
    this.publish(channel);
    return channel;
  }

  /**
   * Apply a configuration patch. Switching `monitorEnabled` starts or stops
   * monitoring the same way the dedicated operations do.
   */
  async updateChannel(id: string, patch: unknown): Promise<ChannelState> {
    const channel = this.require(id);
    const wasMonitoring = channel.config.monitorEnabled;
    channel.applyPatch(patch);

    if (wasMonitoring && !channel.config.monitorEnabled) {
      await this.disableMonitoring(channel);
    } else if (!wasMonitoring && channel.config.monitorEnabled) {
      this.enableMonitoring(channel);
    }

    this.registry.requestPersist();
    this.publish(channel);
    return channel;
  }

  /**
   * Remove channels, stopping their sessions first. Unknown ids are ignored.
   *
   * @returns the ids that were removed
   */
  async removeChannels(ids: readonly string[]): Promise<string[]> {
    const removed: string[] = [];
    for (const id of ids) {
      const channel = this.registry.findById(id);
      if (!channel) {
        continue;
      }
      channel.config.monitorEnabled = false;
      await this.sessions.stop(channel, true);
      if (await this.registry.remove(channel)) {
        removed.push(id);
      }
    }

    if (removed.length > 0) {
      this.emitSafely('delete', () => this.emit('delete', removed));
    }
    return removed;
  }

  async clearChannels(): Promise<string[]> {
    for (const channel of this.registry.all()) {
      channel.config.monitorEnabled = false;
      await this.sessions.stop(channel, true);
    }
    const removed = (await this.registry.clear()).map((channel) => channel.id);
    if (removed.length > 0) {
      this.emitSafely('delete', () => this.emit('delete', removed));
    }
    return removed;
  }

  /**
   * Turn monitoring on. While the monitor runs, the channel is checked right
   * away; otherwise it is due on the first cycle.
   */
  async startMonitoring(id: string): Promise<ProbeOutcome | null> {
    const channel = this.require(id);
    this.enableMonitoring(channel);
    this.registry.requestPersist();
    this.publish(channel);
    return this.started ? this.prober.probeIfIdle(channel) : null;
  }

  async stopMonitoring(id: string): Promise<void> {
    const channel = this.require(id);
    await this.disableMonitoring(channel);
    this.registry.requestPersist();
    this.publish(channel);
  }

  /**
   * Turn monitoring on for the given channels, or all of them. They are
   * picked up by the next dispatch cycle.
   */
  startMonitoringMany(ids?: readonly string[]): string[] {
    const changed: string[] = [];
    for (const channel of this.select(ids)) {
      if (channel.config.monitorEnabled) {
        continue;
      }
      this.enableMonitoring(channel);
      this.publish(channel);
      changed.push(channel.id);
    }
    this.registry.requestPersist();
    return changed;
  }

  async stopMonitoringMany(ids?: readonly string[]): Promise<string[]> {
    const changed: string[] = [];
    for (const channel of this.select(ids)) {
      if (!channel.config.monitorEnabled) {
        continue;
      }
      await this.disableMonitoring(channel);
      this.publish(channel);
      changed.push(channel.id);
    }
    this.registry.requestPersist();
    return changed;
  }

  /**
   * Probe one channel now, outside the heartbeat.
   */
  async checkNow(id: string): Promise<ProbeOutcome> {
    return this.prober.probeIfIdle(this.require(id));
  }

  /**
   * Run one dispatch cycle now.
   */
  runCycle(): DispatchSummary {
    return this.dispatcher.runCycle(this.now());
  }

  durationMs(id: string): number {
    return this.sessions.durationMs(this.require(id), this.now().getTime());
  }

  private enableMonitoring(channel: ChannelState): void {
    channel.config.monitorEnabled = true;
    channel.manuallyStopped = false;
    channel.detectionTime = null;
    channel.status = 'monitoring';
  }

  private async disableMonitoring(channel: ChannelState): Promise<void> {
    channel.config.monitorEnabled = false;
    await this.sessions.stop(channel, true);
    channel.status = 'stopped-monitoring';
  }

  private select(ids?: readonly string[]): ChannelState[] {
    if (!ids) {
      return [...this.registry.all()];
    }
    return ids.map((id) => this.registry.findById(id)).filter((channel): channel is ChannelState => channel !== undefined);
  }

  private require(id: string): ChannelState {
    const channel = this.registry.findById(id);
    if (!channel) {
      throw new ChannelNotFoundError(id);
    }
    return channel;
  }

  private publish(channel: ChannelState): void {
    this.emitSafely('update', () => this.emit('update', channel));
  }

  /**
   * Listener errors are logged so they never unwind into the scheduler.
   */
  private emitSafely(event: keyof LiveMonitorEvents, emit: () => boolean): void {
    try {
      emit();
    } catch (error) {
      log.error('Event listener threw', { event, error });
    }
  }
}

export interface CreateLiveMonitorOptions extends Partial<Omit<LiveMonitorOptions, 'resolver' | 'recorder'>> {
  resolver: StreamResolver;
  recorder: StreamRecorder;
}

/**
 * Build a monitor from the merged configuration (environment over config
 * file over defaults) and load the persisted channels.
 */
export async function createLiveMonitor(options: CreateLiveMonitorOptions): Promise<LiveMonitor> {
  const config = options.config ?? getMergedAppConfig();
  configureLogger({ level: config.log.level, prettyPrint: config.log.prettyPrint });

  const gateway = options.gateway ?? new JsonChannelGateway(config.storage.channelsFile);
  const records = await withRetry(() => gateway.loadAll(), { maxAttempts: 3, initialDelayMs: 500 });

  const monitor = new LiveMonitor({ ...options, config, gateway });
  const loaded = await monitor.load(records);
  log.info('Channels restored', { loaded, total: records.length });
  return monitor;
}
