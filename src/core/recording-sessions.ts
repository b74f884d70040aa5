/**
 * Recording Sessions
 *
 * Owns the recorder handle of every channel that is recording and drives the
 * session state machine:
 *
 *   live, not recording --start--> preparing-recording --> recording
 *                                           |                  |
 *                                    recording-error     stop / ended
 *                                                              |
 *                                                        not-recording
 *
 * A session that ends on its own while the channel is still monitored is
 * closed out and handed to `onSelfEnded`, which re-checks the channel a few
 * times in case the stream comes back.
 */

import type { RecordingHandle, StreamInfo, StreamRecorder } from '../types/collaborators.js';
import { formatError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { ChannelRegistry } from './channel-registry.js';
import type { ChannelState } from './channel-state.js';

const log = logger.sessions;

export interface RecordingSessionsOptions {
  recorder: StreamRecorder;
  registry: ChannelRegistry;
  /** Publish a channel change */
  onUpdate?: (channel: ChannelState) => void;
  /** A session ended without a stop request while monitoring continues */
  onSelfEnded?: (channel: ChannelState) => Promise<void>;
  now?: () => number;
}

export class RecordingSessions {
  private readonly handles = new Map<string, RecordingHandle>();
  private readonly watchers = new Map<RecordingHandle, Promise<void>>();
  private readonly recorder: StreamRecorder;
  private readonly registry: ChannelRegistry;
  private readonly onUpdate: (channel: ChannelState) => void;
  private onSelfEnded?: (channel: ChannelState) => Promise<void>;
  private readonly now: () => number;

  constructor(options: RecordingSessionsOptions) {
    this.recorder = options.recorder;
    this.registry = options.registry;
    this.onUpdate = options.onUpdate ?? (() => {});
    this.onSelfEnded = options.onSelfEnded;
    this.now = options.now ?? Date.now;
  }

  /**
   * Set the handler for sessions that end on their own.
   */
  setSelfEndedHandler(handler: (channel: ChannelState) => Promise<void>): void {
    this.onSelfEnded = handler;
  }

  /**
   * Handle owned for a channel, if a recorder is running for it.
   */
  activeHandle(channelId: string): RecordingHandle | undefined {
    return this.handles.get(channelId);
  }

  get activeCount(): number {
    return this.handles.size;
  }

  /**
   * Start recording a live channel.
   *
   * @returns false if the channel was not eligible or the recorder failed
   */
  async start(channel: ChannelState, stream: StreamInfo): Promise<boolean> {
    if (!channel.isLive || channel.isRecording) {
      return false;
    }

    channel.cumulativeDurationMs = 0;
    channel.lastDurationMs = 0;
    channel.startTime = this.now();
    channel.isRecording = true;
    channel.forceStop = false;
    channel.stoppingInProgress = false;
    channel.status = 'preparing-recording';
    this.onUpdate(channel);

    let handle: RecordingHandle;
    try {
      handle = await this.recorder.start(channel, stream);
    } catch (error) {
      channel.isRecording = false;
      channel.startTime = null;
      channel.status = 'recording-error';
      log.error('Recorder failed to start', { channelId: channel.id, url: channel.url, error });
      this.onUpdate(channel);
      return false;
    }

    this.handles.set(channel.id, handle);
    this.watch(channel, handle);

    // Stopped while the recorder was starting: no handle was there to signal.
    if (channel.forceStop || !channel.isRecording) {
      await this.requestStop(channel, handle);
      return false;
    }

    channel.status = 'recording';
    log.info('Started recording', { channelId: channel.id, title: channel.title });
    this.onUpdate(channel);
    return true;
  }

  /**
   * Stop the channel's session, if any, and mark it offline. Resolves once the
   * recorder acknowledged the stop request.
   */
  async stop(channel: ChannelState, manuallyStopped = true): Promise<void> {
    channel.isLive = false;
    if (!channel.isRecording) {
      return;
    }

    channel.stoppingInProgress = true;
    channel.detectionTime = null;

    const handle = this.handles.get(channel.id);
    if (!handle) {
      log.warn('No active recorder to stop; forcing stop', { channelId: channel.id });
      channel.forceStop = true;
    }

    this.closeOut(channel, manuallyStopped);
    log.info('Stopped recording', { channelId: channel.id, title: channel.title, manuallyStopped });

    if (handle) {
      await this.requestStop(channel, handle);
    }
  }

  /**
   * Stop every running session and wait for the recorders to finish.
   */
  async stopAll(manuallyStopped = false): Promise<void> {
    const recording = this.registry.all().filter((channel) => channel.isRecording);
    await Promise.all(recording.map((channel) => this.stop(channel, manuallyStopped)));
    await this.drain();
  }

  /**
   * Wait until every owned recorder has ended and been released.
   */
  async drain(): Promise<void> {
    while (this.watchers.size > 0) {
      await Promise.all(this.watchers.values());
    }
  }

  durationMs(channel: ChannelState, now: number = this.now()): number {
    return channel.recordedDurationMs(now);
  }

  private closeOut(channel: ChannelState, manuallyStopped: boolean): void {
    if (channel.startTime !== null) {
      channel.cumulativeDurationMs += this.now() - channel.startTime;
      channel.lastDurationMs = channel.cumulativeDurationMs;
    }
    channel.startTime = null;
    channel.isRecording = false;
    channel.manuallyStopped = manuallyStopped;
    channel.status = 'not-recording';
    this.registry.requestPersist();
    this.onUpdate(channel);
  }

  private async requestStop(channel: ChannelState, handle: RecordingHandle): Promise<void> {
    try {
      await handle.requestStop();
    } catch (error) {
      log.warn('Recorder stop request failed', { channelId: channel.id, error: formatError(error) });
    }
  }

  private watch(channel: ChannelState, handle: RecordingHandle): void {
    const watcher = (async () => {
      try {
        await handle.done;
      } catch (error) {
        log.warn('Recorder ended with an error', { channelId: channel.id, error: formatError(error) });
      }

      try {
        await this.onHandleDone(channel, handle);
      } catch (error) {
        log.error('Session close-out failed', { channelId: channel.id, error });
      } finally {
        this.watchers.delete(handle);
      }
    })();
    this.watchers.set(handle, watcher);
  }

  private async onHandleDone(channel: ChannelState, handle: RecordingHandle): Promise<void> {
    if (this.handles.get(channel.id) === handle) {
      this.handles.delete(channel.id);
    }
    channel.stoppingInProgress = false;

    if (!channel.isRecording) {
      this.onUpdate(channel);
      return;
    }

    // isLive stays as observed; the re-check decides whether the stream ended.
    log.info('Recording ended without a stop request', { channelId: channel.id });
    this.closeOut(channel, false);

    if (channel.config.monitorEnabled && this.registry.has(channel.id) && this.onSelfEnded) {
      await this.onSelfEnded(channel);
    }
  }
}
