/**
 * Priority Lane Workers
 *
 * A fixed pool of consumers, each bound to one lane's queue: one fast, two
 * medium and one slow by default. Dedicated capacity per lane keeps a slow
 * backlog from delaying channels that are about to go live.
 *
 * A worker never dies on a channel's error; it logs and takes the next one.
 */

import { LANES, type Lane } from '../types/channel.js';
import { AsyncQueue } from '../utils/async-queue.js';
import { logger } from '../utils/logger.js';
import type { ChannelState } from './channel-state.js';

const log = logger.workers;

export const DEFAULT_WORKERS_PER_LANE: Readonly<Record<Lane, number>> = {
  fast: 1,
  medium: 2,
  slow: 1,
};

export interface ChannelProbe {
  probe(channel: ChannelState): Promise<unknown>;
}

export interface LaneSink {
  enqueue(lane: Lane, channel: ChannelState): void;
}

export interface PriorityLaneWorkersOptions {
  prober: ChannelProbe;
  workersPerLane?: Partial<Record<Lane, number>>;
}

export class PriorityLaneWorkers implements LaneSink {
  private readonly prober: ChannelProbe;
  private readonly workersPerLane: Record<Lane, number>;
  private queues: Record<Lane, AsyncQueue<ChannelState>> | null = null;
  private loops: Promise<void>[] = [];
  private processed = 0;
  private failures = 0;

  constructor(options: PriorityLaneWorkersOptions) {
    this.prober = options.prober;
    this.workersPerLane = { ...DEFAULT_WORKERS_PER_LANE, ...options.workersPerLane };
  }

  get running(): boolean {
    return this.queues !== null;
  }

  start(): void {
    if (this.queues) {
      return;
    }

    const queues: Record<Lane, AsyncQueue<ChannelState>> = {
      fast: new AsyncQueue(),
      medium: new AsyncQueue(),
      slow: new AsyncQueue(),
    };
    this.queues = queues;

    for (const lane of LANES) {
      for (let index = 0; index < this.workersPerLane[lane]; index++) {
        this.loops.push(this.runWorker(lane, index, queues[lane]));
      }
    }

    log.info('Lane workers started', { ...this.workersPerLane });
  }

  /**
   * Queue a claimed channel for probing.
   */
  enqueue(lane: Lane, channel: ChannelState): void {
    if (!this.queues) {
      throw new Error('Lane workers are not running');
    }
    this.queues[lane].push(channel);
  }

  pending(lane: Lane): number {
    return this.queues ? this.queues[lane].size : 0;
  }

  getStats(): { processed: number; failures: number; pending: Record<Lane, number> } {
    return {
      processed: this.processed,
      failures: this.failures,
      pending: { fast: this.pending('fast'), medium: this.pending('medium'), slow: this.pending('slow') },
    };
  }

  /**
   * Close the queues, release channels that were still waiting and let the
   * workers finish their current probe.
   */
  async stop(): Promise<void> {
    const queues = this.queues;
    if (!queues) {
      return;
    }
    this.queues = null;

    let released = 0;
    for (const lane of LANES) {
      for (const channel of queues[lane].close()) {
        channel.release();
        released++;
      }
    }

    await Promise.all(this.loops);
    this.loops = [];
    log.info('Lane workers stopped', { released });
  }

  private async runWorker(lane: Lane, index: number, queue: AsyncQueue<ChannelState>): Promise<void> {
    for (;;) {
      const channel = await queue.pop();
      if (channel === undefined) {
        return;
      }

      try {
        if (channel.config.monitorEnabled && !channel.isRecording) {
          await this.prober.probe(channel);
          this.processed++;
        } else {
          channel.release();
        }
      } catch (error) {
        this.failures++;
        channel.release();
        log.error('Probe failed in worker', { lane, worker: index, channelId: channel.id, error });
      }
    }
  }
}
