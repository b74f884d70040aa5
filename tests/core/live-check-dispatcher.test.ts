/**
 * Tests for LiveCheckDispatcher - due selection, lane routing and heartbeat
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ChannelRegistry } from '../../src/core/channel-registry.js';
import type { ChannelState } from '../../src/core/channel-state.js';
import { LiveCheckDispatcher, type DispatcherConfig } from '../../src/core/live-check-dispatcher.js';
import type { LaneSink } from '../../src/core/priority-lane-workers.js';
import type { Lane } from '../../src/types/channel.js';
import { InMemoryGateway, TUESDAY_2015, makeChannel, makeConfig, settle } from '../helpers/fakes.js';

class CollectingSink implements LaneSink {
  queued: Array<{ lane: Lane; id: string }> = [];
  failing = false;

  enqueue(lane: Lane, channel: ChannelState): void {
    if (this.failing) {
      throw new Error('queue closed');
    }
    this.queued.push({ lane, id: channel.id });
  }
}

const SECOND = 1000;

describe('LiveCheckDispatcher', () => {
  let registry: ChannelRegistry;
  let sink: CollectingSink;

  function buildDispatcher(
    options: { config?: Partial<DispatcherConfig>; beforeCycle?: () => Promise<unknown> } = {}
  ): LiveCheckDispatcher {
    return new LiveCheckDispatcher({
      registry,
      sink,
      config: makeConfig({ monitor: options.config }).monitor,
      beforeCycle: options.beforeCycle,
      random: () => 0,
      now: () => TUESDAY_2015,
    });
  }

  beforeEach(() => {
    registry = new ChannelRegistry({ gateway: new InMemoryGateway(), persistDebounceMs: 60_000 });
    sink = new CollectingSink();
  });

  // ============================================
  // ROUTING
  // ============================================
  describe('runCycle', () => {
    it('should route a fresh channel to the slow lane at the base interval', async () => {
      const channel = makeChannel({ id: 'fresh' });
      await registry.add(channel);

      const summary = buildDispatcher().runCycle(TUESDAY_2015);

      expect(sink.queued).toEqual([{ lane: 'slow', id: 'fresh' }]);
      expect(summary.dispatched).toEqual({ fast: 0, medium: 0, slow: 1 });
      expect(channel.loopIntervalSeconds).toBe(300);
      expect(channel.isChecking).toBe(true);
    });

    it('should route by predicted likelihood', async () => {
      await registry.addMany([
        makeChannel({ id: 'on-air', historicalIntervals: { '2': [20] } }),
        makeChannel({ id: 'soon', historicalIntervals: { '2': [21] } }),
        makeChannel({ id: 'quiet', historicalIntervals: { '2': [9] } }),
      ]);

      buildDispatcher().runCycle(TUESDAY_2015);

      expect(sink.queued).toEqual([
        { lane: 'fast', id: 'on-air' },
        { lane: 'medium', id: 'soon' },
        { lane: 'slow', id: 'quiet' },
      ]);
    });

    it('should wait until the interval has elapsed', async () => {
      const channel = makeChannel({ id: 'recent' });
      channel.detectionTime = TUESDAY_2015.getTime() - 299 * SECOND;
      await registry.add(channel);
      const dispatcher = buildDispatcher();

      expect(dispatcher.runCycle(TUESDAY_2015).waiting).toBe(1);
      expect(sink.queued).toEqual([]);

      channel.detectionTime = TUESDAY_2015.getTime() - 300 * SECOND;
      expect(dispatcher.runCycle(TUESDAY_2015).dispatched.slow).toBe(1);
    });

    it('should count a channel still being checked as busy instead of queueing it twice', async () => {
      await registry.add(makeChannel({ id: 'slow-probe' }));
      const dispatcher = buildDispatcher();

      dispatcher.runCycle(TUESDAY_2015);
      const second = dispatcher.runCycle(TUESDAY_2015);

      expect(sink.queued).toHaveLength(1);
      expect(second.busy).toEqual({ fast: 0, medium: 0, slow: 1 });
      expect(second.dispatched).toEqual({ fast: 0, medium: 0, slow: 0 });
    });

    it('should feed a live observation for recording channels without probing them', async () => {
      const channel = makeChannel({ id: 'recording' });
      channel.isRecording = true;
      await registry.add(channel);

      const summary = buildDispatcher().runCycle(TUESDAY_2015);

      expect(summary.recording).toBe(1);
      expect(sink.queued).toEqual([]);
      expect(channel.liveFoundCount).toBe(1);
      expect(channel.priorityScore).toBeCloseTo(0.1, 10);
      expect(channel.historicalIntervals).toEqual({ '2': [20] });
    });

    it('should ignore channels with monitoring off', async () => {
      await registry.add(makeChannel({ id: 'off', monitorEnabled: false }));

      const summary = buildDispatcher().runCycle(TUESDAY_2015);

      expect(summary).toEqual({
        dispatched: { fast: 0, medium: 0, slow: 0 },
        busy: { fast: 0, medium: 0, slow: 0 },
        waiting: 0,
        recording: 0,
      });
    });

    it('should visit channels by descending priority score', async () => {
      await registry.addMany([
        makeChannel({ id: 'low', priorityScore: 0.2 }),
        makeChannel({ id: 'high', priorityScore: 0.9 }),
        makeChannel({ id: 'mid', priorityScore: 0.5 }),
      ]);

      buildDispatcher().runCycle(TUESDAY_2015);

      expect(sink.queued.map((entry) => entry.id)).toEqual(['high', 'mid', 'low']);
    });

    it('should keep the interval chosen for a live notify-only channel', async () => {
      const channel = makeChannel({ id: 'notify', onlyNotifyNoRecord: true });
      channel.isLive = true;
      channel.loopIntervalSeconds = 600;
      channel.detectionTime = TUESDAY_2015.getTime() - 400 * SECOND;
      await registry.add(channel);

      const summary = buildDispatcher().runCycle(TUESDAY_2015);

      expect(summary.waiting).toBe(1);
      expect(channel.loopIntervalSeconds).toBe(600);
    });

    it('should release a channel the sink refuses', async () => {
      const channel = makeChannel({ id: 'refused' });
      await registry.add(channel);
      sink.failing = true;

      const summary = buildDispatcher().runCycle(TUESDAY_2015);

      expect(channel.isChecking).toBe(false);
      expect(summary.dispatched.slow).toBe(0);
    });

    it('should request one persistence write per cycle', async () => {
      await registry.add(makeChannel());
      const before = registry.getStats().persistRequests;

      buildDispatcher().runCycle(TUESDAY_2015);

      expect(registry.getStats().persistRequests).toBe(before + 1);
    });
  });

  // ============================================
  // HEARTBEAT
  // ============================================
  describe('heartbeat', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('should run the first cycle immediately and then every heartbeat', async () => {
      const beforeCycle = vi.fn(async () => {});
      const dispatcher = buildDispatcher({ beforeCycle });

      dispatcher.start();
      await settle();
      expect(dispatcher.cycleCount).toBe(1);

      await vi.advanceTimersByTimeAsync(30 * SECOND);
      await settle();
      expect(dispatcher.cycleCount).toBe(2);
      expect(beforeCycle).toHaveBeenCalledTimes(2);

      await dispatcher.stop();
      await vi.advanceTimersByTimeAsync(120 * SECOND);
      await settle();
      expect(dispatcher.cycleCount).toBe(2);
      expect(dispatcher.isRunning).toBe(false);
    });

    it('should wait one heartbeat when startup checks are off', async () => {
      const dispatcher = buildDispatcher({ config: { checkLiveOnStartup: false, heartbeatSeconds: 10 } });

      dispatcher.start();
      await vi.advanceTimersByTimeAsync(9 * SECOND);
      await settle();
      expect(dispatcher.cycleCount).toBe(0);

      await vi.advanceTimersByTimeAsync(1 * SECOND);
      await settle();
      expect(dispatcher.cycleCount).toBe(1);

      await dispatcher.stop();
    });

    it('should keep beating after a failed cycle', async () => {
      const beforeCycle = vi.fn<() => Promise<void>>()
        .mockRejectedValueOnce(new Error('statfs failed'))
        .mockResolvedValue(undefined);
      const dispatcher = buildDispatcher({ beforeCycle });

      dispatcher.start();
      await settle();
      expect(dispatcher.cycleCount).toBe(0);

      await vi.advanceTimersByTimeAsync(30 * SECOND);
      await settle();
      expect(dispatcher.cycleCount).toBe(1);

      await dispatcher.stop();
    });

    it('should keep a single heartbeat when restarted during a cycle', async () => {
      let openGate: () => void = () => {};
      const gate = new Promise<void>((resolve) => {
        openGate = resolve;
      });
      const beforeCycle = vi.fn(() => gate);
      const dispatcher = buildDispatcher({ beforeCycle });

      dispatcher.start();
      await settle();
      const stopping = dispatcher.stop();
      dispatcher.start();
      await settle();
      expect(beforeCycle).toHaveBeenCalledTimes(2);

      openGate();
      await stopping;
      await settle();
      expect(dispatcher.cycleCount).toBe(1);

      await vi.advanceTimersByTimeAsync(30 * SECOND);
      await settle();
      expect(dispatcher.cycleCount).toBe(2);
      expect(beforeCycle).toHaveBeenCalledTimes(3);

      await dispatcher.stop();
    });
  });
});
