/**
 * Tests for LiveProber - one liveness check per channel
 *
 * Tests cover:
 * - Guards (recording, active recorder, monitoring off, removed)
 * - Scheduled-recording windows
 * - Live and offline transitions, notifications and sessions
 * - Resolver failures and incomplete results
 * - Per-platform concurrency bound and jitter
 * - Re-checks after a session ends
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ChannelRegistry } from '../../src/core/channel-registry.js';
import type { ChannelState } from '../../src/core/channel-state.js';
import { LiveNotifications } from '../../src/core/live-notifications.js';
import { LiveProber, hostPlatform, type ProberConfig } from '../../src/core/live-prober.js';
import { RecordingSessions } from '../../src/core/recording-sessions.js';
import type { StreamInfo, StreamResolver } from '../../src/types/collaborators.js';
import type { NotificationConfig } from '../../src/utils/config-schemas.js';
import {
  FakeNotifier,
  FakePusher,
  FakeRecorder,
  FakeResolver,
  InMemoryGateway,
  TUESDAY_2015,
  liveStream,
  makeChannel,
  makeConfig,
  offlineStream,
  settle,
} from '../helpers/fakes.js';

class GatedResolver implements StreamResolver {
  active = 0;
  peak = 0;
  readonly gates: Array<() => void> = [];

  async resolve(): Promise<StreamInfo> {
    this.active++;
    this.peak = Math.max(this.peak, this.active);
    await new Promise<void>((resolve) => this.gates.push(resolve));
    this.active--;
    return offlineStream();
  }
}

describe('LiveProber', () => {
  let registry: ChannelRegistry;
  let resolver: FakeResolver;
  let recorder: FakeRecorder;
  let sessions: RecordingSessions;
  let notifier: FakeNotifier;
  let pusher: FakePusher;
  let recordingEnabled: boolean;
  let sleeps: number[];
  let channel: ChannelState;

  function buildProber(
    overrides: {
      config?: Partial<ProberConfig>;
      notifications?: Partial<NotificationConfig>;
      resolver?: StreamResolver;
      random?: () => number;
    } = {}
  ): LiveProber {
    const config = makeConfig({ monitor: overrides.config, notifications: overrides.notifications });
    return new LiveProber({
      registry,
      resolver: overrides.resolver ?? resolver,
      sessions,
      notifications: new LiveNotifications({ config: config.notifications, notifier, pusher }),
      recordingEnabled: () => recordingEnabled,
      config: config.monitor,
      random: overrides.random ?? (() => 0),
      sleep: async (ms) => {
        sleeps.push(ms);
      },
      now: () => TUESDAY_2015,
    });
  }

  beforeEach(async () => {
    registry = new ChannelRegistry({ gateway: new InMemoryGateway(), persistDebounceMs: 60_000 });
    resolver = new FakeResolver();
    recorder = new FakeRecorder();
    sessions = new RecordingSessions({ recorder, registry, now: () => TUESDAY_2015.getTime() });
    notifier = new FakeNotifier();
    pusher = new FakePusher();
    recordingEnabled = true;
    sleeps = [];
    channel = makeChannel({ streamerName: 'Alice' });
    await registry.add(channel);
  });

  // ============================================
  // GUARDS
  // ============================================
  describe('guards', () => {
    it('should skip a recording channel', async () => {
      channel.isRecording = true;

      expect(await buildProber().probeIfIdle(channel)).toEqual({ kind: 'skipped', reason: 'recording' });
      expect(resolver.calls).toEqual([]);
      expect(channel.isChecking).toBe(false);
    });

    it('should skip while a recorder is still running for the channel', async () => {
      channel.isLive = true;
      await sessions.start(channel, liveStream());
      channel.isRecording = false;

      expect(await buildProber().probeIfIdle(channel)).toEqual({ kind: 'skipped', reason: 'concurrency-conflict' });
    });

    it('should skip and mark a channel with monitoring off', async () => {
      channel.config.monitorEnabled = false;

      expect(await buildProber().probeIfIdle(channel)).toEqual({ kind: 'skipped', reason: 'monitoring-disabled' });
      expect(channel.status).toBe('stopped-monitoring');
    });

    it('should skip a channel no longer registered', async () => {
      await registry.remove(channel);

      expect(await buildProber().probeIfIdle(channel)).toEqual({ kind: 'skipped', reason: 'removed' });
      expect(resolver.calls).toEqual([]);
    });

    it('should report busy when a probe is already in flight', async () => {
      channel.tryClaim();

      expect(await buildProber().probeIfIdle(channel)).toEqual({ kind: 'busy' });
      expect(channel.isChecking).toBe(true);
    });

    it('should drop the result of a channel removed during resolution', async () => {
      const removing: StreamResolver = {
        resolve: async () => {
          await registry.remove(channel);
          return liveStream();
        },
      };

      const outcome = await buildProber({ resolver: removing }).probeIfIdle(channel);

      expect(outcome).toEqual({ kind: 'skipped', reason: 'removed' });
      expect(channel.liveCheckCount).toBe(0);
      expect(recorder.started).toEqual([]);
    });

    it('should clear a stale manual-stop flag', async () => {
      channel.manuallyStopped = true;

      await buildProber().probeIfIdle(channel);

      expect(channel.manuallyStopped).toBe(false);
    });
  });

  // ============================================
  // SCHEDULE
  // ============================================
  describe('scheduled recording', () => {
    it('should not resolve outside the scheduled window', async () => {
      channel.applyPatch({ scheduledRecording: true, scheduledStartTime: '08:00', monitorHours: '2' });
      channel.isLive = true;

      const outcome = await buildProber().probeIfIdle(channel);

      expect(outcome).toEqual({ kind: 'out-of-schedule' });
      expect(channel.status).toBe('out-of-schedule');
      expect(channel.isLive).toBe(false);
      expect(channel.detectionTime).toBe(TUESDAY_2015.getTime());
      expect(resolver.calls).toEqual([]);
    });

    it('should resolve inside the scheduled window', async () => {
      channel.applyPatch({ scheduledRecording: true, scheduledStartTime: '20:00', monitorHours: '1' });

      expect(await buildProber().probeIfIdle(channel)).toEqual({ kind: 'offline', wasLive: false });
      expect(resolver.calls).toHaveLength(1);
    });
  });

  // ============================================
  // OFFLINE
  // ============================================
  describe('offline results', () => {
    it('should record an offline observation', async () => {
      const outcome = await buildProber().probeIfIdle(channel);

      expect(outcome).toEqual({ kind: 'offline', wasLive: false });
      expect(channel.status).toBe('monitoring');
      expect(channel.liveCheckCount).toBe(1);
      expect(channel.liveFoundCount).toBe(0);
      expect(channel.detectionTime).toBe(TUESDAY_2015.getTime());
      expect(channel.isChecking).toBe(false);
    });

    it('should detect and cache the platform', async () => {
      await buildProber().probeIfIdle(channel);

      expect(channel.platform).toBe('live.example.com');
      expect(channel.platformKey).toBe('live.example.com');
      expect(resolver.calls).toEqual([{ url: channel.url, platformHint: 'live.example.com' }]);
    });

    it('should prefer the resolver platform detection', async () => {
      const detecting: StreamResolver = {
        resolve: async () => offlineStream(),
        detectPlatform: () => ({ platform: 'Example Live', platformKey: 'example' }),
      };

      await buildProber({ resolver: detecting }).probeIfIdle(channel);

      expect(channel.platform).toBe('Example Live');
      expect(channel.platformKey).toBe('example');
    });

    it('should push the end message when a live channel goes offline', async () => {
      channel.applyPatch({ enabledMessagePush: true });
      channel.isLive = true;

      const outcome = await buildProber({ notifications: { pushOnLiveEnd: true } }).probeIfIdle(channel);

      expect(outcome).toEqual({ kind: 'offline', wasLive: true });
      expect(channel.isLive).toBe(false);
      expect(pusher.sent).toEqual([
        { title: 'Live status notification', body: 'Alice ended the stream at 2024-01-02 20:15:00' },
      ]);
    });

    it('should adopt the resolved name over an empty or placeholder name', async () => {
      const unnamed = makeChannel({ id: 'unnamed', streamerName: '' });
      const placeholder = makeChannel({ id: 'placeholder', streamerName: 'Live Room' });
      await registry.addMany([unnamed, placeholder]);
      const prober = buildProber();

      await prober.probeIfIdle(unnamed);
      await prober.probeIfIdle(placeholder);
      await prober.probeIfIdle(channel);

      expect(unnamed.config.streamerName).toBe('Test Streamer');
      expect(placeholder.config.streamerName).toBe('Test Streamer');
      expect(channel.config.streamerName).toBe('Alice');
    });
  });

  // ============================================
  // LIVE
  // ============================================
  describe('live results', () => {
    it('should start recording on a live transition', async () => {
      resolver.setFallback(liveStream());

      const outcome = await buildProber().probeIfIdle(channel);

      expect(outcome).toEqual({ kind: 'live', transition: true, action: 'recording' });
      expect(channel.isLive).toBe(true);
      expect(channel.isRecording).toBe(true);
      expect(channel.status).toBe('recording');
      expect(channel.liveTitle).toBe('Evening stream');
      expect(channel.lastActiveAt).toBe(TUESDAY_2015.getTime());
      expect(channel.historicalIntervals).toEqual({ '2': [20] });
      expect(channel.loopIntervalSeconds).toBe(300);
      expect(recorder.started).toHaveLength(1);
      expect(notifier.sent).toEqual([{ title: 'Live notification', message: 'Alice | Live recording started' }]);
    });

    it('should report a recorder that fails to start', async () => {
      resolver.setFallback(liveStream());
      recorder.failNext = true;

      const outcome = await buildProber().probeIfIdle(channel);

      expect(outcome).toEqual({ kind: 'live', transition: true, action: 'recording-failed' });
      expect(channel.status).toBe('recording-error');
    });

    it('should not start a session while disk space is exhausted', async () => {
      resolver.setFallback(liveStream());
      recordingEnabled = false;

      const outcome = await buildProber().probeIfIdle(channel);

      expect(outcome).toEqual({ kind: 'live', transition: true, action: 'space-exhausted' });
      expect(channel.status).toBe('space-exhausted');
      expect(channel.liveFoundCount).toBe(1);
      expect(recorder.started).toEqual([]);
    });

    it('should notify only once across consecutive live probes', async () => {
      channel.applyPatch({ onlyNotifyNoRecord: true, enabledMessagePush: true });
      resolver.setFallback(liveStream());
      const prober = buildProber();

      const first = await prober.probeIfIdle(channel);
      const second = await prober.probeIfIdle(channel);

      expect(first).toEqual({ kind: 'live', transition: true, action: 'notify-only' });
      expect(second).toEqual({ kind: 'live', transition: false, action: 'notify-only' });
      expect(notifier.sent).toHaveLength(1);
      expect(pusher.sent).toEqual([
        { title: 'Live status notification', body: 'Alice went live at 2024-01-02 20:15:00: Evening stream' },
      ]);
      expect(channel.status).toBe('live-broadcasting');
      expect(channel.loopIntervalSeconds).toBe(600);
      expect(recorder.started).toEqual([]);
    });

    it('should keep the base interval for notify-only channels without a push', async () => {
      channel.applyPatch({ onlyNotifyNoRecord: true });
      resolver.setFallback(liveStream());

      await buildProber().probeIfIdle(channel);

      expect(channel.loopIntervalSeconds).toBe(300);
    });

    it('should notify again after the channel went offline and came back', async () => {
      channel.applyPatch({ onlyNotifyNoRecord: true });
      resolver.respond(liveStream(), offlineStream(), liveStream());
      const prober = buildProber();

      await prober.probeIfIdle(channel);
      await prober.probeIfIdle(channel);
      await prober.probeIfIdle(channel);

      expect(notifier.sent).toHaveLength(2);
    });
  });

  // ============================================
  // FAILURES
  // ============================================
  describe('failures', () => {
    it('should turn a resolver error into a check error', async () => {
      resolver.respond(new Error('network down'));

      const outcome = await buildProber().probeIfIdle(channel);

      expect(outcome.kind).toBe('error');
      expect(outcome.kind === 'error' && outcome.error.message).toBe('Resolver failed: network down');
      expect(channel.status).toBe('check-error');
      expect(channel.isChecking).toBe(false);
      expect(channel.liveCheckCount).toBe(0);
    });

    it('should treat a result carrying an error as incomplete', async () => {
      resolver.respond(liveStream({ error: 'geo-blocked' }));

      const outcome = await buildProber().probeIfIdle(channel);

      expect(outcome.kind === 'error' && outcome.error.message).toBe('Incomplete stream data: geo-blocked');
      expect(channel.isLive).toBe(false);
      expect(recorder.started).toEqual([]);
    });

    it('should treat a result without an anchor name as incomplete', async () => {
      resolver.respond(liveStream({ anchorName: '' }));

      const outcome = await buildProber().probeIfIdle(channel);

      expect(outcome.kind === 'error' && outcome.error.message).toBe('Incomplete stream data: missing anchor name');
      expect(channel.liveCheckCount).toBe(0);
    });

    it('should contain a recorder that throws synchronously', async () => {
      resolver.setFallback(liveStream());
      sessions = new RecordingSessions({
        recorder: {
          start: () => {
            throw new Error('unexpected');
          },
        },
        registry,
      });

      const outcome = await buildProber().probeIfIdle(channel);

      expect(outcome).toEqual({ kind: 'live', transition: true, action: 'recording-failed' });
      expect(channel.isChecking).toBe(false);
    });
  });

  // ============================================
  // CONCURRENCY
  // ============================================
  describe('platform concurrency', () => {
    it('should keep resolver calls per platform within the limit', async () => {
      const gated = new GatedResolver();
      const channels = [makeChannel({ id: 'a' }), makeChannel({ id: 'b' }), makeChannel({ id: 'c' })];
      await registry.addMany(channels);
      const prober = buildProber({ resolver: gated, config: { platformMaxConcurrentRequests: 2 } });

      const probes = channels.map((c) => prober.probeIfIdle(c));
      await settle(50);

      expect(gated.active).toBe(2);
      expect(prober.getPlatformStatus()).toEqual([{ key: 'live.example.com', inUse: 2, waiting: 1, limit: 2 }]);

      while (gated.gates.length > 0) {
        gated.gates.shift()?.();
        await settle(50);
      }
      await Promise.all(probes);

      expect(gated.peak).toBe(2);
    });

    it('should sleep a jittered delay before resolving', async () => {
      await buildProber({
        config: { probeJitterMinMs: 2000, probeJitterMaxMs: 5000 },
        random: () => 0.5,
      }).probeIfIdle(channel);

      expect(sleeps).toEqual([3500]);
    });
  });

  // ============================================
  // RETRIES
  // ============================================
  describe('checkWithRetry', () => {
    it('should stop re-checking once the channel records again', async () => {
      resolver.respond(offlineStream(), liveStream());

      const attempts = await buildProber({ config: { probeJitterMinMs: 0, probeJitterMaxMs: 0 } })
        .checkWithRetry(channel, 3, 20_000);

      expect(attempts).toBe(2);
      expect(channel.isRecording).toBe(true);
      expect(sleeps).toEqual([0, 20_000, 0]);
    });

    it('should make every attempt while the channel stays offline', async () => {
      const attempts = await buildProber().checkWithRetry(channel);

      expect(attempts).toBe(2);
      expect(resolver.calls).toHaveLength(2);
    });

    it('should not check after the prober is closed', async () => {
      const prober = buildProber();
      prober.close();

      expect(await prober.checkWithRetry(channel)).toBe(0);
      expect(resolver.calls).toEqual([]);
    });

    it('should not check a channel with monitoring off', async () => {
      channel.config.monitorEnabled = false;

      expect(await buildProber().checkWithRetry(channel)).toBe(0);
    });
  });
});

describe('hostPlatform', () => {
  it('should use the host name without www', () => {
    expect(hostPlatform('https://www.example.com/room/9')).toEqual({
      platform: 'example.com',
      platformKey: 'example.com',
    });
  });

  it('should fall back for an unparsable url', () => {
    expect(hostPlatform('not a url')).toEqual({ platform: 'unknown', platformKey: 'unknown' });
  });
});
