/**
 * Tests for ChannelRegistry - snapshots, serialized mutations, debounced saves
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ChannelRegistry } from '../../src/core/channel-registry.js';
import { DuplicateChannelError, PersistenceFailureError } from '../../src/utils/errors.js';
import { InMemoryGateway, makeChannel } from '../helpers/fakes.js';

describe('ChannelRegistry', () => {
  let gateway: InMemoryGateway;
  let registry: ChannelRegistry;

  beforeEach(() => {
    vi.useFakeTimers();
    gateway = new InMemoryGateway();
    registry = new ChannelRegistry({ gateway, persistDebounceMs: 2000 });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('mutations', () => {
    it('should add and look up channels', async () => {
      const channel = makeChannel({ id: 'a' });

      await registry.add(channel);

      expect(registry.size).toBe(1);
      expect(registry.has('a')).toBe(true);
      expect(registry.findById('a')).toBe(channel);
      expect(registry.findById('missing')).toBeUndefined();
    });

    it('should reject a duplicate id', async () => {
      await registry.add(makeChannel({ id: 'a' }));

      await expect(registry.add(makeChannel({ id: 'a' }))).rejects.toThrow(DuplicateChannelError);
      expect(registry.size).toBe(1);
    });

    it('should skip duplicates when adding several channels', async () => {
      await registry.add(makeChannel({ id: 'a' }));

      const skipped = await registry.addMany([
        makeChannel({ id: 'a' }),
        makeChannel({ id: 'b' }),
        makeChannel({ id: 'b' }),
        makeChannel({ id: 'c' }),
      ]);

      expect(skipped.map((channel) => channel.id)).toEqual(['a', 'b']);
      expect(registry.all().map((channel) => channel.id)).toEqual(['a', 'b', 'c']);
    });

    it('should remove a registered channel only once', async () => {
      const channel = makeChannel({ id: 'a' });
      await registry.add(channel);

      expect(await registry.remove(channel)).toBe(true);
      expect(await registry.remove(channel)).toBe(false);
      expect(registry.size).toBe(0);
    });

    it('should clear and return every channel', async () => {
      await registry.addMany([makeChannel({ id: 'a' }), makeChannel({ id: 'b' })]);

      const removed = await registry.clear();

      expect(removed.map((channel) => channel.id)).toEqual(['a', 'b']);
      expect(registry.size).toBe(0);
    });

    it('should serialize concurrent adds', async () => {
      await Promise.all([
        registry.add(makeChannel({ id: 'a' })),
        registry.add(makeChannel({ id: 'b' })),
        registry.add(makeChannel({ id: 'c' })),
      ]);

      expect(registry.all().map((channel) => channel.id)).toEqual(['a', 'b', 'c']);
    });
  });

  describe('snapshots', () => {
    it('should hand out a frozen array', async () => {
      await registry.add(makeChannel({ id: 'a' }));
      expect(Object.isFrozen(registry.all())).toBe(true);
    });

    it('should leave an earlier snapshot untouched by later mutations', async () => {
      await registry.add(makeChannel({ id: 'a' }));
      const before = registry.all();

      await registry.add(makeChannel({ id: 'b' }));
      await registry.remove(before[0] ?? makeChannel());

      expect(before.map((channel) => channel.id)).toEqual(['a']);
      expect(registry.all().map((channel) => channel.id)).toEqual(['b']);
    });
  });

  describe('persistence', () => {
    it('should write once after the debounce delay', async () => {
      await registry.add(makeChannel({ id: 'a' }));

      await vi.advanceTimersByTimeAsync(1999);
      expect(gateway.saved).toHaveLength(0);

      await vi.advanceTimersByTimeAsync(1);
      await registry.flush();
      expect(gateway.saved).toHaveLength(1);
      expect(gateway.saved[0]?.map((record) => record.id)).toEqual(['a']);
    });

    it('should coalesce bursts of requests into one write', async () => {
      await registry.add(makeChannel({ id: 'a' }));
      for (let i = 0; i < 5; i++) {
        registry.requestPersist();
        await vi.advanceTimersByTimeAsync(500);
      }

      await vi.advanceTimersByTimeAsync(2000);
      await registry.flush();

      expect(gateway.saved).toHaveLength(1);
      expect(registry.getStats().persistRequests).toBe(6);
    });

    it('should write the snapshot current at write time', async () => {
      const channel = makeChannel({ id: 'a' });
      await registry.add(channel);
      channel.incrementLiveCounts(true, {}, new Date(2024, 0, 2, 20, 15));

      await registry.flush();

      expect(gateway.saved[0]?.[0]?.historicalIntervals).toEqual({ '2': [20] });
    });

    it('should write nothing after a pending write is cancelled', async () => {
      await registry.add(makeChannel({ id: 'a' }));
      registry.cancelPendingPersist();

      await vi.advanceTimersByTimeAsync(5000);

      expect(gateway.saved).toHaveLength(0);
    });

    it('should report a failed write and keep the channels', async () => {
      const failures: PersistenceFailureError[] = [];
      registry = new ChannelRegistry({ gateway, onPersistenceError: (error) => failures.push(error) });
      gateway.failures = 1;

      await registry.add(makeChannel({ id: 'a' }));
      await registry.flush();

      expect(failures).toHaveLength(1);
      expect(failures[0]?.message).toBe('Failed to persist channels: disk unavailable');
      expect(registry.size).toBe(1);
      expect(registry.getStats()).toMatchObject({ writes: 0, failedWrites: 1, lastError: 'disk unavailable' });

      registry.requestPersist();
      await registry.flush();

      expect(gateway.saved).toHaveLength(1);
      expect(registry.getStats()).toMatchObject({ writes: 1, failedWrites: 1, lastError: null });
    });

    it('should survive a throwing failure callback', async () => {
      registry = new ChannelRegistry({
        gateway,
        onPersistenceError: () => {
          throw new Error('listener broke');
        },
      });
      gateway.failures = 1;

      await registry.add(makeChannel({ id: 'a' }));
      await expect(registry.flush()).resolves.toBeUndefined();
      expect(registry.getStats().failedWrites).toBe(1);
    });
  });
});
