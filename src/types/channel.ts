/**
 * Channel Types
 *
 * Configuration, patch and persisted-record shapes for monitored channels.
 * The zod schemas are the source of truth; the TypeScript types are inferred
 * from them so that loading, patching and saving share one definition.
 */

import { z } from 'zod';

// ============================================
// Status and lanes
// ============================================

export const CHANNEL_STATUSES = [
  'checking',
  'monitoring',
  'stopped-monitoring',
  'out-of-schedule',
  'check-error',
  'space-exhausted',
  'preparing-recording',
  'recording',
  'live-broadcasting',
  'not-recording',
  'recording-error',
] as const;

export type ChannelStatus = (typeof CHANNEL_STATUSES)[number];

export type Lane = 'fast' | 'medium' | 'slow';

export const LANES: readonly Lane[] = ['fast', 'medium', 'slow'];

/**
 * Hours of day (0-23) a channel was observed live, keyed by weekday
 * ("0" = Sunday ... "6" = Saturday). At most five hours per day, oldest first.
 */
export type HistoricalIntervals = Record<string, number[]>;

// ============================================
// Configuration
// ============================================

const weekdaySchema = z.number().int().min(0).max(6);
const hourSchema = z.number().int().min(0).max(23);

/**
 * Fields a user may set when adding a channel. Everything except `url` has a
 * default.
 */
export const channelConfigSchema = z.object({
  url: z.string().url(),
  streamerName: z.string().default(''),
  quality: z.string().default('OD'),
  recordFormat: z.string().default('TS'),
  monitorEnabled: z.boolean().default(true),
  scheduledRecording: z.boolean().default(false),
  /** Comma-separated HH:MM[:SS] window starts */
  scheduledStartTime: z.string().default(''),
  /** Comma-separated window lengths in hours, one per start time */
  monitorHours: z.string().default(''),
  scheduledWeekdays: z.array(weekdaySchema).optional(),
  segmentRecord: z.boolean().default(false),
  segmentTimeSeconds: z.number().int().positive().default(1800),
  recordingDir: z.string().default(''),
  enabledMessagePush: z.boolean().default(false),
  onlyNotifyNoRecord: z.boolean().default(false),
  flvUseDirectDownload: z.boolean().default(false),
});

export type ChannelConfigInput = z.input<typeof channelConfigSchema>;
export type ChannelConfig = z.infer<typeof channelConfigSchema>;

/**
 * An explicit configuration patch. Identity (`url`) and learned statistics are
 * not patchable; unknown keys are rejected.
 */
export const channelPatchSchema = z
  .object({
    streamerName: z.string(),
    quality: z.string(),
    recordFormat: z.string(),
    monitorEnabled: z.boolean(),
    scheduledRecording: z.boolean(),
    scheduledStartTime: z.string(),
    monitorHours: z.string(),
    scheduledWeekdays: z.array(weekdaySchema).optional(),
    segmentRecord: z.boolean(),
    segmentTimeSeconds: z.number().int().positive(),
    recordingDir: z.string(),
    enabledMessagePush: z.boolean(),
    onlyNotifyNoRecord: z.boolean(),
    flvUseDirectDownload: z.boolean(),
  })
  .partial()
  .strict();

export type ChannelPatch = z.infer<typeof channelPatchSchema>;

// ============================================
// Persisted record
// ============================================

/** Hours kept per weekday before the oldest is evicted */
export const MAX_HOURS_PER_DAY = 5;

/** Longer day lists from older files keep their most recent hours */
export const historicalIntervalsSchema = z.record(
  z.string().regex(/^[0-6]$/),
  z.array(hourSchema).transform((hours) => hours.slice(-MAX_HOURS_PER_DAY))
);

/**
 * One channel as written by the persistence gateway.
 */
export const channelRecordSchema = channelConfigSchema.extend({
  id: z.string().min(1),
  platform: z.string().nullable().default(null),
  platformKey: z.string().nullable().default(null),
  /** Absent in older records; derived from the legacy counters on load */
  priorityScore: z.number().min(0).max(1).optional(),
  historicalIntervals: historicalIntervalsSchema.default({}),
  lastSeenLiveAt: z.number().nullable().default(null),
  consistencyScore: z.number().min(0).max(1).default(0),
  liveCheckCount: z.number().int().nonnegative().default(0),
  liveFoundCount: z.number().int().nonnegative().default(0),
  addedAt: z.number().nullable().default(null),
  lastActiveAt: z.number().nullable().default(null),
  lastDurationMs: z.number().nonnegative().default(0),
});

export type ChannelRecordInput = z.input<typeof channelRecordSchema>;
export type ChannelRecord = z.infer<typeof channelRecordSchema>;
