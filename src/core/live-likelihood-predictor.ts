/**
 * Live Likelihood Predictor
 *
 * Turns a channel's weekday/hour history into a likelihood that it is live
 * right now, and that likelihood into a polling interval:
 *
 * | likelihood | interval          |
 * |------------|-------------------|
 * | >= 0.9     | 60s               |
 * | >= 0.5     | base / 2          |
 * | <= 0.2     | base * 2          |
 * | otherwise  | base              |
 *
 * Channels are polled aggressively around their usual on-air hours and
 * relaxed elsewhere, which bounds total probe volume without missing starts.
 */

import type { Lane } from '../types/channel.js';
import type { ChannelState } from './channel-state.js';

export const NO_HISTORY_LIKELIHOOD = 0.5;
export const OFF_DAY_LIKELIHOOD = 0.2;
export const ON_AIR_LIKELIHOOD = 1.0;
export const FAR_FROM_WINDOW_LIKELIHOOD = 0.1;

/** Interval used once likelihood reaches 0.9 */
export const HOT_INTERVAL_SECONDS = 60;

/** Upper bound (inclusive) of each lane's interval */
export const FAST_LANE_MAX_SECONDS = 60;
export const MEDIUM_LANE_MAX_SECONDS = 180;

type HistorySource = Pick<ChannelState, 'historicalIntervals'>;

/**
 * Likelihood in [0, 1] that the channel is live at `now`.
 */
export function likelihood(channel: HistorySource, now: Date = new Date()): number {
  const days = Object.keys(channel.historicalIntervals);
  if (days.length === 0) {
    return NO_HISTORY_LIKELIHOOD;
  }

  const activeHours = channel.historicalIntervals[String(now.getDay())];
  if (!activeHours) {
    return OFF_DAY_LIKELIHOOD;
  }

  const hour = now.getHours();
  if (activeHours.includes(hour)) {
    return ON_AIR_LIKELIHOOD;
  }

  // Usual start within the next hour: ramp from 0.5 to 0.9 across this hour.
  if (activeHours.includes((hour + 1) % 24)) {
    return 0.5 + 0.4 * (now.getMinutes() / 60);
  }

  return FAR_FROM_WINDOW_LIKELIHOOD;
}

/**
 * Polling interval in seconds for the channel's current likelihood.
 */
export function adjustedInterval(
  channel: HistorySource,
  baseInterval: number,
  now: Date = new Date()
): number {
  const score = likelihood(channel, now);

  if (score >= 0.9) {
    return HOT_INTERVAL_SECONDS;
  }
  if (score >= 0.5) {
    return Math.floor(baseInterval / 2);
  }
  if (score <= 0.2) {
    return baseInterval * 2;
  }
  return baseInterval;
}

/**
 * Interval the dispatcher schedules with. A channel that has never been
 * observed has nothing to adjust on and keeps the base interval.
 */
export function pollingInterval(
  channel: Pick<ChannelState, 'historicalIntervals' | 'liveCheckCount'>,
  baseInterval: number,
  now: Date = new Date()
): number {
  if (channel.liveCheckCount === 0 && Object.keys(channel.historicalIntervals).length === 0) {
    return baseInterval;
  }
  return adjustedInterval(channel, baseInterval, now);
}

export function laneFor(intervalSeconds: number): Lane {
  if (intervalSeconds <= FAST_LANE_MAX_SECONDS) {
    return 'fast';
  }
  if (intervalSeconds <= MEDIUM_LANE_MAX_SECONDS) {
    return 'medium';
  }
  return 'slow';
}

export type LikelihoodBand = 'high' | 'normal' | 'low';

/**
 * Coarse band for display: high from 0.9, normal from 0.5, low below.
 */
export function likelihoodBand(score: number): LikelihoodBand {
  if (score >= 0.9) {
    return 'high';
  }
  if (score >= 0.5) {
    return 'normal';
  }
  return 'low';
}
