/**
 * Scheduled-recording windows.
 *
 * A channel with scheduled recording lists window starts as comma-separated
 * `HH:MM[:SS]` times and window lengths as comma-separated hours, paired by
 * position. A start without a matching length gets 5 hours. Windows may run
 * past midnight.
 */

export const DEFAULT_WINDOW_HOURS = 5;

const SECONDS_PER_DAY = 24 * 60 * 60;
const DAY_MS = SECONDS_PER_DAY * 1000;

export interface ScheduleWindow {
  /** Seconds after local midnight */
  startSecond: number;
  durationSeconds: number;
  /** `HH:MM:SS~HH:MM:SS`, end time wrapped to the clock */
  label: string;
}

export interface ScheduleConfig {
  scheduledStartTime: string;
  monitorHours: string;
  /** 0 = Sunday. Absent or empty means every day */
  scheduledWeekdays?: number[];
}

/**
 * Parse the configured windows. Malformed entries are skipped.
 */
export function parseScheduleWindows(scheduledStartTime: string, monitorHours: string): ScheduleWindow[] {
  if (!scheduledStartTime.trim()) {
    return [];
  }

  const hoursList = monitorHours.split(',');
  const windows: ScheduleWindow[] = [];

  scheduledStartTime.split(',').forEach((entry, index) => {
    const startSecond = parseClockTime(entry);
    if (startSecond === null) {
      return;
    }

    const hoursText = (hoursList[index] ?? '').trim();
    const hours = hoursText === '' ? DEFAULT_WINDOW_HOURS : Number(hoursText);
    if (!Number.isFinite(hours) || hours <= 0) {
      return;
    }

    const durationSeconds = Math.round(hours * 3600);
    windows.push({
      startSecond,
      durationSeconds,
      label: `${formatClock(startSecond)}~${formatClock((startSecond + durationSeconds) % SECONDS_PER_DAY)}`,
    });
  });

  return windows;
}

/**
 * Whether `now` falls inside any window, including one that started the
 * previous day and runs past midnight.
 */
export function isWithinSchedule(config: ScheduleConfig, now: Date = new Date()): boolean {
  const windows = parseScheduleWindows(config.scheduledStartTime, config.monitorHours);
  const weekdays = config.scheduledWeekdays && config.scheduledWeekdays.length > 0
    ? new Set(config.scheduledWeekdays)
    : null;

  const midnight = new Date(now);
  midnight.setHours(0, 0, 0, 0);

  for (const dayOffset of [0, -1]) {
    const dayStart = new Date(midnight.getTime() + dayOffset * DAY_MS);
    // Recompute local midnight so DST shifts do not move the window.
    dayStart.setHours(0, 0, 0, 0);
    if (weekdays && !weekdays.has(dayStart.getDay())) {
      continue;
    }

    for (const window of windows) {
      const start = dayStart.getTime() + window.startSecond * 1000;
      const end = start + window.durationSeconds * 1000;
      if (now.getTime() >= start && now.getTime() <= end) {
        return true;
      }
    }
  }

  return false;
}

function parseClockTime(text: string): number | null {
  const match = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/.exec(text.trim());
  if (!match) {
    return null;
  }

  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  const seconds = match[3] === undefined ? 0 : Number(match[3]);
  if (hours > 23 || minutes > 59 || seconds > 59) {
    return null;
  }
  return hours * 3600 + minutes * 60 + seconds;
}

function formatClock(secondOfDay: number): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  const hours = Math.floor(secondOfDay / 3600);
  const minutes = Math.floor((secondOfDay % 3600) / 60);
  const seconds = secondOfDay % 60;
  return `${pad(hours)}:${pad(minutes)}:${pad(seconds)}`;
}
