/**
 * Live Notifications
 *
 * Desktop notifications and push messages for stream start and end.
 * Delivery is fire-and-forget: a failing notifier or pusher is logged and
 * never reaches the prober. `notifiedLiveStart` / `notifiedLiveEnd` on the
 * channel keep each push to once per live session.
 *
 * Push templates understand `[room_name]`, `[time]` and `[title]`.
 */

import type { MessagePusher, Notifier } from '../types/collaborators.js';
import type { NotificationConfig } from '../utils/config-schemas.js';
import { formatError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { ChannelState } from './channel-state.js';

const log = logger.notifications;

export const DEFAULT_NOTIFICATION_TITLE = 'Live status notification';
export const DEFAULT_DESKTOP_TITLE = 'Live notification';
export const DEFAULT_LIVE_START_CONTENT = '[room_name] went live at [time]: [title]';
export const DEFAULT_LIVE_END_CONTENT = '[room_name] ended the stream at [time]';

export type PushKind = 'start' | 'end';

export interface LiveNotificationsOptions {
  config: NotificationConfig;
  notifier?: Notifier;
  pusher?: MessagePusher;
}

export interface TemplateValues {
  roomName: string;
  time: Date;
  title: string | null;
}

/**
 * Fill `[room_name]`, `[time]` and `[title]` in a push template.
 */
export function renderTemplate(template: string, values: TemplateValues): string {
  return template
    .replaceAll('[room_name]', values.roomName)
    .replaceAll('[time]', formatTimestamp(values.time))
    .replaceAll('[title]', values.title || 'None');
}

/**
 * Local time as `YYYY-MM-DD HH:mm:ss`.
 */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export class LiveNotifications {
  private readonly config: NotificationConfig;
  private readonly notifier?: Notifier;
  private readonly pusher?: MessagePusher;

  constructor(options: LiveNotificationsOptions) {
    this.config = options.config;
    this.notifier = options.notifier;
    this.pusher = options.pusher;
  }

  /**
   * Desktop notification for a not-live to live transition.
   */
  notifyLiveStart(channel: ChannelState): void {
    if (!this.notifier || !this.config.desktopNotify) {
      return;
    }
    const message = channel.config.onlyNotifyNoRecord
      ? `${channel.config.streamerName} | Live broadcast started`
      : `${channel.config.streamerName} | Live recording started`;
    const notifier = this.notifier;
    this.fireAndForget('desktop', channel, () => notifier.notify(DEFAULT_DESKTOP_TITLE, message));
  }

  /**
   * Start-of-stream push, at most once per live session.
   *
   * @returns true if a push was sent
   */
  pushLiveStart(channel: ChannelState, now: Date = new Date()): boolean {
    if (channel.notifiedLiveStart || !this.shouldPush(channel, 'start')) {
      return false;
    }
    const template = this.config.liveStartContent || DEFAULT_LIVE_START_CONTENT;
    this.push(channel, template, now);
    channel.notifiedLiveStart = true;
    return true;
  }

  /**
   * End-of-stream push, at most once per live session.
   *
   * @returns true if a push was sent
   */
  pushLiveEnd(channel: ChannelState, now: Date = new Date()): boolean {
    if (channel.notifiedLiveEnd || !this.shouldPush(channel, 'end')) {
      return false;
    }
    const template = this.config.liveEndContent || DEFAULT_LIVE_END_CONTENT;
    this.push(channel, template, now);
    channel.notifiedLiveEnd = true;
    return true;
  }

  shouldPush(channel: ChannelState, kind: PushKind): boolean {
    if (!this.pusher || !channel.config.enabledMessagePush) {
      return false;
    }
    return kind === 'start' ? this.config.pushOnLiveStart : this.config.pushOnLiveEnd;
  }

  private push(channel: ChannelState, template: string, now: Date): void {
    const pusher = this.pusher;
    if (!pusher) {
      return;
    }
    const title = this.config.notificationTitle.trim() || DEFAULT_NOTIFICATION_TITLE;
    const body = renderTemplate(template, {
      roomName: channel.config.streamerName,
      time: now,
      title: channel.liveTitle,
    });
    this.fireAndForget('push', channel, () => pusher.pushMessage(title, body));
  }

  private fireAndForget(kind: string, channel: ChannelState, send: () => Promise<void> | void): void {
    const report = (error: unknown) => {
      log.warn('Notification delivery failed', {
        kind,
        channelId: channel.id,
        error: formatError(error),
      });
    };

    try {
      void Promise.resolve(send()).catch(report);
    } catch (error) {
      report(error);
    }
  }
}
