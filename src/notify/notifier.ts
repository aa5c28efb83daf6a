/**
 * Outcome notifications
 *
 * Channels deliver one message; the Notifier decides which events are sent
 * and makes sure a failing channel never fails the run that triggered it.
 */

import { getLogger } from '../log/logger';
import type { Logger } from '../log/logger';
import type { Job, NotificationSettings, SessionStats } from '../types';

type FetchFn = typeof fetch;

const SEND_TIMEOUT_MS = 10000;

export type NotificationPriority = 'low' | 'normal' | 'high' | 'urgent';

export interface Notification {
  title: string;
  message: string;
  priority: NotificationPriority;
  tags: string[];
  url?: string;
}

export interface NotificationChannel {
  readonly name: string;
  send(notification: Notification): Promise<boolean>;
}

const NTFY_PRIORITY: Record<NotificationPriority, number> = {
  low: 2,
  normal: 3,
  high: 4,
  urgent: 5,
};

const DISCORD_COLOR: Record<NotificationPriority, number> = {
  low: 0x808080,
  normal: 0x3498db,
  high: 0xf39c12,
  urgent: 0xe74c3c,
};

export class NtfyChannel implements NotificationChannel {
  readonly name = 'ntfy';

  constructor(
    private readonly topic: string,
    private readonly fetchFn: FetchFn = fetch,
    private readonly baseUrl: string = 'https://ntfy.sh'
  ) {}

  async send(notification: Notification): Promise<boolean> {
    const headers: Record<string, string> = {
      Title: notification.title,
      Priority: String(NTFY_PRIORITY[notification.priority]),
      Tags: notification.tags.join(','),
    };
    if (notification.url) {
      headers.Click = notification.url;
      headers.Actions = `view, Open, ${notification.url}`;
    }

    const response = await this.fetchFn(`${this.baseUrl}/${this.topic}`, {
      method: 'POST',
      headers,
      body: notification.message,
      signal: AbortSignal.timeout(SEND_TIMEOUT_MS),
    });
    return response.status === 200;
  }
}

export class DiscordChannel implements NotificationChannel {
  readonly name = 'discord';

  constructor(
    private readonly webhookUrl: string,
    private readonly fetchFn: FetchFn = fetch
  ) {}

  async send(notification: Notification): Promise<boolean> {
    const embed: Record<string, unknown> = {
      title: notification.title,
      description: notification.message,
      color: DISCORD_COLOR[notification.priority],
    };
    if (notification.url) {
      embed.url = notification.url;
    }
    if (notification.tags.length > 0) {
      embed.footer = { text: notification.tags.join(' | ') };
    }

    const response = await this.fetchFn(this.webhookUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ username: 'Apply Orchestrator', embeds: [embed] }),
      signal: AbortSignal.timeout(SEND_TIMEOUT_MS),
    });
    return response.status === 200 || response.status === 204;
  }
}

export class Notifier {
  private readonly logger: Logger;

  constructor(
    private readonly channels: NotificationChannel[],
    private readonly events: NotificationSettings['events'],
    logger?: Logger
  ) {
    this.logger = logger ?? getLogger();
  }

  get enabled(): boolean {
    return this.channels.length > 0;
  }

  private async broadcast(notification: Notification): Promise<void> {
    await Promise.all(
      this.channels.map(async channel => {
        try {
          const ok = await channel.send(notification);
          if (!ok) {
            this.logger.warn(`[Notify] ${channel.name} rejected "${notification.title}"`);
          }
        } catch (error) {
          this.logger.warn(`[Notify] ${channel.name} failed: ${error instanceof Error ? error.message : String(error)}`);
        }
      })
    );
  }

  async notifyNeedsReview(job: Job, reason: string): Promise<void> {
    if (!this.events.needsReview) return;
    await this.broadcast({
      title: `Review needed: ${job.company}`,
      message: `${job.title}\n${reason}`,
      priority: 'high',
      tags: ['warning', 'briefcase'],
      url: job.apply_url || job.url,
    });
  }

  async notifyCompleted(job: Job): Promise<void> {
    if (!this.events.completed) return;
    await this.broadcast({
      title: `Applied: ${job.company}`,
      message: job.title,
      priority: 'normal',
      tags: ['white_check_mark'],
      url: job.apply_url || job.url,
    });
  }

  async notifyFailed(job: Job, error: string): Promise<void> {
    if (!this.events.failed) return;
    await this.broadcast({
      title: `Failed: ${job.company}`,
      message: `${job.title}\n${error}`,
      priority: 'urgent',
      tags: ['x'],
      url: job.apply_url || job.url,
    });
  }

  async notifySummary(stats: SessionStats): Promise<void> {
    if (!this.events.summary) return;
    const minutes = Math.round(stats.durationMs / 60000);
    await this.broadcast({
      title: 'Session complete',
      message: [
        `Processed: ${stats.jobsProcessed}`,
        `Submitted: ${stats.submitted}`,
        `Needs review: ${stats.needsReview}`,
        `Failed: ${stats.failed}`,
        `Expired: ${stats.expired}`,
        `Duration: ${minutes} min`,
      ].join('\n'),
      priority: 'low',
      tags: ['bar_chart'],
    });
  }
}

/**
 * Notifier over every configured channel. With none configured it sends nothing.
 */
export function createNotifier(settings: NotificationSettings, fetchFn: FetchFn = fetch): Notifier {
  const channels: NotificationChannel[] = [];
  if (settings.ntfyTopic) {
    channels.push(new NtfyChannel(settings.ntfyTopic, fetchFn));
  }
  if (settings.discordWebhookUrl) {
    channels.push(new DiscordChannel(settings.discordWebhookUrl, fetchFn));
  }
  return new Notifier(channels, settings.events);
}

export default {
  Notifier,
  NtfyChannel,
  DiscordChannel,
  createNotifier,
};
