/**
 * Slack notification adapter
 */
import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import {
  createLogger,
  getErrorMessage,
  NotificationChannel,
  type Logger,
  type OperationResult,
  type RunSummary,
  type SlackConfig,
  type SnapshotRecord,
} from '@snapshot-steward/shared';
import type { INotificationAdapter } from '../interfaces';
import { buildReportSubject, formatUsd } from '../templates/report-html';

const WebhookUrlSchema = z
  .string()
  .url()
  .refine((url) => /^https?:\/\//i.test(url), 'Webhook URL must use http or https');

export class SlackNotificationAdapter implements INotificationAdapter {
  private readonly webhookUrl?: string;
  private readonly http: AxiosInstance;
  private readonly logger: Logger;

  constructor(config: SlackConfig, options: { http?: AxiosInstance; logger?: Logger } = {}) {
    this.http = options.http ?? axios.create({ timeout: 10_000 });
    this.logger = (options.logger ?? createLogger()).child({ adapter: 'slack-notification' });

    const parsed = WebhookUrlSchema.safeParse(config.webhookUrl);
    if (parsed.success) {
      this.webhookUrl = parsed.data;
    } else {
      this.logger.warn('Ignoring malformed Slack webhook URL');
    }
  }

  getChannel(): NotificationChannel {
    return NotificationChannel.SLACK;
  }

  async sendReport(
    summary: RunSummary,
    _records: readonly SnapshotRecord[]
  ): Promise<OperationResult> {
    if (!this.webhookUrl) {
      return { success: false, error: 'Invalid Slack webhook URL' };
    }

    const payload = {
      username: 'Snapshot Steward',
      icon_emoji: ':camera:',
      attachments: [
        {
          color: this.getColorForSummary(summary),
          title: buildReportSubject(summary),
          fields: [
            { title: 'Total Snapshots', value: String(summary.totalSnapshots), short: true },
            {
              title: `Older than ${summary.retentionDays} days`,
              value: String(summary.oldSnapshotsCount),
              short: true,
            },
            { title: 'Deleted', value: String(summary.deletedCount), short: true },
            { title: 'Archived', value: String(summary.archivedCount), short: true },
            {
              title: 'Monthly Cost',
              value: formatUsd(summary.totalEstimatedCostUsd),
              short: true,
            },
            { title: 'Regions', value: summary.regionsScanned.join(', '), short: true },
          ],
          footer: 'Snapshot Steward',
          ts: Math.floor(Date.parse(summary.scanDate) / 1000),
        },
      ],
    };

    try {
      await this.http.post(this.webhookUrl, payload);
    } catch (error) {
      this.logger.error('Failed to post Slack report', { error: getErrorMessage(error) });
      return { success: false, error: getErrorMessage(error) };
    }

    this.logger.info('Slack report posted');
    return { success: true };
  }

  private getColorForSummary(summary: RunSummary): string {
    if (summary.deletedCount > 0) {
      return 'danger';
    }
    if (summary.oldSnapshotsCount > 0) {
      return 'warning';
    }
    return 'good';
  }
}
