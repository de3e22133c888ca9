/**
 * Email and Slack notification adapter Tests
 */

import { describe, it, expect, vi } from 'vitest';
import axios, { type InternalAxiosRequestConfig } from 'axios';
import type { SendMailOptions } from 'nodemailer';
import { createLogger, LogLevel, NotificationChannel, type EmailConfig } from '@snapshot-steward/shared';
import { EmailNotificationAdapter, SlackNotificationAdapter } from '../src/providers';
import { buildRecord, buildSummary } from './fixtures';

const logger = createLogger({}, LogLevel.ERROR);

const emailConfig: EmailConfig = {
  fromAddress: 'reports@example.com',
  toAddresses: ['ops@example.com', 'finance@example.com'],
  smtpHost: 'smtp.example.com',
  smtpPort: 587,
  password: 'test-secret',
};

describe('EmailNotificationAdapter', () => {
  it('should send the HTML report to every receiver', async () => {
    const sendMail = vi.fn(async (_message: SendMailOptions) => ({ messageId: 'message-1' }));
    const adapter = new EmailNotificationAdapter(emailConfig, { transport: { sendMail }, logger });

    const result = await adapter.sendReport(
      buildSummary({ oldSnapshotsCount: 1, estimatedSavingsUsd: 5 }),
      [buildRecord()]
    );

    expect(result).toEqual({ success: true });
    expect(adapter.getChannel()).toBe(NotificationChannel.EMAIL);
    expect(sendMail).toHaveBeenCalledTimes(1);
    const message = sendMail.mock.calls[0][0];
    expect(message.from).toBe('reports@example.com');
    expect(message.to).toBe('ops@example.com, finance@example.com');
    expect(message.subject).toBe('Snapshot Report: 1 Old Snapshots Found | Savings: $5.00/mo');
    expect(String(message.html)).toContain('EBS Snapshot Expiry Report');
  });

  it('should skip delivery without credentials', async () => {
    const sendMail = vi.fn(async (_message: SendMailOptions) => ({}));
    const adapter = new EmailNotificationAdapter(
      { ...emailConfig, password: '' },
      { transport: { sendMail }, logger }
    );

    const result = await adapter.sendReport(buildSummary(), []);

    expect(result).toEqual({ success: false, error: 'Email credentials not configured' });
    expect(sendMail).not.toHaveBeenCalled();
  });

  it('should report transport failures', async () => {
    const sendMail = vi.fn(async (_message: SendMailOptions) => {
      throw new Error('Invalid login');
    });
    const adapter = new EmailNotificationAdapter(emailConfig, { transport: { sendMail }, logger });

    const result = await adapter.sendReport(buildSummary(), []);

    expect(result).toEqual({ success: false, error: 'Invalid login' });
  });

  it('should drop malformed receivers and send to the rest', async () => {
    const sendMail = vi.fn(async (_message: SendMailOptions) => ({}));
    const adapter = new EmailNotificationAdapter(
      { ...emailConfig, toAddresses: ['ops-team', 'ops@example.com'] },
      { transport: { sendMail }, logger }
    );

    const result = await adapter.sendReport(buildSummary(), []);

    expect(result).toEqual({ success: true });
    expect(sendMail.mock.calls[0][0].to).toBe('ops@example.com');
  });

  it('should skip delivery when no receiver is well formed', async () => {
    const sendMail = vi.fn(async (_message: SendMailOptions) => ({}));
    const adapter = new EmailNotificationAdapter(
      { ...emailConfig, toAddresses: ['ops-team'] },
      { transport: { sendMail }, logger }
    );

    const result = await adapter.sendReport(buildSummary(), []);

    expect(adapter.isConfigured()).toBe(false);
    expect(result).toEqual({ success: false, error: 'No valid email receivers configured' });
    expect(sendMail).not.toHaveBeenCalled();
  });
});

function stubHttp(status: number) {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async (config: InternalAxiosRequestConfig) => {
      requests.push(config);
      return { data: 'ok', status, statusText: String(status), headers: {}, config };
    },
  });
  return { http, requests };
}

describe('SlackNotificationAdapter', () => {
  it('should post a summary attachment to the webhook', async () => {
    const { http, requests } = stubHttp(200);
    const adapter = new SlackNotificationAdapter(
      { webhookUrl: 'https://hooks.example.com/services/test' },
      { http, logger }
    );

    const result = await adapter.sendReport(
      buildSummary({ deletedCount: 1, regionsScanned: ['us-east-1', 'eu-west-1'] }),
      []
    );

    expect(result).toEqual({ success: true });
    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe('https://hooks.example.com/services/test');

    const payload = JSON.parse(String(requests[0].data));
    expect(payload.username).toBe('Snapshot Steward');
    const [attachment] = payload.attachments;
    expect(attachment.color).toBe('danger');
    expect(attachment.title).toBe('Snapshot Report: 1 Old Snapshots Found | Savings: $0.00/mo');
    expect(attachment.ts).toBe(1780293600);
    expect(attachment.fields).toContainEqual({
      title: 'Older than 90 days',
      value: '1',
      short: true,
    });
    expect(attachment.fields).toContainEqual({
      title: 'Regions',
      value: 'us-east-1, eu-west-1',
      short: true,
    });
  });

  it('should colour a clean scan green', async () => {
    const { http, requests } = stubHttp(200);
    const adapter = new SlackNotificationAdapter(
      { webhookUrl: 'https://hooks.example.com/services/test' },
      { http, logger }
    );

    await adapter.sendReport(buildSummary({ oldSnapshotsCount: 0 }), []);

    expect(JSON.parse(String(requests[0].data)).attachments[0].color).toBe('good');
  });

  it('should report webhook errors', async () => {
    const { http } = stubHttp(500);
    const adapter = new SlackNotificationAdapter(
      { webhookUrl: 'https://hooks.example.com/services/test' },
      { http, logger }
    );

    const result = await adapter.sendReport(buildSummary(), []);

    expect(result).toEqual({ success: false, error: 'Request failed with status code 500' });
  });

  it('should skip delivery for a malformed webhook URL', async () => {
    const { http, requests } = stubHttp(200);
    const adapter = new SlackNotificationAdapter({ webhookUrl: 'hooks.slack/x' }, { http, logger });

    const result = await adapter.sendReport(buildSummary(), []);

    expect(result).toEqual({ success: false, error: 'Invalid Slack webhook URL' });
    expect(requests).toHaveLength(0);
  });
});
