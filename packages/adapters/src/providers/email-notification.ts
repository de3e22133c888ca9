/**
 * Email notification adapter (SMTP with STARTTLS)
 */
import { createTransport, type SendMailOptions } from 'nodemailer';
import {
  createLogger,
  getErrorMessage,
  NotificationChannel,
  type EmailConfig,
  type Logger,
  type OperationResult,
  type RunSummary,
  type SnapshotRecord,
} from '@snapshot-steward/shared';
import type { INotificationAdapter } from '../interfaces';
import { buildHtmlReport, buildReportSubject } from '../templates/report-html';

export interface MailTransport {
  sendMail(message: SendMailOptions): Promise<unknown>;
}

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export class EmailNotificationAdapter implements INotificationAdapter {
  private readonly config: EmailConfig;
  private readonly recipients: string[];
  private readonly logger: Logger;
  private transport?: MailTransport;

  constructor(config: EmailConfig, options: { transport?: MailTransport; logger?: Logger } = {}) {
    this.config = config;
    this.transport = options.transport;
    this.logger = (options.logger ?? createLogger()).child({ adapter: 'email-notification' });

    this.recipients = config.toAddresses.filter((address) => EMAIL_PATTERN.test(address));
    const rejected = config.toAddresses.filter((address) => !EMAIL_PATTERN.test(address));
    if (rejected.length > 0) {
      this.logger.warn('Ignoring malformed alert receivers', { rejected });
    }
  }

  getChannel(): NotificationChannel {
    return NotificationChannel.EMAIL;
  }

  /**
   * Sender, password and at least one well-formed receiver are present
   */
  isConfigured(): boolean {
    return this.hasCredentials() && this.recipients.length > 0;
  }

  async sendReport(
    summary: RunSummary,
    records: readonly SnapshotRecord[]
  ): Promise<OperationResult> {
    if (!this.hasCredentials()) {
      this.logger.info('Email credentials not configured, skipping email notification');
      return { success: false, error: 'Email credentials not configured' };
    }

    if (this.recipients.length === 0) {
      this.logger.warn('No valid alert receivers, skipping email notification');
      return { success: false, error: 'No valid email receivers configured' };
    }

    try {
      await this.getTransport().sendMail({
        from: this.config.fromAddress,
        to: this.recipients.join(', '),
        subject: buildReportSubject(summary),
        html: buildHtmlReport(summary, records),
      });
    } catch (error) {
      this.logger.error('Failed to send email report', { error: getErrorMessage(error) });
      return { success: false, error: getErrorMessage(error) };
    }

    this.logger.info('Email report sent', { to: this.recipients });
    return { success: true };
  }

  private hasCredentials(): boolean {
    return Boolean(this.config.fromAddress && this.config.password);
  }

  private getTransport(): MailTransport {
    if (!this.transport) {
      this.transport = createTransport({
        host: this.config.smtpHost,
        port: this.config.smtpPort,
        secure: false,
        requireTLS: true,
        auth: {
          user: this.config.fromAddress,
          pass: this.config.password,
        },
      });
    }
    return this.transport;
  }
}
