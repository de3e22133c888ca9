/**
 * Factory for creating adapter instances based on configuration
 */
import { EC2Client } from '@aws-sdk/client-ec2';
import { SecretsManagerClient } from '@aws-sdk/client-secrets-manager';
import { z } from 'zod';
import {
  createLogger,
  getErrorMessage,
  NotificationChannel,
  type AwsResourceConfig,
  type EmailConfig,
  type Logger,
  type NotificationConfig,
  type SlackConfig,
} from '@snapshot-steward/shared';
import type {
  IColdArchiveAdapter,
  IDurableLogAdapter,
  INotificationAdapter,
  ISecretProvider,
  ISnapshotDeletionAdapter,
  ISnapshotInventoryAdapter,
} from '../interfaces';
import {
  DynamoDbDurableLogAdapter,
  Ec2SnapshotDeletionAdapter,
  Ec2SnapshotInventoryAdapter,
  EmailNotificationAdapter,
  GlacierColdArchiveAdapter,
  RegionalClientPool,
  SecretsManagerSecretProvider,
  SlackNotificationAdapter,
} from '../providers';

const SecretPayloadSchema = z.object({ password: z.string() });

/**
 * SMTP password from a secret string: the `password` field of a JSON secret,
 * or the whole string when it is not JSON
 */
export function extractPassword(secret: string): string {
  let payload: unknown;
  try {
    payload = JSON.parse(secret);
  } catch {
    return secret;
  }

  const parsed = SecretPayloadSchema.safeParse(payload);
  return parsed.success ? parsed.data.password : '';
}

export type NotificationAdapterConfig =
  | { channel: NotificationChannel.EMAIL; config: EmailConfig }
  | { channel: NotificationChannel.SLACK; config: SlackConfig };

/**
 * Adapter construction used by the Lambda handlers
 */
export interface IAdapterFactory {
  createInventoryAdapter(): ISnapshotInventoryAdapter;
  createDeletionAdapter(): ISnapshotDeletionAdapter;
  createColdArchiveAdapter(aws: AwsResourceConfig): IColdArchiveAdapter;
  createDurableLogAdapter(aws: AwsResourceConfig): IDurableLogAdapter;
  createSecretProvider(aws: AwsResourceConfig): ISecretProvider;
  createNotificationAdapters(
    config: NotificationConfig,
    secrets: ISecretProvider
  ): Promise<INotificationAdapter[]>;
}

export class AdapterFactory implements IAdapterFactory {
  private readonly logger: Logger;
  private readonly ec2Clients = new RegionalClientPool((region) => new EC2Client({ region }));

  constructor(logger: Logger = createLogger()) {
    this.logger = logger;
  }

  createInventoryAdapter(): ISnapshotInventoryAdapter {
    return new Ec2SnapshotInventoryAdapter(this.ec2Clients, this.logger);
  }

  createDeletionAdapter(): ISnapshotDeletionAdapter {
    return new Ec2SnapshotDeletionAdapter(this.ec2Clients, this.logger);
  }

  createColdArchiveAdapter(aws: AwsResourceConfig): IColdArchiveAdapter {
    return new GlacierColdArchiveAdapter({
      vaultName: aws.vaultName,
      vaultRegion: aws.region,
      logger: this.logger,
    });
  }

  createDurableLogAdapter(aws: AwsResourceConfig): IDurableLogAdapter {
    return new DynamoDbDurableLogAdapter({
      tableName: aws.tableName,
      recordTtlDays: aws.recordTtlDays,
      summaryTtlDays: aws.summaryTtlDays,
      logger: this.logger,
    });
  }

  createSecretProvider(aws: AwsResourceConfig): ISecretProvider {
    return new SecretsManagerSecretProvider(new SecretsManagerClient({ region: aws.region }));
  }

  /**
   * Create a notification adapter
   */
  static createNotificationAdapter(
    options: NotificationAdapterConfig,
    logger?: Logger
  ): INotificationAdapter {
    switch (options.channel) {
      case NotificationChannel.EMAIL:
        return new EmailNotificationAdapter(options.config, { logger });
      case NotificationChannel.SLACK:
        return new SlackNotificationAdapter(options.config, { logger });
    }
  }

  /**
   * Notifiers for every configured channel. Email is always included; without
   * credentials it skips delivery.
   */
  async createNotificationAdapters(
    config: NotificationConfig,
    secrets: ISecretProvider
  ): Promise<INotificationAdapter[]> {
    const password = await this.readSmtpPassword(config, secrets);

    const adapters: INotificationAdapter[] = [
      AdapterFactory.createNotificationAdapter(
        {
          channel: NotificationChannel.EMAIL,
          config: {
            fromAddress: config.smtpUser,
            toAddresses: [...config.alertReceivers],
            smtpHost: config.smtpHost,
            smtpPort: config.smtpPort,
            password,
          },
        },
        this.logger
      ),
    ];

    if (config.slackWebhookUrl) {
      adapters.push(
        AdapterFactory.createNotificationAdapter(
          { channel: NotificationChannel.SLACK, config: { webhookUrl: config.slackWebhookUrl } },
          this.logger
        )
      );
    }

    return adapters;
  }

  private async readSmtpPassword(
    config: NotificationConfig,
    secrets: ISecretProvider
  ): Promise<string> {
    if (!config.smtpUser || config.alertReceivers.length === 0) {
      return '';
    }

    try {
      return extractPassword(await secrets.getSecret(config.passwordSecretName));
    } catch (error) {
      this.logger.error('Failed to read SMTP password', {
        secret: config.passwordSecretName,
        error: getErrorMessage(error),
      });
      return '';
    }
  }
}
