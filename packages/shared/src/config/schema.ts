/**
 * Configuration schema and validation using Zod
 */
import { z } from 'zod';
import { getErrorMessage } from '../utils/helpers';
import { LogLevel } from '../utils/logger';

export const DEFAULT_REGION = 'us-east-1';
export const DEFAULT_SMTP_PORT = 587;

/**
 * Retention policy and scan scope
 */
export const ScanConfigSchema = z.object({
  retentionDays: z.number().int().nonnegative().default(90),
  autoDeleteEnabled: z.boolean().default(false),
  coldArchiveEnabled: z.boolean().default(false),
  scanRegions: z.array(z.string().min(1)).min(1).default([DEFAULT_REGION]),
  costPerGbMonth: z.number().nonnegative().default(0.05),
});

export type ScanConfig = Readonly<z.infer<typeof ScanConfigSchema>>;

/**
 * AWS resources used by the adapters
 */
export const AwsResourceConfigSchema = z.object({
  region: z.string().default(DEFAULT_REGION),
  tableName: z.string().min(1).default('snapshot-steward-reports'),
  vaultName: z.string().min(1).default('snapshot-steward-archive'),
  recordTtlDays: z.number().int().positive().default(30),
  summaryTtlDays: z.number().int().positive().default(90),
});

export type AwsResourceConfig = Readonly<z.infer<typeof AwsResourceConfigSchema>>;

/**
 * Report delivery configuration. Addresses and the webhook URL are checked by
 * the notifiers themselves, which skip delivery when they are unusable.
 */
export const NotificationConfigSchema = z.object({
  smtpUser: z.string().optional(),
  alertReceivers: z.array(z.string()).default([]),
  passwordSecretName: z.string().min(1).default('snapshot-steward/smtp-password'),
  smtpHost: z.string().min(1).default('smtp.gmail.com'),
  smtpPort: z.number().int().positive().catch(DEFAULT_SMTP_PORT),
  slackWebhookUrl: z.string().optional(),
});

export type NotificationConfig = Readonly<z.infer<typeof NotificationConfigSchema>>;

/**
 * Main application configuration schema
 */
export const AppConfigSchema = z.object({
  logLevel: z.nativeEnum(LogLevel).default(LogLevel.INFO),
  scan: ScanConfigSchema,
  aws: AwsResourceConfigSchema,
  notifications: NotificationConfigSchema,
});

export type AppConfig = Readonly<z.infer<typeof AppConfigSchema>>;

/**
 * Validate configuration
 */
export function validateConfig(config: unknown): AppConfig {
  const parsed = AppConfigSchema.parse(config);
  Object.freeze(parsed.scan.scanRegions);
  Object.freeze(parsed.notifications.alertReceivers);
  Object.freeze(parsed.scan);
  Object.freeze(parsed.aws);
  Object.freeze(parsed.notifications);
  return Object.freeze(parsed);
}

function blankToUndefined(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/** First non-blank value among a variable and its legacy aliases */
function firstSet(...values: Array<string | undefined>): string | undefined {
  return values.map(blankToUndefined).find((value) => value !== undefined);
}

function parseNumber(value: string | undefined): number | undefined {
  const raw = blankToUndefined(value);
  return raw === undefined ? undefined : Number(raw);
}

function parseFlag(value: string | undefined): boolean | undefined {
  const raw = blankToUndefined(value);
  return raw === undefined ? undefined : raw.toLowerCase() === 'true';
}

function parseList(value: string | undefined): string[] | undefined {
  const items = (value ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : undefined;
}

/**
 * Load configuration from environment variables. `ENABLE_GLACIER_ARCHIVE`,
 * `EBS_SNAPSHOT_COST_PER_GB`, `GMAIL_USER` and `GMAIL_PASSWORD_SECRET` are
 * accepted as older names of their counterparts.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return validateConfig({
    logLevel: blankToUndefined(env.LOG_LEVEL)?.toUpperCase(),
    scan: {
      retentionDays: parseNumber(env.RETENTION_DAYS),
      autoDeleteEnabled: parseFlag(env.ENABLE_AUTO_DELETE),
      coldArchiveEnabled: parseFlag(
        firstSet(env.ENABLE_COLD_ARCHIVE, env.ENABLE_GLACIER_ARCHIVE)
      ),
      scanRegions: parseList(env.SCAN_REGIONS),
      costPerGbMonth: parseNumber(
        firstSet(env.SNAPSHOT_COST_PER_GB, env.EBS_SNAPSHOT_COST_PER_GB)
      ),
    },
    aws: {
      region: blankToUndefined(env.AWS_REGION),
      tableName: blankToUndefined(env.DYNAMODB_TABLE_NAME),
      vaultName: blankToUndefined(env.GLACIER_VAULT_NAME),
      recordTtlDays: parseNumber(env.RECORD_TTL_DAYS),
      summaryTtlDays: parseNumber(env.SUMMARY_TTL_DAYS),
    },
    notifications: {
      smtpUser: firstSet(env.SMTP_USER, env.GMAIL_USER),
      alertReceivers: parseList(env.ALERT_RECEIVER),
      passwordSecretName: firstSet(env.SMTP_PASSWORD_SECRET, env.GMAIL_PASSWORD_SECRET),
      smtpHost: blankToUndefined(env.SMTP_HOST),
      smtpPort: parseNumber(env.SMTP_PORT),
      slackWebhookUrl: blankToUndefined(env.SLACK_WEBHOOK_URL),
    },
  });
}

/**
 * One-line message for a thrown error, flattening zod validation issues
 */
export function formatConfigError(error: unknown): string {
  if (error instanceof z.ZodError) {
    const issues = error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    return `Invalid configuration: ${issues}`;
  }
  return getErrorMessage(error);
}
