/**
 * Notification types and interfaces
 */

/**
 * Notification channel types
 */
export enum NotificationChannel {
  SLACK = 'SLACK',
  EMAIL = 'EMAIL',
}

/**
 * Slack notification configuration
 */
export interface SlackConfig {
  /** Unvalidated; the Slack notifier skips delivery when it is not an http(s) URL */
  webhookUrl: string;
}

/**
 * Email (SMTP) notification configuration
 */
export interface EmailConfig {
  fromAddress?: string;
  /** Malformed addresses are dropped by the email notifier */
  toAddresses: string[];
  smtpHost: string;
  smtpPort: number;
  /** Empty when the secret could not be read */
  password: string;
}
