/**
 * Abstract interface for notification providers
 */
import type {
  NotificationChannel,
  OperationResult,
  RunSummary,
  SnapshotRecord,
} from '@snapshot-steward/shared';

export interface INotificationAdapter {
  /**
   * Get the channel this adapter supports
   */
  getChannel(): NotificationChannel;

  /**
   * Send the scan report. Missing or unusable configuration gives a failed
   * result without contacting the channel.
   */
  sendReport(summary: RunSummary, records: readonly SnapshotRecord[]): Promise<OperationResult>;
}
