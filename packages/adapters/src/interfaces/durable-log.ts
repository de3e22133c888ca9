/**
 * Abstract interface for the durable scan log
 */
import type { OperationResult, RunSummary, SnapshotRecord } from '@snapshot-steward/shared';

export interface IDurableLogAdapter {
  /**
   * Persist one classified snapshot
   */
  logRecord(record: SnapshotRecord): Promise<OperationResult>;

  /**
   * Persist the summary of a scan
   */
  logSummary(summary: RunSummary): Promise<OperationResult>;

  /**
   * Logged snapshots older than the given number of days
   */
  queryOldSnapshots(days: number): Promise<OperationResult<{ records: SnapshotRecord[] }>>;
}
