/**
 * Abstract interface for snapshot deletion
 */
import type { OperationResult } from '@snapshot-steward/shared';

export interface ISnapshotDeletionAdapter {
  /**
   * Delete a snapshot. A snapshot that no longer exists is a failed result.
   */
  delete(snapshotId: string, region: string): Promise<OperationResult>;
}
