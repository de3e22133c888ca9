/**
 * Abstract interface for cold-archive storage
 */
import type { ArchiveReceipt, OperationResult, RetrievalJob } from '@snapshot-steward/shared';

export interface IColdArchiveAdapter {
  /**
   * Archive snapshot metadata to the cold store
   */
  archive(
    snapshotId: string,
    region: string,
    sizeGiB: number,
    createdAt: Date
  ): Promise<OperationResult<ArchiveReceipt>>;

  /**
   * Start a retrieval job for an archive in the adapter's vault. Completion is
   * not awaited.
   */
  retrieve(archiveId: string): Promise<OperationResult<RetrievalJob>>;
}
