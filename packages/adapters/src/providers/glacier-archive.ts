/**
 * Glacier cold-archive adapter
 *
 * Uploads a JSON metadata document describing the snapshot to a Glacier vault.
 * The snapshot data itself stays in EBS until the deletion policy removes it.
 * The vault lives in one region; snapshots from every scanned region are
 * archived to it and retrieved from it.
 */
import {
  GlacierClient,
  InitiateJobCommand,
  ResourceNotFoundException,
  UploadArchiveCommand,
} from '@aws-sdk/client-glacier';
import {
  createLogger,
  formatTimestamp,
  getErrorMessage,
  type ArchiveReceipt,
  type Logger,
  type OperationResult,
  type RetrievalJob,
} from '@snapshot-steward/shared';
import type { IColdArchiveAdapter } from '../interfaces';

/** Glacier shorthand for the caller's own account */
const CURRENT_ACCOUNT = '-';

export interface GlacierArchiveOptions {
  vaultName: string;
  /** Region holding the vault */
  vaultRegion: string;
  client?: GlacierClient;
  clock?: () => Date;
  logger?: Logger;
}

export interface SnapshotArchiveMetadata {
  snapshot_id: string;
  region: string;
  size_gb: number;
  original_created_at: string;
  archived_at: string;
  type: 'ebs_snapshot_metadata';
}

export class GlacierColdArchiveAdapter implements IColdArchiveAdapter {
  private readonly vaultName: string;
  private readonly vaultRegion: string;
  private readonly client: GlacierClient;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(options: GlacierArchiveOptions) {
    this.vaultName = options.vaultName;
    this.vaultRegion = options.vaultRegion;
    this.client = options.client ?? new GlacierClient({ region: options.vaultRegion });
    this.clock = options.clock ?? (() => new Date());
    this.logger = (options.logger ?? createLogger()).child({ adapter: 'glacier-archive' });
  }

  async archive(
    snapshotId: string,
    region: string,
    sizeGiB: number,
    createdAt: Date
  ): Promise<OperationResult<ArchiveReceipt>> {
    const metadata: SnapshotArchiveMetadata = {
      snapshot_id: snapshotId,
      region,
      size_gb: sizeGiB,
      original_created_at: formatTimestamp(createdAt),
      archived_at: formatTimestamp(this.clock()),
      type: 'ebs_snapshot_metadata',
    };

    try {
      const response = await this.client.send(
        new UploadArchiveCommand({
          accountId: CURRENT_ACCOUNT,
          vaultName: this.vaultName,
          archiveDescription: describeArchive(snapshotId, sizeGiB, createdAt),
          body: JSON.stringify(metadata),
        })
      );

      if (!response.archiveId) {
        return { success: false, error: 'Glacier returned no archive id' };
      }

      this.logger.info('Archived snapshot metadata', {
        snapshotId,
        region,
        archiveId: response.archiveId,
      });
      return { success: true, archiveId: response.archiveId, vault: this.vaultName };
    } catch (error) {
      if (error instanceof ResourceNotFoundException) {
        this.logger.warn('Glacier vault not found, skipping archival', {
          vault: this.vaultName,
          snapshotId,
        });
        return { success: false, error: 'Vault not found' };
      }

      this.logger.error('Failed to archive snapshot', {
        snapshotId,
        region,
        error: getErrorMessage(error),
      });
      return { success: false, error: getErrorMessage(error) };
    }
  }

  async retrieve(archiveId: string): Promise<OperationResult<RetrievalJob>> {
    try {
      const response = await this.client.send(
        new InitiateJobCommand({
          accountId: CURRENT_ACCOUNT,
          vaultName: this.vaultName,
          jobParameters: {
            Type: 'archive-retrieval',
            ArchiveId: archiveId,
            Tier: 'Bulk',
          },
        })
      );

      if (!response.jobId) {
        return { success: false, error: 'Glacier returned no job id' };
      }

      this.logger.info('Initiated archive retrieval', { archiveId, jobId: response.jobId });
      return {
        success: true,
        jobId: response.jobId,
        archiveId,
        vault: this.vaultName,
        region: this.vaultRegion,
      };
    } catch (error) {
      this.logger.error('Failed to initiate archive retrieval', {
        archiveId,
        vaultRegion: this.vaultRegion,
        error: getErrorMessage(error),
      });
      return { success: false, error: getErrorMessage(error) };
    }
  }
}

export function describeArchive(snapshotId: string, sizeGiB: number, createdAt: Date): string {
  return `EBS Snapshot ${snapshotId} - ${sizeGiB}GB - ${formatTimestamp(createdAt).slice(0, 10)}`;
}
