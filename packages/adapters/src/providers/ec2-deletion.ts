/**
 * EC2 snapshot deletion adapter
 */
import { DeleteSnapshotCommand, EC2Client } from '@aws-sdk/client-ec2';
import {
  createLogger,
  getErrorMessage,
  type Logger,
  type OperationResult,
} from '@snapshot-steward/shared';
import type { ISnapshotDeletionAdapter } from '../interfaces';
import { RegionalClientPool } from './regional-client-pool';

const NOT_FOUND_CODE = 'InvalidSnapshot.NotFound';

export class Ec2SnapshotDeletionAdapter implements ISnapshotDeletionAdapter {
  private readonly clients: RegionalClientPool<EC2Client>;
  private readonly logger: Logger;

  constructor(clients?: RegionalClientPool<EC2Client>, logger: Logger = createLogger()) {
    this.clients = clients ?? new RegionalClientPool((region) => new EC2Client({ region }));
    this.logger = logger.child({ adapter: 'ec2-deletion' });
  }

  async delete(snapshotId: string, region: string): Promise<OperationResult> {
    try {
      await this.clients.get(region).send(new DeleteSnapshotCommand({ SnapshotId: snapshotId }));
    } catch (error) {
      if (error instanceof Error && error.name === NOT_FOUND_CODE) {
        this.logger.warn('Snapshot already gone', { snapshotId, region });
        return { success: false, error: `Snapshot ${snapshotId} not found` };
      }

      this.logger.error('Failed to delete snapshot', {
        snapshotId,
        region,
        error: getErrorMessage(error),
      });
      return { success: false, error: getErrorMessage(error) };
    }

    this.logger.info('Deleted snapshot', { snapshotId, region });
    return { success: true };
  }
}
