/**
 * EC2 snapshot inventory adapter
 */
import { EC2Client, paginateDescribeSnapshots, type Snapshot } from '@aws-sdk/client-ec2';
import {
  createLogger,
  getErrorMessage,
  type InventorySnapshot,
  type Logger,
  type OperationResult,
} from '@snapshot-steward/shared';
import type { ISnapshotInventoryAdapter } from '../interfaces';
import { RegionalClientPool } from './regional-client-pool';

const PAGE_SIZE = 1000;

export class Ec2SnapshotInventoryAdapter implements ISnapshotInventoryAdapter {
  private readonly clients: RegionalClientPool<EC2Client>;
  private readonly logger: Logger;

  constructor(clients?: RegionalClientPool<EC2Client>, logger: Logger = createLogger()) {
    this.clients = clients ?? new RegionalClientPool((region) => new EC2Client({ region }));
    this.logger = logger.child({ adapter: 'ec2-inventory' });
  }

  async listSnapshots(region: string): Promise<OperationResult<{ snapshots: InventorySnapshot[] }>> {
    const snapshots: InventorySnapshot[] = [];

    try {
      const pages = paginateDescribeSnapshots(
        { client: this.clients.get(region), pageSize: PAGE_SIZE },
        { OwnerIds: ['self'] }
      );

      for await (const page of pages) {
        for (const snapshot of page.Snapshots ?? []) {
          const parsed = this.parseSnapshot(snapshot);
          if (parsed) {
            snapshots.push(parsed);
          } else {
            this.logger.warn('Skipping snapshot without id or start time', {
              region,
              snapshotId: snapshot.SnapshotId,
            });
          }
        }
      }
    } catch (error) {
      this.logger.error('Failed to list snapshots', { region, error: getErrorMessage(error) });
      return { success: false, error: getErrorMessage(error) };
    }

    this.logger.info('Listed snapshots', { region, count: snapshots.length });
    return { success: true, snapshots };
  }

  private parseSnapshot(snapshot: Snapshot): InventorySnapshot | null {
    if (!snapshot.SnapshotId || !snapshot.StartTime) {
      return null;
    }

    return {
      snapshotId: snapshot.SnapshotId,
      volumeId: snapshot.VolumeId,
      createdAt: snapshot.StartTime,
      sizeGiB: snapshot.VolumeSize ?? 0,
      description: snapshot.Description,
    };
  }
}
