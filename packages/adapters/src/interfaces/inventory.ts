/**
 * Abstract interface for snapshot inventory sources
 */
import type { InventorySnapshot, OperationResult } from '@snapshot-steward/shared';

export interface ISnapshotInventoryAdapter {
  /**
   * List every snapshot owned by the account in a region
   */
  listSnapshots(region: string): Promise<OperationResult<{ snapshots: InventorySnapshot[] }>>;
}
