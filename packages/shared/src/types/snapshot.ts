/**
 * Core types for the Snapshot Steward lifecycle system
 */

/**
 * Lifecycle status of a scanned snapshot
 */
export enum SnapshotStatus {
  ACTIVE = 'ACTIVE',
  ARCHIVED = 'ARCHIVED',
  DELETED = 'DELETED',
}

/**
 * Action taken on a snapshot during a scan
 */
export enum SnapshotAction {
  NONE = 'NONE',
  ARCHIVED_TO_COLD_STORE = 'ARCHIVED_TO_COLD_STORE',
  DELETED = 'DELETED',
}

/**
 * Volume id recorded when the inventory does not report one
 */
export const UNKNOWN_VOLUME_ID = 'N/A';

/**
 * Snapshot as reported by the inventory source
 */
export interface InventorySnapshot {
  snapshotId: string;
  volumeId?: string;
  createdAt: Date;
  sizeGiB: number;
  description?: string;
}

/**
 * Classified snapshot, produced once per inventory item per run
 */
export type SnapshotRecord = Readonly<{
  snapshotId: string;
  volumeId: string;
  region: string;
  createdAt: string;
  ageDays: number;
  sizeGiB: number;
  description: string;
  estimatedCost: number;
  status: SnapshotStatus;
  actionTaken: SnapshotAction;
  /** Cold-archive id, present only when the upload succeeded */
  archiveId?: string;
  processedAt: string;
}>;

/**
 * Aggregated statistics for one scan
 */
export type RunSummary = Readonly<{
  scanDate: string;
  retentionDays: number;
  regionsScanned: readonly string[];
  totalSnapshots: number;
  oldSnapshotsCount: number;
  deletedCount: number;
  archivedCount: number;
  totalEstimatedCostUsd: number;
  oldSnapshotsCostUsd: number;
  estimatedSavingsUsd: number;
  autoDeleteEnabled: boolean;
  coldArchiveEnabled: boolean;
}>;

/**
 * Summary as serialized in responses, logs and reports
 */
export interface RunSummaryPayload {
  scan_date: string;
  retention_policy_days: number;
  regions_scanned: string[];
  total_snapshots: number;
  old_snapshots_count: number;
  deleted_count: number;
  archived_count: number;
  total_estimated_cost_usd: number;
  old_snapshots_cost_usd: number;
  estimated_savings_usd: number;
  auto_delete_enabled: boolean;
  cold_archive_enabled: boolean;
}

export function toSummaryPayload(summary: RunSummary): RunSummaryPayload {
  return {
    scan_date: summary.scanDate,
    retention_policy_days: summary.retentionDays,
    regions_scanned: [...summary.regionsScanned],
    total_snapshots: summary.totalSnapshots,
    old_snapshots_count: summary.oldSnapshotsCount,
    deleted_count: summary.deletedCount,
    archived_count: summary.archivedCount,
    total_estimated_cost_usd: summary.totalEstimatedCostUsd,
    old_snapshots_cost_usd: summary.oldSnapshotsCostUsd,
    estimated_savings_usd: summary.estimatedSavingsUsd,
    auto_delete_enabled: summary.autoDeleteEnabled,
    cold_archive_enabled: summary.coldArchiveEnabled,
  };
}
