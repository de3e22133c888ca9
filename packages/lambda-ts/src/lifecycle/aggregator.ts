/**
 * Run aggregator: folds classified records into a RunSummary
 */
import {
  formatTimestamp,
  roundCurrency,
  SnapshotStatus,
  sumCurrency,
  type RunSummary,
  type ScanConfig,
  type SnapshotRecord,
} from '@snapshot-steward/shared';

export function generateSummary(
  records: readonly SnapshotRecord[],
  config: ScanConfig,
  scanDate: Date
): RunSummary {
  const old = records.filter((r) => r.ageDays > config.retentionDays);
  const deleted = records.filter((r) => r.status === SnapshotStatus.DELETED);
  const archived = records.filter((r) => r.status === SnapshotStatus.ARCHIVED);

  const costOf = (subset: readonly SnapshotRecord[]) =>
    roundCurrency(sumCurrency(subset.map((r) => r.estimatedCost)));

  return Object.freeze({
    scanDate: formatTimestamp(scanDate),
    retentionDays: config.retentionDays,
    regionsScanned: Object.freeze([...config.scanRegions]),
    totalSnapshots: records.length,
    oldSnapshotsCount: old.length,
    deletedCount: deleted.length,
    archivedCount: archived.length,
    totalEstimatedCostUsd: costOf(records),
    oldSnapshotsCostUsd: costOf(old),
    estimatedSavingsUsd: costOf(deleted),
    autoDeleteEnabled: config.autoDeleteEnabled,
    coldArchiveEnabled: config.coldArchiveEnabled,
  });
}
