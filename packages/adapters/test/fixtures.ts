import {
  SnapshotAction,
  SnapshotStatus,
  type RunSummary,
  type SnapshotRecord,
} from '@snapshot-steward/shared';

export function buildSummary(overrides: Partial<RunSummary> = {}): RunSummary {
  return {
    scanDate: '2026-06-01T06:00:00.000Z',
    retentionDays: 90,
    regionsScanned: ['us-east-1'],
    totalSnapshots: 2,
    oldSnapshotsCount: 1,
    deletedCount: 0,
    archivedCount: 0,
    totalEstimatedCostUsd: 5.4,
    oldSnapshotsCostUsd: 5,
    estimatedSavingsUsd: 0,
    autoDeleteEnabled: false,
    coldArchiveEnabled: false,
    ...overrides,
  };
}

export function buildRecord(overrides: Partial<SnapshotRecord> = {}): SnapshotRecord {
  return {
    snapshotId: 'snap-1',
    volumeId: 'vol-1',
    region: 'us-east-1',
    createdAt: '2026-01-01T00:00:00.000Z',
    ageDays: 151,
    sizeGiB: 100,
    description: '',
    estimatedCost: 5,
    status: SnapshotStatus.ACTIVE,
    actionTaken: SnapshotAction.NONE,
    processedAt: '2026-06-01T06:00:00.000Z',
    ...overrides,
  };
}
