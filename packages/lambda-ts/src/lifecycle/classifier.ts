/**
 * Snapshot classifier / action engine
 *
 * Turns one inventory item into an immutable SnapshotRecord. Snapshots older
 * than the retention period are archived and/or deleted according to policy.
 * When both actions are enabled, both are attempted and a successful delete
 * overrides the archived status.
 */
import {
  calculateAgeDays,
  estimateMonthlyCost,
  formatTimestamp,
  getErrorMessage,
  roundCurrency,
  SnapshotAction,
  SnapshotStatus,
  UNKNOWN_VOLUME_ID,
  type InventorySnapshot,
  type Logger,
  type OperationResult,
  type ScanConfig,
  type SnapshotRecord,
} from '@snapshot-steward/shared';
import type { IColdArchiveAdapter, ISnapshotDeletionAdapter } from '@snapshot-steward/adapters';

export type RetentionPolicy = Pick<
  ScanConfig,
  'retentionDays' | 'autoDeleteEnabled' | 'coldArchiveEnabled' | 'costPerGbMonth'
>;

export interface ClassifierDependencies {
  deleter: ISnapshotDeletionAdapter;
  /** Required only when cold archive is enabled */
  archiver?: IColdArchiveAdapter;
  logger: Logger;
  clock?: () => Date;
}

interface Outcome {
  status: SnapshotStatus;
  actionTaken: SnapshotAction;
  archiveId?: string;
}

export class SnapshotClassifier {
  private readonly policy: RetentionPolicy;
  private readonly deps: ClassifierDependencies;
  private readonly clock: () => Date;

  constructor(policy: RetentionPolicy, deps: ClassifierDependencies) {
    if (policy.coldArchiveEnabled && !deps.archiver) {
      throw new Error('Cold archive is enabled but no archive adapter was provided');
    }
    this.policy = policy;
    this.deps = deps;
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Whether a snapshot of this age is past retention
   */
  isExpired(ageDays: number): boolean {
    return ageDays > this.policy.retentionDays;
  }

  /**
   * Classify one snapshot. `now` is the run-scoped instant used for the age.
   */
  async classify(snapshot: InventorySnapshot, region: string, now: Date): Promise<SnapshotRecord> {
    const ageDays = calculateAgeDays(snapshot.createdAt, now);
    const outcome = this.isExpired(ageDays)
      ? await this.applyPolicy(snapshot, region)
      : { status: SnapshotStatus.ACTIVE, actionTaken: SnapshotAction.NONE };

    return Object.freeze({
      snapshotId: snapshot.snapshotId,
      volumeId: snapshot.volumeId || UNKNOWN_VOLUME_ID,
      region,
      createdAt: formatTimestamp(snapshot.createdAt),
      ageDays,
      sizeGiB: snapshot.sizeGiB,
      description: snapshot.description ?? '',
      estimatedCost: roundCurrency(estimateMonthlyCost(snapshot.sizeGiB, this.policy.costPerGbMonth)),
      ...outcome,
      processedAt: formatTimestamp(this.clock()),
    });
  }

  private async applyPolicy(snapshot: InventorySnapshot, region: string): Promise<Outcome> {
    const log = this.deps.logger.child({ snapshotId: snapshot.snapshotId, region });
    let outcome: Outcome = { status: SnapshotStatus.ACTIVE, actionTaken: SnapshotAction.NONE };

    if (this.policy.coldArchiveEnabled && this.deps.archiver) {
      const archiver = this.deps.archiver;
      const result = await attempt(() =>
        archiver.archive(snapshot.snapshotId, region, snapshot.sizeGiB, snapshot.createdAt)
      );

      if (result.success) {
        outcome = {
          status: SnapshotStatus.ARCHIVED,
          actionTaken: SnapshotAction.ARCHIVED_TO_COLD_STORE,
          archiveId: result.archiveId,
        };
      } else {
        log.warn('Archive failed, snapshot left active', { error: result.error });
      }
    }

    if (this.policy.autoDeleteEnabled) {
      const result = await attempt(() => this.deps.deleter.delete(snapshot.snapshotId, region));

      if (result.success) {
        outcome = {
          ...outcome,
          status: SnapshotStatus.DELETED,
          actionTaken: SnapshotAction.DELETED,
        };
      } else {
        log.warn('Delete failed, keeping previous outcome', {
          error: result.error,
          status: outcome.status,
        });
      }
    }

    return outcome;
  }
}

/**
 * Run a collaborator call, turning a thrown error into a failed result
 */
export async function attempt<T extends object>(
  call: () => Promise<OperationResult<T>>
): Promise<OperationResult<T>> {
  try {
    return await call();
  } catch (error) {
    return { success: false, error: getErrorMessage(error) };
  }
}
