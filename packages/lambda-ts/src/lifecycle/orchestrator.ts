/**
 * Scan orchestrator
 *
 * Walks the configured regions in order, classifies every snapshot, and hands
 * records and the final summary to the durable log and notifiers. Failures of
 * any collaborator are absorbed here and reported in the outcome.
 */
import type {
  InventorySnapshot,
  Logger,
  NotificationChannel,
  RunSummary,
  ScanConfig,
  SnapshotRecord,
} from '@snapshot-steward/shared';
import type {
  IDurableLogAdapter,
  INotificationAdapter,
  ISnapshotInventoryAdapter,
} from '@snapshot-steward/adapters';
import { generateSummary } from './aggregator';
import { attempt, SnapshotClassifier } from './classifier';

export interface ScanDependencies {
  inventory: ISnapshotInventoryAdapter;
  classifier: SnapshotClassifier;
  durableLog: IDurableLogAdapter;
  notifiers: INotificationAdapter[];
  logger: Logger;
  clock?: () => Date;
}

export interface RegionError {
  region: string;
  error: string;
}

export interface PersistenceFailure {
  /** Snapshot id, or `SUMMARY` for the run summary */
  key: string;
  error: string;
}

export interface NotificationResult {
  channel: NotificationChannel;
  sent: boolean;
  error?: string;
}

export interface ScanOutcome {
  summary: RunSummary;
  records: readonly SnapshotRecord[];
  regionErrors: RegionError[];
  persistenceFailures: PersistenceFailure[];
  notificationResults: NotificationResult[];
}

export class ScanOrchestrator {
  private readonly config: ScanConfig;
  private readonly deps: ScanDependencies;
  private readonly clock: () => Date;

  constructor(config: ScanConfig, deps: ScanDependencies) {
    this.config = config;
    this.deps = deps;
    this.clock = deps.clock ?? (() => new Date());
  }

  async run(): Promise<ScanOutcome> {
    const { logger } = this.deps;
    const now = this.clock();
    const records: SnapshotRecord[] = [];
    const regionErrors: RegionError[] = [];
    const persistenceFailures: PersistenceFailure[] = [];

    logger.info('Starting snapshot scan', {
      retentionDays: this.config.retentionDays,
      autoDeleteEnabled: this.config.autoDeleteEnabled,
      coldArchiveEnabled: this.config.coldArchiveEnabled,
      regions: this.config.scanRegions,
    });

    for (const region of this.config.scanRegions) {
      const regionLogger = logger.child({ region });
      const snapshots = await this.listRegion(region, regionErrors, regionLogger);

      for (const snapshot of snapshots) {
        const record = await this.deps.classifier.classify(snapshot, region, now);
        records.push(record);

        const logged = await attempt(() => this.deps.durableLog.logRecord(record));
        if (!logged.success) {
          persistenceFailures.push({ key: record.snapshotId, error: logged.error });
        }
      }

      regionLogger.info('Region scanned', { snapshots: snapshots.length });
    }

    const summary = generateSummary(records, this.config, now);
    logger.info('Scan summary', { ...summary });

    const loggedSummary = await attempt(() => this.deps.durableLog.logSummary(summary));
    if (!loggedSummary.success) {
      persistenceFailures.push({ key: 'SUMMARY', error: loggedSummary.error });
    }

    const notificationResults = await this.notify(summary, records);

    return {
      summary,
      records,
      regionErrors,
      persistenceFailures,
      notificationResults,
    };
  }

  private async listRegion(
    region: string,
    regionErrors: RegionError[],
    log: Logger
  ): Promise<InventorySnapshot[]> {
    const result = await attempt(() => this.deps.inventory.listSnapshots(region));

    if (!result.success) {
      log.error('Region inventory failed, continuing with remaining regions', {
        error: result.error,
      });
      regionErrors.push({ region, error: result.error });
      return [];
    }

    return result.snapshots;
  }

  private async notify(
    summary: RunSummary,
    records: readonly SnapshotRecord[]
  ): Promise<NotificationResult[]> {
    const results: NotificationResult[] = [];

    for (const notifier of this.deps.notifiers) {
      const channel = notifier.getChannel();
      const result = await attempt(() => notifier.sendReport(summary, records));

      if (result.success) {
        results.push({ channel, sent: true });
      } else {
        this.deps.logger.warn('Report not delivered', { channel, error: result.error });
        results.push({ channel, sent: false, error: result.error });
      }
    }

    return results;
  }
}

export function describeOutcome(outcome: ScanOutcome): Record<string, unknown> {
  return {
    totalSnapshots: outcome.summary.totalSnapshots,
    regionErrors: outcome.regionErrors.length,
    persistenceFailures: outcome.persistenceFailures.length,
    notificationsSent: outcome.notificationResults.filter((r) => r.sent).length,
  };
}
