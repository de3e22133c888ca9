/**
 * Lambda handler Tests
 */

import { describe, it, expect } from 'vitest';
import {
  createLogger,
  LogLevel,
  loadConfigFromEnv,
  NotificationChannel,
  SnapshotAction,
  SnapshotStatus,
  type AppConfig,
  type NotificationConfig,
  type RunSummaryPayload,
  type SnapshotRecord,
} from '@snapshot-steward/shared';
import {
  AdapterFactory,
  EmailNotificationAdapter,
  type INotificationAdapter,
  type ISecretProvider,
} from '@snapshot-steward/adapters';
import {
  createListExpiredSnapshotsHandler,
  createRetrieveArchiveHandler,
  createScanHandler,
} from '../src/handlers';
import {
  FakeAdapterFactory,
  FakeArchiver,
  FakeDeleter,
  FakeDurableLog,
  FakeInventory,
  FakeNotifier,
  inventorySnapshot,
  NOW,
  quietLogger,
  type FakeAdapters,
} from './fakes';

function configFrom(env: NodeJS.ProcessEnv): AppConfig {
  return loadConfigFromEnv({ LOG_LEVEL: 'ERROR', ...env });
}

function runtimeFor(env: NodeJS.ProcessEnv, adapters: Partial<FakeAdapters>) {
  const factory = new FakeAdapterFactory(adapters);
  return {
    factory,
    runtime: {
      loadConfig: () => configFrom(env),
      createFactory: () => factory,
      clock: () => NOW,
    },
  };
}

class ConfiguredNotifiersFactory extends FakeAdapterFactory {
  readonly notifiers: INotificationAdapter[] = [];

  async createNotificationAdapters(
    config: NotificationConfig,
    secrets: ISecretProvider
  ): Promise<INotificationAdapter[]> {
    const created = await new AdapterFactory(quietLogger).createNotificationAdapters(config, secrets);
    this.notifiers.push(...created);
    return created;
  }
}

function parseSummary(body: string): RunSummaryPayload {
  return JSON.parse(body);
}

describe('scan handler', () => {
  it('should report a young snapshot as not old', async () => {
    const { runtime } = runtimeFor(
      { RETENTION_DAYS: '90' },
      { inventory: new FakeInventory({ 'us-east-1': [inventorySnapshot('snap-1', 10)] }) }
    );

    const response = await createScanHandler(runtime)();

    expect(response.statusCode).toBe(200);
    const summary = parseSummary(response.body);
    expect(summary.total_snapshots).toBe(1);
    expect(summary.old_snapshots_count).toBe(0);
  });

  it('should delete an expired snapshot and report the savings', async () => {
    const durableLog = new FakeDurableLog();
    const deleter = new FakeDeleter();
    const { runtime } = runtimeFor(
      { RETENTION_DAYS: '90', ENABLE_AUTO_DELETE: 'true', SNAPSHOT_COST_PER_GB: '0.05' },
      {
        inventory: new FakeInventory({ 'us-east-1': [inventorySnapshot('snap-1', 120, 100)] }),
        deleter,
        durableLog,
      }
    );

    const response = await createScanHandler(runtime)();

    expect(response.statusCode).toBe(200);
    const summary = parseSummary(response.body);
    expect(summary.deleted_count).toBe(1);
    expect(summary.estimated_savings_usd).toBe(5);
    expect(summary.auto_delete_enabled).toBe(true);
    expect(deleter.calls).toEqual(['snap-1']);
    expect(durableLog.records[0].status).toBe(SnapshotStatus.DELETED);
    expect(durableLog.records[0].estimatedCost).toBe(5);
  });

  it('should return a partial summary when a region fails', async () => {
    const { runtime } = runtimeFor(
      { SCAN_REGIONS: 'us-east-1,eu-west-1' },
      {
        inventory: new FakeInventory({
          'us-east-1': new Error('UnauthorizedOperation'),
          'eu-west-1': [inventorySnapshot('snap-2', 5), inventorySnapshot('snap-3', 6)],
        }),
      }
    );

    const response = await createScanHandler(runtime)();

    expect(response.statusCode).toBe(200);
    const summary = parseSummary(response.body);
    expect(summary.total_snapshots).toBe(2);
    expect(summary.regions_scanned).toEqual(['us-east-1', 'eu-west-1']);
  });

  it('should succeed when the email notifier has no credentials', async () => {
    const email = new EmailNotificationAdapter(
      { toAddresses: [], smtpHost: 'smtp.example.com', smtpPort: 587, password: '' },
      { logger: createLogger({}, LogLevel.ERROR) }
    );
    const slack = new FakeNotifier(NotificationChannel.SLACK);
    const { runtime } = runtimeFor(
      {},
      {
        inventory: new FakeInventory({ 'us-east-1': [inventorySnapshot('snap-1', 10)] }),
        notifiers: [email, slack],
      }
    );

    const response = await createScanHandler(runtime)();

    expect(response.statusCode).toBe(200);
    expect(slack.reports).toHaveLength(1);
  });

  it('should complete the scan when receivers and webhook are malformed', async () => {
    const inventory = new FakeInventory({ 'us-east-1': [inventorySnapshot('snap-1', 10)] });
    const factory = new ConfiguredNotifiersFactory({ inventory });
    const handler = createScanHandler({
      loadConfig: () =>
        configFrom({
          SMTP_USER: 'reports@example.com',
          ALERT_RECEIVER: 'ops-team',
          SLACK_WEBHOOK_URL: 'hooks.slack/x',
        }),
      createFactory: () => factory,
      clock: () => NOW,
    });

    const response = await handler();

    expect(response.statusCode).toBe(200);
    expect(parseSummary(response.body).total_snapshots).toBe(1);
    expect(inventory.calls).toEqual(['us-east-1']);
    expect(factory.notifiers.map((notifier) => notifier.getChannel())).toEqual([
      NotificationChannel.EMAIL,
      NotificationChannel.SLACK,
    ]);
    const [email] = factory.notifiers;
    expect(email).toBeInstanceOf(EmailNotificationAdapter);
    if (email instanceof EmailNotificationAdapter) {
      expect(email.isConfigured()).toBe(false);
    }
  });

  it('should only create the archiver when cold archive is enabled', async () => {
    const disabled = runtimeFor({}, {});
    await createScanHandler(disabled.runtime)();
    expect(disabled.factory.archiveConfigs).toHaveLength(0);

    const enabled = runtimeFor({ ENABLE_COLD_ARCHIVE: 'true' }, {});
    await createScanHandler(enabled.runtime)();
    expect(enabled.factory.archiveConfigs).toHaveLength(1);
  });

  it('should return 500 for invalid configuration', async () => {
    const { runtime } = runtimeFor({ RETENTION_DAYS: 'forever' }, {});

    const response = await createScanHandler(runtime)();

    expect(response.statusCode).toBe(500);
    expect(JSON.parse(response.body)).toEqual({
      error: 'Invalid configuration: scan.retentionDays: Expected number, received nan',
    });
  });
});

describe('retrieve archive handler', () => {
  it('should start a retrieval job and report the vault it runs in', async () => {
    const archiver = new FakeArchiver();
    const { runtime } = runtimeFor({ AWS_REGION: 'us-west-2' }, { archiver });

    const response = await createRetrieveArchiveHandler(runtime)({ archiveId: 'archive-1' });

    expect(response.statusCode).toBe(202);
    expect(JSON.parse(response.body)).toEqual({
      job_id: 'job-1',
      archive_id: 'archive-1',
      vault: 'test-vault',
      region: 'us-west-2',
    });
    expect(archiver.retrievals).toEqual(['archive-1']);
  });

  it('should reject an event without an archive id', async () => {
    const { runtime } = runtimeFor({}, {});

    const response = await createRetrieveArchiveHandler(runtime)({});

    expect(response.statusCode).toBe(400);
  });

  it('should return 502 when the job cannot be started', async () => {
    const { runtime } = runtimeFor({}, { archiver: new FakeArchiver('fail') });

    const response = await createRetrieveArchiveHandler(runtime)({ archiveId: 'archive-1' });

    expect(response.statusCode).toBe(502);
    expect(JSON.parse(response.body)).toEqual({ error: 'Vault not found' });
  });

  it('should return 500 when the archiver throws', async () => {
    const { runtime } = runtimeFor({}, { archiver: new FakeArchiver('throw') });

    const response = await createRetrieveArchiveHandler(runtime)({ archiveId: 'archive-1' });

    expect(response.statusCode).toBe(500);
    expect(JSON.parse(response.body)).toEqual({ error: 'retrieve exploded' });
  });
});

describe('list expired snapshots handler', () => {
  const stored: SnapshotRecord[] = [30, 100, 200].map((ageDays) => ({
    snapshotId: `snap-${ageDays}`,
    volumeId: 'vol-1',
    region: 'us-east-1',
    createdAt: '2026-01-01T00:00:00.000Z',
    ageDays,
    sizeGiB: 10,
    description: '',
    estimatedCost: 0.5,
    status: SnapshotStatus.ACTIVE,
    actionTaken: SnapshotAction.NONE,
    processedAt: NOW.toISOString(),
  }));

  it('should default to the retention period', async () => {
    const durableLog = new FakeDurableLog('succeed', stored);
    const { runtime } = runtimeFor({ RETENTION_DAYS: '90' }, { durableLog });

    const response = await createListExpiredSnapshotsHandler(runtime)();

    expect(response.statusCode).toBe(200);
    const body = JSON.parse(response.body);
    expect(body.days).toBe(90);
    expect(body.count).toBe(2);
    expect(durableLog.queries).toEqual([90]);
  });

  it('should honour the requested number of days', async () => {
    const durableLog = new FakeDurableLog('succeed', stored);
    const { runtime } = runtimeFor({}, { durableLog });

    const response = await createListExpiredSnapshotsHandler(runtime)({ days: 150 });

    expect(JSON.parse(response.body)).toMatchObject({ days: 150, count: 1 });
  });

  it('should reject a negative number of days', async () => {
    const { runtime } = runtimeFor({}, {});

    const response = await createListExpiredSnapshotsHandler(runtime)({ days: -1 });

    expect(response.statusCode).toBe(400);
  });

  it('should return 502 when the log cannot be read', async () => {
    const { runtime } = runtimeFor({}, { durableLog: new FakeDurableLog('fail') });

    const response = await createListExpiredSnapshotsHandler(runtime)();

    expect(response.statusCode).toBe(502);
    expect(JSON.parse(response.body)).toEqual({ error: 'table unavailable' });
  });
});
