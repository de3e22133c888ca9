/**
 * DynamoDB durable log adapter
 *
 * Snapshot entries and scan summaries share one table keyed by
 * (SnapshotId, ProcessedAt). Entries expire through the `TTL` attribute.
 */
import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient, PutCommand, ScanCommand } from '@aws-sdk/lib-dynamodb';
import { UTCDate } from '@date-fns/utc';
import { format } from 'date-fns';
import { z } from 'zod';
import {
  createLogger,
  formatTimestamp,
  getErrorMessage,
  SnapshotAction,
  SnapshotStatus,
  toSummaryPayload,
  ttlAfterDays,
  UNKNOWN_VOLUME_ID,
  type Logger,
  type OperationResult,
  type RunSummary,
  type SnapshotRecord,
} from '@snapshot-steward/shared';
import type { IDurableLogAdapter } from '../interfaces';

export enum RecordType {
  SNAPSHOT = 'SNAPSHOT',
  SUMMARY = 'SUMMARY',
}

export interface DynamoDbLogOptions {
  tableName: string;
  recordTtlDays?: number;
  summaryTtlDays?: number;
  client?: DynamoDBDocumentClient;
  clock?: () => Date;
  logger?: Logger;
}

const SnapshotItemSchema = z.object({
  SnapshotId: z.string(),
  VolumeId: z.string().default(UNKNOWN_VOLUME_ID),
  Region: z.string(),
  CreatedAt: z.string(),
  AgeDays: z.number().int().nonnegative(),
  SizeGB: z.number().nonnegative(),
  Description: z.string().default(''),
  Status: z.nativeEnum(SnapshotStatus),
  ActionTaken: z.nativeEnum(SnapshotAction),
  EstimatedCost: z.number(),
  ProcessedAt: z.string(),
  ArchiveId: z.string().optional(),
});

export class DynamoDbDurableLogAdapter implements IDurableLogAdapter {
  private readonly tableName: string;
  private readonly recordTtlDays: number;
  private readonly summaryTtlDays: number;
  private readonly client: DynamoDBDocumentClient;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(options: DynamoDbLogOptions) {
    this.tableName = options.tableName;
    this.recordTtlDays = options.recordTtlDays ?? 30;
    this.summaryTtlDays = options.summaryTtlDays ?? 90;
    this.client =
      options.client ??
      DynamoDBDocumentClient.from(new DynamoDBClient({}), {
        marshallOptions: { removeUndefinedValues: true },
      });
    this.clock = options.clock ?? (() => new Date());
    this.logger = (options.logger ?? createLogger()).child({ adapter: 'dynamodb-log' });
  }

  async logRecord(record: SnapshotRecord): Promise<OperationResult> {
    const item = {
      SnapshotId: record.snapshotId,
      ProcessedAt: record.processedAt,
      VolumeId: record.volumeId,
      Region: record.region,
      CreatedAt: record.createdAt,
      AgeDays: record.ageDays,
      SizeGB: record.sizeGiB,
      Description: record.description,
      Status: record.status,
      ActionTaken: record.actionTaken,
      EstimatedCost: record.estimatedCost,
      ArchiveId: record.archiveId,
      RecordType: RecordType.SNAPSHOT,
      TTL: ttlAfterDays(this.recordTtlDays, this.clock()),
    };

    try {
      await this.client.send(new PutCommand({ TableName: this.tableName, Item: item }));
    } catch (error) {
      this.logger.error('Failed to log snapshot', {
        snapshotId: record.snapshotId,
        error: getErrorMessage(error),
      });
      return { success: false, error: getErrorMessage(error) };
    }

    this.logger.debug('Logged snapshot', { snapshotId: record.snapshotId });
    return { success: true };
  }

  async logSummary(summary: RunSummary): Promise<OperationResult> {
    const now = this.clock();
    const item = {
      ...toSummaryPayload(summary),
      SnapshotId: summaryKey(now),
      ProcessedAt: formatTimestamp(now),
      RecordType: RecordType.SUMMARY,
      TTL: ttlAfterDays(this.summaryTtlDays, now),
    };

    try {
      await this.client.send(new PutCommand({ TableName: this.tableName, Item: item }));
    } catch (error) {
      this.logger.error('Failed to log summary', { error: getErrorMessage(error) });
      return { success: false, error: getErrorMessage(error) };
    }

    this.logger.info('Logged summary', { key: item.SnapshotId });
    return { success: true };
  }

  async queryOldSnapshots(days: number): Promise<OperationResult<{ records: SnapshotRecord[] }>> {
    const records: SnapshotRecord[] = [];
    let startKey: Record<string, unknown> | undefined;

    try {
      // TODO: query a GSI on (RecordType, AgeDays) once the table outgrows full scans
      do {
        const page = await this.client.send(
          new ScanCommand({
            TableName: this.tableName,
            FilterExpression: 'RecordType = :type AND AgeDays > :days',
            ExpressionAttributeValues: {
              ':type': RecordType.SNAPSHOT,
              ':days': days,
            },
            ExclusiveStartKey: startKey,
          })
        );

        for (const item of page.Items ?? []) {
          const parsed = SnapshotItemSchema.safeParse(item);
          if (parsed.success) {
            records.push(fromItem(parsed.data));
          } else {
            this.logger.warn('Skipping malformed snapshot item', {
              snapshotId: item.SnapshotId,
              error: parsed.error.message,
            });
          }
        }

        startKey = page.LastEvaluatedKey;
      } while (startKey);
    } catch (error) {
      this.logger.error('Failed to query old snapshots', { days, error: getErrorMessage(error) });
      return { success: false, error: getErrorMessage(error) };
    }

    return { success: true, records };
  }
}

/**
 * Partition key for a summary written at the given instant
 */
export function summaryKey(at: Date): string {
  return `SUMMARY_${format(new UTCDate(at.getTime()), 'yyyyMMdd_HHmmss')}`;
}

function fromItem(item: z.infer<typeof SnapshotItemSchema>): SnapshotRecord {
  return {
    snapshotId: item.SnapshotId,
    volumeId: item.VolumeId,
    region: item.Region,
    createdAt: item.CreatedAt,
    ageDays: item.AgeDays,
    sizeGiB: item.SizeGB,
    description: item.Description,
    estimatedCost: item.EstimatedCost,
    status: item.Status,
    actionTaken: item.ActionTaken,
    ...(item.ArchiveId !== undefined ? { archiveId: item.ArchiveId } : {}),
    processedAt: item.ProcessedAt,
  };
}
