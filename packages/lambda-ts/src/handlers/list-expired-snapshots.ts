/**
 * Lists logged snapshots older than a number of days (default: the retention period)
 */
import type { Handler } from 'aws-lambda';
import { z } from 'zod';
import { createLogger, formatConfigError } from '@snapshot-steward/shared';
import {
  bootstrapLogger,
  failureResponse,
  jsonResponse,
  resolveRuntime,
  type HandlerRuntime,
  type LambdaResponse,
} from './runtime';

export const ListExpiredEventSchema = z
  .object({
    days: z.number().int().nonnegative().optional(),
  })
  .default({});

export type ListExpiredEvent = z.infer<typeof ListExpiredEventSchema>;

export function createListExpiredSnapshotsHandler(
  overrides: Partial<HandlerRuntime> = {}
): (event?: unknown) => Promise<LambdaResponse> {
  const runtime = resolveRuntime(overrides);

  return async (event) => {
    const parsed = ListExpiredEventSchema.safeParse(event ?? undefined);
    if (!parsed.success) {
      return jsonResponse(400, { error: formatConfigError(parsed.error) });
    }

    let logger = bootstrapLogger;

    try {
      const config = runtime.loadConfig();
      logger = createLogger({ component: 'list-expired' }, config.logLevel);

      const days = parsed.data.days ?? config.scan.retentionDays;
      const durableLog = runtime.createFactory(config, logger).createDurableLogAdapter(config.aws);
      const result = await durableLog.queryOldSnapshots(days);

      if (!result.success) {
        return jsonResponse(502, { error: result.error });
      }

      logger.info('Listed expired snapshots', { days, count: result.records.length });
      return jsonResponse(200, { days, count: result.records.length, snapshots: result.records });
    } catch (error) {
      return failureResponse(error, logger, 'Listing expired snapshots failed');
    }
  };
}

export const handler: Handler<ListExpiredEvent, LambdaResponse> =
  createListExpiredSnapshotsHandler();
