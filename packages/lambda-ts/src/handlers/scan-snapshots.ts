/**
 * Snapshot scan handler
 *
 * Entry point for the scheduled scan. Returns the serialized summary with a 200,
 * or `{ error }` with a 500 when the run cannot complete.
 */
import type { Handler, ScheduledEvent } from 'aws-lambda';
import {
  createLogger,
  generateRunId,
  toSummaryPayload,
  type AppConfig,
  type Logger,
} from '@snapshot-steward/shared';
import type { IAdapterFactory } from '@snapshot-steward/adapters';
import { describeOutcome, ScanOrchestrator, SnapshotClassifier } from '../lifecycle';
import {
  bootstrapLogger,
  failureResponse,
  jsonResponse,
  resolveRuntime,
  type HandlerRuntime,
  type LambdaResponse,
} from './runtime';

export async function buildOrchestrator(
  config: AppConfig,
  factory: IAdapterFactory,
  logger: Logger,
  clock: () => Date
): Promise<ScanOrchestrator> {
  const classifier = new SnapshotClassifier(config.scan, {
    deleter: factory.createDeletionAdapter(),
    archiver: config.scan.coldArchiveEnabled
      ? factory.createColdArchiveAdapter(config.aws)
      : undefined,
    logger,
    clock,
  });

  const notifiers = await factory.createNotificationAdapters(
    config.notifications,
    factory.createSecretProvider(config.aws)
  );

  return new ScanOrchestrator(config.scan, {
    inventory: factory.createInventoryAdapter(),
    classifier,
    durableLog: factory.createDurableLogAdapter(config.aws),
    notifiers,
    logger,
    clock,
  });
}

export function createScanHandler(
  overrides: Partial<HandlerRuntime> = {}
): (event?: unknown) => Promise<LambdaResponse> {
  const runtime = resolveRuntime(overrides);

  return async () => {
    let logger = bootstrapLogger;

    try {
      const config = runtime.loadConfig();
      logger = createLogger({ runId: generateRunId() }, config.logLevel);

      const orchestrator = await buildOrchestrator(
        config,
        runtime.createFactory(config, logger),
        logger,
        runtime.clock
      );
      const outcome = await orchestrator.run();

      logger.info('Scan complete', describeOutcome(outcome));
      return jsonResponse(200, toSummaryPayload(outcome.summary));
    } catch (error) {
      return failureResponse(error, logger, 'Snapshot scan failed');
    }
  };
}

export const handler: Handler<ScheduledEvent, LambdaResponse> = createScanHandler();
