/**
 * Archive retrieval handler
 *
 * Starts a bulk Glacier retrieval job for a previously archived snapshot in
 * the configured vault. The job runs for hours; this handler only returns its id.
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

export const RetrieveArchiveEventSchema = z.object({
  archiveId: z.string().min(1),
});

export type RetrieveArchiveEvent = z.infer<typeof RetrieveArchiveEventSchema>;

export function createRetrieveArchiveHandler(
  overrides: Partial<HandlerRuntime> = {}
): (event: unknown) => Promise<LambdaResponse> {
  const runtime = resolveRuntime(overrides);

  return async (event) => {
    const parsed = RetrieveArchiveEventSchema.safeParse(event);
    if (!parsed.success) {
      return jsonResponse(400, { error: formatConfigError(parsed.error) });
    }

    let logger = bootstrapLogger;

    try {
      const config = runtime.loadConfig();
      logger = createLogger({ archiveId: parsed.data.archiveId }, config.logLevel);

      const archiver = runtime.createFactory(config, logger).createColdArchiveAdapter(config.aws);
      const result = await archiver.retrieve(parsed.data.archiveId);

      if (!result.success) {
        logger.warn('Archive retrieval not started', { error: result.error });
        return jsonResponse(502, { error: result.error });
      }

      return jsonResponse(202, {
        job_id: result.jobId,
        archive_id: result.archiveId,
        vault: result.vault,
        region: result.region,
      });
    } catch (error) {
      return failureResponse(error, logger, 'Archive retrieval failed');
    }
  };
}

export const handler: Handler<RetrieveArchiveEvent, LambdaResponse> =
  createRetrieveArchiveHandler();
