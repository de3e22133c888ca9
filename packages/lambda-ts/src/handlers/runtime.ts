/**
 * Shared wiring for the Lambda handlers
 */
import {
  createLogger,
  formatConfigError,
  loadConfigFromEnv,
  type AppConfig,
  type Logger,
} from '@snapshot-steward/shared';
import { AdapterFactory, type IAdapterFactory } from '@snapshot-steward/adapters';

export interface LambdaResponse {
  statusCode: number;
  body: string;
}

export interface HandlerRuntime {
  loadConfig: () => AppConfig;
  createFactory: (config: AppConfig, logger: Logger) => IAdapterFactory;
  clock: () => Date;
}

export const defaultRuntime: HandlerRuntime = {
  loadConfig: () => loadConfigFromEnv(),
  createFactory: (_config, logger) => new AdapterFactory(logger),
  clock: () => new Date(),
};

export function resolveRuntime(overrides: Partial<HandlerRuntime> = {}): HandlerRuntime {
  return { ...defaultRuntime, ...overrides };
}

export function jsonResponse(statusCode: number, body: unknown): LambdaResponse {
  return { statusCode, body: JSON.stringify(body) };
}

/**
 * 500 response for an error that reached the handler boundary
 */
export function failureResponse(error: unknown, logger: Logger, message: string): LambdaResponse {
  const reason = formatConfigError(error);
  logger.error(message, { error: reason });
  return jsonResponse(500, { error: reason });
}

export const bootstrapLogger = createLogger({ component: 'handler' });
