import type { IngestionLogger } from '@harvest/ingestion';
import type { Logger } from 'pino';

/**
 * Route pipeline engine messages into a pino logger. Progress lines go to
 * debug; warnings and errors keep their level.
 */
export function createIngestionLogger(logger: Logger): IngestionLogger {
  return {
    info: (message, context) => logger.debug({ event: 'pipeline_stage', ...context }, message),
    warn: (message, context) => logger.warn({ event: 'pipeline_stage', ...context }, message),
    error: (message, context) => logger.error({ event: 'pipeline_stage', ...context }, message),
  };
}
