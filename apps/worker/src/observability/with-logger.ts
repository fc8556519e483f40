import type { Job } from 'bullmq';
import type { Logger } from 'pino';
import { withTrace } from './trace.js';

interface TraceableData {
  traceId?: string;
}

export interface SerializedError {
  name?: string;
  message: string;
  stack?: string;
}

export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    message: String(error),
  };
}

function computeWaitMs(timestamp: number): number | undefined {
  if (!Number.isFinite(timestamp) || timestamp <= 0) {
    return undefined;
  }

  return Math.max(0, Date.now() - timestamp);
}

export interface WithLoggerOptions<TData extends TraceableData, TResult> {
  logger: Logger;
  queue: string;
  job: Job<TData>;
  context?: (traceId: string) => Record<string, unknown>;
  summary?: (result: TResult) => Record<string, unknown>;
  run: (logger: Logger) => Promise<TResult>;
}

/**
 * Wrap a job handler with start, completion and failure events. The handler
 * receives a child logger bound to the job's trace id.
 */
export async function withLogger<TData extends TraceableData, TResult>({
  logger,
  queue,
  job,
  context,
  summary,
  run,
}: WithLoggerOptions<TData, TResult>): Promise<TResult> {
  const traceId = withTrace(job);
  const startedAt = Date.now();
  const common = {
    queue,
    jobName: job.name,
    jobId: String(job.id ?? 'unknown'),
    attempt: job.attemptsMade + 1,
    traceId,
    ...(context ? context(traceId) : {}),
  };

  logger.info({ event: 'job_started', ...common, waitMs: computeWaitMs(job.timestamp) }, 'Job started');

  try {
    const result = await run(logger.child({ queue, traceId }));
    logger.info(
      {
        event: 'job_completed',
        ...common,
        durationMs: Date.now() - startedAt,
        ...(summary ? summary(result) : {}),
      },
      'Job completed',
    );
    return result;
  } catch (error) {
    logger.error(
      {
        event: 'job_failed',
        ...common,
        durationMs: Date.now() - startedAt,
        error: serializeError(error),
      },
      'Job failed',
    );
    throw error;
  }
}
