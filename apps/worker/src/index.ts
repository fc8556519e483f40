import type { Job } from 'bullmq';
import { Worker } from 'bullmq';
import type { PipelineRunResult } from '@harvest/ingestion';
import { loadPipelines, loadWorkerConfig } from './config.js';
import { handlePipelineRunJob, summarizeRun } from './jobs/run-pipeline.js';
import { createWorkerLogger } from './observability/logger.js';
import { withLogger } from './observability/with-logger.js';
import {
  closeQueues,
  createQueues,
  createRedisConnection,
  PIPELINE_RUN_QUEUE,
  type PipelineRunJobData,
  type Queues,
} from './queues.js';
import { createPipelineRuntime, type PipelineRuntime } from './runtime.js';
import { schedulePipelines } from './scheduler.js';

interface RuntimeState {
  runtime: PipelineRuntime | null;
  redis: ReturnType<typeof createRedisConnection> | null;
  queues: Queues | null;
  worker: Worker<PipelineRunJobData, PipelineRunResult> | null;
  abort: AbortController;
}

const runtimeState: RuntimeState = {
  runtime: null,
  redis: null,
  queues: null,
  worker: null,
  abort: new AbortController(),
};

async function cleanupRuntimeState(state: RuntimeState): Promise<void> {
  state.abort.abort();

  if (state.worker) {
    await Promise.allSettled([state.worker.close()]);
  }

  if (state.queues) {
    await Promise.allSettled([closeQueues(state.queues)]);
  }

  if (state.redis) {
    await Promise.allSettled([state.redis.quit()]);
  }

  if (state.runtime) {
    await Promise.allSettled([state.runtime.close()]);
  }
}

async function run(): Promise<void> {
  const logger = createWorkerLogger();
  const config = loadWorkerConfig();
  const pipelines = loadPipelines(config.pipelinesPath);

  const runtime = createPipelineRuntime(config);
  runtimeState.runtime = runtime;
  if (!config.storage) {
    logger.warn({ event: 'object_storage_disabled' }, 'Object storage is not configured; snapshot exports are skipped');
  }

  const redis = createRedisConnection(config.redisUrl);
  runtimeState.redis = redis;
  const queues = createQueues(redis);
  runtimeState.queues = queues;

  const worker = new Worker<PipelineRunJobData, PipelineRunResult>(
    PIPELINE_RUN_QUEUE,
    (job: Job<PipelineRunJobData>) =>
      withLogger({
        logger,
        queue: PIPELINE_RUN_QUEUE,
        job,
        context: () => ({ pipelineId: job.data.pipelineId }),
        summary: summarizeRun,
        run: (jobLogger) =>
          handlePipelineRunJob(job, {
            pipelines,
            runtime: { ...runtime.deps, signal: runtimeState.abort.signal },
            logger: jobLogger,
          }),
      }),
    {
      connection: redis,
      concurrency: 1,
    },
  );
  runtimeState.worker = worker;

  worker.on('error', (error) => {
    logger.error(
      {
        event: 'worker_runtime_error',
        queue: worker.name,
        error,
      },
      'Worker runtime error',
    );
  });

  const schedulerResult = await schedulePipelines(queues, pipelines);
  if (schedulerResult.errors.length === 0) {
    logger.info(
      {
        event: 'scheduler_configured',
        scheduledPipelines: schedulerResult.scheduledPipelines,
      },
      'Scheduler configured',
    );
  } else {
    logger.warn(
      {
        event: 'scheduler_partially_configured',
        scheduledPipelines: schedulerResult.scheduledPipelines,
        errors: schedulerResult.errors,
      },
      'Scheduler partially configured: pipeline scheduling failed',
    );
  }

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) {
      return;
    }

    shuttingDown = true;
    logger.info({ event: 'shutdown_requested', signal }, 'Shutdown requested');

    await cleanupRuntimeState(runtimeState);

    logger.info({ event: 'shutdown_completed', signal }, 'Shutdown completed');
    process.exit(0);
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });

  logger.info(
    {
      event: 'worker_started',
      redisUrl: config.redisUrl,
      pipelines: pipelines.map((pipeline) => pipeline.id),
    },
    'Worker started',
  );
}

run().catch(async (error) => {
  await cleanupRuntimeState(runtimeState);
  const logger = createWorkerLogger();
  logger.error(
    {
      event: 'worker_fatal_error',
      error,
    },
    'Worker fatal error',
  );
  process.exit(1);
});
