import { loadPipelines, loadWorkerConfig } from './config.js';
import { runPipelineById, summarizeRun } from './jobs/run-pipeline.js';
import { createWorkerLogger } from './observability/logger.js';
import { serializeError } from './observability/with-logger.js';
import { createPipelineRuntime } from './runtime.js';

/**
 * Run one pipeline in-process, outside the queue:
 *   npm run pipeline:run -- <pipeline-id>
 * Exits 1 when any dataset failed.
 */
async function main(): Promise<number> {
  const logger = createWorkerLogger();
  const config = loadWorkerConfig();
  const pipelines = loadPipelines(config.pipelinesPath);

  const pipelineId = process.argv[2];
  if (!pipelineId) {
    logger.error(
      { event: 'cli_usage', pipelines: pipelines.map((pipeline) => pipeline.id) },
      'Usage: pipeline:run <pipeline-id>',
    );
    return 1;
  }

  const abort = new AbortController();
  const onSignal = (): void => {
    logger.warn({ event: 'cancel_requested', pipelineId }, 'Cancelling pipeline run');
    abort.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  const runtime = createPipelineRuntime(config);
  try {
    const result = await runPipelineById(pipelineId, {
      pipelines,
      runtime: { ...runtime.deps, signal: abort.signal },
      logger,
    });
    logger.info({ event: 'pipeline_completed', ...summarizeRun(result) }, 'Pipeline completed');
    return 0;
  } catch (error) {
    logger.error({ event: 'pipeline_failed', pipelineId, error: serializeError(error) }, 'Pipeline failed');
    return 1;
  } finally {
    await runtime.close();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    createWorkerLogger().error({ event: 'cli_fatal_error', error: serializeError(error) }, 'Pipeline run failed to start');
    process.exitCode = 1;
  },
);
