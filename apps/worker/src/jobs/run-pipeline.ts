import type { Job } from 'bullmq';
import { runPipeline, type PipelineRunResult, type RunDependencies } from '@harvest/ingestion';
import type { PipelineConfig } from '@harvest/parser-sdk';
import type { Logger } from 'pino';
import { createIngestionLogger } from '../observability/ingestion-logger.js';
import { buildPipeline, findPipeline } from '../pipelines/catalog.js';
import type { PipelineRunJobData } from '../queues.js';

export interface PipelineRunJobDeps {
  pipelines: readonly PipelineConfig[];
  runtime: Omit<RunDependencies, 'logger'>;
  logger: Logger;
}

export function summarizeRun(result: PipelineRunResult): Record<string, unknown> {
  return {
    pipelineId: result.pipelineId,
    totalWritten: result.totalWritten,
    failedDatasets: result.failedDatasets,
    datasets: result.datasets.map((dataset) => ({
      dataset: dataset.dataset,
      status: dataset.status,
      written: dataset.stats.written,
      errors: dataset.errors.length,
    })),
    exports: result.exports.map((exported) => `${exported.key} (${exported.documents})`),
    warnings: result.warnings,
  };
}

/**
 * Run one configured pipeline. Fails the job when any dataset failed, so the
 * queue's retry and failure bookkeeping applies.
 */
export async function runPipelineById(pipelineId: string, deps: PipelineRunJobDeps): Promise<PipelineRunResult> {
  const config = findPipeline(deps.pipelines, pipelineId);
  const logger = deps.logger.child({ pipelineId });
  const pipeline = buildPipeline(config, { logger });

  const result = await runPipeline(pipeline, {
    ...deps.runtime,
    logger: createIngestionLogger(logger),
  });

  if (result.failedDatasets > 0) {
    const failures = result.datasets
      .filter((dataset) => dataset.status === 'failed' || dataset.status === 'cancelled')
      .map((dataset) => `${dataset.dataset}: ${dataset.errors.at(-1) ?? dataset.status}`);
    throw new Error(`[pipeline.run:${pipelineId}] ${failures.join(' | ')}`);
  }

  return result;
}

/**
 * `deps.logger` is expected to carry the job's trace binding already.
 */
export async function handlePipelineRunJob(
  job: Job<PipelineRunJobData>,
  deps: PipelineRunJobDeps,
): Promise<PipelineRunResult> {
  return runPipelineById(job.data.pipelineId, deps);
}
