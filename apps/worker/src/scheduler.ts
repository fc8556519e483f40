import type { PipelineConfig } from '@harvest/parser-sdk';
import { getParserById } from './pipelines/catalog.js';
import type { Queues } from './queues.js';

const PIPELINE_RUN_ATTEMPTS = 2;
const PIPELINE_RUN_BACKOFF_MS = 60_000;

export interface SchedulerOptions {
  attempts?: number;
  backoffMs?: number;
}

export interface SchedulerResult {
  scheduledPipelines: string[];
  errors: Array<{
    pipelineId: string;
    error: string;
  }>;
}

export function pipelineJobId(pipelineId: string): string {
  return `pipeline-run-${pipelineId}`;
}

/**
 * Register one repeatable run per pipeline. A fixed job id per pipeline keeps
 * a single schedule, so two runs of one dataset never overlap on a
 * concurrency-1 worker.
 */
export async function schedulePipelines(
  queues: Queues,
  pipelines: readonly PipelineConfig[],
  options: SchedulerOptions = {},
): Promise<SchedulerResult> {
  const result: SchedulerResult = {
    scheduledPipelines: [],
    errors: [],
  };

  for (const pipeline of pipelines) {
    try {
      getParserById(pipeline.parser);

      await queues.pipelineRunQueue.add(
        'pipeline-run',
        {
          pipelineId: pipeline.id,
        },
        {
          jobId: pipelineJobId(pipeline.id),
          repeat: {
            pattern: pipeline.schedule.cron,
            tz: pipeline.schedule.timezone,
          },
          attempts: options.attempts ?? PIPELINE_RUN_ATTEMPTS,
          backoff: {
            type: 'exponential',
            delay: options.backoffMs ?? PIPELINE_RUN_BACKOFF_MS,
          },
          removeOnComplete: true,
          removeOnFail: 1000,
        },
      );
      result.scheduledPipelines.push(pipeline.id);
    } catch (error) {
      result.errors.push({
        pipelineId: pipeline.id,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return result;
}
