import { loadPipelines, resolvePipelinesPath } from '../../apps/worker/src/config.js';
import { closeQueues, createQueues, createRedisConnection } from '../../apps/worker/src/queues.js';

async function main(): Promise<void> {
  const pipelines = loadPipelines(resolvePipelinesPath());
  const redisUrl = process.env.REDIS_URL ?? 'redis://localhost:6379';
  const requested = process.argv.slice(2);
  const pipelineIds = requested.length > 0 ? requested : pipelines.map((pipeline) => pipeline.id);

  const known = new Set(pipelines.map((pipeline) => pipeline.id));
  const unknown = pipelineIds.filter((id) => !known.has(id));
  if (unknown.length > 0) {
    throw new Error(`Unknown pipeline id(s): ${unknown.join(', ')}`);
  }

  const redis = createRedisConnection(redisUrl);
  const queues = createQueues(redis);

  try {
    for (const pipelineId of pipelineIds) {
      const stamp = Date.now();
      await queues.pipelineRunQueue.add(
        'pipeline-run',
        {
          pipelineId,
          traceId: `manual-${pipelineId}-${stamp}`,
        },
        {
          jobId: `manual-pipeline-run-${pipelineId}-${stamp}`,
          attempts: 1,
          removeOnComplete: true,
          removeOnFail: 1000,
        },
      );

      console.log(`queued pipeline.run for ${pipelineId}`);
    }
  } finally {
    await closeQueues(queues);
    await redis.quit();
  }

  console.log('manual pipeline.run enqueue complete');
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
