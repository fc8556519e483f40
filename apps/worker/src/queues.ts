import { Queue } from 'bullmq';
import { Redis as IORedis } from 'ioredis';

export const PIPELINE_RUN_QUEUE = 'pipeline.run';

export interface PipelineRunJobData {
  pipelineId: string;
  traceId?: string;
}

export interface Queues {
  pipelineRunQueue: Queue<PipelineRunJobData>;
}

export function createRedisConnection(redisUrl: string): IORedis {
  return new IORedis(redisUrl, {
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
  });
}

export function createQueues(connection: IORedis): Queues {
  return {
    pipelineRunQueue: new Queue<PipelineRunJobData>(PIPELINE_RUN_QUEUE, { connection }),
  };
}

export async function closeQueues(queues: Queues): Promise<void> {
  await queues.pipelineRunQueue.close();
}
