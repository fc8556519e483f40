import type { Job } from 'bullmq';
import type { Logger } from 'pino';
import { describe, expect, it, vi } from 'vitest';
import { serializeError, withLogger } from '../../src/observability/with-logger.js';
import type { PipelineRunJobData } from '../../src/queues.js';
import { stub } from '../test-helpers.js';

function createLoggerMock(): Logger {
  const child = vi.fn();
  const logger = stub<Logger>({
    info: vi.fn(),
    error: vi.fn(),
    child,
  });
  child.mockReturnValue(logger);

  return logger;
}

function createJob(overrides: Partial<Job<PipelineRunJobData>> = {}): Job<PipelineRunJobData> {
  return stub<Job<PipelineRunJobData>>({
    id: 'job-1',
    name: 'pipeline-run',
    attemptsMade: 0,
    timestamp: Date.now() - 250,
    data: { pipelineId: 'vehicles' },
    ...overrides,
  });
}

describe('withLogger', () => {
  it('logs start/completion and returns handler result', async () => {
    const logger = createLoggerMock();
    const job = createJob();
    const run = vi.fn(async () => ({ written: 5 }));

    const result = await withLogger({
      logger,
      queue: 'pipeline.run',
      job,
      context: () => ({ pipelineId: job.data.pipelineId }),
      summary: (value) => ({ totalWritten: value.written }),
      run,
    });

    expect(result).toEqual({ written: 5 });
    expect(job.data.traceId).toBeTruthy();
    expect(vi.mocked(logger.child)).toHaveBeenCalledWith({ queue: 'pipeline.run', traceId: job.data.traceId });
    expect(run).toHaveBeenCalledWith(logger);
    expect(vi.mocked(logger.info)).toHaveBeenCalledTimes(2);

    const [startPayload] = vi.mocked(logger.info).mock.calls[0]!;
    expect(startPayload).toMatchObject({
      event: 'job_started',
      queue: 'pipeline.run',
      jobId: 'job-1',
      attempt: 1,
      pipelineId: 'vehicles',
    });

    const [completedPayload] = vi.mocked(logger.info).mock.calls[1]!;
    expect(completedPayload).toMatchObject({
      event: 'job_completed',
      queue: 'pipeline.run',
      totalWritten: 5,
    });
  });

  it('logs failure and rethrows', async () => {
    const logger = createLoggerMock();
    const job = createJob({ id: 'job-2', attemptsMade: 1 });

    await expect(
      withLogger({
        logger,
        queue: 'pipeline.run',
        job,
        run: async () => {
          throw new Error('boom');
        },
      }),
    ).rejects.toThrow('boom');

    expect(vi.mocked(logger.error)).toHaveBeenCalledTimes(1);
    const [errorPayload] = vi.mocked(logger.error).mock.calls[0]!;
    expect(errorPayload).toMatchObject({
      event: 'job_failed',
      queue: 'pipeline.run',
      attempt: 2,
      error: { name: 'Error', message: 'boom' },
    });
  });
});

describe('serializeError', () => {
  it('stringifies non-error values', () => {
    expect(serializeError('plain')).toEqual({ message: 'plain' });
  });
});
