import type { Job } from 'bullmq';
import { describe, expect, it } from 'vitest';
import { ensureTraceId, withTrace } from '../../src/observability/trace.js';
import type { PipelineRunJobData } from '../../src/queues.js';
import { stub } from '../test-helpers.js';

describe('ensureTraceId', () => {
  it('returns existing trace id as-is', () => {
    expect(ensureTraceId('trace-123')).toBe('trace-123');
  });

  it('creates a trace id when value is missing or blank', () => {
    expect(ensureTraceId()).toMatch(/^[0-9a-f-]{36}$/i);
    expect(ensureTraceId('   ')).toMatch(/^[0-9a-f-]{36}$/i);
  });
});

describe('withTrace', () => {
  it('stores the generated trace id on the job payload', () => {
    const job = stub<Job<PipelineRunJobData>>({ data: { pipelineId: 'vehicles' } });

    const traceId = withTrace(job);

    expect(job.data.traceId).toBe(traceId);
    expect(withTrace(job)).toBe(traceId);
  });
});
