import { randomUUID } from 'node:crypto';
import type { Job } from 'bullmq';

interface TraceableData {
  traceId?: string;
}

export function ensureTraceId(traceId?: string): string {
  if (traceId && traceId.trim().length > 0) {
    return traceId;
  }

  return randomUUID();
}

/**
 * Stamp a trace id on the job payload so retries of the same job share it.
 */
export function withTrace<TData extends TraceableData>(job: Job<TData>): string {
  const traceId = ensureTraceId(job.data.traceId);
  job.data.traceId = traceId;
  return traceId;
}
