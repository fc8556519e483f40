import { z } from 'zod';

export const datasetConfigSchema = z
  .object({
    id: z.string().min(1),
    listingUrlTemplate: z.string().min(1),
    maxPages: z.number().int().positive().default(1),
    delay: z
      .object({
        minMs: z.number().int().nonnegative().default(1500),
        maxMs: z.number().int().nonnegative().default(4000),
      })
      .default({}),
    retryCount: z.number().int().nonnegative().default(3),
    challengeRetries: z.number().int().nonnegative().default(3),
    challengeMarkers: z.array(z.string().min(1)).min(1).optional(),
    bufferDays: z.number().int().nonnegative().default(3),
    indexName: z.string().min(1),
    timeoutMs: z.number().int().positive().default(20_000),
    listingCategory: z.string().min(1).optional(),
    ordering: z.enum(['recency', 'relevance']).default('recency'),
    shortCircuitThreshold: z.number().gt(0).max(1).default(1),
    idFields: z.array(z.string().min(1)).optional(),
    dateField: z.string().min(1).optional(),
    detailUrlTemplate: z.string().min(1).optional(),
    lookbackDays: z.number().int().positive().optional(),
    portalTitle: z.string().min(1).optional(),
  })
  .refine((config) => config.delay.maxMs >= config.delay.minMs, {
    message: 'delay.maxMs must be greater than or equal to delay.minMs',
    path: ['delay', 'maxMs'],
  });

export type DatasetConfig = z.infer<typeof datasetConfigSchema>;
export type DatasetConfigInput = z.input<typeof datasetConfigSchema>;

export const snapshotTargetSchema = z.object({
  key: z.string().min(1),
  cacheControl: z.string().min(1).default('public, max-age=60'),
  datasets: z.array(z.string().min(1)).min(1),
  fields: z.array(z.string().min(1)).optional(),
});

export type SnapshotTargetConfig = z.infer<typeof snapshotTargetSchema>;

export const pipelineConfigSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
    parser: z.string().min(1),
    schedule: z.object({
      cron: z.string().min(1),
      timezone: z.string().min(1).default('UTC'),
    }),
    datasets: z.array(datasetConfigSchema).min(1),
    snapshots: z.array(snapshotTargetSchema).default([]),
  })
  .superRefine((pipeline, ctx) => {
    const ids = new Set<string>();
    for (const dataset of pipeline.datasets) {
      if (ids.has(dataset.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate dataset id: ${dataset.id}`,
          path: ['datasets'],
        });
      }
      ids.add(dataset.id);
    }

    for (const snapshot of pipeline.snapshots) {
      for (const datasetId of snapshot.datasets) {
        if (!ids.has(datasetId)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `snapshot ${snapshot.key} references unknown dataset: ${datasetId}`,
            path: ['snapshots'],
          });
        }
      }
    }
  });

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;

export const pipelinesFileSchema = z.object({
  pipelines: z.array(pipelineConfigSchema).min(1),
});

export type PipelinesFile = z.infer<typeof pipelinesFileSchema>;

export const listingStubSchema = z.object({
  identifier: z.string().min(1),
  sourceUrl: z.string().url(),
  detailUrl: z.string().url().optional(),
  listingCategory: z.string().min(1).optional(),
  fields: z.record(z.string(), z.unknown()),
});

export type ValidatedListingStub = z.infer<typeof listingStubSchema>;

export interface ValidateStubsOptions {
  onInvalid?: (issues: z.ZodIssue[], stub: unknown) => void;
}

export function validateStubs(stubs: unknown[], options?: ValidateStubsOptions): ValidatedListingStub[] {
  const valid: ValidatedListingStub[] = [];

  for (const stub of stubs) {
    const result = listingStubSchema.safeParse(stub);
    if (result.success) {
      valid.push(result.data);
    } else {
      options?.onInvalid?.(result.error.issues, stub);
    }
  }

  return valid;
}
