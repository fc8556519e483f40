import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { pipelinesFileSchema, type PipelineConfig } from '@harvest/parser-sdk';
import type { S3StorageOptions } from '@harvest/ingestion';

const DEFAULT_REDIS_URL = 'redis://localhost:6379';
const DEFAULT_CHECKPOINT_DIR = '.checkpoints';
const DEFAULT_PIPELINES_CONFIG = 'config/pipelines.json';

type Env = Record<string, string | undefined>;

export interface WorkerConfig {
  databaseUrl: string;
  databaseMaxConnections: number;
  redisUrl: string;
  checkpointDir: string;
  pipelinesPath: string;
  storage?: S3StorageOptions;
}

export function readRequiredEnv(name: string, env: Env = process.env): string {
  const value = env[name];
  if (!value) {
    throw new Error(`${name} environment variable is required`);
  }

  return value;
}

export function readIntEnv(name: string, fallback: number, env: Env = process.env): number {
  const raw = env[name];
  if (!raw) {
    return fallback;
  }

  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }

  return Math.floor(parsed);
}

function readStorageConfig(env: Env): S3StorageOptions | undefined {
  const bucket = env.OBJECT_STORAGE_BUCKET?.trim();
  if (!bucket) {
    return undefined;
  }

  return {
    bucket,
    endpoint: env.OBJECT_STORAGE_ENDPOINT?.trim() || undefined,
    region: env.OBJECT_STORAGE_REGION?.trim() || undefined,
    accessKeyId: readRequiredEnv('OBJECT_STORAGE_ACCESS_KEY_ID', env),
    secretAccessKey: readRequiredEnv('OBJECT_STORAGE_SECRET_ACCESS_KEY', env),
  };
}

export function resolvePipelinesPath(env: Env = process.env): string {
  return resolve(env.PIPELINES_CONFIG ?? DEFAULT_PIPELINES_CONFIG);
}

export function loadWorkerConfig(env: Env = process.env): WorkerConfig {
  return {
    databaseUrl: readRequiredEnv('DATABASE_URL', env),
    databaseMaxConnections: readIntEnv('DATABASE_MAX_CONNECTIONS', 5, env),
    redisUrl: env.REDIS_URL ?? DEFAULT_REDIS_URL,
    checkpointDir: resolve(env.CHECKPOINT_DIR ?? DEFAULT_CHECKPOINT_DIR),
    pipelinesPath: resolvePipelinesPath(env),
    storage: readStorageConfig(env),
  };
}

/**
 * Read and validate the pipeline definitions file.
 */
export function loadPipelines(path: string): PipelineConfig[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    throw new Error(`Unable to read pipeline config ${path}: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error,
    });
  }

  const parsed = pipelinesFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new Error(`Invalid pipeline config ${path}: ${issues.join('; ')}`);
  }

  const ids = new Set<string>();
  for (const pipeline of parsed.data.pipelines) {
    if (ids.has(pipeline.id)) {
      throw new Error(`Duplicate pipeline id: ${pipeline.id}`);
    }
    ids.add(pipeline.id);
  }

  return parsed.data.pipelines;
}
