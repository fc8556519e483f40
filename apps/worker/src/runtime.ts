import { closeDatabase, createDatabase, type Database } from '@harvest/db';
import {
  FileCheckpointStore,
  S3ObjectStorage,
  createDrizzleListingIndex,
  type RunDependencies,
} from '@harvest/ingestion';
import type { WorkerConfig } from './config.js';

export interface PipelineRuntime {
  db: Database;
  deps: Omit<RunDependencies, 'logger' | 'signal'>;
  close(): Promise<void>;
}

/**
 * Wire the index, checkpoint store and optional object storage for pipeline runs.
 */
export function createPipelineRuntime(config: WorkerConfig): PipelineRuntime {
  const db = createDatabase(config.databaseUrl, { maxConnections: config.databaseMaxConnections });
  const storage = config.storage ? new S3ObjectStorage(config.storage) : undefined;

  return {
    db,
    deps: {
      index: createDrizzleListingIndex(db),
      checkpoints: new FileCheckpointStore(config.checkpointDir),
      storage,
    },
    async close() {
      storage?.destroy();
      await closeDatabase(db);
    },
  };
}
