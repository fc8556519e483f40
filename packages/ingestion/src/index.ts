export { runDataset, runPipeline } from './pipeline.js';
export type { PipelineDefinition, RunDependencies } from './pipeline.js';
export { fetchPages } from './fetcher.js';
export { gatePage } from './dedup.js';
export type { GateOptions, GateResult } from './dedup.js';
export { enrichStub, mergeDetail } from './enrich.js';
export type { EnrichOutcome } from './enrich.js';
export {
  normalizeListing,
  parseTimestamp,
  pickTimestamp,
  isoDatePart,
  stripHtml,
  decodeHtmlEntities,
  normalizeWhitespace,
} from './normalize.js';
export {
  FileCheckpointStore,
  computeLowerBound,
  computeWindow,
  advanceCheckpoint,
  emptyCheckpoint,
} from './checkpoint.js';
export { createDrizzleListingIndex, computeContentHash, writeListing } from './store.js';
export type { WriteOptions, WriteOutcome } from './store.js';
export { exportSnapshot, toDocument } from './export.js';
export { S3ObjectStorage } from './object-storage.js';
export type { S3StorageOptions } from './object-storage.js';
export type {
  Listing,
  EnrichmentLevel,
  Checkpoint,
  CheckpointStore,
  ListingIndex,
  ObjectStorage,
  PutObjectInput,
  IngestionLogger,
  DatasetStats,
  DatasetStatus,
  DatasetRunResult,
  SnapshotExportResult,
  PipelineRunResult,
  PipelineDependencies,
} from './types.js';
