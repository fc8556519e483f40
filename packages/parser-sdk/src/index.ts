export type {
  JsonRecord,
  ListingStub,
  ListingPage,
  DateWindow,
  PaginationMode,
  ParserManifest,
  PageContext,
  PagedParser,
  WindowedParser,
  Parser,
  DatasetRun,
} from './types.js';
export {
  datasetConfigSchema,
  snapshotTargetSchema,
  pipelineConfigSchema,
  pipelinesFileSchema,
  listingStubSchema,
  validateStubs,
} from './schema.js';
export type {
  DatasetConfig,
  DatasetConfigInput,
  SnapshotTargetConfig,
  PipelineConfig,
  PipelinesFile,
  ValidatedListingStub,
  ValidateStubsOptions,
} from './schema.js';
export { defineParser, createDatasetClient, fillTemplate } from './factory.js';
export { ScrapeClient, DEFAULT_CHALLENGE_MARKERS } from './http-client.js';
export type {
  AttemptOutcome,
  FetchContext,
  FetchedPage,
  FetchResult,
  RetryEvent,
  ScrapeClientOptions,
} from './http-client.js';
export {
  TransientNetworkError,
  ChallengeBlockedError,
  PermanentHttpError,
  RecordParseError,
  IndexWriteError,
  ExportError,
  CheckpointIOError,
  PipelineCancelledError,
} from './errors.js';
export { loadNextData, extractJsonLd, walkJson, getPath } from './extract.js';
export { isRecord, cleanScalar, maybeInt, maybeFloat, compact } from './values.js';
