import type { DatasetRun, DateWindow, SnapshotTargetConfig } from '@harvest/parser-sdk';
import { PipelineCancelledError } from '@harvest/parser-sdk';
import { advanceCheckpoint, computeWindow } from './checkpoint.js';
import { gatePage } from './dedup.js';
import { enrichStub, type EnrichOutcome } from './enrich.js';
import { exportSnapshot } from './export.js';
import { fetchPages, throwIfCancelled } from './fetcher.js';
import { isoDatePart, normalizeListing } from './normalize.js';
import { writeListing, type WriteOptions } from './store.js';
import type {
  Checkpoint,
  DatasetRunResult,
  DatasetStats,
  DatasetStatus,
  IngestionLogger,
  PipelineDependencies,
  PipelineRunResult,
  SnapshotExportResult,
} from './types.js';

const defaultLogger: IngestionLogger = {
  info: (msg, context) => (context ? console.log(msg, context) : console.log(msg)),
  warn: (msg, context) => (context ? console.warn(msg, context) : console.warn(msg)),
  error: (msg, context) => (context ? console.error(msg, context) : console.error(msg)),
};

export interface RunDependencies extends PipelineDependencies {
  writeOptions?: WriteOptions;
}

export interface PipelineDefinition {
  id: string;
  datasets: DatasetRun[];
  snapshots: SnapshotTargetConfig[];
}

function emptyStats(): DatasetStats {
  return {
    pages: 0,
    stubs: 0,
    duplicates: 0,
    seen: 0,
    fresh: 0,
    enrichedFull: 0,
    enrichedPartial: 0,
    parseErrors: 0,
    written: 0,
    writeErrors: 0,
  };
}

function laterDate(current: string | null, candidate: string | null): string | null {
  if (!candidate) return current;
  return !current || candidate > current ? candidate : current;
}

/**
 * Run one dataset: fetch → gate → enrich → normalize → write, then advance
 * the checkpoint for date-window datasets.
 * Dataset-level failures are caught and reported in the result.
 */
export async function runDataset(run: DatasetRun, deps: RunDependencies): Promise<DatasetRunResult> {
  const { config, parser, client } = run;
  const { index, checkpoints, signal, logger = defaultLogger } = deps;
  const now = deps.now ?? (() => new Date());
  const start = performance.now();
  const stats = emptyStats();
  const errors: string[] = [];
  const tag = `[pipeline:${config.id}]`;

  let status: DatasetStatus = 'completed';
  let maxPostedDate: string | null = null;
  let checkpoint: Checkpoint | null = null;

  try {
    let loaded: Checkpoint | undefined;
    let window: DateWindow | undefined;

    if (parser.mode === 'date-window') {
      loaded = await checkpoints.load(config.id, config.bufferDays);
      window = computeWindow(loaded, now().toISOString().slice(0, 10), config.lookbackDays);
      logger.info(`${tag} Date window ${window.from ?? '(open)'} → ${window.to}`, {
        lastSeenMaxDate: loaded.lastSeenMaxDate,
      });
    }

    for await (const page of fetchPages(run, { window, signal, logger })) {
      stats.pages += 1;
      stats.stubs += page.stubs.length;

      const gate = await gatePage(page.stubs, {
        index,
        indexName: config.indexName,
        dataset: config.id,
        mode: parser.mode,
        ordering: config.ordering,
        shortCircuitThreshold: config.shortCircuitThreshold,
      });
      stats.duplicates += gate.duplicates.length;
      stats.seen += gate.seen.length;
      stats.fresh += gate.fresh.length;

      logger.info(`${tag} Page ${page.page}: ${page.stubs.length} stubs, ${gate.fresh.length} fresh`, {
        seen: gate.seen.length,
        duplicates: gate.duplicates.length,
      });

      for (const stub of gate.fresh) {
        throwIfCancelled(signal, config.id);

        const outcome: EnrichOutcome =
          parser.mode === 'paged'
            ? await enrichStub(stub, { parser, client, dataset: config.id, logger })
            : { stub, enrichment: 'none' };

        if (outcome.enrichment === 'full') stats.enrichedFull += 1;
        if (outcome.enrichment === 'partial') stats.enrichedPartial += 1;
        if (outcome.failure === 'parse') stats.parseErrors += 1;

        const listing = normalizeListing(outcome.stub, {
          dataset: config.id,
          timestampFields: parser.timestampFields(config),
          numericFields: parser.numericFields,
          textFields: parser.textFields,
          listingCategory: config.listingCategory,
          enrichment: outcome.enrichment,
          extractedAt: now(),
        });

        const written = await writeListing(index, config.indexName, listing, deps.writeOptions);
        if (written.ok) {
          stats.written += 1;
          maxPostedDate = laterDate(maxPostedDate, isoDatePart(listing.postedAtIso));
        } else {
          stats.writeErrors += 1;
          errors.push(written.error.message);
          logger.error(`${tag} ${written.error.message}`, { identifier: listing.identifier });
        }
      }

      if (gate.shortCircuit) {
        status = 'short-circuited';
        logger.info(`${tag} Page ${page.page} already indexed, stopping`);
        break;
      }
    }

    if (loaded) {
      checkpoint = advanceCheckpoint(loaded, maxPostedDate, now());
      await checkpoints.save(checkpoint);
    }
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    status = err instanceof PipelineCancelledError ? 'cancelled' : 'failed';
    errors.push(message);
    logger.error(`${tag} Error: ${message}`, { error: err instanceof Error ? err.name : 'Error' });
  }

  const durationMs = performance.now() - start;
  logger.info(`${tag} ${status}: ${stats.written} written, ${stats.seen} already indexed`, {
    ...stats,
    durationMs: Math.round(durationMs),
  });

  return { dataset: config.id, status, stats, maxPostedDate, checkpoint, errors, durationMs };
}

/**
 * Run every dataset of a pipeline sequentially, then export its snapshots.
 * A failed dataset does not stop the others, and exports still run.
 */
export async function runPipeline(pipeline: PipelineDefinition, deps: RunDependencies): Promise<PipelineRunResult> {
  const { logger = defaultLogger } = deps;
  const start = performance.now();
  const datasets: DatasetRunResult[] = [];
  const exports: SnapshotExportResult[] = [];
  const warnings: string[] = [];

  for (const run of pipeline.datasets) {
    datasets.push(await runDataset(run, deps));
  }

  if (pipeline.snapshots.length > 0) {
    if (deps.signal?.aborted) {
      warnings.push('Run cancelled, snapshots not exported');
    } else if (!deps.storage) {
      warnings.push('Object storage is not configured, snapshots not exported');
    } else {
      const indexNames = Object.fromEntries(pipeline.datasets.map((run) => [run.config.id, run.config.indexName]));
      for (const target of pipeline.snapshots) {
        try {
          const exported = await exportSnapshot(target, { index: deps.index, storage: deps.storage, indexNames });
          exports.push(exported);
          logger.info(`[pipeline:${pipeline.id}] Exported ${exported.documents} documents to ${exported.key}`);
        } catch (err) {
          warnings.push(err instanceof Error ? err.message : String(err));
        }
      }
    }
  }

  for (const warning of warnings) {
    logger.warn(`[pipeline:${pipeline.id}] ${warning}`);
  }

  const failed = datasets.filter((result) => result.status === 'failed' || result.status === 'cancelled');
  const totalWritten = datasets.reduce((sum, result) => sum + result.stats.written, 0);

  logger.info(`[pipeline:${pipeline.id}] Done. ${totalWritten} listings written across ${datasets.length} datasets.`);
  if (failed.length > 0) {
    logger.error(`[pipeline:${pipeline.id}] ${failed.length} dataset(s) failed: ${failed.map((r) => r.dataset).join(', ')}`);
  }

  return {
    pipelineId: pipeline.id,
    datasets,
    exports,
    warnings,
    failedDatasets: failed.length,
    totalWritten,
    durationMs: performance.now() - start,
  };
}
