import type { PipelineDefinition } from '@harvest/ingestion';
import { openDataParser } from '@harvest/parser-open-data';
import { propertiesParser } from '@harvest/parser-properties';
import { createDatasetClient, type Parser, type PipelineConfig, type ScrapeClientOptions } from '@harvest/parser-sdk';
import { vehiclesParser } from '@harvest/parser-vehicles';
import type { Logger } from 'pino';

const allParsers: Parser[] = [vehiclesParser, propertiesParser, openDataParser];

function buildParserMap(parsers: Parser[]): Map<string, Parser> {
  const parserMap = new Map<string, Parser>();

  for (const parser of parsers) {
    if (parserMap.has(parser.manifest.id)) {
      throw new Error(`Duplicate parser id: ${parser.manifest.id}`);
    }

    parserMap.set(parser.manifest.id, parser);
  }

  return parserMap;
}

const parserMap = buildParserMap(allParsers);

export function getParserIds(): string[] {
  return [...parserMap.keys()];
}

export function getParserById(parserId: string): Parser {
  const parser = parserMap.get(parserId);
  if (!parser) {
    throw new Error(`Unknown parser id: ${parserId}`);
  }

  return parser;
}

export function findPipeline(pipelines: readonly PipelineConfig[], pipelineId: string): PipelineConfig {
  const pipeline = pipelines.find((candidate) => candidate.id === pipelineId);
  if (!pipeline) {
    throw new Error(`Unknown pipeline id: ${pipelineId}`);
  }

  return pipeline;
}

export interface BuildPipelineOptions {
  logger?: Logger;
  clientOptions?: ScrapeClientOptions;
}

/**
 * Resolve a configured pipeline into runnable datasets, one HTTP client per
 * dataset. Retries are logged with the dataset they belong to.
 */
export function buildPipeline(config: PipelineConfig, options: BuildPipelineOptions = {}): PipelineDefinition {
  const parser = getParserById(config.parser);

  return {
    id: config.id,
    snapshots: config.snapshots,
    datasets: config.datasets.map((dataset) => ({
      config: dataset,
      parser,
      client: createDatasetClient(dataset, {
        ...options.clientOptions,
        onRetry: (event) => {
          options.logger?.warn(
            {
              event: 'request_retry',
              pipelineId: config.id,
              datasetId: dataset.id,
              url: event.url,
              reason: event.reason,
              retry: event.retry,
              waitMs: event.waitMs,
              status: event.status,
              purpose: event.context.purpose,
              identifier: event.context.identifier,
            },
            'Retrying request',
          );
        },
      }),
    })),
  };
}
