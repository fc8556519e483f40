import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { CheckpointIOError, type DateWindow } from '@harvest/parser-sdk';
import type { Checkpoint, CheckpointStore } from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const ISO_DAY = /^\d{4}-\d{2}-\d{2}$/;

const checkpointFileSchema = z.object({
  dataset: z.string().min(1),
  lastSeenMaxDate: z.string().regex(ISO_DAY).nullable(),
  bufferDays: z.number().int().nonnegative(),
  updatedAt: z.string().nullable().default(null),
});

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function emptyCheckpoint(dataset: string, bufferDays: number): Checkpoint {
  return { dataset, lastSeenMaxDate: null, bufferDays, updatedAt: null };
}

function shiftDays(day: string, days: number): string {
  const base = Date.parse(`${day}T00:00:00Z`);
  return new Date(base + days * DAY_MS).toISOString().slice(0, 10);
}

/**
 * Lower bound of the next date window: last seen max date minus the buffer.
 * Null before the first successful run.
 */
export function computeLowerBound(checkpoint: Checkpoint): string | null {
  if (!checkpoint.lastSeenMaxDate) return null;
  return shiftDays(checkpoint.lastSeenMaxDate, -checkpoint.bufferDays);
}

/**
 * Date window for the next run, ending `today`. Without a checkpoint the window
 * reaches back `lookbackDays`, or stays open when none is configured.
 */
export function computeWindow(checkpoint: Checkpoint, today: string, lookbackDays?: number): DateWindow {
  const from = computeLowerBound(checkpoint) ?? (lookbackDays ? shiftDays(today, -lookbackDays) : null);
  return { from: from !== null && from > today ? today : from, to: today };
}

/**
 * Move the checkpoint forward to `runMaxDate`. Never moves it backwards.
 */
export function advanceCheckpoint(checkpoint: Checkpoint, runMaxDate: string | null, now: Date): Checkpoint {
  const current = checkpoint.lastSeenMaxDate;
  const next = runMaxDate && (!current || runMaxDate > current) ? runMaxDate : current;

  return { ...checkpoint, lastSeenMaxDate: next, updatedAt: now.toISOString() };
}

/**
 * One JSON file per dataset under a directory. Writes go to a temp file that
 * is then renamed over the previous checkpoint.
 */
export class FileCheckpointStore implements CheckpointStore {
  constructor(private readonly directory: string) {}

  pathFor(dataset: string): string {
    return join(this.directory, `${dataset.replace(/[^a-zA-Z0-9._-]/g, '_')}.json`);
  }

  async load(dataset: string, bufferDays: number): Promise<Checkpoint> {
    const path = this.pathFor(dataset);

    let raw: string;
    try {
      raw = await readFile(path, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return emptyCheckpoint(dataset, bufferDays);
      }
      throw new CheckpointIOError(dataset, path, `read failed: ${errorMessage(error)}`, error);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new CheckpointIOError(dataset, path, 'file is not valid JSON', error);
    }

    const parsed = checkpointFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new CheckpointIOError(dataset, path, `unexpected content: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }

    return { ...parsed.data, dataset, bufferDays };
  }

  async save(checkpoint: Checkpoint): Promise<void> {
    const path = this.pathFor(checkpoint.dataset);
    const tempPath = `${path}.${process.pid}.tmp`;

    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(tempPath, `${JSON.stringify(checkpoint, null, 2)}\n`, 'utf8');
      await rename(tempPath, path);
    } catch (error) {
      throw new CheckpointIOError(checkpoint.dataset, path, `write failed: ${errorMessage(error)}`, error);
    }
  }
}
