export class TransientNetworkError extends Error {
  readonly url: string;
  readonly status?: number;
  readonly attempts: number;

  constructor(url: string, attempts: number, status?: number, cause?: unknown) {
    super(
      status === undefined
        ? `Request to ${url} failed after ${attempts} attempt(s)`
        : `Request to ${url} failed with status ${status} after ${attempts} attempt(s)`,
      { cause },
    );
    this.name = 'TransientNetworkError';
    this.url = url;
    this.status = status;
    this.attempts = attempts;
  }
}

export class ChallengeBlockedError extends Error {
  readonly url: string;
  readonly attempts: number;

  constructor(url: string, attempts: number) {
    super(`Blocked by anti-bot challenge at ${url} after ${attempts} attempt(s)`);
    this.name = 'ChallengeBlockedError';
    this.url = url;
    this.attempts = attempts;
  }
}

export class PermanentHttpError extends Error {
  readonly url: string;
  readonly status: number;

  constructor(url: string, status: number) {
    super(`Request to ${url} failed with status ${status}`);
    this.name = 'PermanentHttpError';
    this.url = url;
    this.status = status;
  }
}

export class RecordParseError extends Error {
  readonly identifier: string;

  constructor(identifier: string, message: string, cause?: unknown) {
    super(`Failed to parse record ${identifier}: ${message}`, { cause });
    this.name = 'RecordParseError';
    this.identifier = identifier;
  }
}

export class IndexWriteError extends Error {
  readonly identifier: string;
  readonly attempts: number;

  constructor(identifier: string, attempts: number, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Index write failed for ${identifier} after ${attempts} attempt(s): ${reason}`, { cause });
    this.name = 'IndexWriteError';
    this.identifier = identifier;
    this.attempts = attempts;
  }
}

export class ExportError extends Error {
  readonly key: string;

  constructor(key: string, message: string, cause?: unknown) {
    super(`Snapshot export to ${key} failed: ${message}`, { cause });
    this.name = 'ExportError';
    this.key = key;
  }
}

export class CheckpointIOError extends Error {
  readonly dataset: string;
  readonly path: string;

  constructor(dataset: string, path: string, message: string, cause?: unknown) {
    super(`Checkpoint for ${dataset} at ${path}: ${message}`, { cause });
    this.name = 'CheckpointIOError';
    this.dataset = dataset;
    this.path = path;
  }
}

export class PipelineCancelledError extends Error {
  readonly dataset: string;

  constructor(dataset: string) {
    super(`Run for ${dataset} was cancelled`);
    this.name = 'PipelineCancelledError';
    this.dataset = dataset;
  }
}
