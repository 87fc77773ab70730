import type { CommitId } from './types.js';

export function formatCommitId(id: CommitId): string {
  return `${id.repository}@${id.hash}`;
}

/**
 * One side of a modified file is missing. The commit was mined badly and the
 * file cannot be counted.
 */
export class MissingSideError extends Error {
  readonly name = 'MissingSideError';
  readonly path: string;
  readonly side: 'before' | 'after';

  constructor(path: string, side: 'before' | 'after') {
    super(`${path}: ${side} side is missing for a modified file`);
    this.path = path;
    this.side = side;
    Object.setPrototypeOf(this, MissingSideError.prototype);
  }
}

/** File content could not be decoded as UTF-8 text. */
export class EncodingError extends Error {
  readonly name = 'EncodingError';
  readonly path: string;

  constructor(path: string, detail: string) {
    super(`${path}: ${detail}`);
    this.path = path;
    Object.setPrototypeOf(this, EncodingError.prototype);
  }
}

/** A non-merge commit produced no file pairs at all. */
export class ZeroFileCommitError extends Error {
  readonly name = 'ZeroFileCommitError';
  readonly commitId: CommitId;

  constructor(commitId: CommitId) {
    super(`${formatCommitId(commitId)}: no files were mined for a non-merge commit; re-mine it`);
    this.commitId = commitId;
    Object.setPrototypeOf(this, ZeroFileCommitError.prototype);
  }
}

/** A bug folder does not follow the `before/`, `after/`, `metadata.json` layout. */
export class DatasetLayoutError extends Error {
  readonly name = 'DatasetLayoutError';
  readonly folder: string;

  constructor(folder: string, detail: string) {
    super(`${folder}: ${detail}`);
    this.folder = folder;
    Object.setPrototypeOf(this, DatasetLayoutError.prototype);
  }
}

export class ConfigValidationError extends Error {
  readonly name = 'ConfigValidationError';
  readonly filePath: string | null;
  readonly validationErrors: string[];

  constructor(filePath: string | null, validationErrors: string[]) {
    const location = filePath ? ` at ${filePath}` : '';
    super(`Configuration is invalid${location}: ${validationErrors.join('; ')}`);
    this.filePath = filePath;
    this.validationErrors = validationErrors;
    Object.setPrototypeOf(this, ConfigValidationError.prototype);
  }
}

export class GitCommandError extends Error {
  readonly name = 'GitCommandError';
  readonly command: string;

  constructor(command: string, detail: string) {
    super(`${command} failed: ${detail}`);
    this.command = command;
    Object.setPrototypeOf(this, GitCommandError.prototype);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
