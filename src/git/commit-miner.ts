import { execFileSync } from 'child_process';
import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { METADATA_FILE } from '../dataset/dataset-source.js';
import { encodeFileName } from '../dataset/file-tree.js';
import { GitCommandError, errorMessage } from '../errors.js';
import type { FileStatus } from '../types.js';

export interface ChangedFile {
  path: string;
  status: FileStatus;
}

export interface MinedFile extends ChangedFile {
  before?: Buffer;
  after?: Buffer;
}

export interface MinedCommit {
  hash: string;
  parents: string[];
  files: MinedFile[];
}

const REVISION = /^[\w./^~@{}-]+$/;

function git(cwd: string, args: string[]): Buffer {
  try {
    return execFileSync('git', args, {
      cwd,
      encoding: 'buffer',
      maxBuffer: 200 * 1024 * 1024,
      stdio: ['ignore', 'pipe', 'pipe'],
    });
  } catch (err) {
    throw new GitCommandError(`git ${args.join(' ')}`, errorMessage(err));
  }
}

function assertRevision(rev: string): void {
  if (!REVISION.test(rev)) throw new GitCommandError('git', `not a revision: ${rev}`);
}

/** Parses `git rev-list --parents -n 1 <rev>`: the commit hash followed by its parents. */
export function parseParents(output: string): { hash: string; parents: string[] } {
  const [hash = '', ...parents] = output.trim().split(/\s+/).filter(Boolean);
  return { hash, parents };
}

/**
 * Parses NUL-separated `--name-status -z` output.
 * A rename or copy becomes a deletion of the old path (renames only) and an
 * addition of the new one; a type change counts as a modification.
 */
export function parseNameStatus(output: string): ChangedFile[] {
  const fields = output.split('\0');
  const files: ChangedFile[] = [];

  for (let i = 0; i < fields.length; i++) {
    const code = fields[i] ?? '';
    if (code === '') continue;
    const kind = code.charAt(0);

    if (kind === 'R' || kind === 'C') {
      const from = fields[++i] ?? '';
      const to = fields[++i] ?? '';
      if (kind === 'R') files.push({ path: from, status: 'deleted' });
      files.push({ path: to, status: 'added' });
      continue;
    }

    const path = fields[++i] ?? '';
    if (!path) continue;
    if (kind === 'A') files.push({ path, status: 'added' });
    else if (kind === 'D') files.push({ path, status: 'deleted' });
    else files.push({ path, status: 'modified' });
  }

  return files.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}

function showBlob(repo: string, rev: string, path: string): Buffer {
  return git(repo, ['show', `${rev}:${path}`]);
}

/** Reads both sides of every changed file between `from` and `to`. */
export function readChangedFiles(repo: string, from: string, to: string): MinedFile[] {
  assertRevision(from);
  assertRevision(to);
  const output = git(repo, ['diff', '--name-status', '-z', '-r', '--no-renames', from, to]).toString('utf8');

  return parseNameStatus(output).map(file => ({
    ...file,
    before: file.status === 'added' ? undefined : showBlob(repo, from, file.path),
    after: file.status === 'deleted' ? undefined : showBlob(repo, to, file.path),
  }));
}

/**
 * Mines one commit of a local clone against its first parent.
 *
 * Merge commits yield no files, as with `git diff-tree` without `-m`; the
 * dataset reader sends those through the rendered-view fallback.
 */
export function mineCommit(repo: string, rev: string): MinedCommit {
  assertRevision(rev);
  const { hash, parents } = parseParents(git(repo, ['rev-list', '--parents', '-n', '1', rev]).toString('utf8'));
  if (!hash) throw new GitCommandError(`git rev-list ${rev}`, 'no such commit');

  const first = parents[0];
  if (parents.length > 1) return { hash, parents, files: [] };
  if (first === undefined) {
    const listed = git(repo, ['diff-tree', '--root', '--no-commit-id', '--name-status', '-z', '-r', hash]).toString('utf8');
    const files = parseNameStatus(listed).map(file => ({ ...file, after: showBlob(repo, hash, file.path) }));
    return { hash, parents, files };
  }
  return { hash, parents, files: readChangedFiles(repo, first, hash) };
}

export interface MaterializeOptions {
  project: string;
  humanId: string;
  bugIsInTestCode?: boolean;
}

/**
 * Writes a mined commit in the dataset layout:
 * `<dir>/before/<flattened path>`, `<dir>/after/<flattened path>` and
 * `<dir>/metadata.json`. Returns the bug folder path.
 */
export function materializeCommit(mined: MinedCommit, outRoot: string, options: MaterializeOptions): string {
  const dir = join(outRoot, options.project, options.humanId);
  const beforeDir = join(dir, 'before');
  const afterDir = join(dir, 'after');
  mkdirSync(beforeDir, { recursive: true });
  mkdirSync(afterDir, { recursive: true });

  for (const file of mined.files) {
    const name = encodeFileName(file.path);
    if (file.before) writeFileSync(join(beforeDir, name), file.before);
    if (file.after) writeFileSync(join(afterDir, name), file.after);
  }

  const metadata = {
    human_id: options.humanId,
    project_name: options.project,
    commit_hash: mined.hash,
    parents: mined.parents,
    ...(options.bugIsInTestCode === undefined ? {} : { bug_in_test_code: options.bugIsInTestCode }),
    files: mined.files.map(({ path, status }) => ({ path, status })),
  };
  writeFileSync(join(dir, METADATA_FILE), `${JSON.stringify(metadata, null, 2)}\n`);
  return dir;
}
