import { existsSync, readdirSync, statSync } from 'fs';
import { readFile } from 'fs/promises';
import { basename, join } from 'path';
import { z } from 'zod';
import { type FixtrimConfig, repositoryConfig } from '../config/config.js';
import { DatasetLayoutError, MissingSideError, ZeroFileCommitError, errorMessage } from '../errors.js';
import { describePair } from '../filters/file-classifier.js';
import type { CommitId, FileStatus, LoadedCommit, PipelineWarning, RawFilePair } from '../types.js';
import { decodePair, isEmptyView, type RenderedViewProvider, resolveSourceState } from './fallback.js';
import { readTree } from './file-tree.js';

export const METADATA_FILE = 'metadata.json';

const metadataSchema = z.object({
  id: z.union([z.number(), z.string()]).optional(),
  human_id: z.string().optional(),
  project_name: z.string().optional(),
  commit_hash: z.string().optional(),
  parents: z.array(z.string()).optional(),
  bug_in_test_code: z.boolean().optional(),
  files: z.array(z.object({
    path: z.string(),
    status: z.enum(['added', 'deleted', 'modified']),
  })).optional(),
}).passthrough();

export interface BugFolder {
  project: string;
  name: string;
  dir: string;
}

function listDirs(dir: string): string[] {
  return readdirSync(dir)
    .filter(name => !name.startsWith('.') && statSync(join(dir, name)).isDirectory())
    .sort();
}

/**
 * Lists `<root>/<project>/<bug-folder>` entries that hold a `metadata.json`.
 * `root` may also point at a single project or a single bug folder.
 */
export function listBugFolders(root: string, projectFilter: string | null = null): BugFolder[] {
  if (!existsSync(root)) throw new DatasetLayoutError(root, 'dataset folder not found');

  if (existsSync(join(root, METADATA_FILE))) {
    const dir = root.replace(/\/+$/, '');
    return [{ project: basename(join(dir, '..')), name: basename(dir), dir }];
  }

  const folders: BugFolder[] = [];
  const isProject = listDirs(root).some(name => existsSync(join(root, name, METADATA_FILE)));
  const projects = isProject ? [root] : listDirs(root).map(name => join(root, name));

  for (const projectDir of projects) {
    const project = basename(projectDir);
    if (projectFilter && project !== projectFilter) continue;
    for (const name of listDirs(projectDir)) {
      const dir = join(projectDir, name);
      if (existsSync(join(dir, METADATA_FILE))) folders.push({ project, name, dir });
    }
  }
  return folders;
}

async function readMetadata(folder: BugFolder) {
  const path = join(folder.dir, METADATA_FILE);
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf8'));
  } catch (err) {
    throw new DatasetLayoutError(folder.dir, `unreadable ${METADATA_FILE}: ${errorMessage(err)}`);
  }
  const parsed = metadataSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new DatasetLayoutError(folder.dir, `invalid ${METADATA_FILE}: ${issues}`);
  }
  return parsed.data;
}

function inferStatus(hasBefore: boolean, hasAfter: boolean): FileStatus {
  if (!hasBefore) return 'added';
  if (!hasAfter) return 'deleted';
  return 'modified';
}

export interface LoadOptions {
  config: FixtrimConfig;
  fallback: RenderedViewProvider | null;
}

/**
 * Loads one bug folder into a Commit.
 *
 * Files that cannot be decoded, or modified files with a missing side, are
 * skipped and reported as warnings. A merge commit with nothing mined goes
 * through the rendered-view fallback; a non-merge commit with nothing mined
 * throws ZeroFileCommitError.
 */
export async function loadCommit(folder: BugFolder, options: LoadOptions): Promise<LoadedCommit> {
  const metadata = await readMetadata(folder);
  const commitId: CommitId = {
    repository: metadata.project_name ?? folder.project,
    hash: metadata.commit_hash ?? folder.name,
  };
  const parents = metadata.parents ?? [];
  const repo = repositoryConfig(options.config, folder.project);
  const warnings: PipelineWarning[] = [];

  const beforeTree = await readTree(join(folder.dir, 'before'));
  const afterTree = await readTree(join(folder.dir, 'after'));
  const declared = new Map((metadata.files ?? []).map(f => [f.path, f.status]));

  const paths = options.config.pairing === 'common-only'
    ? [...beforeTree.keys()].filter(path => afterTree.has(path))
    : [...new Set([...beforeTree.keys(), ...afterTree.keys()])];
  paths.sort();

  let raws: RawFilePair[] = [];
  for (const path of paths) {
    const before = beforeTree.get(path);
    const after = afterTree.get(path);
    const status = declared.get(path) ?? inferStatus(before !== undefined, after !== undefined);
    if (status === 'modified' && (before === undefined || after === undefined)) {
      const error = new MissingSideError(path, before === undefined ? 'before' : 'after');
      warnings.push({ kind: 'missing-side', path, message: error.message });
      continue;
    }
    const raw = decodePair(path, status, before, after, warnings);
    if (raw) raws.push(raw);
  }

  const minedCount = beforeTree.size + afterTree.size;
  const sourceState = resolveSourceState(parents.length, minedCount);

  if (sourceState === 'FallbackRequired') {
    if (!options.fallback) {
      throw new DatasetLayoutError(folder.dir, 'merge commit without mined files and no rendered-view provider');
    }
    const view = await options.fallback.render({ commitId, parents, folder: folder.dir });
    if (isEmptyView(view)) {
      throw new DatasetLayoutError(folder.dir, `merge commit: ${options.fallback.name} rendered no files`);
    }
    raws = view.pairs;
    warnings.push(...view.warnings);
  } else if (minedCount === 0) {
    throw new ZeroFileCommitError(commitId);
  }

  const humanId = metadata.human_id ?? folder.name;
  const bugIsInTestCode = metadata.bug_in_test_code
    ?? (repo.bugIsInTestCode.has(folder.name) || repo.bugIsInTestCode.has(humanId));

  return {
    commit: {
      id: commitId,
      humanId,
      parents,
      bugIsInTestCode,
      pairs: raws.map(raw => describePair(raw, repo.rules)),
      metadata,
    },
    sourceState,
    warnings,
  };
}
