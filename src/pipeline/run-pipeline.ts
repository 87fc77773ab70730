import dayjs from 'dayjs';
import type { FixtrimConfig } from '../config/config.js';
import { type BugFolder, loadCommit } from '../dataset/dataset-source.js';
import type { RenderedViewProvider } from '../dataset/fallback.js';
import { errorMessage } from '../errors.js';
import { summarizeProjects, totalOf } from '../scoring/commit-aggregator.js';
import { sumRecords } from '../scoring/change-counter.js';
import type { CommitResult, CommitStatus, LoadedCommit, PipelineWarning, Report } from '../types.js';
import { type MinimizedCommit, minimizeCommit } from './minimize-commit.js';
import { mapWithConcurrency } from './pool.js';

export interface PipelineOptions {
  config: FixtrimConfig;
  fallback: RenderedViewProvider | null;
  /** Called once per commit as it finishes, in completion order. */
  onProgress?: (result: CommitResult, done: number, total: number) => void;
}

function statusOf(warnings: PipelineWarning[]): CommitStatus {
  return warnings.length > 0 ? { kind: 'PartialWithWarnings', warnings } : { kind: 'Ok' };
}

function failedResult(folder: BugFolder, reason: string): CommitResult {
  return {
    commitId: { repository: folder.project, hash: folder.name },
    humanId: folder.name,
    status: { kind: 'Failed', reason },
    sourceState: null,
    records: [],
    excluded: [],
    equivalent: [],
    totals: { changeUnits: 0, changedLines: 0, files: 0 },
    metadata: {},
  };
}

/** Loads and minimizes one bug folder. Any failure becomes a Failed result. */
export async function processFolder(folder: BugFolder, options: PipelineOptions): Promise<CommitResult> {
  let loaded: LoadedCommit;
  try {
    loaded = await loadCommit(folder, { config: options.config, fallback: options.fallback });
  } catch (err) {
    if (process.env.DEBUG) console.error(err);
    return failedResult(folder, errorMessage(err));
  }

  const { commit, sourceState } = loaded;
  let minimized: MinimizedCommit;
  try {
    minimized = minimizeCommit(commit);
  } catch (err) {
    if (process.env.DEBUG) console.error(err);
    return { ...failedResult(folder, errorMessage(err)), commitId: commit.id, humanId: commit.humanId, metadata: commit.metadata };
  }
  const warnings = [...loaded.warnings, ...minimized.warnings];

  return {
    commitId: commit.id,
    humanId: commit.humanId,
    status: statusOf(warnings),
    sourceState,
    records: minimized.records,
    excluded: minimized.excluded,
    equivalent: minimized.equivalent,
    totals: sumRecords(minimized.records),
    metadata: commit.metadata,
  };
}

/**
 * Processes every bug folder through a bounded pool and assembles the report.
 * Commit results keep the order of `folders`.
 */
export async function runPipeline(
  dataset: string,
  folders: BugFolder[],
  options: PipelineOptions
): Promise<Report> {
  let done = 0;
  const commits = await mapWithConcurrency(folders, options.config.concurrency, async folder => {
    const result = await processFolder(folder, options);
    done++;
    options.onProgress?.(result, done, folders.length);
    return result;
  });

  return {
    meta: {
      dataset,
      commitCount: commits.length,
      failedCount: commits.filter(c => c.status.kind === 'Failed').length,
      analyzedAt: dayjs().toISOString(),
    },
    commits,
    projects: summarizeProjects(commits),
    totals: totalOf(commits),
  };
}
