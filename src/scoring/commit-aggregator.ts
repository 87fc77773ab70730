import type { CommitResult, CommitTotals, ProjectSummary } from '../types.js';
import { comparePaths } from './change-counter.js';

const ZERO: CommitTotals = { changeUnits: 0, changedLines: 0, files: 0 };

function add(a: CommitTotals, b: CommitTotals): CommitTotals {
  return {
    changeUnits: a.changeUnits + b.changeUnits,
    changedLines: a.changedLines + b.changedLines,
    files: a.files + b.files,
  };
}

/**
 * Sums commit totals per project. Failed commits are counted but contribute
 * nothing, so a partial dataset never looks complete.
 *
 * Returns: ProjectSummary[] sorted by project name
 */
export function summarizeProjects(results: CommitResult[]): ProjectSummary[] {
  const byProject = new Map<string, ProjectSummary>();

  for (const result of results) {
    const project = result.commitId.repository;
    const existing = byProject.get(project) ?? {
      project,
      commitCount: 0,
      failedCount: 0,
      ...ZERO,
    };
    const failed = result.status.kind === 'Failed';
    const totals = failed ? ZERO : result.totals;

    byProject.set(project, {
      project,
      commitCount: existing.commitCount + 1,
      failedCount: existing.failedCount + (failed ? 1 : 0),
      ...add(existing, totals),
    });
  }

  return [...byProject.values()].sort((a, b) => comparePaths(a.project, b.project));
}

export function totalOf(results: CommitResult[]): CommitTotals {
  return results
    .filter(r => r.status.kind !== 'Failed')
    .reduce((acc, r) => add(acc, r.totals), ZERO);
}
