import type {
  ChangeHunk,
  ChangeRecord,
  Commit,
  CommitTotals,
  CountedHunk,
  EquivalenceVerdict,
} from '../types.js';

/** Code-point order, independent of locale. */
export function comparePaths(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/** Identity of an edit pattern: its trimmed deleted and added lines. */
export function hunkSignature(hunk: ChangeHunk): string {
  return JSON.stringify([hunk.deleted.map(line => line.trim()), hunk.added.map(line => line.trim())]);
}

/**
 * Emits one ChangeRecord per Distinct verdict, in path order.
 *
 * Walking records by path and each record's units by position, a unit whose
 * signature has already been seen is marked repeated, and so is its record.
 * Repeated units still count.
 */
export function countChanges(commit: Commit, verdicts: EquivalenceVerdict[]): ChangeRecord[] {
  const distinct = verdicts
    .flatMap(v => (v.kind === 'Distinct' ? [v] : []))
    .sort((a, b) => comparePaths(a.path, b.path));

  const seen = new Set<string>();
  const records: ChangeRecord[] = [];

  for (const verdict of distinct) {
    const hunks: CountedHunk[] = verdict.hunks.map(hunk => {
      const signature = hunkSignature(hunk);
      const repeated = seen.has(signature);
      seen.add(signature);
      return { ...hunk, signature, repeated };
    });

    records.push({
      commitId: commit.id,
      path: verdict.path,
      changeUnits: verdict.changeUnits,
      changedLines: verdict.changedLines,
      repeatedElsewhere: hunks.some(h => h.repeated),
      hunks,
    });
  }

  return records;
}

export function sumRecords(records: ChangeRecord[]): CommitTotals {
  return {
    changeUnits: records.reduce((sum, r) => sum + r.changeUnits, 0),
    changedLines: records.reduce((sum, r) => sum + r.changedLines, 0),
    files: records.length,
  };
}
