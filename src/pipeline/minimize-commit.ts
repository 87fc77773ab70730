import { resolveEquivalence } from '../equivalence/equivalence-resolver.js';
import { errorMessage } from '../errors.js';
import { classify } from '../filters/file-classifier.js';
import { normalizePair } from '../normalizers/cosmetic-normalizer.js';
import { comparePaths, countChanges } from '../scoring/change-counter.js';
import type {
  ChangeRecord,
  Commit,
  EquivalenceVerdict,
  ExcludedFile,
  PipelineWarning,
} from '../types.js';

export interface MinimizedCommit {
  records: ChangeRecord[];
  excluded: ExcludedFile[];
  /** Included paths whose remaining difference was inert. */
  equivalent: string[];
  warnings: PipelineWarning[];
}

/**
 * Runs classify → normalize → resolve → count over every pair of a commit.
 * Pure: the same commit always yields the same result. A pair that fails in
 * any stage is skipped with a `file-error` warning; the rest still count.
 */
export function minimizeCommit(commit: Commit): MinimizedCommit {
  const excluded: ExcludedFile[] = [];
  const warnings: PipelineWarning[] = [];
  const verdicts: EquivalenceVerdict[] = [];

  const pairs = [...commit.pairs].sort((a, b) => comparePaths(a.path, b.path));

  for (const pair of pairs) {
    try {
      const outcome = classify(pair, { bugIsInTestCode: commit.bugIsInTestCode });
      if (outcome.kind === 'Excluded') {
        excluded.push({ path: pair.path, reason: outcome.reason });
        continue;
      }

      const normalized = normalizePair(pair);
      const verdict = resolveEquivalence(normalized);
      if (normalized.ambiguousLanguage) {
        warnings.push({
          kind: 'ambiguous-language',
          path: pair.path,
          message: `${pair.path}: no comment syntax known, comments were kept`,
        });
      }
      verdicts.push(verdict);
    } catch (err) {
      if (process.env.DEBUG) console.error(err);
      warnings.push({ kind: 'file-error', path: pair.path, message: `${pair.path}: ${errorMessage(err)}` });
    }
  }

  return {
    records: countChanges(commit, verdicts),
    excluded,
    equivalent: verdicts.flatMap(v => (v.kind === 'Equivalent' ? [v.path] : [])),
    warnings,
  };
}
