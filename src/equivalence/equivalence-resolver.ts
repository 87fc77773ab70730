import { computeHunks, hunkLineCount, joinLines, revertHunks, splitLines } from '../diff/line-diff.js';
import { commentKey, tokenize } from '../languages/lexer.js';
import { languageFor, type LanguageDefinition } from '../languages/registry.js';
import type { ChangeHunk, EquivalenceVerdict, NormalizedPair } from '../types.js';
import { canonicalCode, type CommentMode } from './canonical-form.js';
import { canonicalForm, propagateImportRuns } from './import-runs.js';

function commentKeys(text: string, language: LanguageDefinition): string {
  if (language.comments === null) return '';
  return tokenize(text, language.comments, language.strings, language.docstrings)
    .filter(segment => segment.kind === 'comment')
    .map(segment => commentKey(segment.text))
    .sort()
    .join('\n');
}

/**
 * Decides whether the remaining difference of a normalized pair is inert.
 *
 * The recognised patterns form a closed set, all expressed through
 * `canonicalForm`: import reordering, whitespace next to operators and
 * punctuation, and reindented multi-line string literals. Comments take part
 * in the comparison, so deleting one is a change; when both sides hold exactly
 * the same comments, moving one around is not. When the whole file
 * canonicalizes identically the pair is Equivalent and the before text stands.
 *
 * Otherwise each change unit is tested on its own lines. Inert units take the
 * before version, the rest are counted. A pair whose every unit is inert is
 * Equivalent too.
 */
export function resolveEquivalence(normalized: NormalizedPair): EquivalenceVerdict {
  const { pair, beforeNormalized, afterNormalized } = normalized;
  const language = languageFor(pair.path);
  const equivalent: EquivalenceVerdict = { kind: 'Equivalent', path: pair.path, changeUnits: 0 };

  if (beforeNormalized === afterNormalized) return equivalent;

  const mode: CommentMode =
    commentKeys(beforeNormalized, language) === commentKeys(afterNormalized, language) ? 'drop' : 'keep';
  if (canonicalForm(beforeNormalized, language, mode) === canonicalForm(afterNormalized, language, mode)) {
    return equivalent;
  }

  const before = splitLines(beforeNormalized);
  const after = propagateImportRuns(before, splitLines(afterNormalized), language);
  const hunks = computeHunks(before, after);
  const inert = inertHunks(after, hunks, language, mode);

  const counted = computeHunks(before, revertHunks(after, hunks, inert));
  if (counted.length === 0) return equivalent;

  return {
    kind: 'Distinct',
    path: pair.path,
    changeUnits: counted.length,
    changedLines: counted.reduce((sum, hunk) => sum + hunkLineCount(hunk), 0),
    hunks: counted,
  };
}

/**
 * Hunks whose deleted and added lines canonicalize alike. A fragment read on
 * its own can be misread (a hunk inside a multi-line literal), so the choice
 * is confirmed on the whole file; if that fails each candidate is confirmed
 * separately.
 */
function inertHunks(
  after: string[],
  hunks: ChangeHunk[],
  language: LanguageDefinition,
  mode: CommentMode
): Set<ChangeHunk> {
  const candidates = hunks.filter(hunk =>
    canonicalCode(hunk.deleted.join('\n'), language, mode) === canonicalCode(hunk.added.join('\n'), language, mode));
  if (candidates.length === 0) return new Set();

  const target = canonicalForm(joinLines(after, false), language, mode);
  const keepsTarget = (chosen: Set<ChangeHunk>) =>
    canonicalForm(joinLines(revertHunks(after, hunks, chosen), false), language, mode) === target;

  const all = new Set(candidates);
  if (keepsTarget(all)) return all;
  return new Set(candidates.filter(hunk => keepsTarget(new Set([hunk]))));
}
