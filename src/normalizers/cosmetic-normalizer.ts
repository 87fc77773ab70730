import { hasTrailingNewline, joinLines, splitLines } from '../diff/line-diff.js';
import type { FilePair, NormalizedPair } from '../types.js';
import { restoreToggledDebugStatements } from './debug-toggles.js';
import { removeNewTestCases } from './regression-tests.js';
import { strategyFor } from './strategy.js';

/**
 * Strips cosmetic noise from the after side of an included pair.
 *
 * The before text is never altered. On the after side, in order:
 *   1. debug statements merely commented out/in take their before form
 *   2. comments (and docstrings) that the before text does not contain go
 *   3. wholly new test cases in test files go
 *   4. blank lines the before text does not account for go
 *
 * Unknown languages skip step 2 and are reported as ambiguous.
 */
export function normalizePair(pair: FilePair): NormalizedPair {
  const strategy = strategyFor(pair.path);
  const before = pair.beforeText ?? '';
  const after = pair.afterText ?? '';
  const beforeLines = splitLines(before);

  let afterLines = restoreToggledDebugStatements(beforeLines, splitLines(after), strategy.language);

  if (strategy.comments) {
    const known = strategy.comments.collect(before);
    const stripped = strategy.comments.strip(joinLines(afterLines, true), key => known.has(key));
    afterLines = splitLines(stripped);
  }

  if (pair.isTestFile) {
    afterLines = pair.beforeText === undefined
      ? []
      : removeNewTestCases(beforeLines, afterLines, strategy.language);
  }

  afterLines = strategy.blankLines.strip(beforeLines, afterLines);

  return {
    pair,
    beforeNormalized: before,
    afterNormalized: joinLines(afterLines, hasTrailingNewline(after)),
    ambiguousLanguage: strategy.ambiguous,
  };
}
