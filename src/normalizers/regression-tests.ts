import { alignLines } from '../diff/line-diff.js';
import type { LanguageDefinition } from '../languages/registry.js';

const CLOSING_LINE = /^\s*[}\])]+[;,)]*\s*$/;
const DECORATOR_LINE = /^\s*(?:@|\[)/;

function indentOf(line: string): number {
  return line.length - line.trimStart().length;
}

/**
 * Removes test cases that exist only in the after version of a test file.
 *
 * A test case starts at an unmatched line matching one of the language's test
 * declarations (together with unmatched decorators right above it) and runs
 * over the following unmatched lines: its signature, the body indented deeper,
 * the closing bracket at the declaration's indentation, blank lines and any
 * further new test cases.
 */
export function removeNewTestCases(
  before: string[],
  after: string[],
  language: LanguageDefinition
): string[] {
  if (language.testDeclarations.length === 0) return after;

  const matchedAfter = new Set(alignLines(before, after).map(([, ai]) => ai));
  const isTestDeclaration = (line: string) => language.testDeclarations.some(re => re.test(line));
  const drop = new Set<number>();

  let i = 0;
  while (i < after.length) {
    const line = after[i] ?? '';
    if (matchedAfter.has(i) || !isTestDeclaration(line)) {
      i++;
      continue;
    }

    let start = i;
    while (start > 0 && !matchedAfter.has(start - 1) && DECORATOR_LINE.test(after[start - 1] ?? '')) {
      start--;
    }

    const declIndent = indentOf(line);
    let opened = false;
    let end = i + 1;
    while (end < after.length && !matchedAfter.has(end)) {
      const next = after[end] ?? '';
      if (next.trim() === '' || isTestDeclaration(next)) {
        end++;
        continue;
      }
      if (indentOf(next) > declIndent) {
        opened = true;
        end++;
        continue;
      }
      // Signature lines and the opening brace before the body starts.
      if (!opened && !CLOSING_LINE.test(next)) {
        end++;
        continue;
      }
      if (CLOSING_LINE.test(next) && indentOf(next) === declIndent) {
        end++;
      }
      break;
    }

    for (let k = start; k < end; k++) drop.add(k);
    i = end;
  }

  return drop.size === 0 ? after : after.filter((_, index) => !drop.has(index));
}
