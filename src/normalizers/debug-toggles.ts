import { alignLines } from '../diff/line-diff.js';
import type { LanguageDefinition } from '../languages/registry.js';

function uncomment(line: string, markers: string[]): string | null {
  const trimmed = line.trim();
  for (const marker of markers) {
    if (trimmed.startsWith(marker)) return trimmed.slice(marker.length).trim();
  }
  return null;
}

/**
 * Debug statements that were only commented out (or back in) between the two
 * versions are not functional changes. Such after-lines take their before
 * form again. Only lines the alignment leaves unmatched are considered.
 */
export function restoreToggledDebugStatements(
  before: string[],
  after: string[],
  language: LanguageDefinition
): string[] {
  const debug = language.debugStatements;
  const markers = language.comments?.line ?? [];
  if (!debug || markers.length === 0) return after;

  const matches = alignLines(before, after);
  const matchedBefore = new Set(matches.map(([bi]) => bi));
  const matchedAfter = new Set(matches.map(([, ai]) => ai));

  // trimmed statement → before line, split by whether before had it commented
  const activeBefore = new Map<string, string>();
  const commentedBefore = new Map<string, string>();

  before.forEach((line, index) => {
    if (matchedBefore.has(index)) return;
    const body = uncomment(line, markers);
    if (body !== null) {
      if (debug.test(body)) commentedBefore.set(body, line);
    } else if (debug.test(line)) {
      activeBefore.set(line.trim(), line);
    }
  });

  if (activeBefore.size === 0 && commentedBefore.size === 0) return after;

  return after.map((line, index) => {
    if (matchedAfter.has(index)) return line;
    const body = uncomment(line, markers);
    if (body !== null) return activeBefore.get(body) ?? line;
    return commentedBefore.get(line.trim()) ?? line;
  });
}
