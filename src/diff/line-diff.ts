import type { ChangeHunk } from '../types.js';

/**
 * Splits text into lines. A trailing newline does not produce an empty last
 * line and `\r\n` endings are folded into `\n`.
 */
export function splitLines(text: string): string[] {
  if (text === '') return [];
  const lines = text.split('\n').map(line => (line.endsWith('\r') ? line.slice(0, -1) : line));
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

export function joinLines(lines: string[], trailingNewline: boolean): string {
  if (lines.length === 0) return '';
  return lines.join('\n') + (trailingNewline ? '\n' : '');
}

export function hasTrailingNewline(text: string): boolean {
  return text.endsWith('\n');
}

/** Regions whose LCS table would exceed this many cells are aligned on unique lines. */
export const MAX_TABLE_CELLS = 16_000_000;

/**
 * Longest-common-subsequence alignment of two line arrays.
 *
 * Returns matched index pairs `[beforeIndex, afterIndex]` in increasing order.
 * Ties are broken by preferring to consume before lines first, so the result
 * only depends on the inputs.
 *
 * A region too large for the table is split at lines that occur exactly once
 * on each side (longest increasing run of such pairs), and the gaps between
 * them are aligned on their own. A region without such lines stays unmatched.
 */
export function alignLines(before: string[], after: string[]): Array<[number, number]> {
  const matches: Array<[number, number]> = [];
  alignRange(before, 0, before.length, after, 0, after.length, matches);
  return matches;
}

function alignRange(
  before: string[], b0: number, b1: number,
  after: string[], a0: number, a1: number,
  matches: Array<[number, number]>
): void {
  // Common prefix and suffix never need the quadratic table.
  let b = b0;
  let a = a0;
  while (b < b1 && a < a1 && before[b] === after[a]) {
    matches.push([b, a]);
    b++;
    a++;
  }

  let eb = b1;
  let ea = a1;
  while (eb > b && ea > a && before[eb - 1] === after[ea - 1]) {
    eb--;
    ea--;
  }

  const n = eb - b;
  const m = ea - a;
  if (n > 0 && m > 0) {
    if (n * m <= MAX_TABLE_CELLS) alignByTable(before, b, n, after, a, m, matches);
    else alignByAnchors(before, b, eb, after, a, ea, matches);
  }

  for (let k = 0; k < b1 - eb; k++) matches.push([eb + k, ea + k]);
}

function alignByTable(
  before: string[], b: number, n: number,
  after: string[], a: number, m: number,
  matches: Array<[number, number]>
): void {
  // table[i * (m + 1) + j] = LCS length of before[b + i..] and after[a + j..]
  const width = m + 1;
  const table = new Uint32Array((n + 1) * width);
  for (let i = n - 1; i >= 0; i--) {
    for (let j = m - 1; j >= 0; j--) {
      table[i * width + j] = before[b + i] === after[a + j]
        ? (table[(i + 1) * width + j + 1] ?? 0) + 1
        : Math.max(table[(i + 1) * width + j] ?? 0, table[i * width + j + 1] ?? 0);
    }
  }

  let i = 0;
  let j = 0;
  while (i < n && j < m) {
    if (before[b + i] === after[a + j]) {
      matches.push([b + i, a + j]);
      i++;
      j++;
    } else if ((table[(i + 1) * width + j] ?? 0) >= (table[i * width + j + 1] ?? 0)) {
      i++;
    } else {
      j++;
    }
  }
}

function alignByAnchors(
  before: string[], b0: number, b1: number,
  after: string[], a0: number, a1: number,
  matches: Array<[number, number]>
): void {
  let b = b0;
  let a = a0;
  for (const [bi, ai] of uniqueAnchors(before, b0, b1, after, a0, a1)) {
    alignRange(before, b, bi, after, a, ai, matches);
    matches.push([bi, ai]);
    b = bi + 1;
    a = ai + 1;
  }
  if (b > b0) alignRange(before, b, b1, after, a, a1, matches);
}

/** Lines occurring once on each side, reduced to their longest increasing chain. */
function uniqueAnchors(
  before: string[], b0: number, b1: number,
  after: string[], a0: number, a1: number
): Array<[number, number]> {
  const seen = new Map<string, { before: number; beforeIndex: number; after: number; afterIndex: number }>();
  for (let i = b0; i < b1; i++) {
    const line = before[i] ?? '';
    const entry = seen.get(line);
    if (entry) entry.before++;
    else seen.set(line, { before: 1, beforeIndex: i, after: 0, afterIndex: -1 });
  }
  for (let j = a0; j < a1; j++) {
    const entry = seen.get(after[j] ?? '');
    if (entry) {
      entry.after++;
      entry.afterIndex = j;
    }
  }

  // Map order is first occurrence in before, so candidates ascend by before index.
  const candidates: Array<[number, number]> = [];
  for (const entry of seen.values()) {
    if (entry.before === 1 && entry.after === 1) candidates.push([entry.beforeIndex, entry.afterIndex]);
  }

  // Patience sorting on the after index.
  const tails: number[] = [];
  const previous = new Array<number>(candidates.length).fill(-1);
  candidates.forEach(([, afterIndex], k) => {
    let lo = 0;
    let hi = tails.length;
    while (lo < hi) {
      const mid = (lo + hi) >> 1;
      if ((candidates[tails[mid] ?? 0]?.[1] ?? 0) < afterIndex) lo = mid + 1;
      else hi = mid;
    }
    if (lo > 0) previous[k] = tails[lo - 1] ?? -1;
    tails[lo] = k;
  });

  const chain: Array<[number, number]> = [];
  for (let k = tails[tails.length - 1] ?? -1; k >= 0; k = previous[k] ?? -1) {
    const candidate = candidates[k];
    if (candidate) chain.push(candidate);
  }
  return chain.reverse();
}

/**
 * Groups the unmatched lines of an alignment into maximal contiguous
 * differing regions. Each region is one change unit.
 */
export function computeHunks(before: string[], after: string[]): ChangeHunk[] {
  const matches = alignLines(before, after);
  const hunks: ChangeHunk[] = [];

  let prevBefore = -1;
  let prevAfter = -1;
  const sentinel: [number, number] = [before.length, after.length];

  for (const [bi, ai] of [...matches, sentinel]) {
    const deleted = before.slice(prevBefore + 1, bi);
    const added = after.slice(prevAfter + 1, ai);
    if (deleted.length > 0 || added.length > 0) {
      hunks.push({ beforeStart: prevBefore + 1, afterStart: prevAfter + 1, deleted, added });
    }
    prevBefore = bi;
    prevAfter = ai;
  }

  return hunks;
}

/** Modified lines of one change unit: a replaced line counts once. */
export function hunkLineCount(hunk: ChangeHunk): number {
  return Math.max(hunk.deleted.length, hunk.added.length);
}

/**
 * Rebuilds the after side with the `reverted` hunks replaced by their before
 * content, i.e. propagates the before version for those regions. `hunks` must
 * be the full hunk list of the same alignment, in order.
 */
export function revertHunks(after: string[], hunks: ChangeHunk[], reverted: ReadonlySet<ChangeHunk>): string[] {
  if (reverted.size === 0) return after;
  const result: string[] = [];
  const copy = (lines: string[]) => {
    for (const line of lines) result.push(line);
  };
  let cursor = 0;

  for (const hunk of hunks) {
    copy(after.slice(cursor, hunk.afterStart));
    copy(reverted.has(hunk) ? hunk.deleted : hunk.added);
    cursor = hunk.afterStart + hunk.added.length;
  }
  copy(after.slice(cursor));

  return result;
}
