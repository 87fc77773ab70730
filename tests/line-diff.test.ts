import { test } from 'node:test';
import assert from 'node:assert/strict';

import {
  alignLines,
  computeHunks,
  hunkLineCount,
  joinLines,
  MAX_TABLE_CELLS,
  revertHunks,
  splitLines,
} from '../src/diff/line-diff.js';

test('splitLines drops the trailing newline and folds CRLF', () => {
  assert.deepEqual(splitLines('a\nb\n'), ['a', 'b']);
  assert.deepEqual(splitLines('a\r\nb'), ['a', 'b']);
  assert.deepEqual(splitLines(''), []);
  assert.deepEqual(splitLines('\n'), ['']);
});

test('joinLines restores the trailing newline only when asked', () => {
  assert.equal(joinLines(['a', 'b'], true), 'a\nb\n');
  assert.equal(joinLines(['a', 'b'], false), 'a\nb');
  assert.equal(joinLines([], true), '');
});

test('alignLines matches common prefix, suffix and the LCS in between', () => {
  assert.deepEqual(alignLines(['a', 'b', 'c'], ['a', 'x', 'c']), [[0, 0], [2, 2]]);
});

test('alignLines breaks ties by consuming before lines first', () => {
  assert.deepEqual(alignLines(['x', 'y'], ['y', 'x']), [[1, 0]]);
});

test('computeHunks: one substitution is one change unit', () => {
  assert.deepEqual(computeHunks(['a', 'b', 'c'], ['a', 'x', 'c']), [
    { beforeStart: 1, afterStart: 1, deleted: ['b'], added: ['x'] },
  ]);
});

test('computeHunks: separated edits are separate change units', () => {
  const hunks = computeHunks(['a', 'b', 'c', 'd', 'e'], ['a', 'B', 'c', 'd', 'E']);
  assert.deepEqual(hunks, [
    { beforeStart: 1, afterStart: 1, deleted: ['b'], added: ['B'] },
    { beforeStart: 4, afterStart: 4, deleted: ['e'], added: ['E'] },
  ]);
});

test('computeHunks: pure insertion keeps the before insertion point', () => {
  const hunks = computeHunks(['a', 'b'], ['a', 'x', 'y', 'b']);
  assert.deepEqual(hunks, [{ beforeStart: 1, afterStart: 1, deleted: [], added: ['x', 'y'] }]);
  assert.equal(hunkLineCount(hunks[0] ?? { beforeStart: 0, afterStart: 0, deleted: [], added: [] }), 2);
});

test('computeHunks: identical inputs have no change units', () => {
  assert.deepEqual(computeHunks(['a', 'b'], ['a', 'b']), []);
  assert.deepEqual(computeHunks([], []), []);
});

test('hunkLineCount counts a replaced line once', () => {
  assert.equal(hunkLineCount({ beforeStart: 0, afterStart: 0, deleted: ['a', 'b'], added: ['c'] }), 2);
  assert.equal(hunkLineCount({ beforeStart: 0, afterStart: 0, deleted: ['a'], added: ['c'] }), 1);
});

test('revertHunks propagates the before content for the chosen units only', () => {
  const before = ['a', 'b', 'c', 'd', 'e'];
  const after = ['a', 'B', 'c', 'd', 'E'];
  const [first, second] = computeHunks(before, after);
  assert.ok(first && second);

  const hunks = [first, second];
  assert.deepEqual(revertHunks(after, hunks, new Set([first])), ['a', 'b', 'c', 'd', 'E']);
  assert.deepEqual(revertHunks(after, hunks, new Set([second])), ['a', 'B', 'c', 'd', 'e']);
  assert.deepEqual(revertHunks(after, hunks, new Set(hunks)), before);
  assert.deepEqual(revertHunks(after, hunks, new Set()), after);
});

function numbered(prefix: string, count: number): string[] {
  return Array.from({ length: count }, (_, i) => `${prefix} ${i}`);
}

test('alignLines splits a region too large for the table at lines unique to both sides', () => {
  const before = numbered('old', 5000);
  const after = numbered('new', 5000);
  before[2500] = 'anchor';
  after[2000] = 'anchor';
  assert.ok(before.length * after.length > MAX_TABLE_CELLS);

  assert.deepEqual(alignLines(before, after), [[2500, 2000]]);
});

test('a large region with no shared line becomes a single change unit', () => {
  const hunks = computeHunks(numbered('old', 5000), numbered('new', 5000));
  assert.equal(hunks.length, 1);
  assert.equal(hunks[0] && hunkLineCount(hunks[0]), 5000);
});
