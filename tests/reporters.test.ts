import { test } from 'node:test';
import assert from 'node:assert/strict';
import { stripVTControlCharacters } from 'util';

import { formatCsv } from '../src/reporters/csv.js';
import { formatJson } from '../src/reporters/json.js';
import { renderTerminal } from '../src/reporters/terminal.js';
import type { CommitResult, Report } from '../src/types.js';

const okCommit: CommitResult = {
  commitId: { repository: 'proj', hash: 'abc' },
  humanId: 'bug-1',
  status: { kind: 'Ok' },
  sourceState: 'MinedDiffAvailable',
  records: [
    { commitId: { repository: 'proj', hash: 'abc' }, path: 'src/a.py', changeUnits: 1, changedLines: 2, repeatedElsewhere: false, hunks: [] },
    { commitId: { repository: 'proj', hash: 'abc' }, path: 'src/b.py', changeUnits: 1, changedLines: 1, repeatedElsewhere: true, hunks: [] },
  ],
  excluded: [{ path: 'tests/test_a.py', reason: 'test-not-bug' }],
  equivalent: ['src/c.py'],
  totals: { changeUnits: 2, changedLines: 3, files: 2 },
  metadata: { label: 'logic' },
};

const partialCommit: CommitResult = {
  ...okCommit,
  commitId: { repository: 'proj', hash: 'def' },
  humanId: 'bug-2',
  status: {
    kind: 'PartialWithWarnings',
    warnings: [{ kind: 'encoding-error', path: 'logo.png', message: 'logo.png: binary content (NUL byte)' }],
  },
};

const failedCommit: CommitResult = {
  commitId: { repository: 'proj', hash: 'bad' },
  humanId: 'bad',
  status: { kind: 'Failed', reason: 'boom, again' },
  sourceState: null,
  records: [],
  excluded: [],
  equivalent: [],
  totals: { changeUnits: 0, changedLines: 0, files: 0 },
  metadata: {},
};

const report: Report = {
  meta: { dataset: 'data/bugs', commitCount: 3, failedCount: 1, analyzedAt: '2024-03-01T10:00:00.000Z' },
  commits: [okCommit, partialCommit, failedCommit],
  projects: [{ project: 'proj', commitCount: 3, failedCount: 1, changeUnits: 4, changedLines: 6, files: 4 }],
  totals: { changeUnits: 4, changedLines: 6, files: 4 },
};

test('formatCsv writes one quoted-as-needed row per commit', () => {
  assert.equal(
    formatCsv(report),
    [
      'project,commit,human_id,status,source_state,change_units,changed_lines,files,repeated_files,equivalent_files,excluded_files,warnings',
      'proj,abc,bug-1,Ok,MinedDiffAvailable,2,3,2,1,1,1,0',
      'proj,def,bug-2,PartialWithWarnings,MinedDiffAvailable,2,3,2,1,1,1,1',
      'proj,bad,bad,"Failed: boom, again",,0,0,0,0,0,0,0',
      '',
    ].join('\n')
  );
});

test('formatJson keeps the report and adds the flat change records', () => {
  const text = formatJson(report);
  assert.ok(text.endsWith('}\n'));
  const { changeRecords, ...rest }: { changeRecords: unknown } & Record<string, unknown> = JSON.parse(text);
  assert.deepEqual(rest, report);
  assert.deepEqual(changeRecords, [
    { commitId: 'proj@abc', humanId: 'bug-1', path: 'src/a.py', changeUnits: 1, changedLines: 2, repeatedElsewhere: false },
    { commitId: 'proj@abc', humanId: 'bug-1', path: 'src/b.py', changeUnits: 1, changedLines: 1, repeatedElsewhere: true },
    { commitId: 'proj@abc', humanId: 'bug-2', path: 'src/a.py', changeUnits: 1, changedLines: 2, repeatedElsewhere: false },
    { commitId: 'proj@abc', humanId: 'bug-2', path: 'src/b.py', changeUnits: 1, changedLines: 1, repeatedElsewhere: true },
  ]);
});

test('renderTerminal lists commits, projects and problems', () => {
  const lines = stripVTControlCharacters(renderTerminal(report)).split('\n');

  assert.ok(lines[1]?.startsWith('✂ fixtrim data/bugs (3 commits, analyzed '));
  assert.ok(lines.some(line => line.includes('bug-1') && line.includes('ok')));
  assert.ok(lines.some(line => line.includes('bug-2') && line.includes('partial (1)')));
  assert.ok(lines.some(line => line.includes('total')));
  assert.ok(lines.includes('Warnings and failures:'));
  assert.ok(lines.includes('   ⚠  proj/bug-2  [encoding-error] logo.png: binary content (NUL byte)'));
  assert.ok(lines.includes('   ✖  proj/bad  boom, again'));
});

test('renderTerminal says so when there is nothing to show', () => {
  const empty: Report = { ...report, commits: [], projects: [], meta: { ...report.meta, commitCount: 0, failedCount: 0 } };
  const lines = stripVTControlCharacters(renderTerminal(empty)).split('\n');
  assert.ok(lines.includes('  No bug folders found.'));
});
