/**
 * fixtrim — Integration Tests
 *
 * Reads TEST_REPO_PATH from the workspace-root .env file (or the environment).
 * Tests that mine a real git repository are skipped when TEST_REPO_PATH is
 * not set or the path does not exist.
 *
 * Setup:
 *   1. Add TEST_REPO_PATH=/path/to/any/local/clone to .env
 *   2. Run:  npm test
 */

import { after, test } from 'node:test';
import assert from 'node:assert/strict';
import { readFileSync, existsSync, rmSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

import { FIX_AFTER, FIX_BEFORE, REGRESSION_TEST, tempRoot, writeBug } from './dataset-fixture.js';

// ── Load .env from workspace root ──────────────────────────────────────────────

const __dirname = dirname(fileURLToPath(import.meta.url));
const WORKSPACE_ROOT = join(__dirname, '..');

function loadEnv(): Record<string, string> {
  const envPath = join(WORKSPACE_ROOT, '.env');
  if (!existsSync(envPath)) return {};
  const result: Record<string, string> = {};
  for (const line of readFileSync(envPath, 'utf8').split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const eqIdx = trimmed.indexOf('=');
    if (eqIdx === -1) continue;
    const key = trimmed.slice(0, eqIdx).trim();
    const val = trimmed.slice(eqIdx + 1).trim().replace(/^['"]|['"]$/g, '');
    result[key] = val;
  }
  return result;
}

const env = loadEnv();
const TEST_REPO = (env['TEST_REPO_PATH'] ?? process.env['TEST_REPO_PATH'] ?? '').trim();
const hasRepo = TEST_REPO.length > 0 && existsSync(TEST_REPO);

const roots: string[] = [];
after(() => {
  for (const root of roots) rmSync(root, { recursive: true, force: true });
});

function newRoot(): string {
  const root = tempRoot();
  roots.push(root);
  return root;
}

// ── Whole dataset (no repo needed) ─────────────────────────────────────────────

test('a two-project dataset is counted end to end', async () => {
  const { parseConfig } = await import('../src/config/config.js');
  const { listBugFolders } = await import('../src/dataset/dataset-source.js');
  const { DirectoryRenderedViewProvider } = await import('../src/dataset/fallback.js');
  const { runPipeline } = await import('../src/pipeline/run-pipeline.js');
  const { formatCsv } = await import('../src/reporters/csv.js');

  const root = newRoot();
  const guard = '    if node is None: return None\n';
  writeBug(root, 'alpha', 'alpha#1', {
    metadata: { parents: ['p1'] },
    before: { 'src/f.py': FIX_BEFORE, 'src/app.py': 'import b\nimport a\nfoo()\n' },
    after: { 'src/f.py': FIX_AFTER, 'src/app.py': 'import a\nimport b\nfoo()\n', 'tests/test_f.py': REGRESSION_TEST },
  });
  writeBug(root, 'alpha', 'alpha#2', {
    metadata: { parents: ['p1', 'p2'] },
    previous: { 'lib/g.py': 'def g():\n    return 1\n' },
    current: { 'lib/g.py': 'def g():\n    return 2\n' },
  });
  writeBug(root, 'beta', 'beta#1', {
    metadata: { parents: ['p1'] },
    before: {
      'pkg/a.py': 'def a(node):\n    return node.value\n',
      'pkg/b.py': 'def b(node):\n    return node.value\n',
      'pkg/mocks/state.json': '{"a": 1}\n',
    },
    after: {
      'pkg/a.py': 'def a(node):\n' + guard + '    return node.value\n',
      'pkg/b.py': 'def b(node):\n' + guard + '    return node.value\n',
      'pkg/mocks/state.json': '{"a": 2, "b": 3}\n',
    },
  });

  const report = await runPipeline(root, listBugFolders(root), {
    config: parseConfig({}),
    fallback: new DirectoryRenderedViewProvider(),
  });

  assert.equal(
    formatCsv(report),
    [
      'project,commit,human_id,status,source_state,change_units,changed_lines,files,repeated_files,equivalent_files,excluded_files,warnings',
      'alpha,alpha#1,alpha#1,Ok,MinedDiffAvailable,1,1,1,0,1,1,0',
      'alpha,alpha#2,alpha#2,Ok,FallbackRequired,1,1,1,0,0,0,0',
      'beta,beta#1,beta#1,Ok,MinedDiffAvailable,2,2,2,1,0,1,0',
      '',
    ].join('\n')
  );
  assert.deepEqual(report.totals, { changeUnits: 4, changedLines: 4, files: 4 });
});

// ── Integration tests (require TEST_REPO_PATH) ─────────────────────────────────

test('mineCommit reads HEAD of a real repo', { skip: !hasRepo }, async () => {
  const { mineCommit } = await import('../src/git/commit-miner.js');
  const mined = mineCommit(TEST_REPO, 'HEAD');
  assert.match(mined.hash, /^[0-9a-f]{40}$/);
  for (const file of mined.files) {
    assert.ok(file.path.length > 0, 'Mined file should have a path');
    if (file.status !== 'added') assert.ok(file.before, `${file.path} should have a before side`);
    if (file.status !== 'deleted') assert.ok(file.after, `${file.path} should have an after side`);
  }
});

test('a mined commit goes through the full pipeline', { skip: !hasRepo }, async () => {
  const { mineCommit, materializeCommit } = await import('../src/git/commit-miner.js');
  const { parseConfig } = await import('../src/config/config.js');
  const { listBugFolders } = await import('../src/dataset/dataset-source.js');
  const { FallbackChain } = await import('../src/dataset/fallback.js');
  const { GitRenderedViewProvider } = await import('../src/git/git-rendered-view.js');
  const { runPipeline } = await import('../src/pipeline/run-pipeline.js');

  const root = newRoot();
  materializeCommit(mineCommit(TEST_REPO, 'HEAD'), root, { project: 'repo', humanId: 'head' });

  const report = await runPipeline(root, listBugFolders(root), {
    config: parseConfig({}),
    fallback: new FallbackChain([new GitRenderedViewProvider(TEST_REPO)]),
  });

  assert.equal(report.commits.length, 1);
  const [result] = report.commits;
  assert.ok(result);
  for (const record of result.records) {
    assert.ok(record.changeUnits > 0, `${record.path} should count at least one unit`);
    assert.ok(record.changedLines >= record.changeUnits, `${record.path} lines should cover its units`);
  }
});
