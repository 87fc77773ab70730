#!/usr/bin/env node

import { program } from 'commander';
import ora from 'ora';
import { existsSync, readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { basename, dirname, join, resolve } from 'path';

import { loadConfig, type FixtrimConfig } from '../src/config/config.js';
import { listBugFolders } from '../src/dataset/dataset-source.js';
import {
  DirectoryRenderedViewProvider,
  FallbackChain,
  type RenderedViewProvider,
} from '../src/dataset/fallback.js';
import { errorMessage } from '../src/errors.js';
import { type MinedCommit, materializeCommit, mineCommit } from '../src/git/commit-miner.js';
import { GitRenderedViewProvider } from '../src/git/git-rendered-view.js';
import { runPipeline } from '../src/pipeline/run-pipeline.js';
import { reportCsv } from '../src/reporters/csv.js';
import { reportJson } from '../src/reporters/json.js';
import { reportTerminal } from '../src/reporters/terminal.js';
import type { Report } from '../src/types.js';

interface CountOptions {
  project?: string;
  format: string;
  output?: string;
  config?: string;
  concurrency?: string;
  commonOnly: boolean;
  repo?: string;
}

interface MineOptions {
  out: string;
  project?: string;
  humanId?: string;
  bugInTestCode?: boolean;
}

const FORMATS = new Set(['terminal', 'json', 'csv']);

const __dirname = dirname(fileURLToPath(import.meta.url));
// bin/ when run from source, dist/bin/ once built
const pkgPath = [join(__dirname, '../package.json'), join(__dirname, '../../package.json')].find(p => existsSync(p));
const pkg = (pkgPath ? JSON.parse(readFileSync(pkgPath, 'utf8')) : { version: '0.0.0' }) as { version: string };

// ── Option helpers ─────────────────────────────────────────────────────────────

function applyOverrides(config: FixtrimConfig, opts: CountOptions): FixtrimConfig {
  let concurrency = config.concurrency;
  if (opts.concurrency !== undefined) {
    concurrency = parseInt(opts.concurrency, 10);
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error(`--concurrency must be a positive integer, got "${opts.concurrency}"`);
    }
  }
  return {
    ...config,
    concurrency,
    pairing: opts.commonOnly ? 'common-only' : config.pairing,
  };
}

function buildFallback(repo: string | undefined): RenderedViewProvider {
  const providers: RenderedViewProvider[] = [];
  if (repo) providers.push(new GitRenderedViewProvider(resolve(repo)));
  providers.push(new DirectoryRenderedViewProvider());
  return new FallbackChain(providers);
}

function emit(report: Report, format: string, output: string | null): void {
  if (format === 'json') reportJson(report, output);
  else if (format === 'csv') reportCsv(report, output);
  else reportTerminal(report);
}

// ── Commands ───────────────────────────────────────────────────────────────────

async function runCount(dataset: string, opts: CountOptions): Promise<void> {
  if (!FORMATS.has(opts.format)) {
    throw new Error(`unknown format "${opts.format}" (expected terminal, json or csv)`);
  }
  const config = applyOverrides(loadConfig(opts.config ?? null), opts);
  const folders = listBugFolders(dataset, opts.project ?? null);

  const spinner = ora({ text: `Counting ${folders.length} commits...`, stream: process.stderr }).start();
  const started = Date.now();

  const report = await runPipeline(dataset, folders, {
    config,
    fallback: buildFallback(opts.repo),
    onProgress: (result, done, total) => {
      const label = `${result.commitId.repository}/${result.humanId}`;
      if (result.status.kind === 'Failed') {
        spinner.fail(`${label}: ${result.status.reason}`);
        spinner.start();
      } else if (result.status.kind === 'PartialWithWarnings') {
        spinner.warn(`${label}: ${result.status.warnings.length} warning(s)`);
        spinner.start();
      }
      spinner.text = `[${done}/${total}] ${label}`;
    },
  });

  const seconds = ((Date.now() - started) / 1000).toFixed(1);
  const summary = `${report.meta.commitCount} commits, ${report.totals.changeUnits} change units — ⏱ ${seconds}s`;
  if (report.meta.failedCount > 0) spinner.warn(`${summary}, ${report.meta.failedCount} failed`);
  else spinner.succeed(summary);

  emit(report, opts.format, opts.output ?? null);
  if (report.meta.failedCount > 0) process.exitCode = 1;
}

function runMine(repo: string, rev: string, opts: MineOptions): void {
  const spinner = ora({ text: `Mining ${rev}...`, stream: process.stderr }).start();
  let mined: MinedCommit;
  let dir: string;
  try {
    mined = mineCommit(resolve(repo), rev);
    dir = materializeCommit(mined, opts.out, {
      project: opts.project ?? basename(resolve(repo)),
      humanId: opts.humanId ?? mined.hash.slice(0, 12),
      bugIsInTestCode: opts.bugInTestCode,
    });
  } catch (err) {
    spinner.fail(`${rev}: ${errorMessage(err)}`);
    throw err;
  }

  if (mined.parents.length > 1) {
    spinner.warn(`${mined.hash}: merge commit, nothing mined; counting will use the rendered view`);
  } else {
    spinner.succeed(`${mined.hash}: ${mined.files.length} file(s) written to ${dir}`);
  }
}

function fail(err: unknown): void {
  console.error(`Error: ${errorMessage(err)}`);
  if (process.env.DEBUG) console.error(err);
  process.exitCode = 1;
}

program
  .name('fixtrim')
  .description('Minimize bug-fix commits to their meaningful changes and count them.')
  .version(pkg.version);

program
  .command('count', { isDefault: true })
  .description('Count change units for every bug folder under a dataset')
  .argument('[dataset]', 'Dataset root, a single project folder, or a single bug folder', '.')
  .option('--project <name>',      'Only count this project')
  .option('--format <format>',     'Output format: terminal, json, csv', 'terminal')
  .option('--output <file>',       'Write json/csv output to a file instead of stdout')
  .option('--config <file>',       'Configuration file (default: ./fixtrim.config.json)')
  .option('--concurrency <n>',     'Commits processed in parallel')
  .option('--common-only',         'Only pair files present on both sides', false)
  .option('--repo <path>',         'Local clone used to render merge commits against their first parent')
  .action(async (dataset: string, opts: CountOptions) => {
    try {
      await runCount(dataset, opts);
    } catch (err) {
      fail(err);
    }
  });

program
  .command('mine')
  .description('Write one commit of a local clone into the dataset layout')
  .argument('<repo>', 'Path to a local git clone')
  .argument('<rev>', 'Commit to mine')
  .option('--out <dir>',           'Dataset root to write into', '.')
  .option('--project <name>',      'Project folder name (default: clone directory name)')
  .option('--human-id <id>',       'Bug folder name (default: abbreviated hash)')
  .option('--bug-in-test-code',    'Record that the bug lives in the test suite')
  .action((repo: string, rev: string, opts: MineOptions) => {
    try {
      runMine(repo, rev, opts);
    } catch (err) {
      fail(err);
    }
  });

program.parseAsync(process.argv).catch(fail);
