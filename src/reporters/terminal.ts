import chalk from 'chalk';
import Table from 'cli-table3';
import dayjs from 'dayjs';
import type { CommitResult, CommitStatus, Report } from '../types.js';

const TABLE_CHARS = {
  top: '─', 'top-mid': '┬', 'top-left': '┌', 'top-right': '┐',
  bottom: '─', 'bottom-mid': '┴', 'bottom-left': '└', 'bottom-right': '┘',
  left: '│', 'left-mid': '├', mid: '─', 'mid-mid': '┼',
  right: '│', 'right-mid': '┤', middle: '│',
};

function statusLabel(status: CommitStatus): string {
  switch (status.kind) {
    case 'Ok':                  return chalk.green('ok');
    case 'PartialWithWarnings': return chalk.yellow(`partial (${status.warnings.length})`);
    case 'Failed':              return chalk.red('failed');
  }
}

function truncate(str: string, maxLen: number): string {
  if (str.length <= maxLen) return str;
  return chalk.gray('…') + str.slice(-(maxLen - 1));
}

function commitTable(commits: CommitResult[]): string {
  const table = new Table({
    head: ['PROJECT', 'BUG', 'STATUS', 'UNITS', 'LINES', 'FILES', 'REPEATED'].map(h => chalk.bold.gray(h)),
    colWidths: [18, 28, 16, 7, 7, 7, 10],
    style: { head: [], border: ['gray'] },
    chars: TABLE_CHARS,
  });

  for (const c of commits) {
    const repeated = c.records.filter(r => r.repeatedElsewhere).length;
    table.push([
      truncate(c.commitId.repository, 16),
      truncate(c.humanId, 26),
      statusLabel(c.status),
      String(c.totals.changeUnits),
      String(c.totals.changedLines),
      String(c.totals.files),
      repeated > 0 ? chalk.yellow(String(repeated)) : chalk.gray('0'),
    ]);
  }
  return table.toString();
}

function projectTable(report: Report): string {
  const table = new Table({
    head: ['PROJECT', 'COMMITS', 'FAILED', 'UNITS', 'LINES', 'FILES'].map(h => chalk.bold.gray(h)),
    style: { head: [], border: ['gray'] },
    chars: TABLE_CHARS,
  });
  for (const p of report.projects) {
    table.push([
      p.project,
      String(p.commitCount),
      p.failedCount > 0 ? chalk.red(String(p.failedCount)) : chalk.gray('0'),
      String(p.changeUnits),
      String(p.changedLines),
      String(p.files),
    ]);
  }
  table.push([
    chalk.bold('total'),
    String(report.meta.commitCount),
    String(report.meta.failedCount),
    chalk.bold(String(report.totals.changeUnits)),
    chalk.bold(String(report.totals.changedLines)),
    chalk.bold(String(report.totals.files)),
  ]);
  return table.toString();
}

function issueLines(commits: CommitResult[]): string[] {
  const lines: string[] = [];
  for (const c of commits) {
    const label = `${c.commitId.repository}/${c.humanId}`;
    if (c.status.kind === 'Failed') {
      lines.push(`   ${chalk.red('✖')}  ${chalk.cyan(label)}  ${c.status.reason}`);
    } else if (c.status.kind === 'PartialWithWarnings') {
      for (const w of c.status.warnings) {
        lines.push(`   ${chalk.yellow('⚠')}  ${chalk.cyan(label)}  ${chalk.gray(`[${w.kind}]`)} ${w.message}`);
      }
    }
  }
  return lines;
}

/** Renders the whole report as terminal text. */
export function renderTerminal(report: Report): string {
  const { meta } = report;
  const out: string[] = [
    '',
    chalk.bold.cyan('✂ fixtrim') +
      chalk.gray(` ${meta.dataset}`) +
      chalk.gray(` (${meta.commitCount} commits, analyzed ${dayjs(meta.analyzedAt).format('YYYY-MM-DD HH:mm')})`),
    '',
  ];

  if (report.commits.length === 0) {
    out.push(chalk.yellow('  No bug folders found.'), '');
    return out.join('\n');
  }

  out.push(commitTable(report.commits), '', projectTable(report));

  const issues = issueLines(report.commits);
  if (issues.length > 0) {
    out.push('', chalk.yellow('Warnings and failures:'), ...issues);
  }
  out.push('');
  return out.join('\n');
}

export function reportTerminal(report: Report): void {
  console.log(renderTerminal(report));
}
