import type { CommitResult, Report } from '../types.js';
import { writeReport } from './output.js';

export const CSV_COLUMNS = [
  'project',
  'commit',
  'human_id',
  'status',
  'source_state',
  'change_units',
  'changed_lines',
  'files',
  'repeated_files',
  'equivalent_files',
  'excluded_files',
  'warnings',
] as const;

function escapeCell(value: string | number): string {
  const text = String(value);
  return /[",\n\r]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

function warningCount(result: CommitResult): number {
  return result.status.kind === 'PartialWithWarnings' ? result.status.warnings.length : 0;
}

function row(result: CommitResult): string[] {
  const { status } = result;
  return [
    result.commitId.repository,
    result.commitId.hash,
    result.humanId,
    status.kind === 'Failed' ? `Failed: ${status.reason}` : status.kind,
    result.sourceState ?? '',
    String(result.totals.changeUnits),
    String(result.totals.changedLines),
    String(result.totals.files),
    String(result.records.filter(r => r.repeatedElsewhere).length),
    String(result.equivalent.length),
    String(result.excluded.length),
    String(warningCount(result)),
  ];
}

/** One line per commit, in report order, with a header line. */
export function formatCsv(report: Report): string {
  const lines = [CSV_COLUMNS.join(','), ...report.commits.map(c => row(c).map(escapeCell).join(','))];
  return lines.join('\n') + '\n';
}

export function reportCsv(report: Report, outputFile: string | null = null): void {
  writeReport(formatCsv(report), outputFile, 'CSV');
}
