import { formatCommitId } from '../errors.js';
import type { Report } from '../types.js';
import { writeReport } from './output.js';

/** One counted file, flattened for the annotation table. */
export interface ChangeRecordRow {
  commitId: string;
  humanId: string;
  path: string;
  changeUnits: number;
  changedLines: number;
  repeatedElsewhere: boolean;
}

export interface JsonReport extends Report {
  changeRecords: ChangeRecordRow[];
}

/** Every ChangeRecord of the report in commit order, then path order. */
export function changeRecordRows(report: Report): ChangeRecordRow[] {
  return report.commits.flatMap(commit => commit.records.map(record => ({
    commitId: formatCommitId(record.commitId),
    humanId: commit.humanId,
    path: record.path,
    changeUnits: record.changeUnits,
    changedLines: record.changedLines,
    repeatedElsewhere: record.repeatedElsewhere,
  })));
}

/**
 * The full report (hunks included) plus the flat `changeRecords` list that
 * downstream annotation and plotting read.
 */
export function formatJson(report: Report): string {
  const payload: JsonReport = { ...report, changeRecords: changeRecordRows(report) };
  return JSON.stringify(payload, null, 2) + '\n';
}

export function reportJson(report: Report, outputFile: string | null = null): void {
  writeReport(formatJson(report), outputFile, 'JSON');
}
