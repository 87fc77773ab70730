// ─── Commit Input ─────────────────────────────────────────────────────────────

export interface CommitId {
  repository: string;
  hash: string;
}

export type FileStatus = 'added' | 'deleted' | 'modified';

/** One touched file as handed over by a FilePairSource, before classification. */
export interface RawFilePair {
  path: string;
  beforeText?: string;
  afterText?: string;
  status: FileStatus;
}

export interface FilePair extends RawFilePair {
  language: string;
  isTestFile: boolean;
  isDerivedArtifact: boolean;
}

/** Annotation columns carried through verbatim (id, human_id, labels, cross references…). */
export type CommitMetadata = Readonly<Record<string, unknown>>;

export interface Commit {
  readonly id: CommitId;
  readonly humanId: string;
  readonly parents: readonly string[];
  readonly bugIsInTestCode: boolean;
  readonly pairs: readonly FilePair[];
  readonly metadata: CommitMetadata;
}

// ─── File Pair Source ─────────────────────────────────────────────────────────

export type SourceState = 'MinedDiffAvailable' | 'FallbackRequired';

export interface LoadedCommit {
  commit: Commit;
  sourceState: SourceState;
  warnings: PipelineWarning[];
}

// ─── Classification ───────────────────────────────────────────────────────────

export type ExclusionReason = 'empty' | 'identical' | 'test-not-bug' | 'derived-mock';

export type ClassificationOutcome =
  | { kind: 'Included' }
  | { kind: 'Excluded'; reason: ExclusionReason };

export interface ClassificationContext {
  bugIsInTestCode: boolean;
}

// ─── Normalization ────────────────────────────────────────────────────────────

export interface NormalizedPair {
  pair: FilePair;
  beforeNormalized: string;
  afterNormalized: string;
  /** True when the extension had no known comment syntax. */
  ambiguousLanguage: boolean;
}

// ─── Diffing & Equivalence ────────────────────────────────────────────────────

export interface ChangeHunk {
  /** 0-based index of the first before line covered (insertion point when nothing was deleted). */
  beforeStart: number;
  afterStart: number;
  deleted: string[];
  added: string[];
}

export type EquivalenceVerdict =
  | { kind: 'Equivalent'; path: string; changeUnits: 0 }
  | {
      kind: 'Distinct';
      path: string;
      changeUnits: number;
      changedLines: number;
      hunks: ChangeHunk[];
    };

// ─── Counting ─────────────────────────────────────────────────────────────────

export interface CountedHunk extends ChangeHunk {
  signature: string;
  repeated: boolean;
}

export interface ChangeRecord {
  commitId: CommitId;
  path: string;
  changeUnits: number;
  changedLines: number;
  repeatedElsewhere: boolean;
  hunks: CountedHunk[];
}

export interface CommitTotals {
  changeUnits: number;
  changedLines: number;
  files: number;
}

// ─── Status & Warnings ────────────────────────────────────────────────────────

export type WarningKind = 'missing-side' | 'encoding-error' | 'ambiguous-language' | 'file-error';

export interface PipelineWarning {
  kind: WarningKind;
  path: string | null;
  message: string;
}

export type CommitStatus =
  | { kind: 'Ok' }
  | { kind: 'PartialWithWarnings'; warnings: PipelineWarning[] }
  | { kind: 'Failed'; reason: string };

export interface ExcludedFile {
  path: string;
  reason: ExclusionReason;
}

export interface CommitResult {
  commitId: CommitId;
  humanId: string;
  status: CommitStatus;
  sourceState: SourceState | null;
  records: ChangeRecord[];
  excluded: ExcludedFile[];
  equivalent: string[];
  totals: CommitTotals;
  metadata: CommitMetadata;
}

// ─── Report ───────────────────────────────────────────────────────────────────

export interface ProjectSummary {
  project: string;
  commitCount: number;
  failedCount: number;
  changeUnits: number;
  changedLines: number;
  files: number;
}

export interface ReportMeta {
  dataset: string;
  commitCount: number;
  failedCount: number;
  analyzedAt: string;
}

export interface Report {
  meta: ReportMeta;
  commits: CommitResult[];
  projects: ProjectSummary[];
  totals: CommitTotals;
}
