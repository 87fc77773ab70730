import { splitLines } from '../diff/line-diff.js';
import { tokenize } from '../languages/lexer.js';
import type { LanguageDefinition } from '../languages/registry.js';
import { canonicalCode, canonicalImport, type CommentMode } from './canonical-form.js';

export interface ImportRun {
  kind: 'imports';
  lines: string[];
  statements: string[];
}

export type Block = { kind: 'code'; lines: string[] } | ImportRun;

function bracketBalance(line: string): number {
  let balance = 0;
  for (const ch of line) {
    if (ch === '(' || ch === '[' || ch === '{') balance++;
    else if (ch === ')' || ch === ']' || ch === '}') balance--;
  }
  return balance;
}

/** Which lines start outside any string literal or comment. */
function codeLineStarts(lines: string[], language: LanguageDefinition): boolean[] {
  const text = lines.join('\n');
  const starts: number[] = [];
  let offset = 0;
  for (const line of lines) {
    starts.push(offset);
    offset += line.length + 1;
  }

  const inCode = lines.map(() => true);
  let lineIndex = 0;
  for (const segment of tokenize(text, language.comments, language.strings, language.docstrings)) {
    if (segment.kind === 'code') continue;
    const end = segment.start + segment.text.length;
    while (lineIndex < starts.length && (starts[lineIndex] ?? 0) <= segment.start) lineIndex++;
    for (let k = lineIndex; k < starts.length && (starts[k] ?? 0) < end; k++) inCode[k] = false;
  }
  return inCode;
}

/**
 * Splits lines into code blocks and import runs. A run is a sequence of
 * import statements; blank and comment-only lines between two statements
 * belong to it. Parenthesised or backslash-continued statements span lines.
 */
export function partitionImports(lines: string[], language: LanguageDefinition): Block[] {
  const pattern = language.imports;
  if (!pattern) return lines.length > 0 ? [{ kind: 'code', lines }] : [];

  const inCode = codeLineStarts(lines, language);
  const markers = language.comments?.line ?? [];
  const isImportStart = (i: number) => inCode[i] === true && pattern.test(lines[i] ?? '');
  const isFiller = (line: string) => {
    const trimmed = line.trim();
    return trimmed === '' || markers.some(marker => trimmed.startsWith(marker));
  };
  const statementEnd = (start: number) => {
    let balance = 0;
    let end = start;
    while (end < lines.length) {
      const line = lines[end] ?? '';
      balance += bracketBalance(line);
      end++;
      if (balance <= 0 && !line.trimEnd().endsWith('\\')) break;
    }
    return end;
  };

  const blocks: Block[] = [];
  let code: string[] = [];
  let i = 0;

  while (i < lines.length) {
    if (!isImportStart(i)) {
      code.push(lines[i] ?? '');
      i++;
      continue;
    }
    if (code.length > 0) {
      blocks.push({ kind: 'code', lines: code });
      code = [];
    }

    const run: ImportRun = { kind: 'imports', lines: [], statements: [] };
    let j = i;
    while (j < lines.length) {
      if (isImportStart(j)) {
        const end = statementEnd(j);
        const statement = lines.slice(j, end);
        run.statements.push(statement.join('\n'));
        run.lines.push(...statement);
        j = end;
        continue;
      }
      let k = j;
      while (k < lines.length && isFiller(lines[k] ?? '')) k++;
      if (k > j && isImportStart(k)) {
        run.lines.push(...lines.slice(j, k));
        j = k;
        continue;
      }
      break;
    }

    blocks.push(run);
    i = j;
  }

  if (code.length > 0) blocks.push({ kind: 'code', lines: code });
  return blocks;
}

/** Sorted canonical statements of an import run. */
export function canonicalRun(block: ImportRun, language: LanguageDefinition): string {
  return block.statements
    .map(statement => canonicalImport(statement, language))
    .sort()
    .join('\n');
}

/** Canonical form of a whole file: canonical code with every import run sorted. */
export function canonicalForm(text: string, language: LanguageDefinition, comments: CommentMode = 'keep'): string {
  return partitionImports(splitLines(text), language)
    .map(block => (block.kind === 'code'
      ? canonicalCode(block.lines.join('\n'), language, comments)
      : canonicalRun(block, language)))
    .filter(part => part !== '')
    .join('\n');
}

/**
 * Where both sides have the same number of import runs, each after-run whose
 * sorted statements equal the before-run takes the before lines verbatim.
 */
export function propagateImportRuns(
  before: string[],
  after: string[],
  language: LanguageDefinition
): string[] {
  const beforeRuns = partitionImports(before, language).filter((b): b is ImportRun => b.kind === 'imports');
  const afterBlocks = partitionImports(after, language);
  const afterRunCount = afterBlocks.filter(b => b.kind === 'imports').length;
  if (beforeRuns.length === 0 || beforeRuns.length !== afterRunCount) return after;

  let runIndex = 0;
  const result: string[] = [];
  for (const block of afterBlocks) {
    if (block.kind === 'code') {
      result.push(...block.lines);
      continue;
    }
    const source = beforeRuns[runIndex++];
    const same = source !== undefined && canonicalRun(source, language) === canonicalRun(block, language);
    result.push(...(same ? source.lines : block.lines));
  }
  return result;
}
