import { splitLines } from '../diff/line-diff.js';
import { commentKey, tokenize, type Segment } from '../languages/lexer.js';
import type { LanguageDefinition } from '../languages/registry.js';

const WORD_CHAR = /[\p{L}\p{N}_$]/u;
// Characters that fuse with a neighbour into a longer operator (`--`, `<=`, `**`).
const FUSING = new Set(['+', '-', '*', '/', '%', '<', '>', '=', '!', '&', '|', '^', '~', '?', ':', '.', '@']);
const OPENERS = new Set(['(', '[', '{']);
const CLOSERS = new Set([')', ']', '}']);

function isWord(ch: string): boolean {
  return WORD_CHAR.test(ch);
}

/**
 * Whether a space between `prev` and `next` can change how the line
 * tokenizes: two words (`return x`), two fusing operators (`- -`), or a
 * number touching a dot (`1 .real`).
 */
function spaceMatters(prev: string, next: string): boolean {
  if (isWord(prev) && isWord(next)) return true;
  if (FUSING.has(prev) && FUSING.has(next)) return true;
  if (/\d/.test(prev) && next === '.') return true;
  return prev === '.' && /\d/.test(next);
}

/** Removes the common indentation of every line after the first. */
export function dedentLiteral(literal: string): string {
  const lines = literal.split('\n');
  if (lines.length < 2) return literal;
  const rest = lines.slice(1);
  const indents = rest
    .filter(line => line.trim() !== '')
    .map(line => line.length - line.trimStart().length);
  const common = indents.length > 0 ? Math.min(...indents) : 0;
  return [lines[0] ?? '', ...rest.map(line => line.slice(Math.min(common, line.length - line.trimStart().length)))].join('\n');
}

/** `keep` writes every comment as its collapsed key; `drop` leaves comments out. */
export type CommentMode = 'keep' | 'drop';

/**
 * Canonical text of a code fragment.
 *
 * Comments (docstrings included) become their whitespace-collapsed key, or
 * vanish under `drop`. Whitespace is kept only where it separates two tokens
 * that would otherwise merge, line breaks inside open brackets become
 * spaces, blank lines disappear, and multi-line string literals are
 * dedented. Leading indentation survives only for languages where it is
 * syntax. Languages without a known comment syntax only lose trailing
 * whitespace and blank lines.
 */
export function canonicalCode(text: string, language: LanguageDefinition, comments: CommentMode = 'keep'): string {
  if (language.comments === null) {
    return splitLines(text)
      .map(line => line.trimEnd())
      .filter(line => line !== '')
      .join('\n');
  }

  const segments: Segment[] = tokenize(text, language.comments, language.strings, language.docstrings);
  const lines: string[] = [];
  let out = '';
  let indent = '';
  let atLineStart = true;
  let pendingSpace = false;
  let depth = 0;

  const endLine = () => {
    if (!atLineStart) lines.push(out);
    out = '';
    indent = '';
    atLineStart = true;
    pendingSpace = false;
  };

  const emit = (piece: string) => {
    if (atLineStart) {
      out = language.significantIndentation ? indent : '';
      atLineStart = false;
    } else if (pendingSpace && spaceMatters(out[out.length - 1] ?? '', piece[0] ?? '')) {
      out += ' ';
    }
    pendingSpace = false;
    out += piece;
  };

  const whitespace = (ch: string) => {
    if (atLineStart) indent += ch;
    else pendingSpace = true;
  };

  for (const segment of segments) {
    if (segment.kind === 'comment') {
      if (comments === 'keep') emit(commentKey(segment.text));
      else if (segment.text.includes('\n') && depth === 0) endLine();
      else whitespace(' ');
      continue;
    }

    if (segment.kind === 'string') {
      emit(segment.text.includes('\n') ? dedentLiteral(segment.text) : segment.text);
      continue;
    }

    for (const ch of segment.text) {
      if (ch === '\n') {
        if (depth > 0) whitespace(' ');
        else endLine();
      } else if (ch === ' ' || ch === '\t' || ch === '\r' || ch === '\f') {
        whitespace(ch);
      } else {
        if (OPENERS.has(ch)) depth++;
        else if (CLOSERS.has(ch)) depth = Math.max(0, depth - 1);
        emit(ch);
      }
    }
  }
  endLine();

  return lines.join('\n');
}

const FROM_IMPORT = /^(\s*from\b.*?\bimport)\(?([^()]*)\)?$/;
const BRACED_IMPORT = /^(\s*import(?: type)?)\{([^{}]*)\}(.*)$/;

function sortNames(list: string): string {
  return list
    .split(',')
    .map(name => name.trim())
    .filter(name => name !== '')
    .sort()
    .join(',');
}

/** Canonical import statement; the imported names are order-insensitive. */
export function canonicalImport(statement: string, language: LanguageDefinition): string {
  const code = canonicalCode(statement, language).split('\n').map(line => line.trim()).join(' ');
  const from = FROM_IMPORT.exec(code);
  if (from) return `${from[1] ?? ''} ${sortNames(from[2] ?? '')}`;
  const braced = BRACED_IMPORT.exec(code);
  if (braced) return `${braced[1] ?? ''}{${sortNames(braced[2] ?? '')}}${braced[3] ?? ''}`;
  return code;
}
