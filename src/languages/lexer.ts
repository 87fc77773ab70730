export interface CommentSyntax {
  line: string[];
  block: Array<[open: string, close: string]>;
  /** Line comments only start at a word boundary (`#` in shell, not `$#`). */
  lineNeedsBoundary: boolean;
}

export interface StringSyntax {
  /** Longest delimiters first. */
  quotes: string[];
  /** Delimiters whose literals may span lines. */
  multiline: string[];
}

export type SegmentKind = 'code' | 'string' | 'comment';

export interface Segment {
  kind: SegmentKind;
  text: string;
  start: number;
  /** A string literal standing alone as the first statement of a block. */
  docstring: boolean;
}

const STRING_PREFIX = /^[ \t]*[rRuUbBfF]{0,2}$/;

/**
 * Splits source text into code, string and comment segments. Unterminated
 * single-line strings stop at the end of the line; unterminated block
 * comments and multi-line strings run to the end of the text.
 */
export function tokenize(
  text: string,
  comments: CommentSyntax | null,
  strings: StringSyntax,
  detectDocstrings = false
): Segment[] {
  const segments: Segment[] = [];
  let codeStart = 0;
  let i = 0;

  const flushCode = (end: number) => {
    if (end > codeStart) {
      segments.push({ kind: 'code', text: text.slice(codeStart, end), start: codeStart, docstring: false });
    }
  };

  outer:
  while (i < text.length) {
    if (comments) {
      for (const [open, close] of comments.block) {
        if (!text.startsWith(open, i)) continue;
        const closeAt = text.indexOf(close, i + open.length);
        const end = closeAt === -1 ? text.length : closeAt + close.length;
        flushCode(i);
        segments.push({ kind: 'comment', text: text.slice(i, end), start: i, docstring: false });
        i = codeStart = end;
        continue outer;
      }

      for (const marker of comments.line) {
        if (!text.startsWith(marker, i)) continue;
        if (comments.lineNeedsBoundary && i > 0 && !/\s/.test(text[i - 1] ?? '')) continue;
        const newline = text.indexOf('\n', i);
        const end = newline === -1 ? text.length : newline;
        flushCode(i);
        segments.push({ kind: 'comment', text: text.slice(i, end), start: i, docstring: false });
        i = codeStart = end;
        continue outer;
      }
    }

    for (const quote of strings.quotes) {
      if (!text.startsWith(quote, i)) continue;
      const spansLines = strings.multiline.includes(quote);
      let j = i + quote.length;
      let end = text.length;
      while (j < text.length) {
        const ch = text[j];
        if (ch === '\\') {
          j += 2;
          continue;
        }
        if (text.startsWith(quote, j)) {
          end = j + quote.length;
          break;
        }
        if (ch === '\n' && !spansLines) {
          end = j;
          break;
        }
        j++;
      }
      end = Math.min(end, text.length);

      flushCode(i);
      const docstring = detectDocstrings && quote.length === 3 && startsStatementBlock(text, i, segments);
      segments.push({
        kind: docstring ? 'comment' : 'string',
        text: text.slice(i, end),
        start: i,
        docstring,
      });
      i = codeStart = end;
      continue outer;
    }

    i++;
  }

  flushCode(text.length);
  return segments;
}

/**
 * True when a triple-quoted literal at `index` opens its line and follows
 * either nothing or a line ending in `:` (module, class or function body).
 */
function startsStatementBlock(text: string, index: number, segments: Segment[]): boolean {
  const lineStart = text.lastIndexOf('\n', index - 1) + 1;
  if (!STRING_PREFIX.test(text.slice(lineStart, index))) return false;

  for (let s = segments.length - 1; s >= 0; s--) {
    const segment = segments[s];
    if (!segment) break;
    if (segment.kind === 'comment') continue;
    if (segment.kind === 'string') return false;

    const visible = segment.start + segment.text.length > lineStart
      ? segment.text.slice(0, Math.max(0, lineStart - segment.start))
      : segment.text;
    const trimmed = visible.trimEnd();
    if (trimmed === '') continue;
    return trimmed.endsWith(':');
  }
  return true;
}

/** Comment text with whitespace collapsed. Relocated comments keep the same key. */
export function commentKey(comment: string): string {
  return comment.replace(/\s+/g, ' ').trim();
}
