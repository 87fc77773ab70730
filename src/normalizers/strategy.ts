import { alignLines } from '../diff/line-diff.js';
import { commentKey, tokenize } from '../languages/lexer.js';
import { languageFor, type LanguageDefinition } from '../languages/registry.js';

export interface CommentStripper {
  /** Whitespace-collapsed text of every comment in `text`. */
  collect(text: string): Set<string>;
  /**
   * Removes the comments `keep` rejects. Lines that held nothing but removed
   * comments disappear; other touched lines lose their trailing whitespace.
   */
  strip(text: string, keep: (key: string) => boolean): string;
}

export interface BlankLineStripper {
  /** Drops blank after-lines that the before text does not account for. */
  strip(before: string[], after: string[]): string[];
}

export interface NormalizationStrategy {
  language: LanguageDefinition;
  /** The extension has no known comment syntax; comments are left alone. */
  ambiguous: boolean;
  comments: CommentStripper | null;
  blankLines: BlankLineStripper;
}

export class LexerCommentStripper implements CommentStripper {
  constructor(private readonly language: LanguageDefinition) {}

  collect(text: string): Set<string> {
    const keys = new Set<string>();
    for (const segment of this.segments(text)) {
      if (segment.kind === 'comment') keys.add(commentKey(segment.text));
    }
    return keys;
  }

  strip(text: string, keep: (key: string) => boolean): string {
    const touched = new Set<number>();
    let line = 0;
    let out = '';

    for (const segment of this.segments(text)) {
      const newlines = segment.text.split('\n').length - 1;
      if (segment.kind === 'comment' && !keep(commentKey(segment.text))) {
        for (let k = 0; k <= newlines; k++) touched.add(line + k);
        // Keep the line structure so touched line numbers stay valid.
        out += '\n'.repeat(newlines);
      } else {
        out += segment.text;
      }
      line += newlines;
    }

    if (touched.size === 0) return text;

    const result: string[] = [];
    out.split('\n').forEach((content, index) => {
      if (!touched.has(index)) {
        result.push(content);
        return;
      }
      const trimmed = content.trimEnd();
      if (trimmed.trim() !== '') result.push(trimmed);
    });
    return result.join('\n');
  }

  private segments(text: string) {
    return tokenize(text, this.language.comments, this.language.strings, this.language.docstrings);
  }
}

export class AlignedBlankLineStripper implements BlankLineStripper {
  strip(before: string[], after: string[]): string[] {
    let current = after;
    // Removing lines can shift the alignment, so repeat until nothing moves.
    for (;;) {
      const matched = new Set(alignLines(before, current).map(([, ai]) => ai));
      const next = current.filter((line, index) => matched.has(index) || line.trim() !== '');
      if (next.length === current.length) return current;
      current = next;
    }
  }
}

const BLANK_LINES = new AlignedBlankLineStripper();
const strategies = new Map<string, NormalizationStrategy>();

/** Picks the stripping strategy for a path from its extension. */
export function strategyFor(path: string): NormalizationStrategy {
  const language = languageFor(path);
  const cached = strategies.get(language.id);
  if (cached) return cached;

  const strategy: NormalizationStrategy = {
    language,
    ambiguous: language.comments === null,
    comments: language.comments === null ? null : new LexerCommentStripper(language),
    blankLines: BLANK_LINES,
  };
  strategies.set(language.id, strategy);
  return strategy;
}
