/**
 * Syntax Highlighter
 *
 * Single left-to-right pass over a rendered line. Approximate:
 * no lexer, no multi-line comments or strings, numbers are greedy runs of
 * digits and dots.
 */

import { Highlight, type SyntaxRule } from './types.ts';

const SEPARATOR_CHARS = ',.()+-/*=~%<>[];';
const WHITESPACE_CHARS = ' \t\n\v\f\r';

/**
 * Whether a character ends a word. Past end of line counts as a separator.
 */
export function isSeparator(ch: string | undefined): boolean {
  if (ch === undefined || ch === '' || ch === '\0') return true;
  return WHITESPACE_CHARS.includes(ch) || SEPARATOR_CHARS.includes(ch);
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

/**
 * Classify every character of a rendered line.
 */
export function highlightLine(render: string, rule: SyntaxRule | null): Highlight[] {
  const hl: Highlight[] = new Array<Highlight>(render.length).fill(Highlight.Normal);
  if (!rule) return hl;

  const comment = rule.singleLineComment;
  let prevSep = true;
  let inString: string | null = null;

  let i = 0;
  while (i < render.length) {
    const c = render.charAt(i);
    const prevHl = i > 0 ? hl[i - 1] : Highlight.Normal;

    if (comment && inString === null && render.startsWith(comment, i)) {
      hl.fill(Highlight.Comment, i);
      break;
    }

    if (rule.flags.strings) {
      if (inString !== null) {
        hl[i] = Highlight.String;
        if (c === '\\' && i + 1 < render.length) {
          hl[i + 1] = Highlight.String;
          i += 2;
          continue;
        }
        if (c === inString) inString = null;
        i++;
        prevSep = true;
        continue;
      } else if (c === '"' || c === "'") {
        inString = c;
        hl[i] = Highlight.String;
        i++;
        continue;
      }
    }

    if (rule.flags.numbers) {
      if ((isDigit(c) && (prevSep || prevHl === Highlight.Number)) ||
          (c === '.' && prevHl === Highlight.Number)) {
        hl[i] = Highlight.Number;
        i++;
        prevSep = false;
        continue;
      }
    }

    if (prevSep) {
      const start = i;
      const keyword = rule.keywords.find(
        (kw) => render.startsWith(kw.text, start) && isSeparator(render[start + kw.text.length])
      );
      if (keyword) {
        const tag = keyword.secondary ? Highlight.Keyword2 : Highlight.Keyword1;
        hl.fill(tag, i, i + keyword.text.length);
        i += keyword.text.length;
        prevSep = false;
        continue;
      }
    }

    prevSep = isSeparator(c);
    i++;
  }

  return hl;
}

// ============================================
// Highlighter
// ============================================

/**
 * Holds the active rule for a document.
 */
export class SyntaxHighlighter {
  private rule: SyntaxRule | null;

  constructor(rule: SyntaxRule | null = null) {
    this.rule = rule;
  }

  getRule(): SyntaxRule | null {
    return this.rule;
  }

  setRule(rule: SyntaxRule | null): void {
    this.rule = rule;
  }

  highlightLine(render: string): Highlight[] {
    return highlightLine(render, this.rule);
  }
}
