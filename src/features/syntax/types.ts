/**
 * Syntax Types
 */

/**
 * Color class of one rendered character.
 */
export enum Highlight {
  Normal,
  Comment,
  Keyword1,
  Keyword2,
  String,
  Number,
  Match,
}

export interface SyntaxKeyword {
  text: string;
  /** Secondary keywords (usually type names) get Keyword2 */
  secondary: boolean;
}

/**
 * Language rule. Immutable once built.
 */
export interface SyntaxRule {
  /** Name shown in the status bar */
  readonly filetype: string;
  /** '.ext' patterns match the last extension exactly; others match as substrings */
  readonly fileMatch: readonly string[];
  /** Matched in order; the first hit wins */
  readonly keywords: readonly SyntaxKeyword[];
  /** Empty string disables comment highlighting */
  readonly singleLineComment: string;
  readonly flags: {
    readonly numbers: boolean;
    readonly strings: boolean;
  };
}
