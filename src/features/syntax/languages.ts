/**
 * Language Rules
 *
 * Builds the syntax rule table from languages.json and picks a rule for a
 * filename.
 */

import languageData from './languages.json';
import type { SyntaxKeyword, SyntaxRule } from './types.ts';

/**
 * Shape of one entry in languages.json.
 */
export interface LanguageDefinition {
  filetype: string;
  fileMatch: string[];
  keywords: string[];
  types: string[];
  singleLineComment: string;
  numbers: boolean;
  strings: boolean;
}

/**
 * Build an immutable rule. Primary keywords are matched before secondary ones.
 */
export function createSyntaxRule(def: LanguageDefinition): SyntaxRule {
  const keywords: SyntaxKeyword[] = [
    ...def.keywords.filter((k) => k.length > 0).map((text) => ({ text, secondary: false })),
    ...def.types.filter((k) => k.length > 0).map((text) => ({ text, secondary: true })),
  ];

  return Object.freeze({
    filetype: def.filetype,
    fileMatch: Object.freeze([...def.fileMatch]),
    keywords: Object.freeze(keywords),
    singleLineComment: def.singleLineComment,
    flags: Object.freeze({ numbers: def.numbers, strings: def.strings }),
  });
}

export const SYNTAX_DATABASE: readonly SyntaxRule[] = Object.freeze(
  (languageData satisfies LanguageDefinition[]).map(createSyntaxRule)
);

/**
 * Pick the first rule matching the filename. Patterns starting with '.' must
 * equal the filename's last extension; others match anywhere in the name.
 */
export function selectSyntax(
  filename: string | null,
  database: readonly SyntaxRule[] = SYNTAX_DATABASE
): SyntaxRule | null {
  if (!filename) return null;

  const dot = filename.lastIndexOf('.');
  const ext = dot === -1 ? null : filename.slice(dot);

  for (const rule of database) {
    for (const pattern of rule.fileMatch) {
      const isExt = pattern.startsWith('.');
      if ((isExt && ext !== null && ext === pattern) || (!isExt && filename.includes(pattern))) {
        return rule;
      }
    }
  }
  return null;
}
