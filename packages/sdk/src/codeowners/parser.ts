/**
 * Extraction of `#@BOOL` declarations from CODEOWNERS content.
 *
 * @module codeowners/parser
 */

import type { Rule } from './types.js';

export const RULE_MARKER = '#@BOOL';

const DECLARATION = /^#@BOOL\s+(\S+)\s+(.+)$/;

/**
 * Parse boolean rules out of a CODEOWNERS file. Ordinary owner lines and
 * comments are ignored. When a pattern is declared twice, the later
 * expression wins but the rule keeps its first position.
 */
export function parseRules(content: string): Rule[] {
  const rules: Rule[] = [];
  const byPattern = new Map<string, number>();

  content.split(/\r?\n/).forEach((line, index) => {
    if (!line.startsWith(RULE_MARKER)) return;

    const match = DECLARATION.exec(line);
    if (!match) return;

    const [, pattern, rest] = match;
    const expression = rest.trim();
    if (expression === '') return;

    const rule: Rule = { pattern, expression, line: index + 1 };
    const existing = byPattern.get(pattern);
    if (existing === undefined) {
      byPattern.set(pattern, rules.length);
      rules.push(rule);
    } else {
      rules[existing] = rule;
    }
  });

  return rules;
}
