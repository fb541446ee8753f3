import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parseRules } from '../../codeowners/parser.js';
import { compile } from '../../compiler/index.js';

export interface RulesOptions {
  codeowners: string;
  json?: boolean;
}

export interface RuleSummary {
  line: number;
  pattern: string;
  expression: string;
  valid: boolean;
  error?: string;
}

export interface RulesResult {
  valid: boolean;
  rules: RuleSummary[];
  error?: string;
}

/**
 * List the boolean rules of a CODEOWNERS file and flag the malformed
 * ones, which a check would silently treat as satisfied.
 */
export async function rules(options: RulesOptions): Promise<RulesResult> {
  const path = resolve(options.codeowners);
  if (!existsSync(path)) {
    const error = `CODEOWNERS file not found: ${path}`;
    console.error(`Error: ${error}`);
    return { valid: false, rules: [], error };
  }

  const summaries: RuleSummary[] = parseRules(readFileSync(path, 'utf-8')).map((rule) => {
    const compiled = compile(rule.expression);
    return {
      line: rule.line,
      pattern: rule.pattern,
      expression: rule.expression,
      valid: compiled.ok,
      ...(compiled.ok ? {} : { error: compiled.error.reason }),
    };
  });

  const result: RulesResult = {
    valid: summaries.every((s) => s.valid),
    rules: summaries,
  };

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
    return result;
  }

  if (summaries.length === 0) {
    console.log('No #@BOOL rules found');
    return result;
  }

  for (const s of summaries) {
    const status = s.valid ? 'OK     ' : 'INVALID';
    const detail = s.error ? `  (${s.error})` : '';
    console.log(`${status} ${path}:${s.line}  ${s.pattern}  ${s.expression}${detail}`);
  }
  const invalid = summaries.filter((s) => !s.valid).length;
  console.log('');
  console.log(`${summaries.length} rule(s), ${invalid} invalid`);

  return result;
}
