/**
 * Matches changed files against boolean CODEOWNERS rules and decides
 * whether the collected approvals satisfy them.
 *
 * @module codeowners/engine
 */

import type { Logger } from '../utils/logger.js';
import { compile, evaluate, type CompileResult } from '../compiler/index.js';
import { matchesPattern } from '../matcher/pattern.js';
import { parseRules } from './parser.js';
import type {
  ApproverSet,
  Diagnostic,
  EvaluationReport,
  MatchResult,
  Rule,
  TeamResolver,
} from './types.js';

export interface RuleEngineOptions {
  teamResolver: TeamResolver;
  logger: Logger;
}

export interface UnsatisfiedRule {
  file: string;
  result: MatchResult;
}

/**
 * True when every reported file has at least one satisfied rule. Files
 * without matching rules are absent from the map and never block.
 */
export function isSatisfied(files: Map<string, MatchResult[]>): boolean {
  for (const results of files.values()) {
    if (!results.some((r) => r.satisfied)) return false;
  }
  return true;
}

export function unsatisfiedRules(report: EvaluationReport): UnsatisfiedRule[] {
  const out: UnsatisfiedRule[] = [];
  for (const [file, results] of report.files) {
    for (const result of results) {
      if (!result.satisfied) out.push({ file, result });
    }
  }
  return out;
}

export class RuleEngine {
  private readonly teamResolver: TeamResolver;
  private readonly logger: Logger;

  constructor(options: RuleEngineOptions) {
    this.teamResolver = options.teamResolver;
    this.logger = options.logger;
  }

  /**
   * Parse `#@BOOL` rules out of CODEOWNERS content and evaluate them.
   */
  async evaluateCodeowners(
    changedFiles: string[],
    content: string,
    approvers: ApproverSet,
  ): Promise<EvaluationReport> {
    return this.evaluate(changedFiles, parseRules(content), approvers);
  }

  async evaluate(
    changedFiles: string[],
    rules: Rule[],
    approvers: ApproverSet,
  ): Promise<EvaluationReport> {
    const diagnostics: Diagnostic[] = [];
    const report = (diagnostic: Diagnostic) => {
      diagnostics.push(diagnostic);
      this.logger.warn(diagnostic.message, {
        code: diagnostic.code,
        expression: diagnostic.expression,
        team: diagnostic.team,
      });
    };

    // compiled on first match, at most once per rule
    const compiled = new Map<Rule, CompileResult>();
    const compileRule = (rule: Rule): CompileResult => {
      let result = compiled.get(rule);
      if (!result) {
        result = compile(rule.expression);
        compiled.set(rule, result);
        if (!result.ok) {
          report({
            code: 'INVALID_EXPRESSION',
            message: `Malformed rule for '${rule.pattern}' (${result.error.reason}); treating it as satisfied`,
            expression: rule.expression,
          });
        }
      }
      return result;
    };

    const matched: Array<{ file: string; verdict: Promise<MatchResult> }> = [];
    for (const file of changedFiles) {
      for (const rule of rules) {
        if (!matchesPattern(file, rule.pattern)) continue;
        matched.push({ file, verdict: this.evaluateRule(rule, compileRule(rule), approvers, report) });
      }
    }

    const results = await Promise.all(matched.map((m) => m.verdict));
    const files = new Map<string, MatchResult[]>();
    matched.forEach(({ file }, i) => {
      const list = files.get(file);
      if (list) list.push(results[i]);
      else files.set(file, [results[i]]);
    });

    const satisfied = isSatisfied(files);
    this.logger.debug('Evaluated CODEOWNERS rules', {
      changedFiles: changedFiles.length,
      rules: rules.length,
      matchedFiles: files.size,
      satisfied,
    });

    return { files, satisfied, diagnostics };
  }

  private async evaluateRule(
    rule: Rule,
    compiled: CompileResult,
    approvers: ApproverSet,
    onDiagnostic: (diagnostic: Diagnostic) => void,
  ): Promise<MatchResult> {
    const base = { pattern: rule.pattern, expression: rule.expression };
    if (!compiled.ok) {
      return { ...base, satisfied: true, reason: 'invalid-expression' };
    }

    const satisfied = await evaluate(compiled.postfix, approvers, this.teamResolver, {
      onDiagnostic: (d) => onDiagnostic({ ...d, expression: rule.expression }),
    });
    return { ...base, satisfied, reason: satisfied ? 'approved' : 'missing-approval' };
  }
}
