/**
 * Rendering of evaluation reports for the terminal, for JSON consumers
 * and as GitHub Actions workflow commands.
 *
 * @module cli/report
 */

import type { Diagnostic, EvaluationReport, MatchResult } from '../codeowners/types.js';
import { unsatisfiedRules } from '../codeowners/engine.js';

export interface JsonReport {
  satisfied: boolean;
  files: Record<string, MatchResult[]>;
  diagnostics: Diagnostic[];
}

export function reportToJson(report: EvaluationReport): JsonReport {
  return {
    satisfied: report.satisfied,
    files: Object.fromEntries(report.files),
    diagnostics: report.diagnostics,
  };
}

const MARKERS: Record<MatchResult['reason'], string> = {
  approved: 'PASS',
  'missing-approval': 'FAIL',
  'invalid-expression': 'SKIP',
};

export function formatReport(report: EvaluationReport): string[] {
  const lines: string[] = [];

  for (const [file, results] of report.files) {
    lines.push(file);
    for (const r of results) {
      const note = r.reason === 'invalid-expression' ? '  (malformed, treated as satisfied)' : '';
      lines.push(`  ${MARKERS[r.reason]}  ${r.pattern}  ${r.expression}${note}`);
    }
  }

  if (lines.length > 0) lines.push('');
  const failed = unsatisfiedRules(report).length;
  lines.push(
    report.satisfied
      ? `${report.files.size} file(s) with boolean rules: all satisfied`
      : `${report.files.size} file(s) with boolean rules: ${failed} rule(s) not satisfied`,
  );
  return lines;
}

/**
 * Workflow commands that surface failures as annotations on the pull
 * request.
 */
export function formatAnnotations(report: EvaluationReport): string[] {
  const lines = report.diagnostics.map((d) => `::warning::${d.message}`);
  if (report.satisfied) return lines;

  lines.push('::group::CodeOwners Validation Failed');
  lines.push('::error::Pull request does not have required approvals');
  for (const { file, result } of unsatisfiedRules(report)) {
    lines.push(`::error file=${file}::${result.expression}`);
  }
  lines.push('::endgroup::');
  return lines;
}
