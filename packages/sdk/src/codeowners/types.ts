/**
 * Shared types for boolean CODEOWNERS rules.
 *
 * @module codeowners/types
 */

/** A `#@BOOL <pattern> <expression>` declaration. */
export interface Rule {
  readonly pattern: string;
  readonly expression: string;
  /** 1-based line of the declaration in the CODEOWNERS file. */
  readonly line: number;
}

/**
 * Why a rule ended up satisfied or not. `invalid-expression` rules count
 * as satisfied so a malformed rule never blocks a pull request.
 */
export type MatchReason = 'approved' | 'missing-approval' | 'invalid-expression';

export interface MatchResult {
  pattern: string;
  expression: string;
  satisfied: boolean;
  reason: MatchReason;
}

export type DiagnosticCode = 'INVALID_EXPRESSION' | 'TEAM_NOT_FOUND';

export interface Diagnostic {
  code: DiagnosticCode;
  message: string;
  expression?: string;
  team?: string;
}

export interface EvaluationReport {
  /** Changed files with at least one matching rule, in input order. */
  files: Map<string, MatchResult[]>;
  satisfied: boolean;
  diagnostics: Diagnostic[];
}

/** Usernames (without `@`) credited with approving the change. */
export type ApproverSet = ReadonlySet<string>;

export interface TeamResolver {
  /** Member usernames of the team, or `null` when the team does not exist. */
  resolve(teamSlug: string): Promise<string[] | null>;
}

export interface ApprovalSource {
  getApprovers(pullNumber: number): Promise<ApproverSet>;
}
