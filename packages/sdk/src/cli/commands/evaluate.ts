import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { RuleEngine } from '../../codeowners/engine.js';
import { InMemoryTeamResolver } from '../../codeowners/resolvers.js';
import type { EvaluationReport } from '../../codeowners/types.js';
import { username } from '../../compiler/evaluator.js';
import { createLogger } from '../../utils/logger.js';
import { formatReport, reportToJson } from '../report.js';

export interface EvaluateOptions {
  codeowners: string;
  files: string[];
  approvers: string[];
  teams?: string;
  json?: boolean;
  verbose?: boolean;
}

export interface EvaluateResult {
  success: boolean;
  report?: EvaluationReport;
  error?: string;
}

/**
 * Parse a teams file: a YAML mapping of team slug to member usernames.
 */
export function parseTeamsFile(content: string): Record<string, string[]> {
  const parsed: unknown = parseYaml(content);
  if (parsed === null || parsed === undefined) return {};
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error('Teams file must contain a mapping of team slug to members');
  }

  const teams: Record<string, string[]> = {};
  for (const [slug, members] of Object.entries(parsed)) {
    if (!Array.isArray(members) || !members.every((m): m is string => typeof m === 'string')) {
      throw new Error(`Team "${slug}" must list member usernames`);
    }
    teams[slug] = members.map(username);
  }
  return teams;
}

/**
 * Evaluate a local CODEOWNERS file against a given set of changed files
 * and approvers, without talking to GitHub.
 */
export async function evaluate(options: EvaluateOptions): Promise<EvaluateResult> {
  const fail = (error: string): EvaluateResult => {
    console.error(`Error: ${error}`);
    return { success: false, error };
  };

  const codeownersPath = resolve(options.codeowners);
  if (!existsSync(codeownersPath)) {
    return fail(`CODEOWNERS file not found: ${codeownersPath}`);
  }

  let teams: Record<string, string[]> = {};
  if (options.teams) {
    const teamsPath = resolve(options.teams);
    if (!existsSync(teamsPath)) {
      return fail(`Teams file not found: ${teamsPath}`);
    }
    try {
      teams = parseTeamsFile(readFileSync(teamsPath, 'utf-8'));
    } catch (e) {
      return fail(`${teamsPath}: ${e instanceof Error ? e.message : String(e)}`);
    }
  }

  const logger = createLogger(options.verbose ? 'debug' : 'warn');
  const engine = new RuleEngine({ teamResolver: new InMemoryTeamResolver(teams), logger });
  const report = await engine.evaluateCodeowners(
    options.files,
    readFileSync(codeownersPath, 'utf-8'),
    new Set(options.approvers.map(username)),
  );

  if (options.json) {
    console.log(JSON.stringify(reportToJson(report), null, 2));
  } else {
    for (const line of formatReport(report)) console.log(line);
  }

  return { success: report.satisfied, report };
}
