import { loadConfig, ConfigError } from '../../config/loader.js';
import { GitHubClient, GitHubAPIError } from '../../github/client.js';
import { readPullNumber, EventPayloadError } from '../../github/event.js';
import { RuleEngine } from '../../codeowners/engine.js';
import { memoizeTeamResolver } from '../../codeowners/resolvers.js';
import type { EvaluationReport } from '../../codeowners/types.js';
import { createLogger } from '../../utils/logger.js';
import { formatAnnotations, formatReport, reportToJson } from '../report.js';

export interface CheckOptions {
  pr?: number;
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  json?: boolean;
  verbose?: boolean;
}

export interface CheckResult {
  success: boolean;
  report?: EvaluationReport;
  error?: string;
}

/**
 * Check a pull request on GitHub against the boolean rules in the
 * CODEOWNERS file of its base branch.
 */
export async function check(options: CheckOptions = {}): Promise<CheckResult> {
  let report: EvaluationReport;

  try {
    const config = loadConfig({ cwd: options.cwd, configPath: options.configPath, env: options.env });
    const logger = createLogger(options.verbose ? 'debug' : config.logLevel);

    if (!config.owner || !config.repo) {
      throw new ConfigError('GITHUB_REPOSITORY is not set');
    }
    if (!config.token) {
      throw new ConfigError('GITHUB_TOKEN is not set');
    }

    let pullNumber = options.pr;
    if (pullNumber === undefined) {
      if (!config.eventPath) {
        throw new ConfigError('Pass --pr or set GITHUB_EVENT_PATH');
      }
      pullNumber = readPullNumber(config.eventPath);
    }

    const client = new GitHubClient({
      config: {
        owner: config.owner,
        repo: config.repo,
        token: config.token,
        baseUrl: config.apiUrl,
        timeout: config.timeoutMs,
        retries: config.retries,
      },
      logger,
    });

    const baseRef = await client.getBaseRef(pullNumber);
    const [content, changedFiles, approvers] = await Promise.all([
      client.getFileContent(config.codeownersPath, baseRef),
      client.listChangedFiles(pullNumber),
      client.getApprovers(pullNumber),
    ]);

    logger.info('Checking pull request', {
      pullNumber,
      baseRef,
      changedFiles: changedFiles.length,
      approvers: approvers.size,
    });

    const engine = new RuleEngine({ teamResolver: memoizeTeamResolver(client), logger });
    report = await engine.evaluateCodeowners(changedFiles, content, approvers);
  } catch (error) {
    if (
      error instanceof ConfigError ||
      error instanceof EventPayloadError ||
      error instanceof GitHubAPIError
    ) {
      console.error(`::error::${error.message}`);
      return { success: false, error: error.message };
    }
    throw error;
  }

  if (options.json) {
    console.log(JSON.stringify(reportToJson(report), null, 2));
  } else {
    for (const line of formatReport(report)) console.log(line);
    for (const line of formatAnnotations(report)) console.log(line);
  }

  return { success: report.satisfied, report };
}
