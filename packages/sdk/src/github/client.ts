/**
 * GitHub REST client for the data a CODEOWNERS check needs:
 * - the pull request's base ref and changed files
 * - the users who approved it
 * - CODEOWNERS content at a ref
 * - team membership (as a TeamResolver)
 *
 * @module github/client
 */

import type { Logger } from '../utils/logger.js';
import { GitHubAPIError } from './errors.js';
import { DEFAULT_RETRY_POLICY, retryRequest, type RetryPolicy } from './retry.js';
import type { ApprovalSource, ApproverSet, TeamResolver } from '../codeowners/types.js';

export interface GitHubClientConfig {
  owner: string;
  repo: string;
  token?: string;
  baseUrl?: string;
  timeout?: number;
  retries?: number;
  retryDelay?: number;
}

export interface GitHubClientOptions {
  config: GitHubClientConfig;
  logger: Logger;
  sleepFn?: (ms: number) => Promise<void>;
  jitterFn?: () => number;
}

interface ResolvedGitHubConfig {
  owner: string;
  repo: string;
  token?: string;
  baseUrl: string;
  timeout: number;
}

export const DEFAULT_GITHUB_API_URL = 'https://api.github.com';

const PAGE_SIZE = 100;

export { GitHubAPIError };

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function loginOf(value: unknown): string | undefined {
  if (!isRecord(value)) return undefined;
  return typeof value.login === 'string' ? value.login : undefined;
}

export class GitHubClient implements TeamResolver, ApprovalSource {
  private readonly config: ResolvedGitHubConfig;
  private readonly logger: Logger;
  private readonly retryPolicy: RetryPolicy;
  private readonly sleepFn?: (ms: number) => Promise<void>;
  private readonly jitterFn?: () => number;

  constructor(options: GitHubClientOptions) {
    this.logger = options.logger;
    this.sleepFn = options.sleepFn;
    this.jitterFn = options.jitterFn;
    this.config = {
      owner: options.config.owner,
      repo: options.config.repo,
      token: options.config.token,
      baseUrl: (options.config.baseUrl ?? DEFAULT_GITHUB_API_URL).replace(/\/$/, ''),
      timeout: options.config.timeout ?? 10_000,
    };
    this.retryPolicy = {
      ...DEFAULT_RETRY_POLICY,
      attempts: options.config.retries ?? DEFAULT_RETRY_POLICY.attempts,
      baseDelayMs: options.config.retryDelay ?? DEFAULT_RETRY_POLICY.baseDelayMs,
    };
  }

  async getBaseRef(pullNumber: number): Promise<string> {
    const pr = await this.request(this.repoPath(`/pulls/${pullNumber}`));
    const base = isRecord(pr) ? pr.base : undefined;
    if (!isRecord(base) || typeof base.ref !== 'string') {
      throw new GitHubAPIError(`Pull request #${pullNumber} has no base ref`);
    }
    return base.ref;
  }

  async listChangedFiles(pullNumber: number): Promise<string[]> {
    const files = await this.paginate(this.repoPath(`/pulls/${pullNumber}/files`));
    return files.flatMap((f) => (isRecord(f) && typeof f.filename === 'string' ? [f.filename] : []));
  }

  /**
   * Users with at least one review in the APPROVED state.
   */
  async getApprovers(pullNumber: number): Promise<ApproverSet> {
    const reviews = await this.paginate(this.repoPath(`/pulls/${pullNumber}/reviews`));
    const approvers = new Set<string>();
    for (const review of reviews) {
      if (!isRecord(review) || review.state !== 'APPROVED') continue;
      const login = loginOf(review.user);
      if (login) approvers.add(login);
    }
    this.logger.debug('Fetched pull request approvers', {
      pullNumber,
      reviews: reviews.length,
      approvers: [...approvers],
    });
    return approvers;
  }

  async getFileContent(path: string, ref?: string): Promise<string> {
    const query = ref ? `?ref=${encodeURIComponent(ref)}` : '';
    const encodedPath = path.split('/').map(encodeURIComponent).join('/');
    const body = await this.request(this.repoPath(`/contents/${encodedPath}${query}`));

    if (Array.isArray(body)) {
      throw new GitHubAPIError(`Path '${path}' points to a directory, not a file`);
    }
    if (!isRecord(body) || typeof body.content !== 'string') {
      throw new GitHubAPIError(`No content returned for '${path}'`);
    }
    const encoding = typeof body.encoding === 'string' ? body.encoding : 'base64';
    if (encoding !== 'base64') {
      throw new GitHubAPIError(`Unsupported content encoding '${encoding}' for '${path}'`);
    }
    return Buffer.from(body.content, 'base64').toString('utf-8');
  }

  /**
   * Member logins of a team in the configured organization, or null when
   * the team does not exist.
   */
  async resolve(teamSlug: string): Promise<string[] | null> {
    const path = `/orgs/${encodeURIComponent(this.config.owner)}/teams/${encodeURIComponent(teamSlug)}/members`;
    try {
      const members = await this.paginate(path);
      return members.flatMap((m) => {
        const login = loginOf(m);
        return login ? [login] : [];
      });
    } catch (error) {
      if (error instanceof GitHubAPIError && error.statusCode === 404) {
        this.logger.debug('Team not found', { team: teamSlug });
        return null;
      }
      throw error;
    }
  }

  private repoPath(suffix: string): string {
    return `/repos/${encodeURIComponent(this.config.owner)}/${encodeURIComponent(this.config.repo)}${suffix}`;
  }

  private async paginate(path: string): Promise<unknown[]> {
    const items: unknown[] = [];
    const sep = path.includes('?') ? '&' : '?';

    for (let page = 1; ; page++) {
      const body = await this.request(`${path}${sep}per_page=${PAGE_SIZE}&page=${page}`);
      if (!Array.isArray(body)) {
        throw new GitHubAPIError(`Expected a list from ${path}`);
      }
      items.push(...body);
      if (body.length < PAGE_SIZE) return items;
    }
  }

  private async request(path: string): Promise<unknown> {
    const url = `${this.config.baseUrl}${path}`;
    this.logger.debug('GitHub API request', { url });

    return retryRequest(url, () => this.fetchJson(url), this.retryPolicy, {
      logger: this.logger,
      sleep: this.sleepFn,
      random: this.jitterFn,
    });
  }

  private async fetchJson(url: string): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeout);

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: this.buildHeaders(),
        signal: controller.signal,
      });

      if (!response.ok) {
        const body = await response.text().catch(() => '');
        throw new GitHubAPIError(
          `GitHub API returned status ${response.status} for ${url}`,
          response.status,
          body,
        );
      }

      return await response.json();
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new GitHubAPIError(`GitHub API request timed out after ${this.config.timeout}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/vnd.github+json',
      'User-Agent': 'ownergate',
      'X-GitHub-Api-Version': '2022-11-28',
    };
    if (this.config.token) {
      headers.Authorization = `Bearer ${this.config.token}`;
    }
    return headers;
  }
}
