/**
 * ownergate: boolean approval rules for CODEOWNERS.
 *
 * @example
 * ```typescript
 * import { RuleEngine, InMemoryTeamResolver, createLogger } from 'ownergate';
 *
 * const engine = new RuleEngine({
 *   teamResolver: new InMemoryTeamResolver({ web: ['alice', 'bob'] }),
 *   logger: createLogger('warn'),
 * });
 * const report = await engine.evaluateCodeowners(
 *   ['src/app.ts'],
 *   '#@BOOL src/ @acme/web AND @carol',
 *   new Set(['alice', 'carol']),
 * );
 * report.satisfied; // true
 * ```
 *
 * @module ownergate
 */

export * from './codeowners/index.js';
export * from './compiler/index.js';
export { matchesPattern, compilePattern } from './matcher/pattern.js';
export { GitHubClient, GitHubAPIError, DEFAULT_GITHUB_API_URL } from './github/client.js';
export type { GitHubClientConfig, GitHubClientOptions } from './github/client.js';
export { readPullNumber, pullNumberFromPayload, EventPayloadError } from './github/event.js';
export {
  loadConfig,
  parseConfigFile,
  findConfigFile,
  ConfigError,
  DEFAULT_CONFIG,
  type OwnergateConfig,
  type OwnergateConfigFile,
  type LoadConfigOptions,
} from './config/loader.js';
export { retryRequest, isRetriable, backoffDelay, DEFAULT_RETRY_POLICY } from './github/retry.js';
export type { RetryPolicy, RetryHooks } from './github/retry.js';
export { createLogger, silentLogger, isLogLevel } from './utils/logger.js';
export type { Logger, LogLevel, LogContext } from './utils/logger.js';
