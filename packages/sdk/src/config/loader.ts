/**
 * Configuration from the environment and an optional YAML file.
 * Environment variables take precedence over the file.
 *
 * @module config/loader
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { isLogLevel, type LogLevel } from '../utils/logger.js';
import { DEFAULT_GITHUB_API_URL } from '../github/client.js';

export interface OwnergateConfigFile {
  codeowners?: string;
  log_level?: LogLevel;
  api_url?: string;
  retries?: number;
  timeout_ms?: number;
}

export interface OwnergateConfig {
  token?: string;
  owner?: string;
  repo?: string;
  eventPath?: string;
  apiUrl: string;
  codeownersPath: string;
  logLevel: LogLevel;
  retries: number;
  timeoutMs: number;
}

export interface LoadConfigOptions {
  cwd?: string;
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

export class ConfigError extends Error {
  constructor(message: string, public readonly file?: string) {
    super(file ? `${file}: ${message}` : message);
    this.name = 'ConfigError';
  }
}

export const CONFIG_FILE_NAMES = [
  'ownergate.config.yaml',
  'ownergate.config.yml',
  join('.github', 'ownergate.yaml'),
];

export const DEFAULT_CONFIG: Omit<OwnergateConfig, 'token' | 'owner' | 'repo' | 'eventPath'> = {
  apiUrl: DEFAULT_GITHUB_API_URL,
  codeownersPath: '.github/CODEOWNERS',
  logLevel: 'info',
  retries: 3,
  timeoutMs: 10_000,
};

export function findConfigFile(dir: string = process.cwd()): string | null {
  for (const name of CONFIG_FILE_NAMES) {
    const path = join(dir, name);
    if (existsSync(path)) return path;
  }
  return null;
}

function positiveInteger(value: unknown, field: string, file: string): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`"${field}" must be a positive integer`, file);
  }
  return value;
}

function optionalString(value: unknown, field: string, file: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || value.length === 0) {
    throw new ConfigError(`"${field}" must be a non-empty string`, file);
  }
  return value;
}

function optionalLogLevel(value: unknown, source: string, file?: string): LogLevel | undefined {
  if (value === undefined) return undefined;
  if (!isLogLevel(value)) {
    throw new ConfigError(`${source} must be one of: debug, info, warn, error, silent`, file);
  }
  return value;
}

export function parseConfigFile(content: string, file: string): OwnergateConfigFile {
  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (e) {
    throw new ConfigError(`YAML parse error: ${e instanceof Error ? e.message : String(e)}`, file);
  }

  if (parsed === null || parsed === undefined) return {};
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigError('File must contain a YAML object', file);
  }

  const data: Record<string, unknown> = { ...parsed };
  return {
    codeowners: optionalString(data.codeowners, 'codeowners', file),
    log_level: optionalLogLevel(data.log_level, '"log_level"', file),
    api_url: optionalString(data.api_url, 'api_url', file),
    retries: positiveInteger(data.retries, 'retries', file),
    timeout_ms: positiveInteger(data.timeout_ms, 'timeout_ms', file),
  };
}

function splitRepository(value: string | undefined): { owner?: string; repo?: string } {
  if (!value) return {};
  const [owner, repo] = value.split('/');
  if (!owner || !repo) {
    throw new ConfigError(`GITHUB_REPOSITORY must look like "owner/repo", got "${value}"`);
  }
  return { owner, repo };
}

export function loadConfig(options: LoadConfigOptions = {}): OwnergateConfig {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? findConfigFile(options.cwd);

  let file: OwnergateConfigFile = {};
  if (configPath) {
    if (!existsSync(configPath)) {
      throw new ConfigError('Config file not found', configPath);
    }
    file = parseConfigFile(readFileSync(configPath, 'utf-8'), configPath);
  }

  const envLogLevel = optionalLogLevel(env.OWNERGATE_LOG_LEVEL || undefined, 'OWNERGATE_LOG_LEVEL');

  return {
    token: env.GITHUB_TOKEN || undefined,
    ...splitRepository(env.GITHUB_REPOSITORY),
    eventPath: env.GITHUB_EVENT_PATH || undefined,
    apiUrl: env.GITHUB_API_URL || file.api_url || DEFAULT_CONFIG.apiUrl,
    codeownersPath: env.OWNERGATE_CODEOWNERS_PATH || file.codeowners || DEFAULT_CONFIG.codeownersPath,
    logLevel: envLogLevel ?? file.log_level ?? DEFAULT_CONFIG.logLevel,
    retries: file.retries ?? DEFAULT_CONFIG.retries,
    timeoutMs: file.timeout_ms ?? DEFAULT_CONFIG.timeoutMs,
  };
}
