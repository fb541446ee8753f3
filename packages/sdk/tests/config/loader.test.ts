import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  ConfigError,
  DEFAULT_CONFIG,
  findConfigFile,
  loadConfig,
  parseConfigFile,
} from '../../src/config/loader.js';

describe('parseConfigFile', () => {
  it('should read every supported key', () => {
    const config = parseConfigFile(
      [
        'codeowners: docs/CODEOWNERS',
        'log_level: debug',
        'api_url: https://github.example.com/api/v3',
        'retries: 5',
        'timeout_ms: 2500',
      ].join('\n'),
      'ownergate.config.yaml',
    );

    expect(config).toEqual({
      codeowners: 'docs/CODEOWNERS',
      log_level: 'debug',
      api_url: 'https://github.example.com/api/v3',
      retries: 5,
      timeout_ms: 2500,
    });
  });

  it('should accept an empty file', () => {
    expect(parseConfigFile('', 'empty.yaml')).toEqual({});
  });

  it('should reject a list', () => {
    expect(() => parseConfigFile('- a\n- b\n', 'list.yaml')).toThrow('list.yaml: File must contain a YAML object');
  });

  it('should reject a non-positive retry count', () => {
    expect(() => parseConfigFile('retries: 0', 'c.yaml')).toThrow('c.yaml: "retries" must be a positive integer');
  });

  it('should reject an unknown log level', () => {
    expect(() => parseConfigFile('log_level: loud', 'c.yaml')).toThrow(
      'c.yaml: "log_level" must be one of: debug, info, warn, error, silent',
    );
  });

  it('should reject an empty codeowners path', () => {
    expect(() => parseConfigFile('codeowners: ""', 'c.yaml')).toThrow(
      'c.yaml: "codeowners" must be a non-empty string',
    );
  });

  it('should wrap YAML syntax errors', () => {
    expect(() => parseConfigFile('retries: [1, 2', 'bad.yaml')).toThrow(ConfigError);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'ownergate-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should fall back to defaults', () => {
    const config = loadConfig({ cwd: dir, env: {} });

    expect(config).toEqual({
      token: undefined,
      eventPath: undefined,
      ...DEFAULT_CONFIG,
    });
  });

  it('should read GitHub Actions variables', () => {
    const config = loadConfig({
      cwd: dir,
      env: {
        GITHUB_TOKEN: 'test-token',
        GITHUB_REPOSITORY: 'acme/widgets',
        GITHUB_EVENT_PATH: '/tmp/event.json',
        GITHUB_API_URL: 'http://localhost:3001',
      },
    });

    expect(config.token).toBe('test-token');
    expect(config.owner).toBe('acme');
    expect(config.repo).toBe('widgets');
    expect(config.eventPath).toBe('/tmp/event.json');
    expect(config.apiUrl).toBe('http://localhost:3001');
  });

  it('should reject a malformed GITHUB_REPOSITORY', () => {
    expect(() => loadConfig({ cwd: dir, env: { GITHUB_REPOSITORY: 'widgets' } })).toThrow(
      'GITHUB_REPOSITORY must look like "owner/repo", got "widgets"',
    );
  });

  it('should find a config file under .github', () => {
    mkdirSync(join(dir, '.github'));
    writeFileSync(join(dir, '.github', 'ownergate.yaml'), 'codeowners: CODEOWNERS\nretries: 1\n');

    expect(findConfigFile(dir)).toBe(join(dir, '.github', 'ownergate.yaml'));
    const config = loadConfig({ cwd: dir, env: {} });
    expect(config.codeownersPath).toBe('CODEOWNERS');
    expect(config.retries).toBe(1);
  });

  it('should let the environment override the file', () => {
    writeFileSync(
      join(dir, 'ownergate.config.yaml'),
      'codeowners: CODEOWNERS\nlog_level: warn\napi_url: http://file.test\n',
    );

    const config = loadConfig({
      cwd: dir,
      env: {
        OWNERGATE_CODEOWNERS_PATH: 'docs/CODEOWNERS',
        OWNERGATE_LOG_LEVEL: 'debug',
        GITHUB_API_URL: 'http://env.test',
      },
    });

    expect(config.codeownersPath).toBe('docs/CODEOWNERS');
    expect(config.logLevel).toBe('debug');
    expect(config.apiUrl).toBe('http://env.test');
  });

  it('should reject an invalid OWNERGATE_LOG_LEVEL', () => {
    expect(() => loadConfig({ cwd: dir, env: { OWNERGATE_LOG_LEVEL: 'chatty' } })).toThrow(
      'OWNERGATE_LOG_LEVEL must be one of: debug, info, warn, error, silent',
    );
  });

  it('should fail when an explicit config file is missing', () => {
    const missing = join(dir, 'nope.yaml');
    expect(() => loadConfig({ configPath: missing, env: {} })).toThrow(`${missing}: Config file not found`);
  });
});
