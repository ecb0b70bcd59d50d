import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join, dirname } from 'node:path';
import { tmpdir } from 'node:os';
import { fileURLToPath } from 'node:url';
import * as nodeFs from 'node:fs';
import {
  findConfigPath,
  findProjectRoot,
  getEnvironmentConfig,
  loadConfig,
  logFileFromConfig,
  redactionPolicyFromConfig,
  resolveVaultToken,
  validateConfig,
} from '../../src/config/loader.js';
import { isPromoterError } from '../../src/errors.js';
import type { PromoterConfig } from '../../src/types.js';
import { DEFAULT_SENSITIVE_KEYS } from '../../src/types.js';

const FIXTURES_DIR = join(dirname(fileURLToPath(import.meta.url)), '../fixtures');

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected an error');
}

describe('findConfigPath', () => {
  it('finds promoter.yaml in basic fixture', () => {
    expect(findConfigPath(join(FIXTURES_DIR, 'basic'))).toBe(join(FIXTURES_DIR, 'basic/promoter.yaml'));
  });

  it('finds promoter.json', () => {
    expect(findConfigPath(join(FIXTURES_DIR, 'json-config'))).toBe(join(FIXTURES_DIR, 'json-config/promoter.json'));
  });

  it('returns null when no config exists', () => {
    expect(findConfigPath(join(FIXTURES_DIR, 'basic/nonexistent'))).toBeNull();
  });
});

describe('loadConfig', () => {
  it('loads environments and redaction settings from basic fixture', () => {
    const config = loadConfig(join(FIXTURES_DIR, 'basic'));

    expect(config.environments.dev).toEqual({
      store: 'vault',
      url: 'http://vault.dev.test:8200',
      token_env: 'VAULT_DEV_TOKEN',
      namespace: undefined,
    });
    expect(config.environments.staging).toMatchObject({ store: 'vault', namespace: 'team-a' });
    expect(config.environments['prod-aws']).toEqual({
      store: 'awssecretsmanager',
      region: 'eu-west-1',
      role: 'arn:aws:iam::000000000000:role/promoter',
    });
    expect(config.redacted_keys).toEqual(['password', 'token']);
    expect(config.redact_secrets).toBe(false);
    expect(config.redact_json_values).toBe(true);
    expect(config.log_file).toBe('./logs/promoter.log');
  });

  it('loads a JSON config', () => {
    const config = loadConfig(join(FIXTURES_DIR, 'json-config'));
    expect(Object.keys(config.environments)).toEqual(['dev']);
  });

  it('returns an empty config when no file exists', () => {
    expect(loadConfig('/nonexistent/path')).toEqual({ environments: {} });
  });
});

describe('loadConfig with invalid files', () => {
  const TEST_DIR = join(tmpdir(), 'promoter-test-invalid-config');

  beforeEach(() => {
    nodeFs.rmSync(TEST_DIR, { recursive: true, force: true });
    nodeFs.mkdirSync(TEST_DIR, { recursive: true });
  });

  afterEach(() => {
    nodeFs.rmSync(TEST_DIR, { recursive: true, force: true });
  });

  it('rejects an unknown store kind', () => {
    nodeFs.writeFileSync(join(TEST_DIR, 'promoter.yaml'), 'environments:\n  dev:\n    store: consul\n');
    const error = captureError(() => loadConfig(TEST_DIR));
    expect(isPromoterError(error, 'INVALID_CONFIG')).toBe(true);
    expect(error instanceof Error && error.message).toBe(
      'Environment "dev": unsupported store "consul" (must be one of: vault, awssecretsmanager)',
    );
  });

  it('rejects malformed YAML', () => {
    nodeFs.writeFileSync(join(TEST_DIR, 'promoter.yaml'), 'environments: [unclosed\n');
    expect(isPromoterError(captureError(() => loadConfig(TEST_DIR)), 'INVALID_CONFIG')).toBe(true);
  });
});

describe('findProjectRoot', () => {
  const TEST_DIR = join(tmpdir(), 'promoter-test-project-root');

  beforeEach(() => {
    nodeFs.rmSync(TEST_DIR, { recursive: true, force: true });
    nodeFs.mkdirSync(join(TEST_DIR, 'services/api'), { recursive: true });
  });

  afterEach(() => {
    nodeFs.rmSync(TEST_DIR, { recursive: true, force: true });
  });

  it('finds promoter.yaml in a parent directory', () => {
    nodeFs.writeFileSync(join(TEST_DIR, 'promoter.yaml'), 'environments: {}\n');

    const result = findProjectRoot(join(TEST_DIR, 'services/api'));
    expect(result?.projectRoot).toBe(TEST_DIR);
    expect(result?.configPath).toBe(join(TEST_DIR, 'promoter.yaml'));
  });

  it('stops at the nearest config', () => {
    nodeFs.writeFileSync(join(TEST_DIR, 'promoter.yaml'), 'environments: {}\n');
    nodeFs.writeFileSync(join(TEST_DIR, 'services/promoter.yml'), 'environments: {}\n');

    expect(findProjectRoot(join(TEST_DIR, 'services/api'))?.projectRoot).toBe(join(TEST_DIR, 'services'));
  });
});

describe('validateConfig', () => {
  it('returns no errors for a valid config', () => {
    expect(validateConfig(loadConfig(join(FIXTURES_DIR, 'basic')))).toEqual([]);
  });

  it('requires at least one environment', () => {
    expect(validateConfig({ environments: {} })).toEqual([
      'No environments defined (add an "environments" map to promoter.yaml)',
    ]);
  });

  it('reports missing backend fields', () => {
    const config: PromoterConfig = {
      environments: {
        dev: { store: 'vault', url: '', token_env: '' },
        aws: { store: 'awssecretsmanager', region: '' },
      },
    };
    expect(validateConfig(config)).toEqual([
      'Environment "dev": missing required field "url" for vault',
      'Environment "dev": missing required field "token_env" for vault',
      'Environment "aws": missing required field "region" for awssecretsmanager',
    ]);
  });
});

describe('getEnvironmentConfig', () => {
  it('names the available environments when one is missing', () => {
    const config = loadConfig(join(FIXTURES_DIR, 'basic'));
    const error = captureError(() => getEnvironmentConfig(config, 'qa'));
    expect(error instanceof Error && error.message).toBe(
      'Environment "qa" not found in config. Available: dev, staging, prod-aws',
    );
  });
});

describe('resolveVaultToken', () => {
  const env = { store: 'vault' as const, url: 'http://vault.test', token_env: 'VAULT_TOKEN' };

  it('trims the token', () => {
    expect(resolveVaultToken(env, { VAULT_TOKEN: '  test-token\n' })).toBe('test-token');
  });

  it('fails on an unset or blank variable', () => {
    expect(isPromoterError(captureError(() => resolveVaultToken(env, {})), 'INVALID_CONFIG')).toBe(true);
    expect(isPromoterError(captureError(() => resolveVaultToken(env, { VAULT_TOKEN: '   ' })), 'INVALID_CONFIG')).toBe(true);
  });
});

describe('redactionPolicyFromConfig', () => {
  it('defaults to the builtin patterns with every secret redacted', () => {
    expect(redactionPolicyFromConfig({ environments: {} })).toEqual({
      sensitiveKeyPatterns: [...DEFAULT_SENSITIVE_KEYS],
      redactAllSecrets: true,
      redactNestedJson: false,
    });
  });

  it('reads configured patterns and toggles', () => {
    expect(redactionPolicyFromConfig(loadConfig(join(FIXTURES_DIR, 'basic')))).toEqual({
      sensitiveKeyPatterns: ['password', 'token'],
      redactAllSecrets: false,
      redactNestedJson: true,
    });
  });

  it('falls back to the builtin patterns for an empty list', () => {
    expect(redactionPolicyFromConfig({ environments: {}, redacted_keys: [] }).sensitiveKeyPatterns).toEqual([
      ...DEFAULT_SENSITIVE_KEYS,
    ]);
  });
});

describe('logFileFromConfig', () => {
  it('defaults to the working directory', () => {
    expect(logFileFromConfig({ environments: {} })).toBe('./promoter-operations.log');
  });
});
