import { fs } from '../lib/fs.js';
import { join, dirname, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { PromoterError } from '../errors.js';
import type { EnvironmentConfig, PromoterConfig, RedactionPolicy, VaultEnvironmentConfig } from '../types.js';
import { DEFAULT_LOG_FILE, DEFAULT_SENSITIVE_KEYS } from '../types.js';

const CONFIG_FILENAMES = ['promoter.yaml', 'promoter.yml', 'promoter.json'];
const VALID_STORES = ['vault', 'awssecretsmanager'];

export function findConfigPath(root: string): string | null {
  for (const filename of CONFIG_FILENAMES) {
    const configPath = join(root, filename);
    if (fs.existsSync(configPath)) {
      return configPath;
    }
  }
  return null;
}

export function findProjectRoot(startDir: string): { configPath: string; projectRoot: string } | null {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = findConfigPath(currentDir);
    if (configPath) {
      return { configPath, projectRoot: currentDir };
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function optionalBoolean(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined;
}

/**
 * Missing fields are left empty for `validateConfig` to report; an unknown
 * store kind cannot be represented and fails here.
 */
function readEnvironment(name: string, raw: unknown): EnvironmentConfig {
  const entry = isRecord(raw) ? raw : {};
  if (entry.store !== undefined && !VALID_STORES.includes(String(entry.store))) {
    throw new PromoterError(
      'INVALID_CONFIG',
      `Environment "${name}": unsupported store "${String(entry.store)}" (must be one of: ${VALID_STORES.join(', ')})`,
    );
  }
  if (entry.store === 'awssecretsmanager') {
    return {
      store: 'awssecretsmanager',
      region: optionalString(entry.region) ?? '',
      role: optionalString(entry.role),
    };
  }
  return {
    store: 'vault',
    url: optionalString(entry.url) ?? '',
    token_env: optionalString(entry.token_env) ?? '',
    namespace: optionalString(entry.namespace),
  };
}

export function loadConfig(root: string): PromoterConfig {
  const configPath = findConfigPath(root);

  if (!configPath) {
    return { environments: {} };
  }

  const content = fs.readFileSync(configPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (error) {
    throw new PromoterError('INVALID_CONFIG', `Failed to parse ${configPath}: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error,
    });
  }
  const raw = isRecord(parsed) ? parsed : {};

  const environments: Record<string, EnvironmentConfig> = {};
  if (isRecord(raw.environments)) {
    for (const [name, entry] of Object.entries(raw.environments)) {
      environments[name] = readEnvironment(name, entry);
    }
  }

  return {
    environments,
    redacted_keys: Array.isArray(raw.redacted_keys) ? raw.redacted_keys.map(String) : undefined,
    redact_secrets: optionalBoolean(raw.redact_secrets),
    redact_json_values: optionalBoolean(raw.redact_json_values),
    log_file: optionalString(raw.log_file),
  };
}

export function validateConfig(config: PromoterConfig): string[] {
  const errors: string[] = [];
  const names = Object.keys(config.environments);

  if (names.length === 0) {
    errors.push('No environments defined (add an "environments" map to promoter.yaml)');
  }

  for (const name of names) {
    const env = config.environments[name];
    const prefix = `Environment "${name}"`;

    if (env.store === 'vault') {
      if (!env.url) errors.push(`${prefix}: missing required field "url" for vault`);
      if (!env.token_env) errors.push(`${prefix}: missing required field "token_env" for vault`);
    } else if (!env.region) {
      errors.push(`${prefix}: missing required field "region" for awssecretsmanager`);
    }
  }

  return errors;
}

export function getEnvironmentConfig(config: PromoterConfig, name: string): EnvironmentConfig {
  const env = config.environments[name];
  if (!env) {
    const available = Object.keys(config.environments).join(', ') || '(none)';
    throw new PromoterError('INVALID_CONFIG', `Environment "${name}" not found in config. Available: ${available}`);
  }
  return env;
}

export function resolveVaultToken(env: VaultEnvironmentConfig, processEnv: NodeJS.ProcessEnv): string {
  const token = processEnv[env.token_env]?.trim();
  if (!token) {
    throw new PromoterError('INVALID_CONFIG', `Environment variable ${env.token_env} is not set or empty`);
  }
  return token;
}

export function redactionPolicyFromConfig(config: PromoterConfig): RedactionPolicy {
  const patterns = config.redacted_keys && config.redacted_keys.length > 0
    ? config.redacted_keys
    : [...DEFAULT_SENSITIVE_KEYS];

  return {
    sensitiveKeyPatterns: patterns,
    redactAllSecrets: config.redact_secrets ?? true,
    redactNestedJson: config.redact_json_values ?? false,
  };
}

export function logFileFromConfig(config: PromoterConfig): string {
  return config.log_file ?? DEFAULT_LOG_FILE;
}
