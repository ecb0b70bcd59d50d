// Core exports for programmatic usage
export { compareSecrets } from './engine/compare.js';
export { copySecret, isSameDocument } from './engine/copy.js';
export { splitSecret } from './engine/split.js';
export { diffDocuments, diffEntries, isInSync, textDiff } from './core/diff.js';
export { mergeDocuments, passesCopyFilter } from './core/merge.js';
export { partitionDocument } from './core/split.js';
export {
  blankStructure,
  classifyKey,
  defaultRedactionPolicy,
  isSensitive,
  matchesSensitivePattern,
  redactScalar,
  redactStructured,
  renderValue,
} from './core/redact.js';

// Stores
export { AwsSecretsManagerStore, createSecretsManagerClient, parseSecretString } from './stores/aws.js';
export type { AwsStoreOptions, SecretsManagerApi } from './stores/aws.js';
export { VaultStore } from './stores/vault.js';
export type { FetchLike, VaultStoreOptions } from './stores/vault.js';
export { createStore } from './stores/index.js';

// Config, errors and the operation log
export {
  findProjectRoot,
  getEnvironmentConfig,
  loadConfig,
  redactionPolicyFromConfig,
  resolveVaultToken,
  validateConfig,
} from './config/loader.js';
export { PartialFailureError, PromoterError, describeLocation, isPromoterError } from './errors.js';
export type { ErrorCode } from './errors.js';
export { createFileOperationLog, createMemoryOperationLog } from './lib/oplog.js';

// Types
export { DEFAULT_SENSITIVE_KEYS, REDACTED } from './types.js';
export type {
  ComparisonEntry,
  ComparisonResult,
  CopyOptions,
  CopyOutcome,
  DiffEntry,
  EnvironmentConfig,
  InfoEntry,
  KeyValueDocument,
  Location,
  OperationLog,
  OperationLogEntry,
  PromoterConfig,
  RedactionPolicy,
  SecretStore,
  SplitOptions,
  SplitOutcome,
  StoredDocument,
} from './types.js';

// Commands (for programmatic usage)
export { compareCommand } from './commands/compare.js';
export { copyCommand } from './commands/copy.js';
export { splitCommand } from './commands/split.js';
export { statusCommand } from './commands/status.js';
