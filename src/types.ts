export type StoreKind = 'vault' | 'awssecretsmanager';

export interface VaultEnvironmentConfig {
  store: 'vault';
  url: string;
  token_env: string;
  namespace?: string;
}

export interface AwsEnvironmentConfig {
  store: 'awssecretsmanager';
  region: string;
  role?: string;
}

export type EnvironmentConfig = VaultEnvironmentConfig | AwsEnvironmentConfig;

export interface PromoterConfig {
  environments: Record<string, EnvironmentConfig>;
  redacted_keys?: string[];
  redact_secrets?: boolean;
  redact_json_values?: boolean;
  log_file?: string;
}

export const DEFAULT_SENSITIVE_KEYS: readonly string[] = [
  'password', 'secret', 'token', 'key', 'credential', 'auth', 'pwd', 'pass',
  'apikey', 'api_key', 'access_key', 'secret_key', 'private_key', 'cert', 'certificate',
];

export const DEFAULT_LOG_FILE = './promoter-operations.log';

export const REDACTED = '(redacted)';

/** Identifies exactly one document in one backend. `engine` is the Vault mount. */
export interface Location {
  readonly environment: string;
  readonly path: string;
  readonly engine?: string;
}

export type KeyValueDocument = Record<string, string>;

export interface StoredDocument {
  data: KeyValueDocument;
  /** False for an opaque scalar secret, held as `{ value }`. */
  isStructured: boolean;
  /** Values as the backend returned them, before stringification. */
  raw?: Record<string, unknown>;
}

export interface WriteOptions {
  overwriteExisting: boolean;
}

export interface SecretStore {
  readonly kind: StoreKind;
  /** Backend instance identity: two stores with the same id reach the same data. */
  readonly instanceId: string;
  fetch(location: Location): Promise<StoredDocument>;
  write(location: Location, document: StoredDocument, options: WriteOptions): Promise<void>;
  exists(location: Location): Promise<boolean>;
  ensureEngine?(location: Location): Promise<void>;
}

export interface StorePair {
  source: SecretStore;
  target: SecretStore;
}

export interface RedactionPolicy {
  sensitiveKeyPatterns: string[];
  redactAllSecrets: boolean;
  redactNestedJson: boolean;
}

export type KeyClass = 'secret' | 'config';

export type DiffStatus = 'added' | 'removed' | 'modified';

export interface DiffEntry {
  key: string;
  status: DiffStatus;
  source: string;
  target: string;
  diff: string;
  isRedacted: boolean;
}

export interface InfoEntry {
  status: 'info';
  message: string;
}

export type ComparisonEntry = DiffEntry | InfoEntry;

export interface ComparisonResult {
  source: Location;
  target: Location;
  entries: ComparisonEntry[];
  sourceMissing: boolean;
  targetMissing: boolean;
}

export interface CopyOptions {
  overwrite: boolean;
  copyConfigOnly: boolean;
  copySecretsOnly: boolean;
  keysOnly: boolean;
  /** Start from an empty document instead of the target's keys. */
  prune?: boolean;
  dryRun?: boolean;
}

export interface CopyOutcome {
  source: Location;
  target: Location;
  success: boolean;
  message: string;
  keys: Record<string, string>;
  dryRun: boolean;
}

export interface SplitOptions {
  dryRun?: boolean;
}

export interface SplitOutcome {
  source: Location;
  target: Location;
  movedKeys: string[];
  retainedKeys: string[];
  dryRun: boolean;
}

export type OperationKind = 'copy' | 'split';

export interface OperationLogEntry {
  timestamp: string;
  operation: OperationKind;
  source_env: string;
  source_path: string;
  source_store: StoreKind;
  target_env: string;
  target_path: string;
  target_store: StoreKind;
  success: boolean;
  message: string;
  keys?: Record<string, string>;
  split_keys?: string[];
}

export interface OperationLog {
  record(entry: OperationLogEntry): void;
}

export interface LocationArgs {
  env: string;
  path: string;
  engine?: string;
}

export interface CompareOptions {
  root: string;
  source: LocationArgs;
  target: LocationArgs;
  json: boolean;
}

export interface CopyCommandOptions {
  root: string;
  source: LocationArgs;
  target: LocationArgs;
  overwrite: boolean;
  copyConfig: boolean;
  copySecrets: boolean;
  onlyCopyKeys: boolean;
  prune: boolean;
  dryRun: boolean;
  approve: boolean;
  logFile?: string;
}

export interface SplitCommandOptions {
  root: string;
  source: LocationArgs;
  target: LocationArgs;
  dryRun: boolean;
  approve: boolean;
  logFile?: string;
}

export interface StatusOptions {
  root: string;
}

export interface PromoterContext {
  fs: {
    existsSync(path: string): boolean;
    readFileSync(path: string, encoding: BufferEncoding): string;
    appendFileSync(path: string, data: string): void;
  };
  logger: {
    log(message: string): void;
    error(message: string): void;
    warn(message: string): void;
    info(message: string): void;
  };
  process: {
    cwd(): string;
    exit(code: number): never;
    env: NodeJS.ProcessEnv;
    stdin: { isTTY?: boolean };
  };
  config: {
    loadConfig(root: string): PromoterConfig;
    findProjectRoot(startDir: string): { configPath: string; projectRoot: string } | null;
  };
  stores: {
    createStore(config: EnvironmentConfig, env: NodeJS.ProcessEnv): SecretStore;
  };
  prompt: {
    confirm(message: string): Promise<boolean>;
  };
}
