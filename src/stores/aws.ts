import {
  SecretsManager,
  type CreateSecretCommandInput,
  type CreateSecretCommandOutput,
  type DescribeSecretCommandInput,
  type DescribeSecretCommandOutput,
  type GetSecretValueCommandInput,
  type GetSecretValueCommandOutput,
  type PutSecretValueCommandInput,
  type PutSecretValueCommandOutput,
} from '@aws-sdk/client-secrets-manager';
import { fromTemporaryCredentials } from '@aws-sdk/credential-providers';
import { PromoterError, describeLocation } from '../errors.js';
import { stringifyValue, toBackendValues } from '../core/json.js';
import type { KeyValueDocument, Location, SecretStore, StoredDocument, WriteOptions } from '../types.js';

/** The slice of the Secrets Manager client this store calls. */
export interface SecretsManagerApi {
  getSecretValue(input: GetSecretValueCommandInput): Promise<GetSecretValueCommandOutput>;
  describeSecret(input: DescribeSecretCommandInput): Promise<DescribeSecretCommandOutput>;
  createSecret(input: CreateSecretCommandInput): Promise<CreateSecretCommandOutput>;
  putSecretValue(input: PutSecretValueCommandInput): Promise<PutSecretValueCommandOutput>;
}

export interface AwsStoreOptions {
  region: string;
  role?: string;
  client?: SecretsManagerApi;
}

const AUTH_ERRORS = new Set([
  'AccessDeniedException',
  'UnrecognizedClientException',
  'ExpiredTokenException',
  'InvalidSignatureException',
  'CredentialsProviderError',
]);

function errorName(error: unknown): string | undefined {
  return error instanceof Error ? error.name : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function createSecretsManagerClient(region: string, role?: string): SecretsManager {
  return new SecretsManager({
    region,
    credentials: role
      ? fromTemporaryCredentials({ params: { RoleArn: role, RoleSessionName: 'secret-promoter' }, clientConfig: { region } })
      : undefined,
  });
}

/**
 * A secret whose SecretString parses to a JSON object is structured; any
 * other string is an opaque scalar held under `value`.
 */
export function parseSecretString(raw: string): StoredDocument {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { data: { value: raw }, isStructured: false };
  }
  if (!isRecord(parsed)) {
    return { data: { value: raw }, isStructured: false };
  }

  const data: KeyValueDocument = {};
  for (const [key, value] of Object.entries(parsed)) {
    data[key] = stringifyValue(value);
  }
  return { data, isStructured: true, raw: parsed };
}

/** Account ID from a role ARN such as `arn:aws:iam::123456789012:role/deployer`. */
export function accountOf(role: string): string | undefined {
  const account = role.split(':')[4];
  return account ? account : undefined;
}

export class AwsSecretsManagerStore implements SecretStore {
  readonly kind = 'awssecretsmanager' as const;
  readonly instanceId: string;

  private readonly client: SecretsManagerApi;

  constructor(options: AwsStoreOptions) {
    this.client = options.client ?? createSecretsManagerClient(options.region, options.role);
    const account = options.role ? accountOf(options.role) : undefined;
    this.instanceId = `awssecretsmanager:${options.region}:${account ?? 'default'}`;
  }

  async fetch(location: Location): Promise<StoredDocument> {
    let output: GetSecretValueCommandOutput;
    try {
      output = await this.client.getSecretValue({ SecretId: location.path });
    } catch (error) {
      // A secret scheduled for deletion rejects reads with InvalidRequestException.
      if (errorName(error) === 'InvalidRequestException' && !(await this.exists(location))) {
        throw new PromoterError('NOT_FOUND', `${describeLocation(location)} is scheduled for deletion`, {
          operation: 'fetch',
          location,
          cause: error,
        });
      }
      throw this.failure(error, 'fetch', location);
    }

    if (output.SecretString === undefined) {
      throw new PromoterError('INCOMPATIBLE_FORMAT', `Binary secrets are not supported: ${describeLocation(location)}`, {
        operation: 'fetch',
        location,
      });
    }
    return parseSecretString(output.SecretString);
  }

  async write(location: Location, document: StoredDocument, options: WriteOptions): Promise<void> {
    const secretString = document.isStructured ? JSON.stringify(toBackendValues(document)) : (document.data.value ?? '');

    if (!options.overwriteExisting) {
      await this.create(location, secretString);
      return;
    }

    try {
      await this.client.putSecretValue({ SecretId: location.path, SecretString: secretString });
    } catch (error) {
      if (errorName(error) !== 'ResourceNotFoundException') {
        throw this.failure(error, 'write', location);
      }
      await this.create(location, secretString);
    }
  }

  async exists(location: Location): Promise<boolean> {
    try {
      const output = await this.client.describeSecret({ SecretId: location.path });
      return output.DeletedDate === undefined;
    } catch (error) {
      if (errorName(error) === 'ResourceNotFoundException') return false;
      throw this.failure(error, 'exists', location);
    }
  }

  private async create(location: Location, secretString: string): Promise<void> {
    try {
      await this.client.createSecret({ Name: location.path, SecretString: secretString });
    } catch (error) {
      throw this.failure(error, 'write', location);
    }
  }

  private failure(error: unknown, operation: string, location: Location): PromoterError {
    const name = errorName(error);
    const where = describeLocation(location);

    if (name === 'ResourceNotFoundException') {
      return new PromoterError('NOT_FOUND', `No document at ${where}`, { operation, location, cause: error });
    }
    if (name === 'ResourceExistsException') {
      return new PromoterError('TARGET_ALREADY_EXISTS', `A document already exists at ${where}`, { operation, location, cause: error });
    }
    if (name !== undefined && AUTH_ERRORS.has(name)) {
      return new PromoterError('UNAUTHENTICATED', `${operation} ${where}: AWS rejected the credentials (${name})`, {
        operation,
        location,
        cause: error,
      });
    }
    return new PromoterError('TRANSPORT_FAILURE', `${operation} ${where}: ${name ?? 'request failed'}`, {
      operation,
      location,
      cause: error,
    });
  }
}
