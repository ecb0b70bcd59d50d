import { PromoterError, describeLocation } from '../errors.js';
import { stringifyValue, toBackendValues } from '../core/json.js';
import type { KeyValueDocument, Location, SecretStore, StoredDocument, WriteOptions } from '../types.js';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface VaultStoreOptions {
  address: string;
  token: string;
  namespace?: string;
  fetch?: FetchLike;
}

interface MountInfo {
  type: string;
  version: 1 | 2;
}

interface VaultResponse {
  status: number;
  body: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function trimSlashes(value: string): string {
  return value.replace(/^\/+|\/+$/g, '');
}

function encodePath(value: string): string {
  return trimSlashes(value).split('/').map(encodeURIComponent).join('/');
}

function vaultErrors(body: unknown): string {
  if (isRecord(body) && Array.isArray(body.errors) && body.errors.length > 0) {
    return body.errors.map(String).join('; ');
  }
  return 'no error detail';
}

function parseMounts(body: unknown): Map<string, MountInfo> {
  const table = isRecord(body) && isRecord(body.data) ? body.data : body;
  const mounts = new Map<string, MountInfo>();
  if (!isRecord(table)) return mounts;

  for (const [path, info] of Object.entries(table)) {
    if (!path.endsWith('/') || !isRecord(info) || typeof info.type !== 'string') continue;
    const options = isRecord(info.options) ? info.options : {};
    mounts.set(path, { type: info.type, version: options.version === '2' ? 2 : 1 });
  }
  return mounts;
}

function toDocument(raw: Record<string, unknown>): StoredDocument {
  const data: KeyValueDocument = {};
  for (const [key, value] of Object.entries(raw)) {
    data[key] = stringifyValue(value);
  }
  return { data, isStructured: true, raw };
}

/**
 * KV secrets engine over the Vault HTTP API. The mount table is read once
 * per instance; KV v1 and v2 mounts are both supported.
 */
export class VaultStore implements SecretStore {
  readonly kind = 'vault' as const;
  readonly instanceId: string;

  private readonly address: string;
  private readonly token: string;
  private readonly namespace?: string;
  private readonly fetchImpl: FetchLike;
  private mounts: Map<string, MountInfo> | null = null;

  constructor(options: VaultStoreOptions) {
    this.address = options.address.replace(/\/+$/, '');
    this.token = options.token;
    this.namespace = options.namespace;
    this.fetchImpl = options.fetch ?? fetch;
    this.instanceId = `vault:${this.address}${this.namespace ? `#${this.namespace}` : ''}`;
  }

  async fetch(location: Location): Promise<StoredDocument> {
    const mount = await this.requireMount(location, 'fetch');
    const engine = encodePath(this.engineOf(location));
    const path = encodePath(location.path);

    const apiPath = mount.version === 2 ? `${engine}/data/${path}` : `${engine}/${path}`;
    const response = await this.request('GET', apiPath, undefined, 'fetch', location);
    if (response.status !== 200) {
      throw this.failure(response, 'fetch', location);
    }

    const payload = isRecord(response.body) ? response.body.data : undefined;
    const data = mount.version === 2 && isRecord(payload) ? payload.data : payload;
    if (!isRecord(data)) {
      // KV v2 returns null data for a deleted latest version.
      throw new PromoterError('NOT_FOUND', `No document at ${describeLocation(location)}`, {
        operation: 'fetch',
        location,
      });
    }

    return toDocument(data);
  }

  async write(location: Location, document: StoredDocument, options: WriteOptions): Promise<void> {
    if (!document.isStructured) {
      throw new PromoterError('INCOMPATIBLE_FORMAT', `Vault documents must be key-value maps, cannot write a scalar to ${describeLocation(location)}`, {
        operation: 'write',
        location,
      });
    }

    const mount = await this.requireMount(location, 'write');
    const engine = encodePath(this.engineOf(location));
    const path = encodePath(location.path);

    if (mount.version === 1) {
      if (!options.overwriteExisting && (await this.exists(location))) {
        throw this.alreadyExists(location);
      }
      const response = await this.request('POST', `${engine}/${path}`, toBackendValues(document), 'write', location);
      if (response.status !== 200 && response.status !== 204) {
        throw this.failure(response, 'write', location);
      }
      return;
    }

    const data = toBackendValues(document);
    const body = options.overwriteExisting ? { data } : { data, options: { cas: 0 } };
    const response = await this.request('POST', `${engine}/data/${path}`, body, 'write', location);
    if (response.status === 400 && !options.overwriteExisting && vaultErrors(response.body).includes('check-and-set')) {
      throw this.alreadyExists(location);
    }
    if (response.status !== 200 && response.status !== 204) {
      throw this.failure(response, 'write', location);
    }
  }

  async exists(location: Location): Promise<boolean> {
    try {
      await this.fetch(location);
      return true;
    } catch (error) {
      if (error instanceof PromoterError && (error.code === 'NOT_FOUND' || error.code === 'ENGINE_NOT_FOUND')) {
        return false;
      }
      throw error;
    }
  }

  /** Mounts a KV v2 engine at the location's engine path when none exists. */
  async ensureEngine(location: Location): Promise<void> {
    const engine = trimSlashes(this.engineOf(location));
    const mounts = await this.loadMounts(location);
    if (mounts.has(`${engine}/`)) return;

    const response = await this.request(
      'POST',
      `sys/mounts/${encodePath(engine)}`,
      { type: 'kv', options: { version: '2' } },
      'create engine',
      location,
    );
    if (response.status !== 200 && response.status !== 204) {
      throw this.failure(response, 'create engine', location);
    }
    mounts.set(`${engine}/`, { type: 'kv', version: 2 });
  }

  private engineOf(location: Location): string {
    if (!location.engine || trimSlashes(location.engine) === '') {
      throw new PromoterError('INVALID_LOCATION', `A KV engine is required for Vault location ${describeLocation(location)}`, {
        location,
      });
    }
    return location.engine;
  }

  private async requireMount(location: Location, operation: string): Promise<MountInfo> {
    const engine = trimSlashes(this.engineOf(location));
    const mounts = await this.loadMounts(location);
    const mount = mounts.get(`${engine}/`);
    if (!mount) {
      throw new PromoterError('ENGINE_NOT_FOUND', `KV engine '${engine}' does not exist in ${this.instanceId}`, {
        operation,
        location,
      });
    }
    return mount;
  }

  private async loadMounts(location: Location): Promise<Map<string, MountInfo>> {
    if (this.mounts) return this.mounts;

    const response = await this.request('GET', 'sys/mounts', undefined, 'list mounts', location);
    if (response.status !== 200) {
      throw this.failure(response, 'list mounts', location);
    }
    this.mounts = parseMounts(response.body);
    return this.mounts;
  }

  private async request(
    method: 'GET' | 'POST',
    apiPath: string,
    body: unknown,
    operation: string,
    location: Location,
  ): Promise<VaultResponse> {
    const headers: Record<string, string> = { 'X-Vault-Token': this.token };
    if (this.namespace) headers['X-Vault-Namespace'] = this.namespace;
    if (body !== undefined) headers['Content-Type'] = 'application/json';

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.address}/v1/${apiPath}`, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new PromoterError('TRANSPORT_FAILURE', `${operation} ${describeLocation(location)}: request to ${this.address} failed: ${reason}`, {
        operation,
        location,
        cause: error,
      });
    }

    const text = await response.text();
    if (!text) return { status: response.status, body: null };

    try {
      return { status: response.status, body: JSON.parse(text) };
    } catch (error) {
      throw new PromoterError('TRANSPORT_FAILURE', `${operation} ${describeLocation(location)}: Vault returned a non-JSON response (${response.status})`, {
        operation,
        location,
        cause: error,
      });
    }
  }

  private failure(response: VaultResponse, operation: string, location: Location): PromoterError {
    const where = describeLocation(location);
    if (response.status === 404) {
      return new PromoterError('NOT_FOUND', `No document at ${where}`, { operation, location });
    }
    if (response.status === 401 || response.status === 403) {
      return new PromoterError('UNAUTHENTICATED', `${operation} ${where}: Vault denied access (${response.status})`, {
        operation,
        location,
      });
    }
    return new PromoterError('TRANSPORT_FAILURE', `${operation} ${where}: Vault responded ${response.status}: ${vaultErrors(response.body)}`, {
      operation,
      location,
    });
  }

  private alreadyExists(location: Location): PromoterError {
    return new PromoterError('TARGET_ALREADY_EXISTS', `A document already exists at ${describeLocation(location)}`, {
      operation: 'write',
      location,
    });
  }
}
