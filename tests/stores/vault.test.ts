import { describe, it, expect } from 'vitest';
import { VaultStore, type FetchLike } from '../../src/stores/vault.js';
import { PromoterError, isPromoterError } from '../../src/errors.js';
import type { Location } from '../../src/types.js';

interface MountEntry {
  type: string;
  options?: { version?: string };
}

interface Call {
  method: string;
  path: string;
  headers: Headers;
  body: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function json(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

/** Serves the slice of the Vault HTTP API the store uses, from memory. */
function fakeVault(mounts: Record<string, MountEntry>) {
  const documents = new Map<string, unknown>();
  const calls: Call[] = [];

  const fetch: FetchLike = async (url, init) => {
    const method = init?.method ?? 'GET';
    const path = new URL(url).pathname.replace(/^\/v1\//, '');
    const headers = new Headers(init?.headers);
    const body: unknown = typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
    calls.push({ method, path, headers, body });

    if (headers.get('X-Vault-Token') !== 'test-token') {
      return json(403, { errors: ['permission denied'] });
    }

    if (path === 'sys/mounts' && method === 'GET') {
      return json(200, { data: mounts });
    }

    if (path.startsWith('sys/mounts/') && method === 'POST') {
      mounts[`${path.slice('sys/mounts/'.length)}/`] = isRecord(body) && isRecord(body.options)
        ? { type: 'kv', options: { version: String(body.options.version) } }
        : { type: 'kv' };
      return new Response(null, { status: 204 });
    }

    for (const [mountPath, mount] of Object.entries(mounts)) {
      if (!path.startsWith(mountPath)) continue;
      const v2 = mount.options?.version === '2';
      let rest = path.slice(mountPath.length);
      if (v2) {
        if (!rest.startsWith('data/')) return json(404, { errors: [] });
        rest = rest.slice('data/'.length);
      }
      const key = `${mountPath}${rest}`;

      if (method === 'GET') {
        const document = documents.get(key);
        if (document === undefined) return json(404, { errors: [] });
        return json(200, v2 ? { data: { data: document, metadata: { version: 1 } } } : { data: document });
      }

      if (v2) {
        const payload = isRecord(body) ? body : {};
        if (isRecord(payload.options) && payload.options.cas === 0 && documents.has(key)) {
          return json(400, { errors: ['check-and-set parameter did not match the current version'] });
        }
        documents.set(key, payload.data);
        return json(200, { data: { version: 1 } });
      }

      documents.set(key, body);
      return new Response(null, { status: 204 });
    }

    return json(404, { errors: [] });
  };

  return { fetch, documents, calls, mounts };
}

const location: Location = { environment: 'dev', path: 'app/api', engine: 'secret' };
const legacy: Location = { environment: 'dev', path: 'app/api', engine: 'legacy' };

function setup(token = 'test-token') {
  const vault = fakeVault({
    'secret/': { type: 'kv', options: { version: '2' } },
    'legacy/': { type: 'kv', options: { version: '1' } },
  });
  const store = new VaultStore({ address: 'http://vault.test:8200/', token, namespace: 'team-a', fetch: vault.fetch });
  return { vault, store };
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected a rejection');
}

describe('VaultStore', () => {
  it('identifies the instance by address and namespace', () => {
    const { store } = setup();
    expect(store.instanceId).toBe('vault:http://vault.test:8200#team-a');
  });

  it('reads a KV v2 document and stringifies values', async () => {
    const { vault, store } = setup();
    vault.documents.set('secret/app/api', { host: 'db', port: 5432, opts: { ssl: true } });

    const document = await store.fetch(location);
    expect(document).toEqual({
      data: { host: 'db', port: '5432', opts: '{"ssl":true}' },
      isStructured: true,
      raw: { host: 'db', port: 5432, opts: { ssl: true } },
    });

    const read = vault.calls.find((c) => c.path === 'secret/data/app/api');
    expect(read?.headers.get('X-Vault-Namespace')).toBe('team-a');
  });

  it('reads a KV v1 document', async () => {
    const { vault, store } = setup();
    vault.documents.set('legacy/app/api', { host: 'db' });
    expect((await store.fetch(legacy)).data).toEqual({ host: 'db' });
  });

  it('lists mounts once per instance', async () => {
    const { vault, store } = setup();
    vault.documents.set('secret/app/api', { a: '1' });

    await store.fetch(location);
    await store.fetch(location);
    expect(vault.calls.filter((c) => c.path === 'sys/mounts')).toHaveLength(1);
  });

  it('distinguishes a missing document from a missing engine', async () => {
    const { store } = setup();
    expect(isPromoterError(await captureError(store.fetch(location)), 'NOT_FOUND')).toBe(true);
    expect(
      isPromoterError(await captureError(store.fetch({ ...location, engine: 'nope' })), 'ENGINE_NOT_FOUND'),
    ).toBe(true);
  });

  it('reports absence from exists for both kinds of missing', async () => {
    const { vault, store } = setup();
    vault.documents.set('secret/app/api', { a: '1' });

    expect(await store.exists(location)).toBe(true);
    expect(await store.exists({ ...location, path: 'other' })).toBe(false);
    expect(await store.exists({ ...location, engine: 'nope' })).toBe(false);
  });

  it('writes a KV v2 document with check-and-set when not overwriting', async () => {
    const { vault, store } = setup();

    await store.write(location, { data: { token: 't1' }, isStructured: true }, { overwriteExisting: false });
    expect(vault.documents.get('secret/app/api')).toEqual({ token: 't1' });
    const write = vault.calls.find((c) => c.method === 'POST');
    expect(write?.body).toEqual({ data: { token: 't1' }, options: { cas: 0 } });

    const error = await captureError(
      store.write(location, { data: { token: 't2' }, isStructured: true }, { overwriteExisting: false }),
    );
    expect(isPromoterError(error, 'TARGET_ALREADY_EXISTS')).toBe(true);
    expect(vault.documents.get('secret/app/api')).toEqual({ token: 't1' });
  });

  it('reports a rejected payload as a transport failure, not a conflict', async () => {
    const { vault } = setup();
    const rejecting: FetchLike = async (url, init) =>
      init?.method === 'POST' && url.endsWith('/v1/secret/data/app/api')
        ? json(400, { errors: ['error parsing JSON'] })
        : vault.fetch(url, init);
    const store = new VaultStore({ address: 'http://vault.test:8200', token: 'test-token', fetch: rejecting });

    const error = await captureError(
      store.write(location, { data: { token: 't1' }, isStructured: true }, { overwriteExisting: false }),
    );
    expect(isPromoterError(error, 'TRANSPORT_FAILURE')).toBe(true);
  });

  it('writes fetched values back with their JSON types', async () => {
    const { vault, store } = setup();
    vault.documents.set('secret/app/api', { host: 'db', port: 5432, opts: { ssl: true } });

    const document = await store.fetch(location);
    await store.write(location, { ...document, data: { ...document.data, user: 'u' } }, { overwriteExisting: true });

    expect(vault.documents.get('secret/app/api')).toEqual({ host: 'db', port: 5432, opts: { ssl: true }, user: 'u' });
  });

  it('overwrites a KV v2 document', async () => {
    const { vault, store } = setup();
    vault.documents.set('secret/app/api', { a: '1' });

    await store.write(location, { data: { b: '2' }, isStructured: true }, { overwriteExisting: true });
    expect(vault.documents.get('secret/app/api')).toEqual({ b: '2' });
  });

  it('refuses to create over an existing KV v1 document', async () => {
    const { vault, store } = setup();
    vault.documents.set('legacy/app/api', { a: '1' });

    const error = await captureError(store.write(legacy, { data: { b: '2' }, isStructured: true }, { overwriteExisting: false }));
    expect(isPromoterError(error, 'TARGET_ALREADY_EXISTS')).toBe(true);

    await store.write(legacy, { data: { b: '2' }, isStructured: true }, { overwriteExisting: true });
    expect(vault.documents.get('legacy/app/api')).toEqual({ b: '2' });
  });

  it('rejects plain-string documents', async () => {
    const { store } = setup();
    const error = await captureError(store.write(location, { data: { value: 'x' }, isStructured: false }, { overwriteExisting: true }));
    expect(isPromoterError(error, 'INCOMPATIBLE_FORMAT')).toBe(true);
  });

  it('mounts a KV v2 engine when it is missing', async () => {
    const { vault, store } = setup();
    const fresh = { ...location, engine: 'team-kv' };

    await store.ensureEngine(fresh);
    const mount = vault.calls.find((c) => c.path === 'sys/mounts/team-kv');
    expect(mount?.body).toEqual({ type: 'kv', options: { version: '2' } });

    await store.write(fresh, { data: { a: '1' }, isStructured: true }, { overwriteExisting: false });
    expect(vault.documents.get('team-kv/app/api')).toEqual({ a: '1' });
  });

  it('does not remount an existing engine', async () => {
    const { vault, store } = setup();
    await store.ensureEngine(location);
    expect(vault.calls.filter((c) => c.method === 'POST')).toHaveLength(0);
  });

  it('requires an engine on the location', async () => {
    const { store } = setup();
    const error = await captureError(store.fetch({ environment: 'dev', path: 'app/api' }));
    expect(isPromoterError(error, 'INVALID_LOCATION')).toBe(true);
  });

  it('maps a denied token to UNAUTHENTICATED', async () => {
    const { store } = setup('wrong-token');
    const error = await captureError(store.fetch(location));
    expect(isPromoterError(error, 'UNAUTHENTICATED')).toBe(true);
  });

  it('maps network errors to TRANSPORT_FAILURE', async () => {
    const store = new VaultStore({
      address: 'http://vault.test:8200',
      token: 'test-token',
      fetch: async () => {
        throw new TypeError('fetch failed');
      },
    });

    const error = await captureError(store.fetch(location));
    expect(isPromoterError(error, 'TRANSPORT_FAILURE')).toBe(true);
    expect(error instanceof PromoterError && error.message).toBe(
      'list mounts dev:secret/app/api: request to http://vault.test:8200 failed: fetch failed',
    );
  });
});
