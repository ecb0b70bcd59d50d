import { mergeDocuments } from '../core/merge.js';
import { renderCopiedValue } from '../core/redact.js';
import { PromoterError, describeLocation, withContext } from '../errors.js';
import { copyLogEntry, type OperationSides } from '../lib/oplog.js';
import type {
  CopyOptions,
  CopyOutcome,
  KeyValueDocument,
  Location,
  OperationLog,
  RedactionPolicy,
  SecretStore,
  StoredDocument,
  StorePair,
} from '../types.js';
import { REDACTED } from '../types.js';
import { assertCompatible, fetchIfPresent, fetchRequired } from './fetch.js';

function normalizePath(path: string): string {
  return path.replace(/^\/+|\/+$/g, '');
}

function engineKey(store: SecretStore, location: Location): string {
  return store.kind === 'vault' ? normalizePath(location.engine ?? '') : '';
}

export function isSameDocument(stores: StorePair, source: Location, target: Location): boolean {
  return (
    stores.source.instanceId === stores.target.instanceId &&
    normalizePath(source.path) === normalizePath(target.path) &&
    engineKey(stores.source, source) === engineKey(stores.target, target)
  );
}

async function writeTarget(store: SecretStore, target: Location, document: StoredDocument): Promise<void> {
  try {
    await store.ensureEngine?.(target);
    await store.write(target, document, { overwriteExisting: true });
  } catch (error) {
    throw withContext(error, 'copy', target);
  }
}

/** Fetched backend values for the merged keys: copied keys from the source, the rest from the target. */
function carriedValues(
  merged: KeyValueDocument,
  copied: string[],
  sourceDoc: StoredDocument,
  targetDoc: StoredDocument | null,
): Record<string, unknown> | undefined {
  if (!sourceDoc.raw && !targetDoc?.raw) return undefined;

  const fromSource = new Set(copied);
  const raw: Record<string, unknown> = {};
  for (const key of Object.keys(merged)) {
    const origin = fromSource.has(key) ? sourceDoc.raw : targetDoc?.raw;
    if (origin && Object.hasOwn(origin, key)) raw[key] = origin[key];
  }
  return raw;
}

async function copyScalar(
  stores: StorePair,
  source: Location,
  target: Location,
  sourceDoc: StoredDocument,
  targetDoc: StoredDocument | null,
  options: CopyOptions,
): Promise<CopyOutcome> {
  const route = `${describeLocation(source)} to ${describeLocation(target)}`;
  const dryRun = options.dryRun ?? false;

  if (targetDoc && !options.overwrite) {
    return { source, target, success: true, dryRun, keys: {}, message: `Target already holds a value; nothing copied from ${route}` };
  }

  const raw = sourceDoc.data.value ?? '';
  const value = options.keysOnly ? '' : raw;
  // A plain-string secret has no key name to classify, so it is always hidden.
  const keys = { value: REDACTED };

  if (dryRun) {
    return { source, target, success: true, dryRun, keys, message: `Dry run: would copy a plain-string secret from ${route}` };
  }

  await writeTarget(stores.target, target, { data: { value }, isStructured: false });
  return { source, target, success: true, dryRun, keys, message: `Copied a plain-string secret from ${route}` };
}

async function runCopy(
  stores: StorePair,
  source: Location,
  target: Location,
  policy: RedactionPolicy,
  options: CopyOptions,
): Promise<CopyOutcome> {
  if (isSameDocument(stores, source, target)) {
    throw new PromoterError('NO_OP_COPY', `Source and target are the same document (${describeLocation(source)}); cannot copy to self`, {
      operation: 'copy',
      location: source,
    });
  }

  const sourceDoc = await fetchRequired(stores.source, source, 'copy');
  assertCompatible(sourceDoc, stores.source, stores.target, source, 'copy');

  const targetDoc = await fetchIfPresent(stores.target, target, 'copy');
  if (targetDoc) {
    assertCompatible(targetDoc, stores.target, stores.source, target, 'copy');
    if (targetDoc.isStructured !== sourceDoc.isStructured) {
      throw new PromoterError(
        'INCOMPATIBLE_FORMAT',
        `Cannot copy ${describeLocation(source)} into ${describeLocation(target)}: one is a JSON secret, the other a plain string`,
        { operation: 'copy', location: target },
      );
    }
  }

  if (!sourceDoc.isStructured) {
    return copyScalar(stores, source, target, sourceDoc, targetDoc, options);
  }

  const { merged, copied } = mergeDocuments(sourceDoc.data, targetDoc?.data ?? {}, policy, options);
  const keys: Record<string, string> = {};
  for (const key of copied) {
    keys[key] = renderCopiedValue(policy, key, merged[key]);
  }

  const route = `${describeLocation(source)} to ${describeLocation(target)}`;
  const dryRun = options.dryRun ?? false;

  if (dryRun) {
    return { source, target, success: true, dryRun, keys, message: `Dry run: would copy ${copied.length} key(s) from ${route}` };
  }

  if (copied.length === 0 && targetDoc && !options.prune) {
    return { source, target, success: true, dryRun, keys, message: `Nothing to copy from ${route}; target unchanged` };
  }

  const raw = carriedValues(merged, copied, sourceDoc, targetDoc);
  await writeTarget(stores.target, target, { data: merged, isStructured: true, raw });
  return { source, target, success: true, dryRun, keys, message: `Copied ${copied.length} key(s) from ${route}` };
}

/**
 * Merges the source document into the target with a single write. The
 * outcome (and the log entry) carry rendered values only.
 */
export async function copySecret(
  stores: StorePair,
  source: Location,
  target: Location,
  policy: RedactionPolicy,
  options: CopyOptions,
  log?: OperationLog,
): Promise<CopyOutcome> {
  const sides: OperationSides = { source, target, sourceStore: stores.source.kind, targetStore: stores.target.kind };

  try {
    const outcome = await runCopy(stores, source, target, policy, options);
    if (!outcome.dryRun) {
      log?.record(copyLogEntry(sides, outcome));
    }
    return outcome;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log?.record(copyLogEntry(sides, { success: false, message, keys: {} }));
    throw error;
  }
}
