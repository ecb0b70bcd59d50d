import { partitionDocument } from '../core/split.js';
import { PartialFailureError, PromoterError, describeLocation, withContext } from '../errors.js';
import { splitLogEntry, type OperationSides } from '../lib/oplog.js';
import type { Location, OperationLog, RedactionPolicy, SplitOptions, SplitOutcome, StorePair } from '../types.js';
import { fetchRequired } from './fetch.js';

async function targetExists(stores: StorePair, target: Location): Promise<boolean> {
  try {
    return await stores.target.exists(target);
  } catch (error) {
    throw withContext(error, 'split', target);
  }
}

async function runSplit(
  stores: StorePair,
  source: Location,
  target: Location,
  policy: RedactionPolicy,
  options: SplitOptions,
): Promise<SplitOutcome> {
  if (await targetExists(stores, target)) {
    throw new PromoterError('TARGET_ALREADY_EXISTS', `Split target ${describeLocation(target)} already exists; refusing to overwrite`, {
      operation: 'split',
      location: target,
    });
  }

  const sourceDoc = await fetchRequired(stores.source, source, 'split');
  if (!sourceDoc.isStructured) {
    throw new PromoterError('INCOMPATIBLE_FORMAT', `${describeLocation(source)} holds a plain string; only key-value documents can be split`, {
      operation: 'split',
      location: source,
    });
  }
  if (Object.keys(sourceDoc.data).length === 0) {
    throw new PromoterError('EMPTY_DOCUMENT', `${describeLocation(source)} has no keys to split`, {
      operation: 'split',
      location: source,
    });
  }
  if (policy.sensitiveKeyPatterns.every((pattern) => pattern === '')) {
    throw new PromoterError('NO_SENSITIVE_KEYS_CONFIGURED', 'No sensitive key patterns configured; nothing identifies which keys to move', {
      operation: 'split',
      location: source,
    });
  }

  const partition = partitionDocument(sourceDoc.data, policy);
  if (partition.movedKeys.length === 0) {
    throw new PromoterError('NO_SENSITIVE_KEYS_MATCHED', `No keys in ${describeLocation(source)} match the sensitive key patterns`, {
      operation: 'split',
      location: source,
    });
  }

  const outcome: SplitOutcome = {
    source,
    target,
    movedKeys: partition.movedKeys,
    retainedKeys: partition.retainedKeys,
    dryRun: options.dryRun ?? false,
  };
  if (outcome.dryRun) return outcome;

  // Phase A: create-only write of the sensitive keys.
  try {
    await stores.target.ensureEngine?.(target);
    await stores.target.write(target, { data: partition.sensitive, isStructured: true, raw: sourceDoc.raw }, { overwriteExisting: false });
  } catch (error) {
    throw withContext(error, 'split', target);
  }

  // Phase B: a failure here leaves the moved keys in both places.
  try {
    await stores.source.write(source, { data: partition.nonSensitive, isStructured: true, raw: sourceDoc.raw }, { overwriteExisting: true });
  } catch (error) {
    throw new PartialFailureError(source, target, partition.movedKeys, error);
  }

  return outcome;
}

/**
 * Moves the keys matching the sensitive patterns from `source` into a new
 * document at `target`, then rewrites `source` with the remaining keys.
 */
export async function splitSecret(
  stores: StorePair,
  source: Location,
  target: Location,
  policy: RedactionPolicy,
  options: SplitOptions = {},
  log?: OperationLog,
): Promise<SplitOutcome> {
  const sides: OperationSides = { source, target, sourceStore: stores.source.kind, targetStore: stores.target.kind };

  try {
    const outcome = await runSplit(stores, source, target, policy, options);
    if (!outcome.dryRun) {
      const message = `Moved ${outcome.movedKeys.length} key(s) from ${describeLocation(source)} to ${describeLocation(target)}`;
      log?.record(splitLogEntry(sides, true, message, outcome.movedKeys));
    }
    return outcome;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    const movedKeys = error instanceof PartialFailureError ? error.movedKeys : [];
    log?.record(splitLogEntry(sides, false, message, movedKeys));
    throw error;
  }
}
