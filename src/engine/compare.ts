import { diffDocuments } from '../core/diff.js';
import { PromoterError, describeLocation } from '../errors.js';
import type { ComparisonResult, Location, RedactionPolicy, StorePair } from '../types.js';
import { assertCompatible, fetchIfPresent } from './fetch.js';

/**
 * Compares two documents, each served by its own store. Same-store,
 * cross-instance and cross-backend comparisons all take this path.
 */
export async function compareSecrets(
  stores: StorePair,
  source: Location,
  target: Location,
  policy: RedactionPolicy,
): Promise<ComparisonResult> {
  const sourceDoc = await fetchIfPresent(stores.source, source, 'compare');
  const targetDoc = await fetchIfPresent(stores.target, target, 'compare');

  if (sourceDoc) assertCompatible(sourceDoc, stores.source, stores.target, source, 'compare');
  if (targetDoc) assertCompatible(targetDoc, stores.target, stores.source, target, 'compare');

  if (sourceDoc && targetDoc && sourceDoc.isStructured !== targetDoc.isStructured) {
    throw new PromoterError(
      'INCOMPATIBLE_FORMAT',
      `Cannot compare ${describeLocation(source)} with ${describeLocation(target)}: one is a JSON secret, the other a plain string`,
      { operation: 'compare' },
    );
  }

  return diffDocuments(sourceDoc?.data ?? null, targetDoc?.data ?? null, policy, { source, target });
}
