import { PromoterError, describeLocation, isPromoterError, withContext } from '../errors.js';
import type { Location, SecretStore, StoredDocument } from '../types.js';

/** Null when the document, or its whole engine, is absent. */
export async function fetchIfPresent(store: SecretStore, location: Location, operation: string): Promise<StoredDocument | null> {
  try {
    return await store.fetch(location);
  } catch (error) {
    if (isPromoterError(error, 'NOT_FOUND') || isPromoterError(error, 'ENGINE_NOT_FOUND')) {
      return null;
    }
    throw withContext(error, operation, location);
  }
}

export async function fetchRequired(store: SecretStore, location: Location, operation: string): Promise<StoredDocument> {
  try {
    return await store.fetch(location);
  } catch (error) {
    throw withContext(error, operation, location);
  }
}

/**
 * An opaque scalar can only meet a document from the same backend family;
 * across backends there is no key to wrap it in.
 */
export function assertCompatible(
  document: StoredDocument,
  store: SecretStore,
  peer: SecretStore,
  location: Location,
  operation: string,
): void {
  if (!document.isStructured && store.kind !== peer.kind) {
    throw new PromoterError(
      'INCOMPATIBLE_FORMAT',
      `${describeLocation(location)} holds a plain string; ${store.kind} to ${peer.kind} ${operation} requires a JSON key-value secret`,
      { operation, location },
    );
  }
}
