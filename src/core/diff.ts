import { diffChars } from 'diff';
import { PromoterError, describeLocation } from '../errors.js';
import type { ComparisonEntry, ComparisonResult, DiffEntry, KeyValueDocument, Location, RedactionPolicy } from '../types.js';
import { isSensitive, renderValue } from './redact.js';

/**
 * Character diff in wdiff notation: `[-removed-]` and `{+added+}` around
 * changed runs, unchanged text verbatim.
 */
export function textDiff(from: string, to: string): string {
  return diffChars(from, to)
    .map(part => {
      if (part.added) return `{+${part.value}+}`;
      if (part.removed) return `[-${part.value}-]`;
      return part.value;
    })
    .join('');
}

function addedEntry(policy: RedactionPolicy, key: string, value: string): DiffEntry {
  return {
    key,
    status: 'added',
    source: renderValue(policy, key, value),
    target: '',
    diff: '',
    isRedacted: isSensitive(policy, key),
  };
}

function removedEntry(policy: RedactionPolicy, key: string, value: string): DiffEntry {
  return {
    key,
    status: 'removed',
    source: '',
    target: renderValue(policy, key, value),
    diff: '',
    isRedacted: isSensitive(policy, key),
  };
}

/**
 * SECURITY: equality is decided on raw values; only the rendered display
 * copies leave this function, and redacted entries carry no diff text.
 */
export function diffDocuments(
  source: KeyValueDocument | null,
  target: KeyValueDocument | null,
  policy: RedactionPolicy,
  locations: { source: Location; target: Location },
): ComparisonResult {
  if (!source && !target) {
    throw new PromoterError(
      'BOTH_MISSING',
      `Nothing to compare: neither ${describeLocation(locations.source)} nor ${describeLocation(locations.target)} exists`,
      { operation: 'compare' },
    );
  }

  const entries: ComparisonEntry[] = [];
  const result: ComparisonResult = {
    source: locations.source,
    target: locations.target,
    entries,
    sourceMissing: source === null,
    targetMissing: target === null,
  };

  if (!target) {
    entries.push({ status: 'info', message: `Document does not exist at ${describeLocation(locations.target)}` });
    for (const [key, value] of Object.entries(source ?? {})) {
      entries.push(addedEntry(policy, key, value));
    }
    return result;
  }

  if (!source) {
    entries.push({ status: 'info', message: `Document does not exist at ${describeLocation(locations.source)}` });
    for (const [key, value] of Object.entries(target)) {
      entries.push(removedEntry(policy, key, value));
    }
    return result;
  }

  for (const [key, sourceValue] of Object.entries(source)) {
    if (!Object.hasOwn(target, key)) {
      entries.push(addedEntry(policy, key, sourceValue));
      continue;
    }

    const targetValue = target[key];
    if (sourceValue === targetValue) continue;

    const redacted = isSensitive(policy, key);
    const renderedSource = renderValue(policy, key, sourceValue);
    const renderedTarget = renderValue(policy, key, targetValue);

    entries.push({
      key,
      status: 'modified',
      source: renderedSource,
      target: renderedTarget,
      diff: redacted ? '' : textDiff(renderedSource, renderedTarget),
      isRedacted: redacted,
    });
  }

  for (const [key, targetValue] of Object.entries(target)) {
    if (!Object.hasOwn(source, key)) {
      entries.push(removedEntry(policy, key, targetValue));
    }
  }

  return result;
}

export function diffEntries(result: ComparisonResult): DiffEntry[] {
  return result.entries.filter((entry): entry is DiffEntry => entry.status !== 'info');
}

export function isInSync(result: ComparisonResult): boolean {
  return diffEntries(result).length === 0;
}
