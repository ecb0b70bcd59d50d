import type { CopyOptions, KeyValueDocument, RedactionPolicy } from '../types.js';
import { blankStructure, classifyKey } from './redact.js';

export interface MergeResult {
  merged: KeyValueDocument;
  copied: string[];
}

/**
 * Both filters set means no filtering; the flags are independent switches,
 * not a choice.
 */
export function passesCopyFilter(policy: RedactionPolicy, key: string, options: CopyOptions): boolean {
  const { copySecretsOnly, copyConfigOnly } = options;
  if (copySecretsOnly === copyConfigOnly) return true;

  const keyClass = classifyKey(policy, key);
  return copySecretsOnly ? keyClass === 'secret' : keyClass === 'config';
}

export function mergeDocuments(
  source: KeyValueDocument,
  target: KeyValueDocument,
  policy: RedactionPolicy,
  options: CopyOptions,
): MergeResult {
  const merged: KeyValueDocument = options.prune ? {} : { ...target };
  const copied: string[] = [];

  for (const [key, value] of Object.entries(source)) {
    if (Object.hasOwn(merged, key) && !options.overwrite) continue;
    if (!passesCopyFilter(policy, key, options)) continue;

    merged[key] = options.keysOnly ? blankStructure(value) : value;
    copied.push(key);
  }

  return { merged, copied };
}
