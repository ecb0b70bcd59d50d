import type { KeyClass, RedactionPolicy } from '../types.js';
import { DEFAULT_SENSITIVE_KEYS, REDACTED } from '../types.js';
import { blankLeaves, parseJsonLike, stringifyJson, type JsonValue } from './json.js';

export function defaultRedactionPolicy(): RedactionPolicy {
  return {
    sensitiveKeyPatterns: [...DEFAULT_SENSITIVE_KEYS],
    redactAllSecrets: true,
    redactNestedJson: false,
  };
}

export function matchesSensitivePattern(key: string, patterns: readonly string[]): boolean {
  const lowerKey = key.toLowerCase();
  return patterns.some(pattern => pattern !== '' && lowerKey.includes(pattern.toLowerCase()));
}

/** Top-level display sensitivity. `redactAllSecrets` hides every key. */
export function isSensitive(policy: RedactionPolicy, key: string): boolean {
  return policy.redactAllSecrets || matchesSensitivePattern(key, policy.sensitiveKeyPatterns);
}

/** Secret/config split used by copy filters and split; ignores `redactAllSecrets`. */
export function classifyKey(policy: RedactionPolicy, key: string): KeyClass {
  return matchesSensitivePattern(key, policy.sensitiveKeyPatterns) ? 'secret' : 'config';
}

export function redactScalar(policy: RedactionPolicy, key: string, value: string): string {
  return isSensitive(policy, key) ? REDACTED : value;
}

export function redactStructured(policy: RedactionPolicy, value: JsonValue): JsonValue {
  switch (value.type) {
    case 'object':
      return {
        type: 'object',
        entries: value.entries.map(([key, child]): [string, JsonValue] =>
          matchesSensitivePattern(key, policy.sensitiveKeyPatterns)
            ? [key, { type: 'string', value: REDACTED }]
            : [key, redactStructured(policy, child)]
        ),
      };
    case 'array':
      return { type: 'array', items: value.items.map(item => redactStructured(policy, item)) };
    default:
      return value;
  }
}

/**
 * Display copy of a value. Nested redaction replaces top-level redaction for
 * JSON blobs when enabled; a value never gets both.
 */
export function renderValue(policy: RedactionPolicy, key: string, value: string): string {
  if (policy.redactNestedJson) {
    const parsed = parseJsonLike(value);
    if (parsed) {
      return stringifyJson(redactStructured(policy, parsed), 2);
    }
  }
  return redactScalar(policy, key, value);
}

/** Value reported for a copied key. A sensitive key shows no part of its value. */
export function renderCopiedValue(policy: RedactionPolicy, key: string, value: string): string {
  return isSensitive(policy, key) ? REDACTED : renderValue(policy, key, value);
}

export function blankStructure(value: string): string {
  const parsed = parseJsonLike(value);
  return parsed ? stringifyJson(blankLeaves(parsed)) : '';
}
