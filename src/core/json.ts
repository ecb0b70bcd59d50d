import type { StoredDocument } from '../types.js';

export type JsonValue =
  | { type: 'object'; entries: [string, JsonValue][] }
  | { type: 'array'; items: JsonValue[] }
  | { type: 'string'; value: string }
  | { type: 'number'; value: number }
  | { type: 'boolean'; value: boolean }
  | { type: 'null' };

export function fromUnknown(input: unknown): JsonValue {
  if (input === null || input === undefined) {
    return { type: 'null' };
  }
  if (Array.isArray(input)) {
    return { type: 'array', items: input.map(fromUnknown) };
  }
  switch (typeof input) {
    case 'string':
      return { type: 'string', value: input };
    case 'number':
      return { type: 'number', value: input };
    case 'boolean':
      return { type: 'boolean', value: input };
    case 'object':
      return {
        type: 'object',
        entries: Object.entries(input).map(([key, value]): [string, JsonValue] => [key, fromUnknown(value)]),
      };
    default:
      return { type: 'string', value: String(input) };
  }
}

export function toUnknown(value: JsonValue): unknown {
  switch (value.type) {
    case 'object': {
      const out: Record<string, unknown> = {};
      for (const [key, child] of value.entries) {
        out[key] = toUnknown(child);
      }
      return out;
    }
    case 'array':
      return value.items.map(toUnknown);
    case 'string':
    case 'number':
    case 'boolean':
      return value.value;
    case 'null':
      return null;
  }
}

function looksLikeJson(raw: string): boolean {
  const s = raw.trim();
  return (s.startsWith('{') && s.endsWith('}')) || (s.startsWith('[') && s.endsWith(']'));
}

/**
 * Parses `raw` only when it is an object or array literal. Malformed
 * JSON-looking strings come back as null and are treated as opaque scalars.
 */
export function parseJsonLike(raw: string): JsonValue | null {
  if (!looksLikeJson(raw)) return null;
  try {
    return fromUnknown(JSON.parse(raw));
  } catch {
    return null;
  }
}

export function stringifyJson(value: JsonValue, indent?: number): string {
  return JSON.stringify(toUnknown(value), null, indent);
}

/** Same shape, every leaf replaced with an empty string. */
export function blankLeaves(value: JsonValue): JsonValue {
  switch (value.type) {
    case 'object':
      return { type: 'object', entries: value.entries.map(([key, child]): [string, JsonValue] => [key, blankLeaves(child)]) };
    case 'array':
      return { type: 'array', items: value.items.map(blankLeaves) };
    default:
      return { type: 'string', value: '' };
  }
}

/** String form of a backend value: strings verbatim, containers as JSON. */
export function stringifyValue(input: unknown): string {
  if (typeof input === 'string') return input;
  if (input === null || input === undefined) return '';
  if (typeof input === 'object') return JSON.stringify(input);
  return String(input);
}

/**
 * Values to send to a backend. A key keeps its fetched value, with its JSON
 * type, unless its string form no longer matches.
 */
export function toBackendValues(document: StoredDocument): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(document.data)) {
    const raw = document.raw;
    values[key] = raw && Object.hasOwn(raw, key) && stringifyValue(raw[key]) === value ? raw[key] : value;
  }
  return values;
}
