import { isJsonObject, type JsonValue } from '@switchyard/shared';

export function redactionTag(value: JsonValue): string {
  if (value === null) {
    return '[redacted:null]';
  }
  if (Array.isArray(value)) {
    return '[redacted:array]';
  }
  return `[redacted:${typeof value}]`;
}

/**
 * Replaces the value of every member whose name matches one of `keys`
 * (case-insensitive, at any depth) with a tag naming the value's type.
 */
export function redactValue(value: JsonValue, keys: ReadonlySet<string>): JsonValue {
  if (Array.isArray(value)) {
    return value.map((entry) => redactValue(entry, keys));
  }
  if (!isJsonObject(value)) {
    return value;
  }
  const result: Record<string, JsonValue> = {};
  for (const [key, entry] of Object.entries(value)) {
    result[key] = keys.has(key.toLowerCase()) ? redactionTag(entry) : redactValue(entry, keys);
  }
  return result;
}

export function createRedactor(keys: readonly string[]): (value: JsonValue) => JsonValue {
  const normalized = new Set(keys.map((key) => key.trim().toLowerCase()).filter((key) => key.length > 0));
  return (value) => redactValue(value, normalized);
}
