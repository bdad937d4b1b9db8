import { isJsonObject, type JsonObject, type JsonValue } from '@switchyard/shared';

const PLACEHOLDER_PATTERN = /^\$\{\s*([A-Za-z0-9_-]+(?:\.[A-Za-z0-9_-]+)*)\s*\}$/;

/** Derives well-known context keys from a completed step's data. */
export type ContextExtractor = (action: string, data: JsonValue) => JsonObject;

function actionFamily(action: string): string {
  return action.split(/[._]/, 1)[0]?.toLowerCase() ?? '';
}

function scalarField(data: JsonValue, field: string): string | number | null {
  if (!isJsonObject(data)) {
    return null;
  }
  const value = data[field];
  return typeof value === 'string' || typeof value === 'number' ? value : null;
}

export function createFamilyExtractor(
  families: readonly string[],
  fields: Readonly<Record<string, readonly string[]>>
): ContextExtractor {
  const matched = new Set(families.map((family) => family.toLowerCase()));
  return (action, data) => {
    if (!matched.has(actionFamily(action))) {
      return {};
    }
    const extracted: JsonObject = {};
    for (const [key, candidates] of Object.entries(fields)) {
      for (const candidate of candidates) {
        const value = scalarField(data, candidate);
        if (value !== null) {
          extracted[key] = value;
          break;
        }
      }
    }
    return extracted;
  };
}

export const resourceIdExtractor: ContextExtractor = (_action, data): JsonObject => {
  const id = scalarField(data, 'id');
  return id === null ? {} : { last_resource_id: id };
};

export const defaultContextExtractors: readonly ContextExtractor[] = [
  resourceIdExtractor,
  createFamilyExtractor(['onedrive', 'sharepoint', 'drive', 'files'], {
    last_file_id: ['id'],
    last_file_url: ['webUrl', 'url']
  }),
  createFamilyExtractor(['hubspot', 'crm', 'contacts'], {
    last_contact_id: ['id', 'contactId']
  })
];

export function resultKey(stepId: string): string {
  return `${stepId}_result`;
}

/**
 * Stores a step's data under `{stepId}_result` and merges the well-known keys
 * the extractors derive from it.
 */
export function mergeStepResult(
  context: JsonObject,
  stepId: string,
  action: string,
  data: JsonValue,
  extractors: readonly ContextExtractor[] = defaultContextExtractors
): JsonObject {
  const next: JsonObject = { ...context, [resultKey(stepId)]: data };
  for (const extractor of extractors) {
    Object.assign(next, extractor(action, data));
  }
  return next;
}

export function lookupContextPath(context: JsonObject, path: string): JsonValue | undefined {
  const [head, ...rest] = path.split('.');
  if (head === undefined || !Object.hasOwn(context, head)) {
    return undefined;
  }
  let current: JsonValue | undefined = context[head];
  for (const segment of rest) {
    if (Array.isArray(current)) {
      const index = Number(segment);
      current = Number.isInteger(index) ? current[index] : undefined;
    } else if (isJsonObject(current)) {
      current = Object.hasOwn(current, segment) ? current[segment] : undefined;
    } else {
      return undefined;
    }
    if (current === undefined) {
      return undefined;
    }
  }
  return current;
}

/**
 * Replaces string leaves that are exactly `${key}` or `${key.path}` with the
 * referenced context value. Unresolvable placeholders and every other value
 * are returned untouched.
 */
export function substituteContext(value: JsonValue, context: JsonObject): JsonValue {
  if (typeof value === 'string') {
    const match = PLACEHOLDER_PATTERN.exec(value);
    if (!match) {
      return value;
    }
    const resolved = lookupContextPath(context, match[1]);
    return resolved === undefined ? value : resolved;
  }
  if (Array.isArray(value)) {
    return value.map((entry) => substituteContext(entry, context));
  }
  if (isJsonObject(value)) {
    return substituteParams(value, context);
  }
  return value;
}

export function substituteParams(params: JsonObject, context: JsonObject): JsonObject {
  const result: JsonObject = {};
  for (const [key, entry] of Object.entries(params)) {
    result[key] = substituteContext(entry, context);
  }
  return result;
}
