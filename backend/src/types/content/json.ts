/**
 * Document model for schema and payload documents
 *
 * Content type schemas, translation payloads and migration inputs are all
 * plain JSON documents. They are modelled as a closed union so transforms and
 * schema checks can narrow on it instead of working against `any`.
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue =
  | JsonPrimitive
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type JsonArray = JsonValue[];

/**
 * Check if a value is a valid JSON value (recursively)
 */
export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;

  const type = typeof value;

  if (type === 'string' || type === 'boolean') {
    return true;
  }

  if (type === 'number') {
    return Number.isFinite(value);
  }

  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }

  if (typeof value === 'object') {
    if (value instanceof Date || value instanceof RegExp) {
      return false;
    }

    if (Object.prototype.toString.call(value) !== '[object Object]') {
      return false;
    }

    return Object.values(value).every(isJsonValue);
  }

  return false;
}

/**
 * Narrow a JSON value to an object document
 */
export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return value !== null && value !== undefined && typeof value === 'object' && !Array.isArray(value);
}

export function isJsonArray(value: JsonValue | undefined): value is JsonArray {
  return Array.isArray(value);
}

/**
 * Read a key as an object document, or undefined when absent or of another shape
 */
export function getObject(doc: JsonObject | null | undefined, key: string): JsonObject | undefined {
  if (!doc) return undefined;
  const value = doc[key];
  return isJsonObject(value) ? value : undefined;
}

export function getString(doc: JsonObject | null | undefined, key: string): string | undefined {
  if (!doc) return undefined;
  const value = doc[key];
  return typeof value === 'string' ? value : undefined;
}

export function getArray(doc: JsonObject | null | undefined, key: string): JsonArray | undefined {
  if (!doc) return undefined;
  const value = doc[key];
  return Array.isArray(value) ? value : undefined;
}

/**
 * Deep copy of a JSON value. Documents handed to transforms are always copies.
 */
export function cloneJson<T extends JsonValue>(value: T): T;
export function cloneJson(value: JsonValue): JsonValue {
  if (value === null || typeof value !== 'object') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((entry) => cloneJson(entry));
  }
  const out: JsonObject = {};
  for (const [key, entry] of Object.entries(value)) {
    out[key] = cloneJson(entry);
  }
  return out;
}

export function cloneDocument(doc: JsonObject | null | undefined): JsonObject | undefined {
  return doc ? cloneJson(doc) : undefined;
}

/**
 * Structural equality of two JSON values. Object key order is ignored.
 */
export function jsonEquals(a: JsonValue | undefined, b: JsonValue | undefined): boolean {
  if (a === b) return true;
  if (a === undefined || b === undefined || a === null || b === null) return false;

  if (Array.isArray(a)) {
    if (!Array.isArray(b) || a.length !== b.length) return false;
    return a.every((entry, index) => jsonEquals(entry, b[index]));
  }

  if (typeof a === 'object') {
    if (typeof b !== 'object' || Array.isArray(b)) return false;
    const aKeys = Object.keys(a);
    const bKeys = Object.keys(b);
    if (aKeys.length !== bKeys.length) return false;
    return aKeys.every((key) => Object.prototype.hasOwnProperty.call(b, key) && jsonEquals(a[key], b[key]));
  }

  return false;
}
