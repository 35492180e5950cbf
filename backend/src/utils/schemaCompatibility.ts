/**
 * Schema compatibility checks between two content type schemas
 *
 * Advisory: the result classifies the delta, callers decide whether a
 * breaking change blocks their operation.
 */

import {
  ChangeLevel,
  JsonObject,
  JsonValue,
  cloneJson,
  getArray,
  getObject,
  isJsonObject,
  jsonEquals
} from '../types/content';

export type BreakingChangeType = 'field_removed' | 'type_changed' | 'required_added';

export interface BreakingChange {
  type: BreakingChangeType;
  field: string;
  description: string;
}

export interface FieldChange {
  field: string;
  required: boolean;
  type: string | null;
}

export interface CompatibilityResult {
  compatible: boolean;
  changeLevel: ChangeLevel;
  additions: FieldChange[];
  removals: FieldChange[];
  breakingChanges: BreakingChange[];
  warnings: string[];
}

export interface FieldDescriptor {
  types: Set<string> | null;
  required: boolean;
}

enum TypeChange {
  NONE,
  WIDENED,
  BREAKING
}

function readTypes(node: JsonObject): Set<string> | null {
  const raw = node.type;
  if (typeof raw === 'string') return new Set([raw]);
  if (Array.isArray(raw)) {
    const types = raw.filter((entry): entry is string => typeof entry === 'string');
    return types.length > 0 ? new Set(types) : null;
  }
  return null;
}

function typeLabel(types: Set<string> | null): string | null {
  return types ? [...types].sort().join('|') : null;
}

function compareTypes(before: Set<string> | null, after: Set<string> | null): TypeChange {
  if (before === null && after === null) return TypeChange.NONE;
  // an untyped field accepts anything, so gaining a type narrows it
  if (before === null) return TypeChange.BREAKING;
  if (after === null) return TypeChange.WIDENED;

  const missing = [...before].filter((type) => !after.has(type));
  if (missing.length > 0) {
    // integer -> number only widens
    const onlyIntegerWidened = missing.length === 1 && missing[0] === 'integer' && after.has('number');
    return onlyIntegerWidened ? TypeChange.WIDENED : TypeChange.BREAKING;
  }
  return after.size > before.size ? TypeChange.WIDENED : TypeChange.NONE;
}

function requiredSet(node: JsonObject): Set<string> {
  const list = getArray(node, 'required') ?? [];
  return new Set(list.filter((entry): entry is string => typeof entry === 'string'));
}

function joinPath(prefix: string, name: string): string {
  return prefix === '' ? name : `${prefix}.${name}`;
}

function walkFields(node: JsonObject, prefix: string, fields: Map<string, FieldDescriptor>): void {
  const required = requiredSet(node);
  const properties = getObject(node, 'properties');
  if (properties) {
    for (const [name, raw] of Object.entries(properties)) {
      if (!isJsonObject(raw)) continue;
      const path = joinPath(prefix, name);
      fields.set(path, { types: readTypes(raw), required: required.has(name) });
      walkFields(raw, path, fields);
    }
  }

  const items = getObject(node, 'items');
  if (items) {
    const itemPath = `${prefix}[]`;
    fields.set(itemPath, { types: readTypes(items), required: false });
    walkFields(items, itemPath, fields);
  }

  for (const keyword of ['oneOf', 'anyOf', 'allOf']) {
    const variants = getArray(node, keyword) ?? [];
    variants.forEach((variant: JsonValue, index: number) => {
      if (isJsonObject(variant)) {
        walkFields(variant, joinPath(prefix, `${keyword}[${index}]`), fields);
      }
    });
  }
}

/**
 * Flatten a schema into field paths (`author.name`, `tags[]`)
 */
export function collectSchemaFields(schema: JsonObject | null | undefined): Map<string, FieldDescriptor> {
  const fields = new Map<string, FieldDescriptor>();
  if (schema) walkFields(schema, '', fields);
  return fields;
}

function withoutVersionTag(schema: JsonObject | null | undefined): JsonObject {
  if (!schema) return {};
  const copy = cloneJson(schema);
  const metadata = getObject(copy, 'metadata');
  if (metadata) {
    delete metadata.schema_version;
    if (Object.keys(metadata).length === 0) delete copy.metadata;
  }
  return copy;
}

/**
 * Classify the changes between an old and a new schema
 */
export function checkSchemaCompatibility(
  oldSchema: JsonObject | null | undefined,
  newSchema: JsonObject | null | undefined
): CompatibilityResult {
  const result: CompatibilityResult = {
    compatible: true,
    changeLevel: ChangeLevel.NONE,
    additions: [],
    removals: [],
    breakingChanges: [],
    warnings: []
  };

  const oldFields = collectSchemaFields(oldSchema);
  const newFields = collectSchemaFields(newSchema);
  let minor = false;

  for (const [path, before] of [...oldFields.entries()].sort(([a], [b]) => a.localeCompare(b))) {
    const after = newFields.get(path);
    if (!after) {
      result.removals.push({ field: path, required: before.required, type: typeLabel(before.types) });
      if (before.required) {
        result.breakingChanges.push({ type: 'field_removed', field: path, description: 'required field removed' });
      } else {
        minor = true;
      }
      continue;
    }

    switch (compareTypes(before.types, after.types)) {
      case TypeChange.BREAKING:
        result.breakingChanges.push({
          type: 'type_changed',
          field: path,
          description: `field type changed from ${typeLabel(before.types) ?? 'any'} to ${typeLabel(after.types) ?? 'any'}`
        });
        break;
      case TypeChange.WIDENED:
        minor = true;
        break;
      default:
        break;
    }

    if (!before.required && after.required) {
      result.breakingChanges.push({ type: 'required_added', field: path, description: 'existing field became required' });
    } else if (before.required && !after.required) {
      minor = true;
    }
  }

  for (const [path, after] of [...newFields.entries()].sort(([a], [b]) => a.localeCompare(b))) {
    if (oldFields.has(path)) continue;
    result.additions.push({ field: path, required: after.required, type: typeLabel(after.types) });
    if (after.required) {
      result.breakingChanges.push({ type: 'required_added', field: path, description: 'required field added' });
    } else {
      minor = true;
    }
  }

  if (result.breakingChanges.length > 0) {
    result.compatible = false;
    result.changeLevel = ChangeLevel.MAJOR;
    return result;
  }
  if (minor) {
    result.changeLevel = ChangeLevel.MINOR;
    return result;
  }
  if (!jsonEquals(withoutVersionTag(oldSchema), withoutVersionTag(newSchema))) {
    result.changeLevel = ChangeLevel.PATCH;
    result.warnings.push('schema changed without affecting fields');
  }
  return result;
}
