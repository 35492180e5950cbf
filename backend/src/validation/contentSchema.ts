import Joi from 'joi';
import {
  EMBEDDED_BLOCKS_KEY,
  JsonObject,
  JsonValue,
  PromotionError,
  PromotionErrorCode,
  getArray,
  getObject,
  isJsonObject
} from '../types/content';

/**
 * Content payload validation against content type schemas
 *
 * Content type schemas are JSON-schema documents. The subset used by content
 * types (type, properties, required, items, enum, additionalProperties,
 * string/number bounds, oneOf/anyOf) is compiled to Joi and cached per
 * schema document.
 */

export interface ValidationIssue {
  path: string;
  message: string;
}

export interface PayloadValidationResult {
  valid: boolean;
  issues: ValidationIssue[];
}

const compiled = new WeakMap<JsonObject, Joi.Schema>();

function applyStringBounds(schema: Joi.StringSchema, node: JsonObject): Joi.StringSchema {
  let out = schema;
  const minLength = node.minLength;
  const maxLength = node.maxLength;
  if (typeof minLength === 'number') {
    out = out.min(minLength);
  } else {
    out = out.allow('');
  }
  if (typeof maxLength === 'number') out = out.max(maxLength);
  return out;
}

function applyNumberBounds(schema: Joi.NumberSchema, node: JsonObject): Joi.NumberSchema {
  let out = schema;
  if (typeof node.minimum === 'number') out = out.min(node.minimum);
  if (typeof node.maximum === 'number') out = out.max(node.maximum);
  return out;
}

function compileObject(node: JsonObject, root: boolean): Joi.ObjectSchema {
  const properties = getObject(node, 'properties');
  if (!properties) {
    return Joi.object().unknown(true);
  }

  const required = new Set((getArray(node, 'required') ?? []).filter((entry): entry is string => typeof entry === 'string'));
  const keys: Joi.SchemaMap = {};
  for (const [name, child] of Object.entries(properties)) {
    if (!isJsonObject(child)) continue;
    const compiledChild = compileNode(child);
    keys[name] = required.has(name) ? compiledChild.required() : compiledChild;
  }

  const closed = node.additionalProperties === false;
  if (closed && root && keys[EMBEDDED_BLOCKS_KEY] === undefined) {
    // embedded block instances ride along with any payload
    keys[EMBEDDED_BLOCKS_KEY] = Joi.any();
  }
  return Joi.object(keys).unknown(!closed);
}

function compileType(type: string, node: JsonObject, root: boolean): Joi.Schema {
  switch (type) {
    case 'object':
      return compileObject(node, root);
    case 'array': {
      const items = getObject(node, 'items');
      return items ? Joi.array().items(compileNode(items)) : Joi.array();
    }
    case 'string':
      return applyStringBounds(Joi.string(), node);
    case 'integer':
      return applyNumberBounds(Joi.number().integer(), node);
    case 'number':
      return applyNumberBounds(Joi.number(), node);
    case 'boolean':
      return Joi.boolean();
    case 'null':
      return Joi.valid(null);
    default:
      return Joi.any();
  }
}

function compileNode(node: JsonObject, root = false): Joi.Schema {
  const enumValues = getArray(node, 'enum');
  if (enumValues) {
    return Joi.any().valid(...enumValues);
  }

  const variants = getArray(node, 'oneOf') ?? getArray(node, 'anyOf');
  if (variants) {
    const options = variants.filter(isJsonObject).map((variant) => compileNode(variant));
    if (options.length > 0) {
      return Joi.alternatives().try(...options);
    }
  }

  const type: JsonValue | undefined = node.type;
  if (typeof type === 'string') {
    return compileType(type, node, root);
  }
  if (Array.isArray(type)) {
    const options = type
      .filter((entry): entry is string => typeof entry === 'string')
      .map((entry) => compileType(entry, node, root));
    if (options.length === 1) return options[0];
    if (options.length > 1) return Joi.alternatives().try(...options);
  }
  if (getObject(node, 'properties')) {
    return compileObject(node, root);
  }
  return root ? Joi.object().unknown(true) : Joi.any();
}

/**
 * Compile (or fetch from cache) the Joi schema for a content type schema
 */
export function compileContentSchema(schema: JsonObject): Joi.Schema {
  const cached = compiled.get(schema);
  if (cached) return cached;
  const result = compileNode(schema, true);
  compiled.set(schema, result);
  return result;
}

/**
 * Validate a tag-free payload against a content type schema
 */
export function validatePayload(schema: JsonObject, payload: JsonObject): PayloadValidationResult {
  const { error } = compileContentSchema(schema).validate(payload, {
    abortEarly: false,
    convert: false
  });

  if (!error) {
    return { valid: true, issues: [] };
  }

  return {
    valid: false,
    issues: error.details.map((detail) => ({
      path: detail.path.length > 0 ? detail.path.join('.') : '#',
      message: detail.message
    }))
  };
}

export function formatIssues(issues: ValidationIssue[]): string {
  return issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ');
}

/**
 * Throw SCHEMA_INVALID when the payload does not satisfy the schema
 */
export function assertValidPayload(schema: JsonObject, payload: JsonObject, context: Record<string, unknown> = {}): void {
  const result = validatePayload(schema, payload);
  if (!result.valid) {
    throw new PromotionError(
      PromotionErrorCode.SCHEMA_INVALID,
      `schema validation failed: ${formatIssues(result.issues)}`,
      { ...context, issues: result.issues }
    );
  }
}
