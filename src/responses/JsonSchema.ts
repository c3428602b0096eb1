import type { JsonSchema } from './types.js';

export type SchemaNodeKind = 'object' | 'array' | 'scalar';

/** Keywords holding a list of subschemas */
export const SCHEMA_LIST_KEYWORDS: ReadonlySet<string> = new Set(['items', 'anyOf', 'oneOf', 'allOf']);
/** Keywords holding a name-to-subschema map */
export const SCHEMA_MAP_KEYWORDS: ReadonlySet<string> = new Set(['properties', '$defs', 'definitions']);

export function isSchemaObject(value: unknown): value is JsonSchema {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Classify a node by its `type` keyword. A type list counts as an object node
 * when it contains "object" (e.g. `["object", "null"]`).
 */
export function classifySchemaNode(schema: JsonSchema): SchemaNodeKind {
  const schemaType = schema.type;
  const types = Array.isArray(schemaType) ? schemaType : [schemaType];

  if (types.includes('object')) {
    return 'object';
  }
  if (types.includes('array')) {
    return 'array';
  }
  return 'scalar';
}

/** Declared property names in declaration order; empty when `properties` is not a map. */
export function declaredPropertyNames(schema: JsonSchema): string[] {
  return isSchemaObject(schema.properties) ? Object.keys(schema.properties) : [];
}

export function requiredNames(schema: JsonSchema): string[] | undefined {
  if (!Array.isArray(schema.required)) {
    return undefined;
  }
  return schema.required.filter((name): name is string => typeof name === 'string');
}
