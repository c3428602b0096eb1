import { DuplicateToolNameError, InvalidToolDefinitionError } from '../errors/ErrorHandling.js';
import {
  SCHEMA_LIST_KEYWORDS,
  SCHEMA_MAP_KEYWORDS,
  classifySchemaNode,
  declaredPropertyNames,
  isSchemaObject,
} from './JsonSchema.js';
import type { JsonSchema, NormalizedTool, ToolDescriptor } from './types.js';

/**
 * Convert tool descriptors into the strict function-tool shape of the responses API.
 *
 * Every object node of every parameter schema ends up closed: `additionalProperties`
 * is false and, unless the caller listed `required` explicitly, every declared property
 * is required. Input descriptors are left untouched.
 */
export function normalizeTools(tools: readonly ToolDescriptor[]): NormalizedTool[] {
  const seen = new Set<string>();

  for (const tool of tools) {
    if (typeof tool.name !== 'string' || tool.name.length === 0) {
      throw new InvalidToolDefinitionError('Tool name must be a non-empty string', {
        description: tool.description,
      });
    }
    if (seen.has(tool.name)) {
      throw new DuplicateToolNameError(tool.name);
    }
    seen.add(tool.name);
  }

  return tools.map((tool) => ({
    type: 'function',
    name: tool.name,
    description: tool.description,
    parameters: closeSchema(tool.parameters),
  }));
}

/**
 * Return a closed copy of a schema tree. The result shares no objects with the input.
 */
export function closeSchema(schema: JsonSchema): JsonSchema {
  const copy: JsonSchema = {};

  for (const [keyword, value] of Object.entries(schema)) {
    copy[keyword] = rewriteKeyword(keyword, value);
  }

  if (classifySchemaNode(copy) === 'object') {
    if (copy.additionalProperties === undefined || copy.additionalProperties === true) {
      copy.additionalProperties = false;
    }
    // Only an absent list is filled in; an explicit one is the caller's choice.
    if (copy.required === undefined) {
      copy.required = declaredPropertyNames(copy);
    }
  }

  return copy;
}

function rewriteKeyword(keyword: string, value: unknown): unknown {
  if (SCHEMA_MAP_KEYWORDS.has(keyword)) {
    return isSchemaObject(value) ? rewriteSchemaMap(value) : structuredClone(value);
  }
  // `items` may hold a single schema or a tuple of schemas
  if (SCHEMA_LIST_KEYWORDS.has(keyword)) {
    return Array.isArray(value) ? value.map(closeOrClone) : closeOrClone(value);
  }
  return structuredClone(value);
}

function rewriteSchemaMap(map: JsonSchema): JsonSchema {
  const rewritten: JsonSchema = {};
  for (const [name, subschema] of Object.entries(map)) {
    rewritten[name] = closeOrClone(subschema);
  }
  return rewritten;
}

function closeOrClone(value: unknown): unknown {
  return isSchemaObject(value) ? closeSchema(value) : structuredClone(value);
}
