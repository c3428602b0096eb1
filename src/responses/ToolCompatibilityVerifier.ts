import {
  SCHEMA_LIST_KEYWORDS,
  SCHEMA_MAP_KEYWORDS,
  classifySchemaNode,
  declaredPropertyNames,
  isSchemaObject,
  requiredNames,
} from './JsonSchema.js';
import type { JsonSchema } from './types.js';

const TOOL_NAME_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;

export interface ToolVerificationReport {
  name: string;
  valid: boolean;
  issues: string[];
}

/**
 * List everything that keeps a tool from being accepted as a strict responses API
 * function tool. An empty list means the tool is compatible.
 */
export function verifyTool(tool: unknown): string[] {
  if (!isSchemaObject(tool)) {
    return ['Tool definition must be an object'];
  }

  const issues: string[] = [];

  if (tool.type !== 'function') {
    issues.push("Missing or incorrect 'type' field (should be 'function')");
  }

  if (typeof tool.name !== 'string' || tool.name.length === 0) {
    issues.push("Missing 'name' field");
  } else if (!TOOL_NAME_PATTERN.test(tool.name)) {
    issues.push(`Name '${tool.name}' must match ${TOOL_NAME_PATTERN.source}`);
  }

  if (typeof tool.description !== 'string' || tool.description.length === 0) {
    issues.push("Missing 'description' field");
  }

  const params = tool.parameters;
  if (!isSchemaObject(params)) {
    issues.push("Missing 'parameters' field");
    return issues;
  }

  if (params.type !== 'object') {
    issues.push("Parameters 'type' must be 'object'");
  }
  if (!isSchemaObject(params.properties)) {
    issues.push("Missing 'properties' in parameters");
  }

  collectClosureIssues(params, 'parameters', issues);
  return issues;
}

export function verifyTools(tools: readonly unknown[]): ToolVerificationReport[] {
  return tools.map((tool, index) => {
    const issues = verifyTool(tool);
    const name =
      isSchemaObject(tool) && typeof tool.name === 'string' && tool.name
        ? tool.name
        : `UnknownTool-${index + 1}`;
    return { name, valid: issues.length === 0, issues };
  });
}

function collectClosureIssues(schema: JsonSchema, path: string, issues: string[]): void {
  if (classifySchemaNode(schema) === 'object') {
    const declared = declaredPropertyNames(schema);
    const required = requiredNames(schema);

    if (schema.additionalProperties !== false) {
      issues.push(`${path}: 'additionalProperties' must be false`);
    }
    if (required === undefined) {
      if (declared.length > 0) {
        issues.push(`${path}: missing 'required' list`);
      }
    } else {
      for (const name of required) {
        if (!declared.includes(name)) {
          issues.push(`${path}: required parameter '${name}' not defined in properties`);
        }
      }
      for (const name of declared) {
        if (!required.includes(name)) {
          issues.push(`${path}: property '${name}' is not listed in 'required'`);
        }
      }
    }
  }

  for (const [keyword, value] of Object.entries(schema)) {
    if (SCHEMA_MAP_KEYWORDS.has(keyword) && isSchemaObject(value)) {
      for (const [name, subschema] of Object.entries(value)) {
        if (isSchemaObject(subschema)) {
          collectClosureIssues(subschema, `${path}.${keyword}.${name}`, issues);
        }
      }
    } else if (SCHEMA_LIST_KEYWORDS.has(keyword)) {
      const entries = Array.isArray(value) ? value : [value];
      entries.forEach((entry: unknown, index) => {
        if (isSchemaObject(entry)) {
          const suffix = Array.isArray(value) ? `[${index}]` : '';
          collectClosureIssues(entry, `${path}.${keyword}${suffix}`, issues);
        }
      });
    }
  }
}
