import { z } from 'zod';
import { InvalidToolDefinitionError } from '../errors/ErrorHandling.js';
import type { JsonSchema, ToolDescriptor } from './types.js';

const SchemaObject = z.record(z.unknown());

/** `{ name, description, inputSchema }` as listed by MCP servers */
const McpToolSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  inputSchema: SchemaObject,
});

/** `{ type: "function", function: { name, description, parameters } }` */
const ChatCompletionToolSchema = z.object({
  type: z.literal('function'),
  function: z.object({
    name: z.string().min(1),
    description: z.string().optional(),
    parameters: SchemaObject.optional(),
  }),
});

/** `{ name, description, input_schema }` */
const InputSchemaToolSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  input_schema: SchemaObject,
});

/** `{ type?: "function", name, description, parameters }` */
const ResponsesToolSchema = z.object({
  type: z.literal('function').optional(),
  name: z.string().min(1),
  description: z.string().optional(),
  parameters: SchemaObject.optional(),
});

function descriptor(
  name: string,
  description: string | undefined,
  parameters: JsonSchema | undefined,
): ToolDescriptor {
  return Object.freeze({
    name,
    description: description ?? '',
    parameters: parameters ?? { type: 'object', properties: {} },
  });
}

/**
 * Read one tool definition in any supported shape.
 *
 * Shapes are tried from most to least specific, so a chat-completions wrapper is never
 * mistaken for a bare responses tool.
 */
export function parseToolDefinition(raw: unknown, index = 0): ToolDescriptor {
  const chat = ChatCompletionToolSchema.safeParse(raw);
  if (chat.success) {
    const fn = chat.data.function;
    return descriptor(fn.name, fn.description, fn.parameters);
  }

  const mcp = McpToolSchema.safeParse(raw);
  if (mcp.success) {
    return descriptor(mcp.data.name, mcp.data.description, mcp.data.inputSchema);
  }

  const legacy = InputSchemaToolSchema.safeParse(raw);
  if (legacy.success) {
    return descriptor(legacy.data.name, legacy.data.description, legacy.data.input_schema);
  }

  const responses = ResponsesToolSchema.safeParse(raw);
  if (responses.success) {
    return descriptor(responses.data.name, responses.data.description, responses.data.parameters);
  }

  const issues = responses.error.issues.map(
    (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
  );
  throw new InvalidToolDefinitionError(`Tool definition at index ${index} has no supported shape`, {
    index,
    issues,
  });
}

export function parseToolDefinitions(raw: unknown): ToolDescriptor[] {
  if (!Array.isArray(raw)) {
    throw new InvalidToolDefinitionError('Tool definitions must be a JSON array', {
      received: raw === null ? 'null' : typeof raw,
    });
  }
  return raw.map((entry: unknown, index) => parseToolDefinition(entry, index));
}
