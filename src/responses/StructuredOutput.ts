import { closeSchema } from './ToolSchemaNormalizer.js';
import type {
  HostedTool,
  InputMessage,
  JsonSchema,
  NormalizedTool,
  ResponsesRequest,
  StructuredOutputFormat,
} from './types.js';

export interface StructuredOutputOptions {
  required?: string[];
  description?: string;
  strict?: boolean;
}

/**
 * Create a `json_schema` output format for an object with the given properties.
 * Strict formats are closed the same way tool parameters are.
 */
export function createStructuredOutputFormat(
  name: string,
  properties: Record<string, JsonSchema>,
  options: StructuredOutputOptions = {},
): StructuredOutputFormat {
  const strict = options.strict ?? true;
  const schema: JsonSchema = {
    type: 'object',
    properties,
    additionalProperties: false,
  };

  if (options.required && options.required.length > 0) {
    schema.required = [...options.required];
  }

  const format: StructuredOutputFormat = {
    name,
    strict,
    schema: strict ? closeSchema(schema) : schema,
  };

  if (options.description) {
    format.description = options.description;
  }

  return format;
}

export interface ResponsesRequestOptions {
  model: string;
  input: string | InputMessage[];
  instructions?: string;
  tools?: NormalizedTool[];
  /** Appended after the function tools without normalization */
  hostedTools?: HostedTool[];
  structuredOutput?: StructuredOutputFormat;
}

export function buildResponsesRequest(options: ResponsesRequestOptions): ResponsesRequest {
  const request: ResponsesRequest = {
    model: options.model,
    input: options.input,
  };

  if (options.instructions) {
    request.instructions = options.instructions;
  }

  const tools = [...(options.tools ?? []), ...(options.hostedTools ?? [])];
  if (tools.length > 0) {
    request.tools = tools;
  }

  if (options.structuredOutput) {
    request.text = {
      format: {
        type: 'json_schema',
        ...options.structuredOutput,
      },
    };
  }

  return request;
}
