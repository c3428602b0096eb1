export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * A JSON-Schema-like node. Keywords are read with run-time narrowing, so trees
 * loaded from JSON files or MCP servers can carry anything.
 */
export interface JsonSchema {
  [keyword: string]: unknown;
}

export interface ToolDescriptor {
  readonly name: string;
  readonly description: string;
  readonly parameters: JsonSchema;
}

export interface NormalizedTool {
  type: 'function';
  name: string;
  description: string;
  parameters: JsonSchema;
}

export interface ToolCall {
  name: string;
  arguments: JsonValue;
  callId?: string;
}

export interface StructuredOutputFormat {
  name: string;
  strict: boolean;
  schema: JsonSchema;
  description?: string;
}

export interface TextReply {
  kind: 'text';
  text?: string;
}

export interface ToolCallReply {
  kind: 'tool_calls';
  calls: readonly ToolCall[];
  text?: string;
}

export interface StructuredReply {
  kind: 'structured';
  payload: unknown;
  format: StructuredOutputFormat;
  text?: string;
}

export type ApiReply = TextReply | ToolCallReply | StructuredReply;

export type ExtractedResult =
  | { kind: 'text'; text: string }
  | { kind: 'tool_calls'; calls: ToolCall[] }
  | { kind: 'structured'; payload: unknown };

export interface InputMessage {
  role: 'user' | 'system' | 'developer' | 'assistant';
  content: string;
}

export interface JsonSchemaTextFormat extends StructuredOutputFormat {
  type: 'json_schema';
}

/** A tool run by the API itself, such as `{ type: "web_search" }`; sent as given. */
export interface HostedTool {
  type: string;
  [option: string]: unknown;
}

export interface ResponsesRequest {
  model: string;
  input: string | InputMessage[];
  instructions?: string;
  tools?: Array<NormalizedTool | HostedTool>;
  text?: {
    format: JsonSchemaTextFormat;
  };
}

/**
 * Sends a request to the responses endpoint and resolves with the raw reply body.
 */
export type ResponsesInvoker = (request: ResponsesRequest) => Promise<unknown>;
