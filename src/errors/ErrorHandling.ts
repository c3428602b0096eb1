/**
 * Error types raised while converting tools and interpreting replies.
 *
 * Every error carries a stable `code` and a `details` bag so callers can log or
 * report the failure without inspecting internals. Nothing here is retried.
 */

/**
 * Base error class for all bridge errors
 */
export class BridgeError extends Error {
  public readonly code: string;
  public readonly details: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'BridgeError';
    this.code = code;
    this.details = details || {};
    this.timestamp = new Date();

    Object.setPrototypeOf(this, BridgeError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
    };
  }
}

/**
 * Error thrown when a tool list repeats a name
 */
export class DuplicateToolNameError extends BridgeError {
  public readonly toolName: string;

  constructor(toolName: string, details?: Record<string, unknown>) {
    super(`Duplicate tool name: ${toolName}`, 'DUPLICATE_TOOL_NAME', {
      ...(details || {}),
      toolName,
    });
    this.name = 'DuplicateToolNameError';
    this.toolName = toolName;
    Object.setPrototypeOf(this, DuplicateToolNameError.prototype);
  }
}

/**
 * Error thrown when a tool definition cannot be read as any supported shape
 */
export class InvalidToolDefinitionError extends BridgeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_TOOL_DEFINITION', details || {});
    this.name = 'InvalidToolDefinitionError';
    Object.setPrototypeOf(this, InvalidToolDefinitionError.prototype);
  }
}

/**
 * Error thrown when a structured reply does not match the requested schema
 */
export class MalformedPayloadError extends BridgeError {
  public readonly schemaName: string;
  public readonly field?: string;
  public readonly issues: string[];

  constructor(
    message: string,
    options: { schemaName: string; field?: string; issues?: string[] },
  ) {
    const issues = options.issues ?? [];
    super(message, 'MALFORMED_PAYLOAD', {
      schemaName: options.schemaName,
      field: options.field,
      issues,
    });
    this.name = 'MalformedPayloadError';
    this.schemaName = options.schemaName;
    this.field = options.field;
    this.issues = issues;
    Object.setPrototypeOf(this, MalformedPayloadError.prototype);
  }
}

/**
 * Error thrown when a reply body is not a responses API body at all
 */
export class ReplyDecodeError extends BridgeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'REPLY_DECODE_ERROR', details || {});
    this.name = 'ReplyDecodeError';
    Object.setPrototypeOf(this, ReplyDecodeError.prototype);
  }
}

/**
 * Error thrown when the responses endpoint answers with a non-2xx status
 */
export class ResponsesApiError extends BridgeError {
  public readonly statusCode: number;

  constructor(message: string, statusCode: number, details?: Record<string, unknown>) {
    super(message, 'RESPONSES_API_ERROR', { ...(details || {}), statusCode });
    this.name = 'ResponsesApiError';
    this.statusCode = statusCode;
    Object.setPrototypeOf(this, ResponsesApiError.prototype);
  }
}

/**
 * Error thrown when a configuration file cannot be read or validated
 */
export class ConfigurationError extends BridgeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details || {});
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Type guard for bridge errors
 */
export function isBridgeError(error: unknown): error is BridgeError {
  return error instanceof BridgeError;
}

/**
 * Render any thrown value as a one-line message
 */
export function describeError(error: unknown): string {
  if (isBridgeError(error)) {
    return `${error.name} [${error.code}]: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
