#!/usr/bin/env node
/**
 * Responses bridge
 * Converts tool definitions for the responses API and interprets its replies.
 *
 * Library entry point; `main()` backs the `responses-bridge` command.
 */

import { runCli } from './cli/commands.js';
import { createLogger } from './logging/Logger.js';

export { VERSION } from './version.js';

export type {
  ApiReply,
  ExtractedResult,
  HostedTool,
  InputMessage,
  JsonSchema,
  JsonValue,
  NormalizedTool,
  ResponsesInvoker,
  ResponsesRequest,
  StructuredOutputFormat,
  StructuredReply,
  TextReply,
  ToolCall,
  ToolCallReply,
  ToolDescriptor,
} from './responses/types.js';
export { normalizeTools, closeSchema } from './responses/ToolSchemaNormalizer.js';
export { extractResult } from './responses/ResponseExtractor.js';
export { parseToolDefinition, parseToolDefinitions } from './responses/ToolDefinitionParser.js';
export { verifyTool, verifyTools } from './responses/ToolCompatibilityVerifier.js';
export type { ToolVerificationReport } from './responses/ToolCompatibilityVerifier.js';
export { createStructuredOutputFormat, buildResponsesRequest } from './responses/StructuredOutput.js';
export { SchemaValidatorBuilder, buildPayloadValidator } from './responses/SchemaValidatorBuilder.js';
export { decodeReply } from './responses/ReplyDecoder.js';
export { ResponsesSession } from './client/ResponsesSession.js';
export { createFetchInvoker } from './client/FetchInvoker.js';
export { MCPToolSource } from './bridge/MCPToolSource.js';
export type { MCPServerConfig, ToolRegistration } from './bridge/MCPToolSource.js';
export { loadBridgeConfig, parseBridgeConfig } from './config/BridgeConfig.js';
export type { BridgeConfig } from './config/BridgeConfig.js';
export { createLogger } from './logging/Logger.js';
export {
  BridgeError,
  DuplicateToolNameError,
  InvalidToolDefinitionError,
  MalformedPayloadError,
  ReplyDecodeError,
  ResponsesApiError,
  ConfigurationError,
} from './errors/ErrorHandling.js';

export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  const logger = createLogger();
  const exitCode = await runCli(argv, {
    stdout: (text) => process.stdout.write(`${text}\n`),
    stderr: (text) => process.stderr.write(`${text}\n`),
    cwd: process.cwd(),
    logger,
  });
  process.exitCode = exitCode;
}
