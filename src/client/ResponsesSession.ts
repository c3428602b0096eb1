import type { Logger } from 'winston';
import { createLogger } from '../logging/Logger.js';
import { decodeReply } from '../responses/ReplyDecoder.js';
import { extractResult } from '../responses/ResponseExtractor.js';
import { buildResponsesRequest } from '../responses/StructuredOutput.js';
import { normalizeTools } from '../responses/ToolSchemaNormalizer.js';
import type {
  ExtractedResult,
  HostedTool,
  InputMessage,
  ResponsesInvoker,
  StructuredOutputFormat,
  ToolDescriptor,
} from '../responses/types.js';
import { forLog } from '../utils/SensitiveData.js';

export interface ResponsesSessionOptions {
  model: string;
  invoker: ResponsesInvoker;
  instructions?: string;
  logger?: Logger;
}

export interface RespondOptions {
  tools?: readonly ToolDescriptor[];
  hostedTools?: HostedTool[];
  format?: StructuredOutputFormat;
}

/**
 * Runs one request/reply exchange at a time: normalize tools, build the request,
 * invoke the endpoint, decode the body and extract the result.
 */
export class ResponsesSession {
  private readonly logger: Logger;

  constructor(private readonly options: ResponsesSessionOptions) {
    this.logger = options.logger ?? createLogger();
  }

  public async respond(
    input: string | InputMessage[],
    options: RespondOptions = {},
  ): Promise<ExtractedResult> {
    const tools = normalizeTools(options.tools ?? []);
    const request = buildResponsesRequest({
      model: this.options.model,
      input,
      instructions: this.options.instructions,
      tools,
      hostedTools: options.hostedTools,
      structuredOutput: options.format,
    });

    this.logger.info('Responses API request', {
      model: request.model,
      toolNames: tools.map((tool) => tool.name),
      hostedTools: options.hostedTools?.map((tool) => tool.type),
      format: options.format?.name,
    });

    let body: unknown;
    try {
      body = await this.options.invoker(request);
    } catch (error) {
      this.logger.error('Responses API call failed', { error: forLog(String(error)) });
      throw error;
    }

    const result = extractResult(decodeReply(body, { format: options.format }));

    if (result.kind === 'tool_calls') {
      this.logger.info('Responses API requested tool calls', {
        calls: result.calls.map((call) => ({
          name: call.name,
          arguments: forLog(call.arguments),
        })),
      });
    } else {
      this.logger.debug(`Responses API reply extracted as ${result.kind}`);
    }

    return result;
  }

  public callWithTools(
    input: string | InputMessage[],
    tools: readonly ToolDescriptor[],
  ): Promise<ExtractedResult> {
    return this.respond(input, { tools });
  }

  public structuredResponse(
    input: string | InputMessage[],
    format: StructuredOutputFormat,
  ): Promise<ExtractedResult> {
    return this.respond(input, { format });
  }

  /** Ask the model to search the web with a hosted search tool. */
  public webSearch(
    query: string,
    hostedTools: HostedTool[] = [{ type: 'web_search' }],
  ): Promise<ExtractedResult> {
    return this.respond([{ role: 'user', content: `Please search the web for: ${query}` }], {
      hostedTools,
    });
  }
}
