import { z } from 'zod';
import { ReplyDecodeError } from '../errors/ErrorHandling.js';
import type { ApiReply, JsonValue, StructuredOutputFormat, ToolCall } from './types.js';

const ContentPartSchema = z
  .object({
    type: z.string(),
    text: z.string().optional(),
  })
  .passthrough();

const OutputItemSchema = z
  .object({
    type: z.string(),
    content: z.array(ContentPartSchema).optional(),
  })
  .passthrough();

const FunctionCallItemSchema = z.object({
  type: z.literal('function_call'),
  name: z.string().min(1),
  arguments: z.string(),
  call_id: z.string().optional(),
});

const ResponseBodySchema = z
  .object({
    id: z.string().optional(),
    output: z.array(OutputItemSchema).optional(),
    output_text: z.string().optional(),
  })
  .passthrough()
  .refine((body) => body.output !== undefined || body.output_text !== undefined, {
    message: 'Reply has neither "output" nor "output_text"',
  });

type OutputItem = z.infer<typeof OutputItemSchema>;

export interface DecodeReplyOptions {
  /** The format requested with `text.format`, if any */
  format?: StructuredOutputFormat;
}

/**
 * Turn a responses API body into a reply variant.
 *
 * Function calls take precedence; otherwise a requested format makes the output text a
 * structured payload; otherwise the reply is plain text.
 */
export function decodeReply(body: unknown, options: DecodeReplyOptions = {}): ApiReply {
  const parsed = ResponseBodySchema.safeParse(body);
  if (!parsed.success) {
    throw new ReplyDecodeError('Reply is not a responses API body', {
      issues: parsed.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
      ),
    });
  }

  const output = parsed.data.output ?? [];
  const text = collectOutputText(output) ?? parsed.data.output_text;
  const calls = collectToolCalls(output);

  if (calls.length > 0) {
    return { kind: 'tool_calls', calls, text };
  }

  if (options.format) {
    return { kind: 'structured', payload: text ?? '', format: options.format, text };
  }

  return { kind: 'text', text };
}

function collectOutputText(output: OutputItem[]): string | undefined {
  const parts: string[] = [];

  for (const item of output) {
    if (item.type !== 'message' || !item.content) continue;
    for (const part of item.content) {
      if (part.type === 'output_text' && part.text !== undefined) {
        parts.push(part.text);
      }
    }
  }

  return parts.length > 0 ? parts.join('') : undefined;
}

function collectToolCalls(output: OutputItem[]): ToolCall[] {
  const calls: ToolCall[] = [];

  output.forEach((item, index) => {
    if (item.type !== 'function_call') return;

    const call = FunctionCallItemSchema.safeParse(item);
    if (!call.success) {
      throw new ReplyDecodeError(`Malformed function_call at output[${index}]`, {
        index,
        issues: call.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }

    const decoded: ToolCall = {
      name: call.data.name,
      arguments: decodeArguments(call.data.arguments),
    };
    if (call.data.call_id) {
      decoded.callId = call.data.call_id;
    }
    calls.push(decoded);
  });

  return calls;
}

/** Arguments arrive JSON-encoded; text that is not JSON is kept as the raw string. */
function decodeArguments(raw: string): JsonValue {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}
