import { MalformedPayloadError } from '../errors/ErrorHandling.js';
import { buildPayloadValidator } from './SchemaValidatorBuilder.js';
import type { ApiReply, ExtractedResult, StructuredReply } from './types.js';

/**
 * Classify a reply into exactly one result.
 *
 * Tool calls win over a structured payload, which wins over text. Tool-call arguments are
 * handed through as received; only structured payloads are checked against their schema.
 */
export function extractResult(reply: ApiReply): ExtractedResult {
  if (reply.kind === 'tool_calls' && reply.calls.length > 0) {
    return {
      kind: 'tool_calls',
      calls: reply.calls.map((call) => ({ ...call })),
    };
  }

  if (reply.kind === 'structured') {
    return { kind: 'structured', payload: parseStructuredPayload(reply) };
  }

  return { kind: 'text', text: reply.text ?? '' };
}

function parseStructuredPayload(reply: StructuredReply): unknown {
  const schemaName = reply.format.name;
  let payload = reply.payload;

  if (typeof payload === 'string') {
    try {
      payload = JSON.parse(payload);
    } catch (error) {
      throw new MalformedPayloadError(`Structured payload for "${schemaName}" is not valid JSON`, {
        schemaName,
        issues: [error instanceof Error ? error.message : String(error)],
      });
    }
  }

  const result = buildPayloadValidator(reply.format.schema).safeParse(payload);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues.map(
    (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
  );
  const firstIssue = result.error.issues[0];
  const field = firstIssue && firstIssue.path.length > 0 ? firstIssue.path.join('.') : undefined;

  throw new MalformedPayloadError(
    `Structured payload does not match schema "${schemaName}": ${issues.join('; ')}`,
    { schemaName, field, issues },
  );
}
