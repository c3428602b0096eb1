import { ResponsesApiError } from '../errors/ErrorHandling.js';
import type { ResponsesInvoker, ResponsesRequest } from '../responses/types.js';

export interface FetchInvokerOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

const DEFAULT_BASE_URL = 'https://api.openai.com/v1';

/**
 * Create an invoker that POSTs requests to `<baseUrl>/responses`.
 * Failures are reported once; retrying is left to the caller.
 */
export function createFetchInvoker(options: FetchInvokerOptions): ResponsesInvoker {
  const baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
  const fetchImpl = options.fetchImpl ?? fetch;

  return async (request: ResponsesRequest): Promise<unknown> => {
    const response = await fetchImpl(`${baseUrl}/responses`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${options.apiKey}`,
      },
      body: JSON.stringify(request),
      signal: options.timeoutMs ? AbortSignal.timeout(options.timeoutMs) : undefined,
    });

    if (!response.ok) {
      const errorText = await response.text().catch(() => response.statusText);
      throw new ResponsesApiError(
        `Responses API error: ${response.status} - ${errorText}`,
        response.status,
        { body: errorText },
      );
    }

    return response.json();
  };
}
