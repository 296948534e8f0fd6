// HTTP POST Tool
// Sends data to a URL on behalf of the agent. Only registered when HTTP_TOOLS_ENABLED=true

import { defineTool, errorResult, successResult } from './base-tool.js';
import {
  DEFAULT_TIMEOUT_SECONDS,
  errorMessage,
  isValidUrl,
  parseJsonOr,
  requestHeaders,
  requestSignal,
  responseHeaders,
} from './http-request.js';
import { isPlainObject } from './validation.js';

const DEFAULT_CONTENT_TYPE = 'application/json';

function encodeBody(data: unknown, contentType: string): string {
  if (contentType.includes('application/x-www-form-urlencoded') && isPlainObject(data)) {
    const form = new URLSearchParams();
    for (const [key, value] of Object.entries(data)) {
      form.append(key, typeof value === 'string' ? value : JSON.stringify(value));
    }
    return form.toString();
  }
  return JSON.stringify(data ?? {});
}

export function createHttpPostTool(fetchImpl: typeof fetch = fetch) {
  return defineTool({
    name: 'http_post',
    description: 'Performs an HTTP POST request to send data to a URL',
    parameters: [
      {
        name: 'url',
        type: 'string',
        description: 'The URL to send the POST request to',
        required: true,
        pattern: '^https?://.*',
      },
      {
        name: 'data',
        type: 'object',
        description: 'Data to send in the request body',
        required: false,
      },
      {
        name: 'headers',
        type: 'object',
        description: 'Optional HTTP headers to include in the request',
        required: false,
      },
      {
        name: 'content_type',
        type: 'string',
        description: `Content type of the request body (default: ${DEFAULT_CONTENT_TYPE})`,
        required: false,
        default: DEFAULT_CONTENT_TYPE,
      },
      {
        name: 'timeout',
        type: 'number',
        description: `Request timeout in seconds (default: ${DEFAULT_TIMEOUT_SECONDS})`,
        required: false,
        minimum: 1,
        maximum: 300,
        default: DEFAULT_TIMEOUT_SECONDS,
      },
    ],
    examples: [
      {
        description: 'Create a resource through a JSON API',
        input: { url: 'https://api.example.com/items', data: { name: 'Test Item' } },
      },
    ],
    execute: async (ctx, args) => {
      const url = String(args.url ?? '');
      if (!isValidUrl(url)) {
        return errorResult('INVALID_URL', `Invalid URL: ${url}`);
      }

      const contentType = typeof args.content_type === 'string' ? args.content_type : DEFAULT_CONTENT_TYPE;
      const headers = { 'Content-Type': contentType, ...requestHeaders(args.headers) };

      let response: Response;
      try {
        response = await fetchImpl(url, {
          method: 'POST',
          headers,
          body: encodeBody(args.data, contentType),
          signal: requestSignal(ctx, args),
        });
      } catch (error) {
        return errorResult('REQUEST_FAILED', `HTTP request failed: ${errorMessage(error)}`);
      }

      let body: string;
      try {
        body = await response.text();
      } catch (error) {
        return errorResult('RESPONSE_READ_FAILED', `Failed to read response: ${errorMessage(error)}`);
      }

      const responseType = response.headers.get('content-type') ?? '';
      const data = responseType.includes('application/json') ? parseJsonOr(body, body) : body;

      return successResult(
        {
          status_code: response.status,
          data,
          headers: responseHeaders(response),
          content_type: responseType,
        },
        { url, response_size: body.length }
      );
    },
  });
}
