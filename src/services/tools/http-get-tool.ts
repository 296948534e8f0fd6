// HTTP GET Tool
// Fetches a URL on behalf of the agent. Only registered when HTTP_TOOLS_ENABLED=true

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

const MAX_BODY_CHARS = 100_000;

export function createHttpGetTool(fetchImpl: typeof fetch = fetch) {
  return defineTool({
    name: 'http_get',
    description: 'Performs an HTTP GET request to retrieve data from a URL',
    parameters: [
      {
        name: 'url',
        type: 'string',
        description: 'The URL to send the GET request to',
        required: true,
        pattern: '^https?://.*',
      },
      {
        name: 'headers',
        type: 'object',
        description: 'Optional HTTP headers to include in the request',
        required: false,
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
    usage: 'Use http_get to read public web pages or JSON APIs. Prefer specific URLs over search pages.',
    execute: async (ctx, args) => {
      const url = String(args.url ?? '');
      if (!isValidUrl(url)) {
        return errorResult('INVALID_URL', `Invalid URL: ${url}`);
      }

      let response: Response;
      try {
        response = await fetchImpl(url, {
          method: 'GET',
          headers: requestHeaders(args.headers),
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

      const contentType = response.headers.get('content-type') ?? '';
      const text = body.slice(0, MAX_BODY_CHARS);
      const data = contentType.includes('application/json') ? parseJsonOr(body, text) : text;

      return successResult(
        {
          status_code: response.status,
          data,
          headers: responseHeaders(response),
          content_type: contentType,
        },
        { url, response_size: body.length, truncated: body.length > MAX_BODY_CHARS }
      );
    },
  });
}
