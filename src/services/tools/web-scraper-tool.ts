// Web Scraper Tool
// Reads the title and visible text of an HTML page. Only registered when HTTP_TOOLS_ENABLED=true

import { defineTool, errorResult, successResult } from './base-tool.js';
import { errorMessage, isValidUrl, requestSignal } from './http-request.js';

const DEFAULT_MAX_LENGTH = 10_000;
const USER_AGENT = 'AgentServer/1.0';

const ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&nbsp;': ' ',
};

function decodeEntities(text: string): string {
  return text.replace(/&(amp|lt|gt|quot|#39|nbsp);/g, entity => ENTITIES[entity] ?? entity);
}

export function extractTitle(html: string): string {
  const match = /<title[^>]*>([\s\S]*?)<\/title>/i.exec(html);
  const title = match ? decodeEntities(match[1]).trim() : '';
  return title || 'No title found';
}

export function extractText(html: string): string {
  const stripped = html
    .replace(/<(script|style|noscript)[^>]*>[\s\S]*?<\/\1>/gi, ' ')
    .replace(/<!--[\s\S]*?-->/g, ' ')
    .replace(/<[^>]*>/g, ' ');
  return decodeEntities(stripped).replace(/\s+/g, ' ').trim();
}

export function createWebScraperTool(fetchImpl: typeof fetch = fetch) {
  return defineTool({
    name: 'web_scraper',
    description: 'Extracts the title and text content from a web page',
    parameters: [
      {
        name: 'url',
        type: 'string',
        description: 'The URL of the page to scrape',
        required: true,
        pattern: '^https?://.*',
      },
      {
        name: 'max_length',
        type: 'number',
        description: `Maximum length of extracted text (default: ${DEFAULT_MAX_LENGTH})`,
        required: false,
        minimum: 100,
        maximum: 100_000,
        default: DEFAULT_MAX_LENGTH,
      },
    ],
    usage: 'Use web_scraper to read an article or documentation page as plain text. Use http_get for APIs.',
    execute: async (ctx, args) => {
      const url = String(args.url ?? '');
      if (!isValidUrl(url)) {
        return errorResult('INVALID_URL', `Invalid URL: ${url}`);
      }

      let response: Response;
      try {
        response = await fetchImpl(url, {
          method: 'GET',
          headers: { 'User-Agent': USER_AGENT },
          signal: requestSignal(ctx, args),
        });
      } catch (error) {
        return errorResult('REQUEST_FAILED', `HTTP request failed: ${errorMessage(error)}`);
      }

      const contentType = response.headers.get('content-type') ?? '';
      if (!contentType.includes('text/html')) {
        await response.body?.cancel();
        return errorResult('NOT_HTML', 'URL does not return HTML content');
      }

      let html: string;
      try {
        html = await response.text();
      } catch (error) {
        return errorResult('RESPONSE_READ_FAILED', `Failed to read response: ${errorMessage(error)}`);
      }

      const maxLength = typeof args.max_length === 'number' ? Math.floor(args.max_length) : DEFAULT_MAX_LENGTH;
      let content = extractText(html);
      if (content.length > maxLength) {
        content = `${content.slice(0, maxLength)}...`;
      }

      return successResult(
        { title: extractTitle(html), content, url, length: content.length },
        { status_code: response.status, content_type: contentType, original_size: html.length }
      );
    },
  });
}
