import { describe, it, expect, vi } from 'vitest';
import pino from 'pino';
import { createHttpGetTool } from '../http-get-tool.js';
import { createHttpPostTool } from '../http-post-tool.js';
import { createWebScraperTool, extractText, extractTitle } from '../web-scraper-tool.js';
import { ToolErrorCode } from '../errors.js';
import { ToolExecutor } from '../executor.js';
import { initializeTools } from '../index.js';
import { ToolRegistry } from '../registry.js';

const silent = pino({ level: 'silent' });

function builtinExecutor() {
  const registry = initializeTools({ TOOLS_ENABLED: true, HTTP_TOOLS_ENABLED: false }, silent);
  return new ToolExecutor(registry, { timeoutMs: 1000 });
}

describe('built-in tools', () => {
  it('should register the default tool set and seal the registry', () => {
    const registry = initializeTools({ TOOLS_ENABLED: true, HTTP_TOOLS_ENABLED: false }, silent);
    expect(registry.names()).toEqual(['calculator', 'text_processor', 'json_processor']);
    expect(registry.isSealed()).toBe(true);
  });

  it('should only register the network tools when they are enabled', () => {
    const registry = initializeTools({ TOOLS_ENABLED: true, HTTP_TOOLS_ENABLED: true }, silent);
    expect(registry.names()).toEqual([
      'calculator',
      'text_processor',
      'json_processor',
      'http_get',
      'http_post',
      'web_scraper',
    ]);
  });

  it('should register nothing when tools are disabled', () => {
    const registry = initializeTools({ TOOLS_ENABLED: false, HTTP_TOOLS_ENABLED: true }, silent);
    expect(registry.count()).toBe(0);
  });

  describe('calculator', () => {
    const executor = builtinExecutor();

    it('should evaluate arithmetic', async () => {
      const result = await executor.execute('calculator', 's', { expression: '2 + 3' });
      expect(result.success).toBe(true);
      expect(result.data).toEqual({ expression: '2 + 3', result: 5 });
    });

    it('should support functions and powers', async () => {
      expect((await executor.execute('calculator', 's', { expression: 'sqrt(16)' })).data).toEqual({
        expression: 'sqrt(16)',
        result: 4,
      });
      expect((await executor.execute('calculator', 's', { expression: '2 ^ 10' })).data).toEqual({
        expression: '2 ^ 10',
        result: 1024,
      });
    });

    it('should reject characters outside the expression grammar', async () => {
      const result = await executor.execute('calculator', 's', { expression: 'DROP TABLE agents' });
      expect(result.errorCode).toBe(ToolErrorCode.VALIDATION_ERROR);
    });

    it('should fail on non-finite results', async () => {
      const result = await executor.execute('calculator', 's', { expression: '1/0' });
      expect(result.success).toBe(false);
      expect(result.errorCode).toBe('CALCULATION_ERROR');
    });

    it('should fail on malformed expressions', async () => {
      const result = await executor.execute('calculator', 's', { expression: '2 +' });
      expect(result.errorCode).toBe('CALCULATION_ERROR');
      expect(result.error).toMatch(/^Failed to evaluate expression: /);
    });
  });

  describe('text_processor', () => {
    const executor = builtinExecutor();
    const run = async (text: string, operation: string) =>
      (await executor.execute('text_processor', 's', { text, operation })).data;

    it('should transform case', async () => {
      expect(await run('hello world', 'uppercase')).toEqual({
        result: 'HELLO WORLD',
        operation: 'uppercase',
        original: 'hello world',
      });
      expect(await run('hello WORLD foo', 'title_case')).toMatchObject({ result: 'Hello World Foo' });
    });

    it('should count words and characters', async () => {
      expect(await run('  The quick  brown fox ', 'word_count')).toMatchObject({ result: 4 });
      expect(await run('abc', 'char_count')).toMatchObject({ result: 3 });
    });

    it('should reverse and trim', async () => {
      expect(await run('abc', 'reverse')).toMatchObject({ result: 'cba' });
      expect(await run('  padded  ', 'trim')).toMatchObject({ result: 'padded' });
    });

    it('should extract emails and urls', async () => {
      expect(await run('mail a@b.io and c.d@e.org', 'extract_emails')).toMatchObject({
        result: ['a@b.io', 'c.d@e.org'],
      });
      expect(await run('see https://x.dev/a and http://y.io', 'extract_urls')).toMatchObject({
        result: ['https://x.dev/a', 'http://y.io'],
      });
      expect(await run('nothing here', 'extract_urls')).toMatchObject({ result: [] });
    });

    it('should reject unknown operations during validation', async () => {
      const result = await executor.execute('text_processor', 's', { text: 'x', operation: 'shout' });
      expect(result.errorCode).toBe(ToolErrorCode.VALIDATION_ERROR);
    });
  });

  describe('json_processor', () => {
    const executor = builtinExecutor();

    it('should read nested values by path', async () => {
      const result = await executor.execute('json_processor', 's', {
        json_data: '{"user":{"name":"Ada"}}',
        operation: 'get_value',
        path: 'user.name',
      });
      expect(result.data).toEqual({ result: 'Ada', operation: 'get_value' });
    });

    it('should report missing keys', async () => {
      const result = await executor.execute('json_processor', 's', {
        json_data: '{"user":{"name":"Ada"}}',
        operation: 'get_value',
        path: 'user.age',
      });
      expect(result.errorCode).toBe('PROCESSING_ERROR');
      expect(result.error).toBe("Failed to process JSON: key 'age' not found");
    });

    it('should require a path for get_value', async () => {
      const result = await executor.execute('json_processor', 's', { json_data: '{}', operation: 'get_value' });
      expect(result.errorCode).toBe('MISSING_PATH');
    });

    it('should format and inspect documents', async () => {
      const pretty = await executor.execute('json_processor', 's', { json_data: '{"a":1}', operation: 'pretty_print' });
      expect(pretty.data).toEqual({ result: '{\n  "a": 1\n}', operation: 'pretty_print' });

      const minified = await executor.execute('json_processor', 's', { json_data: '{ "a" : [1, 2] }', operation: 'minify' });
      expect(minified.data).toEqual({ result: '{"a":[1,2]}', operation: 'minify' });

      const keys = await executor.execute('json_processor', 's', { json_data: '{"a":1,"b":2}', operation: 'extract_keys' });
      expect(keys.data).toEqual({ result: ['a', 'b'], operation: 'extract_keys' });
    });

    it('should reject invalid JSON', async () => {
      const result = await executor.execute('json_processor', 's', { json_data: '{oops', operation: 'validate' });
      expect(result.errorCode).toBe('INVALID_JSON');
    });
  });

  describe('http_get', () => {
    it('should fetch with the execution signal and parse JSON bodies', async () => {
      const fetchImpl = vi.fn<typeof fetch>(async () =>
        new Response('{"ok":true}', { status: 200, headers: { 'content-type': 'application/json' } })
      );
      const registry = new ToolRegistry();
      registry.register(createHttpGetTool(fetchImpl));
      const executor = new ToolExecutor(registry, { timeoutMs: 1000 });

      const result = await executor.execute('http_get', 's', {
        url: 'https://example.test/data',
        headers: { Accept: 'application/json' },
      });

      expect(result.success).toBe(true);
      expect(result.data).toEqual({
        status_code: 200,
        data: { ok: true },
        headers: { 'content-type': 'application/json' },
        content_type: 'application/json',
      });
      expect(result.metadata).toEqual({ url: 'https://example.test/data', response_size: 11, truncated: false });

      const [url, init] = fetchImpl.mock.calls[0];
      expect(url).toBe('https://example.test/data');
      expect(init?.headers).toEqual({ Accept: 'application/json' });
      expect(init?.signal).toBeInstanceOf(AbortSignal);
    });

    it('should report network failures as a failed result', async () => {
      const fetchImpl = vi.fn<typeof fetch>(async () => {
        throw new Error('connection refused');
      });
      const registry = new ToolRegistry();
      registry.register(createHttpGetTool(fetchImpl));
      const executor = new ToolExecutor(registry, { timeoutMs: 1000 });

      const result = await executor.execute('http_get', 's', { url: 'https://example.test/' });

      expect(result.errorCode).toBe('REQUEST_FAILED');
      expect(result.error).toBe('HTTP request failed: connection refused');
    });

    it('should only accept http(s) urls', async () => {
      const registry = new ToolRegistry();
      registry.register(createHttpGetTool(vi.fn<typeof fetch>()));
      const executor = new ToolExecutor(registry, { timeoutMs: 1000 });

      const result = await executor.execute('http_get', 's', { url: 'file:///etc/passwd' });
      expect(result.errorCode).toBe(ToolErrorCode.VALIDATION_ERROR);
    });
  });
  describe('http_post', () => {
    function postExecutor(fetchImpl: typeof fetch) {
      const registry = new ToolRegistry();
      registry.register(createHttpPostTool(fetchImpl));
      return new ToolExecutor(registry, { timeoutMs: 1000 });
    }

    it('should send data as JSON by default', async () => {
      const fetchImpl = vi.fn<typeof fetch>(async () =>
        new Response('{"id":7}', { status: 201, headers: { 'content-type': 'application/json' } })
      );

      const result = await postExecutor(fetchImpl).execute('http_post', 's', {
        url: 'https://example.test/items',
        data: { name: 'Test Item' },
        headers: { 'X-Trace': 'abc' },
      });

      expect(result.success).toBe(true);
      expect(result.data).toEqual({
        status_code: 201,
        data: { id: 7 },
        headers: { 'content-type': 'application/json' },
        content_type: 'application/json',
      });
      expect(result.metadata).toEqual({ url: 'https://example.test/items', response_size: 8 });

      const [, init] = fetchImpl.mock.calls[0];
      expect(init?.method).toBe('POST');
      expect(init?.body).toBe('{"name":"Test Item"}');
      expect(init?.headers).toEqual({ 'Content-Type': 'application/json', 'X-Trace': 'abc' });
    });

    it('should form-encode data for urlencoded requests', async () => {
      const fetchImpl = vi.fn<typeof fetch>(async () => new Response('ok', { status: 200 }));

      const result = await postExecutor(fetchImpl).execute('http_post', 's', {
        url: 'https://example.test/form',
        data: { q: 'a b', n: 2 },
        content_type: 'application/x-www-form-urlencoded',
      });

      expect(result.data).toMatchObject({ status_code: 200, data: 'ok' });
      const [, init] = fetchImpl.mock.calls[0];
      expect(init?.body).toBe('q=a+b&n=2');
    });

    it('should report network failures as a failed result', async () => {
      const fetchImpl = vi.fn<typeof fetch>(async () => {
        throw new Error('connection reset');
      });

      const result = await postExecutor(fetchImpl).execute('http_post', 's', { url: 'https://example.test/' });

      expect(result.errorCode).toBe('REQUEST_FAILED');
      expect(result.error).toBe('HTTP request failed: connection reset');
    });
  });

  describe('web_scraper', () => {
    const page = [
      '<html><head><title>Release &amp; Notes</title>',
      '<style>body { color: red; }</style></head>',
      '<body><h1>Version 2</h1>\n<p>Faster   builds.</p>',
      '<script>track();</script></body></html>',
    ].join('');

    function scraperExecutor(fetchImpl: typeof fetch) {
      const registry = new ToolRegistry();
      registry.register(createWebScraperTool(fetchImpl));
      return new ToolExecutor(registry, { timeoutMs: 1000 });
    }

    it('should extract the title and visible text', () => {
      expect(extractTitle(page)).toBe('Release & Notes');
      expect(extractTitle('<p>no head</p>')).toBe('No title found');
      expect(extractText(page)).toBe('Release & Notes Version 2 Faster builds.');
    });

    it('should scrape an HTML page', async () => {
      const fetchImpl = vi.fn<typeof fetch>(async () =>
        new Response(page, { status: 200, headers: { 'content-type': 'text/html; charset=utf-8' } })
      );

      const result = await scraperExecutor(fetchImpl).execute('web_scraper', 's', { url: 'https://example.test/notes' });

      expect(result.success).toBe(true);
      expect(result.data).toEqual({
        title: 'Release & Notes',
        content: 'Release & Notes Version 2 Faster builds.',
        url: 'https://example.test/notes',
        length: 40,
      });
      expect(result.metadata).toEqual({
        status_code: 200,
        content_type: 'text/html; charset=utf-8',
        original_size: page.length,
      });
      const [, init] = fetchImpl.mock.calls[0];
      expect(init?.headers).toEqual({ 'User-Agent': 'AgentServer/1.0' });
    });

    it('should truncate long pages to max_length', async () => {
      const body = `<p>${'word '.repeat(100)}</p>`;
      const fetchImpl = vi.fn<typeof fetch>(async () =>
        new Response(body, { status: 200, headers: { 'content-type': 'text/html' } })
      );

      const result = await scraperExecutor(fetchImpl).execute('web_scraper', 's', {
        url: 'https://example.test/long',
        max_length: 100,
      });

      expect(result.data).toMatchObject({ content: `${'word '.repeat(20)}...`, length: 103 });
    });

    it('should refuse non-HTML responses', async () => {
      const fetchImpl = vi.fn<typeof fetch>(async () =>
        new Response('{}', { status: 200, headers: { 'content-type': 'application/json' } })
      );

      const result = await scraperExecutor(fetchImpl).execute('web_scraper', 's', { url: 'https://example.test/api' });

      expect(result.errorCode).toBe('NOT_HTML');
      expect(result.error).toBe('URL does not return HTML content');
    });
  });
});
