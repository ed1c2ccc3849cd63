/**
 * Tests for the generic HTTP adapter
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { GenericHttpAdapter, extractResponseText } from '../../src/adapters/http.js';
import { createAnalysisAdapter } from '../../src/adapters/index.js';

describe('extractResponseText', () => {
  it('should prefer the known response fields in order', () => {
    expect(extractResponseText({ output: 'b', response: 'a' })).toBe('a');
    expect(extractResponseText({ result: 'c' })).toBe('c');
    expect(extractResponseText('raw')).toBe('raw');
    expect(extractResponseText({ other: 1 })).toBe('{"other":1}');
  });
});

describe('GenericHttpAdapter', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should post the prompt with params and a bearer token', async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response(JSON.stringify({ response: '[]' }), { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);
    const adapter = new GenericHttpAdapter(
      {
        provider: 'custom',
        api_url: 'https://llm.internal.test/v1/analyze',
        api_key: 'test-secret',
        headers: { 'X-Team': 'appsec' },
        params: { model: 'local-7b' },
      },
      { timeoutMs: 5000 }
    );

    const result = await adapter.analyze('scan this');

    expect(adapter.label).toBe('custom:llm.internal.test');
    expect(result).toEqual({ success: true, response: '[]' });
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('https://llm.internal.test/v1/analyze');
    expect(init.method).toBe('POST');
    expect(init.headers).toEqual({
      'Content-Type': 'application/json',
      'X-Team': 'appsec',
      Authorization: 'Bearer test-secret',
    });
    expect(JSON.parse(init.body)).toEqual({ prompt: 'scan this', model: 'local-7b' });
  });

  it('should keep a configured authorization header', () => {
    const adapter = new GenericHttpAdapter(
      {
        provider: 'custom',
        api_url: 'https://llm.internal.test/',
        api_key: 'test-secret',
        headers: { authorization: 'Token abc' },
        params: {},
      },
      { timeoutMs: 5000 }
    );
    expect(adapter.label).toBe('custom:llm.internal.test');
  });

  it('should report non-200 statuses as classified errors', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('denied', { status: 403 })));
    const adapter = new GenericHttpAdapter(
      { provider: 'custom', api_url: 'https://llm.internal.test/', headers: {}, params: {} },
      { timeoutMs: 5000 }
    );
    expect(await adapter.analyze('x')).toEqual({
      success: false,
      error: { kind: 'auth', message: 'HTTP 403: denied', status: 403 },
    });
  });

  it('should classify network failures', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockRejectedValue(new TypeError('fetch failed', { cause: { code: 'ENOTFOUND' } }))
    );
    const adapter = new GenericHttpAdapter(
      { provider: 'custom', api_url: 'https://llm.internal.test/', headers: {}, params: {} },
      { timeoutMs: 5000 }
    );
    expect(await adapter.analyze('x')).toEqual({
      success: false,
      error: { kind: 'connection', message: 'fetch failed' },
    });
  });
});

describe('createAnalysisAdapter', () => {
  it('should build the adapter matching the provider', () => {
    const adapter = createAnalysisAdapter(
      { provider: 'custom', api_url: 'https://llm.internal.test/', headers: {}, params: {} },
      { timeoutMs: 1000 }
    );
    expect(adapter).toBeInstanceOf(GenericHttpAdapter);
  });
});
