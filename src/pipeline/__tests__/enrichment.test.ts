import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { LlmEnrichmentService, cleanHtml } from '../enrichment.js';
import { LlmClient } from '../../llm/client.js';
import { generateDefaultConfig } from '../../shared/config.js';

describe('cleanHtml', () => {
  it('puts each text node on its own line', () => {
    expect(cleanHtml('<p>Hello <b>world</b></p><p>Second</p>')).toBe('Hello\nworld\nSecond');
  });

  it('removes scripts and styles', () => {
    expect(cleanHtml('<script>alert(1)</script><style>.x{}</style><p>text</p>')).toBe('text');
  });

  it('drops blank lines and trims', () => {
    expect(cleanHtml('<div>\n\n  <p>  a  </p>\n\n<p>b</p>\n</div>')).toBe('a\nb');
  });

  it('passes plain text through', () => {
    expect(cleanHtml('just text')).toBe('just text');
  });

  it('decodes entities', () => {
    expect(cleanHtml('<p>Tom &amp; Jerry</p>')).toBe('Tom & Jerry');
  });

  it('returns an empty string for markup without text', () => {
    expect(cleanHtml('<img src="x.png">')).toBe('');
  });
});

describe('LlmEnrichmentService', () => {
  const originalFetch = globalThis.fetch;

  beforeEach(() => {
    vi.restoreAllMocks();
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  function reply(content: string): Response {
    return new Response(JSON.stringify({ choices: [{ message: { content } }], model: 'test-model' }), {
      status: 200,
      headers: { 'Content-Type': 'application/json' },
    });
  }

  function service(): LlmEnrichmentService {
    const llm = { ...generateDefaultConfig().llm, api_key: 'test-secret', base_url: 'https://llm.test/v1' };
    return new LlmEnrichmentService(new LlmClient(llm));
  }

  it('cleans locally without calling the model', async () => {
    const fetchMock = vi.fn();
    globalThis.fetch = fetchMock;

    await expect(service().clean('<p>a</p>')).resolves.toBe('a');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('rewrites through the chat completions endpoint', async () => {
    const fetchMock = vi.fn().mockResolvedValue(reply('<p>Rewritten</p>'));
    globalThis.fetch = fetchMock;

    await expect(service().rewrite('original')).resolves.toBe('<p>Rewritten</p>');
    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://llm.test/v1/chat/completions');
  });

  it('names the target language in the translation prompt', async () => {
    const fetchMock = vi.fn().mockResolvedValue(reply('Привет'));
    globalThis.fetch = fetchMock;

    await expect(service().translate('Hello', 'ru')).resolves.toBe('Привет');

    const init: unknown = fetchMock.mock.calls[0]?.[1];
    const body = typeof init === 'object' && init !== null && 'body' in init ? String(init.body) : '';
    expect(body).toContain('Translate the text into Russian.');
    expect(body).toContain('Hello');
  });
});
