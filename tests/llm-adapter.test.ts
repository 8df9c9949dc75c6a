import { createLlmAdapter } from '../src/adapters/llm-adapter';
import { AdapterError, ConfigError, MalformedOutputError } from '../src/errors';
import { FetchLike } from '../src/repository-source';
import { jsonResponse } from './fixtures';

const completion = (content: string | null) => ({ choices: [{ message: { role: 'assistant', content } }] });

describe('LLM adapter', () => {
  it('requires an API key', () => {
    expect(() => createLlmAdapter({})).toThrow(ConfigError);
    expect(() => createLlmAdapter({})).toThrow('DEEPSEEK_API_KEY environment variable required');
  });

  it('posts a chat completion and strips the markdown fence', async () => {
    const requests: { url: string; init?: RequestInit }[] = [];
    const fetchImpl: FetchLike = async (url, init) => {
      requests.push({ url, init });
      return jsonResponse(completion('Here is the CBOM:\n```json\n{"bomFormat":"CycloneDX","components":[]}\n```'));
    };
    const adapter = createLlmAdapter({ apiKey: 'test-secret', baseUrl: 'https://llm.test/', model: 'test-model', fetchImpl });
    const out = await adapter.generate('https://github.com/acme/vault', 'dev');

    expect(out.document).toBe('{"bomFormat":"CycloneDX","components":[]}');
    expect(adapter.toolId).toBe('deepseek');
    expect(adapter.family).toBe('llm-generator');
    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe('https://llm.test/chat/completions');
    expect(requests[0].init?.method).toBe('POST');
    expect(new Headers(requests[0].init?.headers).get('Authorization')).toBe('Bearer test-secret');
    const body = JSON.parse(String(requests[0].init?.body));
    expect(body.model).toBe('test-model');
    expect(body.stream).toBe(false);
    expect(body.messages[1]).toEqual({
      role: 'user',
      content: [
        'Please generate a CBOM json for this project, following the official CycloneDX standard on CBOMs.',
        'Project: https://github.com/acme/vault',
        'Branch: dev',
        'Please only return the formatted JSON.'
      ].join('\n')
    });
  });

  it('returns the answer verbatim when it has no fence', async () => {
    const adapter = createLlmAdapter({ apiKey: 'test-secret', fetchImpl: async () => jsonResponse(completion(' [{"name":"AES"}] ')) });
    expect((await adapter.generate('https://github.com/acme/vault', 'main')).document).toBe('[{"name":"AES"}]');
  });

  it('reports HTTP errors as tool errors', async () => {
    const adapter = createLlmAdapter({
      apiKey: 'test-secret',
      fetchImpl: async () => new Response('{"error":"invalid key"}', { status: 401 })
    });
    const run = adapter.generate('https://github.com/acme/vault', 'main');
    await expect(run).rejects.toBeInstanceOf(AdapterError);
    await expect(run).rejects.toThrow('LLM API error: 401 - {"error":"invalid key"}');
  });

  it('reports transport failures as tool errors', async () => {
    const adapter = createLlmAdapter({ apiKey: 'test-secret', fetchImpl: async () => { throw new Error('socket hang up'); } });
    await expect(adapter.generate('https://github.com/acme/vault', 'main')).rejects.toThrow('LLM request failed: socket hang up');
  });

  it('keeps the raw body of an unexpected response', async () => {
    const adapter = createLlmAdapter({ apiKey: 'test-secret', fetchImpl: async () => jsonResponse({ foo: 1 }) });
    const run = adapter.generate('https://github.com/acme/vault', 'main');
    await expect(run).rejects.toBeInstanceOf(MalformedOutputError);
    await expect(run).rejects.toMatchObject({ message: 'Unexpected chat-completion response', rawText: '{"foo":1}' });
  });

  it('rejects a body that is not JSON', async () => {
    const adapter = createLlmAdapter({ apiKey: 'test-secret', fetchImpl: async () => new Response('<html>busy</html>') });
    await expect(adapter.generate('https://github.com/acme/vault', 'main'))
      .rejects.toMatchObject({ message: 'LLM response body is not JSON', rawText: '<html>busy</html>' });
  });
});
