import { describe, it, expect, vi, afterEach } from 'vitest';
import { BackendError, OperationKind, type InvokeOptions } from '@semantix/shared';
import { OllamaBackend } from '../src/providers/ollama.js';

const noOptions: InvokeOptions = { stop: [], overrides: {} };

function jsonResponse(body: unknown, status = 200) {
  return {
    ok: status >= 200 && status < 300,
    status,
    json: () => Promise.resolve(body),
    text: () => Promise.resolve(JSON.stringify(body)),
  };
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('OllamaBackend', () => {
  it('posts a non-streaming chat request', async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      jsonResponse({ model: 'llama3.2:3b', message: { role: 'assistant', content: 'paris' }, done: true }),
    );
    vi.stubGlobal('fetch', fetchMock);
    const backend = new OllamaBackend();

    const reply = await backend.invoke(
      { kind: 'prompt', text: 'Capital of France?', operation: OperationKind.Query, args: [] },
      { stop: ['\n'], overrides: {} },
    );

    expect(reply).toBe('paris');
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://localhost:11434/api/chat');
    expect(JSON.parse(init.body)).toEqual({
      model: 'llama3.2:3b',
      messages: [{ role: 'user', content: 'Capital of France?' }],
      stream: false,
      options: { temperature: 0, stop: ['\n'] },
    });
  });

  it('embeds through /api/embed', async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse({ embeddings: [[1, 2], [3, 4]] }));
    vi.stubGlobal('fetch', fetchMock);
    const backend = new OllamaBackend({ baseUrl: 'http://ollama.test', model: 'nomic-embed-text' });

    const reply = await backend.invoke({ kind: 'embed', texts: ['a', 'b'] }, noOptions);

    expect(reply).toEqual([[1, 2], [3, 4]]);
    expect(fetchMock.mock.calls[0][0]).toBe('http://ollama.test/api/embed');
    expect(JSON.parse(fetchMock.mock.calls[0][1].body)).toEqual({ model: 'nomic-embed-text', input: ['a', 'b'] });
  });

  it('turns a non-OK status into BackendError', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue({
      ok: false,
      status: 500,
      text: () => Promise.resolve('boom'),
    }));
    const backend = new OllamaBackend();

    await expect(backend.invoke({ kind: 'embed', texts: ['a'] }, noOptions))
      .rejects.toThrow("Backend 'ollama' failed: Ollama API error (500): boom");
  });

  it('wraps network failures', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new Error('ECONNREFUSED')));
    const backend = new OllamaBackend();

    await expect(backend.invoke({ kind: 'embed', texts: ['a'] }, noOptions)).rejects.toBeInstanceOf(BackendError);
  });

  it('turns a body that is not JSON into BackendError', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue({
      ok: true,
      status: 200,
      json: () => Promise.reject(new SyntaxError('Unexpected token < in JSON at position 0')),
      text: () => Promise.resolve('<html>'),
    }));
    const backend = new OllamaBackend();

    await expect(backend.invoke({ kind: 'embed', texts: ['a'] }, noOptions))
      .rejects.toThrow("Backend 'ollama' failed: unreadable response: Unexpected token < in JSON at position 0");
  });

  it('turns a broken error body into BackendError', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue({
      ok: false,
      status: 502,
      text: () => Promise.reject(new TypeError('terminated')),
    }));
    const backend = new OllamaBackend();

    await expect(backend.invoke({ kind: 'embed', texts: ['a'] }, noOptions))
      .rejects.toThrow("Backend 'ollama' failed: unreadable response: terminated");
  });

  it('rejects a malformed reply', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(jsonResponse({ nope: true })));
    const backend = new OllamaBackend();

    await expect(backend.invoke({ kind: 'embed', texts: ['a'] }, noOptions))
      .rejects.toThrow("Backend 'ollama' failed: malformed embed response");
  });

  it('command changes the base URL', async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse({ embeddings: [[1]] }));
    vi.stubGlobal('fetch', fetchMock);
    const backend = new OllamaBackend();

    backend.command({ baseUrl: 'http://elsewhere.test:11434' });
    await backend.invoke({ kind: 'embed', texts: ['a'] }, noOptions);

    expect(fetchMock.mock.calls[0][0]).toBe('http://elsewhere.test:11434/api/embed');
  });

  it('reports the model context window', () => {
    expect(new OllamaBackend({ model: 'mistral:7b' }).properties()).toEqual({ model: 'mistral:7b', maxTokens: 32768 });
    expect(new OllamaBackend({ model: 'unknown-model' }).properties().maxTokens).toBe(4096);
  });
});
