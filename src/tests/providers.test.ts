/**
 * Tests for chat-completion clients (fetch is mocked)
 */
import { describe, it, afterEach, mock } from 'node:test';
import assert from 'node:assert';
import { evalConfigSchema, getProviderInfo } from '../config.js';
import { ProviderError, createChat } from '../providers.js';

type FetchArgs = Parameters<typeof fetch>;

function mockFetch(...responses: Array<() => Response>) {
  let call = 0;
  return mock.method(globalThis, 'fetch', async (_input: FetchArgs[0], _init?: FetchArgs[1]) => {
    const next = responses[Math.min(call, responses.length - 1)];
    call++;
    if (!next) throw new Error('no response configured');
    return next();
  });
}

function json(body: unknown, status = 200): () => Response {
  return () => new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function text(body: string, status: number): () => Response {
  return () => new Response(body, { status });
}

function requestOf(fetchMock: ReturnType<typeof mockFetch>, index = 0) {
  const args = fetchMock.mock.calls[index]?.arguments;
  const init = args?.[1];
  return {
    url: String(args?.[0]),
    headers: new Headers(init?.headers),
    body: JSON.parse(String(init?.body)),
  };
}

describe('Provider System', () => {
  afterEach(() => {
    mock.restoreAll();
  });

  describe('getProviderInfo', () => {
    it('names each provider and its default model', () => {
      assert.deepStrictEqual(getProviderInfo('openai'), { name: 'OpenAI', model: 'gpt-4o-mini' });
      assert.deepStrictEqual(getProviderInfo('azure'), { name: 'Azure OpenAI', model: 'gpt-4o-mini' });
      assert.deepStrictEqual(getProviderInfo('anthropic'), { name: 'Anthropic', model: 'claude-3-5-haiku-latest' });
    });
  });

  describe('openai', () => {
    const config = evalConfigSchema.parse({ provider: 'openai', openaiApiKey: 'test-key' });

    it('posts chat messages and reads the completion', async () => {
      const fetchMock = mockFetch(json({
        choices: [{ message: { content: ' {"a":1} ' } }],
        usage: { prompt_tokens: 10, completion_tokens: 5 },
      }));

      const reply = await createChat(config)('score this', { systemPrompt: 'be strict' });
      assert.deepStrictEqual(reply, {
        content: '{"a":1}',
        provider: 'openai',
        model: 'gpt-4o-mini',
        inputTokens: 10,
        outputTokens: 5,
      });

      const request = requestOf(fetchMock);
      assert.strictEqual(request.url, 'https://api.openai.com/v1/chat/completions');
      assert.strictEqual(request.headers.get('authorization'), 'Bearer test-key');
      assert.deepStrictEqual(request.body.messages, [
        { role: 'system', content: 'be strict' },
        { role: 'user', content: 'score this' },
      ]);
      assert.strictEqual(request.body.temperature, 0.1);
    });

    it('retries after a rate limit', async () => {
      const fetchMock = mockFetch(
        text('slow down', 429),
        json({ choices: [{ message: { content: 'ok' } }] })
      );

      const reply = await createChat(config)('hi', { backoffMs: 1 });
      assert.strictEqual(reply.content, 'ok');
      assert.strictEqual(fetchMock.mock.callCount(), 2);
    });

    it('fails immediately on other errors', async () => {
      const fetchMock = mockFetch(text('boom', 500));

      await assert.rejects(
        createChat(config)('hi', { backoffMs: 1 }),
        (error: unknown) =>
          error instanceof ProviderError && error.status === 500 && error.message === 'openai API error (500): boom'
      );
      assert.strictEqual(fetchMock.mock.callCount(), 1);
    });

    it('refuses to call without a key', async () => {
      const fetchMock = mockFetch(json({}));
      await assert.rejects(
        createChat(evalConfigSchema.parse({ provider: 'openai' }))('hi'),
        { message: 'No API key configured for openai. Set OPENAI_API_KEY.' }
      );
      assert.strictEqual(fetchMock.mock.callCount(), 0);
    });
  });

  describe('azure', () => {
    it('targets the deployment with an api-key header', async () => {
      const fetchMock = mockFetch(json({ choices: [{ message: { content: 'ok' } }] }));
      const config = evalConfigSchema.parse({
        provider: 'azure',
        azureApiKey: 'test-key',
        azureEndpoint: 'https://example.openai.azure.com',
        azureDeployment: 'qa-judge',
      });

      const reply = await createChat(config)('hi');
      assert.strictEqual(reply.model, 'qa-judge');

      const request = requestOf(fetchMock);
      assert.strictEqual(
        request.url,
        'https://example.openai.azure.com/openai/deployments/qa-judge/chat/completions?api-version=2024-10-21'
      );
      assert.strictEqual(request.headers.get('api-key'), 'test-key');
      assert.strictEqual(request.body.model, undefined);
    });

    it('needs an endpoint', async () => {
      mockFetch(json({}));
      const config = evalConfigSchema.parse({ provider: 'azure', azureApiKey: 'test-key' });
      await assert.rejects(createChat(config)('hi'), { message: 'Azure provider needs AZURE_OPENAI_ENDPOINT' });
    });
  });

  describe('anthropic', () => {
    const config = evalConfigSchema.parse({ provider: 'anthropic', anthropicApiKey: 'test-key' });

    it('sends the system prompt separately and reads text blocks', async () => {
      const fetchMock = mockFetch(json({
        content: [{ type: 'text', text: ' hello ' }],
        usage: { input_tokens: 3, output_tokens: 1 },
      }));

      const reply = await createChat(config)('hi', { systemPrompt: 'be strict' });
      assert.strictEqual(reply.content, 'hello');
      assert.strictEqual(reply.outputTokens, 1);

      const request = requestOf(fetchMock);
      assert.strictEqual(request.url, 'https://api.anthropic.com/v1/messages');
      assert.strictEqual(request.headers.get('x-api-key'), 'test-key');
      assert.strictEqual(request.headers.get('anthropic-version'), '2023-06-01');
      assert.strictEqual(request.body.system, 'be strict');
      assert.deepStrictEqual(request.body.messages, [{ role: 'user', content: 'hi' }]);
    });

    it('gives up after the last retry when overloaded', async () => {
      const fetchMock = mockFetch(text('overloaded', 529));

      await assert.rejects(
        createChat(config)('hi', { maxRetries: 2, backoffMs: 1 }),
        { message: 'Anthropic API overloaded. Try again in a few seconds.' }
      );
      assert.strictEqual(fetchMock.mock.callCount(), 2);
    });
  });
});
