import { describe, expect, it, vi } from 'vitest';
import {
  SettingsSchema,
  createLlmRouter,
  createOllamaClient,
  createOpenRouterClient,
  resolveLlmTarget,
  resolveVisionTarget,
  type LlmClient,
} from '@chordcast/core';

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });

const makeFetcher = (respond: () => Response) =>
  vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => respond());

const requestBody = (init: RequestInit | undefined): unknown => JSON.parse(String(init?.body));

describe('openrouter client', () => {
  const config = () => SettingsSchema.parse({ openRouter: { apiKey: 'test-secret' } }).openRouter;

  it('posts a chat completion and returns the trimmed content', async () => {
    const fetcher = makeFetcher(() => jsonResponse({
      choices: [{ message: { content: '  Bonjour  ' } }],
    }));
    const client = createOpenRouterClient({ fetcher, config });

    const text = await client.completePrompt(
      'translate to French, Hello',
      'be brief',
      'anthropic/claude-sonnet-4'
    );

    expect(text).toBe('Bonjour');
    const [url, init] = fetcher.mock.calls[0];
    expect(url).toBe('https://openrouter.ai/api/v1/chat/completions');
    expect(requestBody(init)).toEqual({
      model: 'anthropic/claude-sonnet-4',
      messages: [
        { role: 'system', content: 'be brief' },
        { role: 'user', content: 'translate to French, Hello' },
      ],
      temperature: 0.7,
      max_tokens: 1000,
      stream: false,
    });
  });

  it('sends images as data urls', async () => {
    const fetcher = makeFetcher(() => jsonResponse({
      choices: [{ message: { content: 'a cat' } }],
    }));
    const client = createOpenRouterClient({ fetcher, config });

    const image = new Uint8Array([1, 2, 3]);
    await client.completeVisionPrompt('what is this', image, 'sys', 'vision-model');

    expect(requestBody(fetcher.mock.calls[0][1])).toMatchObject({
      messages: [
        { role: 'system', content: 'sys' },
        {
          role: 'user',
          content: [
            { type: 'text', text: 'what is this' },
            { type: 'image_url', image_url: { url: 'data:image/png;base64,AQID' } },
          ],
        },
      ],
    });
  });

  it('fails as not configured without a key', async () => {
    const fetcher = makeFetcher(() => jsonResponse({}));
    const client = createOpenRouterClient({
      fetcher,
      config: () => SettingsSchema.parse({}).openRouter,
    });

    await expect(client.completePrompt('hi', 'sys', 'model')).rejects.toMatchObject({
      code: 'llmNotConfigured',
    });
    expect(fetcher).not.toHaveBeenCalled();
  });

  it('reports empty responses', async () => {
    const fetcher = makeFetcher(() => jsonResponse({ choices: [{ message: { content: '   ' } }] }));
    const client = createOpenRouterClient({ fetcher, config });

    await expect(client.completePrompt('hi', 'sys', 'model')).rejects.toMatchObject({
      code: 'emptyResponse',
    });
  });

  it('reports http failures with the status', async () => {
    const fetcher = makeFetcher(() => new Response('rate limited', { status: 429 }));
    const client = createOpenRouterClient({ fetcher, config });

    await expect(client.completePrompt('hi', 'sys', 'model')).rejects.toMatchObject({
      code: 'llmFailed',
      message: 'OpenRouter request failed: 429 rate limited',
    });
  });
});

describe('ollama client', () => {
  const config = () =>
    SettingsSchema.parse({ ollama: { model: 'llava', serverUrl: 'http://localhost:11434/' } })
      .ollama;

  it('posts to the generate endpoint with images as base64', async () => {
    const fetcher = makeFetcher(() => jsonResponse({ response: ' looks like a chart ' }));
    const client = createOllamaClient({ fetcher, config });

    const image = new Uint8Array([1, 2, 3]);
    const text = await client.completeVisionPrompt('describe', image, 'sys', 'llava');

    expect(text).toBe('looks like a chart');
    const [url, init] = fetcher.mock.calls[0];
    expect(url).toBe('http://localhost:11434/api/generate');
    expect(requestBody(init)).toEqual({
      model: 'llava',
      prompt: 'describe',
      system: 'sys',
      stream: false,
      options: { temperature: 0.7, num_predict: 1000 },
      images: ['AQID'],
    });
  });

  it('requires a model', async () => {
    const client = createOllamaClient({ fetcher: makeFetcher(() => jsonResponse({})), config });

    await expect(client.completePrompt('hi', 'sys', '')).rejects.toMatchObject({
      code: 'llmNotConfigured',
    });
  });

  it('lists installed models', async () => {
    const fetcher = makeFetcher(() => jsonResponse({
      models: [{ name: 'llama3' }, { name: 'llava' }],
    }));
    const client = createOllamaClient({ fetcher, config });

    await expect(client.listModels()).resolves.toEqual(['llama3', 'llava']);
    expect(fetcher.mock.calls[0][0]).toBe('http://localhost:11434/api/tags');
  });
});

describe('llm routing', () => {
  it('resolves the vision model override and system prompt', () => {
    const settings = SettingsSchema.parse({
      vision: { model: 'vision-model', systemPrompt: 'look closely' },
    });
    expect(resolveVisionTarget(settings)).toEqual({
      provider: 'openRouter',
      model: 'vision-model',
      systemPrompt: 'look closely',
    });
    expect(resolveLlmTarget(settings).model).toBe('anthropic/claude-sonnet-4');
  });

  it('routes to the provider selected in settings', async () => {
    let settings = SettingsSchema.parse({});
    const openRouter: LlmClient = {
      completePrompt: vi.fn(async () => 'from openrouter'),
      completeVisionPrompt: vi.fn(async () => 'vision openrouter'),
    };
    const ollama: LlmClient = {
      completePrompt: vi.fn(async () => 'from ollama'),
      completeVisionPrompt: vi.fn(async () => 'vision ollama'),
    };
    const router = createLlmRouter({ settings: () => settings, openRouter, ollama });

    await expect(router.completePrompt('hi', 'sys', 'm')).resolves.toBe('from openrouter');
    settings = SettingsSchema.parse({ llmProvider: 'ollama' });
    await expect(router.completePrompt('hi', 'sys', 'm')).resolves.toBe('from ollama');
  });
});
