import { z } from 'zod';
import type { Settings } from '../domain/schemas';
import { ChordcastError, toErrorMessage } from '../errors';
import { toBase64, type LlmClient } from './types';

const GenerateResponseSchema = z.object({ response: z.string().default('') });

const TagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() })).default([]),
});

export interface OllamaClientOptions {
  fetcher: typeof fetch;
  config: () => Settings['ollama'];
  requestTimeoutMs?: number;
}

export interface OllamaClient extends LlmClient {
  listModels(): Promise<string[]>;
}

export const createOllamaClient = (options: OllamaClientOptions): OllamaClient => {
  const requestTimeoutMs = options.requestTimeoutMs ?? 120_000;
  const baseUrl = () => options.config().serverUrl.replace(/\/+$/, '');

  const generate = async (
    prompt: string,
    systemPrompt: string,
    model: string,
    images?: string[]
  ) => {
    const config = options.config();
    if (!model) {
      throw new ChordcastError('llmNotConfigured', 'No Ollama model selected');
    }
    let response: Response;
    try {
      response = await options.fetcher(`${baseUrl()}/api/generate`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model,
          prompt,
          system: systemPrompt,
          stream: false,
          options: { temperature: config.temperature, num_predict: config.maxTokens },
          ...(images ? { images } : {}),
        }),
        signal: AbortSignal.timeout(requestTimeoutMs),
      });
    } catch (error) {
      throw new ChordcastError('llmFailed', `Ollama request failed: ${toErrorMessage(error)}`, {
        cause: error,
      });
    }
    if (!response.ok) {
      throw new ChordcastError('llmFailed', `Ollama request failed: ${response.status}`);
    }
    const parsed = GenerateResponseSchema.safeParse(await response.json());
    const text = parsed.success ? parsed.data.response.trim() : '';
    if (!text) throw new ChordcastError('emptyResponse', 'Ollama returned an empty response');
    return text;
  };

  const listModels = async () => {
    const response = await options.fetcher(`${baseUrl()}/api/tags`, {
      signal: AbortSignal.timeout(10_000),
    });
    if (!response.ok) {
      throw new ChordcastError('llmFailed', `Ollama tags request failed: ${response.status}`);
    }
    const parsed = TagsResponseSchema.safeParse(await response.json());
    return parsed.success ? parsed.data.models.map((model) => model.name) : [];
  };

  return {
    completePrompt: (text, systemPrompt, model) => generate(text, systemPrompt, model),
    completeVisionPrompt: (text, image, systemPrompt, model) =>
      generate(text, systemPrompt, model, [toBase64(image)]),
    listModels,
  };
};
