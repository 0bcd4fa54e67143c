import { z } from 'zod';
import type { Settings } from '../domain/schemas';
import { ChordcastError, toErrorMessage } from '../errors';
import { toBase64, type LlmClient } from './types';

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }).optional(),
      })
    )
    .default([]),
});

type ContentPart =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string } };

type ChatMessage = { role: 'system' | 'user'; content: string | ContentPart[] };

export interface OpenRouterClientOptions {
  fetcher: typeof fetch;
  config: () => Settings['openRouter'];
  appTitle?: string;
  requestTimeoutMs?: number;
}

export const createOpenRouterClient = (options: OpenRouterClientOptions): LlmClient => {
  const requestTimeoutMs = options.requestTimeoutMs ?? 60_000;

  const complete = async (messages: ChatMessage[], model: string) => {
    const config = options.config();
    if (!config.apiKey) {
      throw new ChordcastError('llmNotConfigured', 'OpenRouter API key is not configured');
    }
    if (!model) {
      throw new ChordcastError('llmNotConfigured', 'No OpenRouter model selected');
    }
    let response: Response;
    try {
      response = await options.fetcher(`${config.baseUrl.replace(/\/+$/, '')}/chat/completions`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${config.apiKey}`,
          'Content-Type': 'application/json',
          'X-Title': options.appTitle ?? 'Chordcast',
        },
        body: JSON.stringify({
          model,
          messages,
          temperature: config.temperature,
          max_tokens: config.maxTokens,
          stream: false,
        }),
        signal: AbortSignal.timeout(requestTimeoutMs),
      });
    } catch (error) {
      throw new ChordcastError('llmFailed', `OpenRouter request failed: ${toErrorMessage(error)}`, {
        cause: error,
      });
    }
    if (!response.ok) {
      const details = await response.text().catch(() => '');
      throw new ChordcastError(
        'llmFailed',
        `OpenRouter request failed: ${response.status} ${details}`.trim()
      );
    }
    const parsed = ChatCompletionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ChordcastError('llmFailed', 'OpenRouter returned an unexpected response');
    }
    const content = parsed.data.choices[0]?.message?.content?.trim();
    if (!content) {
      throw new ChordcastError('emptyResponse', 'OpenRouter returned an empty response');
    }
    return content;
  };

  return {
    completePrompt: (text, systemPrompt, model) =>
      complete(
        [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: text },
        ],
        model
      ),
    completeVisionPrompt: (text, image, systemPrompt, model) =>
      complete(
        [
          { role: 'system', content: systemPrompt },
          {
            role: 'user',
            content: [
              { type: 'text', text },
              { type: 'image_url', image_url: { url: `data:image/png;base64,${toBase64(image)}` } },
            ],
          },
        ],
        model
      ),
  };
};
