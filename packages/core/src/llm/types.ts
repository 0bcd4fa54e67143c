export interface LlmClient {
  completePrompt(text: string, systemPrompt: string, model: string): Promise<string>;
  /** `image` is PNG bytes. */
  completeVisionPrompt(
    text: string,
    image: Uint8Array,
    systemPrompt: string,
    model: string
  ): Promise<string>;
}

export interface LlmTarget {
  provider: 'openRouter' | 'ollama';
  model: string;
  systemPrompt: string;
}

export const toBase64 = (bytes: Uint8Array) => Buffer.from(bytes).toString('base64');
