import type { Settings } from '../domain/schemas';
import type { LlmClient, LlmTarget } from './types';

export const resolveLlmTarget = (settings: Settings): LlmTarget => {
  if (settings.llmProvider === 'ollama') {
    const { model, systemPrompt } = settings.ollama;
    return { provider: 'ollama', model, systemPrompt };
  }
  const { model, systemPrompt } = settings.openRouter;
  return { provider: 'openRouter', model, systemPrompt };
};

export const resolveVisionTarget = (settings: Settings): LlmTarget => {
  const base = resolveLlmTarget(settings);
  return {
    provider: base.provider,
    model: settings.vision.model || base.model,
    systemPrompt: settings.vision.systemPrompt,
  };
};

/** Routes each call to the provider currently selected in settings. */
export const createLlmRouter = (deps: {
  settings: () => Settings;
  openRouter: LlmClient;
  ollama: LlmClient;
}): LlmClient => {
  const pick = () => (deps.settings().llmProvider === 'ollama' ? deps.ollama : deps.openRouter);
  return {
    completePrompt: (text, systemPrompt, model) => pick().completePrompt(text, systemPrompt, model),
    completeVisionPrompt: (text, image, systemPrompt, model) =>
      pick().completeVisionPrompt(text, image, systemPrompt, model),
  };
};
