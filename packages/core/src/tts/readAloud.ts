import type { Settings } from '../domain/schemas';
import { toErrorMessage } from '../errors';
import { createLogger, type Logger } from '../logging/logger';
import type { PlaybackController } from '../playback/controller';
import type { SpeechEngine } from './types';

export type ReadAloudOutcome =
  | { status: 'played'; characters: number; truncated: boolean; engine?: string }
  | { status: 'skipped'; reason: 'disabled' | 'emptyClipboard' }
  | { status: 'cancelled' }
  | { status: 'failed'; message: string };

export interface ReadAloudDeps {
  settings: () => Settings;
  clipboard: { get(): Promise<string> };
  engine: SpeechEngine;
  playback: Pick<PlaybackController, 'play' | 'stop'>;
  logger?: Logger;
}

export interface ReadAloudController {
  /** Reads the clipboard aloud. A newer call cancels this one. */
  speakClipboard(): Promise<ReadAloudOutcome>;
  speak(text: string): Promise<ReadAloudOutcome>;
  cancel(): Promise<void>;
}

export const truncateForSpeech = (text: string, maxLength: number) =>
  text.length > maxLength ? text.slice(0, maxLength) : text;

export const createReadAloudController = (deps: ReadAloudDeps): ReadAloudController => {
  const logger = deps.logger ?? createLogger('read-aloud');
  let current: AbortController | null = null;

  // Check-and-set runs without an intervening await, so two requests cannot both become current.
  const claim = () => {
    current?.abort();
    const controller = new AbortController();
    current = controller;
    return controller;
  };

  const release = (controller: AbortController) => {
    if (current === controller) current = null;
  };

  const run = async (
    controller: AbortController,
    readText: () => Promise<string>
  ): Promise<ReadAloudOutcome> => {
    const { signal } = controller;
    try {
      await deps.playback.stop();
      const tts = deps.settings().tts;
      if (!tts.enabled) return { status: 'skipped', reason: 'disabled' };
      const text = await readText();
      if (signal.aborted) return { status: 'cancelled' };
      if (!text.trim()) return { status: 'skipped', reason: 'emptyClipboard' };

      const spoken = truncateForSpeech(text, tts.maxTextLength);
      const truncated = spoken.length < text.length;
      if (truncated) {
        logger.info(`Text truncated from ${text.length} to ${spoken.length} characters`);
      }
      const result = await deps.engine.generate({
        text: spoken,
        voice: tts.voice,
        speed: tts.speed,
      });
      if (signal.aborted) return { status: 'cancelled' };
      if (!result.success || !result.audioBytes) {
        return { status: 'failed', message: result.errorMessage ?? 'Speech generation failed' };
      }
      const playback = await deps.playback.play(result.audioBytes, signal);
      if (playback.status === 'cancelled') return { status: 'cancelled' };
      if (playback.status === 'failed') return { status: 'failed', message: playback.message };
      return { status: 'played', characters: spoken.length, truncated, engine: result.engine };
    } catch (error) {
      return { status: 'failed', message: toErrorMessage(error) };
    } finally {
      release(controller);
    }
  };

  return {
    speakClipboard: () => run(claim(), () => deps.clipboard.get()),
    speak: (text) => run(claim(), async () => text),
    cancel: async () => {
      current?.abort();
      current = null;
      await deps.playback.stop();
    },
  };
};
