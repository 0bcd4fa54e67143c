import { randomUUID } from 'crypto';
import { rm } from 'fs/promises';
import type { HistoryItem, PipelineMode, Settings } from '../domain/schemas';
import {
  ChordcastError,
  isChordcastError,
  redactSecrets,
  toErrorMessage,
  type ErrorCode,
} from '../errors';
import type { ChordcastEvent } from '../events';
import { resolveLlmTarget, resolveVisionTarget } from '../llm/router';
import type { LlmClient } from '../llm/types';
import { createLogger, type Logger } from '../logging/logger';
import type { Notifier, NotificationKind } from '../notifications/audioNotifier';
import { cleanTranscript } from '../pipeline/cleanup';
import type { RecordingSession } from '../recording/sessionManager';
import type { HistoryRepository } from '../repositories/types';
import type { TranscriptionClient, TranscriptionResult } from '../transcription/types';
import type { ReadAloudController } from '../tts/readAloud';

export type PipelineEvent = Extract<
  ChordcastEvent,
  { type: 'pipelineCompleted' | 'pipelineFailed' }
>;

export type PipelineOutcome =
  | { status: 'completed'; text: string }
  | { status: 'failed'; code: ErrorCode; message: string }
  | { status: 'cancelled' };

export interface PipelineDispatcherDeps {
  settings: () => Settings;
  transcription: TranscriptionClient;
  llm: LlmClient;
  screenCapture: { captureRegion(): Promise<Uint8Array | null> };
  clipboard: { get(): Promise<string>; set(text: string): Promise<void> };
  readAloud: Pick<ReadAloudController, 'speakClipboard'>;
  notifier?: Notifier;
  history?: HistoryRepository;
  now?: () => number;
  createId?: () => string;
  logger?: Logger;
}

export interface PipelineDispatcherHooks {
  onEvent?: (event: PipelineEvent) => void;
}

export interface PipelineDispatcher {
  /** Runs the session's pipeline to the end. Never rejects. */
  dispatch(session: RecordingSession): Promise<PipelineOutcome>;
}

/** The prompt sent for clipboard-augmented speech. */
export const combinePrompt = (transcript: string, clipboardText: string) =>
  clipboardText.trim() ? `${transcript}, ${clipboardText}` : transcript;

interface RunRecord {
  text: string;
  transcript?: TranscriptionResult;
  rawText?: string;
  clipboardText?: string;
  modelId?: string;
  notify?: NotificationKind;
}

class PipelineCancelled extends Error {}

/** Wraps a collaborator call so that any failure surfaces with the step's error code. */
const step = async <T>(code: ErrorCode, work: () => Promise<T>): Promise<T> => {
  try {
    return await work();
  } catch (error) {
    if (isChordcastError(error)) throw error;
    throw new ChordcastError(code, toErrorMessage(error), { cause: error });
  }
};

export const createPipelineDispatcher = (
  deps: PipelineDispatcherDeps,
  hooks: PipelineDispatcherHooks = {}
): PipelineDispatcher => {
  const logger = deps.logger ?? createLogger('dispatch');
  const now = deps.now ?? Date.now;
  const createId = deps.createId ?? randomUUID;

  const ensureActive = (session: RecordingSession) => {
    if (session.signal.aborted) throw new PipelineCancelled();
  };

  const transcribe = async (session: RecordingSession, settings: Settings) => {
    const audioPath = session.audioPath;
    if (!audioPath) throw new ChordcastError('recordingFailed', 'Session has no recorded audio');
    const result = await step('transcriptionFailed', () =>
      deps.transcription.transcribe(audioPath)
    );
    ensureActive(session);
    const text = cleanTranscript(result.fullText, settings);
    if (!text) throw new ChordcastError('noSpeechDetected', 'No speech detected');
    logger.info(`Transcribed ${text.length} characters (${result.language})`);
    return { result, text };
  };

  const captureScreen = async () => {
    const image = await step('screenCaptureFailed', () => deps.screenCapture.captureRegion());
    if (!image || image.length === 0) {
      throw new ChordcastError('screenCaptureCancelled', 'Screen capture was cancelled');
    }
    return image;
  };

  const writeClipboard = (text: string) => step('clipboardFailed', () => deps.clipboard.set(text));

  const runTextPrompt = async (session: RecordingSession, settings: Settings, prompt: string) => {
    const target = resolveLlmTarget(settings);
    const response = await step('llmFailed', () =>
      deps.llm.completePrompt(prompt, target.systemPrompt, target.model)
    );
    ensureActive(session);
    return { response, modelId: target.model };
  };

  const runVisionPrompt = async (
    session: RecordingSession,
    settings: Settings,
    text: string,
    image: Uint8Array
  ) => {
    const target = resolveVisionTarget(settings);
    const response = await step('llmFailed', () =>
      deps.llm.completeVisionPrompt(text, image, target.systemPrompt, target.model)
    );
    ensureActive(session);
    return { response, modelId: target.model };
  };

  type Handler = (session: RecordingSession, settings: Settings) => Promise<RunRecord>;

  const handlers: Record<PipelineMode, Handler> = {
    transcribe: async (session, settings) => {
      const { result, text } = await transcribe(session, settings);
      await writeClipboard(text);
      return {
        text,
        transcript: result,
        rawText: result.fullText,
        modelId: settings.transcription.model,
        notify: 'speechToText',
      };
    },
    promptLlm: async (session, settings) => {
      const { result, text } = await transcribe(session, settings);
      const { response, modelId } = await runTextPrompt(session, settings, text);
      await writeClipboard(response);
      return { text: response, transcript: result, rawText: text, modelId, notify: 'llmResponse' };
    },
    clipboardPromptLlm: async (session, settings) => {
      const clipboardText = session.clipboardSnapshot ?? '';
      const { result, text } = await transcribe(session, settings);
      const prompt = combinePrompt(text, clipboardText);
      const { response, modelId } = await runTextPrompt(session, settings, prompt);
      await writeClipboard(response);
      return {
        text: response,
        transcript: result,
        rawText: prompt,
        clipboardText,
        modelId,
        notify: 'llmResponse',
      };
    },
    visionCapture: async (session, settings) => {
      const image = await captureScreen();
      ensureActive(session);
      const { prompt } = settings.vision;
      const { response, modelId } = await runVisionPrompt(session, settings, prompt, image);
      await writeClipboard(response);
      return { text: response, rawText: prompt, modelId, notify: 'llmResponse' };
    },
    speechVision: async (session, settings) => {
      const { result, text } = await transcribe(session, settings);
      const image = await captureScreen();
      ensureActive(session);
      const { response, modelId } = await runVisionPrompt(session, settings, text, image);
      await writeClipboard(response);
      return { text: response, transcript: result, rawText: text, modelId, notify: 'llmResponse' };
    },
    clipboardTts: async () => {
      const outcome = await deps.readAloud.speakClipboard();
      switch (outcome.status) {
        case 'played':
          return { text: `Read aloud ${outcome.characters} characters` };
        case 'cancelled':
          throw new PipelineCancelled();
        case 'skipped':
          throw outcome.reason === 'emptyClipboard'
            ? new ChordcastError('clipboardFailed', 'Clipboard has no text to read')
            : new ChordcastError('speechFailed', 'Read aloud is disabled');
        case 'failed':
          throw new ChordcastError('speechFailed', outcome.message);
      }
    },
  };

  const writeHistory = async (item: HistoryItem) => {
    if (!deps.history) return;
    try {
      await deps.history.append(item);
    } catch (error) {
      logger.warn('Failed to write history entry', toErrorMessage(error));
    }
  };

  const notify = async (kind: NotificationKind | undefined) => {
    if (!kind || !deps.notifier) return;
    await deps.notifier.notify(kind);
  };

  const releaseAudio = async (session: RecordingSession, settings: Settings) => {
    if (!session.audioPath || settings.logging.saveAudioFiles) return;
    try {
      await rm(session.audioPath, { force: true });
    } catch (error) {
      logger.warn('Failed to delete recording', toErrorMessage(error));
    }
  };

  const dispatch = async (session: RecordingSession): Promise<PipelineOutcome> => {
    const settings = deps.settings();
    const startedAt = now();
    const keepHistory =
      settings.logging.enableTranscriptionLogging && session.mode !== 'clipboardTts';
    const baseItem = {
      id: createId(),
      createdAt: startedAt,
      mode: session.mode,
      audioFilePath: settings.logging.saveAudioFiles ? session.audioPath ?? undefined : undefined,
    };
    logger.info(`Pipeline ${session.mode} started (${session.id})`);
    try {
      ensureActive(session);
      const record = await handlers[session.mode](session, settings);
      const elapsedMs = now() - startedAt;
      logger.info(`Pipeline ${session.mode} completed in ${elapsedMs}ms`);
      hooks.onEvent?.({
        type: 'pipelineCompleted',
        sessionId: session.id,
        mode: session.mode,
        text: record.text,
        elapsedMs,
      });
      await notify(record.notify);
      if (keepHistory) {
        await writeHistory({
          ...baseItem,
          text: record.text,
          rawText: record.rawText,
          clipboardText: record.clipboardText,
          segments: record.transcript?.segments,
          language: record.transcript?.language,
          modelId: record.modelId,
          latencyMs: elapsedMs,
          status: 'success',
        });
      }
      return { status: 'completed', text: record.text };
    } catch (error) {
      if (error instanceof PipelineCancelled) {
        logger.info(`Pipeline ${session.mode} cancelled (${session.id})`);
        return { status: 'cancelled' };
      }
      // Failures outside a collaborator step are defects in the pipeline itself.
      const code: ErrorCode = isChordcastError(error) ? error.code : 'internalError';
      const message = redactSecrets(toErrorMessage(error));
      logger.error(`Pipeline ${session.mode} failed [${code}]: ${message}`);
      hooks.onEvent?.({
        type: 'pipelineFailed',
        sessionId: session.id,
        mode: session.mode,
        code,
        message,
      });
      if (keepHistory) {
        await writeHistory({
          ...baseItem,
          text: '',
          latencyMs: now() - startedAt,
          status: 'failed',
          errorCode: code,
          errorMessage: message,
        });
      }
      return { status: 'failed', code, message };
    } finally {
      await releaseAudio(session, settings);
    }
  };

  return { dispatch };
};
