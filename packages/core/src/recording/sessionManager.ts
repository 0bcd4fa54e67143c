import { randomUUID } from 'crypto';
import { rm, stat } from 'fs/promises';
import { join } from 'path';
import type { PipelineMode, Settings } from '../domain/schemas';
import { toErrorMessage } from '../errors';
import type { RecordingFailureReason } from '../events';
import { createLogger, type Logger } from '../logging/logger';
import { createSerialQueue, delay } from '../util/serialQueue';

/** Modes that act immediately on the chord press and record no audio. */
export const INSTANT_MODES: ReadonlySet<PipelineMode> = new Set<PipelineMode>([
  'visionCapture',
  'clipboardTts',
]);

export interface RecordingSession {
  id: string;
  mode: PipelineMode;
  startedAt: number;
  endedAt?: number;
  /** Null for instant modes. */
  audioPath: string | null;
  audioBytes?: number;
  /** Clipboard text read before capture started (clipboardPromptLlm only). */
  clipboardSnapshot?: string;
  signal: AbortSignal;
}

export interface RecordingFailure {
  sessionId: string;
  mode: PipelineMode;
  reason: RecordingFailureReason;
  message: string;
}

export interface RecordingSessionDeps {
  audio: {
    start(filePath: string, options?: { sampleRate?: number }): Promise<void>;
    stop(): Promise<void>;
  };
  clipboard: { get(): Promise<string> };
  dispatch: (session: RecordingSession) => Promise<unknown>;
  settings: () => Settings;
  tempDir: string;
  now?: () => number;
  createId?: () => string;
  logger?: Logger;
}

export interface RecordingSessionHooks {
  onSessionStarted?: (session: RecordingSession) => void;
  onRecordingFailure?: (failure: RecordingFailure) => void;
}

export interface RecordingSessionManager {
  handleModeStart(mode: PipelineMode): void;
  handleModeEnd(mode: PipelineMode): void;
  current(): RecordingSession | null;
  /** Resolves when queued transitions and background pipeline runs have settled. */
  whenIdle(): Promise<void>;
  dispose(): Promise<void>;
}

export const createRecordingSessionManager = (
  deps: RecordingSessionDeps,
  hooks: RecordingSessionHooks = {}
): RecordingSessionManager => {
  const logger = deps.logger ?? createLogger('recording');
  const now = deps.now ?? Date.now;
  const createId = deps.createId ?? randomUUID;
  const queue = createSerialQueue();
  const pending = new Set<Promise<void>>();
  const controllers = new Map<string, AbortController>();
  let current: RecordingSession | null = null;
  let disposed = false;

  const track = (work: Promise<void>) => {
    pending.add(work);
    void work.finally(() => pending.delete(work));
  };

  const removeAudio = async (filePath: string | null) => {
    if (!filePath) return;
    try {
      await rm(filePath, { force: true });
    } catch (error) {
      logger.warn('Failed to remove audio file', filePath, toErrorMessage(error));
    }
  };

  const fail = (session: RecordingSession, reason: RecordingFailureReason, message: string) => {
    logger.warn(`Recording failed (${session.mode}, ${reason}): ${message}`);
    hooks.onRecordingFailure?.({ sessionId: session.id, mode: session.mode, reason, message });
  };

  const launch = (session: RecordingSession) => {
    track(
      (async () => {
        try {
          await deps.dispatch(session);
        } catch (error) {
          logger.error('Pipeline dispatch threw', toErrorMessage(error));
        } finally {
          controllers.delete(session.id);
        }
      })()
    );
  };

  const readClipboard = async () => {
    try {
      return await deps.clipboard.get();
    } catch (error) {
      logger.warn('Clipboard read failed before recording', toErrorMessage(error));
      return '';
    }
  };

  const startSession = async (mode: PipelineMode) => {
    if (disposed) return;
    if (current) {
      logger.info(`Ignoring ${mode}: ${current.mode} session is active`);
      return;
    }
    const controller = new AbortController();
    const id = createId();
    controllers.set(id, controller);
    const session: RecordingSession = {
      id,
      mode,
      startedAt: now(),
      audioPath: null,
      signal: controller.signal,
    };
    if (mode === 'clipboardPromptLlm') {
      session.clipboardSnapshot = await readClipboard();
    }
    if (INSTANT_MODES.has(mode)) {
      launch(session);
      return;
    }
    session.audioPath = join(deps.tempDir, `chordcast-${id}.wav`);
    current = session;
    try {
      const { sampleRate } = deps.settings().recording;
      await deps.audio.start(session.audioPath, { sampleRate });
      logger.info(`Recording started (${mode})`);
      hooks.onSessionStarted?.(session);
    } catch (error) {
      current = null;
      controllers.delete(id);
      fail(session, 'captureFailed', `Audio capture could not start: ${toErrorMessage(error)}`);
      await removeAudio(session.audioPath);
    }
  };

  const finalize = async (session: RecordingSession) => {
    const { settleDelayMs, minAudioBytes } = deps.settings().recording;
    if (settleDelayMs > 0) await delay(settleDelayMs);
    if (session.signal.aborted) {
      controllers.delete(session.id);
      await removeAudio(session.audioPath);
      return;
    }
    const audioBytes = session.audioPath ? await fileSize(session.audioPath) : null;
    if (audioBytes === null) {
      controllers.delete(session.id);
      fail(session, 'fileMissing', 'Recording produced no audio file');
      return;
    }
    if (audioBytes <= minAudioBytes) {
      controllers.delete(session.id);
      fail(session, 'tooShort', 'No audio detected');
      await removeAudio(session.audioPath);
      return;
    }
    launch({ ...session, endedAt: now(), audioBytes });
  };

  const endSession = async (mode: PipelineMode) => {
    const session = current;
    if (!session || session.mode !== mode) return;
    current = null;
    try {
      await deps.audio.stop();
      logger.info(`Recording stopped (${mode})`);
    } catch (error) {
      controllers.delete(session.id);
      fail(session, 'captureFailed', `Audio capture could not stop: ${toErrorMessage(error)}`);
      await removeAudio(session.audioPath);
      return;
    }
    track(finalize(session));
  };

  const enqueue = (task: () => Promise<void>) => {
    track(
      queue.run(task).catch((error: unknown) => {
        logger.error('Recording transition failed', toErrorMessage(error));
      })
    );
  };

  const whenIdle = async () => {
    await queue.idle();
    while (pending.size) {
      await Promise.all([...pending]);
    }
  };

  const dispose = async () => {
    disposed = true;
    controllers.forEach((controller) => controller.abort());
    const session = current;
    if (session) {
      current = null;
      await deps.audio.stop().catch((error: unknown) => {
        logger.warn('Audio capture stop on dispose failed', toErrorMessage(error));
      });
      await removeAudio(session.audioPath);
    }
    await whenIdle();
  };

  return {
    handleModeStart: (mode) => enqueue(() => startSession(mode)),
    handleModeEnd: (mode) => enqueue(() => endSession(mode)),
    current: () => current,
    whenIdle,
    dispose,
  };
};

const fileSize = async (filePath: string) => {
  try {
    const info = await stat(filePath);
    return info.isFile() ? info.size : null;
  } catch {
    return null;
  }
};
