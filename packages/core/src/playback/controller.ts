import { randomUUID } from 'crypto';
import { rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { toErrorMessage } from '../errors';
import { createLogger, type Logger } from '../logging/logger';
import { delay } from '../util/serialQueue';

export interface PlaybackHandle {
  isPlaying(): boolean;
  stop(): Promise<void>;
}

export interface AudioPlayer {
  start(filePath: string, options?: { volume?: number }): Promise<PlaybackHandle>;
}

export type PlaybackOutcome =
  | { status: 'completed' }
  | { status: 'cancelled' }
  | { status: 'failed'; message: string };

export interface PlaybackControllerDeps {
  player: AudioPlayer;
  tempDir: string;
  pollIntervalMs?: number;
  volume?: () => number;
  logger?: Logger;
}

export interface PlaybackController {
  /** Supersedes whatever is playing. Resolves when this playback ends for any reason. */
  play(audio: Uint8Array, signal?: AbortSignal): Promise<PlaybackOutcome>;
  stop(): Promise<void>;
  isPlaying(): boolean;
}

interface ActivePlayback {
  controller: AbortController;
  handle: PlaybackHandle | null;
  done: Promise<PlaybackOutcome>;
}

export const createPlaybackController = (deps: PlaybackControllerDeps): PlaybackController => {
  const logger = deps.logger ?? createLogger('playback');
  const pollIntervalMs = deps.pollIntervalMs ?? 50;
  let active: ActivePlayback | null = null;

  const supersede = async (previous: ActivePlayback) => {
    previous.controller.abort();
    await previous.handle?.stop().catch((error: unknown) => {
      logger.warn('Failed to stop previous playback', toErrorMessage(error));
    });
    await previous.done;
  };

  const stopActive = async () => {
    if (active) await supersede(active);
  };

  const run = async (
    entry: ActivePlayback,
    audio: Uint8Array,
    signal: AbortSignal | undefined
  ): Promise<PlaybackOutcome> => {
    const filePath = join(deps.tempDir, `chordcast-play-${randomUUID()}.wav`);
    const cancelled = () => entry.controller.signal.aborted || Boolean(signal?.aborted);
    try {
      await writeFile(filePath, audio);
      if (cancelled()) return { status: 'cancelled' };
      const handle = await deps.player.start(filePath, { volume: deps.volume?.() });
      entry.handle = handle;
      while (handle.isPlaying()) {
        if (cancelled()) {
          await handle.stop();
          return { status: 'cancelled' };
        }
        await delay(pollIntervalMs);
      }
      return cancelled() ? { status: 'cancelled' } : { status: 'completed' };
    } catch (error) {
      const message = toErrorMessage(error);
      logger.warn('Playback failed', message);
      return { status: 'failed', message };
    } finally {
      if (entry.handle?.isPlaying()) {
        await entry.handle.stop().catch((error: unknown) => {
          logger.warn('Failed to stop player', toErrorMessage(error));
        });
      }
      await rm(filePath, { force: true }).catch((error: unknown) => {
        logger.warn('Failed to remove playback file', toErrorMessage(error));
      });
      if (active === entry) active = null;
    }
  };

  const play = (audio: Uint8Array, signal?: AbortSignal) => {
    const previous = active;
    const entry: ActivePlayback = {
      controller: new AbortController(),
      handle: null,
      done: Promise.resolve<PlaybackOutcome>({ status: 'cancelled' }),
    };
    // Claimed synchronously so that a concurrent play() sees this one as current.
    active = entry;
    entry.done = (async () => {
      if (previous) await supersede(previous);
      if (entry.controller.signal.aborted) return { status: 'cancelled' } as const;
      return run(entry, audio, signal);
    })();
    return entry.done;
  };

  return {
    play,
    stop: stopActive,
    isPlaying: () => Boolean(active?.handle?.isPlaying()),
  };
};
