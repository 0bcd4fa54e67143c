import { access } from 'fs/promises';
import type { Settings } from '../domain/schemas';
import { toErrorMessage } from '../errors';
import { createLogger, type Logger } from '../logging/logger';
import type { AudioPlayer } from '../playback/controller';

export type NotificationKind = 'speechToText' | 'llmResponse';

export interface Notifier {
  /** Never rejects. */
  notify(kind: NotificationKind): Promise<void>;
}

export const createAudioNotifier = (deps: {
  settings: () => Settings;
  player: AudioPlayer;
  logger?: Logger;
}): Notifier => {
  const logger = deps.logger ?? createLogger('notify');

  const notify = async (kind: NotificationKind) => {
    const config = deps.settings().audioNotification;
    if (!config.enabled || !config.filePath) return;
    if (kind === 'speechToText' && !config.playOnSpeechToText) return;
    if (kind === 'llmResponse' && !config.playOnLlmResponse) return;
    try {
      await access(config.filePath);
      await deps.player.start(config.filePath, { volume: config.volume });
    } catch (error) {
      logger.warn(`Notification sound failed (${kind})`, toErrorMessage(error));
    }
  };

  return { notify };
};
