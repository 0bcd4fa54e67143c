import { randomUUID } from 'crypto';
import { readFile, rm, stat } from 'fs/promises';
import { join } from 'path';
import { toErrorMessage } from '../errors';
import { createLogger, type Logger } from '../logging/logger';
import type { CapabilityProvider, VoiceDescriptor } from '../process/capabilityManager';
import { cachedAvailability, failedResult, type SpeechEngine, type TtsRequest } from './types';

export const NEURAL_MAX_TEXT_LENGTH = 10_000;

export const BUILT_IN_VOICES: VoiceDescriptor[] = [2, 3, 4, 5].flatMap((n) => [
  { id: `expr-voice-${n}-m`, description: `Expressive voice ${n} (male)` },
  { id: `expr-voice-${n}-f`, description: `Expressive voice ${n} (female)` },
]);

export interface NeuralEngineDeps {
  capabilities: CapabilityProvider & {
    isAvailable(): Promise<boolean>;
    listVoices(): Promise<VoiceDescriptor[]>;
  };
  tempDir: string;
  timeoutMs?: number;
  logger?: Logger;
}

/** Synthesis through the external bridge program. */
export const createNeuralSpeechEngine = (deps: NeuralEngineDeps): SpeechEngine => {
  const logger = deps.logger ?? createLogger('tts-neural');
  const name = 'neural';
  const isAvailable = cachedAvailability(() => deps.capabilities.isAvailable());

  const generate = async (request: TtsRequest) => {
    const startedAt = Date.now();
    if (!request.text.trim()) return failedResult('Text cannot be empty', startedAt, name);
    if (!(await isAvailable())) {
      return failedResult('Neural speech engine is not available', startedAt, name);
    }

    const text =
      request.text.length > NEURAL_MAX_TEXT_LENGTH
        ? request.text.slice(0, NEURAL_MAX_TEXT_LENGTH)
        : request.text;
    const outputPath = join(deps.tempDir, `chordcast-tts-${randomUUID()}.wav`);
    try {
      const result = await deps.capabilities.invoke(
        [
          '--text',
          JSON.stringify(text),
          '--voice',
          request.voice,
          '--speed',
          request.speed.toFixed(1),
          '--output',
          outputPath,
        ],
        deps.timeoutMs
      );
      if (!result.success) {
        const reason = result.stderr.trim() || `Bridge exited with code ${result.exitCode}`;
        return failedResult(reason, startedAt, name);
      }
      const size = await stat(outputPath).then(
        (info) => info.size,
        () => 0
      );
      if (size === 0) return failedResult('Bridge produced no audio', startedAt, name);
      const audioBytes = new Uint8Array(await readFile(outputPath));
      logger.debug(`Generated ${audioBytes.length} bytes in ${Date.now() - startedAt}ms`);
      return { success: true, audioBytes, elapsedMs: Date.now() - startedAt, engine: name };
    } catch (error) {
      return failedResult(toErrorMessage(error), startedAt, name);
    } finally {
      await rm(outputPath, { force: true }).catch((error: unknown) => {
        logger.warn('Failed to remove synthesis output', toErrorMessage(error));
      });
    }
  };

  const listVoices = async () => {
    if (!(await isAvailable())) return BUILT_IN_VOICES;
    const voices = await deps.capabilities.listVoices();
    return voices.length ? voices : BUILT_IN_VOICES;
  };

  return { name, isAvailable, generate, listVoices };
};
