import { toErrorMessage } from '../errors';
import { createLogger, type Logger } from '../logging/logger';
import { failedResult, type SpeechEngine, type TtsRequest, type TtsResult } from './types';

export interface FallbackChainDeps {
  primary: SpeechEngine;
  /** Omitted when the native fallback is disabled. */
  secondary?: SpeechEngine;
  logger?: Logger;
}

/**
 * Tries the primary engine when it reports available, then the secondary.
 * `generate` never rejects.
 */
export const createSpeechFallbackChain = (deps: FallbackChainDeps): SpeechEngine => {
  const logger = deps.logger ?? createLogger('tts');
  const engines = deps.secondary ? [deps.primary, deps.secondary] : [deps.primary];

  const attempt = async (engine: SpeechEngine, request: TtsRequest): Promise<TtsResult> => {
    const startedAt = Date.now();
    try {
      if (!(await engine.isAvailable())) return failedResult('unavailable', startedAt, engine.name);
      const result = await engine.generate(request);
      if (result.success && !result.audioBytes?.length) {
        return failedResult('produced no audio', startedAt, engine.name);
      }
      return result;
    } catch (error) {
      return failedResult(toErrorMessage(error), startedAt, engine.name);
    }
  };

  const generate = async (request: TtsRequest): Promise<TtsResult> => {
    const startedAt = Date.now();
    const failures: string[] = [];
    for (const engine of engines) {
      const result = await attempt(engine, request);
      if (result.success) {
        if (failures.length) {
          logger.info(`Speech generated by ${engine.name} after: ${failures.join('; ')}`);
        }
        return { ...result, engine: engine.name };
      }
      failures.push(`${engine.name}: ${result.errorMessage ?? 'unknown error'}`);
      logger.warn(`Speech engine ${engine.name} failed: ${result.errorMessage ?? 'unknown error'}`);
    }
    return failedResult(`All speech engines failed. ${failures.join('; ')}`, startedAt);
  };

  const isAvailable = async () => {
    for (const engine of engines) {
      if (await engine.isAvailable().catch(() => false)) return true;
    }
    return false;
  };

  const listVoices = async () => {
    const lists = await Promise.all(engines.map((engine) => engine.listVoices().catch(() => [])));
    return lists.flat();
  };

  return { name: 'fallback', isAvailable, generate, listVoices };
};
