import { toErrorMessage } from '../errors';
import { createLogger, type Logger } from '../logging/logger';
import { hashCredential, isUsableEntry, MODEL_CACHE_TTL_MS, type ModelCacheStore } from './cache';
import { parseModelList, type ModelListStrategy } from './schemaVariants';
import { DEFAULT_MODEL, MODEL_CACHE_FORMAT_VERSION, type ModelDescriptor } from './types';

export type ModelSource = 'cache' | 'network' | 'staleCache' | 'default';

export interface ModelListResult {
  models: ModelDescriptor[];
  source: ModelSource;
}

export interface ModelDiscoveryDeps {
  fetcher: typeof fetch;
  cache: ModelCacheStore;
  baseUrl?: string;
  ttlMs?: number;
  requestTimeoutMs?: number;
  strategies?: ModelListStrategy[];
  now?: () => number;
  logger?: Logger;
}

export interface ModelDiscovery {
  /** Never empty; network and parse failures degrade to cache, then to the default model. */
  getModels(
    credential: string | null | undefined,
    forceRefresh?: boolean
  ): Promise<ModelListResult>;
  invalidate(credential: string | null | undefined): Promise<void>;
}

class ModelFetchError extends Error {}

export const createModelDiscovery = (deps: ModelDiscoveryDeps): ModelDiscovery => {
  const logger = deps.logger ?? createLogger('models');
  const now = deps.now ?? Date.now;
  const baseUrl = (deps.baseUrl ?? 'https://openrouter.ai/api/v1').replace(/\/+$/, '');
  const ttlMs = deps.ttlMs ?? MODEL_CACHE_TTL_MS;
  const requestTimeoutMs = deps.requestTimeoutMs ?? 30_000;

  const readCache = async (hash: string) => {
    try {
      return await deps.cache.read(hash);
    } catch (error) {
      logger.warn('Model cache read failed', toErrorMessage(error));
      return null;
    }
  };

  const fetchModels = async (credential: string) => {
    let response: Response;
    try {
      response = await deps.fetcher(`${baseUrl}/models`, {
        method: 'GET',
        headers: { Authorization: `Bearer ${credential}`, Accept: 'application/json' },
        signal: AbortSignal.timeout(requestTimeoutMs),
      });
    } catch (error) {
      throw new ModelFetchError(`Model list request failed: ${toErrorMessage(error)}`);
    }
    if (!response.ok) {
      throw new ModelFetchError(`Model list request failed: ${response.status}`);
    }
    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new ModelFetchError(`Model list response was not JSON: ${toErrorMessage(error)}`);
    }
    const parsed = parseModelList(payload, deps.strategies);
    if (!parsed) throw new ModelFetchError('Model list response matched no known schema');
    logger.debug(`Parsed ${parsed.models.length} models with ${parsed.strategy} schema`);
    return parsed.models;
  };

  const store = async (hash: string, models: ModelDescriptor[]) => {
    const cachedAt = now();
    try {
      await deps.cache.write({
        credentialHash: hash,
        models,
        modelCount: models.length,
        cachedAt,
        expiresAt: cachedAt + ttlMs,
        version: MODEL_CACHE_FORMAT_VERSION,
      });
    } catch (error) {
      logger.warn('Model cache write failed', toErrorMessage(error));
    }
  };

  const getModels = async (
    credential: string | null | undefined,
    forceRefresh = false
  ): Promise<ModelListResult> => {
    const hash = hashCredential(credential);
    const cached = await readCache(hash);
    if (!forceRefresh && cached && isUsableEntry(cached, hash, now())) {
      return { models: cached.models, source: 'cache' };
    }
    const key = credential?.trim();
    if (key) {
      try {
        const models = await fetchModels(key);
        await store(hash, models);
        return { models, source: 'network' };
      } catch (error) {
        if (!(error instanceof ModelFetchError)) throw error;
        logger.warn(error.message);
      }
    }
    if (cached?.models.length) {
      return { models: cached.models, source: 'staleCache' };
    }
    return { models: [DEFAULT_MODEL], source: 'default' };
  };

  return {
    getModels,
    invalidate: (credential) => deps.cache.invalidate(hashCredential(credential)),
  };
};
