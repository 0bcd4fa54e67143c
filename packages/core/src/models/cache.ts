import { createHash } from 'crypto';
import { mkdir, readdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { toErrorMessage } from '../errors';
import { createLogger, type Logger } from '../logging/logger';
import { ModelCacheEntrySchema, type ModelCacheEntry } from './types';

export const MODEL_CACHE_TTL_MS = 24 * 60 * 60 * 1000;

/** SHA-256 of the credential; the literal "default" when there is none. */
export const hashCredential = (credential: string | null | undefined) => {
  const trimmed = credential?.trim();
  if (!trimmed) return 'default';
  return createHash('sha256').update(trimmed, 'utf8').digest('hex');
};

export const isUsableEntry = (entry: ModelCacheEntry, credentialHash: string, now: number) =>
  entry.credentialHash === credentialHash && now < entry.expiresAt;

export interface ModelCacheInfo {
  entries: number;
  oldestCachedAt: number | null;
  newestCachedAt: number | null;
}

export interface ModelCacheStore {
  read(credentialHash: string): Promise<ModelCacheEntry | null>;
  write(entry: ModelCacheEntry): Promise<void>;
  invalidate(credentialHash: string): Promise<void>;
  clear(): Promise<void>;
  /** Removes expired entries and returns how many were dropped. */
  cleanupExpired(now?: number): Promise<number>;
  info(): Promise<ModelCacheInfo>;
}

const summarize = (entries: ModelCacheEntry[]): ModelCacheInfo => ({
  entries: entries.length,
  oldestCachedAt: entries.length ? Math.min(...entries.map((entry) => entry.cachedAt)) : null,
  newestCachedAt: entries.length ? Math.max(...entries.map((entry) => entry.cachedAt)) : null,
});

export const createMemoryModelCache = (): ModelCacheStore => {
  const entries = new Map<string, ModelCacheEntry>();
  return {
    read: async (hash) => entries.get(hash) ?? null,
    write: async (entry) => {
      entries.set(entry.credentialHash, entry);
    },
    invalidate: async (hash) => {
      entries.delete(hash);
    },
    clear: async () => entries.clear(),
    cleanupExpired: async (now = Date.now()) => {
      let removed = 0;
      entries.forEach((entry, hash) => {
        if (entry.expiresAt <= now) {
          entries.delete(hash);
          removed += 1;
        }
      });
      return removed;
    },
    info: async () => summarize([...entries.values()]),
  };
};

const CACHE_FILE_PATTERN = /^models_[0-9a-z]+\.json$/;

/**
 * One JSON file per credential, `models_<first 8 hash chars>.json`. Writes go through a
 * temp file and rename; a file whose model count disagrees with its list is discarded.
 */
export const createFileModelCache = (
  directory: string,
  logger: Logger = createLogger('model-cache')
): ModelCacheStore => {
  const fileFor = (hash: string) => join(directory, `models_${hash.slice(0, 8)}.json`);

  const readFileEntry = async (filePath: string): Promise<ModelCacheEntry | null> => {
    let raw: string;
    try {
      raw = await readFile(filePath, 'utf8');
    } catch {
      return null;
    }
    try {
      const parsed = ModelCacheEntrySchema.safeParse(JSON.parse(raw));
      if (!parsed.success) {
        logger.warn(`Discarding malformed model cache ${filePath}`);
        return null;
      }
      if (parsed.data.modelCount !== parsed.data.models.length) {
        logger.warn(`Discarding model cache ${filePath}: count mismatch`);
        return null;
      }
      return parsed.data;
    } catch (error) {
      logger.warn(`Discarding unreadable model cache ${filePath}`, toErrorMessage(error));
      return null;
    }
  };

  const listFiles = async () => {
    try {
      const names = await readdir(directory);
      return names
        .filter((name) => CACHE_FILE_PATTERN.test(name))
        .map((name) => join(directory, name));
    } catch {
      return [];
    }
  };

  const read = async (hash: string) => {
    const entry = await readFileEntry(fileFor(hash));
    return entry && entry.credentialHash === hash ? entry : null;
  };

  const write = async (entry: ModelCacheEntry) => {
    await mkdir(directory, { recursive: true });
    const target = fileFor(entry.credentialHash);
    const temp = `${target}.tmp`;
    await writeFile(temp, JSON.stringify(entry, null, 2), 'utf8');
    await rename(temp, target);
  };

  const invalidate = async (hash: string) => {
    await rm(fileFor(hash), { force: true });
  };

  const clear = async () => {
    const files = await listFiles();
    await Promise.all(files.map((filePath) => rm(filePath, { force: true })));
  };

  const cleanupExpired = async (now = Date.now()) => {
    let removed = 0;
    for (const filePath of await listFiles()) {
      const entry = await readFileEntry(filePath);
      if (!entry || entry.expiresAt <= now) {
        await rm(filePath, { force: true });
        removed += 1;
      }
    }
    return removed;
  };

  const info = async () => {
    const entries = await Promise.all((await listFiles()).map(readFileEntry));
    return summarize(entries.filter((entry): entry is ModelCacheEntry => entry !== null));
  };

  return { read, write, invalidate, clear, cleanupExpired, info };
};
