import { existsSync, mkdtempSync, readdirSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  DEFAULT_MODEL,
  MODEL_CACHE_TTL_MS,
  createFileModelCache,
  createMemoryModelCache,
  createModelDiscovery,
  hashCredential,
  parseModelList,
  type ModelCacheEntry,
  type ModelDescriptor,
} from '@chordcast/core';

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });

const makeFetcher = (respond: () => Response | Promise<Response>) =>
  vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => respond());

const model = (id: string): ModelDescriptor => ({
  id,
  name: id,
  description: '',
  promptPrice: 0,
  contextLength: 4096,
});

const entry = (
  credentialHash: string,
  cachedAt: number,
  models = [model('vendor/one')]
): ModelCacheEntry => ({
  credentialHash,
  models,
  modelCount: models.length,
  cachedAt,
  expiresAt: cachedAt + MODEL_CACHE_TTL_MS,
  version: '1.0',
});

describe('model list parsing', () => {
  it('reads the snake_case catalog', () => {
    const parsed = parseModelList({
      data: [
        {
          id: 'vendor/alpha',
          name: 'Alpha',
          description: 'First',
          pricing: { prompt: '0.000001' },
          context_length: 8192,
        },
      ],
    });

    expect(parsed).toEqual({
      strategy: 'snake_case',
      models: [{
        id: 'vendor/alpha',
        name: 'Alpha',
        description: 'First',
        promptPrice: 0.000001,
        contextLength: 8192,
      }],
    });
  });

  it('reads camelCase entries and fills missing fields', () => {
    const parsed = parseModelList({ data: [{ id: 'vendor/beta', contextLength: 1000 }] });

    expect(parsed).toEqual({
      strategy: 'camelCase',
      models: [{
        id: 'vendor/beta',
        name: 'vendor/beta',
        description: '',
        promptPrice: 0,
        contextLength: 1000,
      }],
    });
  });

  it('reads PascalCase entries', () => {
    const parsed = parseModelList({
      Data: [{ Id: 'vendor/gamma', Name: 'Gamma', ContextLength: 2048 }],
    });

    expect(parsed?.strategy).toBe('PascalCase');
    expect(parsed?.models[0]).toMatchObject({
      id: 'vendor/gamma',
      name: 'Gamma',
      contextLength: 2048,
    });
  });

  it('falls back to case-insensitive matching with a default context length', () => {
    const parsed = parseModelList({ models: [{ ID: 'vendor/delta' }, { name: 'no id' }] });

    expect(parsed).toEqual({
      strategy: 'case-insensitive',
      models: [{
        id: 'vendor/delta',
        name: 'vendor/delta',
        description: '',
        promptPrice: 0,
        contextLength: 4096,
      }],
    });
  });

  it('reads the same catalog in every naming convention', () => {
    const common = { id: 'vendor/a', name: 'A', description: 'd', pricing: { prompt: 0.5 } };
    const snake = { data: [{ ...common, context_length: 10 }] };
    const camel = { data: [{ ...common, contextLength: 10 }] };
    const pascal = {
      Data: [{
        Id: 'vendor/a',
        Name: 'A',
        Description: 'd',
        Pricing: { Prompt: 0.5 },
        ContextLength: 10,
      }],
    };

    const lists = [snake, camel, pascal].map((payload) => parseModelList(payload)?.models);

    expect(lists[0]).toEqual([{
      id: 'vendor/a',
      name: 'A',
      description: 'd',
      promptPrice: 0.5,
      contextLength: 10,
    }]);
    expect(lists[1]).toEqual(lists[0]);
    expect(lists[2]).toEqual(lists[0]);
  });

  it('returns null for payloads without models', () => {
    expect(parseModelList({})).toBeNull();
    expect(parseModelList({ data: [] })).toBeNull();
    expect(parseModelList('not json')).toBeNull();
  });
});

describe('credential hashing', () => {
  it('uses a fixed key without a credential and trims otherwise', () => {
    expect(hashCredential(undefined)).toBe('default');
    expect(hashCredential('   ')).toBe('default');
    expect(hashCredential(' test-secret ')).toBe(hashCredential('test-secret'));
    expect(hashCredential('test-secret')).toMatch(/^[0-9a-f]{64}$/);
  });
});

describe('memory model cache', () => {
  it('drops expired entries', async () => {
    const cache = createMemoryModelCache();
    await cache.write(entry('old', 0));
    await cache.write(entry('new', 1000));

    await expect(cache.cleanupExpired(MODEL_CACHE_TTL_MS + 500)).resolves.toBe(1);
    await expect(cache.read('old')).resolves.toBeNull();
    await expect(cache.info()).resolves.toEqual({
      entries: 1,
      oldestCachedAt: 1000,
      newestCachedAt: 1000,
    });
  });
});

describe('file model cache', () => {
  let directory: string;

  beforeEach(() => {
    directory = mkdtempSync(join(tmpdir(), 'chordcast-models-'));
  });

  afterEach(() => {
    rmSync(directory, { recursive: true, force: true });
  });

  it('writes one file per credential without leaving temp files', async () => {
    const cache = createFileModelCache(directory);
    const hash = hashCredential('test-secret');
    await cache.write(entry(hash, 10));

    expect(readdirSync(directory)).toEqual([`models_${hash.slice(0, 8)}.json`]);
    await expect(cache.read(hash)).resolves.toEqual(entry(hash, 10));
  });

  it('discards a file whose model count disagrees', async () => {
    const cache = createFileModelCache(directory);
    const hash = hashCredential('test-secret');
    const file = join(directory, `models_${hash.slice(0, 8)}.json`);
    writeFileSync(file, JSON.stringify({ ...entry(hash, 10), modelCount: 2 }));

    await expect(cache.read(hash)).resolves.toBeNull();
  });

  it('removes expired and unreadable files during cleanup', async () => {
    const cache = createFileModelCache(directory);
    await cache.write(entry('aaaaaaaa1', 0));
    await cache.write(entry('bbbbbbbb2', MODEL_CACHE_TTL_MS));
    writeFileSync(join(directory, 'models_cccccccc.json'), '{broken');

    await expect(cache.cleanupExpired(MODEL_CACHE_TTL_MS + 1)).resolves.toBe(2);
    expect(readdirSync(directory)).toEqual(['models_bbbbbbbb.json']);
    await expect(cache.info()).resolves.toEqual({
      entries: 1,
      oldestCachedAt: MODEL_CACHE_TTL_MS,
      newestCachedAt: MODEL_CACHE_TTL_MS,
    });
  });

  it('clears and invalidates entries', async () => {
    const cache = createFileModelCache(directory);
    await cache.write(entry('aaaaaaaa1', 0));
    await cache.write(entry('bbbbbbbb2', 0));

    await cache.invalidate('aaaaaaaa1');
    expect(existsSync(join(directory, 'models_aaaaaaaa.json'))).toBe(false);
    await cache.clear();
    expect(readdirSync(directory)).toEqual([]);
  });
});

describe('model discovery', () => {
  const catalog = { data: [{ id: 'vendor/alpha', name: 'Alpha', context_length: 8192 }] };
  const alpha: ModelDescriptor = {
    id: 'vendor/alpha',
    name: 'Alpha',
    description: '',
    promptPrice: 0,
    contextLength: 8192,
  };

  const makeDeps = (respond: () => Response | Promise<Response> = () => jsonResponse(catalog)) => {
    const cache = createMemoryModelCache();
    const fetcher = makeFetcher(respond);
    const discovery = createModelDiscovery({ fetcher, cache, now: () => 5000 });
    return { cache, fetcher, discovery };
  };

  it('serves a fresh cache without a request', async () => {
    const { cache, fetcher, discovery } = makeDeps();
    await cache.write(entry(hashCredential('test-secret'), 4000));

    await expect(discovery.getModels('test-secret')).resolves.toEqual({
      models: [model('vendor/one')],
      source: 'cache',
    });
    expect(fetcher).not.toHaveBeenCalled();
  });

  it('fetches and caches the catalog', async () => {
    const { cache, fetcher, discovery } = makeDeps();

    await expect(discovery.getModels('test-secret')).resolves.toEqual({
      models: [alpha],
      source: 'network',
    });

    const [url, init] = fetcher.mock.calls[0];
    expect(url).toBe('https://openrouter.ai/api/v1/models');
    expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-secret' });
    await expect(cache.read(hashCredential('test-secret'))).resolves.toMatchObject({
      modelCount: 1,
      cachedAt: 5000,
      expiresAt: 5000 + MODEL_CACHE_TTL_MS,
    });
  });

  it('refreshes a fresh cache when forced', async () => {
    const { cache, fetcher, discovery } = makeDeps();
    await cache.write(entry(hashCredential('test-secret'), 4000));

    await expect(discovery.getModels('test-secret', true)).resolves.toEqual({
      models: [alpha],
      source: 'network',
    });
    expect(fetcher).toHaveBeenCalledTimes(1);
  });

  it('keeps the cached list when a forced refresh cannot reach the catalog', async () => {
    const { cache, fetcher, discovery } = makeDeps(() => Promise.reject(new Error('offline')));
    await cache.write(entry(hashCredential('test-secret'), 4000));

    await expect(discovery.getModels('test-secret', true)).resolves.toEqual({
      models: [model('vendor/one')],
      source: 'staleCache',
    });
    expect(fetcher).toHaveBeenCalledTimes(1);
  });

  it('falls back to a stale cache when the request is rejected', async () => {
    const { cache, discovery } = makeDeps(() => new Response('unauthorized', { status: 401 }));
    await cache.write({ ...entry(hashCredential('test-secret'), 0), expiresAt: 1 });

    await expect(discovery.getModels('test-secret')).resolves.toEqual({
      models: [model('vendor/one')],
      source: 'staleCache',
    });
  });

  it('falls back to the default model without cache or network', async () => {
    const { discovery } = makeDeps(() => Promise.reject(new Error('offline')));

    await expect(discovery.getModels('test-secret')).resolves.toEqual({
      models: [DEFAULT_MODEL],
      source: 'default',
    });
  });

  it('does not call the catalog without a credential', async () => {
    const { fetcher, discovery } = makeDeps();

    await expect(discovery.getModels(null)).resolves.toEqual({
      models: [DEFAULT_MODEL],
      source: 'default',
    });
    expect(fetcher).not.toHaveBeenCalled();
  });

  it('falls back when the payload matches no schema', async () => {
    const { discovery } = makeDeps(() => jsonResponse({ unexpected: true }));

    await expect(discovery.getModels('test-secret')).resolves.toEqual({
      models: [DEFAULT_MODEL],
      source: 'default',
    });
  });
});
