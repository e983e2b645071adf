import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import {
  computeCacheKey,
  computeChunkHash,
  JsonFileTranslationCache,
  MemoryTranslationCache,
} from './cache.js';
import type { CacheEntry } from './types/translation.types.js';

function entry(translation: string): CacheEntry {
  return { chunkHash: computeChunkHash(translation), targetLang: 'fr', model: 'test-model', translation };
}

describe('cache keys', () => {
  it('hashes content with sha256', () => {
    expect(computeChunkHash('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
  });

  it('changes with every key part', () => {
    const base = { contentHash: computeChunkHash('hello'), targetLang: 'fr', model: 'm', sourceLang: 'auto' };
    const key = computeCacheKey(base);

    expect(computeCacheKey({ ...base })).toBe(key);
    expect(computeCacheKey({ ...base, targetLang: 'de' })).not.toBe(key);
    expect(computeCacheKey({ ...base, model: 'other' })).not.toBe(key);
    expect(computeCacheKey({ ...base, sourceLang: 'en' })).not.toBe(key);
    expect(key).toMatch(/^[0-9a-f]{64}$/);
  });
});

describe('MemoryTranslationCache', () => {
  it('returns stored translations and undefined for misses', async () => {
    const cache = new MemoryTranslationCache();
    await cache.set('k1', entry('Bonjour'));

    expect(await cache.get('k1')).toBe('Bonjour');
    expect(await cache.get('k2')).toBeUndefined();
    expect(cache.size).toBe(1);
  });
});

describe('JsonFileTranslationCache', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'docrelay-cache-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('persists entries across instances once closed', async () => {
    const cacheDir = path.join(dir, 'nested');
    const cache = new JsonFileTranslationCache(cacheDir);
    await cache.set('k1', entry('Bonjour'));
    await cache.close();

    const reopened = new JsonFileTranslationCache(cacheDir);
    expect(await reopened.get('k1')).toBe('Bonjour');
    expect(await reopened.get('missing')).toBeUndefined();
  });

  it('commits to disk after a batch of writes', async () => {
    const cache = new JsonFileTranslationCache(dir);
    for (let i = 0; i < 31; i++) {
      await cache.set(`k${i}`, entry(`t${i}`));
    }
    expect(fs.existsSync(cache.path)).toBe(false);

    await cache.set('k31', entry('t31'));
    const stored: unknown = JSON.parse(fs.readFileSync(cache.path, 'utf-8'));
    expect(stored).toMatchObject({ translations: { k0: { translation: 't0' }, k31: { translation: 't31' } } });
  });

  it('does not create a file when nothing was written', async () => {
    const cache = new JsonFileTranslationCache(dir);
    expect(await cache.get('k')).toBeUndefined();
    await cache.close();

    expect(fs.existsSync(cache.path)).toBe(false);
  });
});
