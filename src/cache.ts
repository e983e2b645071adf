/**
 * Translation cache adapters
 *
 * A cache key fingerprints a segment's content together with everything that
 * changes its translation (target language, model, source language).
 */

import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import { Low } from 'lowdb';
import { JSONFile } from 'lowdb/node';
import logger from './logger.js';
import type { CacheEntry, CacheKeyParts, TranslationCache } from './types/translation.types.js';

export function computeChunkHash(content: string): string {
  return crypto.createHash('sha256').update(content, 'utf8').digest('hex');
}

export function computeCacheKey(parts: CacheKeyParts): string {
  const base = `${parts.contentHash}:${parts.targetLang}:${parts.model}:${parts.sourceLang}`;
  return crypto.createHash('sha256').update(base, 'utf8').digest('hex');
}

/**
 * In-process cache, lost on exit
 */
export class MemoryTranslationCache implements TranslationCache {
  private readonly entries = new Map<string, CacheEntry>();

  async get(key: string): Promise<string | undefined> {
    return this.entries.get(key)?.translation;
  }

  async set(key: string, entry: CacheEntry): Promise<void> {
    this.entries.set(key, entry);
  }

  async flush(): Promise<void> {}

  async close(): Promise<void> {}

  get size(): number {
    return this.entries.size;
  }
}

interface StoredEntry extends CacheEntry {
  updatedAt: string;
}

interface CacheData {
  translations: Record<string, StoredEntry>;
}

const COMMIT_INTERVAL = 32;

/**
 * JSON file cache backed by lowdb. Writes are committed every
 * {@link COMMIT_INTERVAL} sets and on flush/close.
 */
export class JsonFileTranslationCache implements TranslationCache {
  readonly path: string;
  private readonly db: Low<CacheData>;
  private loaded: Promise<void> | null = null;
  private pendingWrites = 0;

  constructor(cacheDir: string) {
    this.path = path.join(cacheDir, 'segments.json');
    this.db = new Low<CacheData>(new JSONFile<CacheData>(this.path), { translations: {} });
  }

  private ensureLoaded(): Promise<void> {
    if (!this.loaded) {
      this.loaded = this.db.read().then(() => {
        logger.debug('Translation cache loaded', {
          path: this.path,
          entries: Object.keys(this.db.data.translations).length,
        });
      });
    }
    return this.loaded;
  }

  async get(key: string): Promise<string | undefined> {
    await this.ensureLoaded();
    return this.db.data.translations[key]?.translation;
  }

  async set(key: string, entry: CacheEntry): Promise<void> {
    await this.ensureLoaded();
    this.db.data.translations[key] = { ...entry, updatedAt: new Date().toISOString() };
    this.pendingWrites++;
    if (this.pendingWrites >= COMMIT_INTERVAL) {
      await this.flush();
    }
  }

  async flush(): Promise<void> {
    if (this.pendingWrites === 0) {
      return;
    }
    this.pendingWrites = 0;
    await fs.promises.mkdir(path.dirname(this.path), { recursive: true });
    await this.db.write();
  }

  async close(): Promise<void> {
    if (this.loaded) {
      await this.loaded;
      await this.flush();
    }
  }
}
