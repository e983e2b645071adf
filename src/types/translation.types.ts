/**
 * Types for the translation pipeline and the collaborators it talks to
 */

import type { Segment } from '../document.js';

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
}

/**
 * Counters owned by one translator instance for the duration of a run
 */
export interface TranslatorStats {
  totalSegments: number;
  cachedSegments: number;
  apiCalls: number;
  batches: number;
  retries: number;
  promptTokens: number;
  completionTokens: number;
}

/**
 * Observers a caller can attach to a run. Every hook has a no-op default.
 */
export interface TranslationHooks {
  onProgress(count: number): void;
  onRetry(attempt: number, error: unknown, delayMs: number): void | Promise<void>;
  onSegmentReady(segment: Segment): void | Promise<void>;
}

export interface RemoteSubmitOptions {
  sourceLang: string;
  targetLang: string;
  signal?: AbortSignal;
}

export interface RemoteSubmitResult {
  translations: string[];
  usage?: TokenUsage;
  // Raw model output, kept for mismatch diagnostics
  raw?: string;
}

/**
 * Remote translation service: N texts in, N texts (or fewer/more on a bad day) out.
 */
export interface RemoteTranslator {
  readonly model: string;
  submit(texts: string[], options: RemoteSubmitOptions): Promise<RemoteSubmitResult>;
}

export interface CacheKeyParts {
  contentHash: string;
  targetLang: string;
  model: string;
  sourceLang: string;
}

export interface CacheEntry {
  chunkHash: string;
  targetLang: string;
  model: string;
  translation: string;
  metadata?: Record<string, unknown>;
}

export interface TranslationCache {
  get(key: string): Promise<string | undefined>;
  set(key: string, entry: CacheEntry): Promise<void>;
  flush(): Promise<void>;
  close(): Promise<void>;
}

export type WriteMode = 'replace' | 'append';

export interface WriteTask {
  path: string;
  content: string;
  mode: WriteMode;
  // Only honoured by the first replace of a path
  backup: boolean;
}

export interface Sink {
  submit(task: WriteTask): void;
  // Resolves once every submitted task has run, with one `path: error` entry per failed write
  drain(): Promise<string[]>;
}
