/**
 * Batch scheduler
 *
 * Packs translatable segments into batches, dispatches them under two limits
 * (pending batches and concurrent requests), retries with exponential backoff
 * and falls back to one request per segment when a batch answer comes back
 * with the wrong number of translations.
 */

import pLimit from 'p-limit';
import PQueue from 'p-queue';
import logger, { errorMessage } from './logger.js';
import { computeCacheKey, computeChunkHash } from './cache.js';
import { BatchSegmentMismatch, RemoteRequestError, RequestTimeoutError, TranslationError } from './errors.js';
import type { Segment } from './document.js';
import type {
  RemoteSubmitResult,
  RemoteTranslator,
  TokenUsage,
  TranslationCache,
  TranslationHooks,
  TranslatorStats,
} from './types/translation.types.js';

export const DEFAULT_RETRY = 3;
export const DEFAULT_TIMEOUT_MS = 60000;
export const DEFAULT_CONCURRENCY = 4;
export const DEFAULT_BATCH_CHARS = 16000;
export const DEFAULT_BATCH_SEGMENTS = 6;

export interface BackoffOptions {
  initialDelayMs: number;
  maxDelayMs: number;
  jitterMinMs: number;
  jitterMaxMs: number;
}

const DEFAULT_BACKOFF: BackoffOptions = {
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  jitterMinMs: 100,
  jitterMaxMs: 500,
};

export const noopHooks: TranslationHooks = {
  onProgress: () => {},
  onRetry: () => {},
  onSegmentReady: () => {},
};

/**
 * Overlay hooks onto a base set, ignoring keys explicitly set to undefined
 */
export function withHooks(base: TranslationHooks, overrides: Partial<TranslationHooks> = {}): TranslationHooks {
  return {
    onProgress: overrides.onProgress ?? base.onProgress,
    onRetry: overrides.onRetry ?? base.onRetry,
    onSegmentReady: overrides.onSegmentReady ?? base.onSegmentReady,
  };
}

export interface BatchTranslatorOptions {
  remote: RemoteTranslator;
  targetLang: string;
  sourceLang?: string;
  // Total attempts per request, first one included
  retry?: number;
  timeoutMs?: number;
  concurrency?: number;
  maxBatchChars?: number;
  maxBatchSegments?: number;
  maxPendingBatches?: number;
  cache?: TranslationCache;
  hooks?: Partial<TranslationHooks>;
  backoff?: Partial<BackoffOptions>;
}

interface PlannedSegment {
  segment: Segment;
  chunkHash?: string;
  cacheKey?: string;
}

export function createStats(): TranslatorStats {
  return {
    totalSegments: 0,
    cachedSegments: 0,
    apiCalls: 0,
    batches: 0,
    retries: 0,
    promptTokens: 0,
    completionTokens: 0,
  };
}

/**
 * Put the source's leading and trailing whitespace back around a translation.
 * Models routinely drop the blank lines that join segments together.
 */
export function preserveEdgeWhitespace(source: string, translated: string): string {
  const leading = /^\s*/.exec(source)?.[0] ?? '';
  const trailing = /\s*$/.exec(source)?.[0] ?? '';
  return `${leading}${translated.trim()}${trailing}`;
}

// A blank answer for a segment is a malformed response
function assertTranslated(items: PlannedSegment[], translations: string[]): void {
  const blank = translations.findIndex((translation) => !translation.trim());
  if (blank !== -1) {
    throw new RemoteRequestError(`Empty translation for segment ${items[blank].segment.index}`, { retryable: true });
  }
}

export class BatchTranslator {
  readonly targetLang: string;
  readonly sourceLang: string;

  private readonly remote: RemoteTranslator;
  private readonly cache: TranslationCache | undefined;
  private readonly retry: number;
  private readonly timeoutMs: number;
  private readonly maxBatchChars: number;
  private readonly maxBatchSegments: number;
  private readonly maxPendingBatches: number;
  private readonly backoff: BackoffOptions;
  private readonly hooks: TranslationHooks;
  private readonly requestLimit: ReturnType<typeof pLimit>;
  private readonly counters: TranslatorStats = createStats();

  constructor(options: BatchTranslatorOptions) {
    const concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY);

    this.remote = options.remote;
    this.cache = options.cache;
    this.targetLang = options.targetLang;
    this.sourceLang = options.sourceLang ?? 'auto';
    this.retry = Math.max(1, options.retry ?? DEFAULT_RETRY);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxBatchChars = options.maxBatchChars ?? DEFAULT_BATCH_CHARS;
    this.maxBatchSegments = options.maxBatchSegments ?? DEFAULT_BATCH_SEGMENTS;
    this.maxPendingBatches = Math.max(1, options.maxPendingBatches ?? concurrency * 2);
    this.backoff = { ...DEFAULT_BACKOFF, ...options.backoff };
    this.hooks = withHooks(noopHooks, options.hooks);
    this.requestLimit = pLimit(concurrency);
  }

  get model(): string {
    return this.remote.model;
  }

  /** Snapshot of the counters accumulated by this translator so far */
  get stats(): Readonly<TranslatorStats> {
    return { ...this.counters };
  }

  /**
   * Resolve every segment's translation in place.
   *
   * @throws {TranslationError} when a batch or fallback segment exhausts its attempts
   */
  async translateSegments(segments: Segment[], hooks: Partial<TranslationHooks> = {}): Promise<void> {
    const runHooks = withHooks(this.hooks, hooks);
    const pending = new PQueue({ concurrency: this.maxPendingBatches });
    const failures: unknown[] = [];

    let batch: PlannedSegment[] = [];
    let batchChars = 0;

    const dispatch = async (items: PlannedSegment[]): Promise<void> => {
      await this.acquirePendingSlot(pending);
      if (failures.length > 0) {
        return;
      }
      pending.add(() => this.runBatch(items, runHooks)).catch((error: unknown) => {
        failures.push(error);
      });
    };

    try {
      for (const segment of segments) {
        if (failures.length > 0) {
          break;
        }

        if (!segment.needsTranslation) {
          segment.resolve(segment.content);
          runHooks.onProgress(1);
          await runHooks.onSegmentReady(segment);
          continue;
        }

        this.counters.totalSegments++;
        const planned = this.plan(segment);

        if (planned.cacheKey && this.cache) {
          const cached = await this.cache.get(planned.cacheKey);
          if (cached !== undefined) {
            segment.resolve(cached);
            this.counters.cachedSegments++;
            runHooks.onProgress(1);
            await runHooks.onSegmentReady(segment);
            continue;
          }
        }

        const length = segment.content.length;
        const overCount = this.maxBatchSegments > 0 && batch.length + 1 > this.maxBatchSegments;
        const overChars = this.maxBatchChars > 0 && batchChars + length > this.maxBatchChars;
        if (batch.length > 0 && (overCount || overChars)) {
          await dispatch(batch);
          batch = [];
          batchChars = 0;
        }

        batch.push(planned);
        batchChars += length;
      }

      if (batch.length > 0 && failures.length === 0) {
        await dispatch(batch);
      }
    } finally {
      // In-flight batches finish before this returns
      await pending.onIdle();
    }

    if (failures.length > 0) {
      throw failures[0];
    }
  }

  private plan(segment: Segment): PlannedSegment {
    if (!this.cache) {
      return { segment };
    }
    const chunkHash = computeChunkHash(segment.content);
    const cacheKey = computeCacheKey({
      contentHash: chunkHash,
      targetLang: this.targetLang,
      model: this.model,
      sourceLang: this.sourceLang,
    });
    return { segment, chunkHash, cacheKey };
  }

  /**
   * Wait until a batch may start right away. Acquired before any request slot.
   */
  private async acquirePendingSlot(queue: PQueue): Promise<void> {
    while (queue.pending + queue.size >= this.maxPendingBatches) {
      await new Promise<void>((resolve) => {
        queue.once('next', () => resolve());
      });
    }
  }

  private async runBatch(items: PlannedSegment[], hooks: TranslationHooks): Promise<void> {
    const texts = items.map((item) => item.segment.content);
    logger.debug('Dispatching batch', {
      segments: items.length,
      chars: texts.reduce((sum, text) => sum + text.length, 0),
      first: items[0].segment.index,
    });

    let result: RemoteSubmitResult;
    try {
      result = await this.withRetry(async (signal) => {
        const response = await this.remote.submit(texts, {
          sourceLang: this.sourceLang,
          targetLang: this.targetLang,
          signal,
        });
        if (response.translations.length !== texts.length) {
          throw new BatchSegmentMismatch({
            expected: texts.length,
            actual: response.translations.length,
            raw: response.raw ?? response.translations.join('\n'),
            usage: response.usage,
          });
        }
        assertTranslated(items, response.translations);
        return response;
      }, hooks);
    } catch (error) {
      if (error instanceof BatchSegmentMismatch) {
        await this.fallbackToSingles(items, error, hooks);
        return;
      }
      throw error;
    }

    this.counters.apiCalls++;
    this.counters.batches++;
    this.addUsage(result.usage);

    for (let i = 0; i < items.length; i++) {
      await this.complete(items[i], result.translations[i], hooks);
    }
  }

  private async fallbackToSingles(
    items: PlannedSegment[],
    mismatch: BatchSegmentMismatch,
    hooks: TranslationHooks
  ): Promise<void> {
    logger.warn('Batch response count mismatch, translating segments one by one', {
      expected: mismatch.expected,
      actual: mismatch.actual,
      first: items[0].segment.index,
    });

    this.counters.apiCalls++;
    this.counters.batches++;
    this.addUsage(mismatch.usage);

    const outcomes = await Promise.allSettled(items.map((item) => this.translateSingle(item, hooks)));
    const failed = outcomes.find((outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected');
    if (failed) {
      throw failed.reason;
    }
  }

  private async translateSingle(item: PlannedSegment, hooks: TranslationHooks): Promise<void> {
    const result = await this.withRetry(async (signal) => {
      const response = await this.remote.submit([item.segment.content], {
        sourceLang: this.sourceLang,
        targetLang: this.targetLang,
        signal,
      });
      if (response.translations.length !== 1) {
        throw new RemoteRequestError(
          `Expected a single translation, received ${response.translations.length}`,
          { retryable: true }
        );
      }
      assertTranslated([item], response.translations);
      return response;
    }, hooks);

    this.counters.apiCalls++;
    this.addUsage(result.usage);
    await this.complete(item, result.translations[0], hooks);
  }

  private async complete(item: PlannedSegment, translation: string, hooks: TranslationHooks): Promise<void> {
    const { segment } = item;
    segment.resolve(preserveEdgeWhitespace(segment.content, translation));

    if (this.cache && item.cacheKey && item.chunkHash) {
      await this.cache.set(item.cacheKey, {
        chunkHash: item.chunkHash,
        targetLang: this.targetLang,
        model: this.model,
        translation: segment.output(),
        metadata: { sourceLang: this.sourceLang },
      });
    }

    hooks.onProgress(1);
    await hooks.onSegmentReady(segment);
  }

  private addUsage(usage: TokenUsage | undefined): void {
    if (!usage) {
      return;
    }
    this.counters.promptTokens += usage.promptTokens;
    this.counters.completionTokens += usage.completionTokens;
  }

  /**
   * Run a request under the concurrency limit. A batch count mismatch and a
   * non-retryable remote error end the attempts at once. The request slot is
   * released while backing off.
   */
  private async withRetry<T>(request: (signal: AbortSignal) => Promise<T>, hooks: TranslationHooks): Promise<T> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.retry; attempt++) {
      try {
        return await this.requestLimit(() => this.withTimeout(request));
      } catch (error) {
        if (error instanceof BatchSegmentMismatch) {
          throw error;
        }
        lastError = error;
        if (error instanceof RemoteRequestError && !error.retryable) {
          logger.debug('Request failed with a non-retryable error', { attempt, error: error.message });
          break;
        }
        if (attempt >= this.retry) {
          break;
        }

        this.counters.retries++;
        const delayMs = this.computeDelay(attempt);
        logger.debug('Request failed, backing off', { attempt, delayMs, error: errorMessage(error) });
        await hooks.onRetry(attempt, error, delayMs);
        await new Promise((resolve) => setTimeout(resolve, delayMs));
      }
    }

    throw new TranslationError(lastError !== undefined ? errorMessage(lastError) : 'Unknown error', {
      cause: lastError,
    });
  }

  private async withTimeout<T>(request: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    if (this.timeoutMs <= 0) {
      return request(controller.signal);
    }

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        // The deadline settles before the abort, so the race reports the timeout
        reject(new RequestTimeoutError(this.timeoutMs));
        controller.abort();
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([request(controller.signal), deadline]);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Exponential backoff capped at maxDelayMs, with jitter added after the cap
   */
  computeDelay(attempt: number): number {
    const { initialDelayMs, maxDelayMs, jitterMinMs, jitterMaxMs } = this.backoff;
    const base = Math.min(maxDelayMs, initialDelayMs * 2 ** (attempt - 1));
    const jitter = jitterMinMs + Math.random() * Math.max(0, jitterMaxMs - jitterMinMs);
    return base + jitter;
  }
}
