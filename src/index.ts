export { Segment, SegmentedDocument } from './document.js';
export { DEFAULT_MAX_CHARS, enforceMaxChars, segmentDocument } from './segmenter.js';
export {
  BatchTranslator,
  createStats,
  preserveEdgeWhitespace,
  DEFAULT_BATCH_CHARS,
  DEFAULT_BATCH_SEGMENTS,
  DEFAULT_CONCURRENCY,
  DEFAULT_RETRY,
  DEFAULT_TIMEOUT_MS,
} from './translator.js';
export type { BackoffOptions, BatchTranslatorOptions } from './translator.js';
export { OrderedEmitter } from './emitter.js';
export type { ChunkSink, EmittedChunk } from './emitter.js';
export { computeCacheKey, computeChunkHash, JsonFileTranslationCache, MemoryTranslationCache } from './cache.js';
export { OpenRouterClient, BATCH_DELIMITER, parseBatchResponse } from './openrouter.js';
export type { OpenRouterClientOptions } from './openrouter.js';
export { OutputWriter } from './writer.js';
export { resolveSettings } from './config.js';
export type { Settings } from './config.js';
export { runTranslation } from './runner.js';
export type { RunDependencies, RunResult, RunSummary } from './runner.js';
export { createApp } from './app.js';
export type { AppDependencies } from './app.js';
export {
  DocrelayError,
  SegmentationError,
  TranslationError,
  BatchSegmentMismatch,
  RemoteRequestError,
  RequestTimeoutError,
  ConfigError,
  FileReadError,
} from './errors.js';
export type { ErrorCode } from './errors.js';
export type * from './types/segment.types.js';
export type * from './types/translation.types.js';
