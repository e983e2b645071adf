import type { TokenUsage } from './types/translation.types.js';

export type ErrorCode =
  | 'SEGMENTATION_ERROR'
  | 'TRANSLATION_FAILED'
  | 'BATCH_MISMATCH'
  | 'REMOTE_REQUEST_FAILED'
  | 'REQUEST_TIMEOUT'
  | 'CONFIG_ERROR'
  | 'FILE_READ_ERROR';

/**
 * Base class for every error docrelay raises on purpose.
 */
export class DocrelayError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Unsupported strategy or invalid limits handed to the segmenter.
 */
export class SegmentationError extends DocrelayError {
  constructor(message: string) {
    super('SEGMENTATION_ERROR', message);
  }
}

/**
 * A batch or a single segment ran out of attempts.
 */
export class TranslationError extends DocrelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TRANSLATION_FAILED', message, options);
  }
}

/**
 * The remote service answered a batch with the wrong number of translations.
 * Not retried as-is; the batch is decomposed into single requests instead.
 */
export class BatchSegmentMismatch extends DocrelayError {
  readonly expected: number;
  readonly actual: number;
  readonly raw: string;
  readonly usage: TokenUsage | undefined;

  constructor(details: { expected: number; actual: number; raw: string; usage?: TokenUsage }) {
    super(
      'BATCH_MISMATCH',
      `Batch response contained ${details.actual} segment(s), expected ${details.expected}`
    );
    this.expected = details.expected;
    this.actual = details.actual;
    this.raw = details.raw;
    this.usage = details.usage;
  }
}

export class RemoteRequestError extends DocrelayError {
  readonly status: number | undefined;
  readonly retryable: boolean;

  constructor(message: string, details: { status?: number; retryable: boolean; cause?: unknown }) {
    super('REMOTE_REQUEST_FAILED', message, { cause: details.cause });
    this.status = details.status;
    this.retryable = details.retryable;
  }
}

export class RequestTimeoutError extends DocrelayError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super('REQUEST_TIMEOUT', `Request timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

export class ConfigError extends DocrelayError {
  constructor(message: string) {
    super('CONFIG_ERROR', message);
  }
}

export class FileReadError extends DocrelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('FILE_READ_ERROR', message, options);
  }
}
