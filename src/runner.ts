/**
 * Run a translation over a directory tree
 *
 * A single producer reads and segments documents in order and feeds a bounded
 * queue drained by a fixed pool of document workers. All workers share one
 * translator (and with it one request-concurrency limit) and one writer.
 */

import path from 'path';
import PQueue from 'p-queue';
import logger, { errorMessage } from './logger.js';
import { segmentDocument } from './segmenter.js';
import { gatherFiles, readGlossary, readText } from './files.js';
import { OrderedEmitter } from './emitter.js';
import { OutputWriter } from './writer.js';
import { OpenRouterClient } from './openrouter.js';
import { JsonFileTranslationCache } from './cache.js';
import { ProgressTracker } from './progress.js';
import { BatchTranslator, type BackoffOptions } from './translator.js';
import { TranslationError } from './errors.js';
import type { SegmentedDocument } from './document.js';
import type { Settings } from './config.js';
import type {
  RemoteTranslator,
  Sink,
  TranslationCache,
  TranslationHooks,
  TranslatorStats,
} from './types/translation.types.js';

export interface RunDependencies {
  createRemote?: (settings: Settings, glossary: Record<string, string>) => RemoteTranslator;
  cache?: TranslationCache;
  writer?: Sink;
  backoff?: Partial<BackoffOptions>;
}

export interface RunSummary extends TranslatorStats {
  filesProcessed: number;
  elapsedSeconds: number;
  failures: string[];
}

export interface RunResult {
  exitCode: number;
  summary: RunSummary;
}

interface DocumentJob {
  path: string;
  original: string;
  document: SegmentedDocument;
}

export function resolveOutputPath(settings: Pick<Settings, 'inputDir' | 'outputDir'>, filePath: string): string {
  if (!settings.outputDir) {
    return filePath;
  }
  return path.join(settings.outputDir, path.relative(settings.inputDir, filePath));
}

function segmentWithSettings(text: string, settings: Settings): SegmentedDocument {
  return segmentDocument(text, {
    strategy: settings.chunkStrategy,
    maxChars: settings.maxChars,
    preserveCode: !settings.translateCode,
    preserveFrontmatter: !settings.translateFrontmatter,
    splitThreshold: settings.splitThreshold,
  });
}

function emptySummary(): RunSummary {
  return {
    filesProcessed: 0,
    totalSegments: 0,
    cachedSegments: 0,
    apiCalls: 0,
    batches: 0,
    retries: 0,
    promptTokens: 0,
    completionTokens: 0,
    elapsedSeconds: 0,
    failures: [],
  };
}

function defaultRemote(settings: Settings, glossary: Record<string, string>): RemoteTranslator {
  return new OpenRouterClient({
    apiKey: settings.apiKey,
    model: settings.model,
    targetLang: settings.targetLang,
    timeoutMs: settings.timeoutSeconds * 1000,
    glossary,
    debug: settings.debug,
  });
}

async function dryRun(settings: Settings, files: string[], summary: RunSummary): Promise<number> {
  let totalSegments = 0;

  for (const file of files) {
    const relative = path.relative(settings.inputDir, file);
    try {
      const document = segmentWithSettings(await readText(file), settings);
      const translatable = document.countTranslatable();
      totalSegments += translatable;
      summary.filesProcessed++;
      logger.info(`[DRY RUN] ${relative} -> ${translatable} segments`);
    } catch (error) {
      summary.failures.push(`${file}: ${errorMessage(error)}`);
    }
  }

  summary.totalSegments = totalSegments;
  logger.info(`Total files: ${summary.filesProcessed}, segments requiring translation: ${totalSegments}`);
  return summary.failures.length > 0 ? 1 : 0;
}

function logSummary(summary: RunSummary): void {
  logger.info('='.repeat(60));
  logger.info('Summary');
  logger.info(`Files processed: ${summary.filesProcessed}`);
  logger.info(`Segments translated: ${summary.totalSegments} (cached: ${summary.cachedSegments})`);
  logger.info(`API calls: ${summary.apiCalls}`);
  if (summary.batches) {
    logger.info(`Batches submitted: ${summary.batches}`);
  }
  logger.info(`Retries performed: ${summary.retries}`);
  if (summary.promptTokens || summary.completionTokens) {
    logger.info(`Token usage: prompt=${summary.promptTokens}, completion=${summary.completionTokens}`);
  }
  logger.info(`Elapsed time: ${summary.elapsedSeconds.toFixed(2)}s`);
  if (summary.failures.length > 0) {
    logger.error('Failures', { count: summary.failures.length });
    for (const failure of summary.failures) {
      logger.error(` - ${failure}`);
    }
  }
  logger.info('='.repeat(60));
}

/**
 * Translate every matching document under `settings.inputDir`.
 * Failures are isolated per document and reported in the summary.
 */
export async function runTranslation(settings: Settings, deps: RunDependencies = {}): Promise<RunResult> {
  const startTime = Date.now();
  const summary = emptySummary();
  const finish = (exitCode: number): RunResult => {
    summary.elapsedSeconds = (Date.now() - startTime) / 1000;
    logSummary(summary);
    return { exitCode, summary };
  };

  let files: string[];
  try {
    files = await gatherFiles(settings.inputDir, {
      extensions: settings.extensions,
      include: settings.include,
      exclude: settings.exclude,
    });
  } catch (error) {
    logger.error('Input directory could not be read', { input: settings.inputDir, error: errorMessage(error) });
    summary.failures.push(`${settings.inputDir}: ${errorMessage(error)}`);
    return finish(1);
  }

  if (files.length === 0) {
    logger.info('No files matched the provided criteria.');
    return finish(0);
  }

  if (settings.dryRun) {
    return finish(await dryRun(settings, files, summary));
  }

  let glossary: Record<string, string> = {};
  if (settings.glossary) {
    try {
      glossary = await readGlossary(settings.glossary);
    } catch (error) {
      summary.failures.push(`Failed to read glossary: ${errorMessage(error)}`);
    }
  }

  const progress = new ProgressTracker();
  const hooks: Partial<TranslationHooks> = {
    onProgress: (count) => progress.advance(count),
    onRetry: (attempt, error, delayMs) => {
      logger.warn(`Retry attempt ${attempt} after error: ${errorMessage(error)}. Waiting ${(delayMs / 1000).toFixed(1)}s`);
    },
  };

  const cache = deps.cache ?? (settings.cacheDir ? new JsonFileTranslationCache(settings.cacheDir) : undefined);
  const remote = (deps.createRemote ?? defaultRemote)(settings, glossary);
  const translator = new BatchTranslator({
    remote,
    targetLang: settings.targetLang,
    sourceLang: settings.sourceLang,
    retry: settings.retry,
    timeoutMs: settings.timeoutSeconds * 1000,
    concurrency: settings.concurrency,
    maxBatchChars: settings.batchChars,
    maxBatchSegments: settings.batchSegments,
    maxPendingBatches: settings.maxPendingBatches,
    cache,
    hooks,
    backoff: deps.backoff,
  });
  const writer = deps.writer ?? new OutputWriter();

  const processDocument = async (job: DocumentJob): Promise<void> => {
    const destination = resolveOutputPath(settings, job.path);
    const inPlace = destination === job.path;
    const backupRequired = settings.backup && inPlace;
    let writes = 0;

    const emitter = settings.streamWrites
      ? new OrderedEmitter(job.document.segments, (chunk, { first }) => {
          writer.submit({
            path: destination,
            content: chunk,
            mode: first ? 'replace' : 'append',
            backup: backupRequired && first,
          });
          writes++;
        })
      : undefined;

    try {
      await translator.translateSegments(
        job.document.segments,
        emitter ? { onSegmentReady: () => emitter.notify() } : {}
      );
    } catch (error) {
      if (!(error instanceof TranslationError)) {
        throw error;
      }
      summary.failures.push(`${job.path}: ${error.message}`);
      if (writes > 0) {
        // Partially streamed output goes back to the original content
        writer.submit({ path: destination, content: job.original, mode: 'replace', backup: false });
      }
      return;
    }

    if (writes === 0) {
      const rendered = job.document.merge();
      if (!inPlace || rendered !== job.original) {
        writer.submit({ path: destination, content: rendered, mode: 'replace', backup: backupRequired });
      }
    }
    logger.debug('Document translated', { path: job.path, segments: job.document.segments.length, writes });
  };

  const workerCount = Math.max(1, settings.concurrency);
  const documents = new PQueue({ concurrency: workerCount });
  let writeFailures: string[] = [];

  try {
    for (const file of files) {
      let job: DocumentJob;
      try {
        const original = await readText(file);
        job = { path: file, original, document: segmentWithSettings(original, settings) };
      } catch (error) {
        summary.failures.push(`${file}: ${errorMessage(error)}`);
        continue;
      }

      progress.addTotal(job.document.segments.length);
      summary.filesProcessed++;

      // Bounded hand-off: at most workerCount * 2 documents wait in memory
      await documents.onSizeLessThan(workerCount * 2);
      documents.add(() => processDocument(job)).catch((error: unknown) => {
        summary.failures.push(`${file}: ${errorMessage(error)}`);
      });
    }

    await documents.onIdle();
  } finally {
    writeFailures = await writer.drain();
    if (cache) {
      await cache.close();
    }
  }

  summary.failures.push(...writeFailures);
  Object.assign(summary, translator.stats);
  return finish(summary.failures.length > 0 ? 1 : 0);
}
