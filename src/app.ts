import express, { type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';
import logger, { errorMessage } from './logger.js';
import { segmentDocument } from './segmenter.js';
import { BatchTranslator, type BatchTranslatorOptions } from './translator.js';
import { SegmentationError, TranslationError } from './errors.js';
import type { RemoteTranslator, TranslatorStats } from './types/translation.types.js';

export const TranslateRequestSchema = z.object({
  text: z.string(),
  targetLang: z.string().min(1),
  sourceLang: z.string().min(1).optional(),
  maxChars: z.number().int().optional(),
  splitThreshold: z.number().int().positive().optional(),
  translateCode: z.boolean().optional(),
  translateFrontmatter: z.boolean().optional(),
});

export type TranslateRequest = z.infer<typeof TranslateRequestSchema>;

export interface AppDependencies {
  createRemote: (targetLang: string) => RemoteTranslator;
  hasApiKey: boolean;
  translator?: Omit<BatchTranslatorOptions, 'remote' | 'targetLang' | 'sourceLang'>;
}

interface LastRun {
  stats: TranslatorStats;
  segments: number;
  finishedAt: string;
}

/**
 * Build the HTTP surface. Each request gets its own translator; the last
 * successful run's stats are kept for `/status`.
 */
export function createApp(deps: AppDependencies): express.Express {
  const app = express();
  let lastRun: LastRun | null = null;

  app.use(express.json({ limit: '5mb' }));

  // Request logging middleware
  app.use((req, _res, next) => {
    logger.info(`${req.method} ${req.path}`, {
      ip: req.ip,
      userAgent: req.get('user-agent'),
    });
    next();
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      hasApiKey: deps.hasApiKey,
    });
  });

  app.post('/translate', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = TranslateRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: 'Invalid request body',
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`),
      });
      return;
    }

    const body = parsed.data;
    try {
      const document = segmentDocument(body.text, {
        maxChars: body.maxChars,
        splitThreshold: body.splitThreshold,
        preserveCode: !body.translateCode,
        preserveFrontmatter: !body.translateFrontmatter,
      });

      const translator = new BatchTranslator({
        ...deps.translator,
        remote: deps.createRemote(body.targetLang),
        targetLang: body.targetLang,
        sourceLang: body.sourceLang,
      });
      await translator.translateSegments(document.segments);

      const stats = translator.stats;
      lastRun = { stats, segments: document.segments.length, finishedAt: new Date().toISOString() };
      res.json({ translation: document.merge(), segments: document.segments.length, stats });
    } catch (error) {
      if (error instanceof SegmentationError) {
        res.status(400).json({ error: error.message });
        return;
      }
      if (error instanceof TranslationError) {
        logger.error('Translation request failed', { error: error.message });
        res.status(502).json({ error: 'Translation failed', message: error.message });
        return;
      }
      next(error);
    }
  });

  app.get('/status', (_req: Request, res: Response) => {
    res.json({
      lastRun,
      timestamp: new Date().toISOString(),
    });
  });

  /**
   * 404 handler
   */
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      error: 'Not Found',
      path: req.path,
    });
  });

  /**
   * Error handler
   */
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    // body-parser marks malformed JSON with a 4xx status
    const status = typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number' ? err.status : 500;
    if (status < 500) {
      res.status(status).json({ error: 'Invalid request body', message: errorMessage(err) });
      return;
    }

    logger.error('Express error', {
      error: errorMessage(err),
      stack: err instanceof Error ? err.stack : undefined,
      path: req.path,
    });

    res.status(500).json({
      error: 'Internal Server Error',
      message: process.env.NODE_ENV === 'development' ? errorMessage(err) : undefined,
    });
  });

  return app;
}
