import 'dotenv/config';
import logger, { errorMessage } from './logger.js';
import { createApp } from './app.js';
import { DEFAULT_MODEL } from './config.js';
import { OpenRouterClient } from './openrouter.js';
import { MemoryTranslationCache } from './cache.js';

const PORT = Number(process.env.PORT) || 3000;
const apiKey = process.env.OPENROUTER_API_KEY ?? '';
const model = process.env.OPENROUTER_MODEL || process.env.MODEL || DEFAULT_MODEL;

if (!apiKey) {
  logger.warn('OPENROUTER_API_KEY is not set, /translate requests will fail');
}

const app = createApp({
  hasApiKey: apiKey.length > 0,
  createRemote: (targetLang) => new OpenRouterClient({ apiKey, model, targetLang }),
  translator: { cache: new MemoryTranslationCache() },
});

const server = app.listen(PORT, () => {
  logger.info(`HTTP server listening on port ${PORT}`);
  logger.info('Available endpoints:');
  logger.info('  GET  /health     - Health check');
  logger.info('  POST /translate  - Translate a document');
  logger.info('  GET  /status     - Stats of the last translation');
});

/**
 * Graceful shutdown
 */
function shutdown(signal: string): void {
  logger.info(`Received ${signal}, shutting down gracefully...`);
  server.close((error) => {
    if (error) {
      logger.error('Error during shutdown', { error: error.message });
      process.exit(1);
    }
    logger.info('Shutdown complete');
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled promise rejection', { reason: errorMessage(reason) });
  process.exit(1);
});
