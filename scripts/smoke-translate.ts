#!/usr/bin/env tsx
/**
 * Translate a small markdown sample against the live OpenRouter API
 *
 * Usage: tsx scripts/smoke-translate.ts [targetLang]
 */

import 'dotenv/config';
import { segmentDocument } from '../src/segmenter.js';
import { BatchTranslator } from '../src/translator.js';
import { OpenRouterClient } from '../src/openrouter.js';
import { DEFAULT_MODEL } from '../src/config.js';
import { errorMessage } from '../src/logger.js';

const SAMPLE = `---
title: Smoke test
---

# Getting started

Install the package and run the command below.

\`\`\`bash
npm install docrelay
\`\`\`

Every paragraph is translated separately. Code blocks stay as they are.
`;

async function smoke(): Promise<void> {
  const apiKey = process.env.OPENROUTER_API_KEY;
  if (!apiKey) {
    console.error('❌ OPENROUTER_API_KEY is not set');
    process.exit(1);
  }

  const targetLang = process.argv[2] ?? 'fr';
  const model = process.env.OPENROUTER_MODEL || DEFAULT_MODEL;
  const document = segmentDocument(SAMPLE, { maxChars: 200 });

  console.log(`🧪 Translating ${document.countTranslatable()} of ${document.segments.length} segments to ${targetLang}\n`);

  const translator = new BatchTranslator({
    remote: new OpenRouterClient({ apiKey, model, targetLang }),
    targetLang,
    hooks: {
      onRetry: (attempt, error) => console.log(`⚠️  Retry ${attempt}: ${errorMessage(error)}`),
    },
  });

  const started = Date.now();
  await translator.translateSegments(document.segments);

  console.log('═'.repeat(80));
  console.log(document.merge());
  console.log('═'.repeat(80));
  console.log('\n📈 Stats:', translator.stats);
  console.log(`  Duration: ${((Date.now() - started) / 1000).toFixed(2)}s`);
}

smoke().catch((error: unknown) => {
  console.error('❌ Smoke test failed:', errorMessage(error));
  process.exit(1);
});
