import { Command } from 'commander';
import type { ConfigRecord } from './config.js';

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('docrelay')
    .description('Translate Markdown documents at scale through OpenRouter')
    .option('--config <path>', 'Path to a JSON configuration file')
    .option('--env-file <path>', 'Path to a .env file containing OpenRouter credentials')
    .option('-i, --input <dir>', 'Input directory')
    .option('-o, --output <dir>', 'Output directory (mirrors the input structure)')
    .option('--ext <list>', 'File extensions to include (comma separated, repeatable)', collect)
    .option('-t, --target-lang <lang>', 'Target language code')
    .option('-s, --source-lang <lang>', "Source language code or 'auto'")
    .option('-m, --model <id>', 'OpenRouter model identifier')
    .option('-c, --concurrency <n>', 'Number of concurrent API calls')
    .option('--max-pending-batches <n>', 'Batches allowed in flight per document')
    .option('--include <glob>', 'Pattern to explicitly include (repeatable)', collect)
    .option('--exclude <glob>', 'Pattern to exclude (repeatable)', collect)
    .option('--max-chars <n>', 'Maximum characters per translation segment')
    .option('--split-threshold <n>', 'Documents at or below this many characters are never split')
    .option('--chunk-strategy <name>', 'Segmentation strategy')
    .option('--translate-code', 'Translate fenced code blocks as well')
    .option('--no-translate-code', 'Keep fenced code blocks untouched')
    .option('--translate-frontmatter', 'Translate YAML front matter')
    .option('--no-translate-frontmatter', 'Keep YAML front matter untouched')
    .option('--dry-run', 'List files and segments without translating')
    .option('--no-backup', 'Do not create .bak files when overwriting input')
    .option('--overwrite', 'Alias for --no-backup')
    .option('--retry <n>', 'Maximum attempts per request')
    .option('--timeout <seconds>', 'API request timeout in seconds')
    .option('--glossary <path>', 'Glossary file (JSON or CSV)')
    .option('--cache-dir <dir>', 'Directory for the persistent translation cache')
    .option('--stream-writes', 'Write translated output as segments complete')
    .option('--no-stream-writes', 'Write each document once it is fully translated')
    .option('--batch-chars <n>', 'Maximum characters per API request batch')
    .option('--batch-segments <n>', 'Maximum segments per API request batch')
    .option('--api-key <key>', 'OpenRouter API key')
    .option('--debug', 'Log OpenRouter request/response details');

  return program;
}

/**
 * Keep only options the user actually passed, so defaults declared by
 * commander (e.g. `backup: true` from `--no-backup`) never mask the config file.
 */
export function explicitOptions(program: Command): ConfigRecord {
  const options = program.opts();
  const explicit: ConfigRecord = {};
  for (const [key, value] of Object.entries(options)) {
    if (program.getOptionValueSource(key) === 'cli') {
      explicit[key] = value;
    }
  }
  return explicit;
}
