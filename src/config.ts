/**
 * Configuration management for docrelay
 *
 * Precedence: CLI flags > config file > environment > defaults.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import logger from './logger.js';
import { ConfigError } from './errors.js';
import { DEFAULT_MAX_CHARS } from './segmenter.js';
import { DEFAULT_BATCH_CHARS, DEFAULT_BATCH_SEGMENTS, DEFAULT_RETRY } from './translator.js';

export const DEFAULT_MODEL = 'openrouter/auto';
export const DEFAULT_TIMEOUT_SECONDS = 60;
export const DEFAULT_CONFIG_FILENAMES = ['docrelay.config.json'];

export type ConfigRecord = Record<string, unknown>;

export const SettingsSchema = z
  .object({
    inputDir: z.string({ required_error: '--input is required' }).min(1, '--input is required'),
    outputDir: z.string().optional(),
    extensions: z.array(z.string()).min(1),
    targetLang: z.string({ required_error: '--target-lang is required' }).min(1, '--target-lang is required'),
    sourceLang: z.string().min(1),
    model: z.string().min(1),
    concurrency: z.coerce.number().int().min(1),
    maxPendingBatches: z.coerce.number().int().min(1),
    include: z.array(z.string()),
    exclude: z.array(z.string()),
    maxChars: z.coerce.number().int(),
    splitThreshold: z.coerce.number().int().positive('split_threshold must be a positive integer').optional(),
    chunkStrategy: z.string(),
    translateCode: z.boolean(),
    translateFrontmatter: z.boolean(),
    dryRun: z.boolean(),
    backup: z.boolean(),
    streamWrites: z.boolean(),
    retry: z.coerce.number().int().min(1),
    timeoutSeconds: z.coerce.number().positive(),
    glossary: z.string().optional(),
    cacheDir: z.string().optional(),
    apiKey: z.string(),
    debug: z.boolean(),
    batchChars: z.coerce.number().int(),
    batchSegments: z.coerce.number().int(),
  })
  .superRefine((settings, ctx) => {
    if (!settings.dryRun && !settings.apiKey) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['apiKey'],
        message: 'OpenRouter API key is required via --api-key or OPENROUTER_API_KEY',
      });
    }
  });

export type Settings = z.infer<typeof SettingsSchema>;

/**
 * Load an explicit .env file on top of whatever dotenv/config already loaded
 */
export function loadEnvFile(envPath?: string): void {
  if (!envPath) {
    return;
  }
  const result = dotenv.config({ path: envPath });
  if (result.error) {
    throw new ConfigError(`Failed to load env file ${envPath}: ${result.error.message}`);
  }
}

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read the JSON config file. Without an explicit path the default file names
 * are probed in `cwd`; a missing file yields an empty config.
 */
export function loadConfigFile(explicitPath?: string, cwd: string = process.cwd()): ConfigRecord {
  const candidates = explicitPath
    ? [path.resolve(cwd, explicitPath)]
    : DEFAULT_CONFIG_FILENAMES.map((name) => path.join(cwd, name));

  for (const candidate of candidates) {
    if (!fs.existsSync(candidate)) {
      continue;
    }
    if (path.extname(candidate).toLowerCase() !== '.json') {
      throw new ConfigError(`Unsupported config format: ${path.extname(candidate)}`);
    }

    let data: unknown;
    try {
      const text = fs.readFileSync(candidate, 'utf-8');
      data = JSON.parse(text || '{}');
    } catch (error) {
      throw new ConfigError(`Failed to parse ${candidate}: ${error instanceof Error ? error.message : String(error)}`);
    }

    if (!isRecord(data)) {
      throw new ConfigError('The configuration root must be an object');
    }

    logger.debug('Loaded config file', { path: candidate });
    return data;
  }

  if (explicitPath) {
    logger.warn('Config file not found, continuing with defaults', { path: explicitPath });
  }
  return {};
}

/**
 * Merge two config objects recursively without mutating either
 */
export function mergeConfig(base: ConfigRecord, override: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const existing = result[key];
    result[key] = isRecord(existing) && isRecord(value) ? mergeConfig(existing, value) : value;
  }
  return result;
}

function pick(...values: unknown[]): unknown {
  return values.find((value) => value !== undefined && value !== null && value !== '');
}

function pickString(...values: unknown[]): string | undefined {
  const value = pick(...values);
  return value === undefined ? undefined : String(value);
}

export function resolveBool(values: unknown[], fallback: boolean): boolean {
  for (const value of values) {
    if (typeof value === 'boolean') {
      return value;
    }
    if (typeof value === 'string') {
      const lowered = value.toLowerCase();
      if (['true', '1', 'yes', 'on'].includes(lowered)) {
        return true;
      }
      if (['false', '0', 'no', 'off'].includes(lowered)) {
        return false;
      }
    }
  }
  return fallback;
}

/**
 * Accept "a,b", ["a", "b,c"] or nothing
 */
export function toList(value: unknown): string[] {
  const items = Array.isArray(value) ? value : typeof value === 'string' ? [value] : [];
  return items
    .filter((item): item is string => typeof item === 'string')
    .flatMap((item) => item.split(','))
    .map((item) => item.trim())
    .filter(Boolean);
}

export function defaultConcurrency(): number {
  return Math.min(8, Math.max(2, os.cpus().length || 4));
}

export interface ResolveOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/**
 * Build validated settings from CLI overrides, the config file and the environment.
 *
 * @throws {ConfigError} listing every invalid field
 */
export function resolveSettings(cli: ConfigRecord, options: ResolveOptions = {}): Settings {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  const fileConfig = loadConfigFile(pickString(cli.config), cwd);
  const merged = mergeConfig(fileConfig, cli);
  const chunk = isRecord(merged.chunk) ? merged.chunk : {};
  const batch = isRecord(merged.batch) ? merged.batch : {};

  const input = pickString(merged.input, merged.inputDir);
  const output = pickString(merged.output, merged.outputDir);
  const extensions = toList(pick(merged.ext, merged.extensions));
  const concurrency = pick(merged.concurrency) ?? defaultConcurrency();
  const backupFlag = resolveBool([merged.backup], true);
  const overwrite = resolveBool([merged.overwrite, merged.noBackup], false);
  const glossary = pickString(merged.glossary);
  const cacheDir = pickString(merged.cacheDir, env.DOCRELAY_CACHE_DIR);

  const candidate = {
    inputDir: input ? path.resolve(cwd, input) : undefined,
    outputDir: output ? path.resolve(cwd, output) : undefined,
    extensions: extensions.length > 0 ? extensions : ['md'],
    targetLang: pickString(merged.targetLang),
    sourceLang: pickString(merged.sourceLang) ?? 'auto',
    model: pickString(merged.model, env.OPENROUTER_MODEL, env.MODEL) ?? DEFAULT_MODEL,
    concurrency,
    maxPendingBatches: pick(merged.maxPendingBatches) ?? Number(concurrency) * 2,
    include: toList(merged.include),
    exclude: toList(merged.exclude),
    maxChars: pick(merged.maxChars, chunk.maxChars) ?? DEFAULT_MAX_CHARS,
    splitThreshold: pick(merged.splitThreshold, chunk.splitThreshold, env.DOCRELAY_SPLIT_THRESHOLD),
    chunkStrategy: pickString(merged.chunkStrategy, chunk.strategy) ?? 'markdown',
    translateCode: resolveBool([merged.translateCode, chunk.translateCode], false),
    translateFrontmatter: resolveBool([merged.translateFrontmatter, chunk.translateFrontmatter], false),
    dryRun: resolveBool([merged.dryRun], false),
    backup: backupFlag && !overwrite,
    streamWrites: resolveBool([merged.streamWrites], false),
    retry: pick(merged.retry) ?? DEFAULT_RETRY,
    timeoutSeconds: pick(merged.timeout) ?? DEFAULT_TIMEOUT_SECONDS,
    glossary: glossary ? path.resolve(cwd, glossary) : undefined,
    cacheDir: cacheDir ? path.resolve(cwd, cacheDir) : undefined,
    apiKey: pickString(merged.apiKey, env.OPENROUTER_API_KEY) ?? '',
    debug: resolveBool([merged.debug], false),
    batchChars: pick(merged.batchChars, batch.chars, batch.maxChars) ?? DEFAULT_BATCH_CHARS,
    batchSegments: pick(merged.batchSegments, batch.segments, batch.maxSegments) ?? DEFAULT_BATCH_SEGMENTS,
  };

  const parsed = SettingsSchema.safeParse(candidate);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'settings'}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration:\n  ${issues.join('\n  ')}`);
  }

  return parsed.data;
}
