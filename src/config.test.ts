import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { loadConfigFile, mergeConfig, resolveBool, resolveSettings, toList } from './config.js';
import { ConfigError } from './errors.js';

function captureConfigError(run: () => unknown): ConfigError {
  try {
    run();
  } catch (error) {
    if (error instanceof ConfigError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a ConfigError');
}

describe('config helpers', () => {
  it('merges nested records without mutating the inputs', () => {
    const base = { chunk: { maxChars: 100, strategy: 'markdown' }, model: 'a' };
    const merged = mergeConfig(base, { chunk: { maxChars: 200 } });

    expect(merged).toEqual({ chunk: { maxChars: 200, strategy: 'markdown' }, model: 'a' });
    expect(base.chunk.maxChars).toBe(100);
  });

  it('resolves the first recognizable boolean', () => {
    expect(resolveBool([undefined, 'yes'], false)).toBe(true);
    expect(resolveBool(['off', true], true)).toBe(false);
    expect(resolveBool(['maybe'], true)).toBe(true);
  });

  it('flattens comma separated lists', () => {
    expect(toList(['md, mdx', 'txt'])).toEqual(['md', 'mdx', 'txt']);
    expect(toList('a,,b')).toEqual(['a', 'b']);
    expect(toList(undefined)).toEqual([]);
  });
});

describe('resolveSettings', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'docrelay-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('fills defaults around the required options', () => {
    const settings = resolveSettings(
      { input: 'docs', targetLang: 'ja', concurrency: '3' },
      { env: { OPENROUTER_API_KEY: 'test-secret' }, cwd: dir }
    );

    expect(settings).toMatchObject({
      inputDir: path.join(dir, 'docs'),
      outputDir: undefined,
      extensions: ['md'],
      targetLang: 'ja',
      sourceLang: 'auto',
      model: 'openrouter/auto',
      concurrency: 3,
      maxPendingBatches: 6,
      maxChars: 4000,
      chunkStrategy: 'markdown',
      translateCode: false,
      translateFrontmatter: false,
      backup: true,
      streamWrites: false,
      retry: 3,
      timeoutSeconds: 60,
      apiKey: 'test-secret',
      batchChars: 16000,
      batchSegments: 6,
    });
  });

  it('lets CLI flags override the config file and the file override the environment', () => {
    fs.writeFileSync(
      path.join(dir, 'docrelay.config.json'),
      JSON.stringify({
        input: 'src-docs',
        targetLang: 'de',
        model: 'file/model',
        chunk: { maxChars: 1200, splitThreshold: 3000 },
        batch: { segments: 4 },
      })
    );

    const settings = resolveSettings(
      { targetLang: 'fr', overwrite: true },
      { env: { OPENROUTER_API_KEY: 'test-secret', OPENROUTER_MODEL: 'env/model' }, cwd: dir }
    );

    expect(settings.inputDir).toBe(path.join(dir, 'src-docs'));
    expect(settings.targetLang).toBe('fr');
    expect(settings.model).toBe('file/model');
    expect(settings.maxChars).toBe(1200);
    expect(settings.splitThreshold).toBe(3000);
    expect(settings.batchSegments).toBe(4);
    expect(settings.backup).toBe(false);
  });

  it('reads the split threshold from the environment', () => {
    const settings = resolveSettings(
      { input: 'docs', targetLang: 'fr' },
      { env: { OPENROUTER_API_KEY: 'test-secret', DOCRELAY_SPLIT_THRESHOLD: '2500' }, cwd: dir }
    );

    expect(settings.splitThreshold).toBe(2500);
  });

  it('does not require an API key for a dry run', () => {
    const settings = resolveSettings({ input: 'docs', targetLang: 'fr', dryRun: true }, { env: {}, cwd: dir });

    expect(settings.apiKey).toBe('');
  });

  it('lists every invalid field', () => {
    const error = captureConfigError(() => resolveSettings({ splitThreshold: '0' }, { env: {}, cwd: dir }));

    expect(error.message.split('\n')).toEqual([
      'Invalid configuration:',
      '  inputDir: --input is required',
      '  targetLang: --target-lang is required',
      '  splitThreshold: split_threshold must be a positive integer',
    ]);
  });

  it('requires an API key outside dry runs', () => {
    const error = captureConfigError(() =>
      resolveSettings({ input: 'docs', targetLang: 'fr' }, { env: {}, cwd: dir })
    );

    expect(error.message).toBe(
      'Invalid configuration:\n  apiKey: OpenRouter API key is required via --api-key or OPENROUTER_API_KEY'
    );
  });
});

describe('loadConfigFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'docrelay-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('returns an empty config for a missing explicit file', () => {
    expect(loadConfigFile('absent.json', dir)).toEqual({});
  });

  it('rejects unsupported formats and non-object roots', () => {
    fs.writeFileSync(path.join(dir, 'conf.yaml'), 'a: b');
    fs.writeFileSync(path.join(dir, 'list.json'), '[1, 2]');

    expect(() => loadConfigFile('conf.yaml', dir)).toThrow('Unsupported config format: .yaml');
    expect(() => loadConfigFile('list.json', dir)).toThrow('The configuration root must be an object');
  });
});
