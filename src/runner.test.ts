import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { resolveOutputPath, runTranslation } from './runner.js';
import { resolveSettings, type ConfigRecord, type Settings } from './config.js';
import type { RemoteSubmitResult, RemoteTranslator, Sink, WriteTask } from './types/translation.types.js';

class UpperRemote implements RemoteTranslator {
  readonly model = 'test-model';
  readonly calls: string[][] = [];

  constructor(private readonly failOn?: string) {}

  async submit(texts: string[]): Promise<RemoteSubmitResult> {
    this.calls.push(texts);
    if (this.failOn && texts.some((text) => text.includes(this.failOn ?? ''))) {
      throw new Error('boom');
    }
    return { translations: texts.map((text) => text.toUpperCase()) };
  }
}

class RecordingSink implements Sink {
  readonly tasks: WriteTask[] = [];

  submit(task: WriteTask): void {
    this.tasks.push(task);
  }

  async drain(): Promise<string[]> {
    return [];
  }
}

const NO_BACKOFF = { initialDelayMs: 0, maxDelayMs: 0, jitterMinMs: 0, jitterMaxMs: 0 };

let dir: string;
let input: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'docrelay-run-'));
  input = path.join(dir, 'in');
  fs.mkdirSync(input);
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function write(relative: string, content: string): string {
  const full = path.join(input, relative);
  fs.mkdirSync(path.dirname(full), { recursive: true });
  fs.writeFileSync(full, content);
  return full;
}

function settingsFor(overrides: ConfigRecord = {}): Settings {
  return resolveSettings(
    { input, targetLang: 'fr', concurrency: 2, ...overrides },
    { env: { OPENROUTER_API_KEY: 'test-secret' }, cwd: dir }
  );
}

describe('resolveOutputPath', () => {
  it('mirrors the input tree under the output directory', () => {
    expect(resolveOutputPath({ inputDir: '/docs', outputDir: '/out' }, '/docs/guide/a.md')).toBe('/out/guide/a.md');
    expect(resolveOutputPath({ inputDir: '/docs', outputDir: undefined }, '/docs/a.md')).toBe('/docs/a.md');
  });
});

describe('runTranslation', () => {
  it('translates documents in place and keeps backups', async () => {
    const first = write('a.md', 'Hello.\n');
    const second = write('sub/b.md', '```\ncode\n```\nWorld.\n');
    const remote = new UpperRemote();

    const { exitCode, summary } = await runTranslation(settingsFor(), {
      createRemote: () => remote,
      backoff: NO_BACKOFF,
    });

    expect(exitCode).toBe(0);
    expect(fs.readFileSync(first, 'utf-8')).toBe('HELLO.\n');
    expect(fs.readFileSync(`${first}.bak`, 'utf-8')).toBe('Hello.\n');
    expect(fs.readFileSync(second, 'utf-8')).toBe('```\ncode\n```\nWORLD.\n');
    expect(summary).toMatchObject({ filesProcessed: 2, totalSegments: 2, apiCalls: 2, failures: [] });
  });

  it('writes into a mirrored output directory without touching the input', async () => {
    const source = write('guide/a.md', 'Hello.\n');
    const output = path.join(dir, 'out');

    const { exitCode } = await runTranslation(settingsFor({ output }), {
      createRemote: () => new UpperRemote(),
    });

    expect(exitCode).toBe(0);
    expect(fs.readFileSync(path.join(output, 'guide', 'a.md'), 'utf-8')).toBe('HELLO.\n');
    expect(fs.readFileSync(source, 'utf-8')).toBe('Hello.\n');
    expect(fs.existsSync(`${source}.bak`)).toBe(false);
  });

  it('leaves an unchanged document alone', async () => {
    const source = write('code.md', '```\nonly code\n```\n');
    const remote = new UpperRemote();

    const { exitCode } = await runTranslation(settingsFor(), { createRemote: () => remote });

    expect(exitCode).toBe(0);
    expect(remote.calls).toEqual([]);
    expect(fs.existsSync(`${source}.bak`)).toBe(false);
  });

  it('streams a document as ordered replace and append writes', async () => {
    const source = write('doc.md', 'One.\n\nTwo.\n');
    const sink = new RecordingSink();

    const { exitCode } = await runTranslation(
      settingsFor({ streamWrites: true, maxChars: 6, batchSegments: 1 }),
      { createRemote: () => new UpperRemote(), writer: sink }
    );

    expect(exitCode).toBe(0);
    expect(sink.tasks.length).toBeGreaterThan(0);
    expect(sink.tasks.every((task) => task.path === source)).toBe(true);
    expect(sink.tasks.map((task) => task.mode)).toEqual(
      sink.tasks.map((_, i) => (i === 0 ? 'replace' : 'append'))
    );
    expect(sink.tasks[0].backup).toBe(true);
    expect(sink.tasks.map((task) => task.content).join('')).toBe('ONE.\n\nTWO.\n');
  });

  it('restores the original after a failed streamed document and carries on', async () => {
    const output = path.join(dir, 'out');
    write('bad.md', 'Fine.\n\nBroken.\n');
    write('good.md', 'Good.\n');
    const remote = new UpperRemote('Broken');

    const { exitCode, summary } = await runTranslation(
      settingsFor({ output, streamWrites: true, maxChars: 8, batchSegments: 1, retry: 1 }),
      { createRemote: () => remote, backoff: NO_BACKOFF }
    );

    expect(exitCode).toBe(1);
    expect(summary.failures).toEqual([`${path.join(input, 'bad.md')}: boom`]);
    expect(fs.readFileSync(path.join(output, 'bad.md'), 'utf-8')).toBe('Fine.\n\nBroken.\n');
    expect(fs.readFileSync(path.join(output, 'good.md'), 'utf-8')).toBe('GOOD.\n');
  });

  it('fails the run when an output write fails', async () => {
    const output = path.join(dir, 'out');
    fs.writeFileSync(output, 'not a directory');
    write('a.md', 'Hello.\n');

    const { exitCode, summary } = await runTranslation(settingsFor({ output }), {
      createRemote: () => new UpperRemote(),
    });

    expect(exitCode).toBe(1);
    expect(summary.filesProcessed).toBe(1);
    expect(summary.failures).toHaveLength(1);
    expect(summary.failures[0].startsWith(`${path.join(output, 'a.md')}: `)).toBe(true);
  });

  it('only counts segments on a dry run', async () => {
    write('a.md', '---\ntitle: x\n---\nOne.\n\nTwo.\n');
    const remote = new UpperRemote();

    const { exitCode, summary } = await runTranslation(settingsFor({ dryRun: true, maxChars: 6 }), {
      createRemote: () => remote,
    });

    expect(exitCode).toBe(0);
    expect(remote.calls).toEqual([]);
    expect(summary).toMatchObject({ filesProcessed: 1, totalSegments: 2 });
  });

  it('succeeds with nothing to do when no file matches', async () => {
    write('notes.txt', 'text');

    const { exitCode, summary } = await runTranslation(settingsFor(), { createRemote: () => new UpperRemote() });

    expect(exitCode).toBe(0);
    expect(summary.filesProcessed).toBe(0);
  });

  it('fails when the input directory cannot be read', async () => {
    const { exitCode, summary } = await runTranslation(settingsFor({ input: path.join(dir, 'missing') }), {
      createRemote: () => new UpperRemote(),
    });

    expect(exitCode).toBe(1);
    expect(summary.failures).toHaveLength(1);
  });
});
