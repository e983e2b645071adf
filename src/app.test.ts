import type { Server } from 'http';
import axios, { type AxiosInstance } from 'axios';
import { afterEach, describe, it, expect } from 'vitest';
import { createApp } from './app.js';
import type { RemoteSubmitResult, RemoteTranslator } from './types/translation.types.js';

class StubRemote implements RemoteTranslator {
  readonly model = 'test-model';

  constructor(private readonly fail = false) {}

  async submit(texts: string[]): Promise<RemoteSubmitResult> {
    if (this.fail) {
      throw new Error('upstream unavailable');
    }
    return { translations: texts.map((text) => `[fr] ${text}`), usage: { promptTokens: 4, completionTokens: 2 } };
  }
}

let server: Server | undefined;

afterEach(async () => {
  if (server) {
    const closing = server;
    server = undefined;
    await new Promise<void>((resolve, reject) => closing.close((error) => (error ? reject(error) : resolve())));
  }
});

async function start(fail = false): Promise<AxiosInstance> {
  const app = createApp({
    hasApiKey: true,
    createRemote: () => new StubRemote(fail),
    translator: { retry: 1 },
  });
  const listening = app.listen(0, '127.0.0.1');
  server = listening;
  await new Promise<void>((resolve) => listening.once('listening', () => resolve()));
  const address = listening.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Expected a TCP address');
  }
  return axios.create({ baseURL: `http://127.0.0.1:${address.port}`, validateStatus: () => true });
}

describe('HTTP app', () => {
  it('reports health', async () => {
    const http = await start();

    const response = await http.get('/health');

    expect(response.status).toBe(200);
    expect(response.data).toMatchObject({ status: 'ok', hasApiKey: true });
  });

  it('translates a document and remembers the run', async () => {
    const http = await start();

    const response = await http.post('/translate', {
      text: 'Hello.\n```\ncode\n```\n',
      targetLang: 'fr',
    });

    expect(response.status).toBe(200);
    expect(response.data).toMatchObject({
      translation: '[fr] Hello.\n```\ncode\n```\n',
      segments: 2,
      stats: { totalSegments: 1, apiCalls: 1, batches: 1, promptTokens: 4, completionTokens: 2 },
    });

    const status = await http.get('/status');
    expect(status.data.lastRun).toMatchObject({ segments: 2, stats: { apiCalls: 1 } });
  });

  it('rejects an invalid body', async () => {
    const http = await start();

    const response = await http.post('/translate', { text: 42 });

    expect(response.status).toBe(400);
    expect(response.data.issues).toEqual([
      'text: Expected string, received number',
      'targetLang: Required',
    ]);
  });

  it('answers 502 when the translation fails', async () => {
    const http = await start(true);

    const response = await http.post('/translate', { text: 'Hello.', targetLang: 'fr' });

    expect(response.status).toBe(502);
    expect(response.data).toEqual({ error: 'Translation failed', message: 'upstream unavailable' });
  });

  it('answers 404 for unknown routes', async () => {
    const http = await start();

    const response = await http.get('/nope');

    expect(response.status).toBe(404);
    expect(response.data).toEqual({ error: 'Not Found', path: '/nope' });
  });
});
