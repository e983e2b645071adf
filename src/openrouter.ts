/**
 * OpenRouter adapter for the remote translation port
 *
 * One chat-completion call per request. Several texts travel in one call
 * wrapped in numbered markers, and the model is asked to answer with the
 * translations joined by a reserved delimiter line.
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import logger from './logger.js';
import { RemoteRequestError } from './errors.js';
import type {
  RemoteSubmitOptions,
  RemoteSubmitResult,
  RemoteTranslator,
  TokenUsage,
} from './types/translation.types.js';

export const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';
export const BATCH_DELIMITER_TOKEN = '<<<DOCRELAY_SEGMENT_BREAK>>>';
export const BATCH_DELIMITER = `\n${BATCH_DELIMITER_TOKEN}\n`;

const DEFAULT_TIMEOUT_MS = 60000;
const PREVIEW_LENGTH = 120;

const contentPartSchema = z.union([
  z.string(),
  z.object({ text: z.string().optional() }).passthrough(),
]);

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.union([z.string(), z.array(contentPartSchema)]),
        }),
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
    })
    .nullish(),
});

type MessageContent = z.infer<typeof chatCompletionSchema>['choices'][number]['message']['content'];

export interface OpenRouterClientOptions {
  apiKey: string;
  model: string;
  targetLang: string;
  baseURL?: string;
  timeoutMs?: number;
  glossary?: Record<string, string>;
  systemPrompt?: string;
  debug?: boolean;
  // Injected in tests; built from the options above otherwise
  http?: AxiosInstance;
}

interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

/**
 * Flatten a content field that may be a plain string or a list of parts
 */
export function normalizeContent(content: MessageContent): string {
  if (typeof content === 'string') {
    return content;
  }
  return content.map((part) => (typeof part === 'string' ? part : part.text ?? '')).join('');
}

/**
 * Split a delimiter-joined batch answer back into one string per segment.
 * Empty fragments left behind by a trailing delimiter are dropped.
 */
export function parseBatchResponse(message: string): string[] {
  const fragments = message.split(BATCH_DELIMITER_TOKEN).map((fragment) => fragment.trim());
  while (fragments.length > 0 && fragments[fragments.length - 1] === '') {
    fragments.pop();
  }
  return fragments;
}

function preview(text: string): string {
  const flat = text.replace(/\n/g, ' ');
  return flat.length > PREVIEW_LENGTH ? `${flat.slice(0, PREVIEW_LENGTH - 3)}...` : flat;
}

export function buildSystemPrompt(targetLang: string, glossary: Record<string, string> = {}): string {
  const lines = [
    'You are a professional technical documentation translator.',
    `Translate all provided text into ${targetLang} while preserving Markdown structure and formatting.`,
    'Do not translate fenced code blocks, inline code spans, URLs, or image paths.',
    'Do not add commentary or explanations; respond with the translated text only.',
  ];

  const entries = Object.entries(glossary);
  if (entries.length > 0) {
    lines.push('Glossary (use these translations verbatim):');
    for (const [source, target] of entries) {
      lines.push(`- ${source} -> ${target}`);
    }
  }

  return lines.join('\n');
}

function sourceLine(sourceLang: string): string {
  return sourceLang !== 'auto'
    ? `The source language is ${sourceLang}.`
    : 'Detect the source language automatically.';
}

export function buildSinglePrompt(text: string, options: RemoteSubmitOptions): string {
  return [
    sourceLine(options.sourceLang),
    `The target language is ${options.targetLang}.`,
    'Translate the following content. Return only the translated text without wrapping quotes.',
    '---',
    text,
    '---',
  ].join('\n');
}

export function buildBatchPrompt(texts: string[], options: RemoteSubmitOptions): string {
  const lines = [
    sourceLine(options.sourceLang),
    `The target language is ${options.targetLang}.`,
    `Translate each of the ${texts.length} segments below independently and keep their order.`,
    `Return exactly ${texts.length} translations separated by a line containing only ${BATCH_DELIMITER_TOKEN}.`,
    'Do not repeat the segment markers and do not add anything else.',
  ];

  texts.forEach((text, i) => {
    lines.push(`<<<SEGMENT ${i + 1}>>>`, text, `<<<END SEGMENT ${i + 1}>>>`);
  });

  return lines.join('\n');
}

export class OpenRouterClient implements RemoteTranslator {
  readonly model: string;
  private readonly http: AxiosInstance;
  private readonly systemPrompt: string;
  private readonly debug: boolean;

  constructor(options: OpenRouterClientOptions) {
    this.model = options.model;
    this.debug = options.debug ?? false;
    this.systemPrompt = options.systemPrompt ?? buildSystemPrompt(options.targetLang, options.glossary);
    this.http =
      options.http ??
      axios.create({
        baseURL: options.baseURL ?? OPENROUTER_BASE_URL,
        timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        headers: {
          Authorization: `Bearer ${options.apiKey}`,
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
      });
  }

  async submit(texts: string[], options: RemoteSubmitOptions): Promise<RemoteSubmitResult> {
    if (texts.length === 0) {
      return { translations: [] };
    }

    if (texts.length === 1) {
      const { message, usage } = await this.complete(buildSinglePrompt(texts[0], options), texts[0], options);
      if (!message.trim()) {
        throw new RemoteRequestError('OpenRouter returned an empty translation', { retryable: true });
      }
      return { translations: [message], usage, raw: message };
    }

    const joined = texts.join('\n');
    const { message, usage } = await this.complete(buildBatchPrompt(texts, options), joined, options);
    if (!message.trim()) {
      throw new RemoteRequestError('OpenRouter returned an empty batch translation', { retryable: true });
    }

    const translations = parseBatchResponse(message);
    const blank = translations.findIndex((translation) => translation === '');
    if (blank !== -1) {
      throw new RemoteRequestError(`OpenRouter returned an empty translation for segment ${blank + 1}`, {
        retryable: true,
      });
    }

    return { translations, usage, raw: message };
  }

  private async complete(
    userPrompt: string,
    sourceText: string,
    options: RemoteSubmitOptions
  ): Promise<{ message: string; usage?: TokenUsage }> {
    const messages: ChatMessage[] = [
      { role: 'system', content: this.systemPrompt },
      { role: 'user', content: userPrompt },
    ];

    if (this.debug) {
      logger.debug('OpenRouter request', {
        model: this.model,
        target: options.targetLang,
        chars: sourceText.length,
        preview: preview(sourceText),
      });
    }

    let data: unknown;
    try {
      const response = await this.http.post('/chat/completions', {
        model: this.model,
        temperature: 0,
        messages,
      }, { signal: options.signal });

      if (this.debug) {
        logger.debug('OpenRouter response', {
          status: response.status,
          requestId: response.headers['x-request-id'] ?? 'n/a',
        });
      }
      data = response.data;
    } catch (error) {
      throw this.toRequestError(error);
    }

    const parsed = chatCompletionSchema.safeParse(data);
    if (!parsed.success) {
      throw new RemoteRequestError('Unexpected response format from OpenRouter API', {
        retryable: true,
        cause: parsed.error,
      });
    }

    const message = normalizeContent(parsed.data.choices[0].message.content);
    const usage = parsed.data.usage
      ? {
          promptTokens: parsed.data.usage.prompt_tokens ?? 0,
          completionTokens: parsed.data.usage.completion_tokens ?? 0,
        }
      : undefined;

    if (this.debug) {
      logger.debug('OpenRouter translation', { usage, preview: preview(message) });
    }

    return { message, usage };
  }

  private toRequestError(error: unknown): RemoteRequestError {
    if (axios.isAxiosError(error)) {
      const status = error.response?.status;
      const body: unknown = error.response?.data;
      const detail = typeof body === 'string' ? body : body ? JSON.stringify(body) : error.message;

      // 429 and 5xx are retryable
      if (status === 429 || (status !== undefined && status >= 500)) {
        return new RemoteRequestError(`Server error: ${status} ${detail}`, { status, retryable: true, cause: error });
      }
      if (status !== undefined) {
        return new RemoteRequestError(`OpenRouter API returned status ${status}: ${detail}`, {
          status,
          retryable: false,
          cause: error,
        });
      }
      return new RemoteRequestError(`Network error: ${error.message}`, { retryable: true, cause: error });
    }

    return new RemoteRequestError(error instanceof Error ? error.message : String(error), {
      retryable: true,
      cause: error,
    });
  }
}
