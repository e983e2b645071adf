/**
 * Segmenter - Splits a document into ordered segments for translation
 *
 * Front matter and fenced code blocks become pass-through segments; the prose
 * in between is cut on paragraph, then sentence, then character boundaries so
 * that every piece fits the size limit.
 */

import { Segment, SegmentedDocument } from './document.js';
import { SegmentationError } from './errors.js';
import type { SegmentOptions } from './types/segment.types.js';

export const DEFAULT_MAX_CHARS = 4000;

const CODE_FENCE_PATTERN = /^([`~]{3,})/;
const SENTENCE_PATTERN = /.+?(?:[.!?。！？；;](?:\s|$)|$)/gs;
const PARAGRAPH_SPLIT_PATTERN = /(\n\s*\n)/;
const FRONT_MATTER_DELIMITER = '---';

/**
 * Split text into lines, keeping each line's terminator attached
 */
function splitLines(text: string): string[] {
  return text.split(/(?<=\n)/).filter((line) => line.length > 0);
}

/**
 * Extract a leading front matter block, delimiter lines included.
 * Returns null when the opening delimiter is never closed.
 */
function splitFrontMatter(text: string): { front: string; rest: string } | null {
  const lines = splitLines(text);
  if (lines.length === 0 || !lines[0].trim().startsWith(FRONT_MATTER_DELIMITER)) {
    return null;
  }

  for (let i = 1; i < lines.length; i++) {
    if (lines[i].trim().startsWith(FRONT_MATTER_DELIMITER)) {
      return {
        front: lines.slice(0, i + 1).join(''),
        rest: lines.slice(i + 1).join(''),
      };
    }
  }

  return null;
}

function splitSentences(text: string): string[] {
  return (text.match(SENTENCE_PATTERN) ?? []).filter((sentence) => sentence.length > 0);
}

/**
 * Length in code points, so a surrogate pair counts as one character
 */
export function charLength(text: string): number {
  return Array.from(text).length;
}

function hardWrap(text: string, size: number): string[] {
  const chars = Array.from(text);
  const pieces: string[] = [];
  for (let start = 0; start < chars.length; start += size) {
    pieces.push(chars.slice(start, start + size).join(''));
  }
  return pieces;
}

/**
 * Cut a block of prose into pieces no longer than `maxChars`.
 *
 * Paragraph separators are kept as their own tokens so that concatenating the
 * pieces gives back the input exactly.
 */
export function enforceMaxChars(text: string, maxChars: number): string[] {
  if (maxChars <= 0 || charLength(text) <= maxChars) {
    return [text];
  }

  const parts: string[] = [];
  let current = '';

  const flush = (): void => {
    if (current) {
      parts.push(current);
      current = '';
    }
  };

  for (const token of text.split(PARAGRAPH_SPLIT_PATTERN)) {
    if (!token) {
      continue;
    }

    if (charLength(token) > maxChars) {
      flush();
      for (const sentence of splitSentences(token)) {
        if (charLength(sentence) > maxChars) {
          flush();
          parts.push(...hardWrap(sentence, maxChars));
          continue;
        }
        if (charLength(current) + charLength(sentence) > maxChars) {
          flush();
        }
        current += sentence;
      }
      flush();
      continue;
    }

    if (charLength(current) + charLength(token) > maxChars) {
      flush();
    }
    current += token;
  }

  flush();
  return parts;
}

function splitBody(
  text: string,
  maxChars: number,
  preserveCode: boolean,
  splitThreshold: number | undefined
): Segment[] {
  const lines = splitLines(text);
  const segments: Segment[] = [];
  let buffer: string[] = [];

  const bodyLength = charLength(text);
  const singlePass = splitThreshold !== undefined && splitThreshold > 0 && bodyLength <= splitThreshold;
  const effectiveLimit = singlePass ? Math.max(maxChars, bodyLength) : maxChars;

  const flushBuffer = (): void => {
    if (buffer.length === 0) {
      return;
    }
    for (const part of enforceMaxChars(buffer.join(''), effectiveLimit)) {
      segments.push(new Segment({ index: -1, content: part, translate: true, kind: 'text' }));
    }
    buffer = [];
  };

  let i = 0;
  while (i < lines.length) {
    const line = lines[i];
    const fenceMatch = preserveCode ? CODE_FENCE_PATTERN.exec(line.trimStart()) : null;

    if (fenceMatch) {
      flushBuffer();
      const fence = fenceMatch[1];
      const codeLines = [line];
      i++;
      // An unterminated fence swallows the rest of the document
      while (i < lines.length) {
        const candidate = lines[i];
        codeLines.push(candidate);
        i++;
        if (candidate.trimStart().startsWith(fence)) {
          break;
        }
      }
      segments.push(new Segment({ index: -1, content: codeLines.join(''), translate: false, kind: 'code' }));
      continue;
    }

    buffer.push(line);
    i++;
  }

  flushBuffer();
  return segments;
}

/**
 * Segment a document.
 *
 * @throws {SegmentationError} for an unknown strategy or a non-numeric limit
 */
export function segmentDocument(text: string, options: SegmentOptions = {}): SegmentedDocument {
  const {
    strategy = 'markdown',
    maxChars = DEFAULT_MAX_CHARS,
    preserveCode = true,
    preserveFrontmatter = true,
    splitThreshold,
  } = options;

  if (strategy !== 'markdown') {
    throw new SegmentationError(`Unsupported segmentation strategy: ${strategy}`);
  }
  if (!Number.isFinite(maxChars)) {
    throw new SegmentationError(`maxChars must be a finite number, got ${maxChars}`);
  }
  if (splitThreshold !== undefined && !Number.isFinite(splitThreshold)) {
    throw new SegmentationError(`splitThreshold must be a finite number, got ${splitThreshold}`);
  }

  const segments: Segment[] = [];
  let remaining = text;

  if (preserveFrontmatter && remaining.startsWith(FRONT_MATTER_DELIMITER)) {
    const frontMatter = splitFrontMatter(remaining);
    if (frontMatter) {
      segments.push(
        new Segment({ index: -1, content: frontMatter.front, translate: false, kind: 'front_matter' })
      );
      remaining = frontMatter.rest;
    }
  }

  segments.push(...splitBody(remaining, maxChars, preserveCode, splitThreshold));
  segments.forEach((segment, index) => {
    segment.index = index;
  });

  return new SegmentedDocument(segments);
}
