/**
 * Filesystem helpers: source discovery, reading, atomic replacement, glossaries
 */

import fs from 'fs';
import path from 'path';
import crypto from 'crypto';
import { FileReadError } from './errors.js';

export interface GatherOptions {
  extensions: string[];
  include?: string[];
  exclude?: string[];
}

/**
 * Translate a wildcard pattern into a RegExp. `*` crosses directory
 * separators, unlike shell globs.
 */
export function globToRegExp(pattern: string): RegExp {
  let source = '';
  for (let i = 0; i < pattern.length; i++) {
    const char = pattern[i];
    if (char === '*') {
      source += '.*';
    } else if (char === '?') {
      source += '.';
    } else if (char === '[') {
      const close = pattern.indexOf(']', i + 1);
      if (close === -1) {
        source += '\\[';
        continue;
      }
      let body = pattern.slice(i + 1, close).replace(/\\/g, '\\\\');
      if (body.startsWith('!')) {
        body = `^${body.slice(1)}`;
      }
      source += `[${body}]`;
      i = close;
    } else {
      source += char.replace(/[.+^${}()|\\\]]/g, '\\$&');
    }
  }
  return new RegExp(`^${source}$`, 's');
}

function matchesAny(relative: string, patterns: RegExp[]): boolean {
  return patterns.some((pattern) => pattern.test(relative));
}

async function walk(dir: string): Promise<string[]> {
  const entries = await fs.promises.readdir(dir, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await walk(full)));
    } else if (entry.isFile()) {
      files.push(full);
    }
  }
  return files;
}

/**
 * Recursively list files under `root` filtered by extension and include/exclude
 * patterns (matched against the POSIX path relative to root). Sorted.
 */
export async function gatherFiles(root: string, options: GatherOptions): Promise<string[]> {
  const extensions = new Set(
    options.extensions.filter(Boolean).map((ext) => ext.toLowerCase().replace(/^\./, ''))
  );
  const include = (options.include ?? []).map(globToRegExp);
  const exclude = (options.exclude ?? []).map(globToRegExp);

  const files = await walk(root);
  return files
    .filter((file) => {
      if (extensions.size > 0) {
        const suffix = path.extname(file).toLowerCase().replace(/^\./, '');
        if (!extensions.has(suffix)) {
          return false;
        }
      }
      const relative = path.relative(root, file).split(path.sep).join('/');
      if (include.length > 0 && !matchesAny(relative, include)) {
        return false;
      }
      return !(exclude.length > 0 && matchesAny(relative, exclude));
    })
    .sort();
}

/**
 * Read a UTF-8 text file, refusing binaries.
 *
 * @throws {FileReadError}
 */
export async function readText(filePath: string): Promise<string> {
  let data: Buffer;
  try {
    data = await fs.promises.readFile(filePath);
  } catch (error) {
    throw new FileReadError(
      `Failed to read ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  if (data.includes(0)) {
    throw new FileReadError(`${filePath} appears to be a binary file; skipping`);
  }

  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(data);
  } catch (error) {
    throw new FileReadError(`${filePath} is not valid UTF-8`, { cause: error });
  }
}

export async function ensureParent(filePath: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
}

export function backupPath(filePath: string): string {
  return `${filePath}.bak`;
}

/**
 * Replace `filePath` with `content` through a temp file in the same directory.
 * With `backup`, an existing file is first copied to `<path>.bak`.
 */
export async function atomicWrite(filePath: string, content: string, options: { backup?: boolean } = {}): Promise<void> {
  await ensureParent(filePath);
  const tmpPath = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${crypto.randomBytes(6).toString('hex')}.tmp`
  );

  try {
    await fs.promises.writeFile(tmpPath, content, 'utf-8');
    if (options.backup && fs.existsSync(filePath)) {
      await fs.promises.copyFile(filePath, backupPath(filePath));
    }
    await fs.promises.rename(tmpPath, filePath);
  } catch (error) {
    await fs.promises.rm(tmpPath, { force: true });
    throw error;
  }
}

export async function appendText(filePath: string, content: string): Promise<void> {
  await ensureParent(filePath);
  await fs.promises.appendFile(filePath, content, 'utf-8');
}

function parseCsvRow(line: string): string[] {
  const cells: string[] = [];
  let cell = '';
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    if (quoted) {
      if (char === '"' && line[i + 1] === '"') {
        cell += '"';
        i++;
      } else if (char === '"') {
        quoted = false;
      } else {
        cell += char;
      }
    } else if (char === '"' && cell.trim() === '') {
      quoted = true;
      cell = '';
    } else if (char === ',') {
      cells.push(cell.trim());
      cell = '';
    } else {
      cell += char;
    }
  }

  cells.push(cell.trim());
  return cells;
}

/**
 * Load a glossary from a JSON object or a two-column CSV file
 */
export async function readGlossary(filePath: string): Promise<Record<string, string>> {
  const extension = path.extname(filePath).toLowerCase();
  const text = await fs.promises.readFile(filePath, 'utf-8');

  if (extension === '.json') {
    const parsed: unknown = JSON.parse(text);
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new Error(`Glossary ${filePath} must be a JSON object`);
    }
    const glossary: Record<string, string> = {};
    for (const [source, target] of Object.entries(parsed)) {
      glossary[source] = String(target);
    }
    return glossary;
  }

  if (extension === '.csv') {
    const glossary: Record<string, string> = {};
    for (const line of text.split(/\r?\n/)) {
      const [source, target] = parseCsvRow(line);
      if (source && target !== undefined) {
        glossary[source] = target;
      }
    }
    return glossary;
  }

  throw new Error(`Unsupported glossary format: ${extension}`);
}
