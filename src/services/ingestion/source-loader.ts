/**
 * Source identity and loading
 *
 * identifySource() never touches the network: URL identity is the hash of
 * the canonical URL, so an already processed URL is skipped before any
 * fetch. Loading fetches (or reads the cache / the local file) afterwards.
 * A page the HTML extractor finds no text in goes to the fallback
 * extractor, when one is configured.
 *
 * @module services/ingestion/source-loader
 */

import fs from 'fs';
import path from 'path';
import type { SourceDescriptor, SourceItem, SourceOrigin } from '../../models/source-item.js';
import { describeOrigin } from '../../models/source-item.js';
import { cleanArticleText, normalize } from '../normalize/text-normalizer.js';
import { computeHash, hashDigest, hashFile } from '../../utils/hash.js';
import { fetchFailedError, validationError } from '../../app/errors.js';
import { extractArticle } from './html-extractor.js';
import type { ExtractedArticle } from './html-extractor.js';
import type { FallbackExtractor } from './chat-extractor.js';
import { extractDocx, extractPdf } from './document-extractor.js';

export const FETCH_TIMEOUT_MS = 15_000;

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) ' +
  'Chrome/120.0.0.0 Safari/537.36';

/**
 * Lowercase scheme and host, drop the fragment. Path and query are kept
 * as written.
 *
 * @throws AppError (VALIDATION_ERROR) for anything that is not an http(s) URL
 */
export function canonicalizeUrl(raw: string): string {
  let url: URL;
  try {
    url = new URL(raw.trim());
  } catch (error) {
    throw validationError(`Invalid URL: ${raw}`, {
      reason: error instanceof Error ? error.message : String(error),
    });
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw validationError(`Unsupported URL scheme "${url.protocol}" in ${raw}`);
  }
  url.hash = '';
  return url.toString();
}

/**
 * Stable identity of a source, without fetching it
 */
export async function identifySource(descriptor: SourceDescriptor): Promise<string> {
  const { origin } = descriptor;
  if (origin.kind === 'url') {
    return computeHash(canonicalizeUrl(origin.url));
  }
  return hashFile(origin.path);
}

export interface SourceLoaderOptions {
  /** Directory for cached article text; caching is off when unset */
  cacheDir?: string;
  useCache?: boolean;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  /** Used when a fetched page yields no text */
  fallbackExtractor?: FallbackExtractor;
}

type LoadedText = ExtractedArticle;

export class SourceLoader {
  private readonly cacheDir: string | undefined;
  private readonly useCache: boolean;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly fallbackExtractor: FallbackExtractor | undefined;

  constructor(options: SourceLoaderOptions = {}) {
    this.cacheDir = options.cacheDir;
    this.useCache = (options.useCache ?? false) && options.cacheDir !== undefined;
    this.timeoutMs = options.timeoutMs ?? FETCH_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.fallbackExtractor = options.fallbackExtractor;
  }

  /**
   * Load the content of an identified source.
   *
   * @throws AppError (FETCH_FAILED) when a URL cannot be fetched or yields no text
   */
  async load(descriptor: SourceDescriptor, id: string): Promise<SourceItem> {
    const { origin } = descriptor;
    const loaded =
      origin.kind === 'url' ? await this.loadUrl(origin.url) : await this.loadFile(origin.path);

    const rawText = cleanArticleText(loaded.text);
    if (rawText.length === 0) {
      throw fetchFailedError(`No readable text in ${describeOrigin(origin)}`, { sourceId: id });
    }

    return Object.freeze({
      id,
      origin: freezeOrigin(origin),
      title: loaded.title || describeOrigin(origin),
      rawText,
      normalizedText: normalize(rawText).text,
      ingestedAt: new Date().toISOString(),
    });
  }

  private async loadUrl(url: string): Promise<LoadedText> {
    const cachePath = this.cachePathFor(url);
    if (cachePath) {
      const cached = await readCache(cachePath);
      if (cached) {
        console.error(`[Fetch] Using cached content for ${url}`);
        return cached;
      }
    }

    let html: string;
    try {
      const response = await this.fetchImpl(url, {
        headers: { 'User-Agent': USER_AGENT, Accept: 'text/html,application/xhtml+xml' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status} ${response.statusText}`);
      }
      html = await response.text();
    } catch (error) {
      throw fetchFailedError(
        `Failed to fetch ${url}: ${error instanceof Error ? error.message : String(error)}`,
        { url }
      );
    }

    let article = extractArticle(html, url);
    if (article.text.trim().length === 0 && this.fallbackExtractor) {
      article = await this.extractWithFallback(this.fallbackExtractor, html, url);
    }
    if (cachePath && article.text.length > 0) {
      await writeCache(cachePath, article);
    }
    return article;
  }

  private async extractWithFallback(
    extractor: FallbackExtractor,
    html: string,
    url: string
  ): Promise<LoadedText> {
    try {
      return await extractor.extract(html, url);
    } catch (error) {
      throw fetchFailedError(
        `Fallback extraction failed for ${url}: ${error instanceof Error ? error.message : String(error)}`,
        { url }
      );
    }
  }

  private async loadFile(filePath: string): Promise<LoadedText> {
    const content = await fs.promises.readFile(filePath);
    const ext = path.extname(filePath);
    const baseName = path.basename(filePath, ext);
    try {
      switch (ext.toLowerCase()) {
        case '.html':
        case '.htm':
          return extractArticle(content.toString('utf-8'), baseName);
        case '.pdf':
          return await extractPdf(new Uint8Array(content), baseName);
        case '.docx':
          return await extractDocx(content, baseName);
        default:
          return { title: baseName, text: content.toString('utf-8') };
      }
    } catch (error) {
      throw fetchFailedError(
        `Failed to read ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        { path: filePath }
      );
    }
  }

  private cachePathFor(url: string): string | null {
    if (!this.useCache || this.cacheDir === undefined) return null;
    return path.join(this.cacheDir, `${hashDigest(computeHash(canonicalizeUrl(url)))}.txt`);
  }
}

function freezeOrigin(origin: SourceOrigin): SourceOrigin {
  const copy: SourceOrigin =
    origin.kind === 'url' ? { kind: 'url', url: origin.url } : { kind: 'file', path: origin.path };
  return Object.freeze(copy);
}

/**
 * Cache file layout: title on the first line, article text after it
 */
async function readCache(cachePath: string): Promise<LoadedText | null> {
  let content: string;
  try {
    content = await fs.promises.readFile(cachePath, 'utf-8');
  } catch (error) {
    const code: unknown = error instanceof Error ? Reflect.get(error, 'code') : undefined;
    if (code === 'ENOENT') return null;
    throw error;
  }
  const newline = content.indexOf('\n');
  if (newline < 0) return null;
  const text = content.slice(newline + 1).trim();
  return text.length > 0 ? { title: content.slice(0, newline).trim(), text } : null;
}

async function writeCache(cachePath: string, article: LoadedText): Promise<void> {
  try {
    await fs.promises.mkdir(path.dirname(cachePath), { recursive: true });
    await fs.promises.writeFile(cachePath, `${article.title}\n${article.text}`, 'utf-8');
  } catch (error) {
    console.error(
      `[Fetch] Failed to write cache ${cachePath}:`,
      error instanceof Error ? error.message : String(error)
    );
  }
}
