/**
 * Last-resort extraction for pages the HTML extractor finds no text in:
 * the chat model is given the raw HTML and asked for title and body.
 *
 * Reply format: `Title: ...` on the first line, the article after it.
 *
 * @module services/ingestion/chat-extractor
 */

import type { ChatCompletionsClient } from '../generation/client.js';
import type { ExtractedArticle } from './html-extractor.js';

export interface FallbackExtractor {
  extract(html: string, url: string): Promise<ExtractedArticle>;
}

export const EXTRACTION_SYSTEM_PROMPT =
  'You are a web scraper that extracts the main text and title from an article.';

/** Pages longer than this are cut before they are sent */
export const MAX_EXTRACTION_HTML_LENGTH = 200_000;

const EXTRACTION_TEMPERATURE = 0.1;

const TITLE_PREFIX_REGEX = /^title:\s*/i;

export function parseExtractionReply(reply: string): ExtractedArticle {
  const [first = '', ...rest] = reply.split(/\r?\n/);
  return {
    title: first.trim().replace(TITLE_PREFIX_REGEX, ''),
    text: rest
      .map((line) => line.trim())
      .filter((line) => line.length > 0)
      .join('\n'),
  };
}

export class ChatArticleExtractor implements FallbackExtractor {
  constructor(private readonly client: ChatCompletionsClient) {}

  async extract(html: string, url: string): Promise<ExtractedArticle> {
    console.error(`[Fetch] No readable text in ${url}; extracting with ${this.client.model}`);
    const response = await this.client.complete(
      [
        { role: 'system', content: EXTRACTION_SYSTEM_PROMPT },
        {
          role: 'user',
          content: `Extract the main text and title from this HTML:\n${html.slice(0, MAX_EXTRACTION_HTML_LENGTH)}`,
        },
      ],
      EXTRACTION_TEMPERATURE
    );
    return parseExtractionReply(response.text);
  }
}
