/**
 * HTML article extraction
 *
 * Removes page chrome and comment sections, then takes the text of the
 * first <article>, else <main>, else <body>.
 *
 * @module services/ingestion/html-extractor
 */

import * as cheerio from 'cheerio';

export interface ExtractedArticle {
  title: string;
  text: string;
}

const BOILERPLATE_SELECTORS = [
  'script',
  'style',
  'noscript',
  'template',
  'iframe',
  'nav',
  'header',
  'footer',
  'aside',
  'form',
  '[role="navigation"]',
  '[role="banner"]',
  '[role="contentinfo"]',
] as const;

/** Block elements that end a line in the extracted text */
const BLOCK_SELECTOR = 'p, div, section, li, h1, h2, h3, h4, h5, h6, blockquote, pre, tr';

export function extractArticle(html: string, fallbackTitle = ''): ExtractedArticle {
  const $ = cheerio.load(html);

  const title =
    $('title').first().text().trim() || $('h1').first().text().trim() || fallbackTitle;

  for (const selector of BOILERPLATE_SELECTORS) {
    $(selector).remove();
  }

  // Comment threads: any element whose id or class mentions "comment"
  $('[id], [class]')
    .filter((_, el) => {
      const id = $(el).attr('id') ?? '';
      const cls = $(el).attr('class') ?? '';
      return id.toLowerCase().includes('comment') || cls.toLowerCase().includes('comment');
    })
    .remove();

  let content = $('article').first();
  if (content.length === 0) content = $('main').first();
  if (content.length === 0) content = $('body');

  content.find('br').replaceWith('\n');
  content.find(BLOCK_SELECTOR).each((_, el) => {
    $(el).append('\n');
  });

  const text = (content.length > 0 ? content.text() : $.root().text())
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line) => line.replace(/\s+/g, ' ').trim())
    .filter((line) => line.length > 0)
    .join('\n');

  return { title: title.replace(/\s+/g, ' '), text };
}
