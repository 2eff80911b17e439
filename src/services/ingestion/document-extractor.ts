/**
 * Binary document extraction: PDF through pdf.js (legacy build, which runs
 * under Node without a worker script), DOCX through mammoth
 *
 * @module services/ingestion/document-extractor
 */

import * as pdfjsLib from 'pdfjs-dist/legacy/build/pdf.mjs';
import mammoth from 'mammoth';
import type { ExtractedArticle } from './html-extractor.js';

/**
 * Text of every page in order. Title from the document info, else
 * `fallbackTitle`.
 */
export async function extractPdf(data: Uint8Array, fallbackTitle: string): Promise<ExtractedArticle> {
  const document = await pdfjsLib.getDocument({ data, isEvalSupported: false, verbosity: 0 }).promise;
  try {
    const metadata = await document.getMetadata();
    const info: unknown = metadata.info;
    const infoTitle: unknown =
      typeof info === 'object' && info !== null ? Reflect.get(info, 'Title') : undefined;

    const pages: string[] = [];
    for (let pageNumber = 1; pageNumber <= document.numPages; pageNumber++) {
      const page = await document.getPage(pageNumber);
      const content = await page.getTextContent();
      let text = '';
      for (const item of content.items) {
        // marked-content delimiters carry no text
        if (!('str' in item)) continue;
        text += item.str + (item.hasEOL ? '\n' : '');
      }
      pages.push(text);
      page.cleanup();
    }

    const title = typeof infoTitle === 'string' && infoTitle.trim().length > 0 ? infoTitle.trim() : fallbackTitle;
    return { title, text: pages.join('\n') };
  } finally {
    await document.destroy();
  }
}

export async function extractDocx(buffer: Buffer, fallbackTitle: string): Promise<ExtractedArticle> {
  const result = await mammoth.extractRawText({ buffer });
  if (result.messages.length > 0) {
    console.error(`[Sources] ${result.messages.length} conversion warnings for "${fallbackTitle}"`);
  }
  return { title: fallbackTitle, text: result.value };
}
