/**
 * Source ingestion
 *
 * @module services/ingestion
 */

export {
  readUrlList,
  readUrlLists,
  listLocalFiles,
  buildDescriptors,
  isSupportedFile,
  SUPPORTED_EXTENSIONS,
  URL_LIST_FILENAME,
} from './source-list.js';
export { extractArticle } from './html-extractor.js';
export type { ExtractedArticle } from './html-extractor.js';
export { canonicalizeUrl, identifySource, SourceLoader, FETCH_TIMEOUT_MS } from './source-loader.js';
export type { SourceLoaderOptions } from './source-loader.js';
export { extractPdf, extractDocx } from './document-extractor.js';
export { ChatArticleExtractor, parseExtractionReply } from './chat-extractor.js';
export type { FallbackExtractor } from './chat-extractor.js';
