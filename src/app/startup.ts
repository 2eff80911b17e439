/**
 * Startup checks
 *
 * Fails fast on missing credentials and creates the article directory
 * and URL list on first use.
 *
 * @module app/startup
 */

import fs from 'fs';
import path from 'path';
import { configurationError } from './errors.js';
import type { AppConfig } from './config.js';
import { URL_LIST_FILENAME } from '../services/ingestion/source-list.js';

const URL_LIST_TEMPLATE = `# One article URL per line. Lines starting with # are ignored.
`;

/**
 * @throws AppError (CONFIGURATION_ERROR) when the generation API key is missing
 */
export function requireApiKey(config: AppConfig): void {
  if (!config.openaiApiKey) {
    throw configurationError(
      'OPENAI_API_KEY is not set. Add it to .env or export it before running.'
    );
  }
}

/**
 * Create the article directory and an empty urls.txt if they are missing.
 *
 * @returns paths that were created
 */
export function prepareWorkspace(config: AppConfig): string[] {
  const created: string[] = [];
  if (!fs.existsSync(config.articleDir)) {
    fs.mkdirSync(config.articleDir, { recursive: true });
    created.push(config.articleDir);
  }
  const urlList = path.join(config.articleDir, URL_LIST_FILENAME);
  if (!fs.existsSync(urlList)) {
    fs.writeFileSync(urlList, URL_LIST_TEMPLATE, 'utf-8');
    created.push(urlList);
  }

  if (created.length > 0) {
    console.error('=== FIRST RUN SETUP ===');
    for (const p of created) {
      console.error(`  - created ${p}`);
    }
    console.error(`  Add article URLs to ${urlList} or article files to ${config.articleDir}.`);
    console.error('=======================');
  }
  return created;
}
