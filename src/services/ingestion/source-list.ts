/**
 * Source lists: URL list files and the local article directory
 *
 * @module services/ingestion/source-list
 */

import fs from 'fs';
import path from 'path';
import type { SourceDescriptor } from '../../models/source-item.js';

/** Local file types read as articles */
export const SUPPORTED_EXTENSIONS = [
  '.txt',
  '.md',
  '.markdown',
  '.html',
  '.htm',
  '.pdf',
  '.docx',
] as const;

export const URL_LIST_FILENAME = 'urls.txt';

/**
 * One URL per line. Blank lines and lines starting with '#' are skipped.
 * A missing file is reported and treated as empty.
 */
export async function readUrlList(filePath: string): Promise<string[]> {
  let content: string;
  try {
    content = await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    const code: unknown = error instanceof Error ? Reflect.get(error, 'code') : undefined;
    if (code === 'ENOENT') {
      console.error(`[Sources] WARNING: URL file not found, skipping: ${filePath}`);
      return [];
    }
    throw error;
  }

  const urls = content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
  console.error(`[Sources] Loaded ${urls.length} URLs from ${filePath}`);
  return urls;
}

/**
 * Concatenate several URL lists in order
 */
export async function readUrlLists(filePaths: readonly string[]): Promise<string[]> {
  const urls: string[] = [];
  for (const filePath of filePaths) {
    urls.push(...(await readUrlList(filePath)));
  }
  return urls;
}

export function isSupportedFile(fileName: string): boolean {
  const ext = path.extname(fileName).toLowerCase();
  return SUPPORTED_EXTENSIONS.some((supported) => supported === ext);
}

/**
 * Supported article files directly inside `dir`, sorted by name. Dotfiles and
 * the URL list itself are excluded. A missing directory yields [].
 */
export async function listLocalFiles(dir: string): Promise<string[]> {
  let names: string[];
  try {
    names = await fs.promises.readdir(dir);
  } catch (error) {
    const code: unknown = error instanceof Error ? Reflect.get(error, 'code') : undefined;
    if (code === 'ENOENT') return [];
    throw error;
  }

  const files: string[] = [];
  for (const name of names.sort()) {
    if (name.startsWith('.') || name === URL_LIST_FILENAME || !isSupportedFile(name)) continue;
    const fullPath = path.join(dir, name);
    const stats = await fs.promises.stat(fullPath);
    if (stats.isFile()) files.push(fullPath);
  }
  return files;
}

/**
 * URLs first (in list order, duplicates dropped), then local files
 */
export function buildDescriptors(urls: readonly string[], files: readonly string[]): SourceDescriptor[] {
  const seen = new Set<string>();
  const descriptors: SourceDescriptor[] = [];
  for (const url of urls) {
    if (seen.has(url)) continue;
    seen.add(url);
    descriptors.push({ origin: { kind: 'url', url } });
  }
  for (const file of files) {
    descriptors.push({ origin: { kind: 'file', path: file } });
  }
  return descriptors;
}
