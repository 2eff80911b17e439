/**
 * SHA-256 identity hashes
 *
 * Source identities use the format 'sha256:' + 64 lowercase hex characters.
 * The bare hex form names files in the article cache.
 *
 * @module utils/hash
 */

import crypto from 'crypto';
import fs from 'fs';

const HASH_PREFIX = 'sha256:';

const HASH_PATTERN = /^sha256:[a-f0-9]{64}$/;

/**
 * Bare lowercase hex digest
 *
 * @example
 * hashHex('hello')
 * // '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'
 */
export function hashHex(content: string | Buffer): string {
  return crypto.createHash('sha256').update(content).digest('hex');
}

/**
 * Prefixed digest used as a source identity
 *
 * @example
 * computeHash('hello')
 * // 'sha256:2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'
 */
export function computeHash(content: string | Buffer): string {
  return HASH_PREFIX + hashHex(content);
}

/**
 * Hash a file by streaming it from disk
 *
 * @throws Error if the file cannot be read
 */
export function hashFile(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = crypto.createHash('sha256');
    const stream = fs.createReadStream(filePath);

    stream.on('data', (chunk: string | Buffer) => {
      hash.update(chunk);
    });
    stream.on('end', () => {
      resolve(HASH_PREFIX + hash.digest('hex'));
    });
    stream.on('error', (error: NodeJS.ErrnoException) => {
      stream.destroy();
      if (error.code === 'ENOENT') {
        reject(new Error(`File not found: ${filePath}`));
      } else if (error.code === 'EACCES') {
        reject(new Error(`Permission denied: ${filePath}`));
      } else {
        reject(new Error(`Error reading file: ${filePath} - ${error.message}`));
      }
    });
  });
}

export function isValidHashFormat(hash: string): boolean {
  return HASH_PATTERN.test(hash);
}

/**
 * Strip the 'sha256:' prefix from an identity
 */
export function hashDigest(hash: string): string {
  return hash.startsWith(HASH_PREFIX) ? hash.slice(HASH_PREFIX.length) : hash;
}
