/**
 * Lexical signature backend: smoothed TF-IDF over normalized tokens
 *
 *   tf(t)  = occurrences of t in the text
 *   idf(t) = ln((1 + N) / (1 + df(t))) + 1
 *
 * N and df(t) count the texts observed so far in the run. Before anything is
 * observed every idf is 1, so signatures degrade to plain term frequency.
 * Weights are rounded to 1e-9 and terms sorted, which makes a signature a
 * pure function of (text, corpus statistics).
 *
 * @module services/signature/lexical
 */

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import type { LexicalSignature } from '../../models/signature.js';
import { l2Norm, roundTo } from '../../utils/math.js';
import type { NormalizedText } from '../normalize/text-normalizer.js';
import type { SignatureBuilder } from './types.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const DEFAULT_STOPWORDS_PATH = path.resolve(__dirname, '../../../data/stopwords.json');

const WEIGHT_DECIMALS = 9;

let _defaultStopwords: ReadonlySet<string> | null = null;

/**
 * Load the bundled English stopword list (cached after first read)
 */
export function loadDefaultStopwords(): ReadonlySet<string> {
  if (!_defaultStopwords) {
    const raw: unknown = JSON.parse(fs.readFileSync(DEFAULT_STOPWORDS_PATH, 'utf-8'));
    if (!Array.isArray(raw) || !raw.every((w): w is string => typeof w === 'string')) {
      throw new Error(`Stopword list at ${DEFAULT_STOPWORDS_PATH} must be a JSON array of strings`);
    }
    _defaultStopwords = new Set(raw);
  }
  return _defaultStopwords;
}

export interface LexicalBuilderOptions {
  /** Tokens ignored when weighting; defaults to data/stopwords.json */
  stopwords?: Iterable<string>;
}

export class LexicalSignatureBuilder implements SignatureBuilder {
  readonly backend = 'lexical' as const;
  readonly description = 'lexical (tf-idf cosine)';

  private readonly stopwords: ReadonlySet<string>;
  private readonly documentFrequency = new Map<string, number>();
  private documentCount = 0;

  constructor(options: LexicalBuilderOptions = {}) {
    this.stopwords = options.stopwords ? new Set(options.stopwords) : loadDefaultStopwords();
  }

  get corpusSize(): number {
    return this.documentCount;
  }

  observe(text: NormalizedText): void {
    this.documentCount++;
    for (const term of new Set(this.contentTokens(text))) {
      this.documentFrequency.set(term, (this.documentFrequency.get(term) ?? 0) + 1);
    }
  }

  idf(term: string): number {
    const df = this.documentFrequency.get(term) ?? 0;
    return Math.log((1 + this.documentCount) / (1 + df)) + 1;
  }

  /**
   * Synchronous signing, used directly when the index is re-signed after a
   * backend switch.
   */
  signText(text: NormalizedText): LexicalSignature {
    const counts = new Map<string, number>();
    for (const token of this.contentTokens(text)) {
      counts.set(token, (counts.get(token) ?? 0) + 1);
    }

    const terms = [...counts.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([term, count]) =>
        Object.freeze([term, roundTo(count * this.idf(term), WEIGHT_DECIMALS)] as const)
      );
    const norm = l2Norm(terms.map(([, weight]) => weight));

    const signature: LexicalSignature = { backend: 'lexical', terms: Object.freeze(terms), norm };
    return Object.freeze(signature);
  }

  async sign(texts: readonly NormalizedText[]): Promise<LexicalSignature[]> {
    return texts.map((t) => this.signText(t));
  }

  private contentTokens(text: NormalizedText): string[] {
    return text.tokens.filter((t) => !this.stopwords.has(t));
  }
}
