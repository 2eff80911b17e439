/**
 * Signature builder contract
 *
 * @module services/signature/types
 */

import type { Signature, SignatureBackend } from '../../models/signature.js';
import type { NormalizedText } from '../normalize/text-normalizer.js';

export interface SignatureBuilder {
  readonly backend: SignatureBackend;
  /** Short description for log lines, e.g. 'semantic (all-MiniLM-L6-v2)' */
  readonly description: string;

  /**
   * Record a text as part of the run's corpus. Only the lexical backend uses
   * this (document frequencies); signing never updates corpus statistics.
   */
  observe(text: NormalizedText): void;

  /**
   * Sign a batch of texts, preserving order.
   */
  sign(texts: readonly NormalizedText[]): Promise<Signature[]>;
}
