/**
 * SignatureService - the run's single active signature backend
 *
 * Holds the builder chosen at startup. If the semantic encoder fails during
 * the run, the service switches to the lexical backend for the rest of the
 * run (warning once) and tells its listeners, so the similarity index can
 * re-sign its entries and never holds two kinds of signature at once.
 *
 * @module services/signature/signature-service
 */

import type { Candidate } from '../../models/candidate.js';
import type { Signature, SignatureBackend } from '../../models/signature.js';
import { normalizeCandidate } from '../normalize/text-normalizer.js';
import type { NormalizedText } from '../normalize/text-normalizer.js';
import { EncoderError } from './encoder.js';
import { LexicalSignatureBuilder } from './lexical.js';
import type { SignatureBuilder } from './types.js';

export interface SignedCandidate {
  candidate: Candidate;
  normalized: NormalizedText;
  signature: Signature;
}

export interface DegradationEvent {
  from: SignatureBackend;
  reason: string;
  fallback: LexicalSignatureBuilder;
}

type DegradationListener = (event: DegradationEvent) => void;

export class SignatureService {
  private active: SignatureBuilder;
  private readonly createFallback: () => LexicalSignatureBuilder;
  private readonly observed: NormalizedText[] = [];
  private readonly listeners: DegradationListener[] = [];
  private degradation: { from: SignatureBackend; reason: string } | null = null;

  constructor(
    builder: SignatureBuilder,
    options: { createFallback?: () => LexicalSignatureBuilder } = {}
  ) {
    this.active = builder;
    this.createFallback = options.createFallback ?? (() => new LexicalSignatureBuilder());
  }

  get backend(): SignatureBackend {
    return this.active.backend;
  }

  get description(): string {
    return this.active.description;
  }

  get degradedFrom(): { from: SignatureBackend; reason: string } | null {
    return this.degradation;
  }

  onDegrade(listener: DegradationListener): void {
    this.listeners.push(listener);
  }

  /**
   * Add texts to the run's corpus statistics. Kept so a fallback backend
   * starts with the same corpus.
   */
  observe(texts: readonly NormalizedText[]): void {
    for (const text of texts) {
      this.observed.push(text);
      this.active.observe(text);
    }
  }

  /**
   * Synchronous signer for the active backend, when it has one (lexical).
   * Used to re-sign the similarity index after the corpus statistics change.
   */
  syncSigner(): ((text: NormalizedText) => Signature) | null {
    const active = this.active;
    return active instanceof LexicalSignatureBuilder ? (text) => active.signText(text) : null;
  }

  async build(candidate: Candidate): Promise<Signature> {
    const [signed] = await this.buildMany([candidate]);
    return signed.signature;
  }

  async buildMany(candidates: readonly Candidate[]): Promise<SignedCandidate[]> {
    const normalized = candidates.map((c) => normalizeCandidate(c));
    const signatures = await this.signTexts(normalized);
    return candidates.map((candidate, i) => ({
      candidate,
      normalized: normalized[i],
      signature: signatures[i],
    }));
  }

  async signTexts(texts: readonly NormalizedText[]): Promise<Signature[]> {
    try {
      return await this.active.sign(texts);
    } catch (error) {
      if (!(error instanceof EncoderError) || this.active.backend === 'lexical') {
        throw error;
      }
      const fallback = this.degrade(error);
      return fallback.sign(texts);
    }
  }

  private degrade(error: EncoderError): LexicalSignatureBuilder {
    const from = this.active.backend;
    const reason = `${error.code}: ${error.message}`;
    const fallback = this.createFallback();
    for (const text of this.observed) {
      fallback.observe(text);
    }

    this.active = fallback;
    this.degradation = { from, reason };
    console.error(
      `[Signature] WARNING: ${from} backend failed mid-run (${reason}); ` +
        `using ${fallback.description} for the rest of this run`
    );

    for (const listener of this.listeners) {
      listener({ from, reason, fallback });
    }
    return fallback;
  }
}
