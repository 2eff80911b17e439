/**
 * Semantic signature backend: sentence-encoder embeddings
 *
 * Empty texts are never sent to the encoder; they get a zero vector (a
 * degenerate signature) so the decision engine keeps them without matching.
 *
 * @module services/signature/semantic
 */

import type { SemanticSignature } from '../../models/signature.js';
import { l2Norm } from '../../utils/math.js';
import type { NormalizedText } from '../normalize/text-normalizer.js';
import type { EncoderInfo, SentenceEncoder } from './encoder.js';
import type { SignatureBuilder } from './types.js';

export class SemanticSignatureBuilder implements SignatureBuilder {
  readonly backend = 'semantic' as const;
  readonly description: string;

  constructor(
    private readonly encoder: SentenceEncoder,
    private readonly info: EncoderInfo
  ) {
    this.description = `semantic (${info.model}, ${info.dimensions}d on ${info.device})`;
  }

  /**
   * Probe the encoder and return a builder bound to the probed model.
   *
   * @throws EncoderError when the encoder or its model is unavailable
   */
  static async create(encoder: SentenceEncoder): Promise<SemanticSignatureBuilder> {
    const info = await encoder.probe();
    return new SemanticSignatureBuilder(encoder, info);
  }

  get model(): string {
    return this.info.model;
  }

  observe(_text: NormalizedText): void {
    // corpus statistics do not affect embeddings
  }

  async sign(texts: readonly NormalizedText[]): Promise<SemanticSignature[]> {
    const pending: string[] = [];
    for (const t of texts) {
      if (t.text.length > 0) pending.push(t.text);
    }

    const vectors = await this.encoder.encode(pending);
    let next = 0;
    return texts.map((t) => {
      const vector =
        t.text.length > 0 ? vectors[next++] : new Float32Array(this.info.dimensions);
      const signature: SemanticSignature = {
        backend: 'semantic',
        model: this.info.model,
        vector,
        norm: l2Norm(vector),
      };
      return Object.freeze(signature);
    });
  }
}
