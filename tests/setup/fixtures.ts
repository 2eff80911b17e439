/**
 * Shared test fixtures: temp directories, card and signature factories,
 * and an in-process sentence encoder.
 */

import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { createCandidate } from '../../src/models/candidate.js';
import type { Candidate, CandidateKind } from '../../src/models/candidate.js';
import type { SemanticSignature } from '../../src/models/signature.js';
import type { SourceItem } from '../../src/models/source-item.js';
import { computeHash } from '../../src/utils/hash.js';
import { l2Norm } from '../../src/utils/math.js';
import { cleanArticleText, normalize } from '../../src/services/normalize/text-normalizer.js';
import { EncoderError } from '../../src/services/signature/encoder.js';
import type { EncoderInfo, SentenceEncoder } from '../../src/services/signature/encoder.js';
import { TEMP_DIR_PREFIX } from '../global-setup.js';

export const TEST_SOURCE_ID = computeHash('https://example.test/article');

export function createTempDir(label: string): string {
  return mkdtempSync(join(tmpdir(), `${TEMP_DIR_PREFIX}${label}-`));
}

export function cleanupTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export function basicCard(front: string, back: string, sourceId = TEST_SOURCE_ID): Candidate {
  return createCandidate({ kind: 'basic', values: [front, back], sourceId });
}

export function clozeCard(text: string, extra = '', sourceId = TEST_SOURCE_ID): Candidate {
  return createCandidate({ kind: 'cloze', values: [text, extra], sourceId });
}

export function card(kind: CandidateKind, values: string[], sourceId = TEST_SOURCE_ID): Candidate {
  return createCandidate({ kind, values, sourceId });
}

export function semanticSignature(values: number[], model = 'test-model'): SemanticSignature {
  const vector = Float32Array.from(values);
  return { backend: 'semantic', model, vector, norm: l2Norm(vector) };
}

export function sourceItem(url: string, title: string, text: string): SourceItem {
  const rawText = cleanArticleText(text);
  return {
    id: computeHash(url),
    origin: { kind: 'url', url },
    title,
    rawText,
    normalizedText: normalize(rawText).text,
    ingestedAt: '2024-01-01T00:00:00.000Z',
  };
}

/**
 * Encoder returning fixed vectors per normalized text. Unknown texts get
 * `fallbackVector`. Calls numbered `failFromCall` and later throw.
 */
export class FakeEncoder implements SentenceEncoder {
  readonly calls: string[][] = [];
  probes = 0;

  constructor(
    private readonly vectors: Map<string, number[]> = new Map(),
    private readonly options: {
      info?: EncoderInfo;
      fallbackVector?: number[];
      failFromCall?: number;
      probeError?: EncoderError;
    } = {}
  ) {}

  get info(): EncoderInfo {
    return this.options.info ?? { model: 'fake-model', dimensions: 3, device: 'cpu' };
  }

  async probe(): Promise<EncoderInfo> {
    this.probes++;
    if (this.options.probeError) throw this.options.probeError;
    return this.info;
  }

  async encode(texts: readonly string[]): Promise<Float32Array[]> {
    this.calls.push([...texts]);
    const { failFromCall } = this.options;
    if (failFromCall !== undefined && this.calls.length >= failFromCall) {
      throw new EncoderError('model evicted from cache', 'MODEL_NOT_FOUND');
    }
    const fallback = this.options.fallbackVector ?? [0, 0, 1];
    return texts.map((t) => Float32Array.from(this.vectors.get(t) ?? fallback));
  }
}
