/**
 * SignatureService tests: batching, sync signing and mid-run fallback
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { SignatureService } from '../../../src/services/signature/signature-service.js';
import type { DegradationEvent } from '../../../src/services/signature/signature-service.js';
import { SemanticSignatureBuilder } from '../../../src/services/signature/semantic.js';
import { LexicalSignatureBuilder } from '../../../src/services/signature/lexical.js';
import type { SignatureBuilder } from '../../../src/services/signature/types.js';
import { normalize } from '../../../src/services/normalize/text-normalizer.js';
import { basicCard, FakeEncoder } from '../../setup/fixtures.js';

const STOPWORDS = ['what', 'is', 'the', 'of'];

function lexicalService(): SignatureService {
  return new SignatureService(new LexicalSignatureBuilder({ stopwords: STOPWORDS }));
}

function semanticService(failFromCall?: number): { service: SignatureService; encoder: FakeEncoder } {
  const encoder = new FakeEncoder(new Map(), { failFromCall });
  const service = new SignatureService(new SemanticSignatureBuilder(encoder, encoder.info), {
    createFallback: () => new LexicalSignatureBuilder({ stopwords: STOPWORDS }),
  });
  return { service, encoder };
}

describe('SignatureService', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should sign candidates with their normalized text', async () => {
    const service = lexicalService();
    const candidate = basicCard('What is ATP?', 'Energy currency');

    const [signed] = await service.buildMany([candidate]);

    expect(signed.candidate).toBe(candidate);
    expect(signed.normalized.text).toBe('what is atp energy currency');
    expect(signed.signature).toEqual({
      backend: 'lexical',
      terms: [
        ['atp', 1],
        ['currency', 1],
        ['energy', 1],
      ],
      norm: Math.sqrt(3),
    });
  });

  it('should build a single signature', async () => {
    const service = lexicalService();
    const signature = await service.build(basicCard('Mitochondria', ''));

    expect(signature).toEqual({ backend: 'lexical', terms: [['mitochondria', 1]], norm: 1 });
  });

  it('should expose a synchronous signer only for the lexical backend', () => {
    expect(lexicalService().syncSigner()).not.toBeNull();
    expect(semanticService().service.syncSigner()).toBeNull();
  });

  it('should feed observed texts to the active builder', async () => {
    const builder = new LexicalSignatureBuilder({ stopwords: STOPWORDS });
    const service = new SignatureService(builder);
    service.observe([normalize('alpha beta'), normalize('alpha gamma')]);

    expect(builder.corpusSize).toBe(2);
    expect(builder.idf('alpha')).toBe(1);
  });

  it('should switch to lexical for the rest of the run when the encoder fails', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const { service, encoder } = semanticService(2);
    const events: DegradationEvent[] = [];
    service.onDegrade((event) => events.push(event));
    service.observe([normalize('alpha beta'), normalize('gamma')]);

    const first = await service.buildMany([basicCard('alpha', 'beta')]);
    expect(first[0].signature.backend).toBe('semantic');

    const second = await service.buildMany([basicCard('gamma', '')]);
    const third = await service.buildMany([basicCard('delta', '')]);

    expect(second[0].signature.backend).toBe('lexical');
    expect(third[0].signature.backend).toBe('lexical');
    expect(encoder.calls).toHaveLength(2);
    expect(service.backend).toBe('lexical');
    expect(service.degradedFrom).toEqual({
      from: 'semantic',
      reason: 'MODEL_NOT_FOUND: model evicted from cache',
    });

    expect(events).toHaveLength(1);
    expect(events[0].from).toBe('semantic');
    expect(events[0].fallback.corpusSize).toBe(2);

    const warnings = errorSpy.mock.calls.filter((call) => String(call[0]).includes('failed mid-run'));
    expect(warnings).toHaveLength(1);
    expect(warnings[0][0]).toBe(
      '[Signature] WARNING: semantic backend failed mid-run (MODEL_NOT_FOUND: model evicted from cache); ' +
        'using lexical (tf-idf cosine) for the rest of this run'
    );
  });

  it('should rethrow errors that are not encoder failures', async () => {
    const broken: SignatureBuilder = {
      backend: 'semantic',
      description: 'broken',
      observe: () => {},
      sign: async () => {
        throw new Error('boom');
      },
    };
    const service = new SignatureService(broken);

    await expect(service.buildMany([basicCard('a', 'b')])).rejects.toThrow('boom');
    expect(service.backend).toBe('semantic');
    expect(service.degradedFrom).toBeNull();
  });
});
