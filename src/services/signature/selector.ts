/**
 * Signature backend selection
 *
 * The backend is chosen once per process by walking an ordered list of
 * constructors; the first one that constructs wins. Every failure on the way
 * is collected and reported in a single warning.
 *
 * @module services/signature/selector
 */

import type { SignatureBackend, SignatureBackendPreference } from '../../models/signature.js';
import { configurationError } from '../../app/errors.js';
import { LexicalSignatureBuilder } from './lexical.js';
import { SemanticSignatureBuilder } from './semantic.js';
import type { SentenceEncoder } from './encoder.js';
import type { SignatureBuilder } from './types.js';

export interface BackendFactory {
  backend: SignatureBackend;
  create(): Promise<SignatureBuilder>;
}

export interface BackendFailure {
  backend: SignatureBackend;
  reason: string;
}

export interface BackendSelection {
  builder: SignatureBuilder;
  failures: BackendFailure[];
}

const BACKEND_ORDER: Record<SignatureBackendPreference, readonly SignatureBackend[]> = {
  auto: ['semantic', 'lexical'],
  semantic: ['semantic'],
  lexical: ['lexical'],
};

export function backendOrder(preference: SignatureBackendPreference): readonly SignatureBackend[] {
  return BACKEND_ORDER[preference];
}

/**
 * Factories for both backends, semantic first
 */
export function defaultBackendFactories(encoder: SentenceEncoder): BackendFactory[] {
  return [
    { backend: 'semantic', create: () => SemanticSignatureBuilder.create(encoder) },
    { backend: 'lexical', create: async () => new LexicalSignatureBuilder() },
  ];
}

/**
 * Pick the signature builder for this run.
 *
 * @throws AppError (CONFIGURATION_ERROR) when no backend in the preference's
 *         chain can be constructed
 */
export async function selectSignatureBuilder(
  preference: SignatureBackendPreference,
  factories: readonly BackendFactory[]
): Promise<BackendSelection> {
  const failures: BackendFailure[] = [];

  for (const backend of backendOrder(preference)) {
    const factory = factories.find((f) => f.backend === backend);
    if (!factory) {
      failures.push({ backend, reason: 'no constructor registered' });
      continue;
    }
    try {
      const builder = await factory.create();
      if (failures.length > 0) {
        console.error(
          `[Signature] WARNING: falling back to ${builder.description}. ` +
            failures.map((f) => `${f.backend}: ${f.reason}`).join('; ')
        );
      } else {
        console.error(`[Signature] Using ${builder.description}`);
      }
      return { builder, failures };
    } catch (error) {
      failures.push({
        backend,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }

  throw configurationError(
    `No signature backend available for preference "${preference}": ` +
      failures.map((f) => `${f.backend}: ${f.reason}`).join('; '),
    { preference, failures }
  );
}
