/**
 * Zod validation helpers and shared schemas
 *
 * @module utils/validation
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @returns Validated and typed input data
 * @throws ValidationError listing every failing path
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    });
    throw new ValidationError(errors.join('; '));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const SimilarityThreshold = z
  .number({ invalid_type_error: 'Similarity threshold must be a number' })
  .min(0, 'Similarity threshold must be between 0 and 1')
  .max(1, 'Similarity threshold must be between 0 and 1');

export const SignatureBackendPreference = z.enum(['auto', 'lexical', 'semantic']);

export const DeckName = z
  .string()
  .trim()
  .min(1, 'Deck name is required')
  .max(200, 'Deck name must be 200 characters or less');

/**
 * Threshold given as an environment or flag string. Non-numeric input is
 * passed through unchanged so the number schema reports it.
 */
export const SimilarityThresholdInput = z.preprocess((value) => {
  if (typeof value !== 'string') return value;
  const trimmed = value.trim();
  if (trimmed === '') return undefined;
  const parsed = Number(trimmed);
  return Number.isNaN(parsed) ? value : parsed;
}, SimilarityThreshold);
