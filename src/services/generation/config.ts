/**
 * Card generation configuration
 *
 * Any OpenAI-compatible chat-completions endpoint works; the base URL
 * defaults to OpenAI's.
 */

import { z } from 'zod';

export const DEFAULT_GENERATION_MODEL = 'gpt-4.1-mini';
export const DEFAULT_GENERATION_BASE_URL = 'https://api.openai.com/v1';

export const GenerationConfigSchema = z.object({
  apiKey: z.string().min(1, 'OPENAI_API_KEY is required'),
  baseUrl: z.string().url().default(DEFAULT_GENERATION_BASE_URL),
  model: z.string().min(1).default(DEFAULT_GENERATION_MODEL),

  // Generation defaults
  temperature: z.number().min(0).max(2).default(0.7),
  maxOutputTokens: z.number().int().positive().default(4096),
  requestTimeoutMs: z.number().int().positive().default(120_000),

  // Retry configuration
  retry: z
    .object({
      maxAttempts: z.number().int().min(1).default(3),
      baseDelayMs: z.number().int().nonnegative().default(1000),
      maxDelayMs: z.number().int().nonnegative().default(10_000),
    })
    .default({}),
});

export type GenerationConfig = z.infer<typeof GenerationConfigSchema>;
export type GenerationConfigInput = z.input<typeof GenerationConfigSchema>;

/**
 * Generation config from environment variables.
 *
 *   OPENAI_API_KEY          - API key (required)
 *   ARTICLE_CARDS_BASE_URL  - endpoint base URL (default: https://api.openai.com/v1)
 *   ARTICLE_CARDS_MODEL     - chat model (default: gpt-4.1-mini)
 */
export function generationConfigFromEnv(env: NodeJS.ProcessEnv = process.env): GenerationConfigInput {
  return {
    apiKey: env.OPENAI_API_KEY ?? '',
    baseUrl: env.ARTICLE_CARDS_BASE_URL || undefined,
    model: env.ARTICLE_CARDS_MODEL || undefined,
  };
}
