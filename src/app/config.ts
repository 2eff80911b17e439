/**
 * Application configuration
 *
 * Precedence: built-in defaults < environment variables < command-line
 * flags. The merged result is validated once with AppConfigSchema.
 *
 * @module app/config
 */

import os from 'os';
import path from 'path';
import { z } from 'zod';
import {
  DeckName,
  SignatureBackendPreference,
  SimilarityThresholdInput,
  validateInput,
} from '../utils/validation.js';
import { DEFAULT_SIMILARITY_THRESHOLD } from '../services/dedup/decision-engine.js';
import { DEFAULT_ANKICONNECT_URL } from '../services/export/anki-connect.js';
import { DEFAULT_ENCODER_MODEL } from '../services/signature/encoder.js';
import {
  DEFAULT_GENERATION_BASE_URL,
  DEFAULT_GENERATION_MODEL,
} from '../services/generation/config.js';

export const DEFAULT_STATE_PATH = path.join(os.homedir(), '.article-cards', 'state.db');
export const DEFAULT_ARTICLE_DIR = 'articles';
export const DEFAULT_EXPORT_DIR = 'exported_cards';
export const DEFAULT_DECK = 'Default';

export const AppConfigSchema = z.object({
  // Run behaviour
  deck: DeckName.default(DEFAULT_DECK),
  useCache: z.boolean().default(false),
  toFile: z.boolean().default(false),
  customPrompt: z.string().optional(),
  allowDuplicates: z.boolean().default(false),
  processAll: z.boolean().default(false),

  // Duplicate detection
  similarityThreshold: SimilarityThresholdInput.default(DEFAULT_SIMILARITY_THRESHOLD),
  signatureBackend: SignatureBackendPreference.default('auto'),
  persistIndex: z.boolean().default(true),

  // Locations
  urlFiles: z.array(z.string().min(1)).default([]),
  articleDir: z.string().min(1).default(DEFAULT_ARTICLE_DIR),
  statePath: z.string().min(1).default(DEFAULT_STATE_PATH),
  cacheDir: z.string().min(1).optional(),
  exportDir: z.string().min(1).default(DEFAULT_EXPORT_DIR),

  // Collaborators
  openaiApiKey: z.string().default(''),
  generationBaseUrl: z.string().url().default(DEFAULT_GENERATION_BASE_URL),
  generationModel: z.string().min(1).default(DEFAULT_GENERATION_MODEL),
  ankiConnectUrl: z.string().url().default(DEFAULT_ANKICONNECT_URL),
  pythonPath: z.string().min(1).optional(),
  encoderModel: z.string().min(1).default(DEFAULT_ENCODER_MODEL),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type AppConfigInput = z.input<typeof AppConfigSchema>;

/**
 * Settings taken from the environment. Unset and empty variables stay
 * undefined so they fall through to the defaults.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, string | undefined> {
  const pick = (name: string): string | undefined => {
    const value = env[name];
    return value === undefined || value.trim() === '' ? undefined : value.trim();
  };
  return {
    openaiApiKey: pick('OPENAI_API_KEY'),
    generationBaseUrl: pick('ARTICLE_CARDS_BASE_URL'),
    generationModel: pick('ARTICLE_CARDS_MODEL'),
    statePath: pick('ARTICLE_CARDS_STATE_PATH'),
    articleDir: pick('ARTICLE_CARDS_ARTICLE_DIR'),
    similarityThreshold: pick('ARTICLE_CARDS_SIMILARITY_THRESHOLD'),
    signatureBackend: pick('ARTICLE_CARDS_SIGNATURE_BACKEND')?.toLowerCase(),
    ankiConnectUrl: pick('ANKICONNECT_URL'),
    pythonPath: pick('ARTICLE_CARDS_PYTHON'),
    encoderModel: pick('ARTICLE_CARDS_ENCODER_MODEL'),
  };
}

/**
 * Later layers win; undefined values never override
 */
function mergeDefined(...layers: Record<string, unknown>[]): Record<string, unknown> {
  const merged: Record<string, unknown> = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) merged[key] = value;
    }
  }
  return merged;
}

/**
 * Merge defaults, environment and flag overrides, and validate.
 *
 * The article cache defaults to `article-cache/` next to the state database.
 *
 * @throws ValidationError naming every invalid setting
 */
export function loadConfig(
  overrides: AppConfigInput = {},
  env: NodeJS.ProcessEnv = process.env
): AppConfig {
  const config = validateInput(AppConfigSchema, mergeDefined(configFromEnv(env), overrides));
  return {
    ...config,
    cacheDir: config.cacheDir ?? path.join(path.dirname(config.statePath), 'article-cache'),
  };
}
