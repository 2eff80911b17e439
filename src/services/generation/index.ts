/**
 * Card generation
 */

export {
  GenerationConfigSchema,
  generationConfigFromEnv,
  DEFAULT_GENERATION_MODEL,
  DEFAULT_GENERATION_BASE_URL,
} from './config.js';
export type { GenerationConfig, GenerationConfigInput } from './config.js';
export { ChatCompletionsClient, ChatRequestError } from './client.js';
export type { ChatMessage, ChatResponse, TokenUsage } from './client.js';
export { buildCardPrompt, BASE_CARD_PROMPT, SYSTEM_PROMPT } from './prompts.js';
export { parseCardReply, parseCandidates, splitCardLine } from './card-parser.js';
export type { ParsedReply } from './card-parser.js';
export { CardGenerator } from './generator.js';
export type { CandidateGenerator } from './generator.js';
