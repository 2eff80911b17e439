/**
 * CardGenerator - produces candidate cards for a source
 */

import type { Candidate } from '../../models/candidate.js';
import type { SourceItem } from '../../models/source-item.js';
import { generationFailedError } from '../../app/errors.js';
import type { ChatCompletionsClient } from './client.js';
import { buildCardPrompt, SYSTEM_PROMPT } from './prompts.js';
import { parseCandidates } from './card-parser.js';

/**
 * Anything that turns a source into candidate cards
 */
export interface CandidateGenerator {
  generate(source: SourceItem, customPrompt?: string): Promise<Candidate[]>;
}

export class CardGenerator implements CandidateGenerator {
  constructor(private readonly client: ChatCompletionsClient) {}

  /**
   * @throws AppError (GENERATION_FAILED) when the endpoint fails after retries
   */
  async generate(source: SourceItem, customPrompt?: string): Promise<Candidate[]> {
    console.error(`[Generation] Generating cards for "${source.title}" with ${this.client.model}`);

    let reply: string;
    try {
      const response = await this.client.complete([
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: buildCardPrompt(source.rawText, customPrompt) },
      ]);
      console.error(
        `[Generation] ${response.usage.totalTokens} tokens in ${response.processingTimeMs}ms`
      );
      reply = response.text;
    } catch (error) {
      throw generationFailedError(
        `Card generation failed for "${source.title}": ${error instanceof Error ? error.message : String(error)}`,
        { sourceId: source.id }
      );
    }

    const candidates = parseCandidates(reply, source.id);
    if (candidates.length === 0 && reply.length > 0) {
      console.error(`[Generation] WARNING: reply for "${source.title}" contained no parseable cards`);
    }
    return candidates;
  }
}
