/**
 * AnkiConnectExporter - adds notes through the AnkiConnect add-on
 *
 * Uses AnkiConnect API version 6: `addNote` once per card, plus
 * `modelNames` / `createModel` to make sure both note models exist.
 */

import { z } from 'zod';
import type { Candidate } from '../../models/candidate.js';
import { exportFailedError } from '../../app/errors.js';
import type { CardExporter, ExportContext, ExportFailure, ExportReport } from './types.js';

export const DEFAULT_ANKICONNECT_URL = 'http://localhost:8765';
export const ANKICONNECT_VERSION = 6;
export const CLOZE_MODEL_NAME = 'ArticleCards Cloze';
export const BASIC_MODEL_NAME = 'ArticleCards Basic';
export const NOTE_TAG = 'article-cards';

const REQUEST_TIMEOUT_MS = 15_000;

const CARD_CSS = `.card {
 font-family: arial;
 font-size: 20px;
 text-align: left;
 color: black;
 background-color: white;
}
.cloze {
 font-weight: bold;
 color: blue;
}`;

const AnkiResponseSchema = z.object({
  result: z.unknown(),
  error: z.string().nullable(),
});

/**
 * Anki tags cannot contain spaces
 */
export function titleTag(title: string): string {
  return title.trim().replace(/\s+/g, '_').slice(0, 100) || 'untitled';
}

export interface AnkiConnectOptions {
  url?: string;
  fetchImpl?: typeof fetch;
}

export class AnkiConnectExporter implements CardExporter {
  readonly name = 'anki-connect';
  private readonly url: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: AnkiConnectOptions = {}) {
    this.url = options.url ?? DEFAULT_ANKICONNECT_URL;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /**
   * Create the cloze and basic note models if Anki lacks them.
   *
   * @returns names of the models created
   * @throws AppError (EXPORT_FAILED) when AnkiConnect is unreachable or refuses
   */
  async ensureNoteModels(): Promise<string[]> {
    const result = await this.invoke('modelNames', {});
    const existing = z.array(z.string()).safeParse(result);
    if (!existing.success) {
      throw exportFailedError('AnkiConnect modelNames returned an unexpected result');
    }

    const created: string[] = [];
    if (!existing.data.includes(CLOZE_MODEL_NAME)) {
      await this.invoke('createModel', {
        modelName: CLOZE_MODEL_NAME,
        inOrderFields: ['Text', 'Extra'],
        css: CARD_CSS,
        isCloze: true,
        cardTemplates: [
          { Name: 'Cloze', Front: '{{cloze:Text}}', Back: '{{cloze:Text}}<br>{{Extra}}' },
        ],
      });
      created.push(CLOZE_MODEL_NAME);
    }
    if (!existing.data.includes(BASIC_MODEL_NAME)) {
      await this.invoke('createModel', {
        modelName: BASIC_MODEL_NAME,
        inOrderFields: ['Front', 'Back'],
        css: CARD_CSS,
        isCloze: false,
        cardTemplates: [{ Name: 'Basic', Front: '{{Front}}', Back: '{{Front}}<hr id=answer>{{Back}}' }],
      });
      created.push(BASIC_MODEL_NAME);
    }
    for (const name of created) {
      console.error(`[Export] Created note model "${name}" in Anki`);
    }
    return created;
  }

  async export(cards: readonly Candidate[], context: ExportContext): Promise<ExportReport> {
    let exported = 0;
    const failures: ExportFailure[] = [];

    for (const card of cards) {
      try {
        await this.invoke('addNote', { note: this.toNote(card, context) });
        exported++;
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        console.error(`[Export] Failed to add card ${card.id}: ${reason}`);
        failures.push({ candidateId: card.id, reason });
      }
    }

    console.error(`[Export] Added ${exported}/${cards.length} cards to deck "${context.deck}"`);
    return { exported, failures, destination: this.url };
  }

  private toNote(card: Candidate, context: ExportContext): Record<string, unknown> {
    return {
      deckName: context.deck,
      modelName: card.kind === 'cloze' ? CLOZE_MODEL_NAME : BASIC_MODEL_NAME,
      fields: Object.fromEntries(card.fields.map((f) => [f.name, f.value])),
      tags: [NOTE_TAG, titleTag(context.title)],
      options: { allowDuplicate: context.allowDuplicates ?? false },
    };
  }

  /**
   * @throws AppError (EXPORT_FAILED) on transport errors or an AnkiConnect error reply
   */
  private async invoke(action: string, params: Record<string, unknown>): Promise<unknown> {
    let body: unknown;
    try {
      const response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ action, version: ANKICONNECT_VERSION, params }),
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
      });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status} ${response.statusText}`);
      }
      body = await response.json();
    } catch (error) {
      throw exportFailedError(
        `AnkiConnect ${action} failed: ${error instanceof Error ? error.message : String(error)}`,
        { url: this.url, action }
      );
    }

    const parsed = AnkiResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw exportFailedError(`AnkiConnect ${action} returned an unexpected response`, { action });
    }
    if (parsed.data.error !== null) {
      throw exportFailedError(`AnkiConnect ${action}: ${parsed.data.error}`, { action });
    }
    return parsed.data.result;
  }
}
