/**
 * FileExporter - appends cards to hourly text files
 *
 * `<exportDir>/<YYYY-MM-DD-HH>_<kind>_cards.txt`, one `field ; field ; title ;`
 * line per card, importable into Anki as semicolon-separated text.
 */

import fs from 'fs';
import path from 'path';
import type { Candidate, CandidateKind } from '../../models/candidate.js';
import type { CardExporter, ExportContext, ExportFailure, ExportReport } from './types.js';

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Local-time hour stamp, e.g. 2024-03-05-14
 */
export function hourStamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}-${pad(date.getHours())}`;
}

/** Newlines would split a card across lines */
function flatten(value: string): string {
  return value.replace(/\s*\r?\n\s*/g, ' ').trim();
}

export function formatCardLine(card: Candidate, title: string): string {
  return `${[...card.fields.map((f) => flatten(f.value)), flatten(title)].join(' ; ')} ;`;
}

export interface FileExporterOptions {
  exportDir: string;
  now?: () => Date;
}

export class FileExporter implements CardExporter {
  readonly name = 'file';
  private readonly exportDir: string;
  private readonly now: () => Date;

  constructor(options: FileExporterOptions) {
    this.exportDir = options.exportDir;
    this.now = options.now ?? (() => new Date());
  }

  filePathFor(kind: CandidateKind, date: Date = this.now()): string {
    return path.join(this.exportDir, `${hourStamp(date)}_${kind}_cards.txt`);
  }

  async export(cards: readonly Candidate[], context: ExportContext): Promise<ExportReport> {
    const failures: ExportFailure[] = [];
    const written: string[] = [];
    let exported = 0;
    const stamp = this.now();

    for (const kind of ['cloze', 'basic'] as const) {
      const batch = cards.filter((c) => c.kind === kind);
      if (batch.length === 0) continue;

      const filePath = this.filePathFor(kind, stamp);
      try {
        await fs.promises.mkdir(this.exportDir, { recursive: true });
        await fs.promises.appendFile(
          filePath,
          batch.map((c) => formatCardLine(c, context.title) + '\n').join(''),
          'utf-8'
        );
        exported += batch.length;
        written.push(filePath);
        console.error(`[Export] Wrote ${batch.length} ${kind} cards to ${filePath}`);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        console.error(`[Export] Failed to write ${filePath}: ${reason}`);
        for (const c of batch) failures.push({ candidateId: c.id, reason });
      }
    }

    return { exported, failures, destination: written.join(', ') || this.exportDir };
  }
}
