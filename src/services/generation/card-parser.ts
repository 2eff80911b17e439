/**
 * Parser for the generator's sectioned reply
 *
 *   CLOZE
 *   The {{c1::mitochondria}} produce ATP ; cell biology ;
 *   BASIC
 *   What is ATP? ; The cell's energy currency ;
 *
 * Lines before the first section header are ignored. Leading list markers
 * ("- ", "1. ") are tolerated.
 */

import { createCandidate, hasContent } from '../../models/candidate.js';
import type { Candidate, CandidateKind } from '../../models/candidate.js';

const SECTION_HEADER = /^[#*\s]*(cloze|basic)(?:\s+cards?)?[*:\s]*$/i;

const LIST_MARKER = /^(?:[-*•]\s+|\d+[.)]\s+)/;

/**
 * Split a card line into its two fields. The first ';' ends the first
 * field; everything after it (minus empty segments) is the second.
 */
export function splitCardLine(line: string): [string, string] {
  const parts = line.split(';').map((p) => p.trim());
  const first = parts[0] ?? '';
  const rest = parts
    .slice(1)
    .filter((p) => p.length > 0)
    .join('; ');
  return [first, rest];
}

export interface ParsedReply {
  cloze: Candidate[];
  basic: Candidate[];
}

export function parseCardReply(reply: string, sourceId: string): ParsedReply {
  const parsed: ParsedReply = { cloze: [], basic: [] };
  let section: CandidateKind | null = null;

  for (const rawLine of reply.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.length === 0) continue;

    const header = SECTION_HEADER.exec(line);
    if (header) {
      section = header[1].toLowerCase() === 'cloze' ? 'cloze' : 'basic';
      continue;
    }
    if (section === null) continue;

    const candidate = createCandidate({
      kind: section,
      values: splitCardLine(line.replace(LIST_MARKER, '')),
      sourceId,
    });
    if (hasContent(candidate)) {
      parsed[section].push(candidate);
    }
  }
  return parsed;
}

/**
 * Cloze cards first, then basic cards, in reply order
 */
export function parseCandidates(reply: string, sourceId: string): Candidate[] {
  const { cloze, basic } = parseCardReply(reply, sourceId);
  return [...cloze, ...basic];
}
