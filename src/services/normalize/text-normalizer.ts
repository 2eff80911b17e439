/**
 * Text Normalizer
 *
 * Canonicalizes card and article text into a comparable form. Both signature
 * backends consume the same token stream, so everything that should not
 * influence similarity (case, markup, cloze syntax, punctuation, spacing) is
 * removed here and nowhere else.
 *
 * Pure and locale-independent: `toLowerCase` (never `toLocaleLowerCase`) and
 * NFKC composition give the same output on every machine.
 *
 * @module services/normalize/text-normalizer
 */

import type { Candidate } from '../../models/candidate.js';

export interface NormalizedText {
  readonly text: string;
  readonly tokens: readonly string[];
}

/** `{{c1::answer}}` or `{{c1::answer::hint}}` */
const CLOZE_REGEX = /\{\{c\d+::(.*?)(?:::[^}]*)?\}\}/g;

const TAG_REGEX = /<[^>]*>/g;

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

const ENTITY_REGEX = /&(#x[0-9a-f]+|#\d+|[a-z]+);/gi;

/** Possessive suffix, dropped so "France's" and "France" share a token */
const POSSESSIVE_REGEX = /['’]s(?![\p{L}\p{M}\p{N}])/gu;

const APOSTROPHE_REGEX = /['’]/g;

/** Combining marks (vowel signs, diacritics) belong to the word they modify */
const NON_WORD_REGEX = /[^\p{L}\p{M}\p{N}]+/gu;

const EMPTY: NormalizedText = Object.freeze({ text: '', tokens: Object.freeze([]) });

function decodeEntity(match: string, body: string): string {
  if (body[0] === '#') {
    const codePoint =
      body[1] === 'x' || body[1] === 'X' ? parseInt(body.slice(2), 16) : parseInt(body.slice(1), 10);
    return Number.isFinite(codePoint) && codePoint > 0 && codePoint <= 0x10ffff
      ? String.fromCodePoint(codePoint)
      : ' ';
  }
  return NAMED_ENTITIES[body.toLowerCase()] ?? match;
}

/**
 * Remove markup that is presentation, not content: cloze wrappers (keeping
 * the answer), HTML tags and entities.
 */
export function stripMarkup(text: string): string {
  return text
    .replace(CLOZE_REGEX, '$1')
    .replace(TAG_REGEX, ' ')
    .replace(ENTITY_REGEX, decodeEntity);
}

/**
 * Canonicalize text for comparison.
 *
 * @returns canonical text (single-spaced lowercase words) and its tokens;
 *          empty input gives `{ text: '', tokens: [] }`
 */
export function normalize(text: string): NormalizedText {
  if (text.trim().length === 0) {
    return EMPTY;
  }

  const canonical = stripMarkup(text.normalize('NFKC'))
    .toLowerCase()
    .replace(POSSESSIVE_REGEX, '')
    .replace(APOSTROPHE_REGEX, '')
    .replace(NON_WORD_REGEX, ' ')
    .trim();

  if (canonical.length === 0) {
    return EMPTY;
  }
  return Object.freeze({ text: canonical, tokens: Object.freeze(canonical.split(' ')) });
}

/**
 * Joined field values of a candidate, in field order
 */
export function candidateText(candidate: Candidate): string {
  return candidate.fields
    .map((f) => f.value)
    .filter((v) => v.length > 0)
    .join(' ');
}

export function normalizeCandidate(candidate: Candidate): NormalizedText {
  return normalize(candidateText(candidate));
}

/**
 * Tidy article text for generation without changing its wording: NFKC,
 * trimmed lines, no runs of blank lines or inner whitespace.
 */
export function cleanArticleText(text: string): string {
  return text
    .normalize('NFKC')
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line) => line.replace(/[ \t\f\v ]+/g, ' ').trim())
    .filter((line, i, lines) => line.length > 0 || (i > 0 && lines[i - 1].length > 0))
    .join('\n')
    .trim();
}
