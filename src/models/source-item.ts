/**
 * Source item model - one article or local file ingested by a run
 *
 * @module models/source-item
 */

/**
 * Where a source came from
 */
export type SourceOrigin = { kind: 'url'; url: string } | { kind: 'file'; path: string };

/**
 * A source before its content is loaded. Identity is computed from this
 * alone (canonical URL, or file content) so the ledger can be consulted
 * without fetching anything.
 */
export interface SourceDescriptor {
  origin: SourceOrigin;
}

/**
 * Ingested source. Created once per run and never mutated.
 */
export interface SourceItem {
  /** 'sha256:' + hex of canonical URL or file content */
  readonly id: string;
  readonly origin: SourceOrigin;
  readonly title: string;
  readonly rawText: string;
  /** Canonical form produced by the text normalizer */
  readonly normalizedText: string;
  readonly ingestedAt: string;
}

/**
 * Human-readable label for log lines
 */
export function describeOrigin(origin: SourceOrigin): string {
  return origin.kind === 'url' ? origin.url : origin.path;
}
