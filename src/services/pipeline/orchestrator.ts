/**
 * Pipeline Orchestrator
 *
 * Sequential: each source is identified, gated by the ledger, loaded,
 * generated, deduplicated, exported and marked before the next one starts.
 *
 * Per-source failures (fetch, generation, export of every card, ledger
 * write) are reported and the run continues with the source left unmarked.
 * IndexInconsistencyError aborts the run.
 *
 * @module services/pipeline/orchestrator
 */

import type { Candidate } from '../../models/candidate.js';
import { previewCandidate } from '../../models/candidate.js';
import type { Ledger, LedgerOutcome } from '../../models/ledger.js';
import { outcomeStatus } from '../../models/ledger.js';
import type { AcceptedEntry, SignatureBackend } from '../../models/signature.js';
import type { SourceDescriptor, SourceItem, SourceOrigin } from '../../models/source-item.js';
import { describeOrigin } from '../../models/source-item.js';
import { AppError } from '../../app/errors.js';
import type { ErrorCategory } from '../../app/errors.js';
import { normalize, normalizeCandidate } from '../normalize/text-normalizer.js';
import type { SignatureService } from '../signature/signature-service.js';
import { IndexInconsistencyError } from '../signature/similarity.js';
import { SimilarityIndex } from '../dedup/similarity-index.js';
import { DuplicateDecisionEngine, validateThreshold } from '../dedup/decision-engine.js';
import type { DecisionStats } from '../dedup/decision-engine.js';
import type { CandidateGenerator } from '../generation/generator.js';
import type { CardExporter } from '../export/types.js';
import { LedgerWriteError } from '../storage/ledger.js';
import type { StoredCard } from '../storage/accepted-card-store.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface SourceProvider {
  identify(descriptor: SourceDescriptor): Promise<string>;
  load(descriptor: SourceDescriptor, id: string): Promise<SourceItem>;
}

/** Where accepted cards are kept between runs */
export interface AcceptedCardSink {
  saveMany(entries: readonly AcceptedEntry[]): void;
}

export interface PipelineDependencies {
  ledger: Ledger;
  sources: SourceProvider;
  generator: CandidateGenerator;
  exporter: CardExporter;
  signatures: SignatureService;
  cardSink?: AcceptedCardSink;
}

export interface PipelineOptions {
  deck: string;
  similarityThreshold: number;
  allowDuplicates: boolean;
  processAll: boolean;
  customPrompt?: string;
}

export interface Rejection {
  candidate: string;
  matched: string;
  similarity: number;
}

export type SourceReport =
  | { status: 'skipped'; sourceId: string; origin: SourceOrigin }
  | {
      status: 'processed';
      sourceId: string;
      origin: SourceOrigin;
      title: string;
      outcome: LedgerOutcome;
      rejections: Rejection[];
    }
  | {
      status: 'failed';
      sourceId: string | null;
      origin: SourceOrigin;
      title: string | null;
      category: ErrorCategory;
      message: string;
    };

export interface RunSummary {
  sources: SourceReport[];
  processed: number;
  skipped: number;
  failed: number;
  generated: number;
  accepted: number;
  rejected: number;
  exportFailures: number;
  backend: SignatureBackend;
  degradedFrom: SignatureBackend | null;
  /** Engine counters, including cards kept without comparison */
  decisions: DecisionStats;
}

class SourceFailure extends Error {
  constructor(
    public readonly category: ErrorCategory,
    message: string,
    public readonly title: string | null
  ) {
    super(message);
    this.name = 'SourceFailure';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// ORCHESTRATOR
// ═══════════════════════════════════════════════════════════════════════════════

export class PipelineOrchestrator {
  readonly index: SimilarityIndex;
  private readonly engine: DuplicateDecisionEngine;
  private readonly options: PipelineOptions;

  constructor(
    private readonly deps: PipelineDependencies,
    options: PipelineOptions
  ) {
    this.options = { ...options, similarityThreshold: validateThreshold(options.similarityThreshold) };
    this.index = new SimilarityIndex(deps.signatures.backend);
    this.engine = new DuplicateDecisionEngine(this.index, {
      threshold: this.options.similarityThreshold,
    });

    deps.signatures.onDegrade(({ fallback }) => {
      this.index.resign('lexical', (entry) => fallback.signText(normalize(entry.normalizedText)));
      console.error(`[Pipeline] Re-signed ${this.index.size} accepted cards with the lexical backend`);
    });
  }

  /**
   * Load cards accepted in earlier runs into the index. They are re-signed
   * with this run's backend and are not re-decided.
   */
  async seed(cards: readonly StoredCard[]): Promise<number> {
    if (cards.length === 0) return 0;
    const texts = cards.map((c) => normalize(c.normalizedText));
    this.deps.signatures.observe(texts);
    const signatures = await this.deps.signatures.signTexts(texts);
    cards.forEach((card, i) => {
      this.index.insert(
        Object.freeze({
          candidate: card.candidate,
          normalizedText: texts[i].text,
          signature: signatures[i],
        })
      );
    });
    console.error(`[Pipeline] Seeded similarity index with ${cards.length} previously accepted cards`);
    return cards.length;
  }

  async run(descriptors: readonly SourceDescriptor[]): Promise<RunSummary> {
    const reports: SourceReport[] = [];
    for (const [i, descriptor] of descriptors.entries()) {
      console.error(
        `[Pipeline] (${i + 1}/${descriptors.length}) ${describeOrigin(descriptor.origin)}`
      );
      reports.push(await this.processSource(descriptor));
    }
    return this.summarize(reports);
  }

  /**
   * Process one source end to end.
   *
   * @throws IndexInconsistencyError (fatal for the run)
   */
  async processSource(descriptor: SourceDescriptor): Promise<SourceReport> {
    const { origin } = descriptor;
    let sourceId: string | null = null;

    try {
      sourceId = await this.step('FETCH_FAILED', null, () => this.deps.sources.identify(descriptor));

      if (!this.options.processAll && this.deps.ledger.hasProcessed(sourceId)) {
        console.error(`[Pipeline] Skipping ${describeOrigin(origin)}: already processed (use --process-all to override)`);
        return { status: 'skipped', sourceId, origin };
      }

      const id = sourceId;
      const source = await this.step('FETCH_FAILED', null, () => this.deps.sources.load(descriptor, id));
      const candidates = await this.step('GENERATION_FAILED', source.title, () =>
        this.deps.generator.generate(source, this.options.customPrompt)
      );

      const { accepted, rejections } = await this.deduplicate(candidates);
      const exportFailures = await this.exportAccepted(source, accepted);

      const exportedIds = new Set(accepted.map((e) => e.candidate.id));
      for (const failure of exportFailures) exportedIds.delete(failure.candidateId);
      this.deps.cardSink?.saveMany(accepted.filter((e) => exportedIds.has(e.candidate.id)));

      const outcome: LedgerOutcome = {
        status: outcomeStatus(candidates.length, accepted.length),
        generated: candidates.length,
        accepted: accepted.length,
        rejected: rejections.length,
        exportFailures: exportFailures.length,
        deck: this.options.deck,
      };

      try {
        this.deps.ledger.markProcessed({
          sourceId: source.id,
          origin: source.origin,
          title: source.title,
          processedAt: new Date().toISOString(),
          outcome,
        });
      } catch (error) {
        throw new SourceFailure(
          'LEDGER_WRITE_FAILED',
          error instanceof Error ? error.message : String(error),
          source.title
        );
      }

      console.error(
        `[Pipeline] Finished "${source.title}": ${outcome.accepted} accepted, ` +
          `${outcome.rejected} duplicates, ${outcome.exportFailures} export failures`
      );
      return { status: 'processed', sourceId: source.id, origin, title: source.title, outcome, rejections };
    } catch (error) {
      if (error instanceof IndexInconsistencyError) {
        throw error;
      }
      const failure =
        error instanceof SourceFailure
          ? error
          : new SourceFailure(AppError.fromUnknown(error).category, errorMessage(error), null);
      console.error(
        `[Pipeline] FAILED ${describeOrigin(origin)} [${failure.category}]: ${failure.message}`
      );
      return {
        status: 'failed',
        sourceId,
        origin,
        title: failure.title,
        category: failure.category,
        message: failure.message,
      };
    }
  }

  private async deduplicate(
    candidates: readonly Candidate[]
  ): Promise<{ accepted: AcceptedEntry[]; rejections: Rejection[] }> {
    const { signatures } = this.deps;

    // Candidates join the corpus before any decision, and existing entries are
    // re-weighted, so every comparison below uses one statistics table
    signatures.observe(candidates.map((c) => normalizeCandidate(c)));
    this.refreshIndex();
    const signed = await signatures.buildMany(candidates);

    const accepted: AcceptedEntry[] = [];
    const rejections: Rejection[] = [];
    for (const { candidate, signature } of signed) {
      const decision = this.engine.decide(candidate, signature, {
        allowDuplicates: this.options.allowDuplicates,
      });
      if (decision.verdict === 'accept') {
        accepted.push(decision.entry);
      } else {
        rejections.push({
          candidate: previewCandidate(candidate),
          matched: previewCandidate(decision.bestMatch.entry.candidate),
          similarity: decision.bestMatch.similarity,
        });
      }
    }
    return { accepted, rejections };
  }

  private refreshIndex(): void {
    const signer = this.deps.signatures.syncSigner();
    if (!signer || this.index.size === 0) return;
    this.index.resign(this.deps.signatures.backend, (entry) => signer(normalize(entry.normalizedText)));
  }

  private async exportAccepted(
    source: SourceItem,
    accepted: readonly AcceptedEntry[]
  ): Promise<{ candidateId: string; reason: string }[]> {
    if (accepted.length === 0) return [];
    const report = await this.step('EXPORT_FAILED', source.title, () =>
      this.deps.exporter.export(
        accepted.map((e) => e.candidate),
        {
          deck: this.options.deck,
          title: source.title,
          allowDuplicates: this.options.allowDuplicates,
        }
      )
    );
    if (report.exported === 0 && report.failures.length > 0) {
      throw new SourceFailure(
        'EXPORT_FAILED',
        `All ${report.failures.length} cards failed to export: ${report.failures[0].reason}`,
        source.title
      );
    }
    return report.failures;
  }

  /**
   * Run one step, turning any non-fatal error into a SourceFailure of the
   * given category
   */
  private async step<T>(category: ErrorCategory, title: string | null, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof IndexInconsistencyError || error instanceof SourceFailure) throw error;
      if (error instanceof LedgerWriteError) {
        throw new SourceFailure('LEDGER_WRITE_FAILED', error.message, title);
      }
      const appError = AppError.fromUnknown(error, category);
      const resolved = appError.category === 'INTERNAL_ERROR' ? category : appError.category;
      throw new SourceFailure(resolved, appError.message, title);
    }
  }

  private summarize(reports: SourceReport[]): RunSummary {
    const summary: RunSummary = {
      sources: reports,
      processed: 0,
      skipped: 0,
      failed: 0,
      generated: 0,
      accepted: 0,
      rejected: 0,
      exportFailures: 0,
      backend: this.deps.signatures.backend,
      degradedFrom: this.deps.signatures.degradedFrom?.from ?? null,
      decisions: this.engine.stats,
    };
    for (const report of reports) {
      if (report.status === 'skipped') {
        summary.skipped++;
      } else if (report.status === 'failed') {
        summary.failed++;
      } else {
        summary.processed++;
        summary.generated += report.outcome.generated;
        summary.accepted += report.outcome.accepted;
        summary.rejected += report.outcome.rejected;
        summary.exportFailures += report.outcome.exportFailures;
      }
    }
    return summary;
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
