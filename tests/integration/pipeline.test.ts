/**
 * Pipeline integration tests
 *
 * Real ledger, card store, signature backends and decision engine; the
 * network collaborators (sources, generator, exporter) run in process.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { PipelineOrchestrator } from '../../src/services/pipeline/orchestrator.js';
import type {
  PipelineOptions,
  SourceProvider,
  SourceReport,
} from '../../src/services/pipeline/orchestrator.js';
import { StateDatabase } from '../../src/services/storage/database.js';
import { SqliteLedger, LedgerWriteError } from '../../src/services/storage/ledger.js';
import { AcceptedCardStore } from '../../src/services/storage/accepted-card-store.js';
import { SignatureService } from '../../src/services/signature/signature-service.js';
import { LexicalSignatureBuilder } from '../../src/services/signature/lexical.js';
import { SemanticSignatureBuilder } from '../../src/services/signature/semantic.js';
import { IndexInconsistencyError } from '../../src/services/signature/similarity.js';
import type { SignatureBuilder } from '../../src/services/signature/types.js';
import { normalize } from '../../src/services/normalize/text-normalizer.js';
import type { CandidateGenerator } from '../../src/services/generation/generator.js';
import type { CardExporter, ExportContext, ExportReport } from '../../src/services/export/types.js';
import { createCandidate } from '../../src/models/candidate.js';
import type { Candidate } from '../../src/models/candidate.js';
import type { Ledger, LedgerRecord } from '../../src/models/ledger.js';
import type { SourceDescriptor, SourceItem } from '../../src/models/source-item.js';
import { generationFailedError } from '../../src/app/errors.js';
import { computeHash } from '../../src/utils/hash.js';
import { cleanupTempDir, createTempDir, FakeEncoder, sourceItem } from '../setup/fixtures.js';

// ═══════════════════════════════════════════════════════════════════════════════
// IN-PROCESS COLLABORATORS
// ═══════════════════════════════════════════════════════════════════════════════

const PHOTOSYNTHESIS_URL = 'https://example.test/photosynthesis';
const LIGHT_URL = 'https://example.test/light';

const A1 = ['What is photosynthesis?', 'Conversion of light into chemical energy'];
const A2 = ['Who wrote On the Origin of Species?', 'Charles Darwin'];
const B1 = ['What is Photosynthesis??', 'Conversion of light into chemical energy.'];
const B2 = ['What is the speed of light?', 'About 300,000 km per second'];

const PAGES = new Map([
  [PHOTOSYNTHESIS_URL, { title: 'Photosynthesis', text: 'Plants turn light into sugar.' }],
  [LIGHT_URL, { title: 'Light', text: 'Light is fast.' }],
]);

const CARDS = new Map<string, string[][]>([
  ['Photosynthesis', [A1, A2]],
  ['Light', [B1, B2]],
]);

function url(target: string): SourceDescriptor {
  return { origin: { kind: 'url', url: target } };
}

function textOf(values: string[]): string {
  return normalize(values.join(' ')).text;
}

class FakeSources implements SourceProvider {
  loads = 0;

  async identify(descriptor: SourceDescriptor): Promise<string> {
    if (descriptor.origin.kind !== 'url') throw new Error('only URLs in this test');
    return computeHash(descriptor.origin.url);
  }

  async load(descriptor: SourceDescriptor): Promise<SourceItem> {
    this.loads++;
    if (descriptor.origin.kind !== 'url') throw new Error('only URLs in this test');
    const page = PAGES.get(descriptor.origin.url);
    if (!page) throw new Error(`HTTP 500 for ${descriptor.origin.url}`);
    return sourceItem(descriptor.origin.url, page.title, page.text);
  }
}

class FakeGenerator implements CandidateGenerator {
  calls = 0;
  readonly failing = new Set<string>();

  constructor(private readonly cards: Map<string, string[][]> = CARDS) {}

  async generate(source: SourceItem): Promise<Candidate[]> {
    this.calls++;
    if (this.failing.has(source.title)) {
      throw generationFailedError(`Card generation failed for "${source.title}": quota exceeded`);
    }
    return (this.cards.get(source.title) ?? []).map((values) =>
      createCandidate({ kind: 'basic', values, sourceId: source.id })
    );
  }
}

class RecordingExporter implements CardExporter {
  readonly name = 'recording';
  readonly exported: Candidate[] = [];
  readonly contexts: ExportContext[] = [];
  rejectCard: (card: Candidate) => boolean = () => false;

  async export(cards: readonly Candidate[], context: ExportContext): Promise<ExportReport> {
    this.contexts.push(context);
    const failures = cards
      .filter((c) => this.rejectCard(c))
      .map((c) => ({ candidateId: c.id, reason: 'anki down' }));
    const ok = cards.filter((c) => !this.rejectCard(c));
    this.exported.push(...ok);
    return { exported: ok.length, failures, destination: 'memory' };
  }
}

/** Ledger whose writes fail for chosen sources */
class FlakyLedger implements Ledger {
  readonly failFor = new Set<string>();

  constructor(private readonly inner: SqliteLedger) {}

  hasProcessed(sourceId: string): boolean {
    return this.inner.hasProcessed(sourceId);
  }

  markProcessed(record: LedgerRecord): void {
    if (this.failFor.has(record.sourceId)) {
      throw new LedgerWriteError(`Failed to record ${record.sourceId} as processed: disk I/O error`, record.sourceId);
    }
    this.inner.markProcessed(record);
  }

  getRecord(sourceId: string): LedgerRecord | null {
    return this.inner.getRecord(sourceId);
  }
}

const OPTIONS: PipelineOptions = {
  deck: 'Default',
  similarityThreshold: 0.85,
  allowDuplicates: false,
  processAll: false,
};

function statuses(reports: SourceReport[]): string[] {
  return reports.map((r) => r.status);
}

// ═══════════════════════════════════════════════════════════════════════════════
// TESTS
// ═══════════════════════════════════════════════════════════════════════════════

describe('PipelineOrchestrator', () => {
  let dir: string;
  let db: StateDatabase;
  let ledger: SqliteLedger;
  let store: AcceptedCardStore;
  let sources: FakeSources;
  let generator: FakeGenerator;
  let exporter: RecordingExporter;

  function lexicalPipeline(
    options: Partial<PipelineOptions> = {},
    overrides: { ledger?: Ledger; signatures?: SignatureService } = {}
  ): PipelineOrchestrator {
    return new PipelineOrchestrator(
      {
        ledger: overrides.ledger ?? ledger,
        sources,
        generator,
        exporter,
        signatures: overrides.signatures ?? new SignatureService(new LexicalSignatureBuilder()),
        cardSink: store,
      },
      { ...OPTIONS, ...options }
    );
  }

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    dir = createTempDir('pipeline');
    db = StateDatabase.open(join(dir, 'state.db'));
    ledger = new SqliteLedger(db);
    store = new AcceptedCardStore(db);
    sources = new FakeSources();
    generator = new FakeGenerator();
    exporter = new RecordingExporter();
  });

  afterEach(() => {
    db.close();
    cleanupTempDir(dir);
    vi.restoreAllMocks();
  });

  it('should reject a paraphrased card from a later source', async () => {
    const summary = await lexicalPipeline().run([url(PHOTOSYNTHESIS_URL), url(LIGHT_URL)]);

    expect(summary).toMatchObject({
      processed: 2,
      skipped: 0,
      failed: 0,
      generated: 4,
      accepted: 3,
      rejected: 1,
      exportFailures: 0,
      backend: 'lexical',
      degradedFrom: null,
      decisions: { accepted: 3, rejected: 1, degenerate: 0, forced: 0 },
    });
    expect(exporter.exported.map((c) => c.fields[0].value)).toEqual([A1[0], A2[0], B2[0]]);

    const light = summary.sources[1];
    expect(light.status).toBe('processed');
    if (light.status === 'processed') {
      expect(light.rejections).toHaveLength(1);
      expect(light.rejections[0].candidate).toBe(
        'What is Photosynthesis?? | Conversion of light into chemical energy.'
      );
      expect(light.rejections[0].matched).toBe(
        'What is photosynthesis? | Conversion of light into chemical energy'
      );
      expect(light.rejections[0].similarity).toBeCloseTo(1, 9);
    }

    expect(ledger.getRecord(computeHash(PHOTOSYNTHESIS_URL))?.outcome).toEqual({
      status: 'exported',
      generated: 2,
      accepted: 2,
      rejected: 0,
      exportFailures: 0,
      deck: 'Default',
    });
    expect(ledger.getRecord(computeHash(LIGHT_URL))?.outcome).toMatchObject({ accepted: 1, rejected: 1 });
    expect(store.loadAll().map((c) => c.normalizedText)).toEqual([textOf(A1), textOf(A2), textOf(B2)]);
  });

  it('should skip processed sources on the next run without loading or generating', async () => {
    await lexicalPipeline().run([url(PHOTOSYNTHESIS_URL), url(LIGHT_URL)]);
    const loadsBefore = sources.loads;
    const callsBefore = generator.calls;

    const summary = await lexicalPipeline().run([url(PHOTOSYNTHESIS_URL), url(LIGHT_URL)]);

    expect(statuses(summary.sources)).toEqual(['skipped', 'skipped']);
    expect(summary.skipped).toBe(2);
    expect(sources.loads).toBe(loadsBefore);
    expect(generator.calls).toBe(callsBefore);
    expect(exporter.exported).toHaveLength(3);
  });

  it('should reject every card of a reprocessed source against the persisted index', async () => {
    await lexicalPipeline().run([url(PHOTOSYNTHESIS_URL), url(LIGHT_URL)]);

    const rerun = lexicalPipeline({ processAll: true });
    await expect(rerun.seed(store.loadAll())).resolves.toBe(3);
    const summary = await rerun.run([url(PHOTOSYNTHESIS_URL), url(LIGHT_URL)]);

    expect(summary).toMatchObject({ processed: 2, accepted: 0, rejected: 4 });
    expect(ledger.getRecord(computeHash(PHOTOSYNTHESIS_URL))?.outcome.status).toBe('all_duplicates');
    expect(ledger.getRecord(computeHash(LIGHT_URL))?.outcome.status).toBe('all_duplicates');
    expect(exporter.exported).toHaveLength(3);
    expect(store.count()).toBe(3);
  });

  it('should keep duplicates when they are allowed', async () => {
    const summary = await lexicalPipeline({ allowDuplicates: true }).run([
      url(PHOTOSYNTHESIS_URL),
      url(LIGHT_URL),
    ]);

    expect(summary).toMatchObject({
      accepted: 4,
      rejected: 0,
      decisions: { accepted: 4, rejected: 0, degenerate: 0, forced: 4 },
    });
    expect(exporter.contexts.every((c) => c.allowDuplicates === true)).toBe(true);
  });

  it('should leave a source unmarked when its ledger write fails and carry on', async () => {
    const flaky = new FlakyLedger(ledger);
    flaky.failFor.add(computeHash(PHOTOSYNTHESIS_URL));

    const summary = await lexicalPipeline({}, { ledger: flaky }).run([
      url(PHOTOSYNTHESIS_URL),
      url(LIGHT_URL),
    ]);

    expect(statuses(summary.sources)).toEqual(['failed', 'processed']);
    expect(summary.sources[0]).toMatchObject({
      status: 'failed',
      sourceId: computeHash(PHOTOSYNTHESIS_URL),
      title: 'Photosynthesis',
      category: 'LEDGER_WRITE_FAILED',
    });
    expect(ledger.hasProcessed(computeHash(PHOTOSYNTHESIS_URL))).toBe(false);
    expect(ledger.hasProcessed(computeHash(LIGHT_URL))).toBe(true);
  });

  it('should report a generation failure and leave the source unmarked', async () => {
    generator.failing.add('Photosynthesis');

    const summary = await lexicalPipeline().run([url(PHOTOSYNTHESIS_URL), url(LIGHT_URL)]);

    expect(summary.sources[0]).toMatchObject({
      status: 'failed',
      category: 'GENERATION_FAILED',
      message: 'Card generation failed for "Photosynthesis": quota exceeded',
    });
    expect(ledger.hasProcessed(computeHash(PHOTOSYNTHESIS_URL))).toBe(false);
    expect(summary).toMatchObject({ processed: 1, failed: 1, accepted: 2 });
  });

  it('should report a load failure as a fetch failure', async () => {
    const missing = 'https://example.test/missing';

    const summary = await lexicalPipeline().run([url(missing)]);

    expect(summary.sources[0]).toMatchObject({
      status: 'failed',
      sourceId: computeHash(missing),
      title: null,
      category: 'FETCH_FAILED',
      message: `HTTP 500 for ${missing}`,
    });
    expect(generator.calls).toBe(0);
  });

  it('should fail a source whose every card fails to export', async () => {
    exporter.rejectCard = () => true;

    const summary = await lexicalPipeline().run([url(PHOTOSYNTHESIS_URL)]);

    expect(summary.sources[0]).toMatchObject({
      status: 'failed',
      category: 'EXPORT_FAILED',
      message: 'All 2 cards failed to export: anki down',
    });
    expect(ledger.hasProcessed(computeHash(PHOTOSYNTHESIS_URL))).toBe(false);
    expect(store.count()).toBe(0);
  });

  it('should persist only the cards that were exported', async () => {
    exporter.rejectCard = (c) => c.fields[0].value === A2[0];

    const summary = await lexicalPipeline().run([url(PHOTOSYNTHESIS_URL)]);

    expect(summary).toMatchObject({ processed: 1, accepted: 2, exportFailures: 1 });
    expect(ledger.getRecord(computeHash(PHOTOSYNTHESIS_URL))?.outcome).toMatchObject({
      status: 'exported',
      exportFailures: 1,
    });
    expect(store.loadAll().map((c) => c.normalizedText)).toEqual([textOf(A1)]);
  });

  it('should mark a source that yields no cards', async () => {
    generator = new FakeGenerator(new Map([['Photosynthesis', []]]));

    const summary = await lexicalPipeline().run([url(PHOTOSYNTHESIS_URL)]);

    expect(summary.sources[0]).toMatchObject({ status: 'processed', outcome: { status: 'no_candidates' } });
    expect(ledger.hasProcessed(computeHash(PHOTOSYNTHESIS_URL))).toBe(true);
  });

  it('should keep a card without comparable text', async () => {
    generator = new FakeGenerator(new Map([['Photosynthesis', [['What is it?', ''], ['Is it?', '']]]]));

    const summary = await lexicalPipeline().run([url(PHOTOSYNTHESIS_URL)]);

    expect(summary).toMatchObject({
      accepted: 2,
      rejected: 0,
      decisions: { accepted: 2, rejected: 0, degenerate: 2, forced: 0 },
    });
  });

  it('should fall back to lexical signatures mid-run and re-sign the index', async () => {
    const encoder = new FakeEncoder(
      new Map([
        [textOf(A1), [1, 0, 0]],
        [textOf(A2), [0, 1, 0]],
      ]),
      { failFromCall: 2 }
    );
    const signatures = new SignatureService(new SemanticSignatureBuilder(encoder, encoder.info));
    const orchestrator = lexicalPipeline({}, { signatures });
    expect(orchestrator.index.backend).toBe('semantic');

    const summary = await orchestrator.run([url(PHOTOSYNTHESIS_URL), url(LIGHT_URL)]);

    expect(summary).toMatchObject({
      processed: 2,
      accepted: 3,
      rejected: 1,
      backend: 'lexical',
      degradedFrom: 'semantic',
    });
    expect(orchestrator.index.backend).toBe('lexical');
    expect(orchestrator.index.entries().every((e) => e.signature.backend === 'lexical')).toBe(true);
    expect(orchestrator.index.size).toBe(3);
    expect(encoder.calls).toHaveLength(2);

    const warnings = vi
      .mocked(console.error)
      .mock.calls.filter(([line]) => typeof line === 'string' && line.includes('failed mid-run'));
    expect(warnings).toEqual([
      [
        '[Signature] WARNING: semantic backend failed mid-run (MODEL_NOT_FOUND: model evicted from cache); ' +
          'using lexical (tf-idf cosine) for the rest of this run',
      ],
    ]);
  });

  it('should abort the run when signatures from different backends meet', async () => {
    const lexical = new LexicalSignatureBuilder();
    const mislabelled: SignatureBuilder = {
      backend: 'semantic',
      description: 'mislabelled',
      observe: () => {},
      sign: async (texts) => texts.map((t) => lexical.signText(t)),
    };
    const orchestrator = lexicalPipeline({}, { signatures: new SignatureService(mislabelled) });

    await expect(orchestrator.run([url(PHOTOSYNTHESIS_URL), url(LIGHT_URL)])).rejects.toBeInstanceOf(
      IndexInconsistencyError
    );
    expect(generator.calls).toBe(1);
    expect(ledger.hasProcessed(computeHash(PHOTOSYNTHESIS_URL))).toBe(false);
  });

  it('should reject an invalid threshold up front', () => {
    expect(() => lexicalPipeline({ similarityThreshold: 2 })).toThrow(
      'Similarity threshold must be a number between 0 and 1, got 2'
    );
  });
});
