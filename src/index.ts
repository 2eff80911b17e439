/**
 * article-cards
 *
 * Entry point: wires configuration, the state database, the signature
 * backend and the collaborators into a pipeline run.
 *
 * Logging goes to stderr; only the run summary and help go to stdout.
 *
 * @module index
 */

import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';
import { fileURLToPath } from 'url';

import { parseCliArguments, HELP_TEXT } from './app/cli.js';
import { loadConfig } from './app/config.js';
import type { AppConfig } from './app/config.js';
import { formatError } from './app/errors.js';
import { formatRunSummary } from './app/report.js';
import { prepareWorkspace, requireApiKey } from './app/startup.js';
import { StateDatabase } from './services/storage/database.js';
import { SqliteLedger } from './services/storage/ledger.js';
import { AcceptedCardStore } from './services/storage/accepted-card-store.js';
import {
  SentenceEncoderClient,
  SignatureService,
  defaultBackendFactories,
  selectSignatureBuilder,
} from './services/signature/index.js';
import { ChatCompletionsClient, CardGenerator, GenerationConfigSchema } from './services/generation/index.js';
import { AnkiConnectExporter, FileExporter } from './services/export/index.js';
import type { CardExporter } from './services/export/index.js';
import {
  ChatArticleExtractor,
  SourceLoader,
  buildDescriptors,
  identifySource,
  listLocalFiles,
  readUrlLists,
  URL_LIST_FILENAME,
} from './services/ingestion/index.js';
import { PipelineOrchestrator } from './services/pipeline/orchestrator.js';
import type { RunSummary } from './services/pipeline/orchestrator.js';

export * from './models/index.js';
export { PipelineOrchestrator } from './services/pipeline/orchestrator.js';
export type { RunSummary, SourceReport, PipelineOptions } from './services/pipeline/orchestrator.js';
export { SimilarityIndex, DuplicateDecisionEngine } from './services/dedup/index.js';
export { normalize } from './services/normalize/text-normalizer.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

// ═══════════════════════════════════════════════════════════════════════════════
// ENVIRONMENT
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Load .env from the first candidate that exists:
 * 1. ARTICLE_CARDS_ENV_FILE (explicit override)
 * 2. CWD/.env
 * 3. package root/.env
 */
export function loadEnvironment(): string | null {
  const envCandidates = [
    process.env.ARTICLE_CARDS_ENV_FILE,
    path.resolve(process.cwd(), '.env'),
    path.resolve(__dirname, '..', '.env'),
  ].filter((p): p is string => typeof p === 'string');

  for (const envPath of envCandidates) {
    if (fs.existsSync(envPath)) {
      dotenv.config({ path: envPath, quiet: true });
      return envPath;
    }
  }
  return null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// RUN
// ═══════════════════════════════════════════════════════════════════════════════

async function createExporter(config: AppConfig): Promise<CardExporter> {
  if (config.toFile) {
    return new FileExporter({ exportDir: config.exportDir });
  }
  const anki = new AnkiConnectExporter({ url: config.ankiConnectUrl });
  try {
    await anki.ensureNoteModels();
  } catch (error) {
    console.error(`[Export] WARNING: ${formatError(error)}`);
  }
  return anki;
}

/**
 * One full run with an already validated configuration
 */
export async function runPipeline(config: AppConfig): Promise<RunSummary | null> {
  const urls = await readUrlLists([
    path.join(config.articleDir, URL_LIST_FILENAME),
    ...config.urlFiles,
  ]);
  const files = await listLocalFiles(config.articleDir);
  const descriptors = buildDescriptors(urls, files);
  if (descriptors.length === 0) {
    console.log(
      `No URLs or article files found. Add URLs to ${path.join(config.articleDir, URL_LIST_FILENAME)}, ` +
        `pass URL lists with --url-files, or put article files in ${config.articleDir}.`
    );
    return null;
  }

  const encoder = new SentenceEncoderClient({
    pythonPath: config.pythonPath,
    model: config.encoderModel,
  });
  const { builder } = await selectSignatureBuilder(
    config.signatureBackend,
    defaultBackendFactories(encoder)
  );
  const signatures = new SignatureService(builder);

  const chatClient = new ChatCompletionsClient(
    GenerationConfigSchema.parse({
      apiKey: config.openaiApiKey,
      baseUrl: config.generationBaseUrl,
      model: config.generationModel,
    })
  );
  const generator = new CardGenerator(chatClient);
  const exporter = await createExporter(config);
  const loader = new SourceLoader({
    cacheDir: config.cacheDir,
    useCache: config.useCache,
    fallbackExtractor: new ChatArticleExtractor(chatClient),
  });

  const database = StateDatabase.open(config.statePath);
  try {
    const ledger = new SqliteLedger(database);
    const cardStore = new AcceptedCardStore(database);

    const orchestrator = new PipelineOrchestrator(
      {
        ledger,
        sources: { identify: identifySource, load: (d, id) => loader.load(d, id) },
        generator,
        exporter,
        signatures,
        cardSink: config.persistIndex ? cardStore : undefined,
      },
      {
        deck: config.deck,
        similarityThreshold: config.similarityThreshold,
        allowDuplicates: config.allowDuplicates,
        processAll: config.processAll,
        customPrompt: config.customPrompt,
      }
    );

    if (config.persistIndex) {
      await orchestrator.seed(cardStore.loadAll());
    }
    return await orchestrator.run(descriptors);
  } finally {
    database.close();
  }
}

/**
 * CLI entry. Never throws.
 *
 * @returns process exit code: 0 on success, 1 if any source failed or the
 *          run could not start
 */
export async function runCli(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
  try {
    const args = parseCliArguments(argv);
    if (args.help) {
      console.log(HELP_TEXT);
      return 0;
    }

    loadEnvironment();
    const config = loadConfig(args.overrides);
    prepareWorkspace(config);
    requireApiKey(config);

    const summary = await runPipeline(config);
    if (!summary) return 0;
    for (const line of formatRunSummary(summary)) {
      console.log(line);
    }
    return summary.failed > 0 ? 1 : 0;
  } catch (error) {
    console.error(formatError(error));
    return 1;
  }
}
