/**
 * Command-line flags
 *
 * @module app/cli
 */

import { parseArgs } from 'util';
import { validationError } from './errors.js';
import type { AppConfigInput } from './config.js';
import { DEFAULT_DECK } from './config.js';

export const HELP_TEXT = `Usage: article-cards [options] [url-file ...]

Turn the articles in the article directory and URL lists into Anki cards,
skipping sources that were processed before and cards that duplicate
existing ones.

Options:
  --deck <name>                  Anki deck to add cards to (default: ${DEFAULT_DECK})
  --use-cache                    Reuse fetched article text from the local cache
  --to-file                      Write cards to text files instead of AnkiConnect
  --custom-prompt <text>         Extra instructions for card generation
  --allow-duplicates             Keep cards even when they duplicate existing ones
  --process-all                  Process sources even if they were processed before
  --similarity-threshold <0..1>  Similarity at which a card is a duplicate (default: 0.85)
  --signature-backend <name>     auto | lexical | semantic (default: auto)
  --url-files <file>             Extra URL list; repeat the flag or list files after the options
  --article-dir <dir>            Directory with article files and urls.txt (default: articles)
  --state-path <file>            State database (default: ~/.article-cards/state.db)
  --export-dir <dir>             Output directory for --to-file (default: exported_cards)
  --no-persist-index             Do not carry accepted cards over to later runs
  -h, --help                     Show this help

Environment:
  OPENAI_API_KEY (required), ARTICLE_CARDS_BASE_URL, ARTICLE_CARDS_MODEL,
  ARTICLE_CARDS_STATE_PATH, ARTICLE_CARDS_ARTICLE_DIR,
  ARTICLE_CARDS_SIGNATURE_BACKEND, ARTICLE_CARDS_SIMILARITY_THRESHOLD,
  ANKICONNECT_URL, ARTICLE_CARDS_PYTHON, ARTICLE_CARDS_ENCODER_MODEL
`;

export interface CliArguments {
  help: boolean;
  overrides: AppConfigInput;
}

/**
 * Parse argv (without the node and script entries) into config overrides.
 * Flags that were not given stay undefined.
 *
 * @throws AppError (VALIDATION_ERROR) for unknown flags or missing values
 */
export function parseCliArguments(argv: readonly string[]): CliArguments {
  const { values, positionals } = parseFlags(argv);
  const urlFiles = [...(values['url-files'] ?? []), ...positionals];

  return {
    help: values.help ?? false,
    overrides: {
      deck: values.deck,
      useCache: values['use-cache'],
      toFile: values['to-file'],
      customPrompt: values['custom-prompt'],
      allowDuplicates: values['allow-duplicates'],
      processAll: values['process-all'],
      similarityThreshold: values['similarity-threshold'],
      signatureBackend: parseBackend(values['signature-backend']),
      urlFiles: urlFiles.length > 0 ? urlFiles : undefined,
      articleDir: values['article-dir'],
      statePath: values['state-path'],
      exportDir: values['export-dir'],
      persistIndex: values['no-persist-index'] ? false : undefined,
    },
  };
}

function parseFlags(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        deck: { type: 'string' },
        'use-cache': { type: 'boolean' },
        'to-file': { type: 'boolean' },
        'custom-prompt': { type: 'string' },
        'allow-duplicates': { type: 'boolean' },
        'process-all': { type: 'boolean' },
        'similarity-threshold': { type: 'string' },
        'signature-backend': { type: 'string' },
        'url-files': { type: 'string', multiple: true },
        'article-dir': { type: 'string' },
        'state-path': { type: 'string' },
        'export-dir': { type: 'string' },
        'no-persist-index': { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (error) {
    throw validationError(error instanceof Error ? error.message : String(error));
  }
}

function parseBackend(value: string | undefined): AppConfigInput['signatureBackend'] {
  if (value === undefined) return undefined;
  const lower = value.toLowerCase();
  if (lower === 'auto' || lower === 'lexical' || lower === 'semantic') return lower;
  throw validationError(`--signature-backend must be one of auto, lexical, semantic (got "${value}")`);
}
