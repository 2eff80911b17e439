/**
 * Application Error Handling
 *
 * Every failure surfaces as a typed error with a category so the pipeline
 * can tell per-source failures (reported, run continues) from contract
 * violations (run aborts).
 *
 * @module app/errors
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error categories for application errors
 */
export type ErrorCategory =
  // Input / configuration
  | 'VALIDATION_ERROR'
  | 'CONFIGURATION_ERROR'

  // Signature backends
  | 'RESOURCE_UNAVAILABLE'
  | 'DEGENERATE_INPUT'

  // Duplicate detection
  | 'INDEX_INCONSISTENCY'

  // Durable state
  | 'LEDGER_WRITE_FAILED'
  | 'STORAGE_ERROR'

  // External collaborators
  | 'FETCH_FAILED'
  | 'GENERATION_FAILED'
  | 'EXPORT_FAILED'

  // Internal errors
  | 'INTERNAL_ERROR';

const VALID_CATEGORIES = new Set<string>([
  'VALIDATION_ERROR',
  'CONFIGURATION_ERROR',
  'RESOURCE_UNAVAILABLE',
  'DEGENERATE_INPUT',
  'INDEX_INCONSISTENCY',
  'LEDGER_WRITE_FAILED',
  'STORAGE_ERROR',
  'FETCH_FAILED',
  'GENERATION_FAILED',
  'EXPORT_FAILED',
  'INTERNAL_ERROR',
]);

function isValidCategory(value: string): value is ErrorCategory {
  return VALID_CATEGORIES.has(value);
}

/**
 * Map custom error class names to AppError categories.
 *
 * EncoderError carries its own `.category` (RESOURCE_UNAVAILABLE when the
 * model or its runtime is missing), which fromUnknown() prefers.
 */
const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  ValidationError: 'VALIDATION_ERROR',
  StorageError: 'STORAGE_ERROR',
  LedgerWriteError: 'LEDGER_WRITE_FAILED',
  IndexInconsistencyError: 'INDEX_INCONSISTENCY',
  EncoderError: 'RESOURCE_UNAVAILABLE',
};

const SELF_CATEGORIZED_NAMES = new Set(['EncoderError']);

// ═══════════════════════════════════════════════════════════════════════════════
// APP ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class AppError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'AppError';
    this.category = category;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AppError);
    }
  }

  /**
   * Create error from unknown caught value. Always produces a typed error.
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): AppError {
    if (error instanceof AppError) {
      return error;
    }

    if (error instanceof Error) {
      const category = ERROR_NAME_TO_CATEGORY[error.name] ?? defaultCategory;

      const ownCategory = readStringProperty(error, 'category');
      const resolvedCategory =
        SELF_CATEGORIZED_NAMES.has(error.name) && ownCategory && isValidCategory(ownCategory)
          ? ownCategory
          : category;

      const customCode = readStringProperty(error, 'code');
      const customDetails = readRecordProperty(error, 'details');
      return new AppError(resolvedCategory, error.message, {
        originalName: error.name,
        ...(customCode && { errorCode: customCode }),
        ...(customDetails && { errorDetails: customDetails }),
        stack: error.stack,
      });
    }

    return new AppError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
      stack: this.stack,
    };
  }
}

function readStringProperty(error: Error, key: string): string | undefined {
  const value: unknown = Reflect.get(error, key);
  return typeof value === 'string' ? value : undefined;
}

function readRecordProperty(error: Error, key: string): Record<string, unknown> | undefined {
  const value: unknown = Reflect.get(error, key);
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return undefined;
  }
  return Object.fromEntries(Object.entries(value));
}

// ═══════════════════════════════════════════════════════════════════════════════
// RECOVERY HINTS
// ═══════════════════════════════════════════════════════════════════════════════

const RECOVERY_HINTS: Record<ErrorCategory, string> = {
  VALIDATION_ERROR: 'Check flag values and their ranges (see --help)',
  CONFIGURATION_ERROR: 'Check .env / environment variables. Required: OPENAI_API_KEY',
  RESOURCE_UNAVAILABLE:
    'Install sentence-transformers and cache the encoder model, or run with --signature-backend lexical',
  DEGENERATE_INPUT: 'The card has no comparable text; it was kept as-is',
  INDEX_INCONSISTENCY: 'Signatures from different backends were compared; this is a bug',
  LEDGER_WRITE_FAILED: 'Check free disk space and permissions on the state database',
  STORAGE_ERROR: 'Check the state database path (ARTICLE_CARDS_STATE_PATH)',
  FETCH_FAILED: 'Check the URL and network connectivity, or retry with --use-cache',
  GENERATION_FAILED: 'Check OPENAI_API_KEY, ARTICLE_CARDS_BASE_URL and the model name',
  EXPORT_FAILED: 'Check that Anki is running with AnkiConnect enabled, or use --to-file',
  INTERNAL_ERROR: 'Re-run with the same inputs and report the stack trace',
};

export function getRecoveryHint(category: ErrorCategory): string {
  return RECOVERY_HINTS[category];
}

/**
 * Format an error as a single log line: `[CATEGORY] message (hint: ...)`
 */
export function formatError(error: unknown): string {
  const appError = AppError.fromUnknown(error);
  return `[${appError.category}] ${appError.message} (hint: ${RECOVERY_HINTS[appError.category]})`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export function validationError(message: string, details?: Record<string, unknown>): AppError {
  return new AppError('VALIDATION_ERROR', message, details);
}

export function configurationError(message: string, details?: Record<string, unknown>): AppError {
  return new AppError('CONFIGURATION_ERROR', message, details);
}

export function fetchFailedError(message: string, details?: Record<string, unknown>): AppError {
  return new AppError('FETCH_FAILED', message, details);
}

export function generationFailedError(
  message: string,
  details?: Record<string, unknown>
): AppError {
  return new AppError('GENERATION_FAILED', message, details);
}

export function exportFailedError(message: string, details?: Record<string, unknown>): AppError {
  return new AppError('EXPORT_FAILED', message, details);
}
