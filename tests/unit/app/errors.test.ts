/**
 * AppError tests
 */

import { describe, it, expect } from 'vitest';
import {
  AppError,
  formatError,
  configurationError,
  getRecoveryHint,
} from '../../../src/app/errors.js';
import { ValidationError } from '../../../src/utils/validation.js';
import { EncoderError } from '../../../src/services/signature/encoder.js';
import { LedgerWriteError } from '../../../src/services/storage/ledger.js';
import { StorageError, StorageErrorCode } from '../../../src/services/storage/database.js';
import { IndexInconsistencyError } from '../../../src/services/signature/similarity.js';

describe('AppError.fromUnknown', () => {
  it('should return an AppError unchanged', () => {
    const error = configurationError('missing key');
    expect(AppError.fromUnknown(error)).toBe(error);
  });

  it('should map known error classes to categories', () => {
    expect(AppError.fromUnknown(new ValidationError('bad')).category).toBe('VALIDATION_ERROR');
    expect(AppError.fromUnknown(new LedgerWriteError('disk full', 'sha256:a')).category).toBe(
      'LEDGER_WRITE_FAILED'
    );
    expect(
      AppError.fromUnknown(new StorageError('closed', StorageErrorCode.DATABASE_CLOSED)).category
    ).toBe('STORAGE_ERROR');
    expect(AppError.fromUnknown(new IndexInconsistencyError('mixed')).category).toBe(
      'INDEX_INCONSISTENCY'
    );
  });

  it('should use the category an encoder error carries', () => {
    expect(AppError.fromUnknown(new EncoderError('no model', 'MODEL_NOT_FOUND')).category).toBe(
      'RESOURCE_UNAVAILABLE'
    );
    expect(AppError.fromUnknown(new EncoderError('garbled', 'PARSE_ERROR')).category).toBe(
      'INTERNAL_ERROR'
    );
  });

  it('should keep the code and details of custom errors', () => {
    const error = AppError.fromUnknown(new EncoderError('no model', 'MODEL_NOT_FOUND', { model: 'm' }));
    expect(error.details).toMatchObject({
      originalName: 'EncoderError',
      errorCode: 'MODEL_NOT_FOUND',
      errorDetails: { model: 'm' },
    });
  });

  it('should fall back to the default category for plain errors and values', () => {
    expect(AppError.fromUnknown(new Error('x'), 'FETCH_FAILED').category).toBe('FETCH_FAILED');
    const fromString = AppError.fromUnknown('boom');
    expect(fromString.category).toBe('INTERNAL_ERROR');
    expect(fromString.message).toBe('boom');
    expect(fromString.details).toEqual({ originalValue: 'boom' });
  });
});

describe('formatError', () => {
  it('should render category, message and hint on one line', () => {
    expect(formatError(configurationError('OPENAI_API_KEY is not set.'))).toBe(
      '[CONFIGURATION_ERROR] OPENAI_API_KEY is not set. ' +
        '(hint: Check .env / environment variables. Required: OPENAI_API_KEY)'
    );
  });

  it('should give every category a hint', () => {
    expect(getRecoveryHint('EXPORT_FAILED')).toBe(
      'Check that Anki is running with AnkiConnect enabled, or use --to-file'
    );
  });
});
