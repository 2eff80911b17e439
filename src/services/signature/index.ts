/**
 * Signature services
 *
 * @module services/signature
 */

export type { SignatureBuilder } from './types.js';
export { LexicalSignatureBuilder, loadDefaultStopwords, DEFAULT_STOPWORDS_PATH } from './lexical.js';
export { SemanticSignatureBuilder } from './semantic.js';
export {
  SentenceEncoderClient,
  EncoderError,
  DEFAULT_ENCODER_MODEL,
  DEFAULT_ENCODER_BATCH_SIZE,
} from './encoder.js';
export type { SentenceEncoder, EncoderInfo, SentenceEncoderOptions } from './encoder.js';
export {
  selectSignatureBuilder,
  defaultBackendFactories,
  backendOrder,
} from './selector.js';
export type { BackendFactory, BackendFailure, BackendSelection } from './selector.js';
export { SignatureService } from './signature-service.js';
export type { SignedCandidate, DegradationEvent } from './signature-service.js';
export { cosineSimilarity, assertComparable, IndexInconsistencyError } from './similarity.js';
