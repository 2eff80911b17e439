/**
 * Duplicate detection
 *
 * @module services/dedup
 */

export { SimilarityIndex } from './similarity-index.js';
export type { Match } from './similarity-index.js';
export {
  DuplicateDecisionEngine,
  DEFAULT_SIMILARITY_THRESHOLD,
  validateThreshold,
} from './decision-engine.js';
export type { Decision, DecisionOptions, DecisionStats } from './decision-engine.js';
