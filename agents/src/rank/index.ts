/**
 * Rank - scoring and selection
 *
 * - match-scorer: weighted seven-dimension profile-to-job score
 * - bullet-ranker: bullet and skill selection
 * - position-filter: which employment records to keep
 */

export * from './match-scorer.js';
export * from './bullet-ranker.js';
export * from './position-filter.js';
