/**
 * @tailorkit/agents - Job-match and resume-tailoring engine
 *
 * - extract/ : keyword extraction and JD requirement parsing
 * - rank/    : match scoring, bullet/skill/position selection
 * - review/  : keyword coverage, bullet frameworks, resume quality
 * - match/   : JobMatchAgent, the end-to-end pipeline
 * - shared/  : BaseAgent and agent types
 */

export * from './shared/index.js';
export * from './extract/index.js';
export * from './rank/index.js';
export * from './review/index.js';
export * from './match/index.js';
