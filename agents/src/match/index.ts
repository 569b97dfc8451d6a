/**
 * Match - the end-to-end tailoring pipeline
 */

export * from './job-match-agent.js';
export * from './types.js';
