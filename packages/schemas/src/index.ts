/**
 * @tailorkit/schemas - record shapes shared by the engine and its callers
 */

export * from './enums.js';
export * from './profile.js';
export * from './job.js';
export * from './match.js';
export * from './coverage.js';
