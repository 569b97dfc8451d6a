/**
 * Review - checks over produced content
 *
 * - coverage-reporter: keyword coverage and advisory flags
 * - framework-validator: bullet grading against STAR/CAR/PAR/WHO/LPS
 * - resume-quality: ten-dimension resume score
 */

export * from './coverage-reporter.js';
export * from './framework-validator.js';
export * from './resume-quality.js';
export * from './grades.js';
