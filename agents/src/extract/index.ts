/**
 * Extract - text mining over job descriptions
 *
 * - keyword-extractor: frequency-ranked keywords, synonym expansion
 * - requirement-parser: years, degree and canonical-group keywords
 */

export * from './keyword-extractor.js';
export * from './requirement-parser.js';
