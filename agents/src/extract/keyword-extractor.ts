/**
 * Keyword Extractor - frequency-ranked terms from job-description text
 *
 * Responsibilities:
 * - Tokenize alphabetic runs, drop short tokens and stopwords
 * - Rank by frequency, ties by first occurrence
 * - Expand keywords through a synonym table (ranker only)
 *
 * LLM Usage: None (pure code logic)
 */

import { SKILL_SYNONYMS, STOPWORDS, type SynonymTable } from '@tailorkit/core';

export const DEFAULT_MIN_TOKEN_LENGTH = 3;

/** Floor used when mining a JD for ATS coverage checks. */
export const ATS_MIN_TOKEN_LENGTH = 4;

export interface KeywordExtractionOptions {
  /** Shortest token kept. */
  minLength?: number;
  stopwords?: ReadonlySet<string>;
}

// Alphabetic runs; hyphenated compounds ("cross-functional") stay whole.
const TOKEN_PATTERN = /[a-z]+(?:-[a-z]+)*/g;

export function tokenize(text: string | null | undefined): string[] {
  if (!text) return [];
  return text.toLowerCase().match(TOKEN_PATTERN) ?? [];
}

/**
 * Frequency of every kept token. Map iteration order is first-occurrence
 * order, which the ranking relies on for ties.
 */
export function countTerms(
  text: string | null | undefined,
  options: KeywordExtractionOptions = {},
): Map<string, number> {
  const minLength = options.minLength ?? DEFAULT_MIN_TOKEN_LENGTH;
  const stopwords = options.stopwords ?? STOPWORDS;
  const freq = new Map<string, number>();

  for (const token of tokenize(text)) {
    if (token.length < minLength || stopwords.has(token)) continue;
    freq.set(token, (freq.get(token) ?? 0) + 1);
  }
  return freq;
}

export function extractKeywords(
  text: string | null | undefined,
  limit: number,
  options: KeywordExtractionOptions = {},
): string[] {
  if (limit <= 0) return [];

  // Array#sort is stable, so equal counts keep first-occurrence order.
  const ranked = [...countTerms(text, options).entries()].sort((a, b) => b[1] - a[1]);
  return ranked.slice(0, limit).map(([term]) => term);
}

export function expandKeywords(
  keywords: Iterable<string>,
  synonymTable: SynonymTable = SKILL_SYNONYMS,
): Set<string> {
  const expanded = new Set<string>();
  for (const kw of keywords) {
    expanded.add(kw);
    // Own keys only: JD words such as "constructor" must not hit Object.prototype.
    if (Object.prototype.hasOwnProperty.call(synonymTable, kw)) {
      for (const syn of synonymTable[kw]) expanded.add(syn);
    }
  }
  return expanded;
}
