/**
 * Coverage Reporter - keyword coverage of produced content
 *
 * Responsibilities:
 * - Matched / missing keywords, in keyword rank order
 * - Coverage percentage
 * - Advisory flags: passive voice density, metric-line ratio, formatting hazards
 *
 * LLM Usage: None (pure code logic)
 */

import { round1, safeRatio } from '@tailorkit/core';
import type { CoverageFlags, CoverageReport } from '@tailorkit/schemas';
import { ATS_MIN_TOKEN_LENGTH, extractKeywords } from '../extract/keyword-extractor.js';

export const DEFAULT_ATS_KEYWORD_LIMIT = 40;

const PASSIVE_PATTERN = /\b(?:was|were|is|are|been|being|be)\s+[a-z]+ed\b/g;
const IMAGE_REFERENCE_PATTERN = /\b(?:image|graphic|photo)s?\b/;

const MAX_PIPES = 5;
const MAX_LINES = 120;
const PASSIVE_DENSITY_LIMIT = 10;
const METRIC_RATIO_FLOOR = 35;

export const RECOMMENDATIONS = {
  missingKeywords: 'Integrate high-priority missing keywords naturally into bullets.',
  passiveVoice: 'Reduce passive voice; prefer direct action verbs.',
  metrics: 'Add more quantified metrics (%, $, time saved, count).',
  hazards: 'Remove formatting hazards that could confuse parsers.',
  strong: 'Profile appears strong; refine wording for further impact.',
} as const;

/** Passive constructions per line break, as a percentage with one decimal. */
export function passiveVoiceDensity(text: string): number {
  const lower = text.toLowerCase();
  const hits = lower.match(PASSIVE_PATTERN)?.length ?? 0;
  const newlines = lower.split('\n').length - 1;
  return round1(safeRatio(hits, newlines) * 100);
}

/** Share of non-blank lines that contain a digit, floored to an integer percentage. */
export function metricLinesRatio(text: string): number {
  const lines = text.split('\n').filter((line) => line.trim());
  const metricLines = lines.filter((line) => /\d/.test(line));
  return Math.floor(safeRatio(metricLines.length, lines.length) * 100);
}

export function formattingHazards(text: string): string[] {
  const lower = text.toLowerCase();
  const hazards: string[] = [];
  const pipes = lower.split('|').length - 1;
  if (pipes > MAX_PIPES) hazards.push('Table-like characters');
  if (IMAGE_REFERENCE_PATTERN.test(lower)) hazards.push('Image references');
  const lines = lower.split('\n').filter((line) => line.trim());
  if (lines.length > MAX_LINES) hazards.push(`Length > ${MAX_LINES} lines`);
  return hazards;
}

export function analyzeFlags(text: string, missing: readonly string[]): CoverageFlags {
  const passiveDensityPct = passiveVoiceDensity(text);
  const metricLinesRatioPct = metricLinesRatio(text);
  const hazards = formattingHazards(text);

  const recommendations: string[] = [];
  if (missing.length > 0) recommendations.push(RECOMMENDATIONS.missingKeywords);
  if (passiveDensityPct > PASSIVE_DENSITY_LIMIT) recommendations.push(RECOMMENDATIONS.passiveVoice);
  if (metricLinesRatioPct < METRIC_RATIO_FLOOR) recommendations.push(RECOMMENDATIONS.metrics);
  if (hazards.length > 0) recommendations.push(RECOMMENDATIONS.hazards);
  if (recommendations.length === 0) recommendations.push(RECOMMENDATIONS.strong);

  return { passiveDensityPct, metricLinesRatioPct, hazards, recommendations };
}

export function analyzeCoverage(
  finalText: string | null | undefined,
  jdKeywords: readonly string[],
): CoverageReport {
  const text = finalText ?? '';
  const lower = text.toLowerCase();

  const matched: string[] = [];
  const missing: string[] = [];
  for (const kw of jdKeywords) {
    if (lower.includes(kw.toLowerCase())) {
      if (!matched.includes(kw)) matched.push(kw);
    } else {
      missing.push(kw);
    }
  }

  const covered = jdKeywords.length - missing.length;
  return {
    matched,
    missing,
    keywordCoveragePct: Math.round(safeRatio(covered, jdKeywords.length) * 100),
    flags: analyzeFlags(text, missing),
  };
}

/** Mine the JD for keywords at the ATS floor and check the resume against them. */
export function analyzeResumeAgainstJob(
  resumeText: string | null | undefined,
  jdText: string | null | undefined,
  limit: number = DEFAULT_ATS_KEYWORD_LIMIT,
): CoverageReport {
  const keywords = extractKeywords(jdText, limit, { minLength: ATS_MIN_TOKEN_LENGTH });
  return analyzeCoverage(resumeText, keywords);
}
