/**
 * Resume quality score over plain resume text: ten weighted dimensions
 * adding up to 100, with a letter grade, strengths and improvements.
 */

import { ACTION_VERBS } from '@tailorkit/core';
import { qualityGrade } from './grades.js';

export interface ResumeDimensionScores {
  quantifiableAchievements: number;
  actionVerbs: number;
  atsOptimization: number;
  keywordDensity: number;
  conciseness: number;
  formatting: number;
  roleRelevance: number;
  skillsOrganization: number;
  contactInfo: number;
  errorFree: number;
}

export interface ResumeQualityReport {
  totalScore: number;
  grade: string;
  dimensionScores: ResumeDimensionScores;
  strengths: string[];
  improvements: string[];
}

export const DIMENSION_MAX_POINTS: Readonly<Record<keyof ResumeDimensionScores, number>> = {
  quantifiableAchievements: 15,
  actionVerbs: 10,
  atsOptimization: 15,
  keywordDensity: 15,
  conciseness: 10,
  formatting: 10,
  roleRelevance: 15,
  skillsOrganization: 5,
  contactInfo: 3,
  errorFree: 2,
};

export const REQUIRED_SECTIONS: readonly string[] = [
  'Professional Summary',
  'Experience',
  'Education',
  'Skills',
];

export const DEFAULT_DOMAIN_TERMS: readonly string[] = [
  'supply chain',
  'manufacturing',
  'production',
  'assembly',
  'engineering',
  'process',
  'quality',
  'operations',
];

const MAX = DIMENSION_MAX_POINTS;

const METRIC_PATTERN = /\d+%|\d+x|\d+\+|\$\d+[KMB]?|\d+,\d+/g;
const PHONE_PATTERN = /\(\d{3}\)\s?\d{3}-\d{4}/;
const SLOPPY_WORDS_PATTERN = /\b(?:i|Im|dont|cant)\b/;
const BULLET_LINE_PATTERN = /^\s*(?:•|-|\*)\s+/m;

function countOccurrences(text: string, needle: string): number {
  return text.split(needle).length - 1;
}

function scoreConciseness(wordCount: number): number {
  if (wordCount >= 500 && wordCount <= 800) return 10;
  if ((wordCount >= 400 && wordCount < 500) || (wordCount > 800 && wordCount <= 900)) return 7;
  return 5;
}

export function scoreResumeDimensions(
  text: string,
  targetKeywords: readonly string[],
  domainTerms: readonly string[] = DEFAULT_DOMAIN_TERMS,
): ResumeDimensionScores {
  const lower = text.toLowerCase();
  const upper = text.toUpperCase();
  const lines = text.split('\n').filter((line) => line.trim());

  const metrics = text.match(METRIC_PATTERN)?.length ?? 0;
  const verbUses = ACTION_VERBS.reduce((sum, verb) => sum + countOccurrences(text, verb), 0);
  const sectionsFound = REQUIRED_SECTIONS.filter((s) => upper.includes(s.toUpperCase())).length;
  const keywordHits = targetKeywords.filter((kw) => lower.includes(kw.toLowerCase())).length;
  const domainHits = domainTerms.filter((term) => lower.includes(term.toLowerCase())).length;

  let formatting = 0;
  if (lines.length > 15) formatting += 5;
  if (BULLET_LINE_PATTERN.test(text)) formatting += 5;

  let contactInfo = 0;
  if (PHONE_PATTERN.test(text)) contactInfo += 1;
  if (text.includes('@')) contactInfo += 1;
  if (lower.includes('linkedin.com')) contactInfo += 1;

  let errorFree = 2;
  if (countOccurrences(text, '  ') > 5) errorFree -= 0.5;
  if (SLOPPY_WORDS_PATTERN.test(text)) errorFree -= 0.5;

  return {
    quantifiableAchievements: Math.min(MAX.quantifiableAchievements, metrics * 2),
    actionVerbs: Math.min(MAX.actionVerbs, verbUses),
    // +3 per standard section header, +3 for plain text (no tables or graphics to parse)
    atsOptimization: Math.min(MAX.atsOptimization, sectionsFound * 3 + 3),
    keywordDensity: Math.min(MAX.keywordDensity, keywordHits),
    conciseness: scoreConciseness(text.split(/\s+/).filter(Boolean).length),
    formatting,
    roleRelevance: Math.min(MAX.roleRelevance, domainHits * 2),
    skillsOrganization: lower.includes('competencies') || lower.includes('skills') ? 5 : 2,
    contactInfo,
    errorFree: Math.max(0, errorFree),
  };
}

export function scoreResumeText(
  text: string,
  targetKeywords: readonly string[],
  domainTerms: readonly string[] = DEFAULT_DOMAIN_TERMS,
): ResumeQualityReport {
  const scores = scoreResumeDimensions(text, targetKeywords, domainTerms);
  const total = Object.values(scores).reduce((sum, value) => sum + value, 0);

  const strengths: string[] = [];
  if (scores.quantifiableAchievements >= 12) {
    strengths.push('Excellent use of quantified metrics and achievements');
  }
  if (scores.keywordDensity >= 12) strengths.push('Strong alignment with target role keywords');
  if (scores.atsOptimization >= 12) strengths.push('Well-optimized for ATS parsing');
  if (scores.roleRelevance >= 12) strengths.push('Highly relevant experience for target position');

  const improvements: string[] = [];
  if (scores.quantifiableAchievements < 10) {
    improvements.push('Add more quantified achievements with specific metrics');
  }
  if (scores.keywordDensity < 10) {
    improvements.push('Incorporate more keywords from the target job description');
  }
  if (scores.actionVerbs < 7) improvements.push('Use stronger action verbs to lead bullet points');
  if (scores.conciseness < 8) {
    improvements.push('Adjust length to optimal 500-800 word range for 2-page format');
  }
  if (scores.formatting < 8) {
    improvements.push('Enhance visual structure with consistent formatting and bullet points');
  }

  return {
    totalScore: Math.round(total),
    grade: qualityGrade(total),
    dimensionScores: scores,
    strengths,
    improvements,
  };
}
