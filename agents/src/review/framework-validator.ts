/**
 * Framework Validator - grades bullets against resume-writing frameworks
 * (STAR, CAR, PAR, WHO, LPS) and suggests rule-based rewrites.
 *
 * LLM Usage: None (pure code logic)
 */

import { ACTION_VERBS_BY_CATEGORY, safeRatio, round1, clamp } from '@tailorkit/core';
import { bulletFrameworkEnum, type BulletFramework } from '@tailorkit/schemas';
import { scoreToGrade } from './grades.js';

export interface FrameworkDefinition {
  name: string;
  elements: readonly string[];
  description: string;
  /** Words a bullet needs before it counts as having context. */
  minLength: number;
  idealLength: number;
}

export const FRAMEWORKS: Readonly<Record<BulletFramework, FrameworkDefinition>> = {
  STAR: {
    name: 'Situation, Task, Action, Result',
    elements: ['situation', 'task', 'action', 'result'],
    description: 'Industry standard for behavioral achievements',
    minLength: 15,
    idealLength: 25,
  },
  CAR: {
    name: 'Challenge, Action, Result',
    elements: ['challenge', 'action', 'result'],
    description: 'Problem-solving focused framework',
    minLength: 12,
    idealLength: 20,
  },
  PAR: {
    name: 'Problem, Action, Result',
    elements: ['problem', 'action', 'result'],
    description: 'Similar to CAR, emphasizes problem identification',
    minLength: 12,
    idealLength: 20,
  },
  WHO: {
    name: 'What, How, Outcome',
    elements: ['what', 'how', 'outcome'],
    description: 'Simplified framework for clarity',
    minLength: 10,
    idealLength: 18,
  },
  LPS: {
    name: 'Location, Problem, Solution',
    elements: ['location', 'problem', 'solution'],
    description: 'Contextual framework with geographic/departmental scope',
    minLength: 12,
    idealLength: 22,
  },
};

export interface BulletScore {
  bullet: string;
  framework: BulletFramework;
  score: number;
  hasAction: boolean;
  hasMetric: boolean;
  hasContext: boolean;
  hasResult: boolean;
  suggestions: string[];
}

export interface SectionAnalysis {
  totalBullets: number;
  averageScore: number;
  strongBullets: number;
  weakBullets: number;
  missingActions: number;
  missingMetrics: number;
  missingResults: number;
  grade: string;
  scores: BulletScore[];
  recommendations: string[];
}

const METRIC_PATTERNS: readonly RegExp[] = [
  /\d+%/g,
  /\$[\d,]+(?:\.\d{2})?/g,
  /\d+(?:,\d{3})*/g,
  /\d+x/g,
  /\d+\+/g,
  /(?:from|by|to)\s+\d+/g,
];

const RESULT_INDICATORS: readonly string[] = [
  'resulting in',
  'resulting',
  'achieved',
  'delivered',
  'produced',
  'leading to',
  'enabled',
  'contributed to',
  'generated',
  'improved',
  'increased',
  'decreased',
  'reduced',
  'enhanced',
  'optimized',
];

const MAX_WORDS = 35;
const STRONG_SCORE = 80;
const WEAK_SCORE = 60;

const allVerbs: string[] = Object.values(ACTION_VERBS_BY_CATEGORY).flat();
const verbLookup = new Map(allVerbs.map((verb) => [verb.toLowerCase(), verb]));

export function getFrameworkInfo(framework: string): FrameworkDefinition {
  return FRAMEWORKS[resolveFramework(framework)];
}

/** Unknown framework names are a caller bug and throw. */
export function resolveFramework(framework: string): BulletFramework {
  const parsed = bulletFrameworkEnum.safeParse(framework);
  if (!parsed.success) {
    throw new Error(
      `Unknown framework: ${framework}. Choose from ${bulletFrameworkEnum.options.join(', ')}`,
    );
  }
  return parsed.data;
}

function wordCount(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

/** The action verb a bullet opens with, in canonical case, or null. */
export function findActionVerb(bullet: string): string | null {
  const first = bullet.trim().split(/\s+/)[0] ?? '';
  return verbLookup.get(first.replace(/[:,.]+$/, '').toLowerCase()) ?? null;
}

export function findMetrics(bullet: string): string[] {
  return METRIC_PATTERNS.flatMap((pattern) => bullet.match(pattern) ?? []);
}

export function hasResult(bullet: string): boolean {
  const lower = bullet.toLowerCase();
  return RESULT_INDICATORS.some((indicator) => lower.includes(indicator));
}

export function scoreBulletFramework(bullet: string, framework: string = 'STAR'): BulletScore {
  const key = resolveFramework(framework);
  const definition = FRAMEWORKS[key];
  const suggestions: string[] = [];
  let score = 0;

  const hasAction = findActionVerb(bullet) !== null;
  const metrics = findMetrics(bullet);
  const words = wordCount(bullet);
  const hasContext = words >= definition.minLength;
  const resultFound = hasResult(bullet);

  if (hasAction) {
    score += 30;
  } else {
    suggestions.push(`Start with strong action verb (e.g., ${allVerbs.slice(0, 3).join(', ')})`);
  }

  if (metrics.length > 0) {
    score += 30;
    if (metrics.length > 1) score += 10;
  } else {
    suggestions.push('Add quantifiable metrics (%, $, numbers)');
  }

  if (hasContext) {
    score += 20;
  } else {
    suggestions.push(`Add more context (minimum ${definition.minLength} words)`);
  }

  if (resultFound) {
    score += 20;
  } else {
    suggestions.push("Include clear result/outcome (use 'resulting in', 'achieved', etc.)");
  }

  if (words > MAX_WORDS) {
    score -= 10;
    suggestions.push('Too long - aim for 15-30 words');
  } else if (words < definition.minLength) {
    suggestions.push(
      `Too short - add more detail (current: ${words}, minimum: ${definition.minLength})`,
    );
  }

  return {
    bullet,
    framework: key,
    score: clamp(score, 0, 100),
    hasAction,
    hasMetric: metrics.length > 0,
    hasContext,
    hasResult: resultFound,
    suggestions,
  };
}

/**
 * Rule-based rewrite: swaps "Responsible for" for a verb, turns a leading
 * "Was/Were" into "Led", and appends placeholders for a missing metric or
 * outcome. Bullets already scoring 80+ come back unchanged.
 */
export function suggestEnhancement(bullet: string, framework: string = 'STAR'): string {
  const result = scoreBulletFramework(bullet, framework);
  if (result.score >= STRONG_SCORE) return bullet;

  let enhanced = bullet;
  if (!result.hasAction) {
    if (/responsible for/i.test(enhanced)) {
      enhanced = enhanced.replace('Responsible for', 'Managed').replace('responsible for', 'managed');
    } else if (/^(?:Was|Were) \S/.test(enhanced)) {
      enhanced = `Led ${enhanced.slice(enhanced.indexOf(' ') + 1)}`;
    }
  }
  if (!result.hasMetric) enhanced += ' [ADD METRIC: %, $, or number]';
  if (!result.hasResult) enhanced += ', resulting in [ADD OUTCOME]';
  return enhanced;
}

function sectionRecommendations(scores: readonly BulletScore[]): string[] {
  const total = scores.length;
  const missingActions = scores.filter((s) => !s.hasAction).length;
  const missingMetrics = scores.filter((s) => !s.hasMetric).length;
  const missingResults = scores.filter((s) => !s.hasResult).length;
  const weak = scores.filter((s) => s.score < WEAK_SCORE).length;

  const recommendations: string[] = [];
  if (missingActions > total * 0.3) {
    recommendations.push(
      `CRITICAL: ${missingActions} bullets lack strong action verbs - start each with impact words`,
    );
  }
  if (missingMetrics > total * 0.5) {
    recommendations.push(
      `HIGH PRIORITY: ${missingMetrics} bullets need quantifiable metrics - add numbers, %, $`,
    );
  }
  if (missingResults > total * 0.4) {
    recommendations.push(
      `HIGH PRIORITY: ${missingResults} bullets don't show outcomes - add 'resulting in' statements`,
    );
  }
  if (weak > 0) {
    recommendations.push(`Consider rewriting ${weak} weak bullets (score < ${WEAK_SCORE})`);
  }
  return recommendations;
}

export function analyzeBulletSection(
  bullets: readonly string[],
  framework: string = 'STAR',
): SectionAnalysis {
  const key = resolveFramework(framework);
  const scores = bullets.map((bullet) => scoreBulletFramework(bullet, key));
  const total = scores.reduce((sum, s) => sum + s.score, 0);
  const averageScore = round1(safeRatio(total, scores.length));

  return {
    totalBullets: bullets.length,
    averageScore,
    strongBullets: scores.filter((s) => s.score >= STRONG_SCORE).length,
    weakBullets: scores.filter((s) => s.score < WEAK_SCORE).length,
    missingActions: scores.filter((s) => !s.hasAction).length,
    missingMetrics: scores.filter((s) => !s.hasMetric).length,
    missingResults: scores.filter((s) => !s.hasResult).length,
    grade: scoreToGrade(averageScore),
    scores,
    recommendations: sectionRecommendations(scores),
  };
}
