/**
 * Match Scorer - Deterministic weighted profile-to-job scoring
 *
 * Responsibilities:
 * - Hit ratio per canonical keyword group against the candidate's tokens
 * - Gating penalties on must-haves (years, degree)
 * - Logistics penalties (travel, relocation), compounding
 * - Weighted overall score, sorted gap list, recommendations
 *
 * LLM Usage: None (pure code logic)
 */

import {
  KEYWORD_GROUPS,
  KEYWORD_GROUP_NAMES,
  MATCH_WEIGHTS,
  getKeywordGroup,
  round2,
  safeRatio,
  type KeywordGroups,
} from '@tailorkit/core';
import type {
  CandidateProfile,
  JobRequirement,
  KeywordGroupName,
  MatchBreakdown,
} from '@tailorkit/schemas';
import { scoreToGrade } from '../review/grades.js';

const YEARS_GATE_FACTOR = 0.5;
const DEGREE_GATE_FACTOR = 0.6;
const LOGISTICS_PENALTY_FACTOR = 0.5;
const LOGISTICS_RECOMMENDATION_THRESHOLD = 70;

export interface MatchScorer {
  computeMatch(requirement: JobRequirement, candidate: CandidateProfile): MatchBreakdown;
  /** Hit ratio (0-1) of one named group. Throws for an unknown group name. */
  scoreGroup(groupName: string, tokens: ReadonlySet<string>): number;
}

/** Lower-cased union of skills, technologies and methodologies. */
export function candidateTokens(candidate: CandidateProfile): Set<string> {
  const tokens = new Set<string>();
  for (const list of [candidate.skills, candidate.technologies, candidate.methodologies]) {
    for (const token of list) tokens.add(token.toLowerCase());
  }
  return tokens;
}

function hitRatio(group: readonly string[], tokens: ReadonlySet<string>): number {
  const hits = group.filter((kw) => tokens.has(kw)).length;
  return safeRatio(hits, group.length);
}

export function createMatchScorer(groups: KeywordGroups = KEYWORD_GROUPS): MatchScorer {
  const scoreGroup = (groupName: string, tokens: ReadonlySet<string>): number =>
    hitRatio(getKeywordGroup(groupName, groups), tokens);

  const computeMatch = (
    requirement: JobRequirement,
    candidate: CandidateProfile,
  ): MatchBreakdown => {
    const jdLower = requirement.rawText.toLowerCase();
    const tokens = candidateTokens(candidate);
    const gaps: string[] = [];

    const ratio = (name: KeywordGroupName): number => hitRatio(groups[name], tokens);

    // Must-have gating, applied in order
    let mustHave = ratio('mustHave');
    const yearsRequired = requirement.yearsExperienceRequired;
    if (yearsRequired > 0 && candidate.yearsExperience < yearsRequired) {
      mustHave *= YEARS_GATE_FACTOR;
      gaps.push(`Years of experience (< ${yearsRequired})`);
    }
    if (
      requirement.educationRequired.toLowerCase().startsWith('bachelor') &&
      !candidate.degree.toLowerCase().includes('bachelor')
    ) {
      mustHave *= DEGREE_GATE_FACTOR;
      gaps.push("Required Bachelor's degree not verified");
    }

    // Logistics is not a hit ratio: full marks, halved per unmet constraint
    let logistics = 1;
    if (jdLower.includes('travel') && !candidate.travelOk) {
      logistics *= LOGISTICS_PENALTY_FACTOR;
      gaps.push('Travel flexibility');
    }
    if (jdLower.includes('relocation') && !candidate.relocationOk) {
      logistics *= LOGISTICS_PENALTY_FACTOR;
      gaps.push('Relocation flexibility');
    }

    const ratios: Record<KeywordGroupName, number> = {
      mustHave,
      tech: ratio('tech'),
      process: ratio('process'),
      leadership: ratio('leadership'),
      npi: ratio('npi'),
      mindset: ratio('mindset'),
      logistics,
    };

    const required = new Set(requirement.keywords);
    const techGaps = groups.tech.filter((kw) => required.has(kw) && !tokens.has(kw));
    const processGaps = groups.process.filter((kw) => required.has(kw) && !tokens.has(kw));
    gaps.push(...techGaps.map((kw) => `Tech exposure: ${kw}`));
    gaps.push(...processGaps.map((kw) => `Process/Regulated: ${kw}`));

    let weighted = 0;
    for (const name of KEYWORD_GROUP_NAMES) {
      weighted += MATCH_WEIGHTS[name] * ratios[name];
    }
    const overall = round2(weighted);

    const recommendations: string[] = [];
    if (techGaps.length > 0) {
      recommendations.push(`Consider upskilling: ${[...techGaps].sort().join(', ')}`);
    }
    if (logistics * 100 < LOGISTICS_RECOMMENDATION_THRESHOLD) {
      recommendations.push('Address location or travel constraints in application');
    }

    return {
      overall,
      mustHave: round2(ratios.mustHave * 100),
      tech: round2(ratios.tech * 100),
      process: round2(ratios.process * 100),
      leadership: round2(ratios.leadership * 100),
      npi: round2(ratios.npi * 100),
      mindset: round2(ratios.mindset * 100),
      logistics: round2(ratios.logistics * 100),
      grade: scoreToGrade(overall),
      gaps: [...new Set(gaps)].sort(),
      recommendations,
    };
  };

  return { computeMatch, scoreGroup };
}

const canonicalScorer = createMatchScorer();

/** Score against the canonical keyword groups. */
export function computeMatch(
  requirement: JobRequirement,
  candidate: CandidateProfile,
): MatchBreakdown {
  return canonicalScorer.computeMatch(requirement, candidate);
}

export function scoreGroup(groupName: string, tokens: ReadonlySet<string>): number {
  return canonicalScorer.scoreGroup(groupName, tokens);
}

/** One breakdown per requirement, in input order. */
export function batchScore(
  requirements: readonly JobRequirement[],
  candidate: CandidateProfile,
  scorer: MatchScorer = canonicalScorer,
): MatchBreakdown[] {
  return requirements.map((requirement) => scorer.computeMatch(requirement, candidate));
}

export function explainMatch(match: MatchBreakdown): string {
  return [
    `Overall: ${match.overall}% (${match.grade})`,
    `Must-Have: ${match.mustHave}%`,
    `Tech: ${match.tech}%`,
    `Process: ${match.process}%`,
    `Leadership: ${match.leadership}%`,
    `NPI: ${match.npi}%`,
    `Mindset: ${match.mindset}%`,
    `Logistics: ${match.logistics}%`,
    `Gaps: ${match.gaps.length > 0 ? match.gaps.join(', ') : 'None'}`,
  ].join('\n');
}
