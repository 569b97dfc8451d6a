/**
 * Requirement Parser - structured facts from a job description.
 * Code-only step: each heuristic is a named regex / containment check.
 */

import { KEYWORD_GROUPS, allGroupKeywords, type KeywordGroups } from '@tailorkit/core';
import {
  jobDescriptionInputSchema,
  type JobDescriptionInput,
  type JobRequirement,
} from '@tailorkit/schemas';

export const BACHELOR_REQUIREMENT = "Bachelor's in Science/Engineering";

/**
 * Years of experience asked for: the number in the first "<N> ... years"
 * mention (up to 20 characters between, same line). 0 when absent.
 * Takes the first mention, not the largest.
 */
export function inferYearsRequired(text: string | null | undefined): number {
  if (!text) return 0;
  const match = /(\d+)[^\n]{0,20}years/.exec(text.toLowerCase());
  return match ? Number.parseInt(match[1], 10) : 0;
}

/**
 * Coarse degree classifier: any mention of "bachelor" maps to the
 * bachelor's requirement, anything else to no requirement.
 */
export function inferEducation(text: string | null | undefined): string {
  if (text && text.toLowerCase().includes('bachelor')) {
    return BACHELOR_REQUIREMENT;
  }
  return '';
}

/** Canonical-group phrases contained in the text, unique and sorted. */
export function extractGroupKeywords(
  text: string | null | undefined,
  groups: KeywordGroups = KEYWORD_GROUPS,
): string[] {
  if (!text) return [];
  const lower = text.toLowerCase();
  return allGroupKeywords(groups)
    .filter((kw) => lower.includes(kw))
    .sort();
}

export function parseJobDescription(
  input: JobDescriptionInput,
  groups: KeywordGroups = KEYWORD_GROUPS,
): JobRequirement {
  const job = jobDescriptionInputSchema.parse(input);
  return {
    company: job.company,
    role: job.role,
    location: job.location,
    priority: job.priority,
    rawText: job.jdText,
    mustHaves: job.mustHaves ?? [],
    niceToHaves: job.niceToHaves ?? [],
    yearsExperienceRequired: inferYearsRequired(job.jdText),
    educationRequired: inferEducation(job.jdText),
    keywords: extractGroupKeywords(job.jdText, groups),
  };
}

/**
 * Recompute the derived fields after rawText has changed. Derived fields
 * are never edited by hand.
 */
export function reparseJobRequirement(
  requirement: JobRequirement,
  rawText: string,
  groups: KeywordGroups = KEYWORD_GROUPS,
): JobRequirement {
  return parseJobDescription(
    {
      company: requirement.company,
      role: requirement.role,
      location: requirement.location,
      priority: requirement.priority,
      jdText: rawText,
      mustHaves: requirement.mustHaves,
      niceToHaves: requirement.niceToHaves,
    },
    groups,
  );
}
