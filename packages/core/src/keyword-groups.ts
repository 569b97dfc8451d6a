/**
 * Canonical keyword groups and the weight table of the match rubric.
 *
 * Every group is a fixed, curated set of lower-case domain phrases. Scoring and
 * JD parsing take the groups as a parameter; these tables are the defaults.
 */

import { keywordGroupEnum, type KeywordGroupName } from '@tailorkit/schemas';

export type KeywordGroups = Readonly<Record<KeywordGroupName, readonly string[]>>;

export const KEYWORD_GROUPS: KeywordGroups = {
  mustHave: [
    'manufacturing',
    'process engineering',
    'product engineering',
    'product development',
    'commercialization',
    'supply chain',
    'cost savings',
    'quality',
    'complaints',
    'lean six sigma',
    'npi',
    'scale up',
  ],
  tech: ['automation', 'laser', 'robotics', 'plastic molding', 'capex', 'equipment design'],
  process: ['lean', 'six sigma', 'regulated', 'quality', 'value stream', 'optimization'],
  leadership: [
    'lead',
    'cross-functional',
    'subject matter expert',
    'sme',
    'presenting',
    'communication',
  ],
  npi: ['npi', 'scale up', 'commercialization', 'new product'],
  mindset: ['growth', 'curious', 'collaboration', 'benchmarking'],
  logistics: ['travel', 'relocation', 'on-site', 'maplewood'],
};

/** Group order used whenever groups are walked. */
export const KEYWORD_GROUP_NAMES: readonly KeywordGroupName[] = keywordGroupEnum.options;

/** Rubric weights in percentage points; they sum to exactly 100. */
export const MATCH_WEIGHTS: Readonly<Record<KeywordGroupName, number>> = {
  mustHave: 30,
  tech: 25,
  process: 15,
  leadership: 10,
  npi: 10,
  mindset: 5,
  logistics: 5,
};

export function isKeywordGroupName(name: string): name is KeywordGroupName {
  return keywordGroupEnum.safeParse(name).success;
}

/**
 * Look up a group by name. Asking for a group that does not exist is a
 * caller bug, so it throws instead of returning an empty set.
 */
export function getKeywordGroup(
  name: string,
  groups: KeywordGroups = KEYWORD_GROUPS,
): readonly string[] {
  if (!isKeywordGroupName(name)) {
    throw new Error(
      `Unknown keyword group "${name}". Expected one of: ${KEYWORD_GROUP_NAMES.join(', ')}`,
    );
  }
  return groups[name];
}

/** Every phrase of every group, deduplicated. */
export function allGroupKeywords(groups: KeywordGroups = KEYWORD_GROUPS): string[] {
  const seen = new Set<string>();
  for (const name of KEYWORD_GROUP_NAMES) {
    for (const kw of groups[name]) seen.add(kw);
  }
  return [...seen];
}
