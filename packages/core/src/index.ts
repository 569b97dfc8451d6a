/**
 * @tailorkit/core - shared constants and utilities
 */

export {
  KEYWORD_GROUPS,
  KEYWORD_GROUP_NAMES,
  MATCH_WEIGHTS,
  getKeywordGroup,
  isKeywordGroupName,
  allGroupKeywords,
  type KeywordGroups,
} from './keyword-groups.js';
export {
  STOPWORDS,
  ACTION_VERBS,
  ACTION_VERBS_BY_CATEGORY,
  SKILL_SYNONYMS,
  type SynonymTable,
} from './lexicon.js';
export {
  loadEngineConfig,
  getEngineConfig,
  resetEngineConfig,
  engineEnvSchema,
  type EngineConfig,
} from './config.js';
export { round1, round2, safeRatio, clamp } from './numbers.js';
