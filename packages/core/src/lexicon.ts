/**
 * Word lists read from packages/core/data and validated on load.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';

function loadJson<T>(file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const url = new URL(`../data/${file}`, import.meta.url);
  return schema.parse(JSON.parse(readFileSync(url, 'utf8')));
}

const wordList = z.array(z.string().min(1));

const actionVerbsSchema = z.object({
  strong: wordList,
  byCategory: z.record(wordList),
});

const actionVerbs = loadJson('action-verbs.json', actionVerbsSchema);

/** Fillers and function words dropped before keyword ranking. */
export const STOPWORDS: ReadonlySet<string> = new Set(loadJson('stopwords.json', wordList));

/** Verbs that earn a bullet its action-verb bonus, in display case. */
export const ACTION_VERBS: readonly string[] = actionVerbs.strong;

/** Verbs recognised by the writing-framework validator, grouped by intent. */
export const ACTION_VERBS_BY_CATEGORY: Readonly<Record<string, readonly string[]>> =
  actionVerbs.byCategory;

export type SynonymTable = Readonly<Record<string, readonly string[]>>;

/** Skill synonym clusters used to widen skill matching. Keys are lower-case. */
export const SKILL_SYNONYMS: SynonymTable = loadJson('synonyms.json', z.record(wordList));
