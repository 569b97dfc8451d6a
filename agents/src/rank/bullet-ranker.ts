/**
 * Bullet/Skill Ranker - Picks the experience bullets and skills to render
 *
 * Responsibilities:
 * - Drop weak-language bullets
 * - Score bullets on keyword hits, metrics, opening verb and length
 * - Keep the selection lexically diverse (distinct three-word openings)
 * - Order skills with keyword/synonym matches first
 *
 * LLM Usage: None (pure code logic)
 */

import { ACTION_VERBS, SKILL_SYNONYMS, type SynonymTable } from '@tailorkit/core';
import { expandKeywords } from '../extract/keyword-extractor.js';

export const DEFAULT_MAX_BULLETS = 6;
export const DEFAULT_MAX_SKILLS = 18;

export const WEAK_BULLET_PATTERNS: readonly string[] = [
  'delegated and supervised tasks',
  'contributed to',
  'assisted with',
  'helped with',
];

const METRIC_PATTERN =
  /\d+%|\$\d+|\d{2,}x?|\b(?:reduced|increased|improved|enhanced|saved|cut|boosted)\b/;

const LONG_BULLET_CHARS = 160;

const KEYWORD_POINTS = 1;
const METRIC_POINTS = 3;
const ACTION_VERB_POINTS = 2;
const LONG_BULLET_PENALTY = 1;

const actionVerbs = new Set(ACTION_VERBS.map((verb) => verb.toLowerCase()));

function words(text: string): string[] {
  return text.split(/\s+/).filter(Boolean);
}

export function isWeakBullet(bullet: string): boolean {
  const lower = bullet.toLowerCase();
  return WEAK_BULLET_PATTERNS.some((weak) => lower.includes(weak));
}

export function hasMetric(bullet: string): boolean {
  return METRIC_PATTERN.test(bullet.toLowerCase());
}

export function startsWithActionVerb(bullet: string): boolean {
  const first = words(bullet)[0];
  if (!first) return false;
  return actionVerbs.has(first.replace(/:+$/, '').toLowerCase());
}

/** Lower-cased first three words; two bullets with the same opening are near-duplicates. */
export function openingOf(bullet: string): string {
  return words(bullet).slice(0, 3).join(' ').toLowerCase();
}

export function scoreBulletRelevance(bullet: string, keywords: readonly string[]): number {
  const lower = bullet.toLowerCase();
  let score = 0;

  for (const kw of keywords) {
    if (lower.includes(kw.toLowerCase())) score += KEYWORD_POINTS;
  }
  if (hasMetric(bullet)) score += METRIC_POINTS;
  if (startsWithActionVerb(bullet)) score += ACTION_VERB_POINTS;
  if (bullet.length > LONG_BULLET_CHARS) score -= LONG_BULLET_PENALTY;

  return score;
}

export function selectBullets(
  bullets: readonly string[],
  keywords: readonly string[],
  maxBullets: number = DEFAULT_MAX_BULLETS,
): string[] {
  const scored = bullets
    .filter((b) => !isWeakBullet(b))
    .map((bullet) => ({ bullet, score: scoreBulletRelevance(bullet, keywords) }))
    .sort((a, b) => b.score - a.score);

  const chosen: string[] = [];
  const openingsUsed = new Set<string>();

  for (const { bullet } of scored) {
    if (chosen.length >= maxBullets) break;
    const opening = openingOf(bullet);
    if (openingsUsed.has(opening)) continue;
    chosen.push(bullet);
    openingsUsed.add(opening);
  }
  return chosen;
}

export function selectSkills(
  skills: readonly string[],
  keywords: readonly string[],
  maxSkills: number = DEFAULT_MAX_SKILLS,
  synonymTable: SynonymTable = SKILL_SYNONYMS,
): string[] {
  const expanded = [...expandKeywords(keywords.map((kw) => kw.toLowerCase()), synonymTable)];
  const matched: string[] = [];
  const unmatched: string[] = [];

  for (const skill of skills) {
    const lower = skill.toLowerCase();
    if (expanded.some((kw) => lower.includes(kw))) {
      matched.push(skill);
    } else {
      unmatched.push(skill);
    }
  }

  const ordered = [...new Set([...matched, ...unmatched])];
  return ordered.slice(0, Math.max(0, maxSkills));
}
