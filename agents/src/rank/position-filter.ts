/**
 * Position selection - which employment records make the tailored resume.
 */

import type { ExperienceEntry } from '@tailorkit/schemas';

export const DEFAULT_MIN_POSITIONS = 2;
export const DEFAULT_MAX_YEARS = 10;

const TITLE_MATCH_POINTS = 5;

function countOccurrences(haystack: string, needle: string): number {
  if (!needle) return 0;
  let count = 0;
  let idx = haystack.indexOf(needle);
  while (idx !== -1) {
    count++;
    idx = haystack.indexOf(needle, idx + needle.length);
  }
  return count;
}

/**
 * Relevance of one position: title hits weigh 5, plus every occurrence of
 * each keyword across the title and bullets.
 */
export function calculatePositionRelevance(
  entry: ExperienceEntry,
  keywords: readonly string[],
): number {
  const title = entry.title.toLowerCase();
  const combined = `${title} ${entry.bullets.join(' ').toLowerCase()}`;

  let score = 0;
  for (const keyword of keywords) {
    const kw = keyword.toLowerCase();
    if (kw && title.includes(kw)) score += TITLE_MATCH_POINTS;
    score += countOccurrences(combined, kw);
  }
  return score;
}

/**
 * Keep positions that mention any keyword, topped up to minPositions with
 * the best of the rest. Output stays in the original (chronological) order.
 */
export function filterRelevantPositions(
  entries: readonly ExperienceEntry[],
  keywords: readonly string[],
  minPositions: number = DEFAULT_MIN_POSITIONS,
): ExperienceEntry[] {
  const ranked = entries
    .map((entry, index) => ({ index, score: calculatePositionRelevance(entry, keywords) }))
    .sort((a, b) => b.score - a.score);

  const kept = new Set<number>();
  for (const { index, score } of ranked) {
    if (score > 0 || kept.size < minPositions) kept.add(index);
  }
  return entries.filter((_, index) => kept.has(index));
}

/**
 * Keep positions whose latest year in `dates` falls within the last
 * maxYears. Undated text with no year is kept; an empty dates field is not.
 */
export function filterExperienceByDate(
  entries: readonly ExperienceEntry[],
  maxYears: number = DEFAULT_MAX_YEARS,
  currentYear: number = new Date().getFullYear(),
): ExperienceEntry[] {
  const cutoff = currentYear - maxYears;

  return entries.filter((entry) => {
    if (!entry.dates) return false;
    const years = entry.dates.match(/\b(?:19|20)\d{2}\b/g);
    if (!years) return true;
    const endYear = Math.max(...years.map((y) => Number.parseInt(y, 10)));
    return endYear >= cutoff;
  });
}
