/**
 * Letter grades for 0-100 scores.
 */

type GradeBand = readonly [floor: number, grade: string];

// Plus/minus steps of 5 from 90 down to 50; D covers 40-49, anything lower fails.
const LETTER_BANDS: readonly GradeBand[] = [
  [90, 'A+'],
  [85, 'A'],
  [80, 'A-'],
  [75, 'B+'],
  [70, 'B'],
  [65, 'B-'],
  [60, 'C+'],
  [55, 'C'],
  [50, 'C-'],
  [40, 'D'],
];

/** Coarser scale with a label, used for whole-document quality scores. */
const QUALITY_BANDS: readonly GradeBand[] = [
  [90, 'A+ (Exceptional)'],
  [85, 'A (Excellent)'],
  [80, 'B+ (Very Good)'],
  [75, 'B (Good)'],
  [70, 'C+ (Above Average)'],
  [65, 'C (Average)'],
];

function gradeFor(score: number, bands: readonly GradeBand[], fallback: string): string {
  return bands.find(([floor]) => score >= floor)?.[1] ?? fallback;
}

export function scoreToGrade(score: number): string {
  return gradeFor(score, LETTER_BANDS, 'F');
}

export function qualityGrade(score: number): string {
  return gradeFor(score, QUALITY_BANDS, 'D (Needs Improvement)');
}
