/**
 * Types for the job-match pipeline
 */

import { z } from 'zod';
import {
  candidateProfileSchema,
  coverageReportSchema,
  experienceEntrySchema,
  jobDescriptionInputSchema,
  jobRequirementSchema,
  matchBreakdownSchema,
} from '@tailorkit/schemas';

export const PipelineOptionsSchema = z.object({
  keywordLimit: z.number().int().positive().optional(),
  minTokenLength: z.number().int().positive().optional(),
  maxBullets: z.number().int().min(0).optional(),
  maxSkills: z.number().int().min(0).optional(),
  minPositions: z.number().int().min(0).optional(),
  /** When set, positions that ended more than this many years ago are dropped first. */
  maxYears: z.number().int().positive().optional(),
  currentYear: z.number().int().optional(),
});

export type PipelineOptions = z.infer<typeof PipelineOptionsSchema>;

export const JobMatchInputSchema = z.object({
  job: jobDescriptionInputSchema,
  candidate: candidateProfileSchema,
  experience: z.array(experienceEntrySchema).default([]),
  options: PipelineOptionsSchema.default({}),
});

export type JobMatchInput = z.infer<typeof JobMatchInputSchema>;
export type JobMatchRequest = z.input<typeof JobMatchInputSchema>;

export const TailoredPositionSchema = experienceEntrySchema.extend({
  relevance: z.number().int().min(0),
});

export type TailoredPosition = z.infer<typeof TailoredPositionSchema>;

export const JobMatchOutputSchema = z.object({
  requirement: jobRequirementSchema,
  keywords: z.array(z.string()),
  match: matchBreakdownSchema,
  skills: z.array(z.string()),
  positions: z.array(TailoredPositionSchema),
  coverage: coverageReportSchema,
});

export type JobMatchOutput = z.infer<typeof JobMatchOutputSchema>;
