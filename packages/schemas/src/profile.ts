import { z } from 'zod';

const uniqueStrings = z
  .array(z.string())
  .default([])
  .transform((values) => [...new Set(values)]);

export const candidateProfileSchema = z.object({
  degree: z.string().default(''),
  yearsExperience: z.number().int().min(0).default(0),
  skills: uniqueStrings,
  technologies: uniqueStrings,
  methodologies: uniqueStrings,
  achievements: z.array(z.string()).default([]),
  locationPreference: z.string().default(''),
  travelOk: z.boolean().default(false),
  relocationOk: z.boolean().default(false),
});

export type CandidateProfile = z.infer<typeof candidateProfileSchema>;
/** Shape accepted from the profile store: every field optional. */
export type CandidateProfileInput = z.input<typeof candidateProfileSchema>;

export const experienceEntrySchema = z.object({
  company: z.string().default(''),
  title: z.string().default(''),
  location: z.string().default(''),
  dates: z.string().default(''),
  bullets: z.array(z.string()).default([]),
});

export type ExperienceEntry = z.infer<typeof experienceEntrySchema>;
export type ExperienceEntryInput = z.input<typeof experienceEntrySchema>;

/**
 * Validate stored profile data, filling the documented defaults
 * (empty string, 0, false, empty list) for anything missing.
 * Throws a ZodError only when a present field has the wrong type.
 */
export function parseCandidateProfile(raw: unknown): CandidateProfile {
  return candidateProfileSchema.parse(raw ?? {});
}

export function parseExperience(raw: unknown): ExperienceEntry[] {
  return z.array(experienceEntrySchema).parse(raw ?? []);
}
