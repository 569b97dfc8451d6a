import { z } from 'zod';

export const jobDescriptionInputSchema = z.object({
  company: z.string().default(''),
  role: z.string().default(''),
  location: z.string().default(''),
  priority: z.string().default(''),
  jdText: z.string().nullish().transform((text) => text ?? ''),
  mustHaves: z.array(z.string()).optional(),
  niceToHaves: z.array(z.string()).optional(),
});

export type JobDescriptionInput = z.input<typeof jobDescriptionInputSchema>;

export const jobRequirementSchema = z.object({
  company: z.string(),
  role: z.string(),
  location: z.string(),
  priority: z.string(),
  rawText: z.string(),
  mustHaves: z.array(z.string()),
  niceToHaves: z.array(z.string()),
  yearsExperienceRequired: z.number().int().min(0),
  educationRequired: z.string(),
  /** Canonical-group phrases found in rawText; unique and sorted. */
  keywords: z.array(z.string()),
});

export type JobRequirement = z.infer<typeof jobRequirementSchema>;
