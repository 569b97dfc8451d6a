import { z } from 'zod';

const dimensionScore = z.number().min(0).max(100);

export const matchBreakdownSchema = z.object({
  overall: dimensionScore,
  mustHave: dimensionScore,
  tech: dimensionScore,
  process: dimensionScore,
  leadership: dimensionScore,
  npi: dimensionScore,
  mindset: dimensionScore,
  logistics: dimensionScore,
  grade: z.string(),
  gaps: z.array(z.string()),
  recommendations: z.array(z.string()),
});

export type MatchBreakdown = z.infer<typeof matchBreakdownSchema>;
