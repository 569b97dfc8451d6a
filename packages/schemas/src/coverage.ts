import { z } from 'zod';

export const coverageFlagsSchema = z.object({
  passiveDensityPct: z.number().min(0),
  metricLinesRatioPct: z.number().int().min(0).max(100),
  hazards: z.array(z.string()),
  recommendations: z.array(z.string()),
});

export type CoverageFlags = z.infer<typeof coverageFlagsSchema>;

export const coverageReportSchema = z.object({
  matched: z.array(z.string()),
  missing: z.array(z.string()),
  keywordCoveragePct: z.number().int().min(0).max(100),
  flags: coverageFlagsSchema,
});

export type CoverageReport = z.infer<typeof coverageReportSchema>;
