import { z } from 'zod';

export const keywordGroupEnum = z.enum([
  'mustHave',
  'tech',
  'process',
  'leadership',
  'npi',
  'mindset',
  'logistics',
]);
export type KeywordGroupName = z.infer<typeof keywordGroupEnum>;

export const bulletFrameworkEnum = z.enum(['STAR', 'CAR', 'PAR', 'WHO', 'LPS']);
export type BulletFramework = z.infer<typeof bulletFrameworkEnum>;
