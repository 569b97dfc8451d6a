import { describe, it, expect } from 'vitest';
import {
  jobDescriptionInputSchema,
  parseCandidateProfile,
  parseExperience,
} from '@tailorkit/schemas';

describe('candidate profile', () => {
  it('fills documented defaults for missing fields', () => {
    expect(parseCandidateProfile(undefined)).toEqual({
      degree: '',
      yearsExperience: 0,
      skills: [],
      technologies: [],
      methodologies: [],
      achievements: [],
      locationPreference: '',
      travelOk: false,
      relocationOk: false,
    });
  });

  it('deduplicates skill-like sets, keeping first occurrence order', () => {
    const profile = parseCandidateProfile({ skills: ['Lean', 'CAD', 'Lean'] });
    expect(profile.skills).toEqual(['Lean', 'CAD']);
  });

  it('rejects wrongly typed fields', () => {
    expect(() => parseCandidateProfile({ yearsExperience: 'ten' })).toThrow();
    expect(() => parseCandidateProfile({ yearsExperience: -2 })).toThrow();
  });
});

describe('experience entries', () => {
  it('defaults every field', () => {
    expect(parseExperience([{ title: 'Engineer' }])).toEqual([
      { company: '', title: 'Engineer', location: '', dates: '', bullets: [] },
    ]);
  });
});

describe('job description input', () => {
  it('turns a null JD into empty text', () => {
    expect(jobDescriptionInputSchema.parse({ jdText: null }).jdText).toBe('');
  });
});
