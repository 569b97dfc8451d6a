import { describe, it, expect } from 'vitest';
import { qualityGrade, scoreResumeText, scoreToGrade } from '@tailorkit/agents';

const RESUME = `JANE ROE
(555) 123-4567 | jane.roe@example.com | linkedin.com/in/janeroe
PROFESSIONAL SUMMARY
Process engineer focused on manufacturing quality.
EXPERIENCE
- Led lean rollout that cut scrap 30%
- Reduced downtime 15% across 4 lines
EDUCATION
B.S. Mechanical Engineering
SKILLS
Lean, Six Sigma, Automation`;

describe('resume-quality', () => {
  it('scores each dimension', () => {
    const report = scoreResumeText(RESUME, ['lean', 'six sigma', 'automation', 'robotics']);
    expect(report.dimensionScores).toEqual({
      quantifiableAchievements: 4,
      actionVerbs: 2,
      atsOptimization: 15,
      keywordDensity: 3,
      conciseness: 5,
      formatting: 5,
      roleRelevance: 8,
      skillsOrganization: 5,
      contactInfo: 3,
      errorFree: 2,
    });
    expect(report.totalScore).toBe(52);
    expect(report.grade).toBe('D (Needs Improvement)');
    expect(report.strengths).toEqual(['Well-optimized for ATS parsing']);
    expect(report.improvements).toHaveLength(5);
  });

  it('docks sloppy first-person writing', () => {
    const report = scoreResumeText(`${RESUME}\ni dont like gaps`, []);
    expect(report.dimensionScores.errorFree).toBe(1.5);
  });

  describe('grades', () => {
    it('maps scores to letters', () => {
      expect(scoreToGrade(90)).toBe('A+');
      expect(scoreToGrade(72.5)).toBe('B');
      expect(scoreToGrade(39.99)).toBe('F');
      expect(scoreToGrade(50)).toBe('C-');
      expect(scoreToGrade(40)).toBe('D');
      expect(qualityGrade(86)).toBe('A (Excellent)');
      expect(qualityGrade(64.9)).toBe('D (Needs Improvement)');
    });
  });
});
