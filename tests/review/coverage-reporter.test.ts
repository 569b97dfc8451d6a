import { describe, it, expect } from 'vitest';
import {
  RECOMMENDATIONS,
  analyzeCoverage,
  analyzeResumeAgainstJob,
  formattingHazards,
  metricLinesRatio,
  passiveVoiceDensity,
} from '@tailorkit/agents';

describe('coverage-reporter', () => {
  describe('analyzeCoverage', () => {
    it('splits keywords into matched and missing in rank order', () => {
      const report = analyzeCoverage('Led lean rollout\nCut scrap 12%', ['lean', 'scrap', 'robotics']);
      expect(report).toEqual({
        matched: ['lean', 'scrap'],
        missing: ['robotics'],
        keywordCoveragePct: 67,
        flags: {
          passiveDensityPct: 0,
          metricLinesRatioPct: 50,
          hazards: [],
          recommendations: [RECOMMENDATIONS.missingKeywords],
        },
      });
    });

    it('reports full coverage when the text is the keywords themselves', () => {
      const keywords = ['lean', 'robotics', 'capex'];
      const report = analyzeCoverage(keywords.join(' '), keywords);
      expect(report.keywordCoveragePct).toBe(100);
      expect(report.missing).toEqual([]);
    });

    it('reports 0% with nothing to match', () => {
      const report = analyzeCoverage('', []);
      expect(report.keywordCoveragePct).toBe(0);
      expect(report.matched).toEqual([]);
      expect(report.missing).toEqual([]);
    });

    it('treats null text as empty', () => {
      const report = analyzeCoverage(null, ['lean']);
      expect(report.missing).toEqual(['lean']);
      expect(report.keywordCoveragePct).toBe(0);
    });

    it('falls back to the strong-profile note when nothing is flagged', () => {
      const report = analyzeCoverage('Led lean 30%\nCut scrap 12%\n', ['lean']);
      expect(report.flags.recommendations).toEqual([RECOMMENDATIONS.strong]);
    });
  });

  describe('flags', () => {
    it('measures passive constructions per line break', () => {
      const text = 'Process was automated by the team\nReports were generated weekly\n';
      expect(passiveVoiceDensity(text)).toBe(100);
      const report = analyzeCoverage(text, []);
      expect(report.flags.recommendations).toEqual([
        RECOMMENDATIONS.passiveVoice,
        RECOMMENDATIONS.metrics,
      ]);
    });

    it('floors the metric line ratio', () => {
      expect(metricLinesRatio('Cut scrap 12%\nRan the line\nTrained staff')).toBe(33);
    });

    it('flags table characters, image references and long documents', () => {
      expect(formattingHazards('a | b | c | d | e | f | g')).toEqual(['Table-like characters']);
      expect(formattingHazards('See photo attached')).toEqual(['Image references']);

      expect(formattingHazards('Product photos and graphics')).toEqual(['Image references']);
      expect(formattingHazards('Geographic and demographic expansion')).toEqual([]);

      const long = Array.from({ length: 121 }, (_, i) => `line ${i + 1}`).join('\n');
      expect(formattingHazards(long)).toEqual(['Length > 120 lines']);
    });
  });

  describe('analyzeResumeAgainstJob', () => {
    it('mines the JD at the ATS length floor before checking coverage', () => {
      const report = analyzeResumeAgainstJob(
        'Robotics cell owner, 12% uptime gain',
        'Robotics robotics cell and jig work',
        10,
      );
      expect(report.matched).toEqual(['robotics', 'cell']);
      expect(report.missing).toEqual(['work']);
      expect(report.keywordCoveragePct).toBe(67);
    });
  });
});
