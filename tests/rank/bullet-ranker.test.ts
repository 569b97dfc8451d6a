import { describe, it, expect } from 'vitest';
import {
  hasMetric,
  isWeakBullet,
  openingOf,
  scoreBulletRelevance,
  selectBullets,
  selectSkills,
  startsWithActionVerb,
} from '@tailorkit/agents';

const KEYWORDS = ['lean', 'automation', 'quality'];

const BULLETS = [
  'Assisted with quality audits across two plants',
  'Led lean rollout that reduced scrap by 18%',
  'Managed automation cell commissioning for quality line',
  'Led lean rollout at second site',
  'Documented quality procedures',
];

describe('bullet-ranker', () => {
  describe('bullet checks', () => {
    it('flags weak phrasing', () => {
      expect(isWeakBullet('Helped with shift handovers')).toBe(true);
      expect(isWeakBullet('Ran shift handovers')).toBe(false);
    });

    it('detects metrics and result verbs', () => {
      expect(hasMetric('Cut cycle time 12%')).toBe(true);
      expect(hasMetric('Saved the line')).toBe(true);
      expect(hasMetric('Ran 3 lines')).toBe(false);
    });

    it('matches result verbs only as whole words', () => {
      expect(hasMetric('Executed weekly audits')).toBe(false);
      expect(scoreBulletRelevance('Executed weekly audits', [])).toBe(2);
    });

    it('recognises an opening action verb, ignoring a trailing colon', () => {
      expect(startsWithActionVerb('Led: plant move')).toBe(true);
      expect(startsWithActionVerb('Documented procedures')).toBe(false);
      expect(startsWithActionVerb('')).toBe(false);
    });

    it('takes the lower-cased first three words as the opening', () => {
      expect(openingOf('Led  Lean rollout at second site')).toBe('led lean rollout');
    });
  });

  describe('scoreBulletRelevance', () => {
    it('adds keyword, metric and verb points', () => {
      expect(scoreBulletRelevance(BULLETS[1], KEYWORDS)).toBe(6);
      expect(scoreBulletRelevance(BULLETS[2], KEYWORDS)).toBe(4);
      expect(scoreBulletRelevance(BULLETS[4], KEYWORDS)).toBe(1);
    });

    it('takes a point off bullets over 160 characters', () => {
      const long = `Coordinated ${'supplier '.repeat(20)}reviews`;
      expect(long.length).toBeGreaterThan(160);
      expect(scoreBulletRelevance(long, KEYWORDS)).toBe(1);
    });
  });

  describe('selectBullets', () => {
    it('drops weak bullets and near-duplicate openings, best first', () => {
      expect(selectBullets(BULLETS, KEYWORDS, 6)).toEqual([
        'Led lean rollout that reduced scrap by 18%',
        'Managed automation cell commissioning for quality line',
        'Documented quality procedures',
      ]);
    });

    it('respects the cap', () => {
      expect(selectBullets(BULLETS, KEYWORDS, 2)).toEqual([
        'Led lean rollout that reduced scrap by 18%',
        'Managed automation cell commissioning for quality line',
      ]);
      expect(selectBullets(BULLETS, KEYWORDS, 0)).toEqual([]);
    });

    it('returns nothing for an empty list', () => {
      expect(selectBullets([], KEYWORDS)).toEqual([]);
    });
  });

  describe('selectSkills', () => {
    const skills = ['Minitab scripting', 'Kaizen events', 'Excel', 'Quality Control', 'Excel', 'SolidWorks'];

    it('puts keyword and synonym matches first, then the rest, without duplicates', () => {
      expect(selectSkills(skills, ['lean', 'quality'], 10)).toEqual([
        'Kaizen events',
        'Quality Control',
        'Minitab scripting',
        'Excel',
        'SolidWorks',
      ]);
    });

    it('truncates to the cap', () => {
      expect(selectSkills(skills, ['lean', 'quality'], 3)).toEqual([
        'Kaizen events',
        'Quality Control',
        'Minitab scripting',
      ]);
    });

    it('matches through a supplied synonym table', () => {
      expect(selectSkills(['Excel', 'TIG'], ['weld'], 5, { weld: ['tig'] })).toEqual(['TIG', 'Excel']);
    });
  });
});
