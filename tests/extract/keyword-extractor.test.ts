import { describe, it, expect } from 'vitest';
import {
  countTerms,
  expandKeywords,
  extractKeywords,
  tokenize,
} from '@tailorkit/agents';

const FOX_TEXT = 'The Quick brown FOX jumps over the lazy dog the dog barks';

describe('keyword-extractor', () => {
  describe('tokenize', () => {
    it('lower-cases and keeps hyphenated compounds whole', () => {
      expect(tokenize('Cross-Functional NPI, 5S & C++')).toEqual(['cross-functional', 'npi', 's', 'c']);
    });

    it('returns nothing for null or empty text', () => {
      expect(tokenize(null)).toEqual([]);
      expect(tokenize('')).toEqual([]);
    });
  });

  describe('countTerms', () => {
    it('counts case-insensitively', () => {
      const counts = countTerms('Lean lean LEAN kaizen');
      expect([...counts.entries()]).toEqual([
        ['lean', 3],
        ['kaizen', 1],
      ]);
    });
  });

  describe('extractKeywords', () => {
    it('ranks by frequency and breaks ties by first occurrence', () => {
      expect(extractKeywords(FOX_TEXT, 3)).toEqual(['dog', 'quick', 'brown']);
    });

    it('honours a higher length floor', () => {
      expect(extractKeywords(FOX_TEXT, 3, { minLength: 4 })).toEqual(['quick', 'brown', 'jumps']);
    });

    it('drops stopwords', () => {
      expect(extractKeywords('with that have these', 10)).toEqual([]);
    });

    it('keeps hyphenated terms as one keyword', () => {
      expect(extractKeywords('cross-functional cross-functional teams', 5)).toEqual([
        'cross-functional',
        'teams',
      ]);
    });

    it('returns an empty list for a zero limit or empty text', () => {
      expect(extractKeywords(FOX_TEXT, 0)).toEqual([]);
      expect(extractKeywords(null, 10)).toEqual([]);
      expect(extractKeywords('', 10)).toEqual([]);
    });

    it('returns the same list for the same text', () => {
      expect(extractKeywords(FOX_TEXT, 5)).toEqual(extractKeywords(FOX_TEXT, 5));
    });

    it('never returns more than the limit, all unique', () => {
      const result = extractKeywords(FOX_TEXT, 4);
      expect(result).toHaveLength(4);
      expect(new Set(result).size).toBe(4);
    });

    it('accepts a custom stopword set', () => {
      expect(extractKeywords(FOX_TEXT, 2, { stopwords: new Set(['dog']) })).toEqual(['the', 'quick']);
    });
  });

  describe('expandKeywords', () => {
    it('adds synonyms after each keyword', () => {
      expect([...expandKeywords(['lean', 'widget'])]).toEqual([
        'lean',
        'kaizen',
        'six sigma',
        '5s',
        'widget',
      ]);
    });

    it('ignores keywords that collide with object prototype names', () => {
      expect([...expandKeywords(['constructor', 'toString'])]).toEqual(['constructor', 'toString']);
    });

    it('uses a supplied synonym table', () => {
      expect([...expandKeywords(['weld'], { weld: ['tig', 'mig'] })]).toEqual(['weld', 'tig', 'mig']);
    });
  });
});
