import * as cheerio from 'cheerio';
import {
  PageSignals,
  SCORE_RULES,
  calculateScore,
  classifyLink,
  collectPageSignals,
} from './score-rules';

const SITE_URL = 'https://example.com';

const emptySignals: PageSignals = {
  title: '',
  metaDescription: '',
  keywordInTitle: false,
  keywordInMeta: false,
  h1Count: 0,
  keywordInH1: false,
  h2Count: 0,
  keywordDensity: 0,
  internalLinkCount: 0,
  externalLinkCount: 0,
  imagesMissingAlt: 0,
  schemaBlockCount: 0,
  hasCanonical: false,
};

const perfectSignals: PageSignals = {
  title: 'a'.repeat(57),
  metaDescription: 'b'.repeat(150),
  keywordInTitle: true,
  keywordInMeta: true,
  h1Count: 1,
  keywordInH1: true,
  h2Count: 3,
  keywordDensity: 2,
  internalLinkCount: 2,
  externalLinkCount: 1,
  imagesMissingAlt: 0,
  schemaBlockCount: 1,
  hasCanonical: true,
};

describe('score-rules', () => {
  it('rule points add up to 100', () => {
    const total = SCORE_RULES.reduce((sum, rule) => sum + rule.points * (rule.maxItems ?? 1), 0);
    expect(total).toBe(100);
  });

  describe('calculateScore', () => {
    it('awards every point to a page meeting all rules', () => {
      expect(calculateScore(perfectSignals)).toBe(100);
    });

    it('gives an empty page only the alt-text points', () => {
      expect(calculateScore(emptySignals)).toBe(10);
    });

    it('caps per-item rules', () => {
      expect(calculateScore({ ...perfectSignals, h2Count: 7 })).toBe(100);
      expect(calculateScore({ ...perfectSignals, h2Count: 1 })).toBe(90);
    });

    it('scores density only inside the band', () => {
      expect(calculateScore({ ...perfectSignals, keywordDensity: 1.49 })).toBe(90);
      expect(calculateScore({ ...perfectSignals, keywordDensity: 2.5 })).toBe(100);
      expect(calculateScore({ ...perfectSignals, keywordDensity: 3 })).toBe(90);
    });

    it('clamps custom rule tables to 0-100', () => {
      expect(calculateScore(perfectSignals, [{ kind: 'h1Present', points: 150 }])).toBe(100);
      expect(calculateScore(perfectSignals, [{ kind: 'h1Present', points: -20 }])).toBe(0);
    });
  });

  describe('classifyLink', () => {
    it.each([
      ['/about/', 'internal'],
      ['https://example.com/guide/', 'internal'],
      ['https://other.org/', 'external'],
      ['//cdn.other.net/lib.js', 'external'],
      ['#top', 'other'],
      ['mailto:editor@example.com', 'other'],
      ['ftp://example.com/file', 'other'],
      ['', 'other'],
    ])('classifies %s as %s', (href, kind) => {
      expect(classifyLink(href, SITE_URL)).toBe(kind);
    });
  });

  it('collectPageSignals reads a rendered document', () => {
    const $ = cheerio.load(
      [
        '<html><head><title>Garden tips</title>',
        '<meta name="description" content="All about garden care.">',
        '<link rel="canonical" href="https://example.com/garden/">',
        '</head><body>',
        '<h1>Garden basics</h1><h2>Soil</h2>',
        '<p>Water the garden early today. <a href="/soil/">soil</a> <a href="https://other.org/">ref</a></p>',
        '<img src="/a.jpg" alt="garden bed"><img src="/b.jpg">',
        '</body></html>',
      ].join(''),
    );

    expect(collectPageSignals($, 'garden', SITE_URL)).toEqual({
      title: 'Garden tips',
      metaDescription: 'All about garden care.',
      keywordInTitle: true,
      keywordInMeta: true,
      h1Count: 1,
      keywordInH1: true,
      h2Count: 1,
      keywordDensity: expect.closeTo(20, 10),
      internalLinkCount: 1,
      externalLinkCount: 1,
      imagesMissingAlt: 1,
      schemaBlockCount: 0,
      hasCanonical: true,
    });
  });
});
