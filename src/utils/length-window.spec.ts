import { TITLE_FILLERS, TITLE_WINDOW } from '../seo-optimizer/seo-optimizer.constants';
import {
  charLength,
  clipToWindow,
  clipToWord,
  fitToWindow,
  isWithinWindow,
} from './length-window';

describe('length-window', () => {
  it('isWithinWindow is inclusive on both ends', () => {
    expect(isWithinWindow('a'.repeat(55), TITLE_WINDOW)).toBe(true);
    expect(isWithinWindow('a'.repeat(60), TITLE_WINDOW)).toBe(true);
    expect(isWithinWindow('a'.repeat(61), TITLE_WINDOW)).toBe(false);
  });

  it('counts surrogate pairs as one character', () => {
    expect(charLength('😀x')).toBe(2);
    expect(isWithinWindow('😀'.repeat(3), { min: 3, max: 3 })).toBe(true);
  });

  describe('clipToWord', () => {
    it('cuts at the last whole word', () => {
      expect(clipToWord('alpha beta gamma', 11)).toBe('alpha beta');
    });

    it('keeps text that already fits', () => {
      expect(clipToWord('alpha', 10)).toBe('alpha');
    });

    it('returns an empty string when no word fits', () => {
      expect(clipToWord('alphabet soup', 4)).toBe('');
      expect(clipToWord('alpha', -3)).toBe('');
    });
  });

  describe('clipToWindow', () => {
    it('prefers a word boundary', () => {
      expect(clipToWindow('one two three four', { min: 5, max: 10 })).toBe('one two');
    });

    it('falls back to a hard cut below the minimum', () => {
      expect(clipToWindow('abcdefghijklmnop qr', { min: 8, max: 10 })).toBe('abcdefghij');
    });

    it('never splits a surrogate pair', () => {
      expect(clipToWindow('ab😀cd', { min: 1, max: 3 })).toBe('ab😀');
    });
  });

  describe('fitToWindow', () => {
    it('appends fillers until the minimum is reached', () => {
      expect(fitToWindow('Test - testing', TITLE_WINDOW, TITLE_FILLERS, ' - ')).toBe(
        'Test - testing - Complete Guide - Tips and Best Practices',
      );
    });

    it('clips when no filler fits', () => {
      expect(fitToWindow('abc', { min: 10, max: 12 }, ['toolongfiller', 'defgh'])).toBe(
        'abc defgh to',
      );
    });

    it('clips text that starts above the window', () => {
      const fitted = fitToWindow('word '.repeat(30), TITLE_WINDOW, TITLE_FILLERS);
      expect(fitted.length).toBeGreaterThanOrEqual(TITLE_WINDOW.min);
      expect(fitted.length).toBeLessThanOrEqual(TITLE_WINDOW.max);
    });
  });
});
