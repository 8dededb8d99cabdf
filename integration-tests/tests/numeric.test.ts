/**
 * Score Normalization Tests
 */

import { parseScoreNumeric } from '@journey-extractor/shared';

describe('parseScoreNumeric', () => {
  it.each([
    ['-3.4', -3.4],
    ['-3.4 pts', -3.4],
    ['(+2)', 2],
    ['−1.5', -1.5],
    ['.5', 0.5],
    ['7/10', 7],
    ['1.2.3', 1.2],
    ['score of 12%', 12],
  ])('should parse %p as %p', (raw, expected) => {
    expect(parseScoreNumeric(raw)).toBe(expected);
  });

  it('should return null for absent scores', () => {
    expect(parseScoreNumeric(null)).toBeNull();
    expect(parseScoreNumeric(undefined)).toBeNull();
    expect(parseScoreNumeric('')).toBeNull();
  });

  it('should return null for text without a number', () => {
    expect(parseScoreNumeric('terrible')).toBeNull();
    expect(parseScoreNumeric('someone else')).toBeNull();
  });

  it('should take the sign from a sign word before the digits', () => {
    expect(parseScoreNumeric('minus 2')).toBe(-2);
    expect(parseScoreNumeric('Negative 4.5 pts')).toBe(-4.5);
    expect(parseScoreNumeric('plus 3')).toBe(3);
    expect(parseScoreNumeric('minus -1')).toBe(-1);
  });

  describe('spelled-out numbers', () => {
    it('should recognise signed number words', () => {
      expect(parseScoreNumeric('minus two')).toBe(-2);
      expect(parseScoreNumeric('Negative Five')).toBe(-5);
      expect(parseScoreNumeric('plus three')).toBe(3);
    });

    it('should recognise unsigned number words', () => {
      expect(parseScoreNumeric('twenty')).toBe(20);
      expect(parseScoreNumeric('zero')).toBe(0);
    });

    it('should ignore a number word inside other text', () => {
      expect(parseScoreNumeric('no one knows')).toBeNull();
      expect(parseScoreNumeric('two of us disagreed')).toBeNull();
    });

    it('should accept a number word with units around it', () => {
      expect(parseScoreNumeric('(minus three points)')).toBe(-3);
    });

    it('should prefer a digit token over a number word', () => {
      expect(parseScoreNumeric('minus two, later 3')).toBe(3);
    });
  });
});
