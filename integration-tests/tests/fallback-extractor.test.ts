/**
 * Fallback Extractor Tests
 *
 * Keyword-proximity spans from unlabelled text.
 */

import {
  extractFallback,
  scanKeywordFields,
  splitClauses,
  findKeywordClause,
} from '@journey-extractor/shared';
import { UNLABELLED_TEXT } from './helpers';

describe('Fallback Extractor', () => {
  describe('splitClauses', () => {
    it('should split on punctuation and newlines', () => {
      expect(splitClauses('a, b; c! d? e. f\ng')).toEqual(['a', 'b', 'c', 'd', 'e', 'f', 'g']);
    });

    it('should not split decimal numbers', () => {
      expect(splitClauses('score fell to -1.5 overall, sadly')).toEqual([
        'score fell to -1.5 overall',
        'sadly',
      ]);
    });
  });

  describe('findKeywordClause', () => {
    it('should cap the span at 200 characters', () => {
      const clause = findKeywordClause(['because ' + 'x'.repeat(300)], /\bbecause\b/i);
      expect(clause).toHaveLength(200);
    });

    it('should return null when no clause has the keyword', () => {
      expect(findKeywordClause(['nothing here'], /\bbecause\b/i)).toBeNull();
    });
  });

  describe('scanKeywordFields', () => {
    it('should pick spans near keywords', () => {
      const text =
        'Journey 4521 had issues. Rating: 3 pts. The cause was a signal failure, we recommend a new relay.';

      expect(scanKeywordFields(text)).toEqual({
        journey_id: '4521',
        score: '3 pts',
        reason: 'The cause was a signal failure',
        solution: 'we recommend a new relay',
      });
    });

    it('should keep a negative decimal score next to its keyword', () => {
      const fields = scanKeywordFields('score fell to -1.5 because of a late crew.');

      expect(fields.score).toBe('-1.5');
      expect(fields.reason).toBe('score fell to -1.5 because of a late crew');
    });

    it('should keep a Unicode minus sign on the score', () => {
      const record = extractFallback('journey 900, score −7 after the ice');

      expect(record.score).toBe('−7');
      expect(record.score_numeric).toBe(-7);
    });

    it('should keep a sign word in front of a numeric score', () => {
      const record = extractFallback('journey 900 score was minus 3, reason was snow');

      expect(record.score).toBe('minus 3');
      expect(record.score_numeric).toBe(-3);
    });

    it('should only take journey numbers of three or more digits', () => {
      expect(scanKeywordFields('journey 12 was fine').journey_id).toBeNull();
    });
  });

  describe('extractFallback', () => {
    it('should recognise a spelled-out score', () => {
      expect(extractFallback(UNLABELLED_TEXT)).toEqual({
        journey_id: null,
        score: 'minus two',
        score_numeric: -2,
        reason: 'reason seems to be weather',
        solution: null,
        confidence: 'low',
      });
    });

    it('should return an all-null low record for text without keywords', () => {
      expect(extractFallback('nothing to see here')).toEqual({
        journey_id: null,
        score: null,
        score_numeric: null,
        reason: null,
        solution: null,
        confidence: 'low',
      });
    });
  });
});
