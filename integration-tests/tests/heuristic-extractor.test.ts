/**
 * Heuristic Extractor Tests
 *
 * Labelled "key: value" declarations.
 */

import {
  extractHeuristic,
  scanLabelledFields,
  cleanLabelledValue,
  hasAnchorField,
} from '@journey-extractor/shared';
import { LABELLED_TEXT } from './helpers';

describe('Heuristic Extractor', () => {
  describe('scanLabelledFields', () => {
    it('should read one field per line', () => {
      expect(scanLabelledFields(LABELLED_TEXT)).toEqual({
        journey_id: '2002',
        score: '-4.2',
        reason: 'late arrival',
        solution: 'reroute via north line',
      });
    });

    it('should split segments on pipes and semicolons', () => {
      expect(scanLabelledFields('Journey ID = 789 | score = 3; Cause: slow boarding')).toEqual({
        journey_id: '789',
        score: '3',
        reason: 'slow boarding',
        solution: null,
      });
    });

    it('should accept a spaced dash as separator', () => {
      expect(scanLabelledFields('Reason - late crew').reason).toBe('late crew');
    });

    it('should accept French labels', () => {
      const fields = scanLabelledFields('Score: -1\nRaison: retard du train');
      expect(fields.reason).toBe('retard du train');
    });

    it('should keep the first declaration of a field', () => {
      expect(scanLabelledFields('Score: 1\nScore: 2').score).toBe('1');
    });

    it('should ignore labels without a value', () => {
      expect(scanLabelledFields('Score:   \nReason: none given').score).toBeNull();
    });

    it('should find inline declarations inside prose', () => {
      expect(scanLabelledFields('The overall score = -2.5 for the leg').score).toBe('-2.5');
      expect(scanLabelledFields('Report for journey_id=J-42 follows').journey_id).toBe('J-42');
    });
  });

  describe('cleanLabelledValue', () => {
    it('should strip surrounding quotes and whitespace', () => {
      expect(cleanLabelledValue('  "A-17" ')).toBe('A-17');
    });

    it('should return null for empty values', () => {
      expect(cleanLabelledValue('  ')).toBeNull();
    });
  });

  describe('hasAnchorField', () => {
    it('should only count journey_id and score', () => {
      expect(
        hasAnchorField({ journey_id: null, score: null, reason: 'x', solution: 'y' })
      ).toBe(false);
      expect(
        hasAnchorField({ journey_id: null, score: '1', reason: null, solution: null })
      ).toBe(true);
    });
  });

  describe('extractHeuristic', () => {
    it('should be sufficient with an explicit journey id', () => {
      const result = extractHeuristic('JourneyId: 12345');

      expect(result.sufficient).toBe(true);
      expect(result.record.journey_id).toBe('12345');
      expect(result.record.confidence).toBe('heuristic');
    });

    it('should derive the numeric score', () => {
      const result = extractHeuristic(LABELLED_TEXT);
      expect(result.record.score_numeric).toBe(-4.2);
    });

    it('should be insufficient when only a reason is labelled', () => {
      const result = extractHeuristic('Reason: late crew');

      expect(result.sufficient).toBe(false);
      expect(result.record).toEqual({
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
