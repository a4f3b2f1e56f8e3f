/**
 * Tests for suggestion request validation
 */

import {
  validateAmount,
  validateStrategies,
  validateSuggestionRequest,
  validateWeighting,
} from '../validation';

describe('Request Validation', () => {
  describe('validateAmount', () => {
    it('should accept amounts at the minimum', () => {
      expect(validateAmount(5000, { minimum: 5000 })).toEqual({ success: true, data: 5000 });
    });

    it('should reject amounts below the minimum', () => {
      expect(validateAmount(4999, { minimum: 5000 })).toEqual({
        success: false,
        field: 'investment_amount',
        error: 'Investment amount must be at least $5,000',
      });
    });

    it('should reject non-numeric amounts', () => {
      expect(validateAmount('10000').error).toBe('Investment amount must be a number');
      expect(validateAmount(NaN).error).toBe('Investment amount must be a number');
      expect(validateAmount(undefined).success).toBe(false);
    });
  });

  describe('validateStrategies', () => {
    it('should require an array', () => {
      expect(validateStrategies('growth').error).toBe('Strategies must be an array');
    });

    it('should require at least one strategy', () => {
      expect(validateStrategies([]).error).toBe('At least 1 strategy required');
    });

    it('should limit the number of strategies', () => {
      expect(validateStrategies(['growth', 'value', 'index'], { maxStrategies: 2 }).error).toBe(
        'Maximum 2 strategies allowed'
      );
    });

    it('should accept ids and display labels', () => {
      expect(validateStrategies(['Growth Investing', 'value'], { maxStrategies: 2 })).toEqual({
        success: true,
        data: ['growth', 'value'],
      });
    });

    it('should collapse duplicates', () => {
      expect(validateStrategies(['growth', 'GROWTH'], { maxStrategies: 2 }).data).toEqual(['growth']);
    });

    it('should list allowed strategies for unknown names', () => {
      expect(validateStrategies(['crypto'], { maxStrategies: 2 })).toEqual({
        success: false,
        field: 'strategies',
        error:
          'Invalid strategies: crypto. Allowed strategies: Ethical Investing, Growth Investing, Index Investing, Quality Investing, Value Investing',
      });
    });
  });

  describe('validateWeighting', () => {
    it('should accept a missing or known weighting', () => {
      expect(validateWeighting(undefined)).toEqual({ success: true, data: undefined });
      expect(validateWeighting('trend')).toEqual({ success: true, data: 'trend' });
    });

    it('should reject unknown weightings', () => {
      expect(validateWeighting('momentum')).toEqual({
        success: false,
        field: 'weighting',
        error: 'weighting must be "equal" or "trend"',
      });
    });
  });

  describe('validateSuggestionRequest', () => {
    const rules = { minimum: 5000, maxStrategies: 2 };

    it('should reject a non-object body', () => {
      expect(validateSuggestionRequest(null, rules).field).toBe('body');
      expect(validateSuggestionRequest([1, 2], rules).error).toBe('Request body must be a JSON object');
    });

    it('should accept snake_case and camelCase amounts', () => {
      const snake = validateSuggestionRequest({ investment_amount: 10000, strategies: ['index'] }, rules);
      const camel = validateSuggestionRequest({ investmentAmount: 10000, strategies: ['index'] }, rules);

      expect(snake).toEqual({ success: true, data: { investmentAmount: 10000, strategies: ['index'] } });
      expect(camel).toEqual(snake);
    });

    it('should report the first failing field', () => {
      expect(validateSuggestionRequest({ strategies: ['index'] }, rules).field).toBe('investment_amount');
      expect(validateSuggestionRequest({ investment_amount: 10000, strategies: [] }, rules).field).toBe('strategies');
      expect(
        validateSuggestionRequest({ investment_amount: 10000, strategies: ['index'], weighting: 'x' }, rules).field
      ).toBe('weighting');
    });

    it('should pass the weighting through', () => {
      const result = validateSuggestionRequest(
        { investment_amount: 7500, strategies: ['quality', 'ethical'], weighting: 'trend' },
        rules
      );
      expect(result.data).toEqual({ investmentAmount: 7500, strategies: ['quality', 'ethical'], weighting: 'trend' });
    });
  });
});
