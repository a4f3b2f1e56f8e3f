/**
 * Request validation for the suggestion endpoint
 */

import { PORTFOLIO_CONFIG, WEIGHTING_MODES } from './env';
import { STRATEGIES, findStrategyId } from './strategies';
import type { StrategyId, SuggestionRequest, WeightingMode } from './types/portfolio';

export interface ValidationResult<T> {
  success: boolean;
  data?: T;
  error?: string;
  field?: 'investment_amount' | 'strategies' | 'weighting' | 'body';
}

export interface AmountRules {
  minimum?: number;
}

export interface StrategyRules {
  maxStrategies?: number;
}

/**
 * Validate an investment amount in USD
 */
export function validateAmount(amount: unknown, rules: AmountRules = {}): ValidationResult<number> {
  const { minimum = PORTFOLIO_CONFIG.MIN_INVESTMENT_USD } = rules;

  if (typeof amount !== 'number' || !Number.isFinite(amount)) {
    return { success: false, field: 'investment_amount', error: 'Investment amount must be a number' };
  }

  if (amount < minimum) {
    return {
      success: false,
      field: 'investment_amount',
      error: `Investment amount must be at least $${minimum.toLocaleString('en-US')}`,
    };
  }

  return { success: true, data: amount };
}

/**
 * Validate the strategy list: 1 to maxStrategies known names, duplicates collapsed
 */
export function validateStrategies(strategies: unknown, rules: StrategyRules = {}): ValidationResult<StrategyId[]> {
  const { maxStrategies = PORTFOLIO_CONFIG.MAX_STRATEGIES } = rules;

  if (!Array.isArray(strategies)) {
    return { success: false, field: 'strategies', error: 'Strategies must be an array' };
  }

  if (strategies.length === 0) {
    return { success: false, field: 'strategies', error: 'At least 1 strategy required' };
  }

  if (strategies.length > maxStrategies) {
    return { success: false, field: 'strategies', error: `Maximum ${maxStrategies} strategies allowed` };
  }

  const ids: StrategyId[] = [];
  const invalid: string[] = [];

  for (const entry of strategies) {
    const id = typeof entry === 'string' ? findStrategyId(entry) : null;
    if (id === null) {
      invalid.push(String(entry));
    } else if (!ids.includes(id)) {
      ids.push(id);
    }
  }

  if (invalid.length > 0) {
    const allowed = STRATEGIES.map((s) => s.label).join(', ');
    return {
      success: false,
      field: 'strategies',
      error: `Invalid strategies: ${invalid.join(', ')}. Allowed strategies: ${allowed}`,
    };
  }

  return { success: true, data: ids };
}

export function validateWeighting(weighting: unknown): ValidationResult<WeightingMode | undefined> {
  if (weighting === undefined || weighting === null) {
    return { success: true, data: undefined };
  }
  const match = WEIGHTING_MODES.find((mode) => mode === weighting);
  if (!match) {
    return { success: false, field: 'weighting', error: 'weighting must be "equal" or "trend"' };
  }
  return { success: true, data: match };
}

/**
 * Validate a suggestion request body.
 * Accepts snake_case (investment_amount) and camelCase (investmentAmount).
 */
export function validateSuggestionRequest(
  body: unknown,
  rules: AmountRules & StrategyRules = {}
): ValidationResult<SuggestionRequest> {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    return { success: false, field: 'body', error: 'Request body must be a JSON object' };
  }

  const params = new Map(Object.entries(body));
  const amount = validateAmount(params.get('investment_amount') ?? params.get('investmentAmount'), rules);
  if (!amount.success || amount.data === undefined) {
    return { success: false, field: amount.field, error: amount.error };
  }

  const strategies = validateStrategies(params.get('strategies'), rules);
  if (!strategies.success || !strategies.data) {
    return { success: false, field: strategies.field, error: strategies.error };
  }

  const weighting = validateWeighting(params.get('weighting'));
  if (!weighting.success) {
    return { success: false, field: weighting.field, error: weighting.error };
  }

  return {
    success: true,
    data: {
      investmentAmount: amount.data,
      strategies: strategies.data,
      weighting: weighting.data,
    },
  };
}
