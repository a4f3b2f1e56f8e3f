/**
 * Error taxonomy for portfolio suggestions
 *
 * Structural and input problems are raised as one of these classes.
 * Per-instrument data gaps (a missing quote, fundamentals entry or history row)
 * are never raised; the affected ticker is skipped instead.
 */

export type PortfolioErrorCode =
  | 'invalid_strategy'
  | 'empty_ticker_list'
  | 'invalid_amount'
  | 'validation_error'
  | 'market_data_unavailable';

export class PortfolioError extends Error {
  readonly code: PortfolioErrorCode;
  readonly status: number;

  constructor(code: PortfolioErrorCode, message: string, status: number) {
    super(message);
    this.name = 'PortfolioError';
    this.code = code;
    this.status = status;
  }
}

export class InvalidStrategyError extends PortfolioError {
  readonly strategy: string;

  constructor(strategy: string, allowed: readonly string[]) {
    super('invalid_strategy', `Invalid strategy "${strategy}". Allowed strategies: ${allowed.join(', ')}`, 400);
    this.name = 'InvalidStrategyError';
    this.strategy = strategy;
  }
}

export class EmptyTickerListError extends PortfolioError {
  constructor(message = 'No valid tickers found for the given strategies') {
    super('empty_ticker_list', message, 400);
    this.name = 'EmptyTickerListError';
  }
}

export class InvalidAmountError extends PortfolioError {
  constructor(message: string) {
    super('invalid_amount', message, 400);
    this.name = 'InvalidAmountError';
  }
}

export class ValidationError extends PortfolioError {
  constructor(message: string) {
    super('validation_error', message, 400);
    this.name = 'ValidationError';
  }
}

export class MarketDataError extends PortfolioError {
  constructor(message: string) {
    super('market_data_unavailable', message, 503);
    this.name = 'MarketDataError';
  }
}

export function isPortfolioError(error: unknown): error is PortfolioError {
  return error instanceof PortfolioError;
}
