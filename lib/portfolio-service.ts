/**
 * Portfolio suggestion pipeline
 *
 * resolve strategies -> fetch prices and history -> allocate -> value + trend
 */

import { allocate } from './allocator';
import { MARKET_DATA_CONFIG, PORTFOLIO_CONFIG, type ResolutionModeSetting } from './env';
import { EmptyTickerListError, InvalidAmountError, MarketDataError, ValidationError } from './errors';
import { createLogger } from './logger';
import { StooqMarketDataProvider, type MarketDataProvider } from './market-data';
import { EMPTY_HISTORY, type PriceHistory } from './price-history';
import { CANDIDATE_TICKERS, INDEX_BASKET, buildUniverse, parseStrategy } from './strategies';
import { resolveStrategies, type ResolveOptions, type ScreeningPolicy } from './strategy-resolver';
import { reconstructTrend } from './trend';
import { validateAmount } from './validation';
import { roundCurrency, valuePortfolio } from './valuation';
import type { PortfolioSuggestion, StrategyId, SuggestionRequest } from './types/portfolio';

const log = createLogger('Portfolio');

export interface SuggestionDependencies {
  provider?: MarketDataProvider;
  resolutionMode?: ResolutionModeSetting;
  candidateTickers?: string[];
  screeningPolicy?: Partial<ScreeningPolicy>;
  fallbackTicker?: string;
  minimumAmount?: number;
  historyRows?: number;
}

let defaultProvider: MarketDataProvider | null = null;

function getDefaultProvider(): MarketDataProvider {
  if (!defaultProvider) {
    defaultProvider = new StooqMarketDataProvider();
  }
  return defaultProvider;
}

/**
 * Resolve strategies to tickers, loading fundamentals only when a strategy screens
 */
export async function resolveTickers(
  strategies: StrategyId[],
  deps: SuggestionDependencies = {}
): Promise<string[]> {
  const mode = deps.resolutionMode ?? PORTFOLIO_CONFIG.RESOLUTION_MODE;
  const needsScreening = mode === 'screening' && strategies.some((id) => id !== 'index');

  let options: ResolveOptions;
  if (needsScreening) {
    const provider = deps.provider ?? getDefaultProvider();
    const candidates = (deps.candidateTickers ?? CANDIDATE_TICKERS).filter(
      (ticker) => !INDEX_BASKET.includes(ticker)
    );
    const fundamentals = await provider.getFundamentals(candidates);
    options = {
      mode: 'screening',
      universe: buildUniverse(candidates, fundamentals),
      policy: deps.screeningPolicy,
      fallbackTicker: deps.fallbackTicker,
    };
  } else {
    options = { mode: 'static' };
  }

  return resolveStrategies(strategies, options);
}

export async function suggestPortfolio(
  request: SuggestionRequest,
  deps: SuggestionDependencies = {}
): Promise<PortfolioSuggestion> {
  const amount = validateAmount(request.investmentAmount, { minimum: deps.minimumAmount });
  if (!amount.success) {
    throw new InvalidAmountError(amount.error ?? 'Invalid investment amount');
  }
  const count = request.strategies.length;
  if (count === 0 || count > PORTFOLIO_CONFIG.MAX_STRATEGIES) {
    throw new ValidationError(`Between 1 and ${PORTFOLIO_CONFIG.MAX_STRATEGIES} strategies required`);
  }

  const strategies: StrategyId[] = [];
  for (const name of request.strategies) {
    // Unknown names raise InvalidStrategyError
    const id = parseStrategy(name);
    if (!strategies.includes(id)) strategies.push(id);
  }
  const weighting = request.weighting ?? PORTFOLIO_CONFIG.DEFAULT_WEIGHTING;
  const provider = deps.provider ?? getDefaultProvider();

  const tickers = await resolveTickers(strategies, { ...deps, provider });
  if (tickers.length === 0) {
    throw new EmptyTickerListError();
  }
  log.info(`Resolved ${strategies.join(', ')} -> ${tickers.join(', ')}`);

  const [prices, history] = await Promise.all([
    provider.getLivePrices(tickers),
    loadHistory(provider, tickers, deps.historyRows ?? MARKET_DATA_CONFIG.HISTORY_ROWS),
  ]);

  if (Object.keys(prices).length === 0) {
    throw new MarketDataError('Failed to fetch stock data: no live prices available');
  }

  const allocation = allocate(
    request.investmentAmount,
    tickers,
    prices,
    weighting === 'trend' ? history : undefined
  );
  const currentValue = valuePortfolio(allocation, prices);
  const trend = reconstructTrend(allocation, history);

  return {
    strategies,
    tickers,
    weighting,
    suggestedHoldings: allocation.holdings.map((holding) => ({
      ...holding,
      allocatedUsd: roundCurrency(holding.allocatedUsd),
    })),
    currentTotalValueUsd: roundCurrency(currentValue),
    weeklyValueTrend: trend,
    leftoverCashUsd: roundCurrency(allocation.leftoverCash),
  };
}

/**
 * History is optional for a suggestion: a failed fetch only empties the trend
 */
async function loadHistory(
  provider: MarketDataProvider,
  tickers: string[],
  rows: number
): Promise<PriceHistory> {
  try {
    return await provider.getPriceHistory(tickers, rows);
  } catch (error) {
    log.warn('History unavailable:', error instanceof Error ? error.message : error);
    return EMPTY_HISTORY;
  }
}
