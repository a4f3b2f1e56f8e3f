import { isUsablePrice } from './allocator';
import type { AllocationResult, PriceQuote } from './types/portfolio';

/**
 * Current market value of an allocation.
 * Best-effort: a holding without a usable quote contributes zero instead of failing.
 */
export function valuePortfolio(allocation: AllocationResult, prices: PriceQuote): number {
  return allocation.holdings.reduce((total, holding) => {
    const price = prices[holding.ticker];
    return isUsablePrice(price) ? total + holding.sharesPurchased * price : total;
  }, 0);
}

export function roundCurrency(value: number): number {
  return Math.round(value * 100) / 100;
}
