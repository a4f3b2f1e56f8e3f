/**
 * Display helpers for the dashboard
 */

const usd = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export function formatCurrency(amount: number): string {
  return usd.format(amount);
}

export interface GainLoss {
  amount: number;
  percent: number;
  direction: 'up' | 'down' | 'flat';
}

/**
 * Gain or loss of the current value against the invested amount
 */
export function calculateGainLoss(currentValue: number, investmentAmount: number): GainLoss {
  const amount = Math.round((currentValue - investmentAmount) * 100) / 100;
  const percent = investmentAmount > 0
    ? Math.round((amount / investmentAmount) * 10000) / 100
    : 0;
  const direction = amount > 0 ? 'up' : amount < 0 ? 'down' : 'flat';
  return { amount, percent, direction };
}
