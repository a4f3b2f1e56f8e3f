/**
 * Print a portfolio suggestion
 *
 * Run with: npx tsx scripts/suggest-portfolio.ts 10000 growth "Value Investing" [--trend] [--static]
 */

import { config } from 'dotenv';
import { resolve } from 'path';

// Load environment variables from .env.local
config({ path: resolve(process.cwd(), '.env.local') });

async function main() {
  // Imported after dotenv so lib/env.ts sees .env.local
  const { suggestPortfolio } = await import('../lib/portfolio-service');
  const { formatCurrency } = await import('../lib/format');
  const { parseStrategy } = await import('../lib/strategies');

  const args = process.argv.slice(2);
  const flags = new Set(args.filter((arg) => arg.startsWith('--')));
  const [amountArg, ...strategies] = args.filter((arg) => !arg.startsWith('--'));
  const amount = Number(amountArg);

  if (!amountArg || strategies.length === 0) {
    console.error('Usage: scripts/suggest-portfolio.ts <amount> <strategy> [strategy] [--trend] [--static]');
    process.exit(1);
  }

  const suggestion = await suggestPortfolio(
    {
      investmentAmount: amount,
      strategies: strategies.map(parseStrategy),
      weighting: flags.has('--trend') ? 'trend' : 'equal',
    },
    { resolutionMode: flags.has('--static') ? 'static' : undefined }
  );

  console.log('=== Suggested Portfolio ===\n');
  console.log(`Strategies: ${suggestion.strategies.join(', ')} (${suggestion.weighting} weighting)`);
  console.log(`Tickers:    ${suggestion.tickers.join(', ')}\n`);

  for (const holding of suggestion.suggestedHoldings) {
    console.log(
      `  ${holding.ticker.padEnd(6)} ${String(holding.sharesPurchased).padStart(6)} sh  ${formatCurrency(holding.allocatedUsd).padStart(14)}`
    );
  }

  console.log(`\nCurrent value: ${formatCurrency(suggestion.currentTotalValueUsd)}`);
  console.log(`Leftover cash: ${formatCurrency(suggestion.leftoverCashUsd)}`);

  if (suggestion.weeklyValueTrend.length > 0) {
    console.log('\nRecent value:');
    for (const point of suggestion.weeklyValueTrend) {
      console.log(`  ${point.date}  ${formatCurrency(point.portfolioValueUsd)}`);
    }
  }
}

main().catch((error) => {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
