/**
 * Strategies API
 * GET /api/strategies - List the strategies a suggestion can use
 */

import { NextResponse } from 'next/server';
import { PORTFOLIO_CONFIG } from '@/lib/env';
import { STRATEGIES } from '@/lib/strategies';

export const runtime = 'nodejs';

export async function GET() {
  const strategies = STRATEGIES.map((strategy) => ({
    id: strategy.id,
    label: strategy.label,
    description: strategy.description,
    mode: strategy.alwaysStatic ? 'static' : PORTFOLIO_CONFIG.RESOLUTION_MODE,
  }));

  return NextResponse.json({
    strategies,
    minInvestmentUsd: PORTFOLIO_CONFIG.MIN_INVESTMENT_USD,
    maxStrategies: PORTFOLIO_CONFIG.MAX_STRATEGIES,
  });
}
