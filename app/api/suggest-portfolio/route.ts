import { NextResponse } from 'next/server';
import { isPortfolioError } from '@/lib/errors';
import { createLogger } from '@/lib/logger';
import { suggestPortfolio } from '@/lib/portfolio-service';
import { validateSuggestionRequest } from '@/lib/validation';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

const log = createLogger('Suggest API');

/**
 * POST /api/suggest-portfolio
 *
 * Body: { investment_amount: number, strategies: string[], weighting?: 'equal' | 'trend' }
 */
export async function POST(request: Request) {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return NextResponse.json(
      { error: 'Invalid request', message: 'Request body must be valid JSON' },
      { status: 400 }
    );
  }

  const validation = validateSuggestionRequest(body);
  if (!validation.success || !validation.data) {
    return NextResponse.json(
      { error: 'Invalid request', field: validation.field, message: validation.error },
      { status: 400 }
    );
  }

  try {
    const suggestion = await suggestPortfolio(validation.data);
    return NextResponse.json({ suggestion });
  } catch (error) {
    if (isPortfolioError(error)) {
      log.warn(`${error.code}: ${error.message}`);
      return NextResponse.json(
        { error: error.code, message: error.message },
        { status: error.status }
      );
    }

    log.error('Suggestion failed:', error);
    return NextResponse.json(
      {
        error: 'Internal server error',
        message: error instanceof Error ? error.message : 'Unknown error'
      },
      { status: 500 }
    );
  }
}
